import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        'src/cli.ts',
        'src/index.ts',
        'src/evaluators/index.ts',
        'src/generation/index.ts',
        'src/reporting/index.ts',
        'src/serialization/index.ts',
      ],
    },
  },
});
