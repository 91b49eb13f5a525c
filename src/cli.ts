#!/usr/bin/env node

import { toError } from './errors.js';
import { createLogger } from './logger.js';
import { createProgram, runFromFlags } from './program.js';

const logger = createLogger('cli');

const program = createProgram(async (flags) => {
  await runFromFlags(flags);
});

program.parseAsync(process.argv).catch((e: unknown) => {
  const error = toError(e);
  logger.error(`${error.name}: ${error.message}`);
  process.exitCode = 1;
});
