/**
 * Zod schemas for persisted tables and prompt dataset files.
 */

import { z } from 'zod';

/**
 * A cell of a persisted table. CSV yields strings; JSON and YAML may carry numbers.
 */
export const tableCellSchema = z.union([z.string(), z.number()]);

export const tableSchema = z.array(z.record(z.string(), tableCellSchema));

export const groundTruthRowSchema = z.object({
  prompt: z.string({ required_error: "missing 'prompt' column" }),
  output: z.string({ required_error: "missing 'output' column" }),
  image: z.string().optional(),
  mask: z.string().optional(),
});

/**
 * A numeric cell. A blank CSV cell is missing data, not zero.
 */
function metricCell(column: string) {
  return z
    .union([z.number(), z.string()], { required_error: `missing '${column}' column` })
    .refine((v) => typeof v === 'number' || v.trim() !== '', `empty '${column}' cell`)
    .pipe(z.coerce.number());
}

export const scoreRowSchema = z.object({
  prompt: z.string({ required_error: "missing 'prompt' column" }),
  source_model: z.string(),
  optimized_model: z.string(),
  similarity: metricCell('similarity'),
});

/**
 * A prompt dataset file: named splits, each an array of prompts or prompt records.
 */
export const promptDatasetSchema = z.record(
  z.string(),
  z.array(z.union([z.string(), z.record(z.string(), z.unknown())])),
);

export type PromptDatasetRow = z.infer<typeof promptDatasetSchema>[string][number];
