/**
 * Core type definitions shared by evaluators, generation adapters and reporting.
 */

/**
 * Supported generation modalities, in the order they are listed to users.
 */
export const TASKS = [
  'text',
  'text-to-image',
  'visual-text',
  'image-to-image',
  'image-inpainting',
] as const;

export type Task = (typeof TASKS)[number];

/**
 * A decoded 8-bit image, row-major with interleaved channels.
 */
export interface Image {
  width: number;
  height: number;
  channels: 1 | 3;
  data: Uint8Array;
}

export interface ImagePrompt {
  prompt: string;
  image: Image;
}

export interface InpaintingPrompt {
  prompt: string;
  image: Image;
  mask: Image;
}

/**
 * The prompt record consumed by each task.
 */
export interface TaskPrompts {
  text: string;
  'text-to-image': string;
  'visual-text': ImagePrompt;
  'image-to-image': ImagePrompt;
  'image-inpainting': InpaintingPrompt;
}

export type PromptRecord = TaskPrompts[Task];

/**
 * One row of ground truth: the prompt and what the base model produced for it.
 * Image tasks store file references in `output` (and the source image/mask paths).
 */
export interface GroundTruthRecord {
  prompt: string;
  output: string;
  image?: string;
  mask?: string;
}

/**
 * One scored row. `similarity` is always present; evaluators may add more metrics.
 */
export interface ScoreRecord {
  prompt: string;
  source_model: string;
  optimized_model: string;
  similarity: number;
  [metric: string]: string | number;
}

/**
 * Column-wise mean over all numeric columns of the score table.
 */
export type AggregateMetrics = Record<string, number>;

export interface ScoreResult {
  perExample: ScoreRecord[];
  aggregate: AggregateMetrics;
}

/**
 * Helper to check if a value is a plain (non-array) object.
 */
export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Names of the numeric metric columns of a score record, in key order.
 */
export function metricNames(record: ScoreRecord): string[] {
  return Object.keys(record).filter((k) => typeof record[k] === 'number');
}
