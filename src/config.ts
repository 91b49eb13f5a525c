/**
 * Run configuration: the options of a benchmark run, an optional YAML/JSON file
 * providing them, and the continuous-batching backend configuration.
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { createLogger } from './logger.js';
import { LANGUAGES } from './serialization/prompts.js';
import { isRecord, TASKS } from './types.js';

const logger = createLogger('config');

export const BACKENDS = ['native', 'genai', 'llamacpp'] as const;

export type Backend = (typeof BACKENDS)[number];

export const DEFAULT_SIMILARITY_MODEL = 'sentence-transformers/all-mpnet-base-v2';

export const DEFAULT_SPLIT = 'validation';

const positiveInt = z.number().int().positive();

export const runOptionsSchema = z.object({
  task: z.enum(TASKS).default('text'),
  baseModel: z.string().optional(),
  targetModel: z.string().optional(),
  /** Tokenizer id overriding the one derived from the model ids. */
  tokenizer: z.string().optional(),
  chatTemplate: z.boolean().default(false),
  skipQuestion: z.boolean().default(false),
  /** Ground truth table; generated from the base model when the file is absent. */
  gtData: z.string().optional(),
  /** Target prediction table; used instead of the target model when the file exists. */
  targetData: z.string().optional(),
  similarityModelId: z.string().default(DEFAULT_SIMILARITY_MODEL),
  dataset: z.string().optional(),
  datasetField: z.string().default('text'),
  /** Only used with `dataset`; defaults to `validation` there. */
  split: z.string().optional(),
  output: z.string().optional(),
  numSamples: positiveInt.optional(),
  verbose: z.boolean().default(false),
  device: z.string().default('CPU'),
  /** Backend runtime configuration file, passed to the model hub as is. */
  deviceConfig: z.string().optional(),
  language: z.enum(LANGUAGES).default('en'),
  backend: z.enum(BACKENDS).default('native'),
  cbConfig: z.string().optional(),
  imageSize: positiveInt.optional(),
  numInferenceSteps: positiveInt.default(4),
  seed: z.number().int().default(42),
  maxNewTokens: positiveInt.default(128),
  topK: z.number().int().nonnegative().default(5),
  maxAttempts: positiveInt.default(5),
});

export type RunOptions = z.infer<typeof runOptionsSchema>;

export type RunOptionsInput = z.input<typeof runOptionsSchema>;

const runConfigFileSchema = runOptionsSchema.partial().strict();

export type RunConfigFile = z.infer<typeof runConfigFileSchema>;

export function parseRunOptions(input: unknown): RunOptions {
  const result = runOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid run options: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load a partial set of run options from a YAML or JSON file.
 */
export function loadRunConfigFile(path: string): RunConfigFile {
  const ext = extname(path).toLowerCase();
  if (ext !== '.json' && ext !== '.yaml' && ext !== '.yml') {
    throw new ConfigurationError(
      `Unsupported run configuration format '${ext}' for ${path}: use .yaml, .yml or .json`,
    );
  }
  if (!existsSync(path)) {
    throw new ConfigurationError(`Run configuration file not found: ${path}`);
  }

  const content = readFileSync(path, 'utf-8');
  let raw: unknown;
  try {
    raw = ext === '.json' ? JSON.parse(content) : YAML.parse(content);
  } catch (e) {
    throw new ConfigurationError(`Could not parse run configuration ${path}: ${String(e)}`);
  }

  const result = runConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid run configuration ${path}: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

/**
 * Merge file options with explicitly given flags; flags win. Undefined flags
 * are treated as not given.
 */
export function mergeRunOptions(
  file: RunConfigFile,
  flags: Partial<Record<keyof RunOptions, unknown>>,
): RunOptions {
  const given = Object.fromEntries(Object.entries(flags).filter(([, v]) => v !== undefined));
  return parseRunOptions({ ...file, ...given });
}

/**
 * Read the continuous-batching configuration, a JSON object handed to the
 * backend untouched. Failures are logged and yield an empty configuration.
 */
export function readCbConfig(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    logger.error(`Configuration file not found at: ${path}`);
    return {};
  }
  let config: unknown;
  try {
    config = JSON.parse(readFileSync(path, 'utf-8'));
  } catch {
    logger.error(`Invalid JSON format in configuration file: ${path}`);
    return {};
  }
  if (!isRecord(config)) {
    logger.error(`Configuration file does not hold a JSON object: ${path}`);
    return {};
  }
  return config;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.join('.');
      return where ? `${where}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
