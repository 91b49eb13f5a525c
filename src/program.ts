/**
 * Command-line surface of a benchmark run.
 *
 * Usage:
 *   divergence-bench --hub ./hub.js --base-model base --target-model target
 *   divergence-bench --hub ./hub.js --gt-data gt.csv --target-model target -v
 *   divergence-bench --hub ./hub.js --config run.yaml --num-samples 8
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { Command, InvalidArgumentError, Option } from 'commander';
import {
  loadRunConfigFile,
  mergeRunOptions,
  type RunConfigFile,
  type RunOptions,
} from './config.js';
import { ConfigurationError } from './errors.js';
import { parseTask } from './evaluators/registry.js';
import { isModelHub, type ModelHub } from './hub.js';
import { type LogLevel, setLogLevel } from './logger.js';
import { type BenchmarkResult, runBenchmark } from './orchestrator.js';
import { LANGUAGES } from './serialization/prompts.js';
import { isRecord, type Task, TASKS } from './types.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface CliFlags {
  hub: string;
  config?: string;
  logLevel?: LogLevel;
  baseModel?: string;
  targetModel?: string;
  tokenizer?: string;
  chatTemplate?: boolean;
  skipQuestion?: boolean;
  gtData?: string;
  targetData?: string;
  modelType?: Task;
  dataEncoder?: string;
  dataset?: string;
  datasetField?: string;
  split?: string;
  output?: string;
  numSamples?: number;
  verbose?: boolean;
  device?: string;
  deviceConfig?: string;
  language?: string;
  genai?: boolean;
  llamacpp?: boolean;
  cbConfig?: string;
  imageSize?: number;
  numInferenceSteps?: number;
  seed?: number;
  maxNewTokens?: number;
  topK?: number;
  maxAttempts?: number;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return n;
}

function parseTaskArgument(value: string): Task {
  try {
    return parseTask(value);
  } catch (e) {
    if (e instanceof ConfigurationError) throw new InvalidArgumentError(e.message);
    throw e;
  }
}

export function createProgram(action: (flags: CliFlags) => Promise<void>): Command {
  const program = new Command();

  program
    .name('divergence-bench')
    .description('Measure how far a target model drifts from its base model')
    .version('0.1.0')
    .requiredOption('--hub <module>', 'ES module whose default export implements ModelHub')
    .option('--config <path>', 'YAML or JSON file with run options; flags take precedence')
    .addOption(new Option('--log-level <level>', 'Minimum log level').choices(LOG_LEVELS))
    .option('--base-model <id>', 'Base model producing the ground truth')
    .option('--target-model <id>', 'Target model to compare against the base model')
    .option('--tokenizer <id>', 'Tokenizer overriding the one of the base or target model')
    .option('--chat-template', 'Apply the chat template to prompts')
    .option('--skip-question', 'Drop the echoed prompt from generated text')
    .option('--gt-data <path>', 'Ground truth table; generated from the base model if absent')
    .option('--target-data <path>', 'Target predictions; generated from the target model if absent')
    .addOption(
      new Option('--model-type <task>', `Task to benchmark: ${TASKS.join(', ')}`).argParser(
        parseTaskArgument,
      ),
    )
    .option('--data-encoder <id>', 'Model used to embed outputs for similarity')
    .option('--dataset <path>', 'Prompt file with named splits; built-in prompts otherwise')
    .option('--dataset-field <field>', 'Record field holding the prompt text')
    .option('--split <split>', "Dataset split, optionally sliced, e.g. 'train[:32]'")
    .option('--output <dir>', 'Directory for metrics and target predictions')
    .option('--num-samples <n>', 'Number of prompts to use', parsePositiveInt)
    .option('-v, --verbose', 'Print the worst examples')
    .option('--device <device>', 'Device to run models on')
    .option('--device-config <path>', 'Backend runtime configuration file')
    .addOption(
      new Option('--language <lang>', 'Language of the built-in prompts').choices(LANGUAGES),
    )
    .option('--genai', 'Use the genai backend')
    .option('--llamacpp', 'Use the llama.cpp backend')
    .option('--cb-config <path>', 'Continuous-batching configuration JSON')
    .option('--image-size <n>', 'Square size of generated images', parsePositiveInt)
    .option('--num-inference-steps <n>', 'Denoising steps for image generation', parsePositiveInt)
    .option('--seed <n>', 'Seed of the image generation noise', parseInteger)
    .option('--max-new-tokens <n>', 'Token budget of text generation', parsePositiveInt)
    .option('--top-k <n>', 'Number of worst examples to print', parseInteger)
    .option('--max-attempts <n>', 'Attempts per backend call before giving up', parsePositiveInt)
    .action(async (flags: CliFlags) => {
      await action(flags);
    });

  return program;
}

/**
 * Map parsed flags onto run option names; flags that were not given stay undefined.
 */
export function toRunFlags(flags: CliFlags): Partial<Record<keyof RunOptions, unknown>> {
  if (flags.genai && flags.llamacpp) {
    throw new ConfigurationError('--genai and --llamacpp are mutually exclusive');
  }
  let backend: RunOptions['backend'] | undefined;
  if (flags.genai) backend = 'genai';
  else if (flags.llamacpp) backend = 'llamacpp';

  return {
    task: flags.modelType,
    baseModel: flags.baseModel,
    targetModel: flags.targetModel,
    tokenizer: flags.tokenizer,
    chatTemplate: flags.chatTemplate,
    skipQuestion: flags.skipQuestion,
    gtData: flags.gtData,
    targetData: flags.targetData,
    similarityModelId: flags.dataEncoder,
    dataset: flags.dataset,
    datasetField: flags.datasetField,
    split: flags.split,
    output: flags.output,
    numSamples: flags.numSamples,
    verbose: flags.verbose,
    device: flags.device,
    deviceConfig: flags.deviceConfig,
    language: flags.language,
    backend,
    cbConfig: flags.cbConfig,
    imageSize: flags.imageSize,
    numInferenceSteps: flags.numInferenceSteps,
    seed: flags.seed,
    maxNewTokens: flags.maxNewTokens,
    topK: flags.topK,
    maxAttempts: flags.maxAttempts,
  };
}

export function resolveRunOptions(flags: CliFlags): RunOptions {
  const file: RunConfigFile = flags.config === undefined ? {} : loadRunConfigFile(flags.config);
  return mergeRunOptions(file, toRunFlags(flags));
}

/**
 * Import a hub module. Its default export, or else its `hub` export, must
 * implement ModelHub.
 */
export async function loadHub(specifier: string): Promise<ModelHub> {
  const url =
    specifier.startsWith('.') || specifier.startsWith('/')
      ? pathToFileURL(resolve(specifier)).href
      : specifier;
  const mod: unknown = await import(url);
  const candidate = isRecord(mod) ? (mod.default ?? mod.hub) : undefined;
  if (!isModelHub(candidate)) {
    throw new ConfigurationError(
      `Module ${specifier} does not export a ModelHub as its default or 'hub' export`,
    );
  }
  return candidate;
}

export async function runFromFlags(flags: CliFlags): Promise<BenchmarkResult> {
  if (flags.logLevel !== undefined) setLogLevel(flags.logLevel);
  const options = resolveRunOptions(flags);
  const hub = await loadHub(flags.hub);
  return runBenchmark(options, hub);
}
