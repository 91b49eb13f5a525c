/**
 * End-to-end benchmark run: resolve inputs, obtain the ground truth, score the
 * target and report.
 *
 * Only one model is resident at a time: the base model is released before the
 * target model is loaded.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { DEFAULT_SPLIT, readCbConfig, type RunOptions } from './config.js';
import { ConfigurationError } from './errors.js';
import type { Evaluator } from './evaluators/evaluator.js';
import { isImageTask } from './evaluators/image.js';
import { type AnyEvaluator, createEvaluator, type EvaluatorConfig } from './evaluators/registry.js';
import {
  type Processor,
  type SimilarityScorer,
  type Tokenizer,
  TokenOverlapScorer,
} from './evaluators/similarity.js';
import type { TaskModel } from './generation/models.js';
import type { LoadModelOptions, ModelHandle, ModelHub } from './hub.js';
import { createLogger } from './logger.js';
import { renderImageResults, renderMetricsTable, renderTextResults } from './reporting/renderer.js';
import { DEFAULT_METRIC } from './reporting/worst-examples.js';
import { RetryExecutor, retrying } from './retry.js';
import {
  type DatasetSelection,
  loadImagePrompts,
  loadInpaintingPrompts,
  loadPromptStrings,
} from './serialization/prompts.js';
import { writeScoreTable, writeTable } from './serialization/tables.js';
import type { AggregateMetrics, ScoreRecord, Task } from './types.js';

const logger = createLogger('orchestrator');

export const METRICS_PER_QUESTION_FILE = 'metrics_per_question.csv';
export const METRICS_FILE = 'metrics.csv';
export const TARGET_FILE = 'target.csv';

export interface RunDependencies {
  /** Executor for model loading and generation; built from `maxAttempts` when absent. */
  executor?: RetryExecutor;
  /** Sink for the verbose report and metrics table. Defaults to `console.log`. */
  print?: (text: string) => void;
}

/**
 * Images written to a temporary directory, when neither `output` nor `gtData`
 * gives them a place, are removed before `runBenchmark` returns.
 */
export interface BenchmarkResult {
  evaluator: AnyEvaluator;
  /** Null when no target was given. */
  perExample: ScoreRecord[] | null;
  aggregate: AggregateMetrics | null;
}

export function validateRunOptions(options: RunOptions): void {
  if (options.baseModel === undefined && options.gtData === undefined) {
    throw new ConfigurationError('Either baseModel or gtData must be provided');
  }
  if (
    options.targetData !== undefined &&
    options.targetModel === undefined &&
    options.gtData === undefined
  ) {
    throw new ConfigurationError('Either targetModel, targetData or gtData must be provided');
  }
}

export async function runBenchmark(
  options: RunOptions,
  hub: ModelHub,
  deps?: RunDependencies,
): Promise<BenchmarkResult> {
  validateRunOptions(options);
  const executor = deps?.executor ?? new RetryExecutor({ maxAttempts: options.maxAttempts });
  const print = deps?.print ?? ((text: string) => console.log(text));

  const loadOptions: LoadModelOptions = {
    device: options.device,
    deviceConfig: options.deviceConfig ?? null,
    backend: options.backend,
    cbConfig: options.cbConfig === undefined ? {} : readCbConfig(options.cbConfig),
    imageSize: options.imageSize ?? null,
  };

  const gtExists = options.gtData !== undefined && existsSync(options.gtData);
  let baseHandle: ModelHandle<unknown> | null = null;
  const loadBase = async <T extends Task>(task: T): Promise<TaskModel<T> | null> => {
    if (gtExists) {
      logger.info('Using existing ground truth', { path: options.gtData });
      return null;
    }
    if (options.baseModel === undefined) {
      throw new ConfigurationError(
        `Ground truth ${options.gtData} does not exist and no baseModel was given to generate it`,
      );
    }
    const handle = await loadModel(hub, task, options.baseModel, loadOptions, executor);
    baseHandle = handle;
    return handle.model;
  };

  const config = await resolveEvaluatorConfig(options, hub, executor, loadBase);
  const evaluator = createEvaluator(config);
  logger.info('Created evaluator', { evaluator: evaluator.toString() });

  try {
    try {
      if (!gtExists && options.gtData !== undefined) {
        await evaluator.dumpGt(options.gtData);
      }
      if (!gtExists) {
        await evaluator.prepareGroundTruth();
      }
    } finally {
      await releaseModel(baseHandle, 'base');
    }

    if (options.targetData === undefined && options.targetModel === undefined) {
      return { evaluator, perExample: null, aggregate: null };
    }

    const scored = await scoreTarget(evaluator, options, hub, loadOptions, executor);
    const { perExample, aggregate } = scored;
    const targetName = options.targetModel ?? options.targetData;
    logger.info(`Metrics for model: ${targetName}`, aggregate);
    print(renderMetricsTable(aggregate, targetName));

    if (options.output !== undefined) {
      writeOutputs(evaluator, options.output, perExample, aggregate);
    }
    if (options.verbose) {
      printWorstExamples(evaluator, options.topK, print);
    }
    return { evaluator, perExample, aggregate };
  } finally {
    await evaluator.dispose();
  }
}

/**
 * Build the evaluator configuration for the selected task. The base model is
 * only loaded when the ground truth has to be generated.
 */
async function resolveEvaluatorConfig(
  options: RunOptions,
  hub: ModelHub,
  executor: RetryExecutor,
  loadBase: <T extends Task>(task: T) => Promise<TaskModel<T> | null>,
): Promise<EvaluatorConfig> {
  const common = {
    gtData: options.gtData ?? null,
    numSamples: options.numSamples ?? null,
    executor,
  };
  const artifactDir = options.output ?? null;
  const selection: DatasetSelection = {
    split: options.split ?? DEFAULT_SPLIT,
    field: options.datasetField,
  };
  const dataset = options.dataset;
  const imageOptions = {
    numInferenceSteps: options.numInferenceSteps,
    seed: options.seed,
    artifactDir,
  };

  switch (options.task) {
    case 'text': {
      const tokenizer = await resolveTokenizer(options, hub, executor);
      return {
        task: 'text',
        ...common,
        prompts: dataset === undefined ? null : loadPromptStrings(dataset, selection),
        tokenizer,
        scorer: await resolveScorer(options, hub, tokenizer),
        language: options.language,
        maxNewTokens: options.maxNewTokens,
        skipQuestion: options.skipQuestion,
        useChatTemplate: options.chatTemplate,
        baseModel: await loadBase('text'),
      };
    }
    case 'visual-text': {
      const tokenizer = await resolveTokenizer(options, hub, executor);
      const processor = await resolveProcessor(options, hub, executor);
      return {
        task: 'visual-text',
        ...common,
        prompts: dataset === undefined ? null : await loadImagePrompts(dataset, selection),
        tokenizer,
        processor,
        artifactDir,
        scorer: await resolveScorer(options, hub, tokenizer ?? processor?.tokenizer ?? null),
        maxNewTokens: options.maxNewTokens,
        baseModel: await loadBase('visual-text'),
      };
    }
    case 'text-to-image':
      return {
        task: 'text-to-image',
        ...common,
        ...imageOptions,
        prompts: dataset === undefined ? null : loadPromptStrings(dataset, selection),
        baseModel: await loadBase('text-to-image'),
      };
    case 'image-to-image':
      return {
        task: 'image-to-image',
        ...common,
        ...imageOptions,
        prompts: dataset === undefined ? null : await loadImagePrompts(dataset, selection),
        baseModel: await loadBase('image-to-image'),
      };
    case 'image-inpainting':
      return {
        task: 'image-inpainting',
        ...common,
        ...imageOptions,
        prompts: dataset === undefined ? null : await loadInpaintingPrompts(dataset, selection),
        baseModel: await loadBase('image-inpainting'),
      };
  }
}

/**
 * Explicit tokenizer first, then the base model's, then the target model's.
 * Text runs on llama.cpp without an explicit tokenizer use none.
 */
export async function resolveTokenizer(
  options: RunOptions,
  hub: ModelHub,
  executor: RetryExecutor,
): Promise<Tokenizer | null> {
  const llamacpp = options.backend === 'llamacpp';
  if (options.tokenizer !== undefined) {
    const id = options.tokenizer;
    return executor.execute(() =>
      llamacpp ? hub.loadLlamaCppTokenizer(id) : hub.loadTokenizer(id),
    );
  }
  if (llamacpp && options.task === 'text') return null;
  const id = options.baseModel ?? options.targetModel;
  if (id === undefined) return null;
  return retrying((modelId: string) => hub.loadTokenizer(modelId), executor)(id);
}

/**
 * llava-qwen models keep their preprocessing with the vision tower.
 */
export async function resolveProcessor(
  options: RunOptions,
  hub: ModelHub,
  executor: RetryExecutor,
): Promise<Processor | null> {
  const modelId = options.baseModel ?? options.targetModel;
  if (modelId === undefined) return null;

  const config = await executor.execute(() => hub.readModelConfig(modelId));
  let processorId = modelId;
  if (config.modelType.includes('llava-qwen')) {
    if (!config.visionTower) {
      throw new ConfigurationError(
        `Model ${modelId} of type ${config.modelType} has no vision tower`,
      );
    }
    processorId = config.visionTower;
  }
  return executor.execute(() => hub.loadProcessor(processorId));
}

async function resolveScorer(
  options: RunOptions,
  hub: ModelHub,
  tokenizer: Tokenizer | null,
): Promise<SimilarityScorer<string>> {
  if (hub.loadSimilarityScorer === undefined) {
    logger.debug('No similarity encoder available, using token overlap', {
      similarityModelId: options.similarityModelId,
    });
    return new TokenOverlapScorer(tokenizer);
  }
  return hub.loadSimilarityScorer(options.similarityModelId);
}

function scoreTarget(
  evaluator: AnyEvaluator,
  options: RunOptions,
  hub: ModelHub,
  loadOptions: LoadModelOptions,
  executor: RetryExecutor,
) {
  switch (evaluator.task) {
    case 'text':
      return scoreWith(evaluator, options, hub, loadOptions, executor);
    case 'visual-text':
      return scoreWith(evaluator, options, hub, loadOptions, executor);
    case 'text-to-image':
      return scoreWith(evaluator, options, hub, loadOptions, executor);
    case 'image-to-image':
      return scoreWith(evaluator, options, hub, loadOptions, executor);
    case 'image-inpainting':
      return scoreWith(evaluator, options, hub, loadOptions, executor);
  }
}

/**
 * Score from the persisted target table when it exists, else from the target model.
 */
async function scoreWith<T extends Task>(
  evaluator: Evaluator<T>,
  options: RunOptions,
  hub: ModelHub,
  loadOptions: LoadModelOptions,
  executor: RetryExecutor,
) {
  if (options.targetData !== undefined && existsSync(options.targetData)) {
    logger.info('Scoring existing predictions', { path: options.targetData });
    return evaluator.score(options.targetData, null, options.output ?? null);
  }
  if (options.targetModel === undefined) {
    throw new ConfigurationError(
      `Target data ${options.targetData} does not exist and no targetModel was given`,
    );
  }

  const handle = await loadModel(hub, evaluator.task, options.targetModel, loadOptions, executor);
  try {
    const generationFn = options.backend === 'native' ? null : evaluator.getGenerationFn();
    return await evaluator.score(handle.model, generationFn, options.output ?? null);
  } finally {
    await releaseModel(handle, 'target');
  }
}

function loadModel<T extends Task>(
  hub: ModelHub,
  task: T,
  modelId: string,
  opts: LoadModelOptions,
  executor: RetryExecutor,
): Promise<ModelHandle<TaskModel<T>>> {
  logger.info('Loading model', { task, modelId, device: opts.device, backend: opts.backend });
  const load = hub.models[task];
  return executor.execute(() => load(modelId, opts));
}

async function releaseModel(handle: ModelHandle<unknown> | null, role: string): Promise<void> {
  if (handle === null) return;
  await handle.release();
  logger.debug('Released model', { role });
}

function writeOutputs(
  evaluator: AnyEvaluator,
  outputDir: string,
  perExample: ScoreRecord[],
  aggregate: AggregateMetrics,
): void {
  mkdirSync(outputDir, { recursive: true });
  writeScoreTable(join(outputDir, METRICS_PER_QUESTION_FILE), perExample);
  writeTable(join(outputDir, METRICS_FILE), [aggregate]);
  evaluator.dumpPredictions(join(outputDir, TARGET_FILE));
  logger.info('Saved results', { output: outputDir });
}

function printWorstExamples(
  evaluator: AnyEvaluator,
  topK: number,
  print: (text: string) => void,
): void {
  const examples = evaluator.worstExamples(topK, DEFAULT_METRIC);
  if (examples.length === 0) return;
  print(
    isImageTask(evaluator.task)
      ? renderImageResults(examples)
      : renderTextResults(examples, { metric: DEFAULT_METRIC }),
  );
}
