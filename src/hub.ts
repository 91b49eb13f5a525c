/**
 * ModelHub: how a run obtains models, tokenizers, processors and similarity
 * encoders. Inference backends live outside this package and plug in here.
 */

import type { Backend } from './config.js';
import type { Processor, SimilarityScorer, Tokenizer } from './evaluators/similarity.js';
import type { TaskModel } from './generation/models.js';
import { isRecord, TASKS, type Task } from './types.js';

export interface LoadModelOptions {
  device: string;
  /** Path of the backend runtime configuration, if any. */
  deviceConfig: string | null;
  backend: Backend;
  /** Continuous-batching configuration, passed through untouched. */
  cbConfig: Record<string, unknown>;
  /** Square output resolution for image generation; null keeps the pipeline default. */
  imageSize: number | null;
}

/**
 * A loaded model. `release` frees it; a run never holds two models at once.
 */
export interface ModelHandle<M> {
  readonly model: M;
  release(): void | Promise<void>;
}

export type ModelLoaders = {
  [T in Task]: (modelId: string, opts: LoadModelOptions) => Promise<ModelHandle<TaskModel<T>>>;
};

export interface ModelConfig {
  modelType: string;
  /** Vision tower id of llava-qwen style models. */
  visionTower?: string | null;
}

export interface ModelHub {
  /** One loader per task. */
  readonly models: ModelLoaders;
  loadTokenizer(id: string): Promise<Tokenizer>;
  /** Tokenizer for llama.cpp runs, which tokenize differently from the native backend. */
  loadLlamaCppTokenizer(id: string): Promise<Tokenizer>;
  readModelConfig(id: string): Promise<ModelConfig>;
  loadProcessor(id: string): Promise<Processor>;
  /** Encoder-backed scorer; the built-in lexical scorer is used when absent. */
  loadSimilarityScorer?(modelId: string): Promise<SimilarityScorer<string>>;
}

const HUB_METHODS = [
  'loadTokenizer',
  'loadLlamaCppTokenizer',
  'readModelConfig',
  'loadProcessor',
] as const;

/**
 * Structural check for hubs loaded from user modules.
 */
export function isModelHub(value: unknown): value is ModelHub {
  if (!isRecord(value)) return false;
  const models = value.models;
  if (!isRecord(models) || !TASKS.every((task) => typeof models[task] === 'function')) {
    return false;
  }
  if (!HUB_METHODS.every((name) => typeof value[name] === 'function')) return false;
  const scorer = value.loadSimilarityScorer;
  return scorer === undefined || typeof scorer === 'function';
}
