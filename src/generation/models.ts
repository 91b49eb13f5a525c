/**
 * Backend model interfaces consumed by the generation adapters.
 *
 * Model loading and inference live outside this package; a backend only has to
 * expose these shapes.
 */

import type { Image, Task } from '../types.js';

export interface GenAITextGenerationConfig {
  doSample: boolean;
  maxNewTokens: number;
  applyChatTemplate: boolean;
}

/**
 * A text pipeline that returns the generated continuation.
 */
export interface GenAITextModel {
  readonly backend: 'genai';
  generate(prompt: string, config: GenAITextGenerationConfig): Promise<string>;
}

export interface LlamaCppCompletion {
  choices: { text: string }[];
}

export interface LlamaCppChatCompletion {
  choices: { message: { content: string } }[];
}

/**
 * A llama.cpp model. Plain completions echo the prompt when `echo` is set.
 */
export interface LlamaCppModel {
  readonly backend: 'llamacpp';
  complete(
    prompt: string,
    opts: { maxTokens: number; echo: boolean; temperature: number },
  ): Promise<LlamaCppCompletion>;
  createChatCompletion(opts: {
    messages: { role: 'user' | 'assistant' | 'system'; content: string }[];
    maxTokens: number;
    temperature: number;
  }): Promise<LlamaCppChatCompletion>;
}

export type TextModel = GenAITextModel | LlamaCppModel;

/**
 * Deterministic random stream handed to image pipelines.
 */
export interface RandomGenerator {
  readonly seed: number;
  next(): number;
}

export interface ImageGenerationConfig {
  numInferenceSteps: number;
  generator: RandomGenerator | null;
  width?: number;
  height?: number;
  image?: Image;
  maskImage?: Image;
  strength?: number;
}

export interface ImageGenerationModel {
  /** Output resolution as [width, height]; null entries mean the pipeline default. */
  readonly resolution: readonly [number | null, number | null] | null;
  generate(prompt: string, config: ImageGenerationConfig): Promise<{ images: Image[] }>;
}

export interface VisualTextModel {
  generate(
    prompt: string,
    config: { image: Image; doSample: boolean; maxNewTokens: number },
  ): Promise<{ texts: string[] }>;
}

/**
 * The model handle each task drives.
 */
export interface TaskModels {
  text: TextModel;
  'text-to-image': ImageGenerationModel;
  'visual-text': VisualTextModel;
  'image-to-image': ImageGenerationModel;
  'image-inpainting': ImageGenerationModel;
}

export type TaskModel<T extends Task> = TaskModels[T];

/**
 * mulberry32: a small seeded PRNG, enough to make image pipelines reproducible.
 */
export function createGenerator(seed: number): RandomGenerator {
  let state = seed >>> 0;
  return {
    seed,
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}
