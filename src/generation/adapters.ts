/**
 * Generation adapters: one function per backend and modality, each normalized to
 * `(model, prompt, [image], [mask], params) -> output`.
 *
 * Sampling is always greedy so that repeated runs over the same inputs agree.
 */

import { FatalBackendError } from '../errors.js';
import type { Image, Task } from '../types.js';
import type {
  GenAITextModel,
  ImageGenerationModel,
  LlamaCppModel,
  RandomGenerator,
  TextModel,
  VisualTextModel,
} from './models.js';

/** How much of the source image the image-to-image and inpainting pipelines may change. */
export const IMAGE_STRENGTH = 0.8;

export interface TextGenerationParams {
  maxNewTokens: number;
  /** Drop the echoed prompt from the start of the output. */
  skipQuestion: boolean;
  useChatTemplate: boolean;
}

export interface ImageGenerationParams {
  numInferenceSteps: number;
  generator: RandomGenerator | null;
}

export interface VisualTextGenerationParams {
  maxNewTokens: number;
}

export type TextGenerationFn = (
  model: TextModel,
  prompt: string,
  params: TextGenerationParams,
) => Promise<string>;

export type ImageGenerationFn = (
  model: ImageGenerationModel,
  prompt: string,
  params: ImageGenerationParams,
) => Promise<Image>;

export type VisualTextGenerationFn = (
  model: VisualTextModel,
  prompt: string,
  image: Image,
  params: VisualTextGenerationParams,
) => Promise<string>;

export type ImageToImageGenerationFn = (
  model: ImageGenerationModel,
  prompt: string,
  image: Image,
  params: ImageGenerationParams,
) => Promise<Image>;

export type InpaintingGenerationFn = (
  model: ImageGenerationModel,
  prompt: string,
  image: Image,
  mask: Image,
  params: ImageGenerationParams,
) => Promise<Image>;

export interface TaskGenerationFns {
  text: TextGenerationFn;
  'text-to-image': ImageGenerationFn;
  'visual-text': VisualTextGenerationFn;
  'image-to-image': ImageToImageGenerationFn;
  'image-inpainting': InpaintingGenerationFn;
}

export type GenerationFn<T extends Task> = TaskGenerationFns[T];

export async function genaiGenText(
  model: GenAITextModel,
  prompt: string,
  params: TextGenerationParams,
): Promise<string> {
  const text = await model.generate(prompt, {
    doSample: false,
    maxNewTokens: params.maxNewTokens,
    applyChatTemplate: params.useChatTemplate,
  });
  return params.skipQuestion ? text.slice(prompt.length) : text;
}

export async function llamaCppGenText(
  model: LlamaCppModel,
  prompt: string,
  params: TextGenerationParams,
): Promise<string> {
  let text: string;
  if (params.useChatTemplate) {
    const output = await model.createChatCompletion({
      messages: [{ role: 'user', content: prompt }],
      maxTokens: params.maxNewTokens,
      temperature: 0,
    });
    text = firstOf(output.choices, 'llama.cpp chat completion').message.content;
  } else {
    const output = await model.complete(prompt, {
      maxTokens: params.maxNewTokens,
      echo: true,
      temperature: 0,
    });
    text = firstOf(output.choices, 'llama.cpp completion').text;
  }
  return params.skipQuestion ? text.slice(prompt.length) : text;
}

/**
 * Default text strategy: dispatch on the backend that produced the model.
 */
export const generateText: TextGenerationFn = (model, prompt, params) => {
  switch (model.backend) {
    case 'genai':
      return genaiGenText(model, prompt, params);
    case 'llamacpp':
      return llamaCppGenText(model, prompt, params);
  }
};

export async function genaiGenImage(
  model: ImageGenerationModel,
  prompt: string,
  params: ImageGenerationParams,
): Promise<Image> {
  const [width, height] = model.resolution ?? [null, null];
  const size = width !== null ? { width, height: height ?? width } : {};
  const result = await model.generate(prompt, {
    ...size,
    numInferenceSteps: params.numInferenceSteps,
    generator: params.generator,
  });
  return firstOf(result.images, 'text-to-image generation');
}

export async function genaiGenImageToImage(
  model: ImageGenerationModel,
  prompt: string,
  image: Image,
  params: ImageGenerationParams,
): Promise<Image> {
  const result = await model.generate(prompt, {
    image,
    numInferenceSteps: params.numInferenceSteps,
    strength: IMAGE_STRENGTH,
    generator: params.generator,
  });
  return firstOf(result.images, 'image-to-image generation');
}

export async function genaiGenInpainting(
  model: ImageGenerationModel,
  prompt: string,
  image: Image,
  mask: Image,
  params: ImageGenerationParams,
): Promise<Image> {
  const result = await model.generate(prompt, {
    image,
    maskImage: mask,
    numInferenceSteps: params.numInferenceSteps,
    strength: IMAGE_STRENGTH,
    generator: params.generator,
  });
  return firstOf(result.images, 'inpainting generation');
}

export async function genaiGenVisualText(
  model: VisualTextModel,
  prompt: string,
  image: Image,
  params: VisualTextGenerationParams,
): Promise<string> {
  const out = await model.generate(prompt, {
    image,
    doSample: false,
    maxNewTokens: params.maxNewTokens,
  });
  return firstOf(out.texts, 'visual-text generation');
}

/**
 * The strategy each task uses when no generation function is injected.
 */
export const DEFAULT_GENERATION_FNS: TaskGenerationFns = {
  text: generateText,
  'text-to-image': genaiGenImage,
  'visual-text': genaiGenVisualText,
  'image-to-image': genaiGenImageToImage,
  'image-inpainting': genaiGenInpainting,
};

function firstOf<T>(items: T[], what: string): T {
  const first = items[0];
  if (first === undefined) {
    throw new FatalBackendError(`${what} returned no output`);
  }
  return first;
}
