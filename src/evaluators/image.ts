/**
 * Image evaluators: text-to-image, image-to-image and inpainting.
 *
 * Generated images are written to disk and referenced by path; similarity is
 * computed on the decoded images.
 */

import { ConfigurationError } from '../errors.js';
import {
  DEFAULT_GENERATION_FNS,
  type ImageGenerationFn,
  type ImageGenerationParams,
  type ImageToImageGenerationFn,
  type InpaintingGenerationFn,
} from '../generation/adapters.js';
import { createGenerator, type ImageGenerationModel } from '../generation/models.js';
import { defaultPrompts } from '../serialization/prompts.js';
import type { GroundTruthRecord, Image, ImagePrompt, InpaintingPrompt, Task } from '../types.js';
import { ImageArtifacts } from './artifacts.js';
import { type GenerationContext, TaskEvaluator, type TaskEvaluatorOptions } from './evaluator.js';
import { PixelSimilarityScorer, type SimilarityScorer } from './similarity.js';

export const DEFAULT_NUM_INFERENCE_STEPS = 4;
export const DEFAULT_SEED = 42;

type ImageTask = 'text-to-image' | 'image-to-image' | 'image-inpainting';

export interface ImageEvaluatorOptions<T extends ImageTask> extends TaskEvaluatorOptions<T> {
  numInferenceSteps?: number;
  /** Seed of the generator created for every prompt, so base and target see the same noise. */
  seed?: number;
  scorer?: SimilarityScorer<Image> | null;
  /** Directory for images that have no ground truth or output directory to live beside. */
  artifactDir?: string | null;
}

abstract class ImageEvaluator<T extends ImageTask> extends TaskEvaluator<T> {
  readonly numInferenceSteps: number;
  readonly seed: number;
  readonly scorer: SimilarityScorer<Image>;
  protected readonly artifacts: ImageArtifacts;

  constructor(opts: ImageEvaluatorOptions<T>) {
    super(opts);
    this.numInferenceSteps = opts.numInferenceSteps ?? DEFAULT_NUM_INFERENCE_STEPS;
    this.seed = opts.seed ?? DEFAULT_SEED;
    this.scorer = opts.scorer ?? new PixelSimilarityScorer();
    this.artifacts = new ImageArtifacts(this.gtData, opts.artifactDir ?? null);
  }

  protected settings() {
    return {
      ...super.settings(),
      scorer: this.scorer.name,
      numInferenceSteps: this.numInferenceSteps,
      seed: this.seed,
    };
  }
  protected defaultSettings() {
    return {
      ...super.defaultSettings(),
      numInferenceSteps: DEFAULT_NUM_INFERENCE_STEPS,
      seed: DEFAULT_SEED,
    };
  }

  protected generationParams(): ImageGenerationParams {
    return { numInferenceSteps: this.numInferenceSteps, generator: createGenerator(this.seed) };
  }

  protected saveOutput(image: Image, ctx: GenerationContext): Promise<string> {
    return this.artifacts.save(ctx.phase, this.outputDir, `${ctx.phase}_${ctx.index}`, image);
  }

  protected sourceImage(row: GroundTruthRecord, column: 'image' | 'mask'): Promise<Image> {
    const path = row[column];
    if (path === undefined) {
      throw new ConfigurationError(`Ground truth row for '${row.prompt}' has no ${column}`);
    }
    return this.artifacts.load(path);
  }

  protected async similarity(reference: string, candidate: string): Promise<number> {
    const [a, b] = await Promise.all([
      this.artifacts.load(reference),
      this.artifacts.load(candidate),
    ]);
    return this.scorer.compare(a, b);
  }

  async dispose(): Promise<void> {
    await this.artifacts.cleanup();
  }
}

export class Text2ImageEvaluator extends ImageEvaluator<'text-to-image'> {
  readonly task = 'text-to-image';

  protected defaultGenerationFn(): ImageGenerationFn {
    return DEFAULT_GENERATION_FNS['text-to-image'];
  }

  protected defaultPrompts(): string[] {
    return defaultPrompts('text-to-image', 'en');
  }

  protected async generate(
    model: ImageGenerationModel,
    prompt: string,
    fn: ImageGenerationFn,
    ctx: GenerationContext,
  ): Promise<string> {
    const image = await fn(model, prompt, this.generationParams());
    return this.saveOutput(image, ctx);
  }

  protected async describePrompt(prompt: string): Promise<Omit<GroundTruthRecord, 'output'>> {
    return { prompt };
  }

  protected async promptFromGroundTruth(row: GroundTruthRecord): Promise<string> {
    return row.prompt;
  }
}

export class Image2ImageEvaluator extends ImageEvaluator<'image-to-image'> {
  readonly task = 'image-to-image';

  protected defaultGenerationFn(): ImageToImageGenerationFn {
    return DEFAULT_GENERATION_FNS['image-to-image'];
  }

  protected defaultPrompts(): ImagePrompt[] {
    throw new ConfigurationError(`${this.task} has no built-in prompts: provide a dataset`);
  }

  protected async generate(
    model: ImageGenerationModel,
    prompt: ImagePrompt,
    fn: ImageToImageGenerationFn,
    ctx: GenerationContext,
  ): Promise<string> {
    const image = await fn(model, prompt.prompt, prompt.image, this.generationParams());
    return this.saveOutput(image, ctx);
  }

  protected async describePrompt(
    prompt: ImagePrompt,
    index: number,
  ): Promise<Omit<GroundTruthRecord, 'output'>> {
    const image = await this.artifacts.save('reference', null, `source_${index}`, prompt.image);
    return { prompt: prompt.prompt, image };
  }

  protected async promptFromGroundTruth(row: GroundTruthRecord): Promise<ImagePrompt> {
    return { prompt: row.prompt, image: await this.sourceImage(row, 'image') };
  }
}

export class InpaintingEvaluator extends ImageEvaluator<'image-inpainting'> {
  readonly task = 'image-inpainting';

  protected defaultGenerationFn(): InpaintingGenerationFn {
    return DEFAULT_GENERATION_FNS['image-inpainting'];
  }

  protected defaultPrompts(): InpaintingPrompt[] {
    throw new ConfigurationError(`${this.task} has no built-in prompts: provide a dataset`);
  }

  protected async generate(
    model: ImageGenerationModel,
    prompt: InpaintingPrompt,
    fn: InpaintingGenerationFn,
    ctx: GenerationContext,
  ): Promise<string> {
    const params = this.generationParams();
    const image = await fn(model, prompt.prompt, prompt.image, prompt.mask, params);
    return this.saveOutput(image, ctx);
  }

  protected async describePrompt(
    prompt: InpaintingPrompt,
    index: number,
  ): Promise<Omit<GroundTruthRecord, 'output'>> {
    return {
      prompt: prompt.prompt,
      image: await this.artifacts.save('reference', null, `source_${index}`, prompt.image),
      mask: await this.artifacts.save('reference', null, `mask_${index}`, prompt.mask),
    };
  }

  protected async promptFromGroundTruth(row: GroundTruthRecord): Promise<InpaintingPrompt> {
    return {
      prompt: row.prompt,
      image: await this.sourceImage(row, 'image'),
      mask: await this.sourceImage(row, 'mask'),
    };
  }
}

export function isImageTask(task: Task): task is ImageTask {
  return task === 'text-to-image' || task === 'image-to-image' || task === 'image-inpainting';
}
