/**
 * Text and visual-text evaluators: answers are compared lexically unless a
 * similarity scorer is injected.
 */

import { ConfigurationError } from '../errors.js';
import {
  DEFAULT_GENERATION_FNS,
  type TextGenerationFn,
  type VisualTextGenerationFn,
} from '../generation/adapters.js';
import type { TextModel, VisualTextModel } from '../generation/models.js';
import { defaultPrompts, type Language } from '../serialization/prompts.js';
import type { GroundTruthRecord, ImagePrompt } from '../types.js';
import { ImageArtifacts } from './artifacts.js';
import { type GenerationContext, TaskEvaluator, type TaskEvaluatorOptions } from './evaluator.js';
import {
  type Processor,
  type SimilarityScorer,
  type Tokenizer,
  TokenOverlapScorer,
} from './similarity.js';

export const DEFAULT_MAX_NEW_TOKENS = 128;

export interface TextEvaluatorOptions extends TaskEvaluatorOptions<'text'> {
  tokenizer?: Tokenizer | null;
  /** Scorer for answers; defaults to token F1 using `tokenizer`. */
  scorer?: SimilarityScorer<string> | null;
  /** Selects the built-in prompts. */
  language?: Language;
  maxNewTokens?: number;
  skipQuestion?: boolean;
  useChatTemplate?: boolean;
}

export class TextEvaluator extends TaskEvaluator<'text'> {
  readonly task = 'text';
  readonly tokenizer: Tokenizer | null;
  readonly scorer: SimilarityScorer<string>;
  readonly language: Language;
  readonly maxNewTokens: number;
  readonly skipQuestion: boolean;
  readonly useChatTemplate: boolean;

  constructor(opts: TextEvaluatorOptions) {
    super(opts);
    this.tokenizer = opts.tokenizer ?? null;
    this.scorer = opts.scorer ?? new TokenOverlapScorer(this.tokenizer);
    this.language = opts.language ?? 'en';
    this.maxNewTokens = opts.maxNewTokens ?? DEFAULT_MAX_NEW_TOKENS;
    this.skipQuestion = opts.skipQuestion ?? false;
    this.useChatTemplate = opts.useChatTemplate ?? false;
  }

  protected settings() {
    return {
      ...super.settings(),
      scorer: this.scorer.name,
      tokenizer: this.tokenizer?.name ?? null,
      language: this.language,
      maxNewTokens: this.maxNewTokens,
      skipQuestion: this.skipQuestion,
      useChatTemplate: this.useChatTemplate,
    };
  }
  protected defaultSettings() {
    return {
      ...super.defaultSettings(),
      tokenizer: null,
      language: 'en',
      maxNewTokens: DEFAULT_MAX_NEW_TOKENS,
      skipQuestion: false,
      useChatTemplate: false,
    };
  }

  protected defaultGenerationFn(): TextGenerationFn {
    return DEFAULT_GENERATION_FNS.text;
  }

  protected defaultPrompts(): string[] {
    return defaultPrompts('text', this.language);
  }

  protected generate(
    model: TextModel,
    prompt: string,
    fn: TextGenerationFn,
    _ctx: GenerationContext,
  ): Promise<string> {
    return fn(model, prompt, {
      maxNewTokens: this.maxNewTokens,
      skipQuestion: this.skipQuestion,
      useChatTemplate: this.useChatTemplate,
    });
  }

  protected async describePrompt(prompt: string): Promise<Omit<GroundTruthRecord, 'output'>> {
    return { prompt };
  }

  protected async promptFromGroundTruth(row: GroundTruthRecord): Promise<string> {
    return row.prompt;
  }

  protected async similarity(reference: string, candidate: string): Promise<number> {
    return this.scorer.compare(reference, candidate);
  }
}

export interface VisualTextEvaluatorOptions extends TaskEvaluatorOptions<'visual-text'> {
  tokenizer?: Tokenizer | null;
  processor?: Processor | null;
  /** Scorer for answers; defaults to token F1 using the tokenizer, else the processor's. */
  scorer?: SimilarityScorer<string> | null;
  maxNewTokens?: number;
  /** Directory for source images when there is no ground truth table to put them beside. */
  artifactDir?: string | null;
}

/**
 * Evaluates visual-language models. Each prompt carries an image, persisted by
 * path in the ground truth `image` column.
 */
export class VisualTextEvaluator extends TaskEvaluator<'visual-text'> {
  readonly task = 'visual-text';
  readonly tokenizer: Tokenizer | null;
  readonly processor: Processor | null;
  readonly scorer: SimilarityScorer<string>;
  readonly maxNewTokens: number;
  private readonly artifacts: ImageArtifacts;

  constructor(opts: VisualTextEvaluatorOptions) {
    super(opts);
    this.tokenizer = opts.tokenizer ?? null;
    this.processor = opts.processor ?? null;
    this.scorer =
      opts.scorer ?? new TokenOverlapScorer(this.tokenizer ?? this.processor?.tokenizer ?? null);
    this.maxNewTokens = opts.maxNewTokens ?? DEFAULT_MAX_NEW_TOKENS;
    this.artifacts = new ImageArtifacts(this.gtData, opts.artifactDir ?? null);
  }

  protected settings() {
    return {
      ...super.settings(),
      scorer: this.scorer.name,
      processor: this.processor?.name ?? null,
      maxNewTokens: this.maxNewTokens,
    };
  }
  protected defaultSettings() {
    return { ...super.defaultSettings(), processor: null, maxNewTokens: DEFAULT_MAX_NEW_TOKENS };
  }

  protected defaultGenerationFn(): VisualTextGenerationFn {
    return DEFAULT_GENERATION_FNS['visual-text'];
  }

  protected defaultPrompts(): ImagePrompt[] {
    throw new ConfigurationError('visual-text has no built-in prompts: provide a dataset');
  }

  protected generate(
    model: VisualTextModel,
    prompt: ImagePrompt,
    fn: VisualTextGenerationFn,
    _ctx: GenerationContext,
  ): Promise<string> {
    return fn(model, prompt.prompt, prompt.image, { maxNewTokens: this.maxNewTokens });
  }

  protected async describePrompt(
    prompt: ImagePrompt,
    index: number,
  ): Promise<Omit<GroundTruthRecord, 'output'>> {
    const image = await this.artifacts.save('reference', null, `source_${index}`, prompt.image);
    return { prompt: prompt.prompt, image };
  }

  protected async promptFromGroundTruth(row: GroundTruthRecord): Promise<ImagePrompt> {
    if (row.image === undefined) {
      throw new ConfigurationError(`Ground truth row for '${row.prompt}' has no image`);
    }
    return { prompt: row.prompt, image: await this.artifacts.load(row.image) };
  }

  protected async similarity(reference: string, candidate: string): Promise<number> {
    return this.scorer.compare(reference, candidate);
  }

  async dispose(): Promise<void> {
    await this.artifacts.cleanup();
  }
}
