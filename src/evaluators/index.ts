export type { ArtifactPhase } from './artifacts.js';
export { ImageArtifacts } from './artifacts.js';
export type { SettingValue } from './base.js';
export { BaseEvaluator } from './base.js';
export type { Evaluator, GenerationContext, TaskEvaluatorOptions } from './evaluator.js';
export { averageMetrics, TaskEvaluator } from './evaluator.js';
export type { ImageEvaluatorOptions } from './image.js';
export {
  DEFAULT_NUM_INFERENCE_STEPS,
  DEFAULT_SEED,
  Image2ImageEvaluator,
  InpaintingEvaluator,
  isImageTask,
  Text2ImageEvaluator,
} from './image.js';
export type { AnyEvaluator, EvaluatorConfig, EvaluatorConfigFor } from './registry.js';
export { createEvaluator, EVALUATOR_REGISTRY, isTask, parseTask } from './registry.js';
export type { Processor, SimilarityScorer, Tokenizer } from './similarity.js';
export { PixelSimilarityScorer, splitWords, TokenOverlapScorer } from './similarity.js';
export type { TextEvaluatorOptions, VisualTextEvaluatorOptions } from './text.js';
export { DEFAULT_MAX_NEW_TOKENS, TextEvaluator, VisualTextEvaluator } from './text.js';
