export type {
  GenerationFn,
  ImageGenerationFn,
  ImageGenerationParams,
  ImageToImageGenerationFn,
  InpaintingGenerationFn,
  TaskGenerationFns,
  TextGenerationFn,
  TextGenerationParams,
  VisualTextGenerationFn,
  VisualTextGenerationParams,
} from './adapters.js';
export {
  DEFAULT_GENERATION_FNS,
  generateText,
  genaiGenImage,
  genaiGenImageToImage,
  genaiGenInpainting,
  genaiGenText,
  genaiGenVisualText,
  IMAGE_STRENGTH,
  llamaCppGenText,
} from './adapters.js';
export type {
  GenAITextGenerationConfig,
  GenAITextModel,
  ImageGenerationConfig,
  ImageGenerationModel,
  LlamaCppChatCompletion,
  LlamaCppCompletion,
  LlamaCppModel,
  RandomGenerator,
  TaskModel,
  TaskModels,
  TextModel,
  VisualTextModel,
} from './models.js';
export { createGenerator } from './models.js';
