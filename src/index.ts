/**
 * divergence-bench: measure how far a compressed or quantized model drifts from
 * its base model on text, image and visual-language tasks.
 *
 * @example
 * ```ts
 * import { parseRunOptions, runBenchmark } from 'divergence-bench';
 *
 * const options = parseRunOptions({
 *   task: 'text',
 *   baseModel: 'org/base-model',
 *   targetModel: 'org/base-model-int4',
 *   numSamples: 16,
 *   output: 'results',
 * });
 * const { aggregate } = await runBenchmark(options, hub);
 * console.log(aggregate?.similarity);
 * ```
 */

export type { Backend, RunConfigFile, RunOptions, RunOptionsInput } from './config.js';
// Configuration
export {
  BACKENDS,
  DEFAULT_SIMILARITY_MODEL,
  DEFAULT_SPLIT,
  loadRunConfigFile,
  mergeRunOptions,
  parseRunOptions,
  readCbConfig,
  runOptionsSchema,
} from './config.js';
export type { TransientErrorKind } from './errors.js';
// Errors
export {
  ConfigurationError,
  FatalBackendError,
  PersistenceFormatError,
  SubprocessError,
  TRANSIENT_ERROR_KINDS,
  TransientBackendError,
  toError,
} from './errors.js';
// Evaluators
export * from './evaluators/index.js';
// Generation
export * from './generation/index.js';
export type { LoadModelOptions, ModelConfig, ModelHandle, ModelHub, ModelLoaders } from './hub.js';
export { isModelHub } from './hub.js';
export type { Logger, LogLevel, LogMeta } from './logger.js';
export { createLogger, getLogLevel, setLogLevel } from './logger.js';
export type { BenchmarkResult, RunDependencies } from './orchestrator.js';
// Orchestration
export {
  METRICS_FILE,
  METRICS_PER_QUESTION_FILE,
  resolveProcessor,
  resolveTokenizer,
  runBenchmark,
  TARGET_FILE,
  validateRunOptions,
} from './orchestrator.js';
// Reporting
export * from './reporting/index.js';
export type { RetryExecutorOptions, RetryPolicy } from './retry.js';
// Retry
export {
  classifyError,
  classifySubprocessOutput,
  DEFAULT_MAX_ATTEMPTS,
  exponentialBackoff,
  isTransientError,
  NETWORK_ERROR_PATTERNS,
  RetryExecutor,
  retrying,
  retryRequest,
} from './retry.js';
// Persistence
export * from './serialization/index.js';
export type {
  AggregateMetrics,
  GroundTruthRecord,
  Image,
  ImagePrompt,
  InpaintingPrompt,
  PromptRecord,
  ScoreRecord,
  ScoreResult,
  Task,
  TaskPrompts,
} from './types.js';
export { isRecord, metricNames, TASKS } from './types.js';
