/**
 * Evaluator: the capability every task variant exposes, and the shared
 * ground-truth → scoring pipeline behind it.
 *
 * Prompts are processed one at a time in prompt-set order, so score records
 * line up with the ground truth row for row.
 */

import { existsSync } from 'node:fs';
import { ConfigurationError } from '../errors.js';
import type { GenerationFn } from '../generation/adapters.js';
import type { TaskModel } from '../generation/models.js';
import { createLogger } from '../logger.js';
import type { RetryExecutor } from '../retry.js';
import { worstExamples } from '../reporting/worst-examples.js';
import { readGroundTruthTable, writeGroundTruthTable } from '../serialization/tables.js';
import type {
  AggregateMetrics,
  GroundTruthRecord,
  ScoreRecord,
  ScoreResult,
  Task,
  TaskPrompts,
} from '../types.js';
import { metricNames } from '../types.js';
import { BaseEvaluator, type SettingValue } from './base.js';

const logger = createLogger('evaluator');

export interface Evaluator<T extends Task = Task> {
  readonly task: T;
  /** The ground truth, once prepared. */
  groundTruth(): GroundTruthRecord[] | null;
  /** Load or generate the ground truth; cached after the first call. */
  prepareGroundTruth(): Promise<GroundTruthRecord[]>;
  /** Write the ground truth table, generating it first if needed. */
  dumpGt(path: string): Promise<void>;
  /**
   * Score the target against the ground truth. A string is the path of a persisted
   * prediction table; a model is run through `generationFn`, or the evaluator's own
   * strategy when it is null.
   */
  score(
    target: TaskModel<T> | string,
    generationFn: GenerationFn<T> | null,
    outputDir?: string | null,
  ): Promise<ScoreResult>;
  getGenerationFn(): GenerationFn<T>;
  /** Write the target predictions of the last `score` call. */
  dumpPredictions(path: string): void;
  /** The `topK` lowest-scoring records of the last `score` call. */
  worstExamples(topK: number, metric?: string): ScoreRecord[];
  /** Remove temporary files written while generating or scoring. */
  dispose(): Promise<void>;
}

export interface TaskEvaluatorOptions<T extends Task> {
  /** Model producing the ground truth. Unused when `gtData` exists on disk. */
  baseModel?: TaskModel<T> | null;
  /** Persisted ground truth table. Loaded when the file exists. */
  gtData?: string | null;
  /** Prompt set; null selects the task's built-in prompts. */
  prompts?: TaskPrompts[T][] | null;
  /** Keep only the first `numSamples` prompts. */
  numSamples?: number | null;
  /** Generation strategy; null selects the task default. */
  generationFn?: GenerationFn<T> | null;
  /** Every generation call goes through this executor when set. */
  executor?: RetryExecutor | null;
}

/**
 * Shared pipeline. Subclasses describe how their prompts are generated from,
 * persisted and compared.
 */
export abstract class TaskEvaluator<T extends Task> extends BaseEvaluator implements Evaluator<T> {
  abstract readonly task: T;

  protected readonly baseModel: TaskModel<T> | null;
  protected readonly gtData: string | null;
  protected readonly prompts: TaskPrompts[T][] | null;
  protected readonly numSamples: number | null;
  private readonly generationFn: GenerationFn<T> | null;
  private readonly executor: RetryExecutor | null;

  private gtRecords: GroundTruthRecord[] | null = null;
  private predictions: GroundTruthRecord[] | null = null;
  private scores: ScoreRecord[] | null = null;
  /** Directory passed to the current `score` call, where artifacts may be written. */
  protected outputDir: string | null = null;

  constructor(opts: TaskEvaluatorOptions<T>) {
    super();
    const numSamples = opts.numSamples ?? null;
    if (numSamples !== null && (!Number.isInteger(numSamples) || numSamples < 1)) {
      throw new ConfigurationError(`numSamples must be a positive integer, got ${numSamples}`);
    }
    this.baseModel = opts.baseModel ?? null;
    this.gtData = opts.gtData ?? null;
    this.prompts = opts.prompts ?? null;
    this.numSamples = numSamples;
    this.generationFn = opts.generationFn ?? null;
    this.executor = opts.executor ?? null;
  }

  /** The strategy used when none is injected. */
  protected abstract defaultGenerationFn(): GenerationFn<T>;

  /** Built-in prompts, for tasks that have them. */
  protected abstract defaultPrompts(): TaskPrompts[T][];

  /**
   * Run `fn` on one prompt and return the persisted form of the output
   * (the text, or the path of the written image).
   */
  protected abstract generate(
    model: TaskModel<T>,
    prompt: TaskPrompts[T],
    fn: GenerationFn<T>,
    ctx: GenerationContext,
  ): Promise<string>;

  /** Ground-truth row for a prompt, without its output. */
  protected abstract describePrompt(
    prompt: TaskPrompts[T],
    index: number,
  ): Promise<Omit<GroundTruthRecord, 'output'>>;

  /** Rebuild a prompt record from a ground-truth row. */
  protected abstract promptFromGroundTruth(row: GroundTruthRecord): Promise<TaskPrompts[T]>;

  /** Score one candidate against its reference, both in persisted form. */
  protected abstract similarity(reference: string, candidate: string): Promise<number>;

  groundTruth(): GroundTruthRecord[] | null {
    return this.gtRecords;
  }

  getGenerationFn(): GenerationFn<T> {
    return this.generationFn ?? this.defaultGenerationFn();
  }

  protected settings(): Record<string, SettingValue> {
    return {
      gtData: this.gtData,
      numSamples: this.numSamples,
      prompts: this.prompts === null ? 'default' : `${this.prompts.length} prompts`,
    };
  }

  protected defaultSettings(): Record<string, SettingValue> {
    return { gtData: null, numSamples: null, prompts: 'default' };
  }

  /**
   * The prompt set after truncation to `numSamples`.
   */
  promptSet(): TaskPrompts[T][] {
    const prompts = this.prompts ?? this.defaultPrompts();
    return this.numSamples === null ? [...prompts] : prompts.slice(0, this.numSamples);
  }

  async prepareGroundTruth(): Promise<GroundTruthRecord[]> {
    if (this.gtRecords !== null) {
      return this.gtRecords;
    }

    if (this.gtData !== null && existsSync(this.gtData)) {
      const rows = readGroundTruthTable(this.gtData);
      this.gtRecords = this.numSamples === null ? rows : rows.slice(0, this.numSamples);
      logger.info('Loaded ground truth', { path: this.gtData, rows: this.gtRecords.length });
      return this.gtRecords;
    }

    if (this.baseModel === null) {
      throw new ConfigurationError(
        'Either a base model or an existing ground truth table is required to obtain ground truth',
      );
    }

    const fn = this.getGenerationFn();
    const rows: GroundTruthRecord[] = [];
    for (const [index, prompt] of this.promptSet().entries()) {
      const ctx: GenerationContext = { index, phase: 'reference' };
      const output = await this.produce(this.baseModel, prompt, fn, ctx);
      rows.push({ ...(await this.describePrompt(prompt, index)), output });
    }
    logger.info('Generated ground truth', { rows: rows.length });
    this.gtRecords = rows;
    return rows;
  }

  async dumpGt(path: string): Promise<void> {
    const rows = await this.prepareGroundTruth();
    writeGroundTruthTable(path, rows);
    logger.info('Saved ground truth', { path });
  }

  async score(
    target: TaskModel<T> | string,
    generationFn: GenerationFn<T> | null,
    outputDir: string | null = null,
  ): Promise<ScoreResult> {
    const groundTruth = await this.prepareGroundTruth();
    this.outputDir = outputDir;

    let outputs: string[];
    if (typeof target === 'string') {
      outputs = this.loadPredictions(target, groundTruth);
    } else {
      const fn = generationFn ?? this.getGenerationFn();
      outputs = [];
      for (const [index, row] of groundTruth.entries()) {
        const prompt = await this.promptFromGroundTruth(row);
        outputs.push(await this.produce(target, prompt, fn, { index, phase: 'target' }));
      }
    }

    const predictions: GroundTruthRecord[] = [];
    const perExample: ScoreRecord[] = [];
    for (const [i, row] of groundTruth.entries()) {
      const output = outputs[i] ?? '';
      predictions.push({ ...row, output });
      perExample.push({
        prompt: row.prompt,
        source_model: row.output,
        optimized_model: output,
        similarity: await this.similarity(row.output, output),
      });
    }

    this.predictions = predictions;
    this.scores = perExample;
    return { perExample, aggregate: averageMetrics(perExample) };
  }

  dumpPredictions(path: string): void {
    if (this.predictions === null) {
      throw new Error('No predictions to save: call score() first');
    }
    writeGroundTruthTable(path, this.predictions);
  }

  worstExamples(topK: number, metric?: string): ScoreRecord[] {
    if (this.scores === null) {
      throw new Error('No scores available: call score() first');
    }
    return worstExamples(this.scores, topK, metric);
  }

  async dispose(): Promise<void> {}

  private produce(
    model: TaskModel<T>,
    prompt: TaskPrompts[T],
    fn: GenerationFn<T>,
    ctx: GenerationContext,
  ): Promise<string> {
    const run = () => this.generate(model, prompt, fn, ctx);
    return this.executor === null ? run() : this.executor.execute(run);
  }

  private loadPredictions(path: string, groundTruth: GroundTruthRecord[]): string[] {
    const rows = readGroundTruthTable(path);
    if (rows.length < groundTruth.length) {
      throw new ConfigurationError(
        `Prediction table ${path} has ${rows.length} rows, expected ${groundTruth.length}`,
      );
    }
    return groundTruth.map((row, i) => {
      const prediction = rows[i];
      if (prediction === undefined || prediction.prompt !== row.prompt) {
        throw new ConfigurationError(
          `Prediction table ${path} row ${i + 1} does not match the ground truth prompt`,
        );
      }
      return prediction.output;
    });
  }
}

export interface GenerationContext {
  index: number;
  phase: 'reference' | 'target';
}

/**
 * Column-wise mean of every numeric column.
 */
export function averageMetrics(records: readonly ScoreRecord[]): AggregateMetrics {
  const first = records[0];
  if (first === undefined) return {};

  const sums: Record<string, number> = {};
  const counts: Record<string, number> = {};
  for (const name of metricNames(first)) {
    for (const record of records) {
      const value = record[name];
      if (typeof value === 'number') {
        sums[name] = (sums[name] ?? 0) + value;
        counts[name] = (counts[name] ?? 0) + 1;
      }
    }
  }

  const result: AggregateMetrics = {};
  for (const [name, sum] of Object.entries(sums)) {
    result[name] = sum / (counts[name] ?? 1);
  }
  return result;
}
