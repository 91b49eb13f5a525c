/**
 * Task → evaluator dispatch.
 *
 * Each task carries its own configuration type; `createEvaluator` is an
 * exhaustive switch over the `task` tag, so adding a task without a variant
 * fails to compile.
 */

import { ConfigurationError } from '../errors.js';
import { TASKS, type Task } from '../types.js';
import type { Evaluator } from './evaluator.js';
import {
  Image2ImageEvaluator,
  type ImageEvaluatorOptions,
  InpaintingEvaluator,
  Text2ImageEvaluator,
} from './image.js';
import {
  TextEvaluator,
  type TextEvaluatorOptions,
  VisualTextEvaluator,
  type VisualTextEvaluatorOptions,
} from './text.js';

export type EvaluatorConfig =
  | ({ task: 'text' } & TextEvaluatorOptions)
  | ({ task: 'visual-text' } & VisualTextEvaluatorOptions)
  | ({ task: 'text-to-image' } & ImageEvaluatorOptions<'text-to-image'>)
  | ({ task: 'image-to-image' } & ImageEvaluatorOptions<'image-to-image'>)
  | ({ task: 'image-inpainting' } & ImageEvaluatorOptions<'image-inpainting'>);

export type EvaluatorConfigFor<T extends Task> = Extract<EvaluatorConfig, { task: T }>;

/**
 * One evaluator per task, as a union so callers can still tell tasks apart.
 */
export type AnyEvaluator = { [T in Task]: Evaluator<T> }[Task];

export const EVALUATOR_REGISTRY = {
  text: TextEvaluator,
  'visual-text': VisualTextEvaluator,
  'text-to-image': Text2ImageEvaluator,
  'image-to-image': Image2ImageEvaluator,
  'image-inpainting': InpaintingEvaluator,
} as const satisfies Record<Task, unknown>;

export function isTask(value: string): value is Task {
  return TASKS.some((task) => task === value);
}

export function parseTask(value: string): Task {
  if (!isTask(value)) {
    throw new ConfigurationError(
      `Unsupported task '${value}'. Supported tasks: ${TASKS.join(', ')}`,
    );
  }
  return value;
}

export function createEvaluator(config: EvaluatorConfig): AnyEvaluator {
  switch (config.task) {
    case 'text':
      return new TextEvaluator(config);
    case 'visual-text':
      return new VisualTextEvaluator(config);
    case 'text-to-image':
      return new Text2ImageEvaluator(config);
    case 'image-to-image':
      return new Image2ImageEvaluator(config);
    case 'image-inpainting':
      return new InpaintingEvaluator(config);
    default: {
      const unreachable: never = config;
      throw new ConfigurationError(`Unsupported task in ${JSON.stringify(unreachable)}`);
    }
  }
}
