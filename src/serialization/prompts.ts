/**
 * Prompt sets: the built-in defaults keyed by language, and local dataset files
 * with named splits.
 *
 * A dataset file is a YAML or JSON object mapping split names to arrays of
 * prompts. Entries are either strings or records; records name the prompt text
 * with the configured field and reference images by path (relative to the file).
 */

import { readFileSync } from 'node:fs';
import { dirname, extname, resolve } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError, PersistenceFormatError } from '../errors.js';
import type { ImagePrompt, InpaintingPrompt } from '../types.js';
import { readImage } from './images.js';
import { type PromptDatasetRow, promptDatasetSchema } from './schema.js';

export const LANGUAGES = ['en', 'cn'] as const;

export type Language = (typeof LANGUAGES)[number];

const defaultPromptsSchema = z.object({
  text: z.object({ en: z.array(z.string()), cn: z.array(z.string()) }),
  'text-to-image': z.object({ en: z.array(z.string()) }),
});

type DefaultPrompts = z.infer<typeof defaultPromptsSchema>;

let defaultPromptsCache: DefaultPrompts | null = null;

function loadDefaultPrompts(): DefaultPrompts {
  if (defaultPromptsCache === null) {
    const url = new URL('../../data/default-prompts.json', import.meta.url);
    defaultPromptsCache = defaultPromptsSchema.parse(JSON.parse(readFileSync(url, 'utf-8')));
  }
  return defaultPromptsCache;
}

/**
 * The built-in prompts for a task. Only text tasks have defaults; text-to-image
 * prompts exist in English only.
 */
export function defaultPrompts(task: 'text' | 'text-to-image', language: Language): string[] {
  const prompts = loadDefaultPrompts();
  if (task === 'text') {
    return [...prompts.text[language]];
  }
  return [...prompts['text-to-image'].en];
}

export interface DatasetSelection {
  /** Split name with an optional slice, e.g. `validation`, `train[:32]`, `test[10:20]`. */
  split: string;
  /** Record field holding the prompt text. */
  field: string;
}

export interface SplitRange {
  name: string;
  start: number | null;
  end: number | null;
}

const SPLIT_PATTERN = /^([^[\]]+?)(?:\[(-?\d+)?:(-?\d+)?\])?$/;

export function parseSplit(split: string): SplitRange {
  const match = SPLIT_PATTERN.exec(split.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid split '${split}', expected e.g. 'train' or 'train[:32]'`);
  }
  const [, name, start, end] = match;
  return {
    name: name ?? split,
    start: start ? Number(start) : null,
    end: end ? Number(end) : null,
  };
}

/**
 * Slice with the semantics of a half-open range where negative bounds count from the end.
 */
export function applySplit<T>(items: readonly T[], range: SplitRange): T[] {
  return items.slice(range.start ?? 0, range.end ?? items.length);
}

/**
 * Load the raw rows of one split of a dataset file.
 */
export function loadDatasetSplit(path: string, split: string): PromptDatasetRow[] {
  const range = parseSplit(split);
  const content = readFileSync(path, 'utf-8');
  const ext = extname(path).toLowerCase();
  let data: z.infer<typeof promptDatasetSchema>;
  try {
    const raw: unknown = ext === '.json' ? JSON.parse(content) : YAML.parse(content);
    data = promptDatasetSchema.parse(raw);
  } catch (e) {
    throw new PersistenceFormatError(path, 'Invalid prompt dataset', { cause: e });
  }

  const rows = data[range.name];
  if (rows === undefined) {
    throw new ConfigurationError(
      `Split '${range.name}' not found in ${path}. Available splits: ${Object.keys(data).join(', ')}`,
    );
  }
  return applySplit(rows, range);
}

export function loadPromptStrings(path: string, selection: DatasetSelection): string[] {
  return loadDatasetSplit(path, selection.split).map((row, i) =>
    promptText(path, row, i, selection.field),
  );
}

export async function loadImagePrompts(
  path: string,
  selection: DatasetSelection,
): Promise<ImagePrompt[]> {
  const base = dirname(path);
  const prompts: ImagePrompt[] = [];
  for (const [i, row] of loadDatasetSplit(path, selection.split).entries()) {
    prompts.push({
      prompt: promptText(path, row, i, selection.field),
      image: await readImage(resolve(base, stringField(path, row, i, 'image'))),
    });
  }
  return prompts;
}

export async function loadInpaintingPrompts(
  path: string,
  selection: DatasetSelection,
): Promise<InpaintingPrompt[]> {
  const base = dirname(path);
  const prompts: InpaintingPrompt[] = [];
  for (const [i, row] of loadDatasetSplit(path, selection.split).entries()) {
    prompts.push({
      prompt: promptText(path, row, i, selection.field),
      image: await readImage(resolve(base, stringField(path, row, i, 'image'))),
      mask: await readImage(resolve(base, stringField(path, row, i, 'mask'))),
    });
  }
  return prompts;
}

function promptText(path: string, row: PromptDatasetRow, index: number, field: string): string {
  if (typeof row === 'string') return row;
  return stringField(path, row, index, field);
}

function stringField(path: string, row: PromptDatasetRow, index: number, field: string): string {
  const value = typeof row === 'string' ? undefined : row[field];
  if (typeof value !== 'string') {
    throw new PersistenceFormatError(path, `Row ${index + 1} has no string field '${field}'`);
  }
  return value;
}
