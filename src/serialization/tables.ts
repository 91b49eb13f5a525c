/**
 * CSV/JSON/YAML loading and saving for ground-truth, prediction and metric tables.
 *
 * Column order and row order survive a write/read round trip.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname } from 'node:path';
import YAML from 'yaml';
import { ZodError } from 'zod';
import { PersistenceFormatError, toError } from '../errors.js';
import type { GroundTruthRecord, ScoreRecord } from '../types.js';
import { parseCsv, stringifyCsv } from './csv.js';
import { groundTruthRowSchema, scoreRowSchema, tableSchema } from './schema.js';

export type TableFormat = 'csv' | 'json' | 'yaml';

export type TableCell = string | number;

export type TableRow = Record<string, TableCell>;

export interface TableOptions {
  /** File format. If not specified, inferred from file extension. */
  fmt?: TableFormat;
}

/**
 * Save rows to a file. Columns default to the keys of all rows in first-seen order.
 */
export function writeTable(
  path: string,
  rows: readonly TableRow[],
  opts?: TableOptions & { columns?: string[] },
): void {
  const fmt = opts?.fmt ?? inferTableFormat(path);
  const columns = opts?.columns ?? collectColumns(rows);
  const ordered = rows.map((row) => {
    const out: TableRow = {};
    for (const col of columns) {
      const value = row[col];
      if (value !== undefined) out[col] = value;
    }
    return out;
  });

  mkdirSync(dirname(path), { recursive: true });
  if (fmt === 'csv') {
    writeFileSync(path, stringifyCsv(columns, ordered), 'utf-8');
  } else if (fmt === 'yaml') {
    writeFileSync(path, YAML.stringify(ordered, { sortMapEntries: false }), 'utf-8');
  } else {
    writeFileSync(path, `${JSON.stringify(ordered, null, 2)}\n`, 'utf-8');
  }
}

/**
 * Load rows from a file. CSV cells come back as strings.
 */
export function readTable(path: string, opts?: TableOptions): TableRow[] {
  const fmt = opts?.fmt ?? inferTableFormat(path);
  const content = readFileSync(path, 'utf-8');
  try {
    if (fmt === 'csv') {
      return parseCsv(content).rows;
    }
    const raw: unknown = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
    return tableSchema.parse(raw ?? []);
  } catch (e) {
    throw new PersistenceFormatError(path, `Invalid ${fmt} table (${describe(e)})`, { cause: e });
  }
}

export function readGroundTruthTable(path: string, opts?: TableOptions): GroundTruthRecord[] {
  return readTable(path, opts).map((row, i) => {
    const parsed = parseRow(path, i, () => groundTruthRowSchema.parse(row));
    const record: GroundTruthRecord = { prompt: parsed.prompt, output: parsed.output };
    if (parsed.image) record.image = parsed.image;
    if (parsed.mask) record.mask = parsed.mask;
    return record;
  });
}

export function writeGroundTruthTable(
  path: string,
  records: readonly GroundTruthRecord[],
  opts?: TableOptions,
): void {
  const withImages = records.some((r) => r.image !== undefined);
  const withMasks = records.some((r) => r.mask !== undefined);
  const columns = ['prompt', 'output'];
  if (withImages) columns.push('image');
  if (withMasks) columns.push('mask');
  writeTable(path, records.map(toRow), { ...opts, columns });
}

/**
 * Load a score table. Columns other than the text columns are read as metrics;
 * numeric-looking cells become numbers.
 */
export function readScoreTable(path: string, opts?: TableOptions): ScoreRecord[] {
  return readTable(path, opts).map((row, i) => {
    const parsed = parseRow(path, i, () => scoreRowSchema.parse(row));
    const record: ScoreRecord = { ...parsed };
    for (const [key, value] of Object.entries(row)) {
      if (!(key in record)) record[key] = toCell(value);
    }
    return record;
  });
}

export function writeScoreTable(
  path: string,
  records: readonly ScoreRecord[],
  opts?: TableOptions,
): void {
  writeTable(path, records, opts);
}

export function inferTableFormat(path: string): TableFormat {
  const ext = extname(path).toLowerCase();
  if (ext === '.csv') return 'csv';
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new Error(
    `Could not infer format for filename '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}

function collectColumns(rows: readonly TableRow[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return [...seen];
}

function toRow(record: GroundTruthRecord): TableRow {
  const row: TableRow = { prompt: record.prompt, output: record.output };
  if (record.image !== undefined) row.image = record.image;
  if (record.mask !== undefined) row.mask = record.mask;
  return row;
}

function toCell(value: TableCell): TableCell {
  if (typeof value === 'number') return value;
  const trimmed = value.trim();
  if (trimmed !== '' && Number.isFinite(Number(trimmed))) return Number(trimmed);
  return value;
}

function parseRow<T>(path: string, index: number, parse: () => T): T {
  try {
    return parse();
  } catch (e) {
    throw new PersistenceFormatError(path, `Invalid row ${index + 1} (${describe(e)})`, {
      cause: e,
    });
  }
}

function describe(e: unknown): string {
  if (e instanceof ZodError) {
    return e.issues.map((issue) => issue.message).join('; ');
  }
  return toError(e).message;
}
