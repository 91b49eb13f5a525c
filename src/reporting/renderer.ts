/**
 * Terminal rendering of benchmark results with chalk + cli-table3.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { AggregateMetrics, ScoreRecord } from '../types.js';
import { ANSI_MARKERS, alignedDiff, type DiffMarkers } from './diff.js';
import { defaultRenderNumber } from './render-numbers.js';
import { DEFAULT_METRIC } from './worst-examples.js';

export const SEPARATOR = '='.repeat(103);

export interface TextResultsOptions {
  /** Metric shown under each example. */
  metric?: string;
  markers?: DiffMarkers;
}

/**
 * Render each example as its prompt, metric value, reference, candidate and a
 * line-aligned diff between the two.
 */
export function renderTextResults(
  examples: readonly ScoreRecord[],
  opts?: TextResultsOptions,
): string {
  const metric = opts?.metric ?? DEFAULT_METRIC;
  const markers = opts?.markers ?? ANSI_MARKERS;

  return examples
    .map((e, i) => {
      const { reference, actual, diff } = alignedDiff(e.source_model, e.optimized_model, markers);
      return [
        SEPARATOR,
        `## Prompt ${i + 1}:`,
        e.prompt,
        '',
        `## Metric value: ${formatMetric(e[metric])}`,
        '',
        '## Reference text:',
        reference,
        '## Actual text:',
        actual,
        '## Diff:',
        diff,
      ].join('\n');
    })
    .join('\n');
}

/**
 * Render each image example as its full record; images are referenced by path.
 */
export function renderImageResults(examples: readonly ScoreRecord[]): string {
  return examples
    .map((e, i) => [SEPARATOR, `Top-${i + 1} example:`, JSON.stringify(e, null, 2)].join('\n'))
    .join('\n');
}

/**
 * Render aggregate metrics as a two-column table.
 */
export function renderMetricsTable(aggregate: AggregateMetrics, title?: string): string {
  const table = new Table({
    head: [chalk.bold('Metric'), chalk.bold('Value')],
    style: { head: [], border: [] },
  });
  for (const [name, value] of Object.entries(aggregate)) {
    table.push([name, defaultRenderNumber(value)]);
  }
  const heading = title ? `Metrics: ${title}` : 'Metrics';
  return `${heading}\n${table.toString()}`;
}

function formatMetric(value: string | number | undefined): string {
  if (typeof value === 'number') return value.toFixed(4);
  return value ?? '-';
}
