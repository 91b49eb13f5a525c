import { ConfigurationError } from '../errors.js';
import type { ScoreRecord } from '../types.js';

export const DEFAULT_METRIC = 'similarity';

/**
 * The `topK` records with the lowest `metric`, lowest first. Ties keep their
 * original order.
 */
export function worstExamples(
  records: readonly ScoreRecord[],
  topK: number,
  metric: string = DEFAULT_METRIC,
): ScoreRecord[] {
  const keyed = records.map((record, index) => {
    const value = record[metric];
    if (typeof value !== 'number') {
      throw new ConfigurationError(
        `Metric '${metric}' is not a numeric column of score record ${index + 1}`,
      );
    }
    return { record, value };
  });
  return keyed
    .sort((x, y) => x.value - y.value)
    .slice(0, Math.max(0, topK))
    .map(({ record }) => record);
}
