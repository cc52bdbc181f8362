import type { AggregateMode, AggregateResult, Dataset } from '../types';
import { EmptyInputError } from '../errors';
import { labelOf, numberOf } from './cells';
import { requireColumns } from './cleaning';

/**
 * Groups rows by the label of `groupColumn`. Groups come back in the order
 * their first row appears; rows with an absent group value are skipped.
 */
export const aggregateBy = (
  dataset: Dataset,
  groupColumn: string,
  mode: AggregateMode = { kind: 'count' },
): AggregateResult[] => {
  requireColumns(dataset, mode.kind === 'sum' ? [groupColumn, mode.column] : [groupColumn]);

  const groups = new Map<string, AggregateResult>();
  for (const row of dataset.rows) {
    const key = labelOf(row[groupColumn]);
    if (key === undefined) continue;

    let group = groups.get(key);
    if (!group) {
      group = mode.kind === 'sum' ? { groupKey: key, count: 0, sum: 0 } : { groupKey: key, count: 0 };
      groups.set(key, group);
    }
    group.count++;
    if (mode.kind === 'sum') {
      const value = numberOf(row[mode.column]);
      if (value !== undefined) group.sum = (group.sum ?? 0) + value;
    }
  }

  return [...groups.values()];
};

export type AggregateMetric = 'count' | 'sum';

/** Largest group by `metric`; the earliest group wins a tie. */
export const argMax = (results: AggregateResult[], metric: AggregateMetric = 'count'): AggregateResult => {
  if (results.length === 0) throw new EmptyInputError(`the top group by ${metric}`);
  const score = (r: AggregateResult) => (metric === 'sum' ? r.sum ?? 0 : r.count);

  let best = results[0];
  for (const candidate of results.slice(1)) {
    if (score(candidate) > score(best)) best = candidate;
  }
  return best;
};
