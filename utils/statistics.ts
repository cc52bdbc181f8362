import type { Dataset, SummaryStats } from '../types';
import { EmptyInputError } from '../errors';
import { presentNumbers } from './cells';
import { requireColumns } from './cleaning';

export const median = (values: number[]): number => {
  if (values.length === 0) throw new EmptyInputError('a median');
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
};

export const summarize = (values: number[]): SummaryStats => {
  if (values.length === 0) throw new EmptyInputError('summary statistics');

  const count = values.length;
  const sum = values.reduce((a, b) => a + b, 0);
  const mean = sum / count;
  // Sample standard deviation; a single observation has no spread.
  const variance = count > 1 ? values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (count - 1) : 0;

  return {
    count,
    mean,
    stddev: Math.sqrt(variance),
    min: values.reduce((a, b) => Math.min(a, b)),
    median: median(values),
    max: values.reduce((a, b) => Math.max(a, b)),
    sum,
  };
};

export const summarizeColumn = (dataset: Dataset, column: string): SummaryStats => {
  requireColumns(dataset, [column]);
  const values = presentNumbers(dataset, column);
  if (values.length === 0) throw new EmptyInputError(`summary statistics for ${column}`);
  return summarize(values);
};

/** Sturges bin count: ceil(log2(n)) + 1. */
export const sturgesBinCount = (n: number): number => (n <= 1 ? 1 : Math.ceil(Math.log2(n)) + 1);

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

/** Equal-width bins from min to max; the last bin includes its upper edge. */
export const histogram = (values: number[], binCount: number = sturgesBinCount(values.length)): HistogramBin[] => {
  if (values.length === 0) throw new EmptyInputError('a histogram');
  const min = values.reduce((a, b) => Math.min(a, b));
  const max = values.reduce((a, b) => Math.max(a, b));

  if (min === max) return [{ start: min, end: max, count: values.length }];

  const width = (max - min) / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, i) => ({
    start: min + i * width,
    end: i === binCount - 1 ? max : min + (i + 1) * width,
    count: 0,
  }));
  for (const v of values) {
    const idx = Math.min(Math.floor((v - min) / width), binCount - 1);
    bins[idx].count++;
  }
  return bins;
};
