import { describe, it, expect } from 'vitest';
import { histogram, median, sturgesBinCount, summarize, summarizeColumn } from '../statistics';
import { cleanHousing } from '../cleaning';
import { EmptyInputError } from '../../errors';
import { SCENARIO_ROWS, housing } from './helpers';

describe('summarize', () => {
  it('computes the summary of the cleaned totals', () => {
    const { dataset } = cleanHousing(housing(SCENARIO_ROWS));
    const stats = summarizeColumn(dataset, 'TotalSpent');

    expect(stats.count).toBe(3);
    expect(stats.sum).toBe(40);
    expect(stats.mean).toBeCloseTo(40 / 3, 10);
    expect(stats.stddev).toBeCloseTo(Math.sqrt(175 / 3), 10);
    expect(stats.min).toBe(5);
    expect(stats.median).toBe(15);
    expect(stats.max).toBe(20);
  });

  it('reports zero spread for a single value', () => {
    expect(summarize([7])).toEqual({ count: 1, mean: 7, stddev: 0, min: 7, median: 7, max: 7, sum: 7 });
  });

  it('fails instead of returning zeros for no values', () => {
    expect(() => summarize([])).toThrow(EmptyInputError);
  });

  it('fails when no row survives cleaning', () => {
    const { dataset } = cleanHousing(
      housing([{ Quantity: 'NA', PricePerUnit: 4, TotalSpent: 'NA', Item: 'Desk', PaymentMethod: 'Card' }]),
    );

    expect(dataset.rows).toHaveLength(0);
    expect(() => summarizeColumn(dataset, 'TotalSpent')).toThrow(EmptyInputError);
  });
});

describe('median', () => {
  it('averages the middle pair for an even count', () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });
});

describe('histogram', () => {
  it('uses the Sturges bin count', () => {
    expect(sturgesBinCount(1)).toBe(1);
    expect(sturgesBinCount(2)).toBe(2);
    expect(sturgesBinCount(8)).toBe(4);
    expect(sturgesBinCount(100)).toBe(8);
  });

  it('splits values into equal-width bins with a closed last bin', () => {
    const bins = histogram([1, 2, 3, 4, 5, 6, 7, 8]);

    expect(bins.map((b) => b.count)).toEqual([2, 2, 2, 2]);
    expect(bins[0].start).toBe(1);
    expect(bins[3].end).toBe(8);
  });

  it('collapses identical values into one bin', () => {
    expect(histogram([3, 3, 3])).toEqual([{ start: 3, end: 3, count: 3 }]);
  });
});
