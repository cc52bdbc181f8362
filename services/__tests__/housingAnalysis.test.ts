import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { analyzeHousing, runHousingAnalysis } from '../housingAnalysis';
import { loadConfig } from '../../config';
import { cleanHousing } from '../../utils/cleaning';
import { setLogSink } from '../../utils/logger';
import { EmptyInputError, MissingRequiredDatasetError } from '../../errors';
import { SCENARIO_CSV, SCENARIO_ROWS, housing } from '../../utils/__tests__/helpers';

describe('analyzeHousing', () => {
  it('aggregates items and payment methods', () => {
    const analysis = analyzeHousing(cleanHousing(housing(SCENARIO_ROWS)).dataset);

    expect(analysis.itemCounts).toEqual([
      { groupKey: 'Chair', count: 2 },
      { groupKey: 'Lamp', count: 1 },
    ]);
    expect(analysis.paymentCounts).toEqual([
      { groupKey: 'Cash', count: 2 },
      { groupKey: 'Card', count: 1 },
    ]);
    expect(analysis.topItemByQuantity).toEqual({ groupKey: 'Chair', count: 2, sum: 5 });
    expect(analysis.totalSpent.sum).toBe(40);
  });

  it('surfaces an empty cleaned dataset', () => {
    const { dataset } = cleanHousing(
      housing([{ Quantity: -2, PricePerUnit: 4, TotalSpent: '', Item: 'Desk', PaymentMethod: 'Card' }]),
    );

    expect(() => analyzeHousing(dataset)).toThrow(EmptyInputError);
  });
});

describe('runHousingAnalysis', () => {
  let dir: string;
  let restoreSink: (line: string) => void;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'housing-run-'));
    restoreSink = setLogSink(() => {});
  });

  afterEach(async () => {
    setLogSink(restoreSink);
    await rm(dir, { recursive: true, force: true });
  });

  it('cleans, reports, charts and saves the Housing dataset', async () => {
    await writeFile(path.join(dir, 'Housing.csv'), SCENARIO_CSV);
    const printed: string[] = [];
    const config = loadConfig({}, { dataDir: dir });

    const summary = await runHousingAnalysis(config, {
      print: (text) => printed.push(text),
      datasetNames: ['Housing', 'PovertyReport'],
    });

    expect(summary.cleaned.rows).toHaveLength(3);
    expect(summary.analysis.totalSpent.sum).toBe(40);
    expect(summary.datasets.get('PovertyReport')?.rows).toEqual([]);
    expect(summary.charts).toHaveLength(4);
    expect(summary.outputFile).toBe(path.join(dir, 'Housing_cleaned.csv'));
    expect(await readFile(summary.outputFile, 'utf8')).toBe(
      [
        'Quantity,PricePerUnit,TotalSpent,Item,PaymentMethod',
        '2,10,20,Chair,Cash',
        '3,5,15,Chair,Card',
        ',5,5,Lamp,Cash',
        '',
      ].join('\n'),
    );
    expect(printed[printed.length - 1]).toBe(`Cleaned data saved to ${summary.outputFile}`);
    expect(printed).toContain(
      [
        'Item with the most transactions: Chair (2 transactions)',
        'Item sold in the greatest total quantity: Chair (5.00 units)',
        'Most frequently used payment method: Cash (2 transactions)',
      ].join('\n'),
    );
  });

  it('skips charts when disabled', async () => {
    await writeFile(path.join(dir, 'Housing.csv'), SCENARIO_CSV);
    const config = loadConfig({}, { dataDir: dir, renderCharts: false });

    const summary = await runHousingAnalysis(config, { print: () => {}, datasetNames: ['Housing'] });

    expect(summary.charts).toEqual([]);
  });

  it('stops before writing anything when Housing is missing', async () => {
    const config = loadConfig({}, { dataDir: dir });

    await expect(runHousingAnalysis(config, { print: () => {}, datasetNames: ['Housing'] })).rejects.toThrow(
      MissingRequiredDatasetError,
    );
  });
});
