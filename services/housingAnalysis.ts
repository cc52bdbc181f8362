import type { CleaningReport, ColumnStats, Dataset, HousingAnalysis } from '../types';
import type { AppConfig } from '../config';
import { MissingRequiredDatasetError } from '../errors';
import { cleanHousing } from '../utils/cleaning';
import { aggregateBy, argMax } from '../utils/aggregation';
import { summarizeColumn } from '../utils/statistics';
import { presentNumbers } from '../utils/cells';
import { DATASET_NAMES, REQUIRED_DATASET, loadDatasets, profileDataset } from '../utils/dataProcessor';
import { writeDatasetCsv } from '../utils/persist';
import { logger } from '../utils/logger';
import { formatCleaningReport, formatHeadlines, formatProfile, formatSummaryTable } from './reporter';
import { ChartRenderer } from './chartRenderer';

export const analyzeHousing = (cleaned: Dataset): HousingAnalysis => {
  const totalSpent = summarizeColumn(cleaned, 'TotalSpent');

  const itemCounts = aggregateBy(cleaned, 'Item', { kind: 'count' });
  const itemQuantities = aggregateBy(cleaned, 'Item', { kind: 'sum', column: 'Quantity' });
  const paymentCounts = aggregateBy(cleaned, 'PaymentMethod', { kind: 'count' });

  return {
    totalSpent,
    itemCounts,
    itemQuantities,
    paymentCounts,
    topItemByTransactions: argMax(itemCounts, 'count'),
    topItemByQuantity: argMax(itemQuantities, 'sum'),
    preferredPayment: argMax(paymentCounts, 'count'),
  };
};

export interface RunSummary {
  datasets: Map<string, Dataset>;
  cleaned: Dataset;
  profile: ColumnStats[];
  report: CleaningReport;
  analysis: HousingAnalysis;
  outputFile: string;
  charts: string[];
}

export interface RunDeps {
  print: (text: string) => void;
  datasetNames?: readonly string[];
}

export const runHousingAnalysis = async (config: AppConfig, deps: RunDeps): Promise<RunSummary> => {
  const started = Date.now();
  const datasets = await loadDatasets(deps.datasetNames ?? DATASET_NAMES, config.dataDir);
  const housing = datasets.get(REQUIRED_DATASET);
  if (!housing) throw new MissingRequiredDatasetError(REQUIRED_DATASET);

  const { dataset: cleaned, report } = cleanHousing(housing, {
    missingTokens: config.missingTokens,
    tolerance: config.tolerance,
  });
  logger.info('Cleaned dataset', { dataset: housing.name, rows: cleaned.rows.length, dropped: report.rowsDropped });

  const analysis = analyzeHousing(cleaned);
  const profile = profileDataset(cleaned);

  deps.print(formatCleaningReport(report));
  deps.print(formatProfile(profile));
  deps.print(formatSummaryTable(analysis.totalSpent));
  deps.print(formatHeadlines(analysis));

  const charts = config.renderCharts
    ? await new ChartRenderer(config.chartsDir).renderAll(analysis, presentNumbers(cleaned, 'TotalSpent'))
    : [];

  const outputFile = await writeDatasetCsv(cleaned, config.outputFile);
  deps.print(`Cleaned data saved to ${outputFile}`);
  logger.info('Run complete', { dataset: housing.name, path: outputFile, durationMs: Date.now() - started });

  return {
    datasets,
    cleaned,
    profile,
    report,
    analysis,
    outputFile,
    charts,
  };
};
