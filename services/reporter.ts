import type { CleaningReport, ColumnStats, HousingAnalysis, SummaryStats } from '../types';

const METRIC_LABELS: Array<[string, keyof SummaryStats]> = [
  ['Count', 'count'],
  ['Mean', 'mean'],
  ['Standard Deviation', 'stddev'],
  ['Minimum', 'min'],
  ['Median', 'median'],
  ['Maximum', 'max'],
  ['Sum', 'sum'],
];

const formatValue = (value: number): string =>
  Number.isInteger(value) ? String(value) : value.toFixed(4);

export const formatSummaryTable = (stats: SummaryStats): string => {
  const rows = METRIC_LABELS.map(([label, key]) => [label, formatValue(stats[key])]);
  const width = Math.max('Metric'.length, ...rows.map(([label]) => label.length));

  return [
    'Summary statistics for Total Spent (cleaned data):',
    `${'Metric'.padEnd(width)}  Value`,
    `${'-'.repeat(width)}  ${'-'.repeat(5)}`,
    ...rows.map(([label, value]) => `${label.padEnd(width)}  ${value}`),
  ].join('\n');
};

export const formatHeadlines = (analysis: HousingAnalysis): string => {
  const { topItemByTransactions, topItemByQuantity, preferredPayment } = analysis;
  return [
    `Item with the most transactions: ${topItemByTransactions.groupKey} (${topItemByTransactions.count} transactions)`,
    `Item sold in the greatest total quantity: ${topItemByQuantity.groupKey} (${(topItemByQuantity.sum ?? 0).toFixed(2)} units)`,
    `Most frequently used payment method: ${preferredPayment.groupKey} (${preferredPayment.count} transactions)`,
  ].join('\n');
};

const formatCounts = (counts: Record<string, number>): string =>
  Object.entries(counts)
    .map(([col, n]) => `${col}=${n}`)
    .join(', ') || 'none';

export const formatCleaningReport = (report: CleaningReport): string =>
  [
    `Cleaning: ${report.rowsIn} rows in, ${report.rowsOut} rows kept, ${report.rowsDropped} dropped without a total`,
    `  missing markers replaced: ${report.missingReplaced}`,
    `  unparseable numbers: ${formatCounts(report.unparseable)}`,
    `  negative values cleared: ${formatCounts(report.negativeCleared)}`,
    `  totals filled: ${report.totalsFilled}, totals corrected: ${report.totalsCorrected}`,
  ].join('\n');

export const formatProfile = (columns: ColumnStats[]): string =>
  columns
    .map(
      (c) =>
        `${c.name} (${c.type}): ${c.unique} unique values, ${c.missing} missing.${c.mean !== undefined ? ` Avg: ${c.mean.toFixed(2)}` : ''}`,
    )
    .join('\n');
