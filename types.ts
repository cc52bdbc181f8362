export type ColumnType = 'numeric' | 'categorical' | 'date' | 'string';

export type CellValue =
  | { kind: 'absent' }
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'category'; value: string };

export type Row = Record<string, CellValue>;

export interface Dataset {
  name: string;
  columns: string[];
  rows: Row[];
}

export interface ColumnStats {
  name: string;
  type: ColumnType;
  missing: number;
  unique: number;
  min?: number;
  max?: number;
  mean?: number;
  median?: number;
}

export type LoadError =
  | { kind: 'not-found'; name: string; searched: string[] }
  | { kind: 'unreadable'; name: string; path: string; message: string };

export type LoadResult =
  | { ok: true; dataset: Dataset; path: string }
  | { ok: false; error: LoadError };

export type AggregateMode =
  | { kind: 'count' }
  | { kind: 'sum'; column: string };

export interface AggregateResult {
  groupKey: string;
  count: number;
  sum?: number;
}

export interface SummaryStats {
  count: number;
  mean: number;
  stddev: number;
  min: number;
  median: number;
  max: number;
  sum: number;
}

export interface CleaningReport {
  rowsIn: number;
  rowsOut: number;
  missingReplaced: number;
  unparseable: Record<string, number>;
  negativeCleared: Record<string, number>;
  totalsFilled: number;
  totalsCorrected: number;
  rowsDropped: number;
}

export interface HousingAnalysis {
  totalSpent: SummaryStats;
  itemCounts: AggregateResult[];
  itemQuantities: AggregateResult[];
  paymentCounts: AggregateResult[];
  topItemByTransactions: AggregateResult;
  topItemByQuantity: AggregateResult;
  preferredPayment: AggregateResult;
}
