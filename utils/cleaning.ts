import type { CellValue, CleaningReport, Dataset, Row } from '../types';
import { SchemaError } from '../errors';
import { ABSENT, category, labelOf, mapRows, num, numberOf, parseDecimal } from './cells';
import { logger } from './logger';

export const DEFAULT_MISSING_TOKENS = ['', 'NA', 'N/A', 'na', 'NaN', 'nan', 'null', 'NULL', '-'] as const;

export const NUMERIC_COLUMNS = ['Quantity', 'PricePerUnit', 'TotalSpent'] as const;
export const CATEGORICAL_COLUMNS = ['Item', 'PaymentMethod'] as const;
export const NON_NEGATIVE_COLUMNS = ['Quantity', 'PricePerUnit'] as const;
export const DEFAULT_TOLERANCE = 1e-6;

export interface CleaningOptions {
  missingTokens?: readonly string[];
  tolerance?: number;
}

export interface StageResult {
  dataset: Dataset;
  changed: number;
}

export interface ReconcileResult {
  dataset: Dataset;
  filled: number;
  corrected: number;
}

export const requireColumns = (dataset: Dataset, columns: readonly string[]): void => {
  const missing = columns.filter((c) => !dataset.columns.includes(c));
  if (missing.length) throw new SchemaError(dataset.name, missing);
};

export const normalizeMissing = (
  dataset: Dataset,
  tokens: readonly string[] = DEFAULT_MISSING_TOKENS,
): StageResult => {
  const sentinels = new Set(tokens);
  let changed = 0;

  const out = mapRows(dataset, (row) => {
    const next: Row = { ...row };
    for (const col of dataset.columns) {
      const cell = row[col];
      if (cell === undefined) {
        next[col] = ABSENT;
      } else if ((cell.kind === 'text' || cell.kind === 'category') && sentinels.has(cell.value)) {
        next[col] = ABSENT;
        changed++;
      }
    }
    return next;
  });

  return { dataset: out, changed };
};

const coerceCell = (cell: CellValue): CellValue => {
  switch (cell.kind) {
    case 'number':
      return cell;
    case 'text':
    case 'category': {
      const parsed = parseDecimal(cell.value);
      return parsed === undefined ? ABSENT : num(parsed);
    }
    case 'absent':
      return ABSENT;
  }
};

export const coerceNumeric = (
  dataset: Dataset,
  columns: readonly string[],
): { dataset: Dataset; unparseable: Record<string, number> } => {
  requireColumns(dataset, columns);
  const unparseable: Record<string, number> = Object.fromEntries(columns.map((c) => [c, 0]));

  const out = mapRows(dataset, (row) => {
    const next: Row = { ...row };
    for (const col of columns) {
      const before = row[col] ?? ABSENT;
      const after = coerceCell(before);
      if (before.kind !== 'absent' && after.kind === 'absent') unparseable[col]++;
      next[col] = after;
    }
    return next;
  });

  return { dataset: out, unparseable };
};

export const toCategorical = (dataset: Dataset, columns: readonly string[]): Dataset => {
  requireColumns(dataset, columns);
  return mapRows(dataset, (row) => {
    const next: Row = { ...row };
    for (const col of columns) {
      const label = labelOf(row[col]);
      next[col] = label === undefined ? ABSENT : category(label);
    }
    return next;
  });
};

export const sanitizeNegatives = (
  dataset: Dataset,
  columns: readonly string[] = NON_NEGATIVE_COLUMNS,
): { dataset: Dataset; cleared: Record<string, number> } => {
  requireColumns(dataset, columns);
  const cleared: Record<string, number> = Object.fromEntries(columns.map((c) => [c, 0]));

  const out = mapRows(dataset, (row) => {
    const next: Row = { ...row };
    for (const col of columns) {
      const value = numberOf(row[col]);
      if (value !== undefined && value < 0) {
        next[col] = ABSENT;
        cleared[col]++;
      }
    }
    return next;
  });

  return { dataset: out, cleared };
};

/** Quantity * PricePerUnit, or undefined when either operand is absent. */
export const calculatedTotal = (row: Row): number | undefined => {
  const quantity = numberOf(row.Quantity);
  const price = numberOf(row.PricePerUnit);
  if (quantity === undefined || price === undefined) return undefined;
  return quantity * price;
};

export const reconcileTotals = (
  dataset: Dataset,
  tolerance: number = DEFAULT_TOLERANCE,
): ReconcileResult => {
  requireColumns(dataset, NUMERIC_COLUMNS);
  let filled = 0;
  let corrected = 0;

  const out = mapRows(dataset, (row) => {
    const calculated = calculatedTotal(row);
    const stored = numberOf(row.TotalSpent);

    if (stored === undefined) {
      if (calculated === undefined) return row;
      filled++;
      return { ...row, TotalSpent: num(calculated) };
    }
    // A present total is never replaced by an absent calculation.
    if (calculated === undefined) return row;
    if (Math.abs(stored - calculated) > tolerance) {
      corrected++;
      return { ...row, TotalSpent: num(calculated) };
    }
    return row;
  });

  return { dataset: out, filled, corrected };
};

export const dropMissingTotals = (dataset: Dataset): Dataset => ({
  ...dataset,
  rows: dataset.rows.filter((row) => numberOf(row.TotalSpent) !== undefined),
});

export const cleanHousing = (
  dataset: Dataset,
  options: CleaningOptions = {},
): { dataset: Dataset; report: CleaningReport } => {
  const tokens = options.missingTokens ?? DEFAULT_MISSING_TOKENS;
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;

  // Every column the stages touch must exist before the first stage runs.
  requireColumns(dataset, [...NUMERIC_COLUMNS, ...CATEGORICAL_COLUMNS]);

  const normalized = normalizeMissing(dataset, tokens);
  logger.debug('Normalized missing values', {
    dataset: dataset.name,
    stage: 'normalize',
    replaced: normalized.changed,
  });

  const coerced = coerceNumeric(normalized.dataset, NUMERIC_COLUMNS);
  logger.debug('Coerced numeric columns', {
    dataset: dataset.name,
    stage: 'coerce',
    unparseable: coerced.unparseable,
  });

  const categorized = toCategorical(coerced.dataset, CATEGORICAL_COLUMNS);

  const sanitized = sanitizeNegatives(categorized, NON_NEGATIVE_COLUMNS);
  logger.debug('Cleared negative values', {
    dataset: dataset.name,
    stage: 'sanitize',
    cleared: sanitized.cleared,
  });

  const reconciled = reconcileTotals(sanitized.dataset, tolerance);
  logger.debug('Reconciled totals', {
    dataset: dataset.name,
    stage: 'reconcile',
    filled: reconciled.filled,
    corrected: reconciled.corrected,
  });

  const cleaned = dropMissingTotals(reconciled.dataset);
  const rowsDropped = dataset.rows.length - cleaned.rows.length;
  logger.debug('Dropped rows without a total', {
    dataset: dataset.name,
    stage: 'filter',
    rows: cleaned.rows.length,
    dropped: rowsDropped,
  });

  return {
    dataset: cleaned,
    report: {
      rowsIn: dataset.rows.length,
      rowsOut: cleaned.rows.length,
      missingReplaced: normalized.changed,
      unparseable: coerced.unparseable,
      negativeCleared: sanitized.cleared,
      totalsFilled: reconciled.filled,
      totalsCorrected: reconciled.corrected,
      rowsDropped,
    },
  };
};
