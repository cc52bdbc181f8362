import type { CellValue, Dataset, Row } from '../types';

export const ABSENT: CellValue = Object.freeze({ kind: 'absent' });

export const num = (value: number): CellValue =>
  Number.isFinite(value) ? { kind: 'number', value } : ABSENT;

export const text = (value: string): CellValue => ({ kind: 'text', value });

export const category = (value: string): CellValue => ({ kind: 'category', value });

export const isAbsent = (cell: CellValue | undefined): boolean =>
  cell === undefined || cell.kind === 'absent';

/** Numeric payload, or undefined for anything that is not a number cell. */
export const numberOf = (cell: CellValue | undefined): number | undefined =>
  cell?.kind === 'number' ? cell.value : undefined;

/** String payload of text/category cells, decimal form of numbers. */
export const labelOf = (cell: CellValue | undefined): string | undefined => {
  if (cell === undefined) return undefined;
  switch (cell.kind) {
    case 'absent':
      return undefined;
    case 'number':
      return String(cell.value);
    case 'text':
    case 'category':
      return cell.value;
  }
};

// Accepts what a spreadsheet user types: padding, thousands separators, exponents.
const DECIMAL_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export const parseDecimal = (raw: string): number | undefined => {
  const cleaned = raw.trim().replace(/,/g, '');
  if (!DECIMAL_RE.test(cleaned)) return undefined;
  const n = parseFloat(cleaned);
  return Number.isFinite(n) ? n : undefined;
};

/** Converts a raw value from a parser (papaparse, xlsx) into a cell. */
export const fromRaw = (value: unknown): CellValue => {
  if (value === null || value === undefined) return text('');
  if (typeof value === 'number') return num(value);
  if (typeof value === 'string') return text(value);
  if (typeof value === 'boolean') return text(String(value));
  if (value instanceof Date) return isNaN(value.getTime()) ? ABSENT : text(value.toISOString());
  return text(String(value));
};

export const columnValues = (dataset: Dataset, column: string): CellValue[] =>
  dataset.rows.map((row) => row[column] ?? ABSENT);

export const presentNumbers = (dataset: Dataset, column: string): number[] =>
  dataset.rows
    .map((row) => numberOf(row[column]))
    .filter((v): v is number => v !== undefined);

export const mapRows = (dataset: Dataset, fn: (row: Row, index: number) => Row): Dataset => ({
  ...dataset,
  rows: dataset.rows.map(fn),
});
