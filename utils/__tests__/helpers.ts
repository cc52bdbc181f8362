import type { CellValue, Dataset } from '../../types';
import { fromRaw } from '../cells';

export const HOUSING_COLUMNS = ['Quantity', 'PricePerUnit', 'TotalSpent', 'Item', 'PaymentMethod'];

export const housing = (rows: Array<Record<string, unknown>>, name = 'Housing'): Dataset => ({
  name,
  columns: [...HOUSING_COLUMNS],
  rows: rows.map((r) => Object.fromEntries(HOUSING_COLUMNS.map((c) => [c, fromRaw(r[c])]))),
});

export const column = (dataset: Dataset, name: string): CellValue[] => dataset.rows.map((row) => row[name]);

export const SCENARIO_ROWS = [
  { Quantity: 2, PricePerUnit: 10, TotalSpent: 999, Item: 'Chair', PaymentMethod: 'Cash' },
  { Quantity: 3, PricePerUnit: 5, TotalSpent: 'NA', Item: 'Chair', PaymentMethod: 'Card' },
  { Quantity: -1, PricePerUnit: 5, TotalSpent: 5, Item: 'Lamp', PaymentMethod: 'Cash' },
];

export const SCENARIO_CSV = [
  'Quantity,PricePerUnit,TotalSpent,Item,PaymentMethod',
  '2,10,999,Chair,Cash',
  '3,5,NA,Chair,Card',
  '-1,5,5,Lamp,Cash',
  '',
].join('\n');
