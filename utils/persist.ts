import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import * as Papa from 'papaparse';
import type { Dataset } from '../types';
import { labelOf } from './cells';

export const toCsv = (dataset: Dataset): string =>
  Papa.unparse(
    {
      fields: dataset.columns,
      data: dataset.rows.map((row) => dataset.columns.map((col) => labelOf(row[col]) ?? '')),
    },
    { newline: '\n' },
  );

export const writeDatasetCsv = async (dataset: Dataset, destination: string): Promise<string> => {
  await mkdir(path.dirname(destination), { recursive: true });
  await writeFile(destination, toCsv(dataset) + '\n', 'utf8');
  return destination;
};
