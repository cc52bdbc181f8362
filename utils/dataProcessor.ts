import { readFile } from 'node:fs/promises';
import path from 'node:path';
import * as Papa from 'papaparse';
import * as XLSX from 'xlsx';
import type { CellValue, ColumnStats, ColumnType, Dataset, LoadResult, Row } from '../types';
import { MissingRequiredDatasetError } from '../errors';
import { columnValues, fromRaw, labelOf, numberOf, text } from './cells';
import { median } from './statistics';
import { logger } from './logger';

export const DATASET_NAMES = [
  'ZIP_Code_Population_Weighted_Centroids_1130336951148902581',
  'UnemploymentReport',
  'PovertyReport',
  'PopulationReport',
  'Housing',
  'Annual_Macroeconomic_Factors',
] as const;

export const REQUIRED_DATASET = 'Housing';

// Workbooks win over CSV when both exist.
const EXTENSIONS = ['.xlsx', '.csv'] as const;

export const emptyDataset = (name: string): Dataset => ({ name, columns: [], rows: [] });

// Rows are keyed by column name, so a repeated header becomes Note, Note_1, Note_2...
const uniqueLabels = (labels: string[]): string[] => {
  const taken = new Set<string>();
  return labels.map((label) => {
    let candidate = label;
    for (let n = 1; taken.has(candidate); n++) candidate = `${label}_${n}`;
    taken.add(candidate);
    return candidate;
  });
};

const toDataset = (name: string, table: unknown[][]): Dataset => {
  if (table.length === 0) return emptyDataset(name);

  const [header, ...body] = table;
  const columns = uniqueLabels(
    header.map((h, i) => {
      const label = h === null || h === undefined ? '' : String(h).trim();
      return label === '' ? `Var${i + 1}` : label;
    }),
  );
  const rows: Row[] = body.map((values) => {
    const row: Row = {};
    columns.forEach((col, i) => {
      row[col] = i < values.length ? fromRaw(values[i]) : text('');
    });
    return row;
  });

  return { name, columns, rows };
};

export const parseCsv = (name: string, content: string): Dataset => {
  const result = Papa.parse<string[]>(content, {
    header: false,
    dynamicTyping: false,
    skipEmptyLines: true,
  });
  if (result.errors.length) {
    logger.debug('CSV parser reported issues', {
      dataset: name,
      issues: result.errors.slice(0, 5).map((e) => `row ${e.row ?? '?'}: ${e.message}`),
    });
  }
  return toDataset(name, result.data);
};

export const parseWorkbook = (name: string, data: Buffer): Dataset => {
  const workbook = XLSX.read(data, { type: 'buffer', cellDates: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return emptyDataset(name);
  const table = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
  });
  return toDataset(name, table);
};

const isNotFound = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

export const loadDataset = async (name: string, dir: string): Promise<LoadResult> => {
  const searched: string[] = [];

  for (const ext of EXTENSIONS) {
    const file = path.join(dir, name + ext);
    searched.push(file);
    try {
      const data = await readFile(file);
      const dataset = ext === '.xlsx' ? parseWorkbook(name, data) : parseCsv(name, data.toString('utf8'));
      return { ok: true, dataset, path: file };
    } catch (err) {
      if (isNotFound(err)) continue;
      return {
        ok: false,
        error: {
          kind: 'unreadable',
          name,
          path: file,
          message: err instanceof Error ? err.message : String(err),
        },
      };
    }
  }

  return { ok: false, error: { kind: 'not-found', name, searched } };
};

/**
 * Loads every named dataset into a fresh map. Only `required` may abort the
 * run; any other failure is logged and replaced by an empty dataset.
 */
export const loadDatasets = async (
  names: readonly string[],
  dir: string,
  required: string = REQUIRED_DATASET,
): Promise<Map<string, Dataset>> => {
  const tables = new Map<string, Dataset>();

  for (const name of names) {
    const result = await loadDataset(name, dir);
    if (result.ok) {
      logger.info('Loaded dataset', { dataset: name, path: result.path, rows: result.dataset.rows.length });
      tables.set(name, result.dataset);
      continue;
    }

    const { error } = result;
    if (name === required) {
      throw new MissingRequiredDatasetError(
        name,
        error.kind === 'not-found' ? 'was not found' : `could not be read (${error.message})`,
      );
    }
    if (error.kind === 'not-found') {
      logger.warn(`Could not find ${name} (.xlsx or .csv)`, { dataset: name, searched: error.searched });
    } else {
      logger.warn(`Could not read ${name}`, { dataset: name, path: error.path, error: { message: error.message } });
    }
    tables.set(name, emptyDataset(name));
  }

  const housing = tables.get(required);
  if (!housing || housing.rows.length === 0) {
    throw new MissingRequiredDatasetError(required, housing ? 'contains no rows' : 'was not requested');
  }

  return tables;
};

// --- Profiling ---

const isPresentLabel = (cell: CellValue): boolean => {
  const label = labelOf(cell);
  return label !== undefined && label.trim() !== '';
};

const detectType = (values: CellValue[]): ColumnType => {
  if (values.length === 0) return 'string';
  if (values.some((v) => v.kind === 'category')) return 'categorical';

  const sample = values.slice(0, 10);
  const isNumeric = sample.every((v) => v.kind === 'number' || (v.kind === 'text' && !isNaN(Number(v.value))));
  if (isNumeric) return 'numeric';

  const isDate = sample.every((v) => v.kind === 'text' && !isNaN(Date.parse(v.value)) && v.value.length > 5);
  if (isDate) return 'date';

  const labels = values.map(labelOf);
  const uniqueCount = new Set(labels).size;
  if (uniqueCount / values.length < 0.2 || (values.length > 100 && uniqueCount < 20)) return 'categorical';

  return 'string';
};

export const profileDataset = (dataset: Dataset): ColumnStats[] =>
  dataset.columns.map((name) => {
    const values = columnValues(dataset, name).filter(isPresentLabel);
    const type = detectType(values);

    const stats: ColumnStats = {
      name,
      type,
      missing: dataset.rows.length - values.length,
      unique: new Set(values.map(labelOf)).size,
    };

    if (type === 'numeric') {
      const numValues = values
        .map((v) => numberOf(v) ?? (v.kind === 'text' ? Number(v.value) : NaN))
        .filter((v) => Number.isFinite(v));
      if (numValues.length) {
        stats.min = numValues.reduce((a, b) => Math.min(a, b));
        stats.max = numValues.reduce((a, b) => Math.max(a, b));
        stats.mean = numValues.reduce((a, b) => a + b, 0) / numValues.length;
        stats.median = median(numValues);
      }
    }

    return stats;
  });
