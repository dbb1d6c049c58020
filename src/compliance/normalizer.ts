/**
 * Normalizer
 *
 * Turns the loosely-typed column mapping returned by the BI service into a
 * Dataset: every column padded to the same length, and the designated columns
 * coerced (counts to numbers, timestamps to calendar dates).
 */

import { COLUMNS } from '../types';
import type { CellValue, ColumnCoercion, ColumnCoercions, Dataset, DatasetRow, RawColumns } from '../types';
import { MalformedDatasetError } from '../utils/errors';
import { parseDateKey } from './dateWindows';

export const DEFAULT_COERCIONS: ColumnCoercions = {
  [COLUMNS.totalVehicles]: 'number',
  [COLUMNS.scheduledAt]: 'date',
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check that the payload is a column mapping and not an error report.
 */
export function assertRawColumns(input: unknown): RawColumns {
  if (!isPlainObject(input)) {
    throw new MalformedDatasetError('Expected an object mapping column names to value arrays');
  }

  if ('error' in input) {
    const upstream = typeof input.error === 'string' ? input.error : JSON.stringify(input.error);
    throw new MalformedDatasetError(`BI service reported an error: ${upstream}`, upstream);
  }

  const columns: [string, unknown[]][] = [];
  for (const [name, values] of Object.entries(input)) {
    if (!Array.isArray(values)) {
      throw new MalformedDatasetError(`Column "${name}" is not an array`);
    }
    columns.push([name, values]);
  }
  // fromEntries defines own properties, so a "__proto__" column stays a column
  return Object.fromEntries(columns);
}

/**
 * Right-pad every column with null up to the longest column.
 * Returns new arrays; the input is left untouched.
 */
export function padColumns(raw: RawColumns): Record<string, unknown[]> {
  const lengths = Object.values(raw).map(values => values.length);
  const maxLength = lengths.length > 0 ? Math.max(...lengths) : 0;

  return Object.fromEntries(
    Object.entries(raw).map(([name, values]) => [
      name,
      [...values, ...new Array<null>(maxLength - values.length).fill(null)],
    ])
  );
}

export function coerceNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

function toCell(value: unknown): CellValue {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return String(value);
  return null;
}

function coerceCell(value: unknown, coercion: ColumnCoercion | undefined): CellValue {
  switch (coercion) {
    case 'number':
      return coerceNumber(value);
    case 'date':
      return parseDateKey(value);
    default:
      return toCell(value);
  }
}

/**
 * Validate, pad and coerce a raw payload into a Dataset.
 *
 * @throws MalformedDatasetError when the payload is not a column mapping
 *
 * @example
 * normalizeDataset({ Driver: ['A', 'B'], 'Total Vehicles': ['3'] })
 * → { columns: ['Driver', 'Total Vehicles'],
 *     rows: [{ Driver: 'A', 'Total Vehicles': 3 }, { Driver: 'B', 'Total Vehicles': null }] }
 */
export function normalizeDataset(input: unknown, coercions: ColumnCoercions = DEFAULT_COERCIONS): Dataset {
  const padded = padColumns(assertRawColumns(input));
  const columns = Object.keys(padded);
  const rowCount = columns.length > 0 ? padded[columns[0]].length : 0;

  const rows: DatasetRow[] = [];
  for (let i = 0; i < rowCount; i++) {
    const row: DatasetRow = Object.fromEntries(
      columns.map(column => [column, coerceCell(padded[column][i], Object.hasOwn(coercions, column) ? coercions[column] : undefined)])
    );
    rows.push(row);
  }

  return { columns, rows };
}

export function hasColumns(dataset: Dataset, ...columns: string[]): boolean {
  return columns.every(column => dataset.columns.includes(column));
}
