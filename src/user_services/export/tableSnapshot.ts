// Flat header + cells view of every table the dashboard shows, shared by the
// on-screen grid and the PNG/PDF exporters.

import type { CellValue, Dataset, DatePivot, GroupRow, SummaryRow } from '../../types';

export type TableSnapshot = {
  title: string;
  columns: string[];
  rows: CellValue[][];
};

export function formatCell(value: CellValue): string {
  return value === null ? '' : String(value);
}

export function datasetSnapshot(dataset: Dataset, title: string): TableSnapshot {
  return {
    title,
    columns: dataset.columns,
    rows: dataset.rows.map(row => dataset.columns.map(column => row[column] ?? null)),
  };
}

export function groupRowsSnapshot(rows: GroupRow[], keyColumns: string[], valueColumn: string, title: string): TableSnapshot {
  return {
    title,
    columns: [...keyColumns, valueColumn],
    rows: rows.map(row => [...row.key, row.value]),
  };
}

export function summarySnapshot(rows: SummaryRow[], title: string): TableSnapshot {
  return {
    title,
    columns: ['Customer', 'Driver', 'Spoc', 'Count'],
    rows: rows.map(row => [row.customer, row.driver, row.spoc, row.count]),
  };
}

export function pivotSnapshot(pivot: DatePivot, title: string): TableSnapshot {
  return {
    title,
    columns: ['Customer', 'Driver', 'Spoc', ...pivot.dates],
    rows: pivot.rows.map(row => [row.customer, row.driver, row.spoc, ...pivot.dates.map(date => row.counts[date])]),
  };
}
