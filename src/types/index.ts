export type CellValue = string | number | null;

/** Calendar date as `YYYY-MM-DD`. */
export type DateKey = string;

/** Column name → column values, as returned by the BI service. */
export type RawColumns = Record<string, unknown[]>;

export type DatasetRow = Record<string, CellValue>;

export interface Dataset {
  columns: string[];
  rows: DatasetRow[];
}

export type ColumnCoercion = 'number' | 'date';

export type ColumnCoercions = Record<string, ColumnCoercion>;

export const COLUMNS = {
  customer: 'Customer',
  driver: 'Driver',
  hub: 'Hub',
  spoc: 'Spoc',
  totalVehicles: 'Total Vehicles',
  scheduledAt: 'Scheduled At',
} as const;

export const GRAND_TOTAL_LABEL = 'Grand Total';

// One trip scheduling event in the second dataset
export interface TripRecord {
  Customer: CellValue;
  Driver: CellValue;
  Hub: CellValue;
  Spoc: CellValue;
  'Scheduled At': DateKey | null;
}

export type GroupKey = CellValue[];

export interface GroupRow {
  key: GroupKey;
  value: number;
}

export type AggregationKind =
  | { type: 'count' }
  | { type: 'sum'; column: string };

export type RowKind = 'group' | 'total';

export interface SummaryRow {
  kind: RowKind;
  customer: CellValue;
  driver: CellValue;
  spoc: CellValue;
  count: number;
}

export interface PivotRow {
  kind: RowKind;
  customer: CellValue;
  driver: CellValue;
  spoc: CellValue;
  counts: Record<DateKey, number>;
}

export interface DatePivot {
  dates: DateKey[];
  rows: PivotRow[];
}

export type DriverSeriesKey = `d${number}`;

/**
 * One point per date. `d0`, `d1`, … hold the trip counts of `drivers[0]`,
 * `drivers[1]`, …; labels never become property names.
 */
export interface DriverSeriesPoint {
  date: DateKey;
  [key: DriverSeriesKey]: number;
}

export interface DriverSeries {
  drivers: string[];
  points: DriverSeriesPoint[];
}

export type LoadResult =
  | { status: 'ok'; queryId: number; dataset: Dataset }
  | { status: 'empty'; queryId: number; reason: string };

export interface QuerySettings {
  scheduleQueryId: number;
  tripQueryId: number;
}
