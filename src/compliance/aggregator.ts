/**
 * Aggregator
 *
 * Grouped counts and sums over a normalized Dataset, plus the named views the
 * dashboard shows (per customer, hub, driver, SPOC, and the dated
 * Customer/Driver/Spoc breakdowns with a Grand Total row).
 *
 * Null key components are kept as their own "unknown" group. A key column
 * missing from the dataset yields an empty result instead of an error.
 */

import { COLUMNS, GRAND_TOTAL_LABEL } from '../types';
import type {
  AggregationKind,
  CellValue,
  Dataset,
  DateKey,
  DatePivot,
  DriverSeries,
  DriverSeriesKey,
  DriverSeriesPoint,
  GroupKey,
  GroupRow,
  PivotRow,
  SummaryRow,
  TripRecord,
} from '../types';
import { hasColumns } from './normalizer';

export const UNKNOWN_LABEL = 'Unknown';

const BREAKDOWN_KEYS = [COLUMNS.customer, COLUMNS.driver, COLUMNS.spoc];

function typeRank(value: CellValue): number {
  if (value === null) return 2;
  return typeof value === 'number' ? 0 : 1;
}

/**
 * Ascending order for cells: numbers first (numerically), then strings by
 * code units, then null.
 */
export function compareCells(a: CellValue, b: CellValue): number {
  const rank = typeRank(a) - typeRank(b);
  if (rank !== 0) return rank;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') {
    if (a < b) return -1;
    if (a > b) return 1;
  }
  return 0;
}

export function compareKeys(a: GroupKey, b: GroupKey): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const order = compareCells(a[i], b[i]);
    if (order !== 0) return order;
  }
  return a.length - b.length;
}

// JSON keeps 1 and "1" and null apart
function groupId(key: GroupKey): string {
  return JSON.stringify(key);
}

/**
 * Group rows by the key columns and count them or sum a column.
 *
 * @example
 * aggregate(trips, ['Driver'], { type: 'count' })
 * → [{ key: ['A'], value: 2 }, { key: ['B'], value: 1 }]
 */
export function aggregate(dataset: Dataset, keys: string[], kind: AggregationKind): GroupRow[] {
  if (dataset.rows.length === 0) return [];
  if (!hasColumns(dataset, ...keys)) return [];
  if (kind.type === 'sum' && !hasColumns(dataset, kind.column)) return [];

  const groups = new Map<string, GroupRow>();

  for (const row of dataset.rows) {
    const key = keys.map(column => row[column]);
    const id = groupId(key);
    let group = groups.get(id);
    if (!group) {
      group = { key, value: 0 };
      groups.set(id, group);
    }

    if (kind.type === 'count') {
      group.value += 1;
    } else {
      const cell = row[kind.column];
      if (typeof cell === 'number') group.value += cell;
    }
  }

  return [...groups.values()].sort((a, b) => compareKeys(a.key, b.key));
}

/**
 * Rows whose date column falls in the given set; rows without a date are dropped.
 */
export function filterByDates(dataset: Dataset, dates: Iterable<DateKey>, column: string = COLUMNS.scheduledAt): Dataset {
  const wanted = new Set(dates);
  return {
    columns: dataset.columns,
    rows: dataset.rows.filter(row => {
      const cell = row[column];
      return typeof cell === 'string' && wanted.has(cell);
    }),
  };
}

export function customerVehicleTotals(schedule: Dataset): GroupRow[] {
  return aggregate(schedule, [COLUMNS.customer], { type: 'sum', column: COLUMNS.totalVehicles });
}

export function hubTripCounts(trips: Dataset): GroupRow[] {
  return aggregate(trips, [COLUMNS.hub], { type: 'count' });
}

export function driverTripCounts(trips: Dataset): GroupRow[] {
  return aggregate(trips, [COLUMNS.driver], { type: 'count' });
}

export function spocTripCounts(trips: Dataset): GroupRow[] {
  return aggregate(trips, [COLUMNS.spoc], { type: 'count' });
}

function canBreakDown(trips: Dataset): boolean {
  return trips.rows.length > 0 && hasColumns(trips, ...BREAKDOWN_KEYS, COLUMNS.scheduledAt);
}

/**
 * Trip counts per (Customer, Driver, Spoc) on the given dates, followed by a
 * Grand Total row.
 */
export function customerDriverSpocCounts(trips: Dataset, dates: Iterable<DateKey>): SummaryRow[] {
  if (!canBreakDown(trips)) return [];

  const groups = aggregate(filterByDates(trips, dates), BREAKDOWN_KEYS, { type: 'count' });
  const rows: SummaryRow[] = groups.map(({ key: [customer, driver, spoc], value }) => ({
    kind: 'group',
    customer,
    driver,
    spoc,
    count: value,
  }));

  rows.push({
    kind: 'total',
    customer: GRAND_TOTAL_LABEL,
    driver: '',
    spoc: '',
    count: groups.reduce((sum, group) => sum + group.value, 0),
  });
  return rows;
}

function readTrip(row: Record<string, CellValue>): TripRecord {
  const scheduledAt = row[COLUMNS.scheduledAt];
  return {
    Customer: row[COLUMNS.customer],
    Driver: row[COLUMNS.driver],
    Hub: row[COLUMNS.hub] ?? null,
    Spoc: row[COLUMNS.spoc],
    'Scheduled At': typeof scheduledAt === 'string' ? scheduledAt : null,
  };
}

function zeroCounts(dates: DateKey[]): Record<DateKey, number> {
  return Object.fromEntries(dates.map(date => [date, 0]));
}

/**
 * Trip counts per (Customer, Driver, Spoc) with one column per window date,
 * zero-filled, plus a Grand Total row summing each date column.
 */
export function dailyPivot(trips: Dataset, window: DateKey[]): DatePivot {
  const dates = [...new Set(window)];
  if (!canBreakDown(trips)) return { dates, rows: [] };

  const groups = new Map<string, PivotRow>();

  for (const row of filterByDates(trips, dates).rows) {
    const trip = readTrip(row);
    const date = trip['Scheduled At'];
    if (date === null) continue;

    const key: GroupKey = [trip.Customer, trip.Driver, trip.Spoc];
    const id = groupId(key);
    let group = groups.get(id);
    if (!group) {
      group = { kind: 'group', customer: trip.Customer, driver: trip.Driver, spoc: trip.Spoc, counts: zeroCounts(dates) };
      groups.set(id, group);
    }
    group.counts[date] += 1;
  }

  const rows = [...groups.values()].sort((a, b) =>
    compareKeys([a.customer, a.driver, a.spoc], [b.customer, b.driver, b.spoc])
  );

  const totals = zeroCounts(dates);
  for (const row of rows) {
    for (const date of dates) totals[date] += row.counts[date];
  }
  rows.push({ kind: 'total', customer: GRAND_TOTAL_LABEL, driver: '', spoc: '', counts: totals });

  return { dates, rows };
}

export function cellLabel(value: CellValue): string {
  return value === null ? UNKNOWN_LABEL : String(value);
}

/** Property holding the driver at `index` of `DriverSeries.drivers` on each point. */
export function seriesKey(index: number): DriverSeriesKey {
  return `d${index}`;
}

/**
 * Long form of a pivot for a grouped bar chart: one point per date holding a
 * count per driver. The Grand Total row is left out.
 */
export function pivotToDriverSeries(pivot: DatePivot): DriverSeries {
  const groupRows = pivot.rows.filter(row => row.kind === 'group');
  const drivers = [...new Set(groupRows.map(row => cellLabel(row.driver)))].sort(compareCells);
  const indexByDriver = new Map(drivers.map((driver, index) => [driver, index]));

  const points = pivot.dates.map(date => {
    const point: DriverSeriesPoint = { date };
    drivers.forEach((_, index) => {
      point[seriesKey(index)] = 0;
    });
    for (const row of groupRows) {
      const key = seriesKey(indexByDriver.get(cellLabel(row.driver)) ?? 0);
      point[key] += row.counts[date];
    }
    return point;
  });

  return { drivers, points };
}
