import { describe, it, expect } from 'vitest';
import {
  aggregate,
  compareCells,
  customerDriverSpocCounts,
  customerVehicleTotals,
  dailyPivot,
  driverTripCounts,
  filterByDates,
  hubTripCounts,
  pivotToDriverSeries,
  spocTripCounts,
} from '../aggregator';
import { normalizeDataset } from '../normalizer';

const exampleTrips = normalizeDataset({
  Driver: ['A', 'B', 'A'],
  'Scheduled At': ['2024-01-01', '2024-01-01', '2024-01-02'],
});

const schedule = normalizeDataset({
  Customer: ['Acme', 'Globex', 'Acme', 'Initech'],
  Driver: ['D1', 'D2', 'D3', 'D4'],
  'Total Vehicles': ['3', '2', '4', null],
});

const trips = normalizeDataset({
  Customer: ['Acme', 'Acme', 'Globex', 'Acme', 'Globex'],
  Driver: ['D1', 'D1', 'D2', 'D3', 'D2'],
  Hub: ['North', 'North', 'East', null, 'North'],
  Spoc: ['S1', 'S1', 'S2', 'S1', 'S2'],
  'Scheduled At': ['2024-03-01T08:00:00', '2024-03-01T12:00:00', '2024-03-01', '2024-02-29', 'bad'],
});

const empty = normalizeDataset({});

describe('Aggregator - aggregate', () => {
  it('should count trips per driver in ascending key order', () => {
    expect(aggregate(exampleTrips, ['Driver'], { type: 'count' })).toEqual([
      { key: ['A'], value: 2 },
      { key: ['B'], value: 1 },
    ]);
  });

  it('should keep null keys as their own group, sorted last', () => {
    expect(hubTripCounts(trips)).toEqual([
      { key: ['East'], value: 1 },
      { key: ['North'], value: 3 },
      { key: [null], value: 1 },
    ]);
  });

  it('should account for every input row across the groups', () => {
    const groups = aggregate(trips, ['Customer', 'Hub'], { type: 'count' });
    expect(groups.reduce((sum, group) => sum + group.value, 0)).toBe(trips.rows.length);
  });

  it('should sum a column, skipping null cells', () => {
    expect(customerVehicleTotals(schedule)).toEqual([
      { key: ['Acme'], value: 7 },
      { key: ['Globex'], value: 2 },
      { key: ['Initech'], value: 0 },
    ]);
  });

  it('should return an empty result for a missing key or sum column', () => {
    expect(aggregate(trips, ['Depot'], { type: 'count' })).toEqual([]);
    expect(aggregate(trips, ['Customer'], { type: 'sum', column: 'Total Vehicles' })).toEqual([]);
  });

  it('should return an empty result for an empty table', () => {
    expect(aggregate(empty, [], { type: 'count' })).toEqual([]);
    expect(driverTripCounts(empty)).toEqual([]);
    expect(hubTripCounts(normalizeDataset({ Hub: [] }))).toEqual([]);
  });

  it('should be idempotent', () => {
    const first = aggregate(trips, ['Customer', 'Driver'], { type: 'count' });
    const second = aggregate(trips, ['Customer', 'Driver'], { type: 'count' });
    expect(second).toEqual(first);
  });

  it('should not mutate the input dataset', () => {
    const before = JSON.stringify(trips);
    aggregate(trips, ['Driver'], { type: 'count' });
    dailyPivot(trips, ['2024-03-01']);
    expect(JSON.stringify(trips)).toBe(before);
  });
});

describe('Aggregator - named counts', () => {
  it('should count trips per driver', () => {
    expect(driverTripCounts(trips)).toEqual([
      { key: ['D1'], value: 2 },
      { key: ['D2'], value: 2 },
      { key: ['D3'], value: 1 },
    ]);
  });

  it('should count trips per SPOC', () => {
    expect(spocTripCounts(trips)).toEqual([
      { key: ['S1'], value: 3 },
      { key: ['S2'], value: 2 },
    ]);
  });

  it('should return an empty SPOC result when the column is absent', () => {
    expect(spocTripCounts(exampleTrips)).toEqual([]);
  });
});

describe('Aggregator - compareCells', () => {
  it('should compare numbers numerically and strings by code units', () => {
    expect(compareCells(2, 10)).toBeLessThan(0);
    expect(compareCells('10', '2')).toBeLessThan(0);
    expect(compareCells('B', 'a')).toBeLessThan(0);
    expect(compareCells('a', 'a')).toBe(0);
  });

  it('should put null after any value', () => {
    expect(compareCells(null, 'zzz')).toBeGreaterThan(0);
    expect(compareCells(0, null)).toBeLessThan(0);
    expect(compareCells(null, null)).toBe(0);
  });

  it('should put numbers before strings', () => {
    expect(compareCells(10, '1a')).toBeLessThan(0);
    expect(compareCells('1a', 2)).toBeGreaterThan(0);
  });
});

describe('Aggregator - mixed key types', () => {
  it('should order a number/string key column the same whatever the row order', () => {
    const orders = [
      [2, 10, '1a'],
      [10, '1a', 2],
      ['1a', 2, 10],
    ];
    for (const drivers of orders) {
      const groups = aggregate(normalizeDataset({ Driver: drivers }), ['Driver'], { type: 'count' });
      expect(groups.map(group => group.key)).toEqual([[2], [10], ['1a']]);
    }
  });
});

describe('Aggregator - filterByDates', () => {
  it('should keep rows on the given dates and drop rows without a date', () => {
    const filtered = filterByDates(trips, ['2024-02-29']);
    expect(filtered.rows.map(row => row.Driver)).toEqual(['D3']);
    expect(filtered.columns).toEqual(trips.columns);
  });
});

describe('Aggregator - customerDriverSpocCounts', () => {
  it('should count today\'s (Customer, Driver, Spoc) rows and append a Grand Total', () => {
    expect(customerDriverSpocCounts(trips, ['2024-03-01'])).toEqual([
      { kind: 'group', customer: 'Acme', driver: 'D1', spoc: 'S1', count: 2 },
      { kind: 'group', customer: 'Globex', driver: 'D2', spoc: 'S2', count: 1 },
      { kind: 'total', customer: 'Grand Total', driver: '', spoc: '', count: 3 },
    ]);
  });

  it('should return only a zero Grand Total when nothing falls on the dates', () => {
    expect(customerDriverSpocCounts(trips, ['2023-01-01'])).toEqual([
      { kind: 'total', customer: 'Grand Total', driver: '', spoc: '', count: 0 },
    ]);
  });

  it('should return an empty result for an empty table or missing columns', () => {
    expect(customerDriverSpocCounts(empty, ['2024-03-01'])).toEqual([]);
    expect(customerDriverSpocCounts(exampleTrips, ['2024-01-01'])).toEqual([]);
  });
});

describe('Aggregator - dailyPivot', () => {
  it('should pivot counts per window date with zero fill and a Grand Total row', () => {
    const pivot = dailyPivot(trips, ['2024-02-29', '2024-03-01']);

    expect(pivot.dates).toEqual(['2024-02-29', '2024-03-01']);
    expect(pivot.rows).toEqual([
      { kind: 'group', customer: 'Acme', driver: 'D1', spoc: 'S1', counts: { '2024-02-29': 0, '2024-03-01': 2 } },
      { kind: 'group', customer: 'Acme', driver: 'D3', spoc: 'S1', counts: { '2024-02-29': 1, '2024-03-01': 0 } },
      { kind: 'group', customer: 'Globex', driver: 'D2', spoc: 'S2', counts: { '2024-02-29': 0, '2024-03-01': 1 } },
      { kind: 'total', customer: 'Grand Total', driver: '', spoc: '', counts: { '2024-02-29': 1, '2024-03-01': 3 } },
    ]);
  });

  it('should exclude dates outside the window', () => {
    const pivot = dailyPivot(trips, ['2024-03-01']);
    expect(pivot.rows.map(row => row.driver)).toEqual(['D1', 'D2', '']);
  });

  it('should pivot blank customers and SPOCs like any other value', () => {
    const blank = normalizeDataset({
      Customer: ['', '', ''],
      Driver: ['A', 'B', 'A'],
      Spoc: ['', '', ''],
      'Scheduled At': ['2024-01-01', '2024-01-01', '2024-01-02'],
    });
    const pivot = dailyPivot(blank, ['2024-01-01', '2024-01-02']);

    expect(pivot.rows).toEqual([
      { kind: 'group', customer: '', driver: 'A', spoc: '', counts: { '2024-01-01': 1, '2024-01-02': 1 } },
      { kind: 'group', customer: '', driver: 'B', spoc: '', counts: { '2024-01-01': 1, '2024-01-02': 0 } },
      { kind: 'total', customer: 'Grand Total', driver: '', spoc: '', counts: { '2024-01-01': 2, '2024-01-02': 1 } },
    ]);
  });

  it('should return no rows for an empty table', () => {
    expect(dailyPivot(empty, ['2024-03-01'])).toEqual({ dates: ['2024-03-01'], rows: [] });
  });
});

describe('Aggregator - pivotToDriverSeries', () => {
  it('should sum counts per driver per date, leaving out the Grand Total', () => {
    const series = pivotToDriverSeries(dailyPivot(trips, ['2024-02-29', '2024-03-01']));

    expect(series.drivers).toEqual(['D1', 'D2', 'D3']);
    expect(series.points).toEqual([
      { date: '2024-02-29', d0: 0, d1: 0, d2: 1 },
      { date: '2024-03-01', d0: 2, d1: 1, d2: 0 },
    ]);
  });

  it('should label null drivers as Unknown', () => {
    const withUnknown = normalizeDataset({
      Customer: ['Acme'],
      Driver: [null],
      Spoc: ['S1'],
      'Scheduled At': ['2024-03-01'],
    });
    const series = pivotToDriverSeries(dailyPivot(withUnknown, ['2024-03-01']));
    expect(series).toEqual({ drivers: ['Unknown'], points: [{ date: '2024-03-01', d0: 1 }] });
  });

  it('should keep drivers named like object properties apart from the date', () => {
    const oddNames = normalizeDataset({
      Customer: ['Acme', 'Acme', 'Acme'],
      Driver: ['date', '__proto__', 'J. Smith'],
      Spoc: ['S1', 'S1', 'S1'],
      'Scheduled At': ['2024-03-01', '2024-03-01', '2024-03-01'],
    });
    const series = pivotToDriverSeries(dailyPivot(oddNames, ['2024-03-01']));

    expect(series.drivers).toEqual(['J. Smith', '__proto__', 'date']);
    expect(series.points).toEqual([{ date: '2024-03-01', d0: 1, d1: 1, d2: 1 }]);
    expect(Object.keys(series.points[0])).toEqual(['date', 'd0', 'd1', 'd2']);
  });
});
