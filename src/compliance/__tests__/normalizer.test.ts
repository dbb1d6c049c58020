import { describe, it, expect } from 'vitest';
import { assertRawColumns, coerceNumber, hasColumns, normalizeDataset, padColumns } from '../normalizer';
import { MalformedDatasetError } from '../../utils/errors';

describe('Normalizer - padColumns', () => {
  it('should right-pad shorter columns with null', () => {
    const padded = padColumns({ Driver: ['A', 'B', 'C'], Hub: ['North'] });
    expect(padded).toEqual({ Driver: ['A', 'B', 'C'], Hub: ['North', null, null] });
  });

  it('should give every column the max length (cells = columns × max length)', () => {
    const raw = { a: [1], b: [1, 2, 3, 4], c: [], d: [1, 2] };
    const padded = padColumns(raw);
    const lengths = Object.values(padded).map(values => values.length);
    expect(lengths).toEqual([4, 4, 4, 4]);
    expect(lengths.reduce((sum, n) => sum + n, 0)).toBe(4 * 4);
  });

  it('should not mutate the input arrays', () => {
    const hub = ['North'];
    padColumns({ Driver: ['A', 'B'], Hub: hub });
    expect(hub).toEqual(['North']);
  });

  it('should handle an empty mapping', () => {
    expect(padColumns({})).toEqual({});
  });
});

describe('Normalizer - assertRawColumns', () => {
  it('should reject arrays, primitives and null', () => {
    expect(() => assertRawColumns([])).toThrow(MalformedDatasetError);
    expect(() => assertRawColumns('rows')).toThrow(MalformedDatasetError);
    expect(() => assertRawColumns(null)).toThrow(MalformedDatasetError);
    expect(() => assertRawColumns(42)).toThrow(MalformedDatasetError);
  });

  it('should reject a column that is not an array', () => {
    expect(() => assertRawColumns({ Driver: ['A'], Hub: 'North' })).toThrow('Column "Hub" is not an array');
  });

  it('should surface the upstream error message', () => {
    try {
      assertRawColumns({ error: 'Card 3021 not found' });
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedDatasetError);
      if (error instanceof MalformedDatasetError) {
        expect(error.code).toBe('MALFORMED_DATASET');
        expect(error.upstreamError).toBe('Card 3021 not found');
        expect(error.message).toBe('BI service reported an error: Card 3021 not found');
      }
    }
  });
});

describe('Normalizer - reserved column names', () => {
  it('should keep a parsed "__proto__" key as an ordinary column', () => {
    const dataset = normalizeDataset(JSON.parse('{"__proto__": ["x"], "Driver": ["D1"]}'));

    expect(dataset.columns).toEqual(['__proto__', 'Driver']);
    expect(Object.keys(dataset.rows[0])).toEqual(['__proto__', 'Driver']);
    expect(Object.getOwnPropertyDescriptor(dataset.rows[0], '__proto__')?.value).toBe('x');
    expect(Object.getPrototypeOf(dataset.rows[0])).toBe(Object.prototype);
  });

  it('should not coerce columns named like Object.prototype members', () => {
    const dataset = normalizeDataset({ constructor: ['7'], toString: ['8'] });
    expect(dataset.rows).toEqual([{ constructor: '7', toString: '8' }]);
  });
});

describe('Normalizer - coerceNumber', () => {
  it('should parse numbers and numeric strings', () => {
    expect(coerceNumber(5)).toBe(5);
    expect(coerceNumber(' 12 ')).toBe(12);
    expect(coerceNumber('3.5')).toBe(3.5);
  });

  it('should return null for anything unparsable', () => {
    expect(coerceNumber('')).toBeNull();
    expect(coerceNumber('abc')).toBeNull();
    expect(coerceNumber(null)).toBeNull();
    expect(coerceNumber(Number.NaN)).toBeNull();
    expect(coerceNumber(true)).toBeNull();
  });
});

describe('Normalizer - normalizeDataset', () => {
  it('should pad, then coerce Total Vehicles and Scheduled At', () => {
    const dataset = normalizeDataset({
      Customer: ['Acme', 'Globex', 'Initech'],
      'Total Vehicles': ['4', 'n/a'],
      'Scheduled At': ['2024-01-01T09:15:00Z', 'not a date', '2024-01-03'],
    });

    expect(dataset.columns).toEqual(['Customer', 'Total Vehicles', 'Scheduled At']);
    expect(dataset.rows).toEqual([
      { Customer: 'Acme', 'Total Vehicles': 4, 'Scheduled At': '2024-01-01' },
      { Customer: 'Globex', 'Total Vehicles': null, 'Scheduled At': null },
      { Customer: 'Initech', 'Total Vehicles': null, 'Scheduled At': '2024-01-03' },
    ]);
  });

  it('should keep strings and numbers, stringify booleans and null out objects', () => {
    const dataset = normalizeDataset({ Driver: ['A', 7, true, { id: 1 }, undefined] });
    expect(dataset.rows.map(row => row.Driver)).toEqual(['A', 7, 'true', null, null]);
  });

  it('should return an empty dataset for an empty mapping', () => {
    expect(normalizeDataset({})).toEqual({ columns: [], rows: [] });
  });

  it('should keep columns with no values', () => {
    const dataset = normalizeDataset({ Driver: [], Hub: [] });
    expect(dataset).toEqual({ columns: ['Driver', 'Hub'], rows: [] });
  });

  it('should honour custom coercions', () => {
    const dataset = normalizeDataset({ Trips: ['2', '3'] }, { Trips: 'number' });
    expect(dataset.rows).toEqual([{ Trips: 2 }, { Trips: 3 }]);
  });

  it('should throw MalformedDatasetError for an error payload', () => {
    expect(() => normalizeDataset({ error: 'Query timed out' })).toThrow(MalformedDatasetError);
  });
});

describe('Normalizer - hasColumns', () => {
  it('should report whether every named column exists', () => {
    const dataset = normalizeDataset({ Driver: ['A'], Hub: ['North'] });
    expect(hasColumns(dataset, 'Driver', 'Hub')).toBe(true);
    expect(hasColumns(dataset, 'Driver', 'Spoc')).toBe(false);
  });
});
