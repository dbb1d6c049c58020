/**
 * Comparator
 *
 * Drivers who show up in today's non-deployment list (dataset 1) and also had
 * a trip without the app on the target date (dataset 2).
 */

import { COLUMNS } from '../types';
import type { Dataset, DateKey } from '../types';
import { compareCells, filterByDates } from './aggregator';
import { type Clock, systemClock, yesterday } from './dateWindows';
import { hasColumns } from './normalizer';

/**
 * Distinct non-null identifiers of a column, compared by their string form.
 */
export function distinctIdentifiers(dataset: Dataset, column: string): Set<string> {
  const ids = new Set<string>();
  for (const row of dataset.rows) {
    const cell = row[column];
    if (cell !== null && cell !== undefined) ids.add(String(cell));
  }
  return ids;
}

/**
 * Sorted intersection of two identifier sets, probing with the larger side
 * against the smaller.
 */
export function intersectIdentifiers(a: Set<string>, b: Set<string>): string[] {
  const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
  const common: string[] = [];
  for (const id of larger) {
    if (smaller.has(id)) common.push(id);
  }
  return common.sort(compareCells);
}

/**
 * @param targetDate - defaults to yesterday relative to the clock
 */
export function findRepeatNonDeployers(
  schedule: Dataset,
  trips: Dataset,
  targetDate?: DateKey,
  clock: Clock = systemClock
): string[] {
  if (!hasColumns(schedule, COLUMNS.driver)) return [];
  if (!hasColumns(trips, COLUMNS.driver, COLUMNS.scheduledAt)) return [];

  const date = targetDate ?? yesterday(clock);
  const todaysDrivers = distinctIdentifiers(schedule, COLUMNS.driver);
  const driversOnDate = distinctIdentifiers(filterByDates(trips, [date]), COLUMNS.driver);

  return intersectIdentifiers(todaysDrivers, driversOnDate);
}
