/**
 * Calendar helpers for the "today", "yesterday" and "last N days" views.
 * Every function that needs the current date takes a Clock so tests can pin it.
 */

import { format, isValid, parseISO, subDays } from 'date-fns';
import type { DateKey } from '../types';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const DATE_KEY_FORMAT = 'yyyy-MM-dd';
const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})(?:$|[T\s])/;

export function toDateKey(date: Date): DateKey {
  return format(date, DATE_KEY_FORMAT);
}

export function today(clock: Clock = systemClock): DateKey {
  return toDateKey(clock());
}

export function yesterday(clock: Clock = systemClock): DateKey {
  return toDateKey(subDays(clock(), 1));
}

/**
 * The n calendar days ending today, oldest first.
 *
 * @example
 * lastNDays(3, () => new Date(2024, 0, 3)) → ['2024-01-01', '2024-01-02', '2024-01-03']
 */
export function lastNDays(n: number, clock: Clock = systemClock): DateKey[] {
  const now = clock();
  const days: DateKey[] = [];
  for (let offset = n - 1; offset >= 0; offset--) {
    days.push(toDateKey(subDays(now, offset)));
  }
  return days;
}

/**
 * Best-effort conversion of a timestamp cell to a calendar date.
 *
 * ISO-looking strings keep their own wall-clock date, whatever offset follows.
 * Anything else goes through the runtime parser and is read in local time.
 * Returns null when the value cannot be read as a date.
 */
export function parseDateKey(value: unknown): DateKey | null {
  if (value instanceof Date) {
    return isValid(value) ? toDateKey(value) : null;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const fromEpoch = new Date(value);
    return isValid(fromEpoch) ? toDateKey(fromEpoch) : null;
  }

  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (!trimmed) return null;

  const isoMatch = trimmed.match(ISO_DATE_PREFIX);
  if (isoMatch) {
    return isValid(parseISO(isoMatch[1])) ? isoMatch[1] : null;
  }

  const parsed = new Date(trimmed);
  return isValid(parsed) ? toDateKey(parsed) : null;
}
