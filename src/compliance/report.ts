import { COLUMNS } from '../types';
import type { Dataset, DateKey, DatePivot, DriverSeries, GroupRow, SummaryRow } from '../types';
import {
  customerDriverSpocCounts,
  customerVehicleTotals,
  dailyPivot,
  driverTripCounts,
  hubTripCounts,
  pivotToDriverSeries,
  spocTripCounts,
} from './aggregator';
import { findRepeatNonDeployers } from './comparator';
import { type Clock, lastNDays, systemClock, today, yesterday } from './dateWindows';

export const WEEK_LENGTH = 7;

export interface ScheduleSection {
  dataset: Dataset;
  customerTotals: GroupRow[];
}

export interface TripSection {
  dataset: Dataset;
  hubCounts: GroupRow[];
  driverCounts: GroupRow[];
  spocCounts: GroupRow[];
  hasSpocColumn: boolean;
}

export interface RepeatSection {
  date: DateKey;
  drivers: string[];
  missingColumns: string[];
}

export interface WeeklySection {
  window: DateKey[];
  pivot: DatePivot;
  series: DriverSeries;
  today: DateKey;
  todaySummary: SummaryRow[];
  missingColumns: string[];
}

export interface ComplianceReport {
  generatedOn: DateKey;
  schedule: ScheduleSection | null;
  trips: TripSection | null;
  repeatNonDeployers: RepeatSection | null;
  weekly: WeeklySection | null;
}

export function missingColumns(dataset: Dataset, required: string[]): string[] {
  return required.filter(column => !dataset.columns.includes(column));
}

/**
 * Every derived view the dashboard renders. A dataset that failed to load is
 * passed as null and its sections come back null.
 */
export function buildComplianceReport(
  schedule: Dataset | null,
  trips: Dataset | null,
  clock: Clock = systemClock
): ComplianceReport {
  const generatedOn = today(clock);

  const scheduleSection: ScheduleSection | null = schedule && {
    dataset: schedule,
    customerTotals: customerVehicleTotals(schedule),
  };

  const tripSection: TripSection | null = trips && {
    dataset: trips,
    hubCounts: hubTripCounts(trips),
    driverCounts: driverTripCounts(trips),
    spocCounts: spocTripCounts(trips),
    hasSpocColumn: trips.columns.includes(COLUMNS.spoc),
  };

  let repeatSection: RepeatSection | null = null;
  if (schedule && trips) {
    const date = yesterday(clock);
    repeatSection = {
      date,
      drivers: findRepeatNonDeployers(schedule, trips, date),
      missingColumns: [...new Set([
        ...missingColumns(schedule, [COLUMNS.driver]),
        ...missingColumns(trips, [COLUMNS.driver, COLUMNS.scheduledAt]),
      ])],
    };
  }

  let weeklySection: WeeklySection | null = null;
  if (trips) {
    const window = lastNDays(WEEK_LENGTH, clock);
    const pivot = dailyPivot(trips, window);
    weeklySection = {
      window,
      pivot,
      series: pivotToDriverSeries(pivot),
      today: generatedOn,
      todaySummary: customerDriverSpocCounts(trips, [generatedOn]),
      missingColumns: missingColumns(trips, [COLUMNS.customer, COLUMNS.driver, COLUMNS.spoc, COLUMNS.scheduledAt]),
    };
  }

  return {
    generatedOn,
    schedule: scheduleSection,
    trips: tripSection,
    repeatNonDeployers: repeatSection,
    weekly: weeklySection,
  };
}
