import type { LoadResult, QuerySettings } from '../types';
import { buildComplianceReport, type ComplianceReport } from '../compliance/report';
import { type Clock, systemClock } from '../compliance/dateWindows';
import type { MetabaseClient } from './metabase';

export interface DashboardData {
  schedule: LoadResult;
  trips: LoadResult;
  report: ComplianceReport;
}

/**
 * Load both datasets and derive every report section from them.
 */
export async function loadDashboardData(
  client: MetabaseClient,
  settings: QuerySettings,
  clock: Clock = systemClock
): Promise<DashboardData> {
  const [schedule, trips] = await Promise.all([
    client.fetchTable(settings.scheduleQueryId),
    client.fetchTable(settings.tripQueryId),
  ]);

  const report = buildComplianceReport(
    schedule.status === 'ok' ? schedule.dataset : null,
    trips.status === 'ok' ? trips.dataset : null,
    clock
  );

  return { schedule, trips, report };
}
