import { COLUMNS } from '../types';
import type { LoadResult } from '../types';
import type { ComplianceReport } from '../compliance/report';
import CountBarChart from '../charts/CountBarChart';
import DriverTrendChart from '../charts/DriverTrendChart';
import {
  datasetSnapshot,
  groupRowsSnapshot,
  pivotSnapshot,
  summarySnapshot,
} from '../user_services/export/tableSnapshot';
import DataTable from './DataTable';
import Notice from './Notice';
import Section from './Section';

interface DashboardProps {
  schedule: LoadResult;
  trips: LoadResult;
  report: ComplianceReport;
  correlationId: string;
}

function quoteColumns(columns: string[]): string {
  return columns.map(column => `'${column}'`).join(', ');
}

export default function Dashboard({ schedule, trips, report, correlationId }: DashboardProps) {
  const { repeatNonDeployers, weekly } = report;

  return (
    <div>
      <Section title="App Not Deployed - Real Time Data">
        {report.schedule ? (
          <>
            <DataTable
              table={datasetSnapshot(report.schedule.dataset, 'App Not Deployed - Real Time Data')}
              exportName="app_not_deployed_real_time_data"
              correlationId={correlationId}
            />
            <h3 className="text-lg font-medium text-slate-800">Customer-wise count of "Not App Deployed" for today</h3>
            {report.schedule.customerTotals.length > 0 ? (
              <CountBarChart
                rows={report.schedule.customerTotals}
                config={{ title: 'Total Vehicle Count per Customer', x_column: COLUMNS.customer, y_column: COLUMNS.totalVehicles }}
              />
            ) : (
              <Notice tone="warning">No customer totals: the dataset needs 'Customer' and 'Total Vehicles' columns with data.</Notice>
            )}
          </>
        ) : (
          <Notice tone="warning">
            No data found for Query ID {schedule.queryId}.
            {schedule.status === 'empty' && <span className="block text-xs mt-1">{schedule.reason}</span>}
          </Notice>
        )}
      </Section>

      <Section title={'Current month\'s raw data for "App Not Deployed"'}>
        {report.trips ? (
          <>
            <DataTable
              table={datasetSnapshot(report.trips.dataset, 'Current month - App Not Deployed')}
              exportName="app_not_deployed_current_month"
              correlationId={correlationId}
            />

            <h3 className="text-lg font-medium text-slate-800">Number of Trips per Hub</h3>
            <CountBarChart rows={report.trips.hubCounts} config={{ title: 'Trips per Hub', x_column: COLUMNS.hub, y_column: 'Trip Count' }} />

            <h3 className="text-lg font-medium text-slate-800">Driver-wise Trip Count for "App Not Deployed" in the Current Month</h3>
            <DataTable table={groupRowsSnapshot(report.trips.driverCounts, [COLUMNS.driver], 'Total Trips', 'Trips per Driver')} />
            <CountBarChart rows={report.trips.driverCounts} config={{ title: 'Trips per Driver', x_column: COLUMNS.driver, y_column: 'Total Trips' }} />

            <h3 className="text-lg font-medium text-slate-800">SPOC-wise Trip Count "App Not Deployed" in the Current Month</h3>
            {report.trips.hasSpocColumn ? (
              <>
                <DataTable table={groupRowsSnapshot(report.trips.spocCounts, [COLUMNS.spoc], 'Total Trips', 'Trips per SPOC')} />
                <CountBarChart rows={report.trips.spocCounts} config={{ title: 'Trips per SPOC', x_column: COLUMNS.spoc, y_column: 'Total Trips' }} />
              </>
            ) : (
              <Notice tone="warning">No 'Spoc' column found in the dataset.</Notice>
            )}
          </>
        ) : (
          <Notice tone="warning">
            No data found for Query ID {trips.queryId}.
            {trips.status === 'empty' && <span className="block text-xs mt-1">{trips.reason}</span>}
          </Notice>
        )}
      </Section>

      {repeatNonDeployers && (
        <Section title="Drivers who have not deployed the app yesterday and today" subtitle={`Yesterday: ${repeatNonDeployers.date}`}>
          {repeatNonDeployers.missingColumns.length > 0 ? (
            <Notice tone="warning">Column(s) {quoteColumns(repeatNonDeployers.missingColumns)} not found in one of the datasets.</Notice>
          ) : repeatNonDeployers.drivers.length > 0 ? (
            <ul className="list-disc pl-6 text-sm text-slate-800">
              {repeatNonDeployers.drivers.map(driver => <li key={driver}>{driver}</li>)}
            </ul>
          ) : (
            <Notice tone="warning">No matching drivers found for yesterday's data.</Notice>
          )}
        </Section>
      )}

      {weekly && (
        weekly.missingColumns.length > 0 ? (
          <Notice tone="warning">Required columns ({quoteColumns(weekly.missingColumns)}) not found in dataset.</Notice>
        ) : (
          <>
            <Section
              title="Drivers who have not deployed the app in the last 7 days"
              subtitle={`${weekly.window[0]} to ${weekly.window[weekly.window.length - 1]}`}
            >
              <DataTable
                table={pivotSnapshot(weekly.pivot, 'Drivers who have not deployed the app in the last 7 days')}
                exportName="app_not_deployed_last_7_days"
                correlationId={correlationId}
              />
              <DriverTrendChart series={weekly.series} title="Driver Schedule Count Over the Last 7 Days" />
            </Section>

            <Section title="Drivers who have not deployed the app today after trip completion" subtitle={weekly.today}>
              <DataTable
                table={summarySnapshot(weekly.todaySummary, 'Drivers who have not deployed the app today')}
                exportName="app_not_deployed_today"
                correlationId={correlationId}
              />
            </Section>
          </>
        )
      )}
    </div>
  );
}
