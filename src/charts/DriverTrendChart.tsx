import { Bar, BarChart, CartesianGrid, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import type { DriverSeries } from '../types';
import { seriesKey } from '../compliance/aggregator';
import { pickColor } from './utils';

interface DriverTrendChartProps {
  series: DriverSeries;
  title: string;
  height?: number;
}

export default function DriverTrendChart({ series, title, height = 500 }: DriverTrendChartProps) {
  if (series.drivers.length === 0) return null;

  return (
    <div className="bg-white border border-slate-200 rounded-lg p-4">
      <h4 className="text-sm font-semibold text-slate-700 mb-2">{title}</h4>
      <ResponsiveContainer width="100%" height={height}>
        <BarChart data={series.points}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="date" label={{ value: 'Scheduled Date', position: 'insideBottom', offset: -5 }} />
          <YAxis allowDecimals={false} label={{ value: 'Number of Assignments', angle: -90, position: 'insideLeft' }} />
          <Tooltip />
          <Legend verticalAlign="top" />
          {series.drivers.map((driver, index) => (
            <Bar key={seriesKey(index)} dataKey={seriesKey(index)} name={driver} fill={pickColor(index)} />
          ))}
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
}
