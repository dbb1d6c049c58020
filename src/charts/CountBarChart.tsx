import { useMemo } from 'react';
import { Bar, BarChart, CartesianGrid, Cell, LabelList, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import type { GroupRow } from '../types';
import type { BarChartConfig } from './types';
import { groupRowsToChartData, valueColor } from './utils';

interface CountBarChartProps {
  rows: GroupRow[];
  config: BarChartConfig;
  height?: number;
}

export default function CountBarChart({ rows, config, height = 420 }: CountBarChartProps) {
  const data = useMemo(
    () => groupRowsToChartData(rows, config.x_column, config.y_column),
    [rows, config.x_column, config.y_column]
  );

  if (data.length === 0) return null;

  const values = rows.map(row => row.value);
  const min = Math.min(...values);
  const max = Math.max(...values);

  return (
    <div className="bg-white border border-slate-200 rounded-lg p-4">
      <h4 className="text-sm font-semibold text-slate-700 mb-2">{config.title}</h4>
      <ResponsiveContainer width="100%" height={height}>
        <BarChart data={data} margin={{ top: 20, right: 20, bottom: 20, left: 0 }}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey={config.x_column} angle={-45} textAnchor="end" height={100} interval={0} />
          <YAxis allowDecimals={false} />
          <Tooltip />
          <Bar dataKey={config.y_column}>
            {rows.map((row, index) => (
              <Cell key={`cell-${index}`} fill={valueColor(row.value, min, max)} />
            ))}
            <LabelList dataKey={config.y_column} position="top" />
          </Bar>
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
}
