import type { GroupRow } from '../types';
import { cellLabel } from '../compliance/aggregator';
import type { ChartData } from './types';

// Plotly's default continuous scale (Plasma), low → high
export const VALUE_SCALE = [
  '#0d0887', '#46039f', '#7201a8', '#9c179e', '#bd3786',
  '#d8576b', '#ed7953', '#fb9f3a', '#fdca26', '#f0f921',
];

export const SERIES_COLORS = ['#2563EB', '#10B981', '#F59E0B', '#EF4444', '#8B5CF6', '#06B6D4', '#F97316', '#EC4899'];

export function pickColor(i: number, palette: string[] = SERIES_COLORS): string {
  return palette[i % palette.length];
}

function hexToRgb(hex: string): [number, number, number] {
  const n = parseInt(hex.slice(1), 16);
  return [(n >> 16) & 255, (n >> 8) & 255, n & 255];
}

function rgbToHex([r, g, b]: [number, number, number]): string {
  return '#' + [r, g, b].map(c => Math.round(c).toString(16).padStart(2, '0')).join('');
}

/**
 * Colour for a value on the continuous scale spanning [min, max].
 */
export function valueColor(value: number, min: number, max: number, scale: string[] = VALUE_SCALE): string {
  if (max <= min) return scale[0];
  const t = Math.min(1, Math.max(0, (value - min) / (max - min)));
  const position = t * (scale.length - 1);
  const lower = Math.floor(position);
  const upper = Math.min(lower + 1, scale.length - 1);
  const fraction = position - lower;
  if (fraction === 0) return scale[lower];

  const from = hexToRgb(scale[lower]);
  const to = hexToRgb(scale[upper]);
  return rgbToHex([
    from[0] + (to[0] - from[0]) * fraction,
    from[1] + (to[1] - from[1]) * fraction,
    from[2] + (to[2] - from[2]) * fraction,
  ]);
}

/**
 * Grouped rows → bar chart rows. Multi-part keys are joined with " / ".
 *
 * @example
 * groupRowsToChartData([{ key: ['North'], value: 4 }], 'Hub', 'Trip Count')
 * → [{ Hub: 'North', 'Trip Count': 4 }]
 */
export function groupRowsToChartData(rows: GroupRow[], labelKey: string, valueKey: string): ChartData {
  return rows.map(row => ({
    [labelKey]: row.key.map(cellLabel).join(' / '),
    [valueKey]: row.value,
  }));
}
