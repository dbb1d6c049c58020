export type ChartRow = Record<string, string | number | null>;

export type ChartData = ChartRow[];

export interface BarChartConfig {
  title: string;
  x_column: string;
  y_column: string;
}
