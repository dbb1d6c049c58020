import { formatCell, type TableSnapshot } from './tableSnapshot';

export type MeasureText = (text: string, font: string) => number;

export interface TableLayoutOptions {
  padding: number;
  cellPadding: number;
  rowHeight: number;
  titleHeight: number;
  titleFont: string;
  headerFont: string;
  bodyFont: string;
}

export const DEFAULT_LAYOUT: TableLayoutOptions = {
  padding: 20,
  cellPadding: 12,
  rowHeight: 28,
  titleHeight: 44,
  titleFont: 'bold 14px Helvetica, Arial, sans-serif',
  headerFont: 'bold 10px Helvetica, Arial, sans-serif',
  bodyFont: '10px Helvetica, Arial, sans-serif',
};

export interface TableLayout {
  width: number;
  height: number;
  columnX: number[];
  columnWidths: number[];
  headerY: number;
  rowHeight: number;
}

/**
 * Geometry of a table image: each column as wide as its widest cell, the
 * title centred above the header row.
 */
export function layoutTable(
  snapshot: TableSnapshot,
  measure: MeasureText,
  options: TableLayoutOptions = DEFAULT_LAYOUT
): TableLayout {
  const { padding, cellPadding, rowHeight, titleHeight } = options;

  const columnWidths = snapshot.columns.map((column, index) => {
    let widest = measure(column, options.headerFont);
    for (const row of snapshot.rows) {
      widest = Math.max(widest, measure(formatCell(row[index] ?? null), options.bodyFont));
    }
    return Math.ceil(widest) + cellPadding * 2;
  });

  const columnX: number[] = [];
  let x = padding;
  for (const width of columnWidths) {
    columnX.push(x);
    x += width;
  }

  const tableWidth = x - padding;
  const titleWidth = Math.ceil(measure(snapshot.title, options.titleFont));

  return {
    width: Math.max(tableWidth, titleWidth) + padding * 2,
    height: padding * 2 + titleHeight + rowHeight * (snapshot.rows.length + 1),
    columnX,
    columnWidths,
    headerY: padding + titleHeight,
    rowHeight,
  };
}

/**
 * Draw the table on a canvas and encode it as PNG. Scale 3 gives roughly a
 * 300 dpi print at the on-screen size.
 */
export function renderTablePng(snapshot: TableSnapshot, scale = 3, options: TableLayoutOptions = DEFAULT_LAYOUT): Promise<Blob> {
  const canvas = document.createElement('canvas');
  const ctx = canvas.getContext('2d');
  if (!ctx) {
    return Promise.reject(new Error('Canvas 2D context is not available'));
  }

  const measure: MeasureText = (text, font) => {
    ctx.font = font;
    return ctx.measureText(text).width;
  };
  const layout = layoutTable(snapshot, measure, options);

  canvas.width = layout.width * scale;
  canvas.height = layout.height * scale;
  ctx.scale(scale, scale);

  ctx.fillStyle = '#ffffff';
  ctx.fillRect(0, 0, layout.width, layout.height);

  ctx.fillStyle = '#0f172a';
  ctx.textAlign = 'center';
  ctx.textBaseline = 'middle';
  ctx.font = options.titleFont;
  ctx.fillText(snapshot.title, layout.width / 2, options.padding + options.titleHeight / 2);

  const drawRow = (cells: string[], y: number, font: string, fill: string) => {
    ctx.fillStyle = fill;
    ctx.fillRect(layout.columnX[0] ?? options.padding, y, layout.columnWidths.reduce((a, b) => a + b, 0), layout.rowHeight);
    ctx.font = font;
    cells.forEach((text, index) => {
      const x = layout.columnX[index];
      const width = layout.columnWidths[index];
      ctx.strokeStyle = '#cbd5e1';
      ctx.strokeRect(x, y, width, layout.rowHeight);
      ctx.fillStyle = '#0f172a';
      ctx.fillText(text, x + width / 2, y + layout.rowHeight / 2);
    });
  };

  drawRow(snapshot.columns, layout.headerY, options.headerFont, '#f1f5f9');
  snapshot.rows.forEach((row, index) => {
    drawRow(
      row.map(formatCell),
      layout.headerY + layout.rowHeight * (index + 1),
      options.bodyFont,
      '#ffffff'
    );
  });

  return new Promise((resolve, reject) => {
    canvas.toBlob(blob => {
      if (blob) resolve(blob);
      else reject(new Error('Failed to encode table image'));
    }, 'image/png');
  });
}

export function downloadBlob(blob: Blob, filename: string) {
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = filename;
  a.click();
  URL.revokeObjectURL(url);
}
