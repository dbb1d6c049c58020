import { jsPDF } from 'jspdf';
import { formatCell, type TableSnapshot } from './tableSnapshot';

const MARGIN = 15;
const ROW_HEIGHT = 8;

export function exportTablePdf(snapshot: TableSnapshot): Blob {
  const doc = new jsPDF({ orientation: snapshot.columns.length > 6 ? 'landscape' : 'portrait' });
  const pageWidth = doc.internal.pageSize.getWidth();
  const pageHeight = doc.internal.pageSize.getHeight();
  const columnWidth = (pageWidth - MARGIN * 2) / Math.max(snapshot.columns.length, 1);
  let y = 20;

  doc.setFont('helvetica', 'bold');
  doc.setFontSize(14);
  doc.text(snapshot.title, pageWidth / 2, y, { align: 'center' });
  y += 12;

  const drawRow = (cells: string[], bold: boolean) => {
    if (y + ROW_HEIGHT > pageHeight - MARGIN) {
      doc.addPage();
      y = 20;
    }
    doc.setFont('helvetica', bold ? 'bold' : 'normal');
    doc.setFontSize(9);
    cells.forEach((text, index) => {
      const x = MARGIN + index * columnWidth;
      doc.rect(x, y, columnWidth, ROW_HEIGHT);
      const clipped = doc.splitTextToSize(text, columnWidth - 2)[0] ?? '';
      doc.text(clipped, x + columnWidth / 2, y + ROW_HEIGHT / 2 + 1.5, { align: 'center' });
    });
    y += ROW_HEIGHT;
  };

  drawRow(snapshot.columns, true);
  for (const row of snapshot.rows) {
    drawRow(row.map(formatCell), false);
  }

  return doc.output('blob');
}
