import { useState } from 'react';
import { FileDown, ImageDown } from 'lucide-react';
import { formatCell, type TableSnapshot } from '../user_services/export/tableSnapshot';
import { downloadBlob, renderTablePng } from '../user_services/export/tableImage';
import { exportTablePdf } from '../user_services/export/tablePdf';
import { logCaughtError } from '../utils/logger';

interface DataTableProps {
  table: TableSnapshot;
  // base name of exported files; export buttons are hidden without it
  exportName?: string;
  correlationId?: string;
  maxHeight?: number;
}

export default function DataTable({ table, exportName, correlationId = 'export', maxHeight = 420 }: DataTableProps) {
  const [isExporting, setIsExporting] = useState(false);

  if (table.columns.length === 0) {
    return null;
  }

  const handlePng = async () => {
    if (!exportName) return;
    setIsExporting(true);
    try {
      const blob = await renderTablePng(table);
      downloadBlob(blob, `${exportName}.png`);
    } catch (error) {
      logCaughtError(correlationId, 'export_png', error);
    } finally {
      setIsExporting(false);
    }
  };

  const handlePdf = () => {
    if (!exportName) return;
    try {
      downloadBlob(exportTablePdf(table), `${exportName}.pdf`);
    } catch (error) {
      logCaughtError(correlationId, 'export_pdf', error);
    }
  };

  return (
    <div className="my-4">
      <div className="flex items-center justify-between mb-3">
        <p className="text-slate-700 font-medium">
          {table.rows.length} row{table.rows.length !== 1 ? 's' : ''}
        </p>

        {exportName && (
          <div className="flex gap-2">
            <button
              onClick={handlePng}
              disabled={isExporting}
              className="flex items-center gap-1 px-3 py-1 text-xs rounded bg-slate-200 text-slate-700 hover:bg-slate-300 disabled:opacity-50"
              title="Download Table as PNG"
            >
              <ImageDown className="w-4 h-4" />
              PNG
            </button>
            <button
              onClick={handlePdf}
              className="flex items-center gap-1 px-3 py-1 text-xs rounded bg-slate-200 text-slate-700 hover:bg-slate-300"
              title="Download Table as PDF"
            >
              <FileDown className="w-4 h-4" />
              PDF
            </button>
          </div>
        )}
      </div>

      <div className="overflow-auto" style={{ maxHeight }}>
        <table className="min-w-full border border-slate-300 rounded-lg overflow-hidden">
          <thead className="bg-slate-100 sticky top-0">
            <tr>
              {table.columns.map(column => (
                <th
                  key={column}
                  className="px-4 py-2 text-left text-xs font-semibold text-slate-700 uppercase tracking-wider border-b border-slate-300"
                >
                  {column}
                </th>
              ))}
            </tr>
          </thead>
          <tbody className="bg-white divide-y divide-slate-200">
            {table.rows.map((row, rowIndex) => (
              <tr key={rowIndex} className="hover:bg-slate-50">
                {row.map((cell, cellIndex) => (
                  <td key={cellIndex} className="px-4 py-2 text-sm text-slate-900 whitespace-nowrap">
                    {cell === null ? '-' : formatCell(cell)}
                  </td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
}
