// Export utilities for pivot grids (CSV text and Excel workbooks)
import { promises as fs } from 'node:fs';
import path from 'node:path';
import * as XLSX from 'xlsx';
import type { PivotGrid } from '../types';
import { OutputWriteError } from './errorUtils';
import { rowTotals } from './pivot';

export interface PivotExportOptions {
  // Header of the first column, e.g. "YearMonth" or "Engineer"
  rowHeader?: string;
  sheetName?: string;
  includeTotals?: boolean;
}

/**
 * Header row plus one row per grid row; row key first, then one cell per column key
 */
export function pivotToRows(grid: PivotGrid, options: PivotExportOptions = {}): (string | number)[][] {
  const { rowHeader = '', includeTotals = false } = options;
  const totals = rowTotals(grid);
  const header: string[] = [rowHeader, ...grid.columnKeys, ...(includeTotals ? ['Total'] : [])];
  const body = grid.rowKeys.map((key, row) => [
    key,
    ...grid.values[row],
    ...(includeTotals ? [totals[row]] : []),
  ]);
  return [header, ...body];
}

const escapeCsv = (value: string | number): string => {
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export function pivotToCsv(grid: PivotGrid, options: PivotExportOptions = {}): string {
  return pivotToRows(grid, options)
    .map(row => row.map(escapeCsv).join(','))
    .join('\n') + '\n';
}

export function pivotToWorkbook(grid: PivotGrid, options: PivotExportOptions = {}): XLSX.WorkBook {
  const { sheetName = 'Pivot' } = options;
  const rows = pivotToRows(grid, options);
  const workbook = XLSX.utils.book_new();
  const worksheet = XLSX.utils.aoa_to_sheet(rows);

  // First column holds the row keys, the rest are counts
  const keyWidth = Math.max(12, ...grid.rowKeys.map(key => key.length + 2));
  worksheet['!cols'] = [{ wch: keyWidth }, ...rows[0].slice(1).map(() => ({ wch: 16 }))];

  XLSX.utils.book_append_sheet(workbook, worksheet, sheetName);
  return workbook;
}

/**
 * Write the grid as a one-sheet .xlsx file
 */
export async function exportPivotToWorkbook(
  grid: PivotGrid,
  outputPath: string,
  options: PivotExportOptions = {}
): Promise<void> {
  const workbook = pivotToWorkbook(grid, options);
  try {
    const buffer: Buffer = XLSX.write(workbook, { bookType: 'xlsx', type: 'buffer' });
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, buffer);
  } catch (error) {
    throw new OutputWriteError(outputPath, error);
  }
}
