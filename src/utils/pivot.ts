/**
 * Pivot aggregation: sparse (entity, bucket, count) triples to a dense grid.
 *
 * Pass one collects the ordered-unique keys of each axis, pass two fills the
 * grid. Cells without a triple are 0; triples sharing an (entity, bucket)
 * pair are summed, never overwritten.
 */

import type { KeyOrder, PivotGrid, PivotOptions, PivotTriple } from '../types';
import { ReportDataError } from './errorUtils';

const compareKeys = (a: string, b: string): number => a.localeCompare(b, 'en', { numeric: true });

export function orderKeys(keys: Iterable<string>, order: KeyOrder): string[] {
  // Set keeps first-seen order
  const unique = Array.from(new Set(keys));
  return order === 'sorted' ? unique.sort(compareKeys) : unique;
}

export function pivotTriples(triples: readonly PivotTriple[], options: PivotOptions = {}): PivotGrid {
  const { rowAxis = 'bucket', rowOrder = 'sorted', columnOrder = 'first-seen' } = options;

  const rowOf = (triple: PivotTriple): string => (rowAxis === 'bucket' ? triple.bucket : triple.entity);
  const columnOf = (triple: PivotTriple): string => (rowAxis === 'bucket' ? triple.entity : triple.bucket);

  for (const triple of triples) {
    if (!Number.isFinite(triple.count)) {
      throw new ReportDataError(
        `Count for ${triple.entity} / ${triple.bucket} is not a finite number: ${triple.count}`
      );
    }
  }

  const rowKeys = orderKeys(triples.map(rowOf), rowOrder);
  const columnKeys = orderKeys(triples.map(columnOf), columnOrder);

  const rowIndex = new Map(rowKeys.map((key, index) => [key, index]));
  const columnIndex = new Map(columnKeys.map((key, index) => [key, index]));
  const values = rowKeys.map(() => columnKeys.map(() => 0));

  for (const triple of triples) {
    const row = rowIndex.get(rowOf(triple));
    const column = columnIndex.get(columnOf(triple));
    if (row === undefined || column === undefined) {
      continue;
    }
    values[row][column] += triple.count;
  }

  return freezeGrid({ rowKeys, columnKeys, values });
}

function freezeGrid(grid: { rowKeys: string[]; columnKeys: string[]; values: number[][] }): PivotGrid {
  return Object.freeze({
    rowKeys: Object.freeze(grid.rowKeys),
    columnKeys: Object.freeze(grid.columnKeys),
    values: Object.freeze(grid.values.map(row => Object.freeze(row))),
  });
}

/**
 * Cell value; 0 for any pair of observed keys, undefined only for keys the grid never saw
 */
export function getCell(grid: PivotGrid, rowKey: string, columnKey: string): number | undefined {
  const row = grid.rowKeys.indexOf(rowKey);
  const column = grid.columnKeys.indexOf(columnKey);
  if (row === -1 || column === -1) {
    return undefined;
  }
  return grid.values[row][column];
}

export function rowTotals(grid: PivotGrid): number[] {
  return grid.values.map(row => row.reduce((sum, value) => sum + value, 0));
}

export function columnTotals(grid: PivotGrid): number[] {
  return grid.columnKeys.map((_, column) =>
    grid.values.reduce((sum, row) => sum + row[column], 0)
  );
}

export function gridTotal(grid: PivotGrid): number {
  return rowTotals(grid).reduce((sum, value) => sum + value, 0);
}

// Swap rows and columns, e.g. months-by-engineer into engineers-by-month
export function transposeGrid(grid: PivotGrid): PivotGrid {
  return freezeGrid({
    rowKeys: [...grid.columnKeys],
    columnKeys: [...grid.rowKeys],
    values: grid.columnKeys.map((_, column) => grid.values.map(row => row[column])),
  });
}
