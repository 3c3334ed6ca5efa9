/**
 * Bar chart directives built from pivot grids
 */

import { AGE_BAR_COLOUR, TAB20_PALETTE } from '../constants';
import type {
  AgeSummary,
  BarChartDirective,
  BarMode,
  BarSegment,
  BarSeries,
  Orientation,
  PivotGrid,
  RenderResult,
  RenderSurface,
} from '../types';
import { assignColors } from '../utils/palette';

export interface BarChartOptions {
  mode: BarMode;
  orientation?: Orientation;
  title: string;
  xLabel: string;
  yLabel: string;
  legendTitle?: string;
  palette?: readonly string[];
}

/**
 * One series per grid column, values aligned with the grid rows.
 *
 * Stacked: each row is one bar and a series' segment starts where the
 * previous series ended, so a row's segments add up to the row total.
 * Grouped: every segment starts at 0 and the surface places series side by side.
 * Zero cells stay in the output as zero-height segments.
 */
export function buildBarChart(grid: PivotGrid, options: BarChartOptions): BarChartDirective {
  const { mode, orientation = 'vertical', palette = TAB20_PALETTE } = options;
  const colors = assignColors(grid.columnKeys, palette);
  const offsets = grid.rowKeys.map(() => 0);

  const series: BarSeries[] = grid.columnKeys.map((key, column) => {
    const values = grid.values.map(row => row[column]);
    const segments: BarSegment[] = values.map((value, row) => {
      if (mode === 'grouped') {
        return { start: 0, end: value };
      }
      const start = offsets[row];
      offsets[row] = start + value;
      return { start, end: start + value };
    });
    return {
      name: key,
      color: colors.get(key) ?? palette[0],
      values,
      segments,
    };
  });

  return {
    kind: 'bar',
    mode,
    orientation,
    title: options.title,
    xLabel: options.xLabel,
    yLabel: options.yLabel,
    legendTitle: options.legendTitle,
    categories: [...grid.rowKeys],
    series,
  };
}

export async function renderBarChart(
  surface: RenderSurface,
  grid: PivotGrid,
  options: BarChartOptions,
  outputPath: string
): Promise<RenderResult> {
  return surface.render(buildBarChart(grid, options), outputPath);
}

// Stacked resolved items: months along the x axis, one colour per engineer
export function resolvedPerMonthChart(grid: PivotGrid, mode: BarMode): BarChartDirective {
  return buildBarChart(grid, {
    mode,
    orientation: 'vertical',
    title: mode === 'stacked'
      ? 'Resolved Items Per Month by Engineer'
      : 'Resolved Items Per Month by Engineer (Grouped)',
    xLabel: 'Month',
    yLabel: 'Number of Resolved Items',
    legendTitle: 'Engineer',
  });
}

// Expects an engineer-by-month grid (see transposeGrid)
export function resolvedPerEngineerChart(grid: PivotGrid): BarChartDirective {
  return buildBarChart(grid, {
    mode: 'grouped',
    orientation: 'vertical',
    title: 'Resolved Items Per Engineer by Month (Grouped)',
    xLabel: 'Engineer',
    yLabel: 'Number of Resolved Items',
    legendTitle: 'Month',
  });
}

/**
 * Horizontal single-series chart of open ticket age per assignee.
 * Rows keep summary order and the axis is inverted so the first (oldest) is on top.
 */
export function buildAgeBarChart(summaries: readonly AgeSummary[]): BarChartDirective {
  const values = summaries.map(s => s.ageBusinessDays);
  return {
    kind: 'bar',
    mode: 'grouped',
    orientation: 'horizontal',
    title: 'Total Age of Open Tickets by Assigned Person',
    xLabel: 'Total Age in Business Days',
    yLabel: 'Assigned To',
    categories: summaries.map(s => s.assignedTo),
    invertCategoryAxis: true,
    series: [
      {
        name: 'Age',
        color: AGE_BAR_COLOUR,
        values,
        segments: values.map(value => ({ start: 0, end: value })),
        labels: summaries.map(s => `${s.ticketCount} tickets`),
      },
    ],
  };
}
