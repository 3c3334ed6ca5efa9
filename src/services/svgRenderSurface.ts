/**
 * SVG rendering surface
 *
 * Lays chart directives out with d3 scales and writes them as standalone SVG
 * files. Layout follows the familiar report look: title on top, axis labels,
 * a light grid and the legend outside the plot area on the right.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { scaleBand, scaleLinear } from 'd3-scale';
import type { ScaleBand, ScaleLinear } from 'd3-scale';
import type {
  BarChartDirective,
  ChartDirective,
  RenderResult,
  RenderSurface,
  ScatterChartDirective,
} from '../types';
import { OutputWriteError } from '../utils/errorUtils';
import { logger } from '../utils/logger';
import { element, svgDocument, text } from '../utils/svg';

const LOG_CONTEXT = 'SvgRenderSurface';

export interface ChartSize {
  width: number;
  height: number;
}

interface Margins {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

interface LegendItem {
  name: string;
  color: string;
}

export const SCATTER_SIZE: ChartSize = { width: 1400, height: 1000 };
export const BAR_SIZE: ChartSize = { width: 1000, height: 700 };

const MARGINS: Margins = { top: 60, right: 200, bottom: 70, left: 90 };
const GRID_COLOUR = '#dddddd';
const AXIS_COLOUR = '#333333';
const TICK_COUNT = 6;
const POINT_RADIUS = 7;

const formatTick = (value: number): string =>
  Number.isInteger(value) ? String(value) : value.toFixed(1);

function renderTitle(title: string, size: ChartSize): string {
  return text(title, { x: size.width / 2, y: 32, 'text-anchor': 'middle', 'font-size': 20 });
}

function renderAxisLabels(xLabel: string, yLabel: string, size: ChartSize, margins: Margins): string[] {
  const plotMidX = margins.left + (size.width - margins.left - margins.right) / 2;
  const plotMidY = margins.top + (size.height - margins.top - margins.bottom) / 2;
  return [
    text(xLabel, { x: plotMidX, y: size.height - 20, 'text-anchor': 'middle', 'font-size': 14 }),
    text(yLabel, {
      x: 0,
      y: 0,
      transform: `translate(24, ${plotMidY}) rotate(-90)`,
      'text-anchor': 'middle',
      'font-size': 14,
    }),
  ];
}

function renderLegend(items: LegendItem[], title: string | undefined, size: ChartSize, margins: Margins): string {
  const x = size.width - margins.right + 24;
  let y = margins.top;
  const children: string[] = [];
  if (title) {
    children.push(text(title, { x, y, 'font-size': 13, 'font-weight': 'bold' }));
    y += 20;
  }
  for (const item of items) {
    children.push(element('rect', { x, y: y - 11, width: 14, height: 14, fill: item.color }));
    children.push(text(item.name, { x: x + 22, y, 'font-size': 12 }));
    y += 22;
  }
  return element('g', { class: 'legend' }, children);
}

// Horizontal grid lines and tick labels for a value axis running bottom to top
function renderVerticalValueAxis(scale: ScaleLinear<number, number>, left: number, right: number): string[] {
  return scale.ticks(TICK_COUNT).flatMap(tick => [
    element('line', { x1: left, x2: right, y1: scale(tick), y2: scale(tick), stroke: GRID_COLOUR }),
    text(formatTick(tick), { x: left - 8, y: scale(tick) + 4, 'text-anchor': 'end', 'font-size': 12 }),
  ]);
}

// Vertical grid lines and tick labels for a value axis running left to right
function renderHorizontalValueAxis(scale: ScaleLinear<number, number>, top: number, bottom: number): string[] {
  return scale.ticks(TICK_COUNT).flatMap(tick => [
    element('line', { x1: scale(tick), x2: scale(tick), y1: top, y2: bottom, stroke: GRID_COLOUR }),
    text(formatTick(tick), { x: scale(tick), y: bottom + 18, 'text-anchor': 'middle', 'font-size': 12 }),
  ]);
}

function renderFrame(margins: Margins, size: ChartSize): string {
  return element('rect', {
    x: margins.left,
    y: margins.top,
    width: size.width - margins.left - margins.right,
    height: size.height - margins.top - margins.bottom,
    fill: 'none',
    stroke: AXIS_COLOUR,
  });
}

export function renderScatterSvg(directive: ScatterChartDirective, size: ChartSize = SCATTER_SIZE): string {
  const margins = MARGINS;
  const allPoints = directive.series.flatMap(s => s.points);
  const xs = allPoints.map(p => p.x);
  const ys = allPoints.map(p => p.y);

  // Ranks run 1-5; pad so jittered points never sit on the frame
  const x = scaleLinear()
    .domain([Math.min(1, ...xs) - 0.5, Math.max(5, ...xs) + 0.5])
    .range([margins.left, size.width - margins.right]);
  const y = scaleLinear()
    .domain([Math.min(1, ...ys) - 0.5, Math.max(5, ...ys) + 0.5])
    .range([size.height - margins.bottom, margins.top]);

  const points = directive.series.flatMap(series =>
    series.points.map(point =>
      element('circle', {
        cx: x(point.x),
        cy: y(point.y),
        r: POINT_RADIUS,
        fill: series.color,
        'fill-opacity': 0.6,
        'data-series': series.name,
      })
    )
  );

  return svgDocument(size.width, size.height, [
    renderTitle(directive.title, size),
    ...renderVerticalValueAxis(y, margins.left, size.width - margins.right),
    ...renderHorizontalValueAxis(x, margins.top, size.height - margins.bottom),
    renderFrame(margins, size),
    element('g', { class: 'points' }, points),
    ...renderAxisLabels(directive.xLabel, directive.yLabel, size, margins),
    renderLegend(directive.series, directive.legendTitle, size, margins),
  ]);
}

function maxBarExtent(directive: BarChartDirective): number {
  const ends = directive.series.flatMap(s => s.segments.map(segment => segment.end));
  return Math.max(1, ...ends);
}

interface BarLayout {
  category: ScaleBand<string>;
  group: ScaleBand<string>;
  value: ScaleLinear<number, number>;
}

function layoutBars(directive: BarChartDirective, size: ChartSize, margins: Margins): BarLayout {
  const vertical = directive.orientation === 'vertical';
  const categoryRange: [number, number] = vertical
    ? [margins.left, size.width - margins.right]
    : directive.invertCategoryAxis
      ? [margins.top, size.height - margins.bottom]
      : [size.height - margins.bottom, margins.top];

  const category = scaleBand<string>()
    .domain(directive.categories)
    .range(categoryRange)
    .paddingInner(0.2)
    .paddingOuter(0.1);

  const group = scaleBand<string>()
    .domain(directive.mode === 'grouped' ? directive.series.map(s => s.name) : ['stack'])
    .range([0, category.bandwidth()])
    .paddingInner(0.05);

  const value = scaleLinear()
    .domain([0, maxBarExtent(directive)])
    .nice()
    .range(vertical ? [size.height - margins.bottom, margins.top] : [margins.left, size.width - margins.right]);

  return { category, group, value };
}

export function renderBarSvg(directive: BarChartDirective, size: ChartSize = BAR_SIZE): string {
  const margins = MARGINS;
  const vertical = directive.orientation === 'vertical';
  const { category, group, value } = layoutBars(directive, size, margins);
  const bars: string[] = [];
  const labels: string[] = [];

  for (const series of directive.series) {
    const offset = group(directive.mode === 'grouped' ? series.name : 'stack') ?? 0;
    series.segments.forEach((segment, index) => {
      const band = (category(directive.categories[index]) ?? 0) + offset;
      const thickness = group.bandwidth();
      const low = value(segment.start);
      const high = value(segment.end);
      // Zero-height segments are still emitted so every cell is present in the output
      const rect = vertical
        ? { x: band, y: Math.min(low, high), width: thickness, height: Math.abs(low - high) }
        : { x: Math.min(low, high), y: band, width: Math.abs(high - low), height: thickness };
      bars.push(element('rect', {
        ...rect,
        fill: series.color,
        'data-series': series.name,
        'data-category': directive.categories[index],
      }));

      const label = series.labels?.[index];
      if (label) {
        labels.push(vertical
          ? text(label, { x: band + thickness / 2, y: high - 6, 'text-anchor': 'middle', 'font-size': 11 })
          : text(label, { x: high + 6, y: band + thickness / 2 + 4, 'font-size': 11 }));
      }
    });
  }

  const categoryLabels = directive.categories.map(name => {
    const centre = (category(name) ?? 0) + category.bandwidth() / 2;
    return vertical
      ? text(name, {
        x: centre,
        y: size.height - margins.bottom + 16,
        'text-anchor': 'end',
        transform: `rotate(-30 ${centre} ${size.height - margins.bottom + 16})`,
        'font-size': 12,
      })
      : text(name, { x: margins.left - 8, y: centre + 4, 'text-anchor': 'end', 'font-size': 12 });
  });

  const valueAxis = vertical
    ? renderVerticalValueAxis(value, margins.left, size.width - margins.right)
    : renderHorizontalValueAxis(value, margins.top, size.height - margins.bottom);

  // Single unnamed series (age chart) needs no legend
  const legend = directive.legendTitle
    ? [renderLegend(directive.series, directive.legendTitle, size, margins)]
    : [];

  return svgDocument(size.width, size.height, [
    renderTitle(directive.title, size),
    ...valueAxis,
    renderFrame(margins, size),
    element('g', { class: 'bars' }, bars),
    element('g', { class: 'bar-labels' }, labels),
    ...categoryLabels,
    ...renderAxisLabels(directive.xLabel, directive.yLabel, size, margins),
    ...legend,
  ]);
}

export function renderChartSvg(directive: ChartDirective): string {
  return directive.kind === 'scatter' ? renderScatterSvg(directive) : renderBarSvg(directive);
}

/**
 * Writes each directive to its own SVG file. Parent directories are created;
 * any failure to write surfaces as OutputWriteError for that artifact only.
 */
export class SvgRenderSurface implements RenderSurface {
  async render(directive: ChartDirective, outputPath: string): Promise<RenderResult> {
    const svg = renderChartSvg(directive);
    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, svg, 'utf-8');
    } catch (error) {
      throw new OutputWriteError(outputPath, error);
    }

    const bytesWritten = Buffer.byteLength(svg, 'utf-8');
    logger.debug(`Rendered ${directive.kind} chart`, {
      context: LOG_CONTEXT,
      metadata: { outputPath, bytesWritten, title: directive.title },
    });
    return { outputPath, bytesWritten };
  }
}
