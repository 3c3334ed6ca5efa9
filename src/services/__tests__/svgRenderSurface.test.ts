import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { SvgRenderSurface, renderBarSvg, renderChartSvg, renderScatterSvg } from '../svgRenderSurface';
import { buildAgeBarChart, buildBarChart } from '../barChartService';
import { buildScatterDirective } from '../scatterPlotService';
import { OutputWriteError } from '../../utils/errorUtils';
import { pivotTriples } from '../../utils/pivot';

const grid = pivotTriples(
  [
    { entity: 'Andy', bucket: '2024-01', count: 2 },
    { entity: 'Chris', bucket: '2024-01', count: 3 },
    { entity: 'Andy', bucket: '2024-02', count: 4 },
  ],
  { columnOrder: 'sorted' }
);

const stacked = buildBarChart(grid, {
  mode: 'stacked',
  title: 'Resolved & closed',
  xLabel: 'Month',
  yLabel: 'Count',
  legendTitle: 'Engineer',
});

const scatter = buildScatterDirective([
  { name: 'P1', color: 'red', points: [{ x: 3, y: 4 }] },
  { name: 'P2', color: 'orange', points: [] },
]);

const countMatches = (svg: string, pattern: RegExp): number => svg.match(pattern)?.length ?? 0;

describe('renderBarSvg', () => {
  const svg = renderBarSvg(stacked);

  it('should draw one rect per series and category', () => {
    expect(countMatches(svg, /<rect [^>]*data-series=/g)).toBe(4);
  });

  it('should keep zero-height segments', () => {
    expect(svg).toContain('fill="#aec7e8" data-series="Chris" data-category="2024-02"');
  });

  it('should escape the title', () => {
    expect(svg).toContain('>Resolved &amp; closed</text>');
  });

  it('should draw a legend with its title', () => {
    expect(svg).toContain('<g class="legend">');
    expect(svg).toContain('>Engineer</text>');
  });

  it('should label bars and omit the legend for the age chart', () => {
    const age = renderBarSvg(buildAgeBarChart([{ assignedTo: 'Chris Kelly', ageBusinessDays: 10, ticketCount: 3 }]));
    expect(age).toContain('>3 tickets</text>');
    expect(age).not.toContain('class="legend"');
  });

  it('should render a chart with no categories', () => {
    const empty = buildBarChart(pivotTriples([]), { mode: 'grouped', title: 'Empty', xLabel: 'x', yLabel: 'y' });
    expect(countMatches(renderBarSvg(empty), /data-series=/g)).toBe(0);
  });
});

describe('renderScatterSvg', () => {
  it('should draw one circle per point', () => {
    const svg = renderScatterSvg(scatter);
    expect(countMatches(svg, /<circle /g)).toBe(1);
    expect(svg).toContain('data-series="P1"');
  });

  it('should list every series in the legend', () => {
    const svg = renderScatterSvg(scatter);
    expect(svg).toContain('>Priority</text>');
    expect(svg).toContain('>P2</text>');
  });
});

describe('renderChartSvg', () => {
  it('should dispatch on the directive kind', () => {
    expect(renderChartSvg(scatter)).toBe(renderScatterSvg(scatter));
    expect(renderChartSvg(stacked)).toBe(renderBarSvg(stacked));
  });
});

describe('SvgRenderSurface', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'svg-surface-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should write the svg and report its size', async () => {
    const outputPath = path.join(dir, 'charts', 'resolved.svg');
    const result = await new SvgRenderSurface().render(stacked, outputPath);

    const written = await fs.readFile(outputPath);
    expect(result).toEqual({ outputPath, bytesWritten: written.byteLength });
    expect(written.toString('utf-8')).toBe(renderBarSvg(stacked));
  });

  it('should raise OutputWriteError when the path cannot be written', async () => {
    const blocker = path.join(dir, 'blocker');
    await fs.writeFile(blocker, 'file');

    await expect(new SvgRenderSurface().render(stacked, path.join(blocker, 'chart.svg')))
      .rejects.toBeInstanceOf(OutputWriteError);
  });
});
