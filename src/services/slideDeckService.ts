/**
 * Project status deck
 *
 * Builds a PowerPoint deck with a title slide, four-column grids of project
 * "buttons" coloured by status, and one native chart slide per bar chart. Layout is
 * planned as plain data first (planProjectButtons) and only then drawn on the
 * pptxgenjs canvas, so the placement rules can be tested without a file.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import PptxGenJS from 'pptxgenjs';
import {
  CM_PER_INCH,
  FOUR_COL_SLIDE_CONSTANTS,
  PROJECT_BUTTON_CONSTANTS,
  ThemeColors,
  getPriorityText,
  getStagingText,
  getStatusColour,
} from '../constants';
import type { BarChartDirective, ProjectRecord, ThemeColor } from '../types';
import type { UnmappedHandler } from '../utils/categoryMapper';
import { OutputWriteError } from '../utils/errorUtils';
import { logger } from '../utils/logger';

const LOG_CONTEXT = 'SlideDeck';

export interface ProjectButton {
  slide: number;
  name: string;
  priorityText: string;
  stagingText: string;
  fill: ThemeColor;
  // inches, as pptxgenjs expects
  x: number;
  y: number;
  w: number;
  h: number;
}


export interface DeckOptions {
  title?: string;
  subtitle?: string;
  charts?: BarChartDirective[];
  onUnmapped?: UnmappedHandler;
}

export const cmToInches = (cm: number): number => cm / CM_PER_INCH;

export const BUTTONS_PER_SLIDE = FOUR_COL_SLIDE_CONSTANTS.columns * FOUR_COL_SLIDE_CONSTANTS.rows;

/**
 * Place every project on the four-column grid, filling rows left to right
 * and starting a new slide when a grid is full
 */
export function planProjectButtons(
  projects: readonly ProjectRecord[],
  onUnmapped?: UnmappedHandler
): ProjectButton[] {
  const { columns, startLeft, startTop, horizontalSpacing, verticalSpacing } = FOUR_COL_SLIDE_CONSTANTS;
  const { rectangleWidth, rectangleHeight } = PROJECT_BUTTON_CONSTANTS;

  return projects.map((project, index) => {
    const position = index % BUTTONS_PER_SLIDE;
    const column = position % columns;
    const row = Math.floor(position / columns);
    return {
      slide: Math.floor(index / BUTTONS_PER_SLIDE),
      name: project.name,
      priorityText: getPriorityText(project.priority, onUnmapped),
      stagingText: getStagingText(project.staging, onUnmapped),
      fill: getStatusColour(project.status, onUnmapped),
      x: cmToInches(startLeft + column * (rectangleWidth + horizontalSpacing)),
      y: cmToInches(startTop + row * (rectangleHeight + verticalSpacing)),
      w: cmToInches(rectangleWidth),
      h: cmToInches(rectangleHeight),
    };
  });
}

function addTitleSlide(pres: PptxGenJS, title: string, subtitle: string | undefined): void {
  const slide = pres.addSlide();
  slide.addText(title, {
    x: 0.5, y: 2.6, w: 12.33, h: 1.2,
    fontSize: 40, bold: true, color: ThemeColors.BLACK, align: 'center',
  });
  if (subtitle) {
    slide.addText(subtitle, {
      x: 0.5, y: 3.9, w: 12.33, h: 0.6,
      fontSize: 18, color: ThemeColors.BLACK, align: 'center',
    });
  }
  slide.addShape(pres.ShapeType.rect, {
    x: 4.67, y: 4.8, w: 4, h: 0.12,
    fill: { color: ThemeColors.TEAL }, line: { color: ThemeColors.TEAL },
  });
}

function addProjectSlides(pres: PptxGenJS, buttons: ProjectButton[], pageCount: number): void {
  for (let page = 0; page < pageCount; page++) {
    const slide = pres.addSlide();
    const heading = pageCount > 1 ? `Project Status (${page + 1}/${pageCount})` : 'Project Status';
    slide.addText(heading, {
      x: cmToInches(FOUR_COL_SLIDE_CONSTANTS.startLeft), y: 0.2, w: 12, h: 0.5,
      fontSize: 24, bold: true, color: ThemeColors.BLACK,
    });

    for (const button of buttons.filter(b => b.slide === page)) {
      slide.addText(
        [
          { text: button.name, options: { bold: true, fontSize: 14, breakLine: true } },
          { text: `${button.priorityText}   ${button.stagingText}`, options: { fontSize: 12 } },
        ],
        {
          shape: pres.ShapeType.roundRect,
          x: button.x, y: button.y, w: button.w, h: button.h,
          fill: { color: button.fill },
          color: ThemeColors.WHITE,
          align: 'left',
          valign: 'middle',
          margin: 6,
        }
      );
    }
  }
}

// pptxgenjs wants bare hex colours
const toChartColor = (color: string): string => color.replace(/^#/, '').toUpperCase();

export interface ChartSlideSeries {
  name: string;
  labels: string[];
  values: number[];
  color: string;
}

/**
 * Series in the order PowerPoint should receive them. A bar chart draws its
 * first category nearest the origin, so an inverted axis is expressed by
 * reversing the categories and every series' values together.
 */
export function chartSlideData(chart: BarChartDirective): ChartSlideSeries[] {
  const labels = chart.invertCategoryAxis ? [...chart.categories].reverse() : [...chart.categories];
  return chart.series.map(series => ({
    name: series.name,
    labels,
    values: chart.invertCategoryAxis ? [...series.values].reverse() : [...series.values],
    color: toChartColor(series.color),
  }));
}

/**
 * Draw a bar directive as an editable PowerPoint chart. Stacked and grouped
 * map to the chart's bar grouping, orientation to its bar direction.
 */
function addChartSlide(pres: PptxGenJS, chart: BarChartDirective): void {
  const slide = pres.addSlide();
  const data = chartSlideData(chart);
  slide.addChart(
    pres.ChartType.bar,
    data.map(({ name, labels, values }) => ({ name, labels, values })),
    {
      x: 0.6, y: 0.4, w: 12.1, h: 6.7,
      barDir: chart.orientation === 'vertical' ? 'col' : 'bar',
      barGrouping: chart.mode === 'stacked' ? 'stacked' : 'clustered',
      chartColors: data.map(series => series.color),
      showTitle: true,
      title: chart.title,
      showLegend: Boolean(chart.legendTitle),
      legendPos: 'r',
      showCatAxisTitle: true,
      catAxisTitle: chart.orientation === 'vertical' ? chart.xLabel : chart.yLabel,
      showValAxisTitle: true,
      valAxisTitle: chart.orientation === 'vertical' ? chart.yLabel : chart.xLabel,
    }
  );
}

export function buildProjectDeck(projects: readonly ProjectRecord[], options: DeckOptions = {}): PptxGenJS {
  const { title = 'Project Status Report', subtitle, charts = [], onUnmapped } = options;

  const pres = new PptxGenJS();
  // Four 7.8 cm buttons need the 13.33in widescreen layout
  pres.layout = 'LAYOUT_WIDE';
  pres.title = title;
  pres.subject = 'Project status';

  const buttons = planProjectButtons(projects, onUnmapped);
  const pageCount = Math.max(1, Math.ceil(projects.length / BUTTONS_PER_SLIDE));

  addTitleSlide(pres, title, subtitle);
  addProjectSlides(pres, buttons, pageCount);
  // A chart with no series has nothing to draw
  const drawable = charts.filter(chart => chart.series.length > 0 && chart.categories.length > 0);
  drawable.forEach(chart => addChartSlide(pres, chart));

  logger.debug('Assembled project deck', {
    context: LOG_CONTEXT,
    metadata: { projects: projects.length, projectSlides: pageCount, chartSlides: drawable.length },
  });
  return pres;
}

export async function deckToBuffer(pres: PptxGenJS): Promise<Uint8Array> {
  const data = await pres.write({ outputType: 'nodebuffer' });
  if (!(data instanceof Uint8Array)) {
    throw new TypeError('Expected a binary buffer from the deck writer');
  }
  return data;
}

export async function writeProjectDeck(pres: PptxGenJS, outputPath: string): Promise<number> {
  try {
    const buffer = await deckToBuffer(pres);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, buffer);
    return buffer.byteLength;
  } catch (error) {
    throw new OutputWriteError(outputPath, error);
  }
}
