/**
 * Effort vs impact scatter plot
 *
 * One point cloud per priority in the colour map, all sharing the same
 * 1-5 rank axes. Points are jittered so projects with equal ranks stay visible.
 */

import { EFFORT_RANK, IMPACT_RANK, PRIORITY_COLOUR, DEFAULT_JITTER_AMOUNT } from '../constants';
import type {
  CategoryMap,
  PlotSeries,
  ProjectRecord,
  RenderResult,
  RenderSurface,
  ScatterChartDirective,
} from '../types';
import { isMappedLabel, labelsOf, lookupRank } from '../utils/categoryMapper';
import type { UnmappedHandler } from '../utils/categoryMapper';
import { MissingDimensionError } from '../utils/errorUtils';
import { addJitter } from '../utils/jitter';
import type { RandomSource } from '../utils/jitter';

export interface ScatterMaps {
  effort: CategoryMap<number | undefined>;
  impact: CategoryMap<number | undefined>;
  priorityColour: CategoryMap<string | undefined>;
}

export interface ScatterOptions {
  jitterAmount?: number;
  random?: RandomSource;
  onUnmapped?: UnmappedHandler;
  onExcluded?: (error: MissingDimensionError) => void;
}

export const DEFAULT_SCATTER_MAPS: ScatterMaps = Object.freeze({
  effort: EFFORT_RANK,
  impact: IMPACT_RANK,
  priorityColour: PRIORITY_COLOUR,
});

interface RankedProject {
  effort: number;
  impact: number;
}

function rankProject(
  project: ProjectRecord,
  maps: ScatterMaps,
  options: ScatterOptions
): RankedProject | undefined {
  const effort = lookupRank(maps.effort, project.estimatedEffort, options.onUnmapped);
  const impact = lookupRank(maps.impact, project.estimatedImpact, options.onUnmapped);

  if (effort === undefined) {
    options.onExcluded?.(new MissingDimensionError(project.name, maps.effort.name));
    return undefined;
  }
  if (impact === undefined) {
    options.onExcluded?.(new MissingDimensionError(project.name, maps.impact.name));
    return undefined;
  }
  return { effort, impact };
}

/**
 * Partition projects into one series per mapped priority, in colour map order.
 * Projects with an unmapped priority are left out; series without points are
 * kept so the legend does not change between runs.
 */
export function buildScatterSeries(
  projects: readonly ProjectRecord[],
  maps: ScatterMaps = DEFAULT_SCATTER_MAPS,
  options: ScatterOptions = {}
): PlotSeries[] {
  const { jitterAmount = DEFAULT_JITTER_AMOUNT, random = Math.random } = options;

  const grouped = new Map<string, RankedProject[]>();
  for (const label of labelsOf(maps.priorityColour)) {
    grouped.set(label, []);
  }

  for (const project of projects) {
    if (!isMappedLabel(maps.priorityColour, project.priority)) {
      continue;
    }
    const ranked = rankProject(project, maps, options);
    if (ranked) {
      grouped.get(project.priority.trim())?.push(ranked);
    }
  }

  const series: PlotSeries[] = [];
  for (const [priority, color] of maps.priorityColour.entries) {
    if (color === undefined) {
      continue;
    }
    const members = grouped.get(priority) ?? [];
    const xs = addJitter(members.map(m => m.effort), jitterAmount, random);
    const ys = addJitter(members.map(m => m.impact), jitterAmount, random);
    series.push({
      name: priority,
      color,
      points: xs.map((x, index) => ({ x, y: ys[index] })),
    });
  }
  return series;
}

export function buildScatterDirective(series: PlotSeries[]): ScatterChartDirective {
  return {
    kind: 'scatter',
    title: 'Project Comparison: Estimated Effort vs Estimated Impact (Jittered)',
    xLabel: 'Estimated Effort (Numerical)',
    yLabel: 'Estimated Impact (Numerical)',
    legendTitle: 'Priority',
    series,
  };
}

export async function renderScatterPlot(
  surface: RenderSurface,
  series: PlotSeries[],
  outputPath: string
): Promise<RenderResult> {
  return surface.render(buildScatterDirective(series), outputPath);
}
