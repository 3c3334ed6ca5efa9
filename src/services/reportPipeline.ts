/**
 * Report pipeline
 *
 * One batch run: load both exports, render every chart, export the pivot and
 * assemble the deck. Artifacts are independent. A failed write or a missing
 * data source fails only the artifacts that depend on it, and the run
 * summary lists what was written, what failed and which records were
 * degraded or excluded on the way.
 */

import path from 'node:path';
import type {
  ArtifactKind,
  BarChartDirective,
  BarMode,
  ProjectRecord,
  ReportConfig,
  ReportRunSummary,
  RenderSurface,
  TicketRecord,
  UnmappedLabelNotice,
} from '../types';
import type { UnmappedHandler } from '../utils/categoryMapper';
import { ReportConfigError, formatError } from '../utils/errorUtils';
import type { InvalidRowError, MissingDimensionError, UnmappedLabelWarning } from '../utils/errorUtils';
import { exportPivotToWorkbook } from '../utils/exportUtils';
import { assertJitterAmount, createSeededRandom } from '../utils/jitter';
import type { RandomSource } from '../utils/jitter';
import { logger } from '../utils/logger';
import { pivotTriples, transposeGrid } from '../utils/pivot';
import { buildAgeBarChart, resolvedPerEngineerChart, resolvedPerMonthChart } from './barChartService';
import { loadProjectRecords, loadTicketRecords } from './dataSource';
import type { InvalidRowHandler } from './dataSource';
import { buildScatterDirective, buildScatterSeries } from './scatterPlotService';
import { buildProjectDeck, writeProjectDeck } from './slideDeckService';
import { SvgRenderSurface } from './svgRenderSurface';
import { countResolvedPerMonth, summariseOpenTicketAge } from './ticketAggregation';

const LOG_CONTEXT = 'ReportPipeline';

export interface ReportDependencies {
  surface?: RenderSurface;
  random?: RandomSource;
  now?: Date;
  loadProjects?: (filePath: string, onInvalidRow?: InvalidRowHandler) => Promise<readonly ProjectRecord[]>;
  loadTickets?: (filePath: string, onInvalidRow?: InvalidRowHandler) => Promise<readonly TicketRecord[]>;
}

export type ArtifactPaths = {
  scatter: string;
  resolvedByMonth: string;
  resolvedByMonthAlternate: string;
  resolvedByEngineer: string;
  openTicketAge: string;
  resolvedWorkbook: string;
  deck: string;
};

const otherMode = (mode: BarMode): BarMode => (mode === 'stacked' ? 'grouped' : 'stacked');

export function planArtifactPaths(config: ReportConfig): ArtifactPaths {
  const out = (file: string): string => path.join(config.outputDir, file);
  return {
    scatter: out('effort_impact_scatter.svg'),
    resolvedByMonth: out(`resolved_month_${config.barMode}.svg`),
    resolvedByMonthAlternate: out(`resolved_month_${otherMode(config.barMode)}.svg`),
    resolvedByEngineer: out('engineer_grouped_resolved.svg'),
    openTicketAge: out('open_ticket_age.svg'),
    resolvedWorkbook: out('resolved_items.xlsx'),
    deck: out('project_status.pptx'),
  };
}

/**
 * Two artifacts of one run must never share a path
 */
export function assertDistinctPaths(paths: Record<string, string>): void {
  const seen = new Map<string, string>();
  for (const [name, filePath] of Object.entries(paths)) {
    const resolved = path.resolve(filePath);
    const previous = seen.get(resolved);
    if (previous) {
      throw new ReportConfigError(`Artifacts "${previous}" and "${name}" both write to ${resolved}`);
    }
    seen.set(resolved, name);
  }
}

class RunRecorder {
  readonly summary: ReportRunSummary = { artifacts: [], failures: [], warnings: [], excluded: [] };
  private readonly seenWarnings = new Set<string>();

  readonly onUnmapped: UnmappedHandler = (warning: UnmappedLabelWarning) => {
    const key = `${warning.dimension}\u0000${warning.label}`;
    if (this.seenWarnings.has(key)) {
      return;
    }
    this.seenWarnings.add(key);
    const notice: UnmappedLabelNotice = {
      dimension: warning.dimension,
      label: warning.label,
      fallback: warning.fallback,
    };
    this.summary.warnings.push(notice);
    logger.warn(warning.message, { context: LOG_CONTEXT });
  };

  readonly onExcluded = (error: MissingDimensionError): void => {
    this.summary.excluded.push({ record: error.record, dimension: error.dimension, reason: error.message });
    logger.warn(`${error.message}; left out of the scatter plot`, { context: LOG_CONTEXT });
  };

  readonly onInvalidRow: InvalidRowHandler = (error: InvalidRowError) => {
    this.summary.excluded.push({ record: error.record, dimension: error.dimension, reason: error.message });
    logger.warn(`${error.message}; row skipped`, { context: LOG_CONTEXT });
  };

  async artifact(name: string, kind: ArtifactKind, outputPath: string, produce: () => Promise<void>): Promise<void> {
    try {
      await produce();
      this.summary.artifacts.push({ name, kind, outputPath });
      logger.info(`Wrote ${name}`, { context: LOG_CONTEXT, metadata: { outputPath } });
    } catch (error) {
      this.fail(name, outputPath, error);
    }
  }

  fail(name: string, outputPath: string, error: unknown): void {
    const details = formatError(error);
    this.summary.failures.push({ name, outputPath, code: details.code, message: details.message });
    logger.error(`Failed to produce ${name}`, {
      context: LOG_CONTEXT,
      metadata: { outputPath, code: details.code },
      error: error instanceof Error ? error : undefined,
    });
  }
}

async function loadSource<T>(
  load: (filePath: string, onInvalidRow?: InvalidRowHandler) => Promise<readonly T[]>,
  filePath: string,
  recorder: RunRecorder,
  dependents: [string, string][]
): Promise<readonly T[] | undefined> {
  try {
    return await load(filePath, recorder.onInvalidRow);
  } catch (error) {
    for (const [name, outputPath] of dependents) {
      recorder.fail(name, outputPath, error);
    }
    return undefined;
  }
}

export async function runReport(config: ReportConfig, deps: ReportDependencies = {}): Promise<ReportRunSummary> {
  const {
    surface = new SvgRenderSurface(),
    now = new Date(),
    loadProjects = loadProjectRecords,
    loadTickets = loadTicketRecords,
  } = deps;
  const random = deps.random
    ?? (config.randomSeed !== undefined ? createSeededRandom(config.randomSeed) : Math.random);

  assertJitterAmount(config.jitterAmount);
  const paths = planArtifactPaths(config);
  assertDistinctPaths(paths);

  const recorder = new RunRecorder();
  const charts: BarChartDirective[] = [];

  logger.startup('Generating project status report', {
    context: LOG_CONTEXT,
    metadata: { year: config.year, outputDir: config.outputDir, barMode: config.barMode },
  });

  const projects = await loadSource(loadProjects, config.projectCsv, recorder, [
    ['effort/impact scatter', paths.scatter],
    ['project deck', paths.deck],
  ]);

  if (projects) {
    const series = buildScatterSeries(projects, undefined, {
      jitterAmount: config.jitterAmount,
      random,
      onUnmapped: recorder.onUnmapped,
      onExcluded: recorder.onExcluded,
    });
    const directive = buildScatterDirective(series);
    await recorder.artifact('effort/impact scatter', 'scatter', paths.scatter, async () => {
      await surface.render(directive, paths.scatter);
    });
  }

  const tickets = await loadSource(loadTickets, config.ticketCsv, recorder, [
    [`resolved per month (${config.barMode})`, paths.resolvedByMonth],
    [`resolved per month (${otherMode(config.barMode)})`, paths.resolvedByMonthAlternate],
    ['resolved per engineer', paths.resolvedByEngineer],
    ['resolved items workbook', paths.resolvedWorkbook],
    ['open ticket age', paths.openTicketAge],
  ]);

  if (tickets) {
    const triples = countResolvedPerMonth(tickets, { year: config.year, engineers: config.engineers });
    const byMonth = pivotTriples(triples, { rowAxis: 'bucket', rowOrder: 'sorted', columnOrder: 'sorted' });
    const byEngineer = transposeGrid(byMonth);

    const barCharts = [
      { name: `resolved per month (${config.barMode})`, outputPath: paths.resolvedByMonth, directive: resolvedPerMonthChart(byMonth, config.barMode) },
      { name: `resolved per month (${otherMode(config.barMode)})`, outputPath: paths.resolvedByMonthAlternate, directive: resolvedPerMonthChart(byMonth, otherMode(config.barMode)) },
      { name: 'resolved per engineer', outputPath: paths.resolvedByEngineer, directive: resolvedPerEngineerChart(byEngineer) },
      { name: 'open ticket age', outputPath: paths.openTicketAge, directive: buildAgeBarChart(summariseOpenTicketAge(tickets, now)) },
    ];

    for (const chart of barCharts) {
      await recorder.artifact(chart.name, 'bar', chart.outputPath, async () => {
        await surface.render(chart.directive, chart.outputPath);
      });
      // Deck charts are drawn natively and do not depend on the SVG file
      charts.push(chart.directive);
    }

    await recorder.artifact('resolved items workbook', 'workbook', paths.resolvedWorkbook, () =>
      exportPivotToWorkbook(byMonth, paths.resolvedWorkbook, { rowHeader: 'YearMonth', sheetName: 'Resolved', includeTotals: true })
    );
  }

  if (projects) {
    await recorder.artifact('project deck', 'deck', paths.deck, async () => {
      const deck = buildProjectDeck(projects, {
        subtitle: `${config.year} · ${projects.length} projects`,
        charts,
        onUnmapped: recorder.onUnmapped,
      });
      await writeProjectDeck(deck, paths.deck);
    });
  }

  const { summary } = recorder;
  if (summary.failures.length === 0) {
    logger.success(`Report complete: ${summary.artifacts.length} artifacts`, { context: LOG_CONTEXT });
  } else {
    logger.warn(`Report finished with ${summary.failures.length} failed artifacts`, {
      context: LOG_CONTEXT,
      metadata: { written: summary.artifacts.length },
    });
  }
  return summary;
}
