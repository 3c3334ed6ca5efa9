import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import * as XLSX from 'xlsx';
import { assertDistinctPaths, planArtifactPaths, runReport } from '../reportPipeline';
import { InvalidRowError, OutputWriteError, ReportConfigError, ReportDataError } from '../../utils/errorUtils';
import type { ChartDirective, ProjectRecord, RenderSurface, ReportConfig, TicketRecord } from '../../types';

const utc = (year: number, month: number, day: number): Date => new Date(Date.UTC(year, month - 1, day, 9));

const PROJECTS: ProjectRecord[] = [
  { name: 'Apollo', estimatedEffort: 'Weeks', estimatedImpact: 'High', priority: 'P1', status: 'Open', staging: 'Triage' },
  { name: 'Gemini', estimatedEffort: 'Years', estimatedImpact: 'High', priority: 'P2', status: 'Open', staging: 'Triage' },
  { name: 'Hermes', estimatedEffort: 'Weeks', estimatedImpact: 'High', priority: 'P9', status: 'Paused', staging: 'Triage' },
];

const TICKETS: TicketRecord[] = [
  { number: 'INC1', state: 'Resolved', openedAt: utc(2024, 1, 2), closedAt: utc(2024, 1, 10), closedBy: 'Andy Oxford' },
  { number: 'INC2', state: 'Closed', openedAt: utc(2024, 1, 3), closedAt: utc(2024, 2, 3), closedBy: 'Chris Kelly' },
  { number: 'INC3', state: 'New', assignedTo: 'Chris Kelly', openedAt: utc(2024, 1, 1) },
];

const createSurface = (failOn?: string) => {
  const rendered: ChartDirective[] = [];
  const surface: RenderSurface = {
    render: vi.fn(async (directive: ChartDirective, outputPath: string) => {
      if (failOn && outputPath.endsWith(failOn)) {
        throw new OutputWriteError(outputPath, new Error('disk full'));
      }
      rendered.push(directive);
      return { outputPath, bytesWritten: 100 };
    }),
  };
  return { surface, rendered };
};

describe('planArtifactPaths', () => {
  it('should name the alternate bar mode file after the other mode', () => {
    const paths = planArtifactPaths({
      projectCsv: 'p.csv',
      ticketCsv: 't.csv',
      outputDir: 'out',
      year: 2024,
      jitterAmount: 0.1,
      barMode: 'grouped',
      engineers: [],
    });
    expect(paths.resolvedByMonth).toBe(path.join('out', 'resolved_month_grouped.svg'));
    expect(paths.resolvedByMonthAlternate).toBe(path.join('out', 'resolved_month_stacked.svg'));
    expect(paths.deck).toBe(path.join('out', 'project_status.pptx'));
  });
});

describe('assertDistinctPaths', () => {
  it('should reject two artifacts writing to one file', () => {
    expect(() => assertDistinctPaths({ a: 'out/x.svg', b: './out/x.svg' })).toThrow(
      `Artifacts "a" and "b" both write to ${path.resolve('out/x.svg')}`
    );
  });

  it('should accept distinct paths', () => {
    expect(() => assertDistinctPaths({ a: 'out/x.svg', b: 'out/y.svg' })).not.toThrow();
  });
});

describe('runReport', () => {
  let dir: string;
  let config: ReportConfig;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'report-run-'));
    config = {
      projectCsv: 'projects.csv',
      ticketCsv: 'tickets.csv',
      outputDir: dir,
      year: 2024,
      jitterAmount: 0.1,
      barMode: 'stacked',
      engineers: ['Andy Oxford', 'Chris Kelly'],
    };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  const deps = (surface: RenderSurface) => ({
    surface,
    random: () => 0.5,
    now: utc(2024, 1, 15),
    loadProjects: async () => PROJECTS,
    loadTickets: async () => TICKETS,
  });

  it('should produce every artifact', async () => {
    const { surface } = createSurface();
    const summary = await runReport(config, deps(surface));

    expect(summary.failures).toEqual([]);
    expect(summary.artifacts.map(a => a.name)).toEqual([
      'effort/impact scatter',
      'resolved per month (stacked)',
      'resolved per month (grouped)',
      'resolved per engineer',
      'open ticket age',
      'resolved items workbook',
      'project deck',
    ]);
    expect(surface.render).toHaveBeenCalledTimes(5);
    await expect(fs.stat(path.join(dir, 'resolved_items.xlsx'))).resolves.toBeTruthy();
    await expect(fs.stat(path.join(dir, 'project_status.pptx'))).resolves.toBeTruthy();
  });

  it('should render the scatter and charts from the loaded data', async () => {
    const { surface, rendered } = createSurface();
    await runReport(config, deps(surface));

    const [scatter, stacked, , , age] = rendered;
    expect(scatter.kind).toBe('scatter');
    expect(scatter.series[0].name).toBe('P1');
    if (stacked.kind !== 'bar' || age.kind !== 'bar') {
      throw new Error('expected bar charts');
    }
    expect(stacked.categories).toEqual(['2024-01', '2024-02']);
    expect(stacked.series.map(s => s.name)).toEqual(['Andy Oxford', 'Chris Kelly']);
    expect(age.categories).toEqual(['Chris Kelly']);
    expect(age.series[0].values).toEqual([10]);
  });

  it('should export the resolved pivot with totals', async () => {
    const { surface } = createSurface();
    await runReport(config, deps(surface));

    const workbook = XLSX.read(await fs.readFile(path.join(dir, 'resolved_items.xlsx')), { type: 'buffer' });
    const rows = XLSX.utils.sheet_to_json<(string | number)[]>(workbook.Sheets['Resolved'], { header: 1 });
    expect(rows).toEqual([
      ['YearMonth', 'Andy Oxford', 'Chris Kelly', 'Total'],
      ['2024-01', 1, 0, 1],
      ['2024-02', 0, 1, 1],
    ]);
  });

  it('should report unmapped labels once and excluded records', async () => {
    const { surface } = createSurface();
    const summary = await runReport(config, deps(surface));

    expect(summary.warnings).toEqual([
      { dimension: 'effort', label: 'Years', fallback: 'no value' },
      { dimension: 'priority text', label: 'P9', fallback: '"unknown"' },
      { dimension: 'status', label: 'Paused', fallback: '"accent1"' },
    ]);
    expect(summary.excluded).toEqual([
      { record: 'Gemini', dimension: 'effort', reason: 'Record "Gemini" has no effort value' },
    ]);
  });

  it('should list skipped rows and still build every artifact', async () => {
    const { surface } = createSurface();
    const summary = await runReport(config, {
      ...deps(surface),
      loadProjects: async (_filePath: string, onInvalidRow?: (error: InvalidRowError) => void) => {
        onInvalidRow?.(new InvalidRowError('projects.csv', 3, 'Name', 'Name is required'));
        return PROJECTS;
      },
    });

    expect(summary.excluded).toEqual([
      { record: 'projects.csv line 3', dimension: 'Name', reason: 'projects.csv line 3: Name is required' },
      { record: 'Gemini', dimension: 'effort', reason: 'Record "Gemini" has no effort value' },
    ]);
    expect(summary.failures).toEqual([]);
    expect(summary.artifacts).toHaveLength(7);
    expect(console.warn).toHaveBeenCalledWith(expect.stringContaining('projects.csv line 3: Name is required; row skipped'));
  });

  it('should fail only the artifact whose write fails', async () => {
    const { surface } = createSurface('effort_impact_scatter.svg');
    const summary = await runReport(config, deps(surface));

    const scatterPath = path.join(dir, 'effort_impact_scatter.svg');
    expect(summary.failures).toEqual([
      {
        name: 'effort/impact scatter',
        outputPath: scatterPath,
        code: 'OUTPUT_WRITE_ERROR',
        message: `Failed to write ${scatterPath}: disk full`,
      },
    ]);
    expect(summary.artifacts).toHaveLength(6);
  });

  it('should fail the dependents of a source that cannot be loaded', async () => {
    const { surface } = createSurface();
    const summary = await runReport(config, {
      ...deps(surface),
      loadTickets: async () => {
        throw new ReportDataError('Could not read tickets.csv: missing');
      },
    });

    expect(summary.failures.map(f => f.name)).toEqual([
      'resolved per month (stacked)',
      'resolved per month (grouped)',
      'resolved per engineer',
      'resolved items workbook',
      'open ticket age',
    ]);
    expect(summary.failures.every(f => f.code === 'DATA_ERROR')).toBe(true);
    expect(summary.artifacts.map(a => a.name)).toEqual(['effort/impact scatter', 'project deck']);
  });

  it('should reject an invalid jitter amount before writing anything', async () => {
    const { surface } = createSurface();
    await expect(runReport({ ...config, jitterAmount: -1 }, deps(surface))).rejects.toBeInstanceOf(ReportConfigError);
    expect(surface.render).not.toHaveBeenCalled();
  });
});
