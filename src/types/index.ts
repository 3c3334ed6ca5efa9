// Data Hierarchy & Enums

export enum EffortSize {
  Hours = 'Hours',
  Days = 'Days',
  Weeks = 'Weeks',
  Months = 'Months',
  Quarters = 'Quarters'
}

export enum ImpactSize {
  VeryLow = 'Very Low',
  Low = 'Low',
  Medium = 'Medium',
  High = 'High',
  VeryHigh = 'Very High'
}

export enum Priority {
  P1 = 'P1',
  P2 = 'P2',
  P3 = 'P3',
  P4 = 'P4',
  P5 = 'P5'
}

export enum ProjectStatus {
  Open = 'Open',
  OnHold = 'On Hold',
  New = 'New',
  Blocked = 'Blocked',
  Closed = 'Closed'
}

export enum Staging {
  Triage = 'Triage',
  Analysis = 'Analysis',
  AlphaTest = 'Alpha Test',
  BetaTest = 'Beta Test',
  RollOut = 'Roll-out'
}

// Theme colour slots of the deck template
export type ThemeColor =
  | 'tx1'
  | 'bg1'
  | 'accent1'
  | 'accent2'
  | 'accent3'
  | 'accent4'
  | 'accent5'
  | 'accent6';

export type BarMode = 'stacked' | 'grouped';
export type Orientation = 'horizontal' | 'vertical';
export type KeyOrder = 'first-seen' | 'sorted';
export type PivotRowAxis = 'bucket' | 'entity';

/**
 * One row of the project export. Labels are kept as the raw text of the CSV;
 * mapping to ranks, glyphs and colours happens downstream.
 */
export interface ProjectRecord {
  readonly name: string;
  readonly estimatedEffort?: string;
  readonly estimatedImpact?: string;
  readonly priority?: string;
  readonly status?: string;
  readonly staging?: string;
  readonly owner?: string;
  readonly summary?: string;
}

export interface TicketRecord {
  readonly number: string;
  readonly state: string;
  readonly assignedTo?: string;
  readonly openedAt: Date;
  readonly closedAt?: Date;
  readonly closedBy?: string;
}

/**
 * Immutable label lookup for one mapped dimension
 */
export interface CategoryMap<V> {
  readonly name: string;
  readonly entries: ReadonlyMap<string, V>;
  readonly fallback: V;
}

export interface PivotTriple {
  entity: string;
  bucket: string;
  count: number;
}

export interface PivotGrid {
  readonly rowKeys: readonly string[];
  readonly columnKeys: readonly string[];
  readonly values: readonly (readonly number[])[];
}

export interface PivotOptions {
  rowAxis?: PivotRowAxis;
  rowOrder?: KeyOrder;
  columnOrder?: KeyOrder;
}

export interface PlotPoint {
  x: number;
  y: number;
}

export interface PlotSeries {
  name: string;
  color: string;
  points: PlotPoint[];
}

export interface BarSegment {
  start: number;
  end: number;
}

export interface BarSeries {
  name: string;
  color: string;
  values: number[];
  segments: BarSegment[];
  labels?: string[];
}

interface ChartLabels {
  title: string;
  xLabel: string;
  yLabel: string;
  legendTitle?: string;
}

export interface ScatterChartDirective extends ChartLabels {
  kind: 'scatter';
  series: PlotSeries[];
}

export interface BarChartDirective extends ChartLabels {
  kind: 'bar';
  mode: BarMode;
  orientation: Orientation;
  categories: string[];
  series: BarSeries[];
  // Reverse the category axis so the first category is drawn on top
  invertCategoryAxis?: boolean;
}

export type ChartDirective = ScatterChartDirective | BarChartDirective;

export interface RenderResult {
  outputPath: string;
  bytesWritten: number;
}

/**
 * Anything that can turn a chart directive into an artifact on disk
 */
export interface RenderSurface {
  render(directive: ChartDirective, outputPath: string): Promise<RenderResult>;
}

export interface AgeSummary {
  assignedTo: string;
  ageBusinessDays: number;
  ticketCount: number;
}

export interface ReportConfig {
  projectCsv: string;
  ticketCsv: string;
  outputDir: string;
  year: number;
  jitterAmount: number;
  barMode: BarMode;
  engineers: readonly string[];
  randomSeed?: number;
}

export type ArtifactKind = 'scatter' | 'bar' | 'workbook' | 'deck';

export interface ArtifactResult {
  name: string;
  kind: ArtifactKind;
  outputPath: string;
}

export interface ArtifactFailure {
  name: string;
  outputPath: string;
  code: string;
  message: string;
}

export interface UnmappedLabelNotice {
  dimension: string;
  label: string;
  fallback: string;
}

export interface ExcludedRecordNotice {
  record: string;
  dimension: string;
  reason: string;
}

export interface ReportRunSummary {
  artifacts: ArtifactResult[];
  failures: ArtifactFailure[];
  warnings: UnmappedLabelNotice[];
  excluded: ExcludedRecordNotice[];
}
