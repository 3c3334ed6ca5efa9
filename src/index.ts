export * from './types';
export {
  EFFORT_RANK,
  IMPACT_RANK,
  PRIORITY_COLOUR,
  PRIORITY_TEXT_REPRESENTATION,
  STAGING_TEXT_REPRESENTATION,
  STATUS_COLOUR,
  getEffortRank,
  getImpactRank,
  getPriorityText,
  getStagingText,
  getStatusColour,
} from './constants';
export { loadReportConfig } from './config';
export { createCategoryMap, lookupCategory, lookupRank } from './utils/categoryMapper';
export { addJitter, createSeededRandom } from './utils/jitter';
export type { RandomSource } from './utils/jitter';
export { pivotTriples, getCell, rowTotals, columnTotals, gridTotal, transposeGrid } from './utils/pivot';
export { assignColors } from './utils/palette';
export { pivotToCsv, exportPivotToWorkbook } from './utils/exportUtils';
export {
  ReportError,
  UnmappedLabelWarning,
  MissingDimensionError,
  OutputWriteError,
  ReportConfigError,
  ReportDataError,
} from './utils/errorUtils';
export { logger, LogLevel } from './utils/logger';
export { buildScatterSeries, renderScatterPlot } from './services/scatterPlotService';
export { buildBarChart, renderBarChart, buildAgeBarChart } from './services/barChartService';
export { countResolvedPerMonth, summariseOpenTicketAge, businessDaysBetween } from './services/ticketAggregation';
export { loadProjectRecords, loadTicketRecords } from './services/dataSource';
export { SvgRenderSurface } from './services/svgRenderSurface';
export { buildProjectDeck, writeProjectDeck } from './services/slideDeckService';
export { runReport } from './services/reportPipeline';
