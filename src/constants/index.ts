import { EffortSize, ImpactSize, Priority, ProjectStatus, Staging } from '../types';
import type { CategoryMap, ThemeColor } from '../types';
import { createCategoryMap, lookupCategory, lookupRank } from '../utils/categoryMapper';
import type { UnmappedHandler } from '../utils/categoryMapper';

// Engineers whose resolved tickets are charted when ENGINEERS is not configured
export const ENGINEERS: readonly string[] = Object.freeze([
  'Andy Oxford',
  'Chris Kelly',
  'Luke Phillips',
  'Matthew Harbord',
  'Neil Griffin',
]);

// Theme colour slots of the deck, named by how the default theme renders them
export const ThemeColors = {
  PINK: 'accent5',
  GREEN: 'accent4',
  BLUE: 'accent3',
  PURPLE: 'accent6',
  ORANGE: 'accent2',
  TEAL: 'accent1',
  BLACK: 'tx1',
  WHITE: 'bg1',
} as const satisfies Record<string, ThemeColor>;

export const FILE_LOCATIONS = {
  projectCsv: './raw/PROJECT.csv',
  ticketCsv: './raw/TICKET.csv',
  outputDir: './output',
} as const;

export const DEFAULT_JITTER_AMOUNT = 0.1;

export const UNKNOWN_PRIORITY_TEXT = 'unknown';
export const UNKNOWN_STAGING_TEXT = '-----';

export const EFFORT_RANK: CategoryMap<number | undefined> = createCategoryMap<number | undefined>(
  'effort',
  [
    [EffortSize.Hours, 1],
    [EffortSize.Days, 2],
    [EffortSize.Weeks, 3],
    [EffortSize.Months, 4],
    [EffortSize.Quarters, 5],
  ],
  undefined
);

export const IMPACT_RANK: CategoryMap<number | undefined> = createCategoryMap<number | undefined>(
  'impact',
  [
    [ImpactSize.VeryLow, 1],
    [ImpactSize.Low, 2],
    [ImpactSize.Medium, 3],
    [ImpactSize.High, 4],
    [ImpactSize.VeryHigh, 5],
  ],
  undefined
);

export const PRIORITY_TEXT_REPRESENTATION: CategoryMap<string> = createCategoryMap<string>(
  'priority text',
  [
    [Priority.P1, 'P1 🔥'],
    [Priority.P2, 'P2 🚨'],
    [Priority.P3, 'P3 ⭐'],
    [Priority.P4, 'P4 🐢'],
    [Priority.P5, 'P5 🐌'],
  ],
  UNKNOWN_PRIORITY_TEXT
);

export const STAGING_TEXT_REPRESENTATION: CategoryMap<string> = createCategoryMap<string>(
  'staging',
  [
    [Staging.Triage, '▰▱▱▱▱'],
    [Staging.Analysis, '▰▰▱▱▱'],
    [Staging.AlphaTest, '▰▰▰▱▱'],
    [Staging.BetaTest, '▰▰▰▰▱'],
    [Staging.RollOut, '▰▰▰▰▰'],
  ],
  UNKNOWN_STAGING_TEXT
);

// Scatter colours. P5 has no colour, so those projects are left off the plot.
export const PRIORITY_COLOUR: CategoryMap<string | undefined> = createCategoryMap<string | undefined>(
  'priority colour',
  [
    [Priority.P1, 'red'],
    [Priority.P2, 'orange'],
    [Priority.P3, 'green'],
    [Priority.P4, 'blue'],
  ],
  undefined
);

export const STATUS_COLOUR: CategoryMap<ThemeColor> = createCategoryMap<ThemeColor>(
  'status',
  [
    [ProjectStatus.Open, ThemeColors.PINK],
    [ProjectStatus.OnHold, ThemeColors.ORANGE],
    [ProjectStatus.New, ThemeColors.PURPLE],
    [ProjectStatus.Blocked, ThemeColors.ORANGE],
  ],
  ThemeColors.TEAL
);

// tab20 categorical palette for multi-series bars
export const TAB20_PALETTE: readonly string[] = Object.freeze([
  '#1f77b4', '#aec7e8', '#ff7f0e', '#ffbb78', '#2ca02c',
  '#98df8a', '#d62728', '#ff9896', '#9467bd', '#c5b0d5',
  '#8c564b', '#c49c94', '#e377c2', '#f7b6d2', '#7f7f7f',
  '#c7c7c7', '#bcbd22', '#dbdb8d', '#17becf', '#9edae5',
]);

export const AGE_BAR_COLOUR = '#87ceeb'; // skyblue

// Deck layout, in centimetres
export const PROJECT_BUTTON_CONSTANTS = {
  rectangleWidth: 7.8,
  rectangleHeight: 2.8,
} as const;

export const FOUR_COL_SLIDE_CONSTANTS = {
  columns: 4,
  rows: 5,
  startLeft: 0.65,
  startTop: 2,
  horizontalSpacing: 0.2,
  verticalSpacing: 0.2,
} as const;

export const CM_PER_INCH = 2.54;

/**
 * Text shown for a project's priority, e.g. "P1 🔥"; "unknown" for anything unmapped
 */
export const getPriorityText = (priority: string | undefined, onUnmapped?: UnmappedHandler): string => {
  return lookupCategory(PRIORITY_TEXT_REPRESENTATION, priority, onUnmapped);
};

/**
 * Five-block progress glyph for a staging phase; "-----" for anything unmapped
 */
export const getStagingText = (staging: string | undefined, onUnmapped?: UnmappedHandler): string => {
  return lookupCategory(STAGING_TEXT_REPRESENTATION, staging, onUnmapped);
};

export const getEffortRank = (effort: string | undefined, onUnmapped?: UnmappedHandler): number | undefined => {
  return lookupRank(EFFORT_RANK, effort, onUnmapped);
};

export const getImpactRank = (impact: string | undefined, onUnmapped?: UnmappedHandler): number | undefined => {
  return lookupRank(IMPACT_RANK, impact, onUnmapped);
};

export const getStatusColour = (status: string | undefined, onUnmapped?: UnmappedHandler): ThemeColor => {
  return lookupCategory(STATUS_COLOUR, status, onUnmapped);
};
