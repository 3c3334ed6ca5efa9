/**
 * Tabular data source
 *
 * Reads the project and ticket CSV exports and validates each row. Every
 * record comes back frozen; nothing downstream mutates loaded data.
 */

import { promises as fs } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { ProjectRecord, TicketRecord } from '../types';
import { InvalidRowError, ReportDataError, getErrorMessage } from '../utils/errorUtils';
import { logger } from '../utils/logger';

const LOG_CONTEXT = 'DataSource';

// Blank cells are absent values, not empty labels
const optionalText = z
  .string()
  .optional()
  .transform(value => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const requiredText = (field: string) =>
  z.string({ required_error: `${field} column is missing` }).trim().min(1, `${field} is required`);

// Optional time, fractional seconds and zone
const ISO_LIKE = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;
const DAY_FIRST = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?: (\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

interface DateParts {
  year: string;
  month: string;
  day: string;
  hours?: string;
  minutes?: string;
  seconds?: string;
  fraction?: string;
  zone?: string;
}

// Minutes east of UTC for "Z", "+02:00" or "-0530"
const zoneOffsetMinutes = (zone: string | undefined): number => {
  if (!zone || zone === 'Z') {
    return 0;
  }
  const digits = zone.slice(1).replace(':', '');
  const minutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2));
  return zone.startsWith('-') ? -minutes : minutes;
};

function buildDate(parts: DateParts): Date | undefined {
  const year = Number(parts.year);
  const month = Number(parts.month);
  const day = Number(parts.day);
  const hours = Number(parts.hours ?? 0);
  const minutes = Number(parts.minutes ?? 0);
  const seconds = Number(parts.seconds ?? 0);
  const millis = Number((parts.fraction ?? '0').padEnd(3, '0').slice(0, 3));

  if (hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }
  const local = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis));
  // Reject rollovers such as 31/02
  if (local.getUTCDate() !== day || local.getUTCMonth() !== month - 1) {
    return undefined;
  }
  return new Date(local.getTime() - zoneOffsetMinutes(parts.zone) * 60_000);
}

/**
 * Parse the date formats seen in ticket exports: ISO-like (optionally with
 * fractional seconds and a zone) and day-first DD/MM/YYYY. Values without a
 * zone are taken as UTC. Anything else is undefined.
 */
export function parseExportDate(value: string): Date | undefined {
  const text = value.trim();

  const iso = ISO_LIKE.exec(text);
  if (iso) {
    const [, year, month, day, hours, minutes, seconds, fraction, zone] = iso;
    return buildDate({ year, month, day, hours, minutes, seconds, fraction, zone });
  }
  const dayFirst = DAY_FIRST.exec(text);
  if (dayFirst) {
    const [, day, month, year, hours, minutes, seconds] = dayFirst;
    return buildDate({ year, month, day, hours, minutes, seconds });
  }
  return undefined;
}

const requiredDate = (field: string) =>
  requiredText(field).transform((value, ctx) => {
    const date = parseExportDate(value);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field} is not a valid date: ${value}` });
      return z.NEVER;
    }
    return date;
  });

const optionalDate = (field: string) =>
  optionalText.transform((value, ctx) => {
    if (value === undefined) {
      return undefined;
    }
    const date = parseExportDate(value);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field} is not a valid date: ${value}` });
      return z.NEVER;
    }
    return date;
  });

export const projectRowSchema = z
  .object({
    'Name': requiredText('Name'),
    'Estimated Effort': optionalText,
    'Estimated Impact': optionalText,
    'Priority': optionalText,
    'Status': optionalText,
    'Staging': optionalText,
    'Owner': optionalText,
    'Summary': optionalText,
  })
  .transform((row): ProjectRecord => ({
    name: row['Name'],
    estimatedEffort: row['Estimated Effort'],
    estimatedImpact: row['Estimated Impact'],
    priority: row['Priority'],
    status: row['Status'],
    staging: row['Staging'],
    owner: row['Owner'],
    summary: row['Summary'],
  }));

export const ticketRowSchema = z
  .object({
    'Number': requiredText('Number'),
    'State': requiredText('State'),
    'Assigned to': optionalText,
    'Opened': requiredDate('Opened'),
    'Closed': optionalDate('Closed'),
    'Closed by': optionalText,
  })
  .transform((row): TicketRecord => ({
    number: row['Number'],
    state: row['State'],
    assignedTo: row['Assigned to'],
    openedAt: row['Opened'],
    closedAt: row['Closed'],
    closedBy: row['Closed by'],
  }));

export type InvalidRowHandler = (error: InvalidRowError) => void;

export interface ParseOptions {
  // Header names that must be present, otherwise the whole file is rejected
  requiredColumns?: readonly string[];
  onInvalidRow?: InvalidRowHandler;
}

export const PROJECT_REQUIRED_COLUMNS: readonly string[] = ['Name'];
export const TICKET_REQUIRED_COLUMNS: readonly string[] = ['Number', 'State', 'Opened'];

/**
 * Parse CSV text and validate every row. A row that fails validation is
 * skipped and handed to onInvalidRow (header is line 1); the rest load.
 * Unparseable text or a missing required column rejects the whole file.
 */
export function parseRecords<T, I>(
  csv: string,
  schema: z.ZodType<T, z.ZodTypeDef, I>,
  source: string,
  options: ParseOptions = {}
): readonly Readonly<T>[] {
  const { requiredColumns = [], onInvalidRow } = options;
  let header: string[] = [];
  let rows: unknown;
  try {
    rows = parse(csv, {
      columns: (line: string[]) => {
        header = line;
        return line;
      },
      bom: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new ReportDataError(`Could not parse ${source}: ${getErrorMessage(error)}`, error);
  }

  if (!Array.isArray(rows)) {
    throw new ReportDataError(`Could not parse ${source}: expected rows`);
  }

  const missing = requiredColumns.filter(column => !header.includes(column));
  if (rows.length > 0 && missing.length > 0) {
    throw new ReportDataError(`${source} is missing required columns: ${missing.join(', ')}`);
  }

  const records: Readonly<T>[] = [];
  rows.forEach((row: unknown, index: number) => {
    const result = schema.safeParse(row);
    if (result.success) {
      records.push(Object.freeze(result.data));
      return;
    }
    const [first] = result.error.issues;
    const field = first?.path.length ? String(first.path[0]) : 'row';
    const detail = result.error.issues.map(issue => issue.message).join('; ');
    onInvalidRow?.(new InvalidRowError(source, index + 2, field, detail));
  });

  return Object.freeze(records);
}

async function readCsv(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ReportDataError(`Could not read ${filePath}: ${getErrorMessage(error)}`, error);
  }
}

// Counts skipped rows for the load log while passing each one on
function countingHandler(onInvalidRow: InvalidRowHandler | undefined): { handler: InvalidRowHandler; skipped: () => number } {
  let skipped = 0;
  return {
    handler: error => {
      skipped++;
      onInvalidRow?.(error);
    },
    skipped: () => skipped,
  };
}

export async function loadProjectRecords(
  filePath: string,
  onInvalidRow?: InvalidRowHandler
): Promise<readonly ProjectRecord[]> {
  const counter = countingHandler(onInvalidRow);
  const records = parseRecords(await readCsv(filePath), projectRowSchema, filePath, {
    requiredColumns: PROJECT_REQUIRED_COLUMNS,
    onInvalidRow: counter.handler,
  });
  logger.info(`Loaded ${records.length} projects`, {
    context: LOG_CONTEXT,
    metadata: { filePath, skipped: counter.skipped() },
  });
  return records;
}

export async function loadTicketRecords(
  filePath: string,
  onInvalidRow?: InvalidRowHandler
): Promise<readonly TicketRecord[]> {
  const counter = countingHandler(onInvalidRow);
  const records = parseRecords(await readCsv(filePath), ticketRowSchema, filePath, {
    requiredColumns: TICKET_REQUIRED_COLUMNS,
    onInvalidRow: counter.handler,
  });
  logger.info(`Loaded ${records.length} tickets`, {
    context: LOG_CONTEXT,
    metadata: { filePath, skipped: counter.skipped() },
  });
  return records;
}
