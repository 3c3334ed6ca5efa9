/**
 * Ticket aggregation
 *
 * Reduces ticket rows to the shapes the charts need: (engineer, month, count)
 * triples for the resolved-items charts and per-assignee age totals for the
 * open ticket chart. All date arithmetic is done in UTC.
 */

import type { AgeSummary, PivotTriple, TicketRecord } from '../types';

const CLOSED_STATES = new Set(['resolved', 'closed', 'cancelled', 'canceled']);
const MS_PER_DAY = 1000 * 60 * 60 * 24;

export const UNASSIGNED = 'Unassigned';

export interface ResolvedCountOptions {
  year: number;
  engineers?: readonly string[];
}

export function isResolved(ticket: TicketRecord): ticket is TicketRecord & { closedAt: Date } {
  return ticket.closedAt !== undefined;
}

export function isOpen(ticket: TicketRecord): boolean {
  return ticket.closedAt === undefined && !CLOSED_STATES.has(ticket.state.trim().toLowerCase());
}

/**
 * Format a date as its YYYY-MM month bucket
 */
export function toYearMonth(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${date.getUTCFullYear()}-${month}`;
}

/**
 * Count tickets resolved in the given year per engineer and month.
 * With an engineer list, only tickets closed by one of them are counted.
 * One triple per (engineer, month) that has at least one resolved ticket.
 */
export function countResolvedPerMonth(
  tickets: readonly TicketRecord[],
  options: ResolvedCountOptions
): PivotTriple[] {
  const allowed = options.engineers && options.engineers.length > 0
    ? new Set(options.engineers)
    : undefined;
  const counts = new Map<string, PivotTriple>();

  for (const ticket of tickets) {
    if (!isResolved(ticket) || ticket.closedAt.getUTCFullYear() !== options.year) {
      continue;
    }
    const engineer = ticket.closedBy?.trim();
    if (!engineer || (allowed && !allowed.has(engineer))) {
      continue;
    }
    const bucket = toYearMonth(ticket.closedAt);
    const key = `${engineer}\u0000${bucket}`;
    const existing = counts.get(key);
    if (existing) {
      existing.count += 1;
    } else {
      counts.set(key, { entity: engineer, bucket, count: 1 });
    }
  }

  return Array.from(counts.values());
}

const startOfUtcDay = (date: Date): number =>
  Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());

/**
 * Weekdays from start (inclusive) to end (exclusive); 0 when end is not after start
 */
export function businessDaysBetween(start: Date, end: Date): number {
  const first = startOfUtcDay(start);
  const last = startOfUtcDay(end);
  if (last <= first) {
    return 0;
  }

  const totalDays = Math.round((last - first) / MS_PER_DAY);
  const fullWeeks = Math.floor(totalDays / 7);
  let count = fullWeeks * 5;

  const firstWeekday = new Date(first).getUTCDay();
  for (let offset = 0; offset < totalDays % 7; offset++) {
    const weekday = (firstWeekday + offset) % 7;
    if (weekday !== 0 && weekday !== 6) {
      count++;
    }
  }
  return count;
}

/**
 * Total business-day age and count of open tickets per assignee,
 * oldest total first (ties by name)
 */
export function summariseOpenTicketAge(tickets: readonly TicketRecord[], asOf: Date): AgeSummary[] {
  const totals = new Map<string, AgeSummary>();

  for (const ticket of tickets) {
    if (!isOpen(ticket)) {
      continue;
    }
    const assignedTo = ticket.assignedTo?.trim() || UNASSIGNED;
    const age = businessDaysBetween(ticket.openedAt, asOf);
    const summary = totals.get(assignedTo) ?? { assignedTo, ageBusinessDays: 0, ticketCount: 0 };
    summary.ageBusinessDays += age;
    summary.ticketCount += 1;
    totals.set(assignedTo, summary);
  }

  return Array.from(totals.values()).sort((a, b) =>
    b.ageBusinessDays - a.ageBusinessDays || a.assignedTo.localeCompare(b.assignedTo)
  );
}
