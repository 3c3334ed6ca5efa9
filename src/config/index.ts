/**
 * Report configuration
 * Centralised config for environment-dependent values, validated once at startup
 */

import { z } from 'zod';
import { DEFAULT_JITTER_AMOUNT, ENGINEERS, FILE_LOCATIONS } from '../constants';
import type { ReportConfig } from '../types';
import { ReportConfigError } from '../utils/errorUtils';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envSchema = z.object({
  PROJECT_CSV: z.preprocess(blankToUndefined, z.string().default(FILE_LOCATIONS.projectCsv)),
  TICKET_CSV: z.preprocess(blankToUndefined, z.string().default(FILE_LOCATIONS.ticketCsv)),
  OUTPUT_DIR: z.preprocess(blankToUndefined, z.string().default(FILE_LOCATIONS.outputDir)),
  REPORT_YEAR: z.preprocess(
    blankToUndefined,
    z.coerce.number().int('REPORT_YEAR must be a whole year').min(1970).max(9999).optional()
  ),
  JITTER_AMOUNT: z.preprocess(
    blankToUndefined,
    z.coerce.number().positive('JITTER_AMOUNT must be greater than 0').finite().default(DEFAULT_JITTER_AMOUNT)
  ),
  BAR_MODE: z.preprocess(
    blankToUndefined,
    z.enum(['stacked', 'grouped'], {
      errorMap: () => ({ message: 'BAR_MODE must be "stacked" or "grouped"' }),
    }).default('stacked')
  ),
  ENGINEERS: z.preprocess(blankToUndefined, z.string().optional()),
  REPORT_RANDOM_SEED: z.preprocess(blankToUndefined, z.coerce.number().int().optional()),
});

const parseEngineers = (value: string | undefined): readonly string[] => {
  if (value === undefined) {
    return ENGINEERS;
  }
  return Object.freeze(value.split(',').map(name => name.trim()).filter(Boolean));
};

/**
 * Build the report configuration from environment variables.
 * Throws ReportConfigError listing every invalid variable.
 */
export function loadReportConfig(env: NodeJS.ProcessEnv = process.env, now: Date = new Date()): ReportConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ReportConfigError(`Invalid configuration: ${problems}`);
  }

  const parsed = result.data;
  return Object.freeze({
    projectCsv: parsed.PROJECT_CSV,
    ticketCsv: parsed.TICKET_CSV,
    outputDir: parsed.OUTPUT_DIR,
    year: parsed.REPORT_YEAR ?? now.getFullYear(),
    jitterAmount: parsed.JITTER_AMOUNT,
    barMode: parsed.BAR_MODE,
    engineers: parseEngineers(parsed.ENGINEERS),
    randomSeed: parsed.REPORT_RANDOM_SEED,
  });
}
