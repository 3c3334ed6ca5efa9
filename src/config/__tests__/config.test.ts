import { describe, it, expect } from 'vitest';
import { loadReportConfig } from '../index';
import { ENGINEERS } from '../../constants';
import { ReportConfigError } from '../../utils/errorUtils';

const NOW = new Date(2024, 5, 1);

describe('loadReportConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadReportConfig({}, NOW)).toEqual({
      projectCsv: './raw/PROJECT.csv',
      ticketCsv: './raw/TICKET.csv',
      outputDir: './output',
      year: 2024,
      jitterAmount: 0.1,
      barMode: 'stacked',
      engineers: ENGINEERS,
      randomSeed: undefined,
    });
  });

  it('should read every variable', () => {
    const config = loadReportConfig(
      {
        PROJECT_CSV: 'data/projects.csv',
        TICKET_CSV: 'data/tickets.csv',
        OUTPUT_DIR: 'reports',
        REPORT_YEAR: '2023',
        JITTER_AMOUNT: '0.25',
        BAR_MODE: 'grouped',
        ENGINEERS: 'Andy Oxford, Chris Kelly,',
        REPORT_RANDOM_SEED: '7',
      },
      NOW
    );

    expect(config).toEqual({
      projectCsv: 'data/projects.csv',
      ticketCsv: 'data/tickets.csv',
      outputDir: 'reports',
      year: 2023,
      jitterAmount: 0.25,
      barMode: 'grouped',
      engineers: ['Andy Oxford', 'Chris Kelly'],
      randomSeed: 7,
    });
  });

  it('should treat blank values as unset', () => {
    const config = loadReportConfig({ REPORT_YEAR: ' ', BAR_MODE: '', OUTPUT_DIR: '' }, NOW);
    expect(config.year).toBe(2024);
    expect(config.barMode).toBe('stacked');
    expect(config.outputDir).toBe('./output');
  });

  it('should return a frozen config', () => {
    expect(Object.isFrozen(loadReportConfig({}, NOW))).toBe(true);
  });

  it('should reject a jitter amount of 0', () => {
    expect(() => loadReportConfig({ JITTER_AMOUNT: '0' }, NOW)).toThrow(
      'Invalid configuration: JITTER_AMOUNT: JITTER_AMOUNT must be greater than 0'
    );
  });

  it('should reject an unknown bar mode', () => {
    expect(() => loadReportConfig({ BAR_MODE: 'side-by-side' }, NOW)).toThrow(ReportConfigError);
  });

  it('should list every invalid variable', () => {
    expect(() => loadReportConfig({ JITTER_AMOUNT: '-1', BAR_MODE: 'x' }, NOW)).toThrow(
      'Invalid configuration: JITTER_AMOUNT: JITTER_AMOUNT must be greater than 0; BAR_MODE: BAR_MODE must be "stacked" or "grouped"'
    );
  });
});
