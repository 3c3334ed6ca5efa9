/**
 * Structured logging for report runs.
 * Every pipeline stage logs through this instead of calling console directly
 * so that output has one format: timestamp, level, context, metadata.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: string;
  metadata?: Record<string, unknown>;
  error?: Error;
}

export interface LogOptions {
  context?: string;
  metadata?: Record<string, unknown>;
  error?: Error;
}

const LEVELS = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

const isLogLevel = (value: string): value is LogLevel => {
  return LEVELS.some(level => level === value);
};

/**
 * Resolve the starting level from the environment.
 * LOG_LEVEL wins; otherwise production shows INFO and above, development shows DEBUG.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.LOG_LEVEL?.trim().toLowerCase();
  if (requested && isLogLevel(requested)) {
    return requested;
  }
  return env.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
}

type Sink = (line: string) => void;

// Looked up at call time so spies installed after construction still see output.
const SINKS: Record<LogLevel, Sink> = {
  [LogLevel.DEBUG]: line => console.log(line),
  [LogLevel.INFO]: line => console.info(line),
  [LogLevel.WARN]: line => console.warn(line),
  [LogLevel.ERROR]: line => console.error(line)
};

const banner: Sink = line => console.log(line);

export function formatLogLine(entry: LogEntry): string {
  const { level, message, timestamp, context, metadata, error } = entry;
  const contextStr = context ? `[${context}]` : '';
  const metaStr = metadata && Object.keys(metadata).length > 0
    ? ` ${JSON.stringify(metadata)}`
    : '';
  const errorStr = error ? `\n${error.stack || error.message}` : '';

  return `[${timestamp}] ${level.toUpperCase()} ${contextStr} ${message}${metaStr}${errorStr}`;
}

export class ReportLogger {
  private logLevel: LogLevel;

  constructor(level: LogLevel = resolveLogLevel()) {
    this.logLevel = level;
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private write(level: LogLevel, message: string, options: LogOptions | undefined, sink: Sink): void {
    sink(formatLogLine({ level, message, timestamp: new Date().toISOString(), ...options }));
  }

  private log(level: LogLevel, message: string, options?: LogOptions, sink: Sink = SINKS[level]): void {
    if (this.enabled(level)) {
      this.write(level, message, options, sink);
    }
  }

  debug(message: string, options?: LogOptions): void {
    this.log(LogLevel.DEBUG, message, options);
  }

  info(message: string, options?: LogOptions): void {
    this.log(LogLevel.INFO, message, options);
  }

  warn(message: string, options?: LogOptions): void {
    this.log(LogLevel.WARN, message, options);
  }

  error(message: string, options?: LogOptions): void {
    this.log(LogLevel.ERROR, message, options);
  }

  /** Run banner at INFO; hidden when the level is WARN or above. */
  startup(message: string, options?: LogOptions): void {
    this.log(LogLevel.INFO, `🚀 ${message}`, options, banner);
  }

  success(message: string, options?: LogOptions): void {
    this.log(LogLevel.INFO, `✅ ${message}`, options, banner);
  }

  /** Fatal errors bypass the level filter. */
  critical(message: string, options?: LogOptions): void {
    this.write(LogLevel.ERROR, `🔴 CRITICAL: ${message}`, options, SINKS[LogLevel.ERROR]);
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }
}

export const logger = new ReportLogger();
