export type ReportErrorCode =
  | 'UNMAPPED_LABEL'
  | 'MISSING_DIMENSION'
  | 'INVALID_ROW'
  | 'OUTPUT_WRITE_ERROR'
  | 'CONFIG_ERROR'
  | 'DATA_ERROR';

export interface ErrorDetails {
  message: string;
  code: string;
  recoverable: boolean;
}

/**
 * Base class for everything the reporting pipeline raises
 */
export class ReportError extends Error {
  readonly code: ReportErrorCode;
  readonly recoverable: boolean;

  constructor(code: ReportErrorCode, message: string, recoverable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.recoverable = recoverable;
  }
}

/**
 * A label was not found in a category map and the map's fallback was used.
 * Never thrown by the mapper itself; handed to the caller's onUnmapped hook.
 */
export class UnmappedLabelWarning extends ReportError {
  readonly dimension: string;
  readonly label: string;
  readonly fallback: string;

  constructor(dimension: string, label: string, fallback: string) {
    super('UNMAPPED_LABEL', `Unmapped ${dimension} label "${label}", using ${fallback}`, true);
    this.dimension = dimension;
    this.label = label;
    this.fallback = fallback;
  }
}

// One record lacks a numeric dimension; only that record is dropped
export class MissingDimensionError extends ReportError {
  readonly record: string;
  readonly dimension: string;

  constructor(record: string, dimension: string) {
    super('MISSING_DIMENSION', `Record "${record}" has no ${dimension} value`, true);
    this.record = record;
    this.dimension = dimension;
  }
}

// One source row failed validation; only that row is skipped
export class InvalidRowError extends ReportError {
  readonly record: string;
  readonly dimension: string;

  constructor(source: string, line: number, field: string, detail: string) {
    super('INVALID_ROW', `${source} line ${line}: ${detail}`, true);
    this.record = `${source} line ${line}`;
    this.dimension = field;
  }
}

export class OutputWriteError extends ReportError {
  readonly outputPath: string;

  constructor(outputPath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('OUTPUT_WRITE_ERROR', `Failed to write ${outputPath}: ${reason}`, false, { cause });
    this.outputPath = outputPath;
  }
}

export class ReportConfigError extends ReportError {
  constructor(message: string) {
    super('CONFIG_ERROR', message, false);
  }
}

export class ReportDataError extends ReportError {
  constructor(message: string, cause?: unknown) {
    super('DATA_ERROR', message, false, cause === undefined ? undefined : { cause });
  }
}

export const isReportError = (error: unknown): error is ReportError => {
  return error instanceof ReportError;
};

// Get a printable message for anything thrown
export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return 'An unexpected error occurred.';
};

export const formatError = (error: unknown): ErrorDetails => {
  if (isReportError(error)) {
    return {
      message: error.message,
      code: error.code,
      recoverable: error.recoverable,
    };
  }

  if (error instanceof Error) {
    // File system errors from Node carry their own code (ENOENT, EACCES...)
    const code = 'code' in error && typeof error.code === 'string' ? error.code : 'UNKNOWN_ERROR';
    return {
      message: error.message,
      code,
      recoverable: false,
    };
  }

  return {
    message: getErrorMessage(error),
    code: 'UNKNOWN_ERROR',
    recoverable: false,
  };
};
