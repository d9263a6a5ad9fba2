/**
 * Error types for the sales report pipeline.
 *
 * Everything here is fatal: it aborts the run and surfaces to the caller.
 * Per-row problems are collected as ValidationIssue values instead.
 */

export type SalesReportErrorCode =
  | 'FILE_NOT_FOUND'
  | 'FILE_READ'
  | 'ENCODING'
  | 'MALFORMED_HEADER'
  | 'INVALID_DATE'
  | 'INVALID_RANGE'
  | 'UNSUPPORTED_FORMAT'
  | 'CONFIG';

/**
 * Base class. `code` is stable and safe to branch on.
 */
export class SalesReportError extends Error {
  readonly code: SalesReportErrorCode;

  constructor(code: SalesReportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SalesReportError';
    this.code = code;
  }
}

export class FileNotFoundError extends SalesReportError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super('FILE_NOT_FOUND', `File not found: ${path}`, { cause });
    this.name = 'FileNotFoundError';
    this.path = path;
  }
}

export class FileReadError extends SalesReportError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('FILE_READ', `Could not read ${path}: ${reason}`, { cause });
    this.name = 'FileReadError';
    this.path = path;
  }
}

/**
 * Neither UTF-8 nor the Windows-1252 fallback could decode the file.
 */
export class EncodingError extends SalesReportError {
  readonly path: string;
  readonly attempted: readonly string[];

  constructor(path: string, attempted: readonly string[]) {
    super('ENCODING', `Could not decode ${path} (tried ${attempted.join(', ')})`);
    this.name = 'EncodingError';
    this.path = path;
    this.attempted = attempted;
  }
}

export class MalformedHeaderError extends SalesReportError {
  readonly missingColumns: readonly string[];

  constructor(missingColumns: readonly string[], message?: string) {
    super(
      'MALFORMED_HEADER',
      message ?? `Missing required columns: ${missingColumns.join(', ')}`,
    );
    this.name = 'MalformedHeaderError';
    this.missingColumns = missingColumns;
  }
}

export class InvalidDateError extends SalesReportError {
  readonly value: string;

  constructor(value: string, label = 'Date') {
    super('INVALID_DATE', `${label} "${value}" is not a valid YYYY-MM-DD date`);
    this.name = 'InvalidDateError';
    this.value = value;
  }
}

export class InvalidRangeError extends SalesReportError {
  readonly start: string;
  readonly end: string;

  constructor(start: string, end: string) {
    super('INVALID_RANGE', `Start date ${start} is after end date ${end}`);
    this.name = 'InvalidRangeError';
    this.start = start;
    this.end = end;
  }
}

export class UnsupportedFormatError extends SalesReportError {
  readonly format: string;

  constructor(format: string, available: readonly string[]) {
    super(
      'UNSUPPORTED_FORMAT',
      `Unsupported format "${format}". Available: ${available.join(', ')}`,
    );
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

export class ConfigError extends SalesReportError {
  constructor(message: string) {
    super('CONFIG', message);
    this.name = 'ConfigError';
  }
}
