/**
 * Custom error classes for the prompt extraction pipeline
 *
 * Only OutputWriteError is fatal for a run; the others describe a single
 * database or row that gets skipped.
 */

/**
 * Thrown when a database file cannot be opened or queried.
 *
 * Recovery: the pipeline skips the file. Close Cursor if the file is locked.
 */
export class DatabaseUnreadableError extends Error {
  override name = 'DatabaseUnreadableError' as const;

  /** Path to the database file */
  path: string;

  /** Underlying driver message */
  reason: string;

  constructor(path: string, reason: string) {
    super(`Cannot read database: ${path}. ${reason}`);
    this.path = path;
    this.reason = reason;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DatabaseUnreadableError);
    }
  }
}

/**
 * Describes a row whose value is not valid JSON.
 *
 * Recovery: the row is dropped.
 */
export class PayloadParseError extends Error {
  override name = 'PayloadParseError' as const;

  /** Parser message */
  reason: string;

  constructor(reason: string) {
    super(`Invalid JSON payload: ${reason}`);
    this.reason = reason;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PayloadParseError);
    }
  }
}

/**
 * Thrown when the log file cannot be written.
 *
 * Recovery: check permissions and that the parent directory exists, or pass --output.
 */
export class OutputWriteError extends Error {
  override name = 'OutputWriteError' as const;

  /** Destination path */
  path: string;

  /** Underlying OS error message */
  reason: string;

  constructor(path: string, reason: string) {
    super(`Cannot write log file: ${path}. ${reason}`);
    this.path = path;
    this.reason = reason;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, OutputWriteError);
    }
  }
}

/**
 * Thrown when configuration parameters are invalid.
 *
 * Recovery: fix the option or environment variable named in the message.
 */
export class InvalidConfigError extends Error {
  override name = 'InvalidConfigError' as const;

  /** Name of invalid config field */
  field: string;

  /** Invalid value provided */
  value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    super(`Invalid config.${field}: ${reason} (got: ${JSON.stringify(value)})`);
    this.field = field;
    this.value = value;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidConfigError);
    }
  }
}

/**
 * Type guard to check if an error is a DatabaseUnreadableError.
 */
export function isDatabaseUnreadableError(error: unknown): error is DatabaseUnreadableError {
  return error instanceof DatabaseUnreadableError;
}

/**
 * Type guard to check if an error is a PayloadParseError.
 */
export function isPayloadParseError(error: unknown): error is PayloadParseError {
  return error instanceof PayloadParseError;
}

/**
 * Type guard to check if an error is an OutputWriteError.
 */
export function isOutputWriteError(error: unknown): error is OutputWriteError {
  return error instanceof OutputWriteError;
}

/**
 * Type guard to check if an error is an InvalidConfigError.
 */
export function isInvalidConfigError(error: unknown): error is InvalidConfigError {
  return error instanceof InvalidConfigError;
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
