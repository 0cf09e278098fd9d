/**
 * Error handling utilities and exit codes
 */

import { isInvalidConfigError, isOutputWriteError } from '../lib/errors.js';

/**
 * CLI exit codes following Unix conventions
 */
export const ExitCode = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  USAGE_ERROR: 2, // Invalid arguments
  IO_ERROR: 4, // Log file could not be written
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Custom error class for CLI errors with exit codes
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode = ExitCode.GENERAL_ERROR
  ) {
    super(message);
    this.name = 'CliError';
  }
}

/**
 * Map an error to the exit code the process should end with
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CliError) return error.exitCode;
  if (isOutputWriteError(error)) return ExitCode.IO_ERROR;
  if (isInvalidConfigError(error)) return ExitCode.USAGE_ERROR;
  return ExitCode.GENERAL_ERROR;
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  const code = exitCodeFor(error);

  if (error instanceof CliError || isOutputWriteError(error) || isInvalidConfigError(error)) {
    console.error(error.message);
    process.exit(code);
  }

  if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
    process.exit(code);
  }

  console.error('An unexpected error occurred');
  process.exit(code);
}
