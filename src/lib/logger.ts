/**
 * Console logging for the CLI and the extraction pipeline
 *
 * Diagnostics go to stderr so that stdout only carries the run summary.
 */

import pc from 'picocolors';

const PREFIX = '[cursor-prompt-log]';

export interface Logger {
  /** Per-step diagnostics, printed only in verbose or debug mode */
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

/**
 * Check if output supports colors
 */
export function supportsColor(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }

  return process.stdout.isTTY === true;
}

/**
 * Whether DEBUG or CURSOR_PROMPT_LOG_DEBUG asks for diagnostics
 */
export function isDebugEnabled(): boolean {
  return Boolean(process.env['DEBUG'] || process.env['CURSOR_PROMPT_LOG_DEBUG']);
}

/**
 * Log a debug message to stderr if debug mode is enabled
 */
export function debugLog(message: string): void {
  if (isDebugEnabled()) {
    console.error(`${PREFIX} ${message}`);
  }
}

/**
 * Create a logger writing to the console
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose === true || isDebugEnabled();
  const colors = pc.createColors(supportsColor());

  return {
    debug(message: string): void {
      if (verbose) {
        console.error(colors.dim(`${PREFIX} ${message}`));
      }
    },
    info(message: string): void {
      console.log(message);
    },
    warn(message: string): void {
      console.error(colors.yellow(message));
    },
  };
}

/**
 * Logger that discards everything (library default)
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
