/**
 * Console output for an extraction run
 */

import pc from 'picocolors';
import type { DatabaseReport, ExtractionResult } from '../../core/types.js';
import { supportsColor } from '../../lib/logger.js';
import { contractPath } from '../../lib/platform.js';

function colors() {
  return pc.createColors(supportsColor());
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Format the warning shown when no database was found
 *
 * The first line is left plain for the logger's warning color.
 */
export function formatNoDatabases(storagePath?: string): string {
  const c = colors();
  const where = storagePath
    ? `under ${contractPath(storagePath)}`
    : 'in the default Cursor locations';
  return (
    `No Cursor databases found ${where}.` +
    '\n' +
    c.dim('Set CURSOR_STORAGE_PATH or pass --data-path to search elsewhere.')
  );
}

/**
 * Format one database line for verbose output
 */
export function formatDatabaseReport(report: DatabaseReport): string {
  const c = colors();
  const path = contractPath(report.dbPath);
  if (report.error !== undefined) {
    return `  ${c.red('skipped')} ${path} ${c.dim(`(${report.error})`)}`;
  }
  return (
    `  ${c.green('read')}    ${path} ` +
    c.dim(`(${plural(report.rowCount, 'row')}, ${plural(report.recordCount, 'prompt')})`)
  );
}

/**
 * Format the closing summary of a run
 */
export function formatRunSummary(result: ExtractionResult, outputPath: string): string {
  const c = colors();
  const skipped = result.databases.filter((db) => db.error !== undefined).length;
  const lines = [
    `Found ${plural(result.databases.length, 'database file')}` +
      (skipped > 0 ? c.dim(` (${skipped} unreadable)`) : ''),
    `Wrote ${c.bold(plural(result.records.length, 'prompt'))} to ${c.cyan(contractPath(outputPath))}`,
  ];
  return lines.join('\n');
}
