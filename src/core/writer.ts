/**
 * Plain-text log rendering and atomic file output
 */

import { renameSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import type { PromptRecord, RunMetadata } from './types.js';
import { OutputWriteError, errorMessage } from '../lib/errors.js';

export const DEFAULT_OUTPUT_FILE = 'cursor-prompts.log';

const HEADER_RULE = '='.repeat(80);
const RECORD_RULE = '-'.repeat(80);

/**
 * Format the log header block
 */
export function formatHeader(metadata: RunMetadata): string {
  return (
    `Cursor Prompts Log - Generated at ${metadata.generatedAt.toISOString()}\n` +
    `Workspace: ${metadata.workspace || 'unknown'}\n` +
    `${HEADER_RULE}\n\n`
  );
}

/**
 * Format one record block
 */
export function formatRecord(record: PromptRecord): string {
  return (
    `Timestamp: ${record.timestamp.toISOString()}\n` +
    `Command Type: ${record.commandType}\n` +
    'Content:\n' +
    `${record.content}\n` +
    '\nRaw Data:\n' +
    `${JSON.stringify(record.raw, null, 2)}\n` +
    `${RECORD_RULE}\n\n`
  );
}

/**
 * Render the complete log text
 */
export function formatLog(records: readonly PromptRecord[], metadata: RunMetadata): string {
  return formatHeader(metadata) + records.map(formatRecord).join('');
}

/**
 * Write the log file
 *
 * The text is written to a temporary file beside the destination and renamed
 * over it, so the destination is never left half-written.
 *
 * @throws {OutputWriteError} If the destination cannot be written
 */
export function writeLog(
  records: readonly PromptRecord[],
  outputPath: string,
  metadata: RunMetadata
): void {
  const content = formatLog(records, metadata);
  const tempPath = join(dirname(outputPath), `.${basename(outputPath)}.${process.pid}.tmp`);

  try {
    writeFileSync(tempPath, content, 'utf-8');
    renameSync(tempPath, outputPath);
  } catch (error) {
    let reason = errorMessage(error);
    try {
      rmSync(tempPath, { force: true });
    } catch (cleanupError) {
      reason += ` (could not remove ${tempPath}: ${errorMessage(cleanupError)})`;
    }
    throw new OutputWriteError(outputPath, reason);
  }
}
