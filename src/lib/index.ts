/**
 * cursor-prompt-log Library API
 *
 * `import { extractPrompts, writePromptLog } from 'cursor-prompt-log'`
 */

export type {
  CommandType,
  DatabaseReport,
  ExtractionResult,
  JsonObject,
  JsonValue,
  Platform,
  PromptRecord,
  RunMetadata,
  TimestampSource,
} from '../core/types.js';
export type { PromptLogConfig } from './config.js';
export type { Logger } from './logger.js';

export {
  DatabaseUnreadableError,
  PayloadParseError,
  OutputWriteError,
  InvalidConfigError,
  isDatabaseUnreadableError,
  isPayloadParseError,
  isOutputWriteError,
  isInvalidConfigError,
} from './errors.js';

export { normalize, parsePayload } from '../core/normalizer.js';
export { aggregate } from '../core/aggregator.js';
export { formatLog } from '../core/writer.js';
export { getCandidateStoragePaths } from './platform.js';

import type { ExtractionResult } from '../core/types.js';
import type { PromptLogConfig } from './config.js';
import { resolveConfig } from './config.js';
import { runExtraction } from '../core/extract.js';
import { writeLog } from '../core/writer.js';
import { silentLogger, type Logger } from './logger.js';

/**
 * Extract and merge prompt history from every Cursor database found.
 *
 * Unreadable databases and unparseable rows are skipped and reported in
 * `result.databases`.
 *
 * @throws {InvalidConfigError} If config parameters are invalid
 *
 * @example
 * const result = extractPrompts({ dataPath: '~/backups/cursor' });
 * console.log(result.records.length);
 */
export function extractPrompts(config?: PromptLogConfig, logger: Logger = silentLogger): ExtractionResult {
  const resolved = resolveConfig(config);
  return runExtraction({
    platform: resolved.platform,
    storagePath: resolved.storagePath,
    dedupe: resolved.dedupe,
    logger,
  });
}

/**
 * Write an extraction result as a log file.
 *
 * @returns The absolute path written
 * @throws {OutputWriteError} If the destination cannot be written
 *
 * @example
 * writePromptLog(extractPrompts(), { output: 'prompts.log' });
 */
export function writePromptLog(
  result: ExtractionResult,
  config?: Pick<PromptLogConfig, 'output'>,
  generatedAt: Date = new Date()
): string {
  const { outputPath } = resolveConfig(config);
  writeLog(result.records, outputPath, { generatedAt, workspace: result.primaryWorkspace });
  return outputPath;
}
