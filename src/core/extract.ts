/**
 * Extraction pipeline: locate databases, read, normalize and aggregate
 */

import { statSync } from 'node:fs';
import type { DatabaseReport, ExtractionResult, Platform, PromptRecord } from './types.js';
import { locateStorageRoots, findDatabaseFiles } from './locator.js';
import { readRows } from './reader.js';
import { parsePayload, recordsFromPayload } from './normalizer.js';
import { resolveWorkspace, UNKNOWN_WORKSPACE } from './workspace.js';
import { aggregate, primaryWorkspace } from './aggregator.js';
import {
  DatabaseUnreadableError,
  errorMessage,
  isDatabaseUnreadableError,
} from '../lib/errors.js';
import { silentLogger, type Logger } from '../lib/logger.js';
import { contractPath } from '../lib/platform.js';

export interface ExtractOptions {
  platform: Platform;
  /** Replaces the default search locations when it exists */
  storagePath?: string;
  dedupe?: boolean;
  /** Base for synthesized timestamps (default: each database file's mtime) */
  fallbackTime?: Date;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export interface DatabaseExtraction {
  report: DatabaseReport;
  records: PromptRecord[];
}

function modificationTime(dbPath: string): Date {
  try {
    return statSync(dbPath).mtime;
  } catch (error) {
    throw new DatabaseUnreadableError(dbPath, errorMessage(error));
  }
}

/**
 * Extract the prompt records of one database
 *
 * Timestamp-less entries are dated from `fallbackTime`, or from the file's
 * modification time, so an unchanged database always yields the same log.
 * An unreadable database yields no records and a report carrying the error;
 * rows read before the failure are discarded with it.
 */
export function extractFromDatabase(
  dbPath: string,
  fallbackTime?: Date,
  logger: Logger = silentLogger
): DatabaseExtraction {
  const workspace = resolveWorkspace(dbPath);
  const report: DatabaseReport = {
    dbPath,
    workspace,
    rowCount: 0,
    recordCount: 0,
    droppedRows: 0,
  };
  const records: PromptRecord[] = [];

  try {
    const baseTime = fallbackTime ?? modificationTime(dbPath);
    for (const row of readRows(dbPath)) {
      report.rowCount++;

      const parsed = parsePayload(row.value);
      if (!parsed.ok) {
        report.droppedRows++;
        logger.debug(`  Dropped ${row.table}/${row.key}: ${parsed.error.message}`);
        continue;
      }

      const rowRecords = recordsFromPayload(parsed.payload, {
        fallbackIndex: records.length,
        fallbackTime: baseTime,
        sourceDb: dbPath,
        workspace,
        key: row.key,
      });
      if (rowRecords.length === 0) {
        report.droppedRows++;
        logger.debug(`  Dropped ${row.table}/${row.key}: no usable text field`);
        continue;
      }
      records.push(...rowRecords);
    }
  } catch (error) {
    if (!isDatabaseUnreadableError(error)) {
      throw error;
    }
    report.error = error.reason;
    report.recordCount = 0;
    logger.debug(`Skipping ${contractPath(dbPath)}: ${errorMessage(error)}`);
    return { report, records: [] };
  }

  report.recordCount = records.length;
  logger.debug(
    `Processed ${contractPath(dbPath)} (workspace: ${workspace}): ` +
      `${report.rowCount} matching rows, ${report.recordCount} prompts`
  );
  return { report, records };
}

/**
 * Run the full extraction over every discovered database
 */
export function runExtraction(options: ExtractOptions): ExtractionResult {
  const logger = options.logger ?? silentLogger;

  const roots = locateStorageRoots(options.platform, options.storagePath, options.env);
  if (options.storagePath && !roots.includes(options.storagePath)) {
    logger.debug(`Storage path ${options.storagePath} does not exist, using default locations`);
  }
  for (const root of roots) {
    logger.debug(`Search root: ${contractPath(root)}`);
  }

  const dbPaths = findDatabaseFiles(roots, logger);
  logger.debug(`Found ${dbPaths.length} database file(s)`);

  const databases: DatabaseReport[] = [];
  const groups: PromptRecord[][] = [];
  for (const dbPath of dbPaths) {
    const { report, records } = extractFromDatabase(dbPath, options.fallbackTime, logger);
    databases.push(report);
    groups.push(records);
  }

  const records = aggregate(groups, { dedupe: options.dedupe ?? true });
  logger.debug(`Total prompts after merge: ${records.length}`);

  return {
    roots,
    databases,
    records,
    primaryWorkspace: primaryWorkspace(records, UNKNOWN_WORKSPACE),
  };
}
