/**
 * Extract command - write the prompt log
 */

import type { Command } from 'commander';
import { existsSync, statSync } from 'node:fs';
import { resolveConfig } from '../../lib/config.js';
import { createLogger } from '../../lib/logger.js';
import { runExtraction } from '../../core/extract.js';
import { writeLog, DEFAULT_OUTPUT_FILE } from '../../core/writer.js';
import { formatNoDatabases, formatDatabaseReport, formatRunSummary } from '../formatters/summary.js';
import { CliError, ExitCode, handleError } from '../errors.js';

interface ExtractCommandOptions {
  output?: string;
  verbose?: boolean;
  dataPath?: string;
  keepDuplicates?: boolean;
}

/**
 * Register the extraction options and action on the root program
 */
export function registerExtractCommand(program: Command): void {
  program
    .option('-o, --output <path>', `Output log file (default: ${DEFAULT_OUTPUT_FILE})`)
    .option('--verbose', 'Print per-step diagnostics to stderr')
    .option('--data-path <path>', 'Search this Cursor storage path instead of the defaults')
    .option('--keep-duplicates', 'Keep prompts with identical timestamp, content and type')
    .action((options: ExtractCommandOptions) => {
      try {
        const config = resolveConfig({
          output: options.output,
          verbose: options.verbose,
          dataPath: options.dataPath,
          keepDuplicates: options.keepDuplicates,
        });

        if (existsSync(config.outputPath) && statSync(config.outputPath).isDirectory()) {
          throw new CliError(
            `Output path is a directory: ${config.outputPath}. Pass a file path to --output.`,
            ExitCode.USAGE_ERROR
          );
        }

        const logger = createLogger({ verbose: config.verbose });
        logger.debug(`Platform: ${config.platform}`);

        const result = runExtraction({
          platform: config.platform,
          storagePath: config.storagePath,
          dedupe: config.dedupe,
          logger,
        });

        if (result.databases.length === 0) {
          logger.warn(formatNoDatabases(config.storagePath));
        }
        for (const report of result.databases) {
          logger.debug(formatDatabaseReport(report));
        }

        writeLog(result.records, config.outputPath, {
          generatedAt: new Date(),
          workspace: result.primaryWorkspace,
        });

        logger.info(formatRunSummary(result, config.outputPath));
      } catch (error) {
        handleError(error);
      }
    });
}
