#!/usr/bin/env node

/**
 * CLI entry point for cursor-prompt-log
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { handleError, ExitCode } from './errors.js';
import { registerExtractCommand } from './commands/extract.js';

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8')) as {
  version: string;
};

const program = new Command();

program
  .name('cursor-prompt-log')
  .description("Extract AI prompt history from Cursor's local databases into a log file")
  .version(packageJson.version, '-v, --version', 'Show version number');

registerExtractCommand(program);

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error);
  }
}

main().catch((error) => {
  console.error('Unexpected error:', error);
  process.exit(ExitCode.GENERAL_ERROR);
});
