/**
 * Storage discovery: where Cursor keeps its databases on this machine
 */

import { existsSync, readdirSync, statSync, type Dirent } from 'node:fs';
import { join, resolve } from 'node:path';
import type { Platform } from './types.js';
import { getCandidateStoragePaths, expandPath } from '../lib/platform.js';
import { errorMessage } from '../lib/errors.js';
import { silentLogger, type Logger } from '../lib/logger.js';

/**
 * File extensions of Cursor state databases
 */
const DATABASE_EXTENSIONS = ['.vscdb', '.db'];

/**
 * Get the directories (or files) to search for databases
 *
 * An existing override path is the only root. Otherwise the platform's
 * default locations that exist are returned, possibly none.
 */
export function locateStorageRoots(
  platform: Platform,
  overridePath?: string,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  if (overridePath) {
    const expanded = expandPath(overridePath);
    if (existsSync(expanded)) {
      return [expanded];
    }
  }

  return getCandidateStoragePaths(platform, env).filter((candidate) => existsSync(candidate));
}

function isDatabaseFile(name: string): boolean {
  return DATABASE_EXTENSIONS.some((ext) => name.endsWith(ext));
}

function walk(dir: string, found: string[], logger: Logger): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    logger.debug(`Skipping unreadable directory ${dir}: ${errorMessage(error)}`);
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(fullPath, found, logger);
    } else if (entry.isFile() && isDatabaseFile(entry.name)) {
      found.push(fullPath);
    }
  }
}

/**
 * Find every database file under the given roots, in a stable order
 *
 * A root that is itself a file is taken as-is.
 */
export function findDatabaseFiles(roots: string[], logger: Logger = silentLogger): string[] {
  const found: string[] = [];

  for (const root of roots) {
    let isFile: boolean;
    try {
      isFile = statSync(root).isFile();
    } catch (error) {
      logger.debug(`Skipping root ${root}: ${errorMessage(error)}`);
      continue;
    }

    if (isFile) {
      found.push(root);
    } else {
      walk(root, found, logger);
    }
  }

  const seen = new Set<string>();
  return found.filter((path) => {
    const key = resolve(path);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
