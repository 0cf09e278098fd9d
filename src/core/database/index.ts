/**
 * SQLite access layer - Public API
 *
 * Usage:
 *   import { openDatabase } from './database/index.js';
 *   const db = openDatabase('/path/to/state.vscdb');
 */

export type { Database, DatabaseDriver, DatabaseOptions, Statement } from './types.js';
export { ReadonlyDatabaseError } from './errors.js';

import type { Database } from './types.js';
import { betterSqlite3Driver } from './drivers/better-sqlite3.js';

/**
 * Open an existing database in read-only mode
 *
 * @param path - Path to the SQLite database file
 * @throws Error if the file is missing or cannot be opened
 */
export function openDatabase(path: string): Database {
  return betterSqlite3Driver.open(path, { readonly: true, fileMustExist: true });
}
