/**
 * better-sqlite3 Driver Adapter
 *
 * Wraps the better-sqlite3 library to conform to the DatabaseDriver interface.
 */

import BetterSqlite3 from 'better-sqlite3';
import type { Database, DatabaseDriver, DatabaseOptions, Statement } from '../types.js';
import { ReadonlyDatabaseError } from '../errors.js';
import { debugLog } from '../../../lib/logger.js';

const WRITE_STATEMENT = /^\s*(INSERT|UPDATE|DELETE|REPLACE|DROP|CREATE|ALTER|VACUUM|ATTACH)\b/i;

/**
 * Wrapper for better-sqlite3 Statement
 */
class BetterSqlite3Statement implements Statement {
  constructor(private stmt: BetterSqlite3.Statement<unknown[], unknown>) {}

  all(...params: unknown[]): unknown[] {
    return this.stmt.all(...params);
  }

  iterate(...params: unknown[]): IterableIterator<unknown> {
    return this.stmt.iterate(...params);
  }
}

/**
 * Wrapper for better-sqlite3 Database
 */
class BetterSqlite3Database implements Database {
  constructor(
    private nativeDb: BetterSqlite3.Database,
    readonly path: string,
    private isReadonly: boolean
  ) {}

  prepare(sql: string): Statement {
    if (this.isReadonly && WRITE_STATEMENT.test(sql)) {
      throw new ReadonlyDatabaseError(sql);
    }
    return new BetterSqlite3Statement(this.nativeDb.prepare<unknown[], unknown>(sql));
  }

  close(): void {
    this.nativeDb.close();
  }
}

/**
 * better-sqlite3 driver implementation
 */
export const betterSqlite3Driver: DatabaseDriver = {
  open(path: string, options: DatabaseOptions): Database {
    const db = new BetterSqlite3(path, {
      readonly: options.readonly,
      fileMustExist: options.fileMustExist,
    });
    debugLog(`Opened database with better-sqlite3: ${path} (readonly: ${options.readonly})`);
    return new BetterSqlite3Database(db, path, options.readonly);
  },
};
