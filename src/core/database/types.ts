/**
 * SQLite access layer - Type Definitions
 *
 * These interfaces define the contract between the extraction code and the
 * SQLite library. Connections are only ever opened read-only.
 */

/**
 * Prepared SQL statement that can be run multiple times with different parameters
 */
export interface Statement {
  /**
   * Run the statement and return all rows
   * @returns Array of row objects (empty array if no rows)
   */
  all(...params: unknown[]): unknown[];

  /**
   * Run the statement and stream rows one at a time
   *
   * The connection stays busy until the iterator is exhausted or returned.
   */
  iterate(...params: unknown[]): IterableIterator<unknown>;
}

/**
 * Open database connection
 */
export interface Database {
  /** Path the connection was opened from */
  readonly path: string;

  /**
   * Create a prepared statement from SQL
   */
  prepare(sql: string): Statement;

  /**
   * Close the database connection
   * After calling this, the database object should not be used
   */
  close(): void;
}

/**
 * Options for opening a database connection
 */
export interface DatabaseOptions {
  /** If true, open in read-only mode (writes will fail) */
  readonly: boolean;
  /** If true, opening a path that does not exist fails instead of creating a file */
  fileMustExist: boolean;
}

/**
 * Database driver implementation
 */
export interface DatabaseDriver {
  /**
   * Open a database connection using this driver
   *
   * @throws Error if database cannot be opened
   */
  open(path: string, options: DatabaseOptions): Database;
}
