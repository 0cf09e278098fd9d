/**
 * SQLite access layer - Error Classes
 */

/**
 * Error thrown when a statement is prepared that would modify the database
 */
export class ReadonlyDatabaseError extends Error {
  constructor(sql: string) {
    super(`Refusing to run a write statement on a read-only connection: ${sql.trim().split(/\s+/)[0] ?? ''}`);
    this.name = 'ReadonlyDatabaseError';
  }
}
