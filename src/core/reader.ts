/**
 * Read prompt-related rows from a Cursor state database
 */

import { openDatabase, type Database } from './database/index.js';
import type { KeyValueTable, RawRow } from './types.js';
import { DatabaseUnreadableError, errorMessage } from '../lib/errors.js';

/**
 * Key substrings that mark a row as prompt history.
 * Rows whose key contains none of these are never read.
 */
export const PROMPT_KEY_PATTERNS = [
  'aiService.prompts',
  'aiService.generations',
  'composerData',
  'aichat.chatdata',
  'chat.chatdata',
] as const;

/**
 * Key/value tables to query, in order
 */
const KEY_VALUE_TABLES: KeyValueTable[] = ['ItemTable', 'cursorDiskKV'];

const KEY_FILTER = PROMPT_KEY_PATTERNS.map(() => 'instr(key, ?) > 0').join(' OR ');

interface KeyValueRow {
  key: unknown;
  value: unknown;
}

function isKeyValueRow(row: unknown): row is KeyValueRow {
  return typeof row === 'object' && row !== null && 'key' in row && 'value' in row;
}

/**
 * Decode a value column (TEXT or BLOB) as UTF-8 text
 */
function decodeValue(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return null;
}

function listTables(db: Database): KeyValueTable[] {
  const rows = db.prepare("SELECT name FROM sqlite_master WHERE type = 'table'").all();
  const names = new Set(
    rows.map((row) => (typeof row === 'object' && row !== null && 'name' in row ? row.name : null))
  );
  return KEY_VALUE_TABLES.filter((table) => names.has(table));
}

/**
 * Check whether a key belongs to prompt history
 */
export function isPromptKey(key: string): boolean {
  return PROMPT_KEY_PATTERNS.some((pattern) => key.includes(pattern));
}

/**
 * Stream the prompt-related rows of one database
 *
 * The database is opened read-only when iteration starts and closed when the
 * generator completes, throws or is returned early. Every call opens its own
 * connection.
 *
 * @throws {DatabaseUnreadableError} If the file is missing, locked, corrupt or not SQLite
 */
export function* readRows(dbPath: string): Generator<RawRow, void, undefined> {
  let db: Database;
  try {
    db = openDatabase(dbPath);
  } catch (error) {
    throw new DatabaseUnreadableError(dbPath, errorMessage(error));
  }

  try {
    let tables: KeyValueTable[];
    try {
      tables = listTables(db);
    } catch (error) {
      throw new DatabaseUnreadableError(dbPath, errorMessage(error));
    }

    for (const table of tables) {
      let rows: IterableIterator<unknown>;
      try {
        rows = db
          .prepare(`SELECT key, value FROM ${table} WHERE ${KEY_FILTER} ORDER BY rowid ASC`)
          .iterate(...PROMPT_KEY_PATTERNS);
      } catch (error) {
        throw new DatabaseUnreadableError(dbPath, errorMessage(error));
      }

      try {
        while (true) {
          let next: IteratorResult<unknown>;
          try {
            next = rows.next();
          } catch (error) {
            throw new DatabaseUnreadableError(dbPath, errorMessage(error));
          }
          if (next.done) break;

          const row = next.value;
          if (!isKeyValueRow(row) || typeof row.key !== 'string') continue;
          const value = decodeValue(row.value);
          if (value === null) continue;

          yield { table, key: row.key, value };
        }
      } finally {
        // An unfinished statement keeps the connection busy and blocks close()
        rows.return?.();
      }
    }
  } finally {
    db.close();
  }
}
