/**
 * Shared test fixtures
 */
import Database from 'better-sqlite3';
import { mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { JsonObject, PromptRecord } from '../../src/core/types.js';

export function sampleRecord(overrides: Partial<PromptRecord> = {}): PromptRecord {
  const raw: JsonObject = { text: 'Hello', commandType: 1 };
  return {
    timestamp: new Date('2024-01-15T10:30:00.000Z'),
    timestampSource: 'payload',
    commandType: 'chat',
    content: 'Hello',
    raw,
    workspace: '/home/user/project',
    sourceDb: '/tmp/state.vscdb',
    key: 'aiService.prompts',
    ...overrides,
  };
}

const tempDirs: string[] = [];

/**
 * Create a temporary directory removed by cleanupTempDirs()
 */
export function makeTempDir(prefix = 'cursor-prompt-log-'): string {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  for (const dir of tempDirs) {
    rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
}

export interface FixtureRow {
  key: string;
  value: string | Buffer;
}

/**
 * Write a Cursor-style state database with the given rows
 */
export function createStateDb(
  path: string,
  rows: FixtureRow[],
  table: 'ItemTable' | 'cursorDiskKV' = 'ItemTable'
): string {
  mkdirSync(dirname(path), { recursive: true });
  const db = new Database(path);
  db.exec(`CREATE TABLE IF NOT EXISTS ${table} (key TEXT UNIQUE ON CONFLICT REPLACE, value BLOB)`);
  const insert = db.prepare(`INSERT INTO ${table} (key, value) VALUES (?, ?)`);
  for (const row of rows) {
    insert.run(row.key, row.value);
  }
  db.close();
  return path;
}
