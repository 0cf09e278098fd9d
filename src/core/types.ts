/**
 * Type definitions for the Cursor prompt log
 * Maps Cursor's SQLite key/value rows to normalized prompt records
 */

export type Platform = 'windows' | 'macos' | 'linux';

/**
 * Symbolic interaction kind of a prompt
 */
export type CommandType = 'chat' | 'completion' | 'edit' | 'unknown';

/**
 * Which step of the timestamp policy produced a record's timestamp
 */
export type TimestampSource = 'payload' | 'epoch' | 'synthesized';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Key/value tables known to hold prompt history
 */
export type KeyValueTable = 'ItemTable' | 'cursorDiskKV';

/**
 * A row read from a Cursor database whose key matched a prompt pattern
 */
export interface RawRow {
  table: KeyValueTable;
  key: string;
  value: string;
}

/**
 * One normalized AI-assistant interaction
 */
export interface PromptRecord {
  readonly timestamp: Date;
  readonly timestampSource: TimestampSource;
  readonly commandType: CommandType;
  readonly content: string;
  /** The JSON object the record was built from, untouched */
  readonly raw: JsonObject;
  readonly workspace: string;
  readonly sourceDb: string;
  readonly key: string;
}

/**
 * Recognized shapes of a row's JSON payload
 */
export type Payload =
  | { kind: 'entry'; entry: JsonObject }
  | { kind: 'list'; entries: JsonValue[] }
  | { kind: 'container'; field: string; entries: JsonValue[] }
  | { kind: 'scalar'; value: JsonPrimitive };

/**
 * Per-database extraction outcome
 */
export interface DatabaseReport {
  dbPath: string;
  workspace: string;
  rowCount: number;
  recordCount: number;
  droppedRows: number;
  /** Set when the database was skipped */
  error?: string;
}

/**
 * Result of a full extraction run (before writing)
 */
export interface ExtractionResult {
  roots: string[];
  databases: DatabaseReport[];
  records: PromptRecord[];
  /** Workspace owning the most records, or 'unknown' */
  primaryWorkspace: string;
}

/**
 * Header data for the log file
 */
export interface RunMetadata {
  generatedAt: Date;
  workspace: string;
}
