/**
 * Prompt payload parsing and normalization
 *
 * Cursor has stored prompt history in several JSON shapes over time: a single
 * object, an array of objects, or an object wrapping such an array. Field names
 * vary by version, so each logical field is read from an ordered list of
 * synonyms.
 */

import type {
  CommandType,
  JsonObject,
  JsonValue,
  Payload,
  PromptRecord,
  TimestampSource,
} from './types.js';
import { PayloadParseError, errorMessage } from '../lib/errors.js';

/** Fields holding the prompt text, in priority order */
export const CONTENT_FIELDS = ['text', 'prompt', 'message', 'content', 'textDescription'] as const;

/** Fields holding an explicit timestamp (ISO string or epoch number) */
export const TIMESTAMP_FIELDS = ['timestamp', 'time', 'date'] as const;

/** Numeric creation/update fields read as epoch time */
export const EPOCH_FIELDS = ['createdAt', 'unixMs', 'lastUpdatedAt', 'updatedAt'] as const;

/**
 * Fields holding the interaction kind
 *
 * `type` is left out: conversation bubbles use it for the speaker role.
 */
export const COMMAND_TYPE_FIELDS = ['commandType', 'command_type'] as const;

/** Fields of a wrapper object that hold the actual entries */
export const CONTAINER_FIELDS = [
  'prompts',
  'messages',
  'bubbles',
  'tabs',
  'chatSessions',
  'conversation',
] as const;

const MAX_CONTAINER_DEPTH = 3;

/** Epoch values below this are seconds rather than milliseconds */
const EPOCH_SECONDS_LIMIT = 1e11;

const NUMERIC_COMMAND_TYPES: Record<number, CommandType> = {
  1: 'chat',
  2: 'completion',
  3: 'edit', // insert
  4: 'edit',
};

const NAMED_COMMAND_TYPES: Record<string, CommandType> = {
  chat: 'chat',
  composer: 'chat',
  agent: 'chat',
  ask: 'chat',
  completion: 'completion',
  tab: 'completion',
  edit: 'edit',
  insert: 'edit',
  cmdk: 'edit',
  apply: 'edit',
};

export type ParseResult = { ok: true; payload: Payload } | { ok: false; error: PayloadParseError };

/**
 * Context a row is normalized in
 */
export interface NormalizeContext {
  /** Position of the first record of this payload among the file's records */
  fallbackIndex: number;
  /** Base for synthesized timestamps */
  fallbackTime: Date;
  sourceDb: string;
  workspace: string;
  key: string;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBlank(value: JsonValue | undefined): boolean {
  return typeof value !== 'string' || value.trim() === '';
}

function hasTextField(entry: JsonObject): boolean {
  return CONTENT_FIELDS.some((field) => !isBlank(entry[field]));
}

function findContainerField(
  value: JsonObject
): { field: (typeof CONTAINER_FIELDS)[number]; entries: JsonValue[] } | null {
  for (const field of CONTAINER_FIELDS) {
    const inner = value[field];
    if (Array.isArray(inner) && inner.length > 0) {
      return { field, entries: inner };
    }
  }
  return null;
}

/**
 * Classify a parsed JSON value into one of the known payload shapes
 */
export function classifyPayload(value: JsonValue): Payload {
  if (Array.isArray(value)) {
    return { kind: 'list', entries: value };
  }
  if (isJsonObject(value)) {
    // Composer sessions keep a draft `text` beside the conversation
    const container = findContainerField(value);
    if (container) {
      return { kind: 'container', ...container };
    }
    return { kind: 'entry', entry: value };
  }
  return { kind: 'scalar', value };
}

/**
 * Parse a row value as JSON and classify its shape
 */
export function parsePayload(value: string): ParseResult {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(value) as JsonValue;
  } catch (error) {
    return { ok: false, error: new PayloadParseError(errorMessage(error)) };
  }
  return { ok: true, payload: classifyPayload(parsed) };
}

/**
 * Collect the text-bearing objects of a payload, unwrapping containers
 */
export function collectEntries(payload: Payload, depth = 0): JsonObject[] {
  switch (payload.kind) {
    case 'scalar':
      return [];
    case 'entry':
      return hasTextField(payload.entry) ? [payload.entry] : [];
    case 'list':
    case 'container': {
      const entries: JsonObject[] = [];
      for (const item of payload.entries) {
        if (!isJsonObject(item)) continue;
        const inner = classifyPayload(item);
        if (inner.kind === 'entry') {
          entries.push(...collectEntries(inner));
        } else if (depth < MAX_CONTAINER_DEPTH) {
          entries.push(...collectEntries(inner, depth + 1));
        }
      }
      return entries;
    }
  }
}

/**
 * Take the first non-blank text field, or '' when all are blank
 */
export function extractContent(entry: JsonObject): string {
  for (const field of CONTENT_FIELDS) {
    const value = entry[field];
    if (typeof value === 'string' && value.trim() !== '') {
      return value;
    }
  }
  return '';
}

function epochToDate(value: number): Date | null {
  if (!Number.isFinite(value) || value <= 0) return null;
  const ms = value < EPOCH_SECONDS_LIMIT ? value * 1000 : value;
  const date = new Date(ms);
  return Number.isNaN(date.getTime()) ? null : date;
}

function parseTimestampValue(value: JsonValue | undefined): Date | null {
  if (typeof value === 'number') {
    return epochToDate(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    if (/^\d+(\.\d+)?$/.test(value.trim())) {
      return epochToDate(Number(value));
    }
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

/**
 * Derive a timestamp from the payload, or synthesize one
 *
 * Synthesized timestamps count down from the fallback time, so entries
 * stored earlier sort first in a most-recent-first listing.
 */
export function deriveTimestamp(
  entry: JsonObject,
  fallbackTime: Date,
  fallbackIndex: number
): { timestamp: Date; source: TimestampSource } {
  for (const field of TIMESTAMP_FIELDS) {
    const date = parseTimestampValue(entry[field]);
    if (date) return { timestamp: date, source: 'payload' };
  }

  for (const field of EPOCH_FIELDS) {
    const value = entry[field];
    if (typeof value === 'number') {
      const date = epochToDate(value);
      if (date) return { timestamp: date, source: 'epoch' };
    }
  }

  return {
    timestamp: new Date(fallbackTime.getTime() - fallbackIndex),
    source: 'synthesized',
  };
}

/**
 * Map a stored command code to its symbolic kind
 */
export function mapCommandType(value: JsonValue | undefined): CommandType {
  if (typeof value === 'number') {
    return NUMERIC_COMMAND_TYPES[value] ?? 'unknown';
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) {
      return NUMERIC_COMMAND_TYPES[Number(trimmed)] ?? 'unknown';
    }
    return NAMED_COMMAND_TYPES[trimmed.toLowerCase()] ?? 'unknown';
  }
  return 'unknown';
}

function deriveCommandType(entry: JsonObject): CommandType {
  for (const field of COMMAND_TYPE_FIELDS) {
    if (entry[field] !== undefined) {
      return mapCommandType(entry[field]);
    }
  }
  return 'unknown';
}

/**
 * Build prompt records from an already parsed payload
 */
export function recordsFromPayload(payload: Payload, context: NormalizeContext): PromptRecord[] {
  return collectEntries(payload).map((entry, offset) => {
    const { timestamp, source } = deriveTimestamp(
      entry,
      context.fallbackTime,
      context.fallbackIndex + offset
    );
    return Object.freeze({
      timestamp,
      timestampSource: source,
      commandType: deriveCommandType(entry),
      content: extractContent(entry),
      raw: entry,
      workspace: context.workspace,
      sourceDb: context.sourceDb,
      key: context.key,
    });
  });
}

/**
 * Normalize one row value into prompt records
 *
 * Invalid JSON and objects whose text fields are all blank produce no
 * records; this never throws.
 */
export function normalize(value: string, context: NormalizeContext): PromptRecord[] {
  const result = parsePayload(value);
  if (!result.ok) {
    return [];
  }
  return recordsFromPayload(result.payload, context);
}
