import { describe, it, expect } from 'vitest';
import {
  parsePayload,
  classifyPayload,
  collectEntries,
  extractContent,
  deriveTimestamp,
  mapCommandType,
  normalize,
  type NormalizeContext,
} from '../../src/core/normalizer.js';
import { PayloadParseError } from '../../src/lib/errors.js';

const extractedAt = new Date('2024-06-01T12:00:00.000Z');

function context(overrides: Partial<NormalizeContext> = {}): NormalizeContext {
  return {
    fallbackIndex: 0,
    fallbackTime: extractedAt,
    sourceDb: '/data/state.vscdb',
    workspace: '/home/user/project',
    key: 'aiService.prompts',
    ...overrides,
  };
}

// =============================================================================
// parsePayload / classifyPayload
// =============================================================================
describe('parsePayload', () => {
  it('fails with PayloadParseError on invalid JSON', () => {
    const result = parsePayload('not valid json');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(PayloadParseError);
    }
  });

  it('classifies a single object as entry', () => {
    expect(parsePayload('{"text":"hi"}')).toEqual({
      ok: true,
      payload: { kind: 'entry', entry: { text: 'hi' } },
    });
  });

  it('classifies an array as list', () => {
    expect(parsePayload('[{"text":"a"},1]')).toEqual({
      ok: true,
      payload: { kind: 'list', entries: [{ text: 'a' }, 1] },
    });
  });

  it('classifies a scalar', () => {
    expect(parsePayload('42')).toEqual({ ok: true, payload: { kind: 'scalar', value: 42 } });
  });
});

describe('classifyPayload', () => {
  it('treats an object without text wrapping an array as a container', () => {
    expect(classifyPayload({ bubbles: [{ text: 'x' }] })).toEqual({
      kind: 'container',
      field: 'bubbles',
      entries: [{ text: 'x' }],
    });
  });

  it('prefers the conversation over a draft text field', () => {
    const value = { composerId: 'c1', text: '', conversation: [{ type: 1, text: 'Fix the build' }] };
    expect(classifyPayload(value)).toEqual({
      kind: 'container',
      field: 'conversation',
      entries: [{ type: 1, text: 'Fix the build' }],
    });
  });

  it('treats an object with an empty container as an entry', () => {
    const value = { text: 'hi', messages: [] };
    expect(classifyPayload(value)).toEqual({ kind: 'entry', entry: value });
  });
});

describe('collectEntries', () => {
  it('returns nothing for scalars', () => {
    expect(collectEntries({ kind: 'scalar', value: 'text' })).toEqual([]);
  });

  it('returns nothing for an entry without a text field', () => {
    expect(collectEntries({ kind: 'entry', entry: { name: 'x' } })).toEqual([]);
  });

  it('returns nothing for an entry whose text is blank', () => {
    expect(collectEntries({ kind: 'entry', entry: { text: '   ', prompt: '' } })).toEqual([]);
  });

  it('unwraps composer sessions nested in a list', () => {
    const entries = collectEntries({
      kind: 'list',
      entries: [{ text: '', conversation: [{ text: 'inner' }] }],
    });
    expect(entries).toEqual([{ text: 'inner' }]);
  });

  it('unwraps nested legacy chat data', () => {
    const data = {
      tabs: [{ bubbles: [{ type: 'user', text: 'first' }, { type: 'ai', text: 'second' }] }],
    };
    const entries = collectEntries(classifyPayload(data));
    expect(entries.map((e) => e.text)).toEqual(['first', 'second']);
  });

  it('skips non-object list items', () => {
    const entries = collectEntries({ kind: 'list', entries: ['a', null, { text: 'b' }] });
    expect(entries).toEqual([{ text: 'b' }]);
  });
});

// =============================================================================
// Field extraction
// =============================================================================
describe('extractContent', () => {
  it('takes the first non-empty field in priority order', () => {
    expect(extractContent({ prompt: 'p', text: 't' })).toBe('t');
    expect(extractContent({ text: '', prompt: 'p' })).toBe('p');
    expect(extractContent({ text: '  ', message: 'm' })).toBe('m');
    expect(extractContent({ textDescription: 'desc' })).toBe('desc');
  });

  it('returns empty string when every text field is empty', () => {
    expect(extractContent({ text: '' })).toBe('');
  });
});

describe('deriveTimestamp', () => {
  it('uses an explicit ISO timestamp first', () => {
    const result = deriveTimestamp(
      { timestamp: '2024-01-15T10:30:00Z', createdAt: 1700000000000 },
      extractedAt,
      0
    );
    expect(result.source).toBe('payload');
    expect(result.timestamp.toISOString()).toBe('2024-01-15T10:30:00.000Z');
  });

  it('reads a numeric explicit timestamp as epoch milliseconds', () => {
    const result = deriveTimestamp({ timestamp: 1705314600000 }, extractedAt, 0);
    expect(result.timestamp.toISOString()).toBe('2024-01-15T10:30:00.000Z');
  });

  it('falls through an unparseable timestamp to createdAt', () => {
    const result = deriveTimestamp(
      { timestamp: 'yesterday-ish', createdAt: 1705314600000 },
      extractedAt,
      0
    );
    expect(result.source).toBe('epoch');
    expect(result.timestamp.toISOString()).toBe('2024-01-15T10:30:00.000Z');
  });

  it('reads small epoch values as seconds', () => {
    const result = deriveTimestamp({ unixMs: 1705314600 }, extractedAt, 0);
    expect(result.timestamp.toISOString()).toBe('2024-01-15T10:30:00.000Z');
  });

  it('synthesizes from the fallback time minus the fallback index', () => {
    const result = deriveTimestamp({ text: 'x' }, extractedAt, 3);
    expect(result.source).toBe('synthesized');
    expect(result.timestamp.toISOString()).toBe('2024-06-01T11:59:59.997Z');
  });
});

describe('mapCommandType', () => {
  it('maps numeric codes', () => {
    expect(mapCommandType(1)).toBe('chat');
    expect(mapCommandType(2)).toBe('completion');
    expect(mapCommandType(3)).toBe('edit');
    expect(mapCommandType(4)).toBe('edit');
  });

  it('maps names case-insensitively', () => {
    expect(mapCommandType('Composer')).toBe('chat');
    expect(mapCommandType('cmdk')).toBe('edit');
    expect(mapCommandType('tab')).toBe('completion');
    expect(mapCommandType('2')).toBe('completion');
  });

  it('maps anything unrecognized to unknown', () => {
    expect(mapCommandType(9)).toBe('unknown');
    expect(mapCommandType('refactor')).toBe('unknown');
    expect(mapCommandType(null)).toBe('unknown');
    expect(mapCommandType(undefined)).toBe('unknown');
  });
});

// =============================================================================
// normalize
// =============================================================================
describe('normalize', () => {
  it('produces one record with the text as content', () => {
    const records = normalize('{"text":"Hello","commandType":1}', context());
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      content: 'Hello',
      commandType: 'chat',
      raw: { text: 'Hello', commandType: 1 },
      workspace: '/home/user/project',
      sourceDb: '/data/state.vscdb',
      key: 'aiService.prompts',
      timestampSource: 'synthesized',
    });
  });

  it('returns no records for malformed JSON', () => {
    expect(normalize('not valid json', context())).toEqual([]);
    expect(normalize('', context())).toEqual([]);
    expect(normalize('{"text":', context())).toEqual([]);
  });

  it('produces one record per object with a text field', () => {
    const value = JSON.stringify([
      { text: 'one' },
      { prompt: 'two' },
      { noText: true },
      { message: 'three' },
    ]);
    const records = normalize(value, context());
    expect(records.map((r) => r.content)).toEqual(['one', 'two', 'three']);
  });

  it('drops objects whose text fields are all blank', () => {
    expect(normalize('{"text":""}', context())).toEqual([]);
    expect(normalize('[{"text":"  \\n"},{"prompt":"kept"}]', context()).map((r) => r.content)).toEqual([
      'kept',
    ]);
  });

  it('reads the prompts of a composer session with a draft text field', () => {
    const value = JSON.stringify({
      composerId: 'c1',
      text: '',
      richText: '',
      conversation: [
        { type: 1, text: 'Fix the failing test' },
        { type: 2, text: 'Done.' },
      ],
    });
    const records = normalize(value, context());
    expect(records.map((r) => [r.content, r.commandType])).toEqual([
      ['Fix the failing test', 'unknown'],
      ['Done.', 'unknown'],
    ]);
  });

  it('gives timestamp-less entries descending synthesized times in storage order', () => {
    const value = JSON.stringify([{ text: 'a' }, { text: 'b' }, { text: 'c' }]);
    const records = normalize(value, context({ fallbackIndex: 10 }));
    expect(records.map((r) => r.timestamp.getTime())).toEqual([
      extractedAt.getTime() - 10,
      extractedAt.getTime() - 11,
      extractedAt.getTime() - 12,
    ]);
  });

  it('returns frozen records', () => {
    const [record] = normalize('{"text":"x"}', context());
    expect(Object.isFrozen(record)).toBe(true);
  });
});
