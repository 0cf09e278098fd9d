import { describe, it, expect, afterEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  extractPrompts,
  writePromptLog,
  formatLog,
  isOutputWriteError,
  OutputWriteError,
} from '../../src/lib/index.js';
import { createStateDb, makeTempDir, cleanupTempDirs } from '../helpers/fixtures.js';

afterEach(() => {
  cleanupTempDirs();
});

describe('extractPrompts', () => {
  it('extracts from the given data path', () => {
    const root = makeTempDir();
    createStateDb(join(root, 'state.vscdb'), [
      { key: 'aiService.prompts', value: '[{"text":"from library","commandType":2}]' },
    ]);

    const result = extractPrompts({ dataPath: root });

    expect(result.roots).toEqual([root]);
    expect(result.records.map((r) => [r.content, r.commandType])).toEqual([
      ['from library', 'completion'],
    ]);
  });

  it('keeps duplicates when asked', () => {
    const root = makeTempDir();
    const value = '{"text":"dup","timestamp":"2024-01-01T00:00:00Z"}';
    createStateDb(join(root, 'a.vscdb'), [{ key: 'aiService.prompts', value }]);
    createStateDb(join(root, 'b.vscdb'), [{ key: 'aiService.prompts', value }]);

    expect(extractPrompts({ dataPath: root }).records).toHaveLength(1);
    expect(extractPrompts({ dataPath: root, keepDuplicates: true }).records).toHaveLength(2);
  });
});

describe('writePromptLog', () => {
  it('writes the result and returns the absolute path', () => {
    const root = makeTempDir();
    createStateDb(join(root, 'state.vscdb'), [{ key: 'composerData:1', value: '{"text":"hi"}' }]);
    const result = extractPrompts({ dataPath: root });
    const out = join(makeTempDir(), 'prompts.log');
    const generatedAt = new Date('2024-06-02T08:00:00.000Z');

    expect(writePromptLog(result, { output: out }, generatedAt)).toBe(out);
    expect(readFileSync(out, 'utf-8')).toBe(
      formatLog(result.records, { generatedAt, workspace: 'unknown' })
    );
  });

  it('throws OutputWriteError for an unwritable destination', () => {
    const result = extractPrompts({ dataPath: makeTempDir() });
    const out = join(makeTempDir(), 'no', 'such', 'dir', 'prompts.log');

    let caught: unknown;
    try {
      writePromptLog(result, { output: out });
    } catch (error) {
      caught = error;
    }
    expect(isOutputWriteError(caught)).toBe(true);
    expect(caught).toBeInstanceOf(OutputWriteError);
  });
});
