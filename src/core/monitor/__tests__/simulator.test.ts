import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_PATTERNS_PATH } from '@/config/defaults.js';
import { loadPatterns } from '../classifier.js';
import { formatLogTimestamp, levelFor, simulateErrors } from '../simulator.js';
import type { TailedLine } from '../types.js';
import { defaultClassifier, makeTempDir } from './helpers.js';

const NOW = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6));

describe('simulator', () => {
  let dir: string;
  let logPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    logPath = path.join(dir, 'logs', 'app.log');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('formats timestamps like the log envelope', () => {
    expect(formatLogTimestamp(NOW)).toBe('2024-01-02 03:04:05,006');
  });

  it('maps severities to levels', () => {
    expect(levelFor('critical')).toBe('ERROR');
    expect(levelFor('medium')).toBe('WARNING');
  });

  it('appends one enveloped line for a selected category', async () => {
    const patterns = await loadPatterns(DEFAULT_PATTERNS_PATH);
    const lines = await simulateErrors(logPath, patterns, { categories: ['database_error'], now: () => NOW });

    const expected =
      'ERROR 2024-01-02 03:04:05,006 loghound.simulate 12345 67890 DatabaseError: UNIQUE constraint failed: clients_client.email';
    expect(lines).toEqual([expected]);
    expect(await fs.readFile(logPath, 'utf-8')).toBe(`${expected}\n`);
  });

  it('writes nothing for unknown categories', async () => {
    const patterns = await loadPatterns(DEFAULT_PATTERNS_PATH);
    expect(await simulateErrors(logPath, patterns, { categories: ['nope'] })).toEqual([]);
    await expect(fs.access(logPath)).rejects.toThrow();
  });

  it('produces lines each default pattern classifies as its own category', async () => {
    const patterns = await loadPatterns(DEFAULT_PATTERNS_PATH);
    const lines = await simulateErrors(logPath, patterns, { now: () => NOW });
    const classifier = await defaultClassifier();

    const categories = lines.map((text) => {
      const line: TailedLine = { text, start: 0, end: text.length + 1 };
      const result = classifier.classify(line, [], logPath);
      return result.kind === 'event' ? result.event.category : result.reason;
    });
    expect(categories).toEqual(patterns.map((p) => p.category));
  });
});
