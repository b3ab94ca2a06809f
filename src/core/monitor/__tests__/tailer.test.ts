import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SourceUnavailableError } from '../errors.js';
import { tailLog } from '../tailer.js';
import type { TailedLine } from '../types.js';
import { makeTempDir } from './helpers.js';

async function collect(lines: AsyncIterable<TailedLine>): Promise<TailedLine[]> {
  const out: TailedLine[] = [];
  for await (const line of lines) out.push(line);
  return out;
}

describe('tailLog', () => {
  let dir: string;
  let logPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    logPath = path.join(dir, 'app.log');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('yields complete lines with byte offsets and holds back a partial last line', async () => {
    await fs.writeFile(logPath, 'a\nbb\r\nccc');
    const tail = await tailLog(logPath, { offset: 0, rotationMarker: null });

    expect(tail.rotated).toBe(false);
    expect(tail.size).toBe(9);
    expect(await collect(tail.lines)).toEqual([
      { text: 'a', start: 0, end: 2 },
      { text: 'bb', start: 2, end: 6 },
    ]);
  });

  it('joins lines split across chunks', async () => {
    await fs.writeFile(logPath, 'a\nbb\r\nccc');
    const tail = await tailLog(logPath, { offset: 0, rotationMarker: null }, { chunkSize: 3 });

    expect(await collect(tail.lines)).toEqual([
      { text: 'a', start: 0, end: 2 },
      { text: 'bb', start: 2, end: 6 },
    ]);
  });

  it('resumes from the cursor offset', async () => {
    await fs.writeFile(logPath, 'first\n');
    const first = await tailLog(logPath, { offset: 0, rotationMarker: null });
    await fs.appendFile(logPath, 'second\n');
    const tail = await tailLog(logPath, { offset: 6, rotationMarker: first.cursor.rotationMarker });

    expect(tail.rotated).toBe(false);
    expect(await collect(tail.lines)).toEqual([{ text: 'second', start: 6, end: 13 }]);
  });

  it('yields nothing when the offset is at the end of the file', async () => {
    await fs.writeFile(logPath, 'done\n');
    const tail = await tailLog(logPath, { offset: 5, rotationMarker: null });

    expect(await collect(tail.lines)).toEqual([]);
  });

  it('can be iterated more than once', async () => {
    await fs.writeFile(logPath, 'one\ntwo\n');
    const tail = await tailLog(logPath, { offset: 0, rotationMarker: null });

    const first = await collect(tail.lines);
    const second = await collect(tail.lines);
    expect(second).toEqual(first);
    expect(first).toHaveLength(2);
  });

  it('starts over when the file shrank below the offset', async () => {
    await fs.writeFile(logPath, 'x\n');
    const tail = await tailLog(logPath, { offset: 100, rotationMarker: null });

    expect(tail.rotated).toBe(true);
    expect(tail.cursor.offset).toBe(0);
    expect(await collect(tail.lines)).toEqual([{ text: 'x', start: 0, end: 2 }]);
  });

  it('starts over when the file identity changed', async () => {
    await fs.writeFile(logPath, 'one\ntwo\n');
    const tail = await tailLog(logPath, { offset: 4, rotationMarker: 'other:file' });

    const { dev, ino } = await fs.stat(logPath);
    expect(tail.rotated).toBe(true);
    expect(tail.cursor.offset).toBe(0);
    expect(tail.cursor.rotationMarker).toMatch(new RegExp(`^${dev}:${ino}:8:[0-9a-f]{16}$`));
  });

  it('starts over when the file was truncated and rewritten past the offset', async () => {
    await fs.writeFile(logPath, 'one\n');
    const before = await tailLog(logPath, { offset: 0, rotationMarker: null });
    await fs.writeFile(logPath, 'alpha\nbeta\n');

    const tail = await tailLog(logPath, { offset: 4, rotationMarker: before.cursor.rotationMarker });
    expect(tail.rotated).toBe(true);
    expect(await collect(tail.lines)).toEqual([
      { text: 'alpha', start: 0, end: 6 },
      { text: 'beta', start: 6, end: 11 },
    ]);
  });

  it('only compares the file identity for markers without a head hash', async () => {
    await fs.writeFile(logPath, 'first\nsecond\n');
    const { dev, ino } = await fs.stat(logPath);
    const tail = await tailLog(logPath, { offset: 6, rotationMarker: `${dev}:${ino}` });

    expect(tail.rotated).toBe(false);
    expect(await collect(tail.lines)).toEqual([{ text: 'second', start: 6, end: 13 }]);
  });

  it('reports a missing file as unavailable', async () => {
    await expect(tailLog(logPath, { offset: 0, rotationMarker: null })).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it('reports a directory as unavailable', async () => {
    await expect(tailLog(dir, { offset: 0, rotationMarker: null })).rejects.toThrow(`Log file unavailable: ${dir}`);
  });
});
