/**
 * Log Tailer - reads what was appended to the log since the last cycle 📜
 */

import { createHash } from 'node:crypto';
import { constants, type Stats } from 'node:fs';
import fs, { type FileHandle } from 'node:fs/promises';
import { withTimeout } from '../../utils/retry.js';
import { SourceUnavailableError } from './errors.js';
import type { TailCursor, TailedLine } from './types.js';

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;
/** Bytes at the start of the file that must not change while it is tailed. */
const HEAD_BYTES = 256;

export interface TailOptions {
  chunkSize?: number;
  /** Upper bound for each individual filesystem call. */
  timeoutMs?: number;
}

export interface TailResult {
  /** Cursor reading starts from (offset 0 after a rotation). */
  cursor: TailCursor;
  rotated: boolean;
  /** File size at stat time; the sequence never reads past it. */
  size: number;
  lines: AsyncIterable<TailedLine>;
}

interface ParsedMarker {
  identity: string;
  headLength: number;
  headHash: string | null;
}

function hashHead(head: Buffer): string {
  return createHash('sha256').update(head).digest('hex').slice(0, 16);
}

/** `dev:ino:headLength:headHash`, where the hash covers the first headLength bytes. */
export function rotationMarkerOf(stat: { dev: number; ino: number }, head: Buffer): string {
  return `${stat.dev}:${stat.ino}:${head.length}:${hashHead(head)}`;
}

/** Markers without a head part only compare the file identity. */
function parseMarker(marker: string): ParsedMarker {
  const [dev, ino, length, hash] = marker.split(':');
  const headLength = Number(length);
  if (hash && Number.isInteger(headLength) && headLength >= 0) {
    return { identity: `${dev}:${ino}`, headLength, headHash: hash };
  }
  return { identity: `${dev}:${ino}`, headLength: 0, headHash: null };
}

function isRotated(previous: string | null, stat: Stats, head: Buffer): boolean {
  if (previous === null) return false;
  const parsed = parseMarker(previous);
  if (parsed.identity !== `${stat.dev}:${stat.ino}`) return true;
  if (parsed.headHash === null) return false;
  // truncated and rewritten in place
  return parsed.headLength > head.length || hashHead(head.subarray(0, parsed.headLength)) !== parsed.headHash;
}

async function readHead(logPath: string, length: number, timeoutMs: number): Promise<Buffer> {
  if (length === 0) return Buffer.alloc(0);
  const handle = await withTimeout(fs.open(logPath, 'r'), timeoutMs, `open ${logPath}`);
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await withTimeout(handle.read(buffer, 0, length, 0), timeoutMs, `read ${logPath}`);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Stats the log and returns a lazy sequence of the complete lines between
 * the cursor and the current end of file. A file that shrank, whose
 * identity changed, or whose first bytes were rewritten is read from the
 * beginning.
 */
export async function tailLog(logPath: string, cursor: TailCursor, options: TailOptions = {}): Promise<TailResult> {
  const chunkSize = options.chunkSize ?? 64 * 1024;
  const timeoutMs = options.timeoutMs ?? 10_000;

  let stat: Stats;
  let head: Buffer;
  try {
    stat = await withTimeout(fs.stat(logPath), timeoutMs, `stat ${logPath}`);
    if (!stat.isFile()) {
      throw new Error(`${logPath} is not a regular file`);
    }
    await withTimeout(fs.access(logPath, constants.R_OK), timeoutMs, `access ${logPath}`);
    head = await readHead(logPath, Math.min(stat.size, HEAD_BYTES), timeoutMs);
  } catch (error) {
    throw new SourceUnavailableError(logPath, { cause: error });
  }

  const marker = rotationMarkerOf(stat, head);
  const size = stat.size;
  const rotated = isRotated(cursor.rotationMarker, stat, head) || size < cursor.offset;
  const start = rotated ? 0 : cursor.offset;

  return {
    cursor: { offset: start, rotationMarker: marker },
    rotated,
    size,
    lines: {
      [Symbol.asyncIterator]: () => readLines(logPath, start, size, chunkSize, timeoutMs),
    },
  };
}

async function* readLines(
  logPath: string,
  start: number,
  end: number,
  chunkSize: number,
  timeoutMs: number,
): AsyncGenerator<TailedLine> {
  if (start >= end) return;

  let handle: FileHandle;
  try {
    handle = await withTimeout(fs.open(logPath, 'r'), timeoutMs, `open ${logPath}`);
  } catch (error) {
    throw new SourceUnavailableError(logPath, { cause: error });
  }

  try {
    let position = start;
    // bytes of a line that continues into the next chunk
    let pending = Buffer.alloc(0);
    let pendingStart = start;

    while (position < end) {
      const length = Math.min(chunkSize, end - position);
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await withTimeout(
        handle.read(buffer, 0, length, position),
        timeoutMs,
        `read ${logPath}`,
      );
      if (bytesRead === 0) break;

      const chunk = pending.length > 0 ? Buffer.concat([pending, buffer.subarray(0, bytesRead)]) : buffer.subarray(0, bytesRead);
      let lineStartInChunk = 0;
      let newline = chunk.indexOf(NEWLINE, lineStartInChunk);
      while (newline !== -1) {
        let textEnd = newline;
        if (textEnd > lineStartInChunk && chunk[textEnd - 1] === CARRIAGE_RETURN) {
          textEnd--;
        }
        yield {
          text: chunk.toString('utf8', lineStartInChunk, textEnd),
          start: pendingStart + lineStartInChunk,
          end: pendingStart + newline + 1,
        };
        lineStartInChunk = newline + 1;
        newline = chunk.indexOf(NEWLINE, lineStartInChunk);
      }

      pending = Buffer.from(chunk.subarray(lineStartInChunk));
      pendingStart += lineStartInChunk;
      position += bytesRead;
    }
    // An unterminated last line is still being written; it is read next cycle.
  } finally {
    await handle.close();
  }
}
