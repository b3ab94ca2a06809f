/**
 * Writes sample error lines into a log file so the pipeline can be tried
 * end to end without a real application 🧪
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import type { ErrorPattern, Severity } from './types.js';

export const SIMULATED_LOGGER = 'loghound.simulate';

export interface SimulateOptions {
  /** Only these categories; all of them when empty */
  categories?: readonly string[];
  now?: () => Date;
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/** `YYYY-MM-DD HH:MM:SS,mmm` in UTC */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())},${pad(date.getUTCMilliseconds(), 3)}`
  );
}

export function levelFor(severity: Severity): 'ERROR' | 'WARNING' {
  return severity === 'high' || severity === 'critical' ? 'ERROR' : 'WARNING';
}

export function sampleLine(pattern: ErrorPattern, date: Date): string {
  return `${levelFor(pattern.severity)} ${formatLogTimestamp(date)} ${SIMULATED_LOGGER} 12345 67890 ${pattern.sample}`;
}

/**
 * Appends one line per pattern sample and returns the lines written.
 */
export async function simulateErrors(
  logPath: string,
  patterns: readonly ErrorPattern[],
  options: SimulateOptions = {},
): Promise<string[]> {
  const wanted = options.categories ?? [];
  const now = options.now ?? (() => new Date());
  const selected = wanted.length > 0 ? patterns.filter((p) => wanted.includes(p.category)) : patterns;

  const lines = selected.map((pattern) => sampleLine(pattern, now()));
  if (lines.length === 0) {
    return lines;
  }

  await fs.mkdir(path.dirname(logPath), { recursive: true });
  await fs.appendFile(logPath, `${lines.join('\n')}\n`, 'utf-8');
  return lines;
}
