import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_PATTERNS_PATH, DEFAULT_TEMPLATES_PATH } from '@/config/defaults.js';
import { ErrorClassifier, loadPatterns } from '../classifier.js';
import { createProposalGenerator, loadTemplates } from '../proposals.js';
import type { ErrorEvent, TailedLine } from '../types.js';

export const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z');

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'loghound-'));
}

/** One line in the `LEVEL date time,ms logger pid tid message` envelope, newline included. */
export function logLine(level: string, loggerName: string, message: string): string {
  return `${level} 2024-01-01 10:00:00,000 ${loggerName} 1234 5678 ${message}\n`;
}

export async function defaultClassifier(): Promise<ErrorClassifier> {
  const patterns = await loadPatterns(DEFAULT_PATTERNS_PATH);
  return new ErrorClassifier(patterns, { levels: ['ERROR', 'CRITICAL', 'WARNING'], now: () => FIXED_NOW });
}

export async function defaultGenerator() {
  return createProposalGenerator(await loadTemplates(DEFAULT_TEMPLATES_PATH));
}

export function tailed(text: string, start = 0): TailedLine {
  return { text, start, end: start + Buffer.byteLength(text) + 1 };
}

/** Classifies a single line and fails the test when nothing matches. */
export async function classifyOne(text: string, logPath = '/var/log/app.log'): Promise<ErrorEvent> {
  const classifier = await defaultClassifier();
  const result = classifier.classify(tailed(text), [], logPath);
  if (result.kind !== 'event') {
    throw new Error(`expected an event for: ${text}`);
  }
  return result.event;
}
