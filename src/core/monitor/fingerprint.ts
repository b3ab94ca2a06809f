import { createHash } from 'node:crypto';
import type { ErrorEvent, IssueRecord, ProcessingState } from './types.js';

const LABEL_PREFIX = 'loghound:';

/**
 * Strips the parts of a message that differ between occurrences of the same
 * error: ids, addresses, numbers, quoted values, whitespace.
 */
export function normalizeMessage(message: string): string {
  return message
    .replace(/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, '<uuid>')
    .replace(/\b0x[0-9a-f]+\b/gi, '<hex>')
    .replace(/\b\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:[.,]\d+)?Z?/g, '<time>')
    .replace(/\b\d+(?:\.\d+)?\b/g, '<n>')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Deduplication key: category, normalized message and code location.
 * Detection time and log position are not part of it.
 */
export function fingerprint(event: Pick<ErrorEvent, 'category' | 'message' | 'location'>): string {
  const location = `${event.location.file}:${event.location.line ?? ''}`;
  return createHash('sha256')
    .update([event.category, normalizeMessage(event.message), location].join('\u0000'))
    .digest('hex');
}

export function shortFingerprint(fp: string): string {
  return fp.slice(0, 12);
}

/** Tracker label the fingerprint is searched by. */
export function fingerprintLabel(fp: string): string {
  return `${LABEL_PREFIX}${shortFingerprint(fp)}`;
}

export function isNew(state: ProcessingState, fp: string): boolean {
  return !Object.hasOwn(state.fingerprints, fp);
}

/** Returns a new state with the fingerprint marked as published. */
export function recordPublished(state: ProcessingState, fp: string, record: IssueRecord | null): ProcessingState {
  return {
    ...state,
    fingerprints: { ...state.fingerprints, [fp]: record?.id ?? null },
  };
}
