import { describe, expect, it } from 'vitest';
import { fingerprint, fingerprintLabel, isNew, normalizeMessage, recordPublished } from '../fingerprint.js';
import { emptyState } from '../stateStore.js';

const event = (message: string, line: number | null = 12, category = 'server_error') => ({
  category,
  message,
  location: { file: 'app/views.py', line },
});

describe('normalizeMessage', () => {
  it('masks values that change between occurrences', () => {
    expect(
      normalizeMessage(
        'User 42 failed at 2024-01-01 10:00:00,123 id 550e8400-e29b-41d4-a716-446655440000 addr 0xdeadBEEF',
      ),
    ).toBe('User <n> failed at <time> id <uuid> addr <hex>');
  });

  it('collapses whitespace', () => {
    expect(normalizeMessage('  KeyError:\t  gym  ')).toBe('KeyError: gym');
  });
});

describe('fingerprint', () => {
  it('is a sha256 hex digest', () => {
    expect(fingerprint(event('KeyError: gym'))).toMatch(/^[0-9a-f]{64}$/);
  });

  it('ignores numbers that differ between occurrences', () => {
    expect(fingerprint(event('Order 17 not found'))).toBe(fingerprint(event('Order 9001 not found')));
  });

  it('separates categories and locations', () => {
    const base = fingerprint(event('KeyError: gym'));
    expect(fingerprint(event('KeyError: gym', 13))).not.toBe(base);
    expect(fingerprint(event('KeyError: gym', null))).not.toBe(base);
    expect(fingerprint(event('KeyError: gym', 12, 'validation_error'))).not.toBe(base);
  });

  it('derives the tracker label from the first twelve characters', () => {
    const fp = fingerprint(event('KeyError: gym'));
    expect(fingerprintLabel(fp)).toBe(`loghound:${fp.slice(0, 12)}`);
  });
});

describe('recordPublished', () => {
  it('returns a new state and leaves the input untouched', () => {
    const state = emptyState('acme/shop');
    const fp = fingerprint(event('KeyError: gym'));
    const next = recordPublished(state, fp, { id: '7', url: null, changeId: null });

    expect(isNew(state, fp)).toBe(true);
    expect(isNew(next, fp)).toBe(false);
    expect(next.fingerprints).toEqual({ [fp]: '7' });
    expect(state.fingerprints).toEqual({});
  });

  it('stores null when the issue id is unknown', () => {
    const fp = fingerprint(event('KeyError: gym'));
    expect(recordPublished(emptyState('acme/shop'), fp, null).fingerprints[fp]).toBeNull();
  });
});
