/**
 * State Store - persisted tail offset and published fingerprints 💾
 * One JSON file per target repository, replaced atomically on every save.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { withTimeout } from '../../utils/retry.js';
import { ConfigError, StateCorruptError, StateWriteError, getErrorMessage } from './errors.js';
import type { ProcessingState } from './types.js';

const StateSchema = z
  .object({
    version: z.literal(1),
    repository: z.string().min(1),
    offset: z.number().int().nonnegative(),
    rotationMarker: z.string().nullable(),
    classifyFrom: z.number().int().nonnegative().nullable().default(null),
    fingerprints: z.record(z.string().regex(/^[0-9a-f]{64}$/), z.string().nullable()),
    updatedAt: z.string().nullable(),
  })
  .strict();

export function emptyState(repository: string): ProcessingState {
  return {
    version: 1,
    repository,
    offset: 0,
    rotationMarker: null,
    classifyFrom: null,
    fingerprints: {},
    updatedAt: null,
  };
}

export interface StateStoreOptions {
  timeoutMs?: number;
  now?: () => Date;
}

export class StateStore {
  readonly filePath: string;
  private readonly repository: string;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(filePath: string, repository: string, options: StateStoreOptions = {}) {
    this.filePath = filePath;
    this.repository = repository;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Reads the state file. A missing file is an empty state and anything
   * that cannot be parsed is corrupt. A file written for another repository
   * is a configuration error: it is never replaced.
   */
  async load(): Promise<ProcessingState> {
    let text: string;
    try {
      text = await withTimeout(fs.readFile(this.filePath, 'utf-8'), this.timeoutMs, `read ${this.filePath}`);
    } catch (error) {
      if (isNotFound(error)) {
        return emptyState(this.repository);
      }
      throw new StateCorruptError(this.filePath, 'unreadable', { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new StateCorruptError(this.filePath, 'not valid JSON', { cause: error });
    }

    const parsed = StateSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new StateCorruptError(this.filePath, issue ? `${issue.path.join('.') || 'root'}: ${issue.message}` : 'invalid');
    }
    if (parsed.data.repository !== this.repository) {
      throw new ConfigError(
        `State file ${this.filePath} belongs to ${parsed.data.repository}, not ${this.repository}; set statePath to a file of its own`,
      );
    }
    return parsed.data;
  }

  /**
   * Writes `<file>.<pid>.tmp` and renames it over the state file, so readers
   * see either the previous or the new content.
   */
  async save(state: ProcessingState): Promise<ProcessingState> {
    const saved: ProcessingState = { ...state, repository: this.repository, updatedAt: this.now().toISOString() };
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    try {
      await withTimeout(
        (async () => {
          await fs.mkdir(path.dirname(this.filePath), { recursive: true });
          await fs.writeFile(tmp, `${JSON.stringify(saved, null, 2)}\n`, 'utf-8');
          await fs.rename(tmp, this.filePath);
        })(),
        this.timeoutMs,
        `write ${this.filePath}`,
      );
    } catch (error) {
      await fs.rm(tmp, { force: true }).catch((cleanupError: unknown) => {
        logger.warn(`Could not remove ${tmp}: ${getErrorMessage(cleanupError)}`);
      });
      throw new StateWriteError(this.filePath, { cause: error });
    }
    return saved;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
