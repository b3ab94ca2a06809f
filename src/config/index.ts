import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, getErrorMessage } from '../core/monitor/errors.js';
import { parseRepo } from '../tools/git/client.js';
import { logger } from '../utils/logger.js';
import {
  CONFIG_FILE_NAME,
  DEFAULT_PATTERNS_PATH,
  DEFAULT_SETTINGS,
  DEFAULT_TEMPLATES_PATH,
  STATE_DIR,
} from './defaults.js';

/**
 * Runtime configuration. Built once at startup and frozen.
 */
export interface LoghoundConfig {
  repository: {
    owner: string;
    name: string;
    /** `owner/name`; also the key the state file is scoped by */
    slug: string;
  };
  logPath: string;
  scanIntervalSeconds: number;
  maxErrorsPerBatch: number;
  /** Deployment tag shown in filed issues */
  environment: string;
  statePath: string;
  /** Open a branch and pull request with the proposal for each new issue */
  proposeFixes: boolean;
  baseBranch: string;
  /** Lines kept before each line to locate tracebacks */
  contextLines: number;
  levels: readonly string[];
  patternsPath: string;
  templatesPath: string;
  tracker: {
    maxAttempts: number;
    backoffMs: number;
  };
  timeouts: {
    fileMs: number;
    stateMs: number;
    trackerMs: number;
  };
}

const positiveInt = z.number().int().positive();

const ConfigFileSchema = z
  .object({
    repository: z.string().min(1, 'repository is required ("owner/name")'),
    logPath: z.string().min(1).default(DEFAULT_SETTINGS.logPath),
    scanIntervalSeconds: z.number().positive().default(DEFAULT_SETTINGS.scanIntervalSeconds),
    maxErrorsPerBatch: positiveInt.default(DEFAULT_SETTINGS.maxErrorsPerBatch),
    environment: z.string().min(1).default(DEFAULT_SETTINGS.environment),
    statePath: z.string().min(1).optional(),
    proposeFixes: z.boolean().default(DEFAULT_SETTINGS.proposeFixes),
    baseBranch: z.string().min(1).default(DEFAULT_SETTINGS.baseBranch),
    contextLines: z.number().int().nonnegative().default(DEFAULT_SETTINGS.contextLines),
    levels: z
      .array(z.string().regex(/^[A-Z]+$/, 'levels are upper-case names such as ERROR'))
      .min(1)
      .default([...DEFAULT_SETTINGS.levels]),
    patternsPath: z.string().min(1).optional(),
    templatesPath: z.string().min(1).optional(),
    tracker: z
      .object({
        maxAttempts: positiveInt.default(DEFAULT_SETTINGS.tracker.maxAttempts),
        backoffMs: z.number().int().nonnegative().default(DEFAULT_SETTINGS.tracker.backoffMs),
      })
      .strict()
      .default({}),
    timeouts: z
      .object({
        fileMs: positiveInt.default(DEFAULT_SETTINGS.timeouts.fileMs),
        stateMs: positiveInt.default(DEFAULT_SETTINGS.timeouts.stateMs),
        trackerMs: positiveInt.default(DEFAULT_SETTINGS.timeouts.trackerMs),
      })
      .strict()
      .default({}),
  })
  .strict();

export type ConfigFile = z.input<typeof ConfigFileSchema>;

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates raw configuration. Unknown keys and malformed values are
 * rejected here, never discovered later at use time.
 */
export function parseConfig(input: unknown, baseDir: string, source = CONFIG_FILE_NAME): LoghoundConfig {
  const parsed = ConfigFileSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${source}: ${details}`);
  }
  const file = parsed.data;
  const { owner, repo } = parseRepo(file.repository);
  const resolve = (p: string) => path.resolve(baseDir, p);

  return deepFreeze({
    repository: { owner, name: repo, slug: `${owner}/${repo}` },
    logPath: resolve(file.logPath),
    scanIntervalSeconds: file.scanIntervalSeconds,
    maxErrorsPerBatch: file.maxErrorsPerBatch,
    environment: file.environment,
    statePath: resolve(file.statePath ?? path.join(STATE_DIR, `${owner}__${repo}.json`)),
    proposeFixes: file.proposeFixes,
    baseBranch: file.baseBranch,
    contextLines: file.contextLines,
    levels: file.levels,
    patternsPath: file.patternsPath ? resolve(file.patternsPath) : DEFAULT_PATTERNS_PATH,
    templatesPath: file.templatesPath ? resolve(file.templatesPath) : DEFAULT_TEMPLATES_PATH,
    tracker: file.tracker,
    timeouts: file.timeouts,
  });
}

/**
 * 設定ファイルを読み込む
 * Falls back to LOGHOUND_REPOSITORY / LOGHOUND_LOG_PATH when the file does
 * not set them.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoghoundConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const explicit = options.configPath ?? env.LOGHOUND_CONFIG;
  const configPath = path.resolve(cwd, explicit ?? CONFIG_FILE_NAME);

  let raw: unknown = {};
  try {
    raw = JSON.parse(await fs.readFile(configPath, 'utf-8'));
  } catch (error) {
    const missing = typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
    if (!missing || explicit) {
      throw new ConfigError(`Could not load ${configPath}: ${getErrorMessage(error)}`, { cause: error });
    }
    logger.debug(`No ${CONFIG_FILE_NAME} found, using defaults and environment.`);
  }

  if (!isPlainObject(raw)) {
    throw new ConfigError(`Invalid configuration in ${configPath}: expected a JSON object`);
  }
  const merged: Record<string, unknown> = { ...raw };
  if (merged.repository === undefined && env.LOGHOUND_REPOSITORY) {
    merged.repository = env.LOGHOUND_REPOSITORY;
  }
  if (merged.logPath === undefined && env.LOGHOUND_LOG_PATH) {
    merged.logPath = env.LOGHOUND_LOG_PATH;
  }
  if (merged.repository === undefined) {
    throw new ConfigError(
      `No repository configured. Set "repository" in ${CONFIG_FILE_NAME} or the LOGHOUND_REPOSITORY environment variable.`,
    );
  }

  return parseConfig(merged, path.dirname(configPath), configPath);
}

/**
 * setup 用: 設定ファイルが無ければデフォルトで作成する
 */
export async function writeDefaultConfig(configPath: string, values: ConfigFile): Promise<boolean> {
  try {
    await fs.writeFile(configPath, `${JSON.stringify(values, null, 2)}\n`, { encoding: 'utf-8', flag: 'wx' });
    return true;
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'EEXIST') {
      return false;
    }
    throw error;
  }
}
