/**
 * Default Settings
 */
import path from 'node:path';
import { fileURLToPath } from 'node:url';

// src/config or dist/config -> project root
const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');

export const DATA_DIR = path.join(PROJECT_ROOT, 'data');
export const DEFAULT_PATTERNS_PATH = path.join(DATA_DIR, 'patterns.json');
export const DEFAULT_TEMPLATES_PATH = path.join(DATA_DIR, 'templates.json');

export const CONFIG_FILE_NAME = 'loghound.config.json';
export const STATE_DIR = '.loghound/state';

export const DEFAULT_SETTINGS = {
  logPath: 'logs/app.log',
  scanIntervalSeconds: 60,
  maxErrorsPerBatch: 10,
  environment: 'production',
  proposeFixes: true,
  baseBranch: 'main',
  contextLines: 5,
  levels: ['ERROR', 'CRITICAL', 'WARNING'],
  tracker: {
    maxAttempts: 4,
    backoffMs: 500,
  },
  timeouts: {
    fileMs: 10_000,
    stateMs: 10_000,
    trackerMs: 15_000,
  },
} as const;
