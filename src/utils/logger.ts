/**
 * Console logger shared by the core and the CLI 📝
 * debug lines only print when LOG_LEVEL=debug (or after enableDebug()).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

let debugEnabled = process.env.LOG_LEVEL === 'debug';

export function enableDebug(enabled = true): void {
  debugEnabled = enabled;
}

export const logger = {
  debug: (msg: string, meta?: object) => {
    if (!debugEnabled) return;
    if (meta) {
      console.debug(`🔬 ${msg}`, meta);
    } else {
      console.debug(`🔬 ${msg}`);
    }
  },
  info: (msg: string, meta?: object) => {
    if (meta) {
      console.log(msg, meta);
    } else {
      console.log(msg);
    }
  },
  warn: (msg: string, meta?: object) => {
    if (meta) {
      console.warn(`⚠️ ${msg}`, meta);
    } else {
      console.warn(`⚠️ ${msg}`);
    }
  },
  error: (msg: string, error?: unknown) => {
    if (error === undefined) {
      console.error(`❌ ${msg}`);
    } else {
      console.error(`❌ ${msg}`, error instanceof Error ? error.message : error);
    }
  },
};
