/**
 * Error taxonomy for the monitoring pipeline.
 * Every failure the orchestrator reacts to is one of these classes; `code`
 * is what ends up in cycle summaries and logs.
 */

export type LoghoundErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'STATE_CORRUPT'
  | 'STATE_WRITE'
  | 'TRACKER_TRANSIENT'
  | 'TRACKER_REJECTED'
  | 'CONFIG'
  | 'TIMEOUT';

export class LoghoundError extends Error {
  readonly code: LoghoundErrorCode;

  constructor(code: LoghoundErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The monitored log file is missing or unreadable. Retried next cycle. */
export class SourceUnavailableError extends LoghoundError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', `Log file unavailable: ${path}`, options);
    this.path = path;
  }
}

/** The persisted state file cannot be parsed. */
export class StateCorruptError extends LoghoundError {
  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super('STATE_CORRUPT', `State file ${path} is corrupt: ${reason}`, options);
  }
}

export class StateWriteError extends LoghoundError {
  constructor(path: string, options?: { cause?: unknown }) {
    super('STATE_WRITE', `Could not write state file ${path}`, options);
  }
}

/** Rate limiting, timeouts and network failures. Worth retrying. */
export class TrackerTransientError extends LoghoundError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRACKER_TRANSIENT', message, options);
  }
}

/** Auth, permission or payload problems. Retrying cannot succeed. */
export class TrackerRejectedError extends LoghoundError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super('TRACKER_REJECTED', message, options);
    this.status = status;
  }
}

export class ConfigError extends LoghoundError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
  }
}

export class TimeoutError extends LoghoundError {
  constructor(label: string, ms: number) {
    super('TIMEOUT', `${label} timed out after ${ms}ms`);
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null) {
    return JSON.stringify(error);
  }
  return String(error);
}
