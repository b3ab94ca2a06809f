/**
 * Error Classifier - maps raw log lines to categorized ErrorEvents 🏷️
 *
 * Patterns are tried by ascending priority rank; patterns with the same rank
 * keep their order from the configuration file. The first match wins.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, getErrorMessage } from './errors.js';
import type { CompiledPattern, ErrorEvent, ErrorPattern, SourceLocation, TailedLine } from './types.js';

const PatternSchema = z
  .object({
    category: z.string().regex(/^[a-z][a-z0-9_]*$/, 'category must be snake_case'),
    severity: z.enum(['low', 'medium', 'high', 'critical']),
    pattern: z.string().min(1),
    flags: z.string().regex(/^[imsu]*$/, 'only i, m, s and u flags are supported').default(''),
    required: z.array(z.string()).default([]),
    optional: z.array(z.string()).default([]),
    priority: z.number().int(),
    labels: z.array(z.string()).default([]),
    sample: z.string().min(1),
  })
  .strict();

const PatternFileSchema = z.object({ patterns: z.array(PatternSchema).min(1) }).strict();

/** `LEVEL YYYY-MM-DD HH:MM:SS,mmm logger pid tid message` */
const ENVELOPE = /^([A-Z]+)\s+(\d{4}-\d{2}-\d{2}\s+\d{2}:\d{2}:\d{2},\d{3})\s+([\w.-]+)\s+\d+\s+\d+\s+(.*)$/;
const TRACEBACK_FRAME = /File "([^"]+)", line (\d+)/g;
const PATH_REFERENCE = /((?:[A-Za-z]:)?[\w./\\-]*\w\.(?:py|ts|tsx|js|jsx|mjs|cjs|go|rb|java|cs|php)\b)(?::(\d+))?/;

export type ClassifyResult =
  | { kind: 'event'; event: ErrorEvent }
  | { kind: 'miss'; reason: 'level' | 'no_match'; message: string };

export interface ClassifierOptions {
  /** Envelope levels worth reporting. Lines without an envelope are always classified. */
  levels: readonly string[];
  now?: () => Date;
}

export function parsePatterns(input: unknown, source = 'patterns'): ErrorPattern[] {
  const parsed = PatternFileSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : parsed.error.message;
    throw new ConfigError(`Invalid pattern file ${source} (${where})`);
  }
  return parsed.data.patterns;
}

export async function loadPatterns(filePath: string): Promise<ErrorPattern[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read pattern file ${filePath}: ${getErrorMessage(error)}`, { cause: error });
  }
  return parsePatterns(raw, filePath);
}

/**
 * Compiles patterns and sorts them into evaluation order: priority rank
 * ascending, then position in the configuration.
 */
export function orderPatterns(patterns: readonly ErrorPattern[]): CompiledPattern[] {
  const compiled = patterns.map((pattern, order) => {
    let regex: RegExp;
    try {
      regex = new RegExp(pattern.pattern, pattern.flags);
    } catch (error) {
      throw new ConfigError(`Pattern ${pattern.category} does not compile: ${getErrorMessage(error)}`);
    }
    return Object.freeze({ ...pattern, regex, order });
  });
  return compiled.sort((a, b) => a.priority - b.priority || a.order - b.order);
}

export class ErrorClassifier {
  private readonly patterns: readonly CompiledPattern[];
  private readonly levels: ReadonlySet<string>;
  private readonly now: () => Date;

  constructor(patterns: readonly ErrorPattern[], options: ClassifierOptions) {
    this.patterns = Object.freeze(orderPatterns(patterns));
    this.levels = new Set(options.levels.map((level) => level.toUpperCase()));
    this.now = options.now ?? (() => new Date());
  }

  /** Patterns in the order they are evaluated. */
  get evaluationOrder(): readonly CompiledPattern[] {
    return this.patterns;
  }

  /**
   * Classifies one line. `context` holds the lines read just before it, oldest
   * first, and is only used to locate the code that raised the error.
   */
  classify(line: TailedLine, context: readonly TailedLine[], logPath: string): ClassifyResult {
    const envelope = ENVELOPE.exec(line.text.trim());
    const level = envelope?.[1] ?? null;
    const logger = envelope?.[3] ?? null;
    const message = (envelope?.[4] ?? line.text).trim();

    if (level !== null && !this.levels.has(level)) {
      return { kind: 'miss', reason: 'level', message };
    }
    if (!message) {
      return { kind: 'miss', reason: 'no_match', message };
    }

    for (const pattern of this.patterns) {
      const match = pattern.regex.exec(message);
      if (!match) continue;

      const fields: Record<string, string> = {};
      for (const [name, value] of Object.entries(match.groups ?? {})) {
        if (value !== undefined && value.trim() !== '') {
          fields[name] = value.trim();
        }
      }
      const complete = pattern.required.every((name) => name in fields);

      const event: ErrorEvent = {
        raw: line.text,
        message,
        level,
        category: pattern.category,
        severity: pattern.severity,
        confidence: complete ? 'high' : 'low',
        fields: Object.freeze(fields),
        labels: pattern.labels,
        location: locateSource(message, context, logger, logPath),
        position: {
          logPath,
          contextStart: context[0]?.start ?? line.start,
          lineStart: line.start,
          lineEnd: line.end,
        },
        detectedAt: this.now().toISOString(),
      };
      return { kind: 'event', event: Object.freeze(event) };
    }

    return { kind: 'miss', reason: 'no_match', message };
  }
}

/**
 * Innermost traceback frame in the context window, else a path mentioned in
 * the message, else the logger name, else the log file itself.
 */
export function locateSource(
  message: string,
  context: readonly TailedLine[],
  logger: string | null,
  logPath: string,
): SourceLocation {
  let frame: SourceLocation | null = null;
  for (const line of context) {
    for (const match of line.text.matchAll(TRACEBACK_FRAME)) {
      const [, file, lineNo] = match;
      if (file && lineNo) {
        frame = { file, line: Number(lineNo) };
      }
    }
  }
  if (frame) return frame;

  const reference = PATH_REFERENCE.exec(message);
  if (reference?.[1]) {
    return { file: reference[1], line: reference[2] ? Number(reference[2]) : null };
  }
  if (logger) {
    return { file: logger, line: null };
  }
  return { file: path.basename(logPath), line: null };
}
