/**
 * Monitoring pipeline types 🐕
 * tail → classify → dedupe → propose → publish
 */

export type Severity = 'low' | 'medium' | 'high' | 'critical';

/** `low` when a pattern matched but a required capture group was absent. */
export type Confidence = 'high' | 'low';

/**
 * Classification rule. Loaded once from data/patterns.json and frozen.
 */
export interface ErrorPattern {
  category: string;
  severity: Severity;
  /** RegExp source; named groups become extracted fields. */
  pattern: string;
  flags: string;
  required: readonly string[];
  optional: readonly string[];
  /** Lower rank wins when several patterns match. */
  priority: number;
  labels: readonly string[];
  /** Message used by `simulate` to produce a line this pattern matches. */
  sample: string;
}

/** A pattern with its compiled expression and position in the configuration. */
export interface CompiledPattern extends ErrorPattern {
  regex: RegExp;
  order: number;
}

export interface SourceLocation {
  file: string;
  line: number | null;
}

/** Where in the monitored log an event was read, as byte offsets. */
export interface LogPosition {
  logPath: string;
  /** Start of the earliest context line used to classify the event. */
  contextStart: number;
  lineStart: number;
  lineEnd: number;
}

export interface ErrorEvent {
  readonly raw: string;
  readonly message: string;
  readonly level: string | null;
  readonly category: string;
  readonly severity: Severity;
  readonly confidence: Confidence;
  readonly fields: Readonly<Record<string, string>>;
  readonly labels: readonly string[];
  readonly location: SourceLocation;
  readonly position: LogPosition;
  /** ISO timestamp. Never part of the fingerprint. */
  readonly detectedAt: string;
}

export interface TailCursor {
  offset: number;
  rotationMarker: string | null;
}

export interface TailedLine {
  text: string;
  start: number;
  end: number;
}

export interface ProcessingState {
  version: 1;
  repository: string;
  offset: number;
  rotationMarker: string | null;
  /** Lines starting before this offset only refill the context window. */
  classifyFrom: number | null;
  /** fingerprint → tracker issue id (null when the id is unknown) */
  fingerprints: Record<string, string | null>;
  updatedAt: string | null;
}

export interface IssueRecord {
  id: string;
  url: string | null;
  changeId: string | null;
}

export interface FixProposal {
  category: string;
  fingerprint: string;
  branch: string;
  /** Repository path the proposal file is committed to. */
  path: string;
  /** Title of the issue filed for the event. */
  issueTitle: string;
  /** Title of the proposed change. */
  title: string;
  commitMessage: string;
  /** Markdown body of the proposal file and of the change description. */
  patch: string;
  summary: string;
  steps: readonly string[];
}

/** Text template for one category. Placeholders use `{{name}}`. */
export interface ProposalTemplate {
  /** Issue title after the `[category]` prefix. */
  title: string;
  summary: string;
  steps: readonly string[];
  /** Fence language of the proposed code. */
  language: string;
  patch: string;
}

export interface TemplateSet {
  default: ProposalTemplate;
  categories: Readonly<Record<string, ProposalTemplate>>;
}

export type OrchestratorPhase = 'idle' | 'scanning' | 'publishing' | 'sleeping';

export type CycleStatus = 'ok' | 'partial' | 'source_unavailable' | 'failed';

export interface CycleSummary {
  status: CycleStatus;
  linesRead: number;
  classified: number;
  unmatched: number;
  duplicates: number;
  created: number;
  linked: number;
  changes: number;
  deferred: number;
  rejected: number;
  batchFull: boolean;
  rotated: boolean;
  offset: number;
  error?: string;
}

export interface CycleResult {
  state: ProcessingState;
  summary: CycleSummary;
}
