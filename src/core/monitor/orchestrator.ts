/**
 * Orchestrator - drives scan cycles: tail → classify → dedupe → propose → publish 🔁
 *
 * One cycle at a time. State is loaded at the start of each cycle, passed
 * through it, and written back before the cycle counts as complete.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import fs from 'node:fs/promises';
import type { LoghoundConfig } from '../../config/index.js';
import type { IssueTrackerClient } from '../../tools/git/tracker.js';
import { logger } from '../../utils/logger.js';
import { withRetries, withTimeout } from '../../utils/retry.js';
import type { ErrorClassifier } from './classifier.js';
import {
  ConfigError,
  SourceUnavailableError,
  StateCorruptError,
  TimeoutError,
  TrackerRejectedError,
  TrackerTransientError,
  getErrorMessage,
} from './errors.js';
import { fingerprint, fingerprintLabel, isNew, recordPublished } from './fingerprint.js';
import { appendChangeLink, type ProposalGenerator, renderIssue } from './proposals.js';
import { type StateStore, emptyState } from './stateStore.js';
import { tailLog } from './tailer.js';
import type {
  CycleResult,
  CycleSummary,
  ErrorEvent,
  FixProposal,
  IssueRecord,
  LogPosition,
  OrchestratorPhase,
  ProcessingState,
  TailCursor,
  TailedLine,
} from './types.js';

export type OrchestratorSettings = Pick<
  LoghoundConfig,
  | 'repository'
  | 'logPath'
  | 'scanIntervalSeconds'
  | 'maxErrorsPerBatch'
  | 'environment'
  | 'proposeFixes'
  | 'contextLines'
  | 'tracker'
  | 'timeouts'
>;

export interface OrchestratorDeps {
  settings: OrchestratorSettings;
  classifier: ErrorClassifier;
  proposals: ProposalGenerator;
  tracker: IssueTrackerClient;
  store: StateStore;
  /** false for dry runs: nothing is written to the state file */
  persist?: boolean;
}

export interface StatusReport {
  repository: string;
  statePath: string;
  logPath: string;
  offset: number;
  rotationMarker: string | null;
  knownFingerprints: number;
  updatedAt: string | null;
  logSize: number | null;
  stateError: string | null;
}

interface Candidate {
  event: ErrorEvent;
  fingerprint: string;
}

type PublishOutcome =
  | { kind: 'created' | 'linked'; state: ProcessingState }
  | { kind: 'deferred' | 'rejected'; error: string };

function newSummary(offset: number): CycleSummary {
  return {
    status: 'ok',
    linesRead: 0,
    classified: 0,
    unmatched: 0,
    duplicates: 0,
    created: 0,
    linked: 0,
    changes: 0,
    deferred: 0,
    rejected: 0,
    batchFull: false,
    rotated: false,
    offset,
  };
}

export class Orchestrator {
  private readonly settings: OrchestratorSettings;
  private readonly classifier: ErrorClassifier;
  private readonly proposals: ProposalGenerator;
  private readonly tracker: IssueTrackerClient;
  private readonly store: StateStore;
  private readonly persist: boolean;
  private currentPhase: OrchestratorPhase = 'idle';
  private cycleActive = false;

  constructor(deps: OrchestratorDeps) {
    this.settings = deps.settings;
    this.classifier = deps.classifier;
    this.proposals = deps.proposals;
    this.tracker = deps.tracker;
    this.store = deps.store;
    this.persist = deps.persist ?? true;
  }

  get phase(): OrchestratorPhase {
    return this.currentPhase;
  }

  private setPhase(phase: OrchestratorPhase): void {
    if (this.currentPhase !== phase) {
      logger.debug(`phase ${this.currentPhase} → ${phase}`);
      this.currentPhase = phase;
    }
  }

  /**
   * Loads persisted state. A corrupt file is replaced by an empty state, so
   * the log is read again from the start and already-filed errors are only
   * caught by the tracker-side search.
   */
  async loadState(): Promise<ProcessingState> {
    try {
      return await this.store.load();
    } catch (error) {
      if (error instanceof StateCorruptError) {
        logger.error('🚨🚨 STATE FILE CORRUPT - starting from an empty state and rescanning the log from offset 0.');
        logger.error(`🚨🚨 ${error.message}`);
        logger.error('🚨🚨 Issues already filed may be reported again if they were closed on the tracker.');
        return emptyState(this.settings.repository.slug);
      }
      throw error;
    }
  }

  /** State summary without scanning. */
  async status(): Promise<StatusReport> {
    let state: ProcessingState = emptyState(this.settings.repository.slug);
    let stateError: string | null = null;
    try {
      state = await this.store.load();
    } catch (error) {
      stateError = getErrorMessage(error);
    }

    let logSize: number | null = null;
    try {
      logSize = (await fs.stat(this.settings.logPath)).size;
    } catch {
      logSize = null;
    }

    return {
      repository: this.settings.repository.slug,
      statePath: this.store.filePath,
      logPath: this.settings.logPath,
      offset: state.offset,
      rotationMarker: state.rotationMarker,
      knownFingerprints: Object.keys(state.fingerprints).length,
      updatedAt: state.updatedAt,
      logSize,
      stateError,
    };
  }

  /** Exactly one cycle against the persisted state. */
  async scan(signal?: AbortSignal): Promise<CycleSummary> {
    const state = await this.loadState();
    const { summary } = await this.runCycle(state, signal);
    return summary;
  }

  /**
   * Runs cycles every `scanIntervalSeconds` until the signal aborts. The
   * signal is only looked at between events and between cycles. A
   * configuration error stops the loop.
   */
  async monitor(signal: AbortSignal, onCycle?: (summary: CycleSummary) => void): Promise<void> {
    const intervalMs = Math.round(this.settings.scanIntervalSeconds * 1000);
    logger.info(`👀 Monitoring ${this.settings.logPath} every ${this.settings.scanIntervalSeconds}s`);

    while (!signal.aborted) {
      let summary: CycleSummary;
      try {
        summary = await this.scan(signal);
      } catch (error) {
        if (error instanceof ConfigError) {
          this.setPhase('idle');
          throw error;
        }
        // loading state failed for a reason other than corruption
        logger.error('Cycle could not start', error);
        summary = { ...newSummary(0), status: 'failed', error: getErrorMessage(error) };
      }
      onCycle?.(summary);
      if (signal.aborted) break;

      this.setPhase('sleeping');
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (error) {
        if (signal.aborted) break;
        throw error;
      }
    }
    this.setPhase('idle');
    logger.info('🛑 Monitoring stopped.');
  }

  /**
   * One Scanning → Publishing pass. Never throws for pipeline failures; they
   * are reported in the summary status.
   */
  async runCycle(state: ProcessingState, signal?: AbortSignal): Promise<CycleResult> {
    if (this.cycleActive) {
      throw new Error('A scan cycle is already running; cycles never overlap.');
    }
    this.cycleActive = true;
    const summary = newSummary(state.offset);

    try {
      this.setPhase('scanning');
      const { batch, cursor } = await this.scanLog(state, summary);

      this.setPhase('publishing');
      const { state: published, resume } = await this.publishBatch(batch, state, summary, signal);

      const offset = resume === null ? cursor.offset : Math.min(resume.contextStart, cursor.offset);
      const classifyFrom = resume === null ? null : resume.lineStart;
      let next: ProcessingState = { ...published, offset, rotationMarker: cursor.rotationMarker, classifyFrom };
      if (this.persist) {
        next = await this.store.save(next);
      }

      summary.offset = offset;
      if (summary.deferred > 0 || summary.rejected > 0) {
        summary.status = 'partial';
      }
      return { state: next, summary };
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        logger.warn(`${error.message}. Retrying on the next cycle.`);
        return this.resetCursor(state, { ...summary, status: 'source_unavailable', error: error.message });
      }
      logger.error('Scan cycle failed', error);
      return { state, summary: { ...summary, status: 'failed', error: getErrorMessage(error) } };
    } finally {
      this.cycleActive = false;
      this.setPhase('idle');
    }
  }

  /**
   * The log is gone or unreadable: whatever shows up at the path next is
   * read from the start. Known fingerprints stay.
   */
  private async resetCursor(state: ProcessingState, summary: CycleSummary): Promise<CycleResult> {
    const reset: ProcessingState = { ...state, offset: 0, rotationMarker: null, classifyFrom: null };
    try {
      const next = this.persist ? await this.store.save(reset) : reset;
      return { state: next, summary: { ...summary, offset: 0 } };
    } catch (error) {
      logger.error('Could not reset the log cursor', error);
      return { state, summary: { ...summary, status: 'failed', error: getErrorMessage(error) } };
    }
  }

  private async scanLog(
    state: ProcessingState,
    summary: CycleSummary,
  ): Promise<{ batch: Candidate[]; cursor: TailCursor }> {
    const { logPath, maxErrorsPerBatch, contextLines } = this.settings;
    const tail = await tailLog(
      logPath,
      { offset: state.offset, rotationMarker: state.rotationMarker },
      { timeoutMs: this.settings.timeouts.fileMs },
    );
    summary.rotated = tail.rotated;
    if (tail.rotated) {
      logger.warn(`${logPath} was rotated or truncated; reading it from the start.`);
    }

    const batch: Candidate[] = [];
    const inBatch = new Set<string>();
    const context: TailedLine[] = [];
    let offset = tail.cursor.offset;
    // after a deferral, lines before the deferred event were already handled
    const classifyFrom = tail.rotated ? null : state.classifyFrom;

    for await (const line of tail.lines) {
      summary.linesRead++;
      offset = line.end;

      const contextOnly = classifyFrom !== null && line.start < classifyFrom;
      const result = contextOnly ? null : this.classifier.classify(line, context, logPath);
      context.push(line);
      if (context.length > contextLines) context.shift();
      if (result === null) continue;

      if (result.kind === 'miss') {
        summary.unmatched++;
        if (result.reason === 'no_match' && result.message) {
          logger.debug(`no pattern matched: ${result.message.slice(0, 120)}`);
        }
        continue;
      }

      summary.classified++;
      const fp = fingerprint(result.event);
      if (!isNew(state, fp) || inBatch.has(fp)) {
        summary.duplicates++;
        continue;
      }
      inBatch.add(fp);
      batch.push({ event: result.event, fingerprint: fp });

      if (batch.length >= maxErrorsPerBatch) {
        // the rest of the log is read next cycle
        summary.batchFull = true;
        break;
      }
    }

    return { batch, cursor: { offset, rotationMarker: tail.cursor.rotationMarker } };
  }

  private async publishBatch(
    batch: readonly Candidate[],
    state: ProcessingState,
    summary: CycleSummary,
    signal?: AbortSignal,
  ): Promise<{ state: ProcessingState; resume: LogPosition | null }> {
    let current = state;
    // batch order is log order, so the first deferral is the earliest
    let resume: LogPosition | null = null;
    const defer = (event: ErrorEvent) => {
      summary.deferred++;
      resume ??= event.position;
    };

    for (const candidate of batch) {
      if (signal?.aborted) {
        defer(candidate.event);
        continue;
      }
      if (!isNew(current, candidate.fingerprint)) {
        summary.duplicates++;
        continue;
      }

      const outcome = await this.publishOne(candidate, current, summary);
      switch (outcome.kind) {
        case 'created':
        case 'linked':
          current = outcome.state;
          break;
        case 'deferred':
          logger.warn(`Deferred ${candidate.event.category} to the next cycle: ${outcome.error}`);
          defer(candidate.event);
          break;
        case 'rejected':
          logger.error(`Tracker rejected ${candidate.event.category}: ${outcome.error}`);
          summary.rejected++;
          break;
      }
    }
    return { state: current, resume };
  }

  private async publishOne(
    { event, fingerprint: fp }: Candidate,
    state: ProcessingState,
    summary: CycleSummary,
  ): Promise<PublishOutcome> {
    const proposal = this.proposals.generate(event);
    const issue = renderIssue(event, proposal, { environment: this.settings.environment });
    try {
      // the tracker is the authority on duplicates; local state can be stale.
      // A create that timed out may still have landed, so every retry searches first.
      const published = await this.retried('publish', async () => {
        const existing = await this.timed('findExisting', () => this.tracker.findExisting(fingerprintLabel(fp)));
        if (existing) {
          return { record: existing, created: false };
        }
        const created = await this.timed('createIssue', () =>
          this.tracker.createIssue(issue.title, issue.body, issue.labels),
        );
        return { record: created, created: true };
      });

      if (!published.created) {
        const next = await this.commit(recordPublished(state, fp, published.record));
        summary.linked++;
        logger.info(`🔗 ${event.category} already tracked as #${published.record.id}`);
        return { kind: 'linked', state: next };
      }

      const record = published.record;
      const next = await this.commit(recordPublished(state, fp, record));
      summary.created++;
      logger.info(`📝 Filed #${record.id}: ${issue.title}`);

      if (this.settings.proposeFixes) {
        await this.proposeFix(proposal, record, issue.body, summary);
      }
      return { kind: 'created', state: next };
    } catch (error) {
      if (error instanceof TrackerTransientError) {
        return { kind: 'deferred', error: error.message };
      }
      if (error instanceof TrackerRejectedError) {
        return { kind: 'rejected', error: error.message };
      }
      throw error;
    }
  }

  /**
   * Branch, change and issue link for a filed issue. The issue stays
   * recorded whatever happens here.
   */
  private async proposeFix(
    proposal: FixProposal,
    issue: IssueRecord,
    issueBody: string,
    summary: CycleSummary,
  ): Promise<void> {
    try {
      await this.callTracker('createBranch', () => this.tracker.createBranch(proposal.branch));
      const change = await this.callTracker('proposeChange', () =>
        this.tracker.proposeChange(
          proposal.branch,
          { path: proposal.path, title: proposal.title, commitMessage: proposal.commitMessage, body: proposal.patch },
          issue,
        ),
      );
      await this.callTracker('updateIssue', () =>
        this.tracker.updateIssue(issue.id, appendChangeLink(issueBody, change.url ?? `#${change.id}`)),
      );
      summary.changes++;
      logger.info(`🔧 Proposed change #${change.id} on ${proposal.branch}`);
    } catch (error) {
      if (error instanceof TrackerTransientError || error instanceof TrackerRejectedError) {
        logger.warn(`Could not propose a change for issue #${issue.id}: ${error.message}`);
        return;
      }
      throw error;
    }
  }

  private async commit(state: ProcessingState): Promise<ProcessingState> {
    return this.persist ? this.store.save(state) : state;
  }

  private callTracker<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return this.retried(label, () => this.timed(label, fn));
  }

  /** One tracker request bounded by `timeouts.trackerMs`; a timeout is transient. */
  private async timed<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn(), this.settings.timeouts.trackerMs, `tracker ${label}`);
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new TrackerTransientError(error.message, { cause: error });
      }
      throw error;
    }
  }

  private retried<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const { maxAttempts, backoffMs } = this.settings.tracker;
    return withRetries(fn, {
      attempts: maxAttempts,
      baseDelayMs: backoffMs,
      retryable: (error) => error instanceof TrackerTransientError,
      onRetry: (error, attempt, delayMs) =>
        logger.warn(`tracker ${label} attempt ${attempt} failed (${getErrorMessage(error)}); retrying in ${delayMs}ms`),
    });
  }
}
