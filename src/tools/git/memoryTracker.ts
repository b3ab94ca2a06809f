/**
 * In-memory tracker binding. Backs `scan --dry-run` and the pipeline tests.
 */

import type { IssueRecord } from '../../core/monitor/types.js';
import type { ChangeRecord, ChangeRequest, IssueTrackerClient } from './tracker.js';

export type TrackerMethod = keyof IssueTrackerClient;

export interface TrackerCall {
  method: TrackerMethod;
  args: readonly unknown[];
}

export interface StoredIssue {
  id: string;
  title: string;
  body: string;
  labels: readonly string[];
  state: 'open' | 'closed';
}

export interface StoredChange {
  id: string;
  branch: string;
  change: ChangeRequest;
  linkedIssue: string;
}

export class InMemoryTrackerClient implements IssueTrackerClient {
  readonly issues = new Map<string, StoredIssue>();
  readonly branches = new Set<string>();
  readonly changes = new Map<string, StoredChange>();
  readonly calls: TrackerCall[] = [];

  private readonly failures = new Map<TrackerMethod, Error[]>();
  private readonly latency = new Map<TrackerMethod, number>();
  private nextId = 1;

  /** The next calls of `method` reject with these errors, in order. */
  failNext(method: TrackerMethod, ...errors: Error[]): this {
    this.failures.set(method, [...(this.failures.get(method) ?? []), ...errors]);
    return this;
  }

  setLatency(method: TrackerMethod, ms: number): this {
    this.latency.set(method, ms);
    return this;
  }

  callsOf(method: TrackerMethod): TrackerCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  /** Adds an issue as if someone had filed it directly on the tracker. */
  seedIssue(issue: Omit<StoredIssue, 'id' | 'state'> & { state?: StoredIssue['state'] }): StoredIssue {
    const stored: StoredIssue = { ...issue, id: String(this.nextId++), state: issue.state ?? 'open' };
    this.issues.set(stored.id, stored);
    return stored;
  }

  private async enter(method: TrackerMethod, args: readonly unknown[]): Promise<void> {
    this.calls.push({ method, args });
    const delay = this.latency.get(method) ?? 0;
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
    const queued = this.failures.get(method);
    const failure = queued?.shift();
    if (failure) {
      throw failure;
    }
  }

  async findExisting(fingerprintLabel: string): Promise<IssueRecord | null> {
    await this.enter('findExisting', [fingerprintLabel]);
    for (const issue of this.issues.values()) {
      if (issue.state === 'open' && issue.labels.includes(fingerprintLabel)) {
        return { id: issue.id, url: null, changeId: null };
      }
    }
    return null;
  }

  async createIssue(title: string, body: string, labels: readonly string[]): Promise<IssueRecord> {
    await this.enter('createIssue', [title, body, labels]);
    const issue = this.seedIssue({ title, body, labels: [...labels] });
    return { id: issue.id, url: null, changeId: null };
  }

  async createBranch(name: string): Promise<void> {
    await this.enter('createBranch', [name]);
    this.branches.add(name);
  }

  async proposeChange(branch: string, change: ChangeRequest, linkedIssue: IssueRecord): Promise<ChangeRecord> {
    await this.enter('proposeChange', [branch, change, linkedIssue]);
    const id = String(this.nextId++);
    this.changes.set(id, { id, branch, change, linkedIssue: linkedIssue.id });
    return { id, url: null };
  }

  async updateIssue(id: string, body: string): Promise<void> {
    await this.enter('updateIssue', [id, body]);
    const issue = this.issues.get(id);
    if (issue) {
      this.issues.set(id, { ...issue, body });
    }
  }
}
