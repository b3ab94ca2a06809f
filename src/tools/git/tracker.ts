/**
 * Issue tracker capability used by the orchestrator. Nothing else in the
 * core talks to the tracker.
 */

import type { IssueRecord } from '../../core/monitor/types.js';

export interface ChangeRequest {
  /** Repository path of the proposal file. */
  path: string;
  title: string;
  commitMessage: string;
  body: string;
}

export interface ChangeRecord {
  id: string;
  url: string | null;
}

/**
 * Every method may reject with TrackerTransientError (worth retrying) or
 * TrackerRejectedError (not).
 */
export interface IssueTrackerClient {
  /** Open issue carrying the fingerprint label, if any. */
  findExisting(fingerprintLabel: string): Promise<IssueRecord | null>;
  createIssue(title: string, body: string, labels: readonly string[]): Promise<IssueRecord>;
  /** Creates the branch from the base branch; an existing branch is reused. */
  createBranch(name: string): Promise<void>;
  proposeChange(branch: string, change: ChangeRequest, linkedIssue: IssueRecord): Promise<ChangeRecord>;
  updateIssue(id: string, body: string): Promise<void>;
}
