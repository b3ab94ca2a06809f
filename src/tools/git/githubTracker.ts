/**
 * GitHub binding of the issue tracker 🐙
 * Issues, branches and pull requests through Octokit.
 */

import type { Octokit } from '@octokit/rest';
import { TrackerRejectedError, TrackerTransientError, getErrorMessage } from '../../core/monitor/errors.js';
import type { IssueRecord } from '../../core/monitor/types.js';
import type { ChangeRecord, ChangeRequest, IssueTrackerClient } from './tracker.js';

export interface GitHubTrackerOptions {
  octokit: Octokit;
  owner: string;
  repo: string;
  baseBranch: string;
  /** Per-request timeout; an aborted request is a transient failure. */
  timeoutMs: number;
}

interface HttpErrorShape {
  status?: number;
  message?: string;
  name?: string;
  code?: string;
  cause?: unknown;
  response?: { headers?: Record<string, string | number | undefined>; data?: { message?: string } };
}

const NETWORK_ERROR_NAMES = new Set(['AbortError', 'TimeoutError', 'FetchError']);
const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function asHttpError(error: unknown): HttpErrorShape {
  return typeof error === 'object' && error !== null ? (error as HttpErrorShape) : {};
}

function describeError(error: unknown): string {
  const detail = asHttpError(error).response?.data?.message;
  const message = getErrorMessage(error);
  return detail && !message.includes(detail) ? `${message}: ${detail}` : message;
}

/** Aborts and socket-level failures, looking through `cause` (fetch wraps them). */
function isNetworkError(error: unknown, depth = 0): boolean {
  const shape = asHttpError(error);
  if ((shape.name && NETWORK_ERROR_NAMES.has(shape.name)) || (shape.code && NETWORK_ERROR_CODES.has(shape.code))) {
    return true;
  }
  return depth < 3 && shape.cause !== undefined && isNetworkError(shape.cause, depth + 1);
}

/**
 * Sorts an Octokit failure into the tracker taxonomy: timeouts, rate limits,
 * 5xx and network errors are transient; every other failure, including a
 * programming error without a status, is rejected.
 */
export function toTrackerError(error: unknown, action: string): TrackerTransientError | TrackerRejectedError {
  if (error instanceof TrackerTransientError || error instanceof TrackerRejectedError) {
    return error;
  }
  const http = asHttpError(error);
  const message = `GitHub ${action} failed: ${describeError(error)}`;

  const status = typeof http.status === 'number' ? http.status : undefined;
  if (status === undefined) {
    return isNetworkError(error)
      ? new TrackerTransientError(message, { cause: error })
      : new TrackerRejectedError(message, undefined, { cause: error });
  }
  if (status === 429 || status >= 500) {
    return new TrackerTransientError(message, { cause: error });
  }
  if (status === 403) {
    const headers = http.response?.headers ?? {};
    const rateLimited =
      String(headers['x-ratelimit-remaining']) === '0' ||
      headers['retry-after'] !== undefined ||
      /rate limit/i.test(describeError(error));
    if (rateLimited) {
      return new TrackerTransientError(message, { cause: error });
    }
  }
  return new TrackerRejectedError(message, status, { cause: error });
}

export class GitHubTrackerClient implements IssueTrackerClient {
  private readonly octokit: Octokit;
  private readonly owner: string;
  private readonly repo: string;
  private readonly baseBranch: string;
  private readonly timeoutMs: number;

  constructor(options: GitHubTrackerOptions) {
    this.octokit = options.octokit;
    this.owner = options.owner;
    this.repo = options.repo;
    this.baseBranch = options.baseBranch;
    this.timeoutMs = options.timeoutMs;
  }

  private request() {
    return { signal: AbortSignal.timeout(this.timeoutMs) };
  }

  private async call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toTrackerError(error, action);
    }
  }

  async findExisting(fingerprintLabel: string): Promise<IssueRecord | null> {
    return this.call('issue search', async () => {
      const response = await this.octokit.issues.listForRepo({
        owner: this.owner,
        repo: this.repo,
        labels: fingerprintLabel,
        state: 'open',
        per_page: 10,
        request: this.request(),
      });
      // the issues endpoint also lists pull requests
      const issue = response.data.find((item) => !item.pull_request);
      return issue ? { id: String(issue.number), url: issue.html_url, changeId: null } : null;
    });
  }

  async createIssue(title: string, body: string, labels: readonly string[]): Promise<IssueRecord> {
    return this.call('issue creation', async () => {
      const response = await this.octokit.issues.create({
        owner: this.owner,
        repo: this.repo,
        title,
        body,
        labels: [...labels],
        request: this.request(),
      });
      return { id: String(response.data.number), url: response.data.html_url, changeId: null };
    });
  }

  async createBranch(name: string): Promise<void> {
    return this.call('branch creation', async () => {
      const base = await this.octokit.git.getRef({
        owner: this.owner,
        repo: this.repo,
        ref: `heads/${this.baseBranch}`,
        request: this.request(),
      });
      try {
        await this.octokit.git.createRef({
          owner: this.owner,
          repo: this.repo,
          ref: `refs/heads/${name}`,
          sha: base.data.object.sha,
          request: this.request(),
        });
      } catch (error) {
        // a previous, interrupted run may have created it already
        if (asHttpError(error).status === 422 && /already exists/i.test(describeError(error))) {
          return;
        }
        throw error;
      }
    });
  }

  async proposeChange(branch: string, change: ChangeRequest, linkedIssue: IssueRecord): Promise<ChangeRecord> {
    return this.call('pull request creation', async () => {
      const existingSha = await this.fileSha(change.path, branch);
      await this.octokit.repos.createOrUpdateFileContents({
        owner: this.owner,
        repo: this.repo,
        path: change.path,
        message: change.commitMessage,
        content: Buffer.from(change.body, 'utf-8').toString('base64'),
        branch,
        ...(existingSha ? { sha: existingSha } : {}),
        request: this.request(),
      });

      const response = await this.octokit.pulls.create({
        owner: this.owner,
        repo: this.repo,
        title: change.title,
        head: branch,
        base: this.baseBranch,
        body: `Fixes #${linkedIssue.id}\n\n${change.body}`,
        request: this.request(),
      });
      return { id: String(response.data.number), url: response.data.html_url };
    });
  }

  async updateIssue(id: string, body: string): Promise<void> {
    return this.call('issue update', async () => {
      await this.octokit.issues.update({
        owner: this.owner,
        repo: this.repo,
        issue_number: Number(id),
        body,
        request: this.request(),
      });
    });
  }

  private async fileSha(path: string, branch: string): Promise<string | null> {
    try {
      const response = await this.octokit.repos.getContent({
        owner: this.owner,
        repo: this.repo,
        path,
        ref: branch,
        request: this.request(),
      });
      return !Array.isArray(response.data) && 'sha' in response.data ? response.data.sha : null;
    } catch (error) {
      if (asHttpError(error).status === 404) {
        return null;
      }
      throw error;
    }
  }
}
