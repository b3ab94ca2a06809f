import type { Octokit } from '@octokit/rest';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { TrackerRejectedError, TrackerTransientError } from '../../../core/monitor/errors.js';
import { GitHubTrackerClient, toTrackerError } from '../githubTracker.js';

const httpError = (status: number, message: string, extra: object = {}) =>
  Object.assign(new Error(message), { status, ...extra });

function createMockOctokit() {
  return {
    issues: { listForRepo: vi.fn(), create: vi.fn(), update: vi.fn() },
    git: { getRef: vi.fn(), createRef: vi.fn() },
    repos: { getContent: vi.fn(), createOrUpdateFileContents: vi.fn() },
    pulls: { create: vi.fn() },
  };
}

describe('toTrackerError', () => {
  it.each([
    ['server errors', httpError(502, 'Bad Gateway')],
    ['rate limiting', httpError(429, 'Too Many Requests')],
    ['exhausted rate limits', httpError(403, 'Forbidden', { response: { headers: { 'x-ratelimit-remaining': '0' } } })],
    ['secondary rate limits', httpError(403, 'You have exceeded a secondary rate limit')],
    ['aborted requests', Object.assign(new Error('This operation was aborted'), { name: 'AbortError' })],
    ['connection resets', Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' })],
    ['wrapped fetch failures', new TypeError('fetch failed', { cause: Object.assign(new Error('connect'), { code: 'ETIMEDOUT' }) })],
  ])('treats %s as transient', (_, error) => {
    expect(toTrackerError(error, 'issue creation')).toBeInstanceOf(TrackerTransientError);
  });

  it.each([
    [401, 'Bad credentials'],
    [403, 'Resource not accessible by integration'],
    [404, 'Not Found'],
    [422, 'Validation Failed'],
  ])('treats %i as rejected', (status, message) => {
    const mapped = toTrackerError(httpError(status, message), 'issue creation');
    expect(mapped).toBeInstanceOf(TrackerRejectedError);
    expect(mapped instanceof TrackerRejectedError && mapped.status).toBe(status);
  });

  it('treats an error without a status or network cause as rejected', () => {
    const mapped = toTrackerError(new TypeError("Cannot read properties of undefined (reading 'number')"), 'issue creation');
    expect(mapped).toBeInstanceOf(TrackerRejectedError);
    expect(mapped instanceof TrackerRejectedError && mapped.status).toBeUndefined();
  });

  it('names the action in the message', () => {
    expect(toTrackerError(httpError(401, 'Bad credentials'), 'issue creation').message).toBe(
      'GitHub issue creation failed: Bad credentials',
    );
  });
});

describe('GitHubTrackerClient', () => {
  let octokit: ReturnType<typeof createMockOctokit>;
  let client: GitHubTrackerClient;

  beforeEach(() => {
    octokit = createMockOctokit();
    client = new GitHubTrackerClient({
      octokit: octokit as unknown as Octokit,
      owner: 'acme',
      repo: 'shop',
      baseBranch: 'main',
      timeoutMs: 1000,
    });
  });

  it('finds an open issue by label and skips pull requests', async () => {
    octokit.issues.listForRepo.mockResolvedValue({
      data: [
        { number: 3, html_url: 'https://example.test/pull/3', pull_request: {} },
        { number: 5, html_url: 'https://example.test/issues/5' },
      ],
    });

    expect(await client.findExisting('loghound:0123456789ab')).toEqual({
      id: '5',
      url: 'https://example.test/issues/5',
      changeId: null,
    });
    expect(octokit.issues.listForRepo).toHaveBeenCalledWith(
      expect.objectContaining({ owner: 'acme', repo: 'shop', labels: 'loghound:0123456789ab', state: 'open' }),
    );
  });

  it('returns null when no issue carries the label', async () => {
    octokit.issues.listForRepo.mockResolvedValue({ data: [] });
    expect(await client.findExisting('loghound:0123456789ab')).toBeNull();
  });

  it('creates issues', async () => {
    octokit.issues.create.mockResolvedValue({ data: { number: 12, html_url: 'https://example.test/issues/12' } });

    expect(await client.createIssue('title', 'body', ['automated', 'bug'])).toEqual({
      id: '12',
      url: 'https://example.test/issues/12',
      changeId: null,
    });
    expect(octokit.issues.create).toHaveBeenCalledWith(
      expect.objectContaining({ title: 'title', body: 'body', labels: ['automated', 'bug'] }),
    );
  });

  it('maps failures into the tracker taxonomy', async () => {
    octokit.issues.create.mockRejectedValue(httpError(503, 'Service Unavailable'));
    await expect(client.createIssue('t', 'b', [])).rejects.toBeInstanceOf(TrackerTransientError);
  });

  it('branches from the base branch', async () => {
    octokit.git.getRef.mockResolvedValue({ data: { object: { sha: 'abc123' } } });
    octokit.git.createRef.mockResolvedValue({});

    await client.createBranch('fix/database_error-x');
    expect(octokit.git.getRef).toHaveBeenCalledWith(expect.objectContaining({ ref: 'heads/main' }));
    expect(octokit.git.createRef).toHaveBeenCalledWith(
      expect.objectContaining({ ref: 'refs/heads/fix/database_error-x', sha: 'abc123' }),
    );
  });

  it('accepts a branch that already exists', async () => {
    octokit.git.getRef.mockResolvedValue({ data: { object: { sha: 'abc123' } } });
    octokit.git.createRef.mockRejectedValue(httpError(422, 'Reference already exists'));

    await expect(client.createBranch('fix/x')).resolves.toBeUndefined();
  });

  it('commits the proposal and opens a pull request linked to the issue', async () => {
    octokit.repos.getContent.mockRejectedValue(httpError(404, 'Not Found'));
    octokit.repos.createOrUpdateFileContents.mockResolvedValue({});
    octokit.pulls.create.mockResolvedValue({ data: { number: 13, html_url: 'https://example.test/pull/13' } });

    const change = await client.proposeChange(
      'fix/x',
      { path: '.loghound/proposals/x.md', title: 'Fix', commitMessage: 'Add proposal', body: '# Proposal' },
      { id: '12', url: null, changeId: null },
    );

    expect(change).toEqual({ id: '13', url: 'https://example.test/pull/13' });
    const commit = octokit.repos.createOrUpdateFileContents.mock.calls[0]?.[0];
    expect(commit).toMatchObject({
      path: '.loghound/proposals/x.md',
      message: 'Add proposal',
      branch: 'fix/x',
      content: Buffer.from('# Proposal').toString('base64'),
    });
    expect(commit).not.toHaveProperty('sha');
    expect(octokit.pulls.create).toHaveBeenCalledWith(
      expect.objectContaining({ head: 'fix/x', base: 'main', body: 'Fixes #12\n\n# Proposal' }),
    );
  });

  it('updates an existing proposal file in place', async () => {
    octokit.repos.getContent.mockResolvedValue({ data: { sha: 'old-sha', type: 'file' } });
    octokit.repos.createOrUpdateFileContents.mockResolvedValue({});
    octokit.pulls.create.mockResolvedValue({ data: { number: 14, html_url: 'https://example.test/pull/14' } });

    await client.proposeChange('fix/x', { path: 'p.md', title: 'Fix', commitMessage: 'm', body: 'b' }, {
      id: '1',
      url: null,
      changeId: null,
    });
    expect(octokit.repos.createOrUpdateFileContents).toHaveBeenCalledWith(expect.objectContaining({ sha: 'old-sha' }));
  });

  it('updates issue bodies', async () => {
    octokit.issues.update.mockResolvedValue({});
    await client.updateIssue('12', 'new body');
    expect(octokit.issues.update).toHaveBeenCalledWith(expect.objectContaining({ issue_number: 12, body: 'new body' }));
  });
});
