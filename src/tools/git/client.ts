/**
 * GitHub API Client - Wrapper for Octokit
 */
import { Octokit } from '@octokit/rest';
import { ConfigError } from '../../core/monitor/errors.js';

/**
 * Creates an authenticated GitHub client
 */
export function createGitHubClient(token = process.env.GITHUB_TOKEN): Octokit {
  if (!token || token.trim() === '') {
    throw new ConfigError(
      'GITHUB_TOKEN environment variable is not set or is empty. Please set a valid GitHub Personal Access Token in your environment.',
    );
  }
  return new Octokit({ auth: token, userAgent: 'loghound' });
}

/**
 * Parses owner and repo from a GitHub URL or "owner/repo" string
 */
export function parseRepo(repoInput: string): { owner: string; repo: string } {
  if (!repoInput) {
    throw new ConfigError('Repository input is empty. Please provide a repository name (owner/repo) or URL.');
  }

  // Handle "owner/repo" format
  if (repoInput.includes('/') && !repoInput.includes('://')) {
    const [owner, repo, ...rest] = repoInput.split('/');
    if (!owner || !repo || rest.length > 0) {
      throw new ConfigError(`Invalid repository format: "${repoInput}". Expected "owner/repo" or a full GitHub URL.`);
    }
    return { owner, repo };
  }

  // Handle full GitHub URL
  const match = repoInput.match(/github\.com\/([^/]+)\/([^/]+)/);
  if (match?.[1] && match[2]) {
    return { owner: match[1], repo: match[2].replace(/\.git$/, '') };
  }

  throw new ConfigError(
    `Could not parse repository from: "${repoInput}". Please ensure it's in "owner/repo" format or a valid GitHub URL (e.g., https://github.com/owner/repo).`,
  );
}
