import { type LoghoundConfig, loadConfig } from '../../config/index.js';
import { ErrorClassifier, loadPatterns } from '../../core/monitor/classifier.js';
import { Orchestrator } from '../../core/monitor/orchestrator.js';
import { createProposalGenerator, loadTemplates } from '../../core/monitor/proposals.js';
import { StateStore } from '../../core/monitor/stateStore.js';
import { createGitHubClient } from '../../tools/git/client.js';
import { GitHubTrackerClient } from '../../tools/git/githubTracker.js';
import { InMemoryTrackerClient } from '../../tools/git/memoryTracker.js';
import type { IssueTrackerClient } from '../../tools/git/tracker.js';

export interface RuntimeOptions {
  configPath?: string;
  /** `memory` never reaches GitHub and never writes state */
  tracker: 'github' | 'memory';
}

export interface Runtime {
  config: LoghoundConfig;
  orchestrator: Orchestrator;
  tracker: IssueTrackerClient;
}

/**
 * Wires config, patterns, templates, tracker and state store into an
 * orchestrator.
 */
export async function createRuntime(options: RuntimeOptions): Promise<Runtime> {
  const config = await loadConfig({ configPath: options.configPath });
  const [patterns, templates] = await Promise.all([
    loadPatterns(config.patternsPath),
    loadTemplates(config.templatesPath),
  ]);

  const tracker: IssueTrackerClient =
    options.tracker === 'github'
      ? new GitHubTrackerClient({
          octokit: createGitHubClient(),
          owner: config.repository.owner,
          repo: config.repository.name,
          baseBranch: config.baseBranch,
          timeoutMs: config.timeouts.trackerMs,
        })
      : new InMemoryTrackerClient();

  const orchestrator = new Orchestrator({
    settings: config,
    classifier: new ErrorClassifier(patterns, { levels: config.levels }),
    proposals: createProposalGenerator(templates),
    tracker,
    store: new StateStore(config.statePath, config.repository.slug, { timeoutMs: config.timeouts.stateMs }),
    persist: options.tracker === 'github',
  });

  return { config, orchestrator, tracker };
}
