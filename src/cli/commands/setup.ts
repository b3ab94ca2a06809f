import fs from 'node:fs/promises';
import path from 'node:path';
import chalk from 'chalk';
import { Command } from 'commander';
import { writeDefaultConfig } from '../../config/index.js';
import { CONFIG_FILE_NAME, DEFAULT_SETTINGS } from '../../config/defaults.js';
import { parseRepo } from '../../tools/git/client.js';
import { CLI_MESSAGES } from '../messages.js';
import { globalOptions, reportFailure } from '../utils/options.js';

export const setup = new Command('setup')
  .description(CLI_MESSAGES.COMMANDS.SETUP)
  .requiredOption('-r, --repo <owner/name>', CLI_MESSAGES.COMMANDS.SETUP_REPO)
  .option('-l, --log <path>', CLI_MESSAGES.COMMANDS.SETUP_LOG, DEFAULT_SETTINGS.logPath)
  .action(async (options: { repo: string; log: string }, command: Command) => {
    try {
      const { owner, repo } = parseRepo(options.repo);
      const configPath = path.resolve(globalOptions(command).config ?? CONFIG_FILE_NAME);
      const logPath = path.resolve(path.dirname(configPath), options.log);

      await fs.mkdir(path.dirname(logPath), { recursive: true });
      await (await fs.open(logPath, 'a')).close();
      console.log(chalk.green(CLI_MESSAGES.SETUP.LOG_READY(logPath)));

      const created = await writeDefaultConfig(configPath, {
        repository: `${owner}/${repo}`,
        logPath: options.log,
        scanIntervalSeconds: DEFAULT_SETTINGS.scanIntervalSeconds,
        maxErrorsPerBatch: DEFAULT_SETTINGS.maxErrorsPerBatch,
        environment: DEFAULT_SETTINGS.environment,
        proposeFixes: DEFAULT_SETTINGS.proposeFixes,
        baseBranch: DEFAULT_SETTINGS.baseBranch,
      });
      console.log(
        created
          ? chalk.green(CLI_MESSAGES.SETUP.CONFIG_CREATED(configPath))
          : chalk.yellow(CLI_MESSAGES.SETUP.CONFIG_EXISTS(configPath)),
      );
      if (!process.env.GITHUB_TOKEN) {
        console.log(chalk.yellow(CLI_MESSAGES.SETUP.TOKEN_HINT));
      }
    } catch (error) {
      reportFailure('setup', error);
    }
  });
