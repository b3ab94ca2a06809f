import chalk from 'chalk';
import { Command } from 'commander';
import { InMemoryTrackerClient } from '../../tools/git/memoryTracker.js';
import { CLI_MESSAGES, formatSummary } from '../messages.js';
import { globalOptions, reportFailure } from '../utils/options.js';
import { createRuntime } from '../utils/runtime.js';

export const scan = new Command('scan')
  .description(CLI_MESSAGES.COMMANDS.SCAN)
  .option('-n, --dry-run', CLI_MESSAGES.COMMANDS.SCAN_DRY_RUN)
  .action(async (options: { dryRun?: boolean }, command: Command) => {
    try {
      const dryRun = options.dryRun === true;
      const { config, orchestrator, tracker } = await createRuntime({
        configPath: globalOptions(command).config,
        tracker: dryRun ? 'memory' : 'github',
      });

      console.log(chalk.cyan(CLI_MESSAGES.SCAN.START(config.logPath)));
      if (dryRun) console.log(chalk.yellow(CLI_MESSAGES.SCAN.DRY_RUN));

      const controller = new AbortController();
      const abort = () => controller.abort();
      process.once('SIGINT', abort);
      process.once('SIGTERM', abort);
      const summary = await orchestrator.scan(controller.signal).finally(() => {
        process.off('SIGINT', abort);
        process.off('SIGTERM', abort);
      });

      if (tracker instanceof InMemoryTrackerClient && tracker.issues.size > 0) {
        console.log(chalk.bold(CLI_MESSAGES.SCAN.WOULD_FILE));
        for (const issue of tracker.issues.values()) {
          console.log(`  ${issue.title}  ${chalk.dim(issue.labels.join(', '))}`);
        }
      } else if (summary.created + summary.linked === 0 && summary.status === 'ok') {
        console.log(chalk.green(CLI_MESSAGES.SCAN.NOTHING_NEW));
      }

      const color = summary.status === 'ok' ? chalk.green : summary.status === 'partial' ? chalk.yellow : chalk.red;
      console.log(color(`\n${formatSummary(summary)}`));
      if (summary.error) console.error(chalk.red(summary.error));
      if (summary.status !== 'ok') process.exitCode = 1;
    } catch (error) {
      reportFailure('scan', error);
    }
  });
