import chalk from 'chalk';
import { Command } from 'commander';
import { CLI_MESSAGES, formatSummary } from '../messages.js';
import { globalOptions, reportFailure } from '../utils/options.js';
import { createRuntime } from '../utils/runtime.js';

export const monitor = new Command('monitor')
  .description(CLI_MESSAGES.COMMANDS.MONITOR)
  .action(async (_options: object, command: Command) => {
    try {
      const { orchestrator } = await createRuntime({ configPath: globalOptions(command).config, tracker: 'github' });

      const controller = new AbortController();
      const stop = () => {
        if (!controller.signal.aborted) {
          console.log(chalk.yellow(CLI_MESSAGES.MONITOR.STOPPING));
          controller.abort();
        }
      };
      process.on('SIGINT', stop);
      process.on('SIGTERM', stop);

      try {
        await orchestrator.monitor(controller.signal, (summary) => {
          const color = summary.status === 'ok' ? chalk.dim : summary.status === 'partial' ? chalk.yellow : chalk.red;
          console.log(color(formatSummary(summary)));
        });
      } finally {
        process.off('SIGINT', stop);
        process.off('SIGTERM', stop);
      }
    } catch (error) {
      reportFailure('monitor', error);
    }
  });
