import chalk from 'chalk';
import { Command } from 'commander';
import { loadConfig } from '../../config/index.js';
import { loadPatterns } from '../../core/monitor/classifier.js';
import { simulateErrors } from '../../core/monitor/simulator.js';
import { CLI_MESSAGES } from '../messages.js';
import { globalOptions, reportFailure } from '../utils/options.js';

const collect = (value: string, previous: string[]) => [...previous, value];

export const simulate = new Command('simulate')
  .description(CLI_MESSAGES.COMMANDS.SIMULATE)
  .option('-o, --only <category>', CLI_MESSAGES.COMMANDS.SIMULATE_CATEGORY, collect, [])
  .action(async (options: { only: string[] }, command: Command) => {
    try {
      const config = await loadConfig({ configPath: globalOptions(command).config });
      const patterns = await loadPatterns(config.patternsPath);
      const lines = await simulateErrors(config.logPath, patterns, { categories: options.only });

      if (lines.length === 0) {
        console.log(chalk.yellow(CLI_MESSAGES.SIMULATE.NONE));
        process.exitCode = 1;
        return;
      }
      console.log(chalk.green(CLI_MESSAGES.SIMULATE.WROTE(lines.length, config.logPath)));
      for (const line of lines) {
        console.log(chalk.dim(`  ${line}`));
      }
    } catch (error) {
      reportFailure('simulate', error);
    }
  });
