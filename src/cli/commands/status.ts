import chalk from 'chalk';
import { Command } from 'commander';
import { CLI_MESSAGES } from '../messages.js';
import { globalOptions, reportFailure } from '../utils/options.js';
import { createRuntime } from '../utils/runtime.js';

export const status = new Command('status')
  .description(CLI_MESSAGES.COMMANDS.STATUS)
  .action(async (_options: object, command: Command) => {
    try {
      // status never calls the tracker
      const { orchestrator } = await createRuntime({ configPath: globalOptions(command).config, tracker: 'memory' });
      const report = await orchestrator.status();

      console.log(chalk.bold.cyan(CLI_MESSAGES.STATUS.TITLE));
      console.log(`${chalk.bold('Repository:')}    ${report.repository}`);
      console.log(`${chalk.bold('Log file:')}      ${report.logPath}`);
      console.log(
        `${chalk.bold('Log size:')}      ${
          report.logSize === null ? chalk.yellow(CLI_MESSAGES.STATUS.MISSING_LOG) : `${report.logSize} bytes`
        }`,
      );
      console.log(`${chalk.bold('State file:')}    ${report.statePath}`);
      console.log(`${chalk.bold('Offset:')}        ${report.offset}`);
      console.log(`${chalk.bold('Rotation:')}      ${report.rotationMarker ?? '-'}`);
      console.log(`${chalk.bold('Known errors:')}  ${report.knownFingerprints}`);
      console.log(`${chalk.bold('Updated:')}       ${report.updatedAt ?? CLI_MESSAGES.STATUS.NEVER}`);
      console.log('');

      if (report.stateError) {
        console.error(chalk.red(`❌ ${report.stateError}`));
        process.exitCode = 1;
      }
    } catch (error) {
      reportFailure('status', error);
    }
  });
