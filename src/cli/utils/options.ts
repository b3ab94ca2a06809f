import chalk from 'chalk';
import type { Command } from 'commander';
import { getErrorMessage } from '../../core/monitor/errors.js';
import { CLI_MESSAGES } from '../messages.js';

export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/** Prints a command failure and marks the process as failed. */
export function reportFailure(commandName: string, error: unknown): void {
  console.error(chalk.red(CLI_MESSAGES.ERRORS.FAILED(commandName)), getErrorMessage(error));
  process.exitCode = 1;
}
