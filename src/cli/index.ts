#!/usr/bin/env node

import '../config/env.js';
import { Command } from 'commander';
import { enableDebug } from '../utils/logger.js';
import { monitor } from './commands/monitor.js';
import { scan } from './commands/scan.js';
import { setup } from './commands/setup.js';
import { simulate } from './commands/simulate.js';
import { status } from './commands/status.js';
import { CLI_MESSAGES } from './messages.js';
import type { GlobalOptions } from './utils/options.js';

const program = new Command();

program
  .name('loghound')
  .description(CLI_MESSAGES.DESCRIPTION)
  .version('0.1.0')
  .option('-c, --config <path>', CLI_MESSAGES.OPTIONS.CONFIG)
  .option('-v, --verbose', CLI_MESSAGES.OPTIONS.VERBOSE)
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts<GlobalOptions>().verbose) {
      enableDebug();
    }
  });

program.addCommand(status);
program.addCommand(scan);
program.addCommand(monitor);
program.addCommand(simulate);
program.addCommand(setup);

await program.parseAsync();
