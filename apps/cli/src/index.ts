#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * directplay convert [input] [output]   make a folder direct-play compatible
 * directplay check [paths...]           report what would need fixing
 */

import './env.js';
import { Command, Option } from 'commander';
import chalk from 'chalk';
import { ConfigError, DirectPlayError, errorMessage } from '@directplay/core';
import { checkCommand } from './commands/check.js';
import { convertCommand } from './commands/convert.js';
import { printError } from './lib/output.js';

/**
 * Wrap a command action so failures print once and set the exit code
 */
function action<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof ConfigError) {
        printError(error.message);
        if (error.details) {
          console.error(JSON.stringify(error.details, null, 2));
        }
      } else if (error instanceof DirectPlayError) {
        printError(`${error.code}: ${error.message}`);
      } else {
        printError(errorMessage(error));
      }
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program
  .name('directplay')
  .description('Make media files play directly on any device')
  .version('1.0.0');

program
  .command('convert [input] [output]')
  .description('Remux or encode every media file in a folder into the target profile')
  .option('--no-hardware', 'Never use a hardware encoder')
  .addOption(
    new Option('-s, --source-action <action>', 'What to do with converted sources')
      .choices(['keep', 'delete', 'backup'])
  )
  .option('--json', 'Print outcomes as JSON')
  .action(action(convertCommand));

program
  .command('check [paths...]')
  .description('Check files or folders against the target profile without converting')
  .option('--json', 'Print verdicts as JSON')
  .action(action(checkCommand));

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error('Run', chalk.cyan('directplay --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync();
