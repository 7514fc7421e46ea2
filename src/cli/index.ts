#!/usr/bin/env node
/**
 * License Activity Report CLI
 * Target-license, mailbox and sign-in report for Entra ID tenants
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { reportCommands } from './commands/report';
import { skuCommands } from './commands/skus';
import { authCommands } from './commands/auth';
import { describeError } from '../utils/errors';

const program = new Command();

program
  .name('license-report')
  .description('Report target-licensed users with mailbox type and last sign-in activity')
  .version('1.0.0');

// Register command groups
program.addCommand(reportCommands);
program.addCommand(skuCommands);
program.addCommand(authCommands);

// Global error handling
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`Error: ${err.message}`));
  process.exit(1);
});

// Show help if no command specified
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(`Error: ${describeError(error)}`));
    process.exit(1);
  });
}
