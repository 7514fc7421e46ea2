/**
 * Authentication CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { AzureConfig } from '../../types';
import { authManager } from '../../core/auth';
import { loadAzureConfig } from '../../core/config';
import { ConfigurationError, describeError } from '../../utils/errors';

export const authCommands = new Command('auth')
  .description('Check the app registration used for Microsoft Graph');

authCommands
  .command('test')
  .description('Acquire a Graph token with the configured credentials')
  .action(async () => {
    let azure: AzureConfig;
    try {
      azure = loadAzureConfig();
    } catch (error) {
      console.error(chalk.red(describeError(error)));
      if (error instanceof ConfigurationError) {
        error.details.forEach((d) => console.error(chalk.red(`  - ${d}`)));
      }
      process.exit(1);
    }

    const spinner = ora(`Testing authentication for tenant ${azure.tenantId}...`).start();
    const success = await authManager.testAuth(azure);

    if (success) {
      spinner.succeed('Authentication successful');
    } else {
      spinner.fail('Authentication failed - check credentials and admin consent');
      process.exit(1);
    }
  });
