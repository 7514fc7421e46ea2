/**
 * Report CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { table } from 'table';
import { GraphClient } from '../../core/graph';
import { CsvMailboxSource, CsvLogonSource } from '../../core/sources';
import { runReport, PipelineProgress, PipelineResult, ReportProviders } from '../../core/pipeline';
import { writeReport } from '../../core/export';
import {
  loadAzureConfig,
  parseInactiveDays,
  parseTargetSkus,
  resolveOutputDir,
} from '../../core/config';
import { ConfigurationError, describeError } from '../../utils/errors';
import { logger, enableConsoleLogging } from '../../utils/logger';

interface RunOptions {
  mailboxCsv?: string;
  adLogons?: string;
  servicePrincipals?: boolean;
  validateEmployeeType?: boolean;
  inactiveDays?: string;
  sku?: string[];
  output?: string;
  verbose?: boolean;
}

const PHASE_TEXT: Record<PipelineProgress['phase'], string> = {
  catalog: 'Reading subscribed SKUs',
  users: 'Reading users',
  servicePrincipals: 'Reading service principals',
  mailboxes: 'Reading mailboxes',
  onPrem: 'Reading on-prem logons',
  building: 'Building report',
  complete: 'Report built',
};

export const reportCommands = new Command('report')
  .description('Generate the license activity report');

reportCommands
  .command('run')
  .description('Build the report and write it as CSV')
  .option('--mailbox-csv <path>', 'Exchange Online mailbox export (default: mailbox settings from Graph)')
  .option('--ad-logons <path>', 'On-prem Active Directory last-logon export')
  .option('--service-principals', 'Include service principals')
  .option('--validate-employee-type', 'Flag users whose employee type is not an expected value')
  .option('--inactive-days <n>', 'Inactivity threshold in days')
  .option('--sku <names...>', 'Target SKU part numbers (default: ENTERPRISEPREMIUM SPE_E5)')
  .option('-o, --output <dir>', 'Output directory')
  .option('-v, --verbose', 'Show detailed output')
  .action(async (options: RunOptions) => {
    if (options.verbose) {
      enableConsoleLogging(true);
    }

    let spinner: ora.Ora | null = null;
    let currentPhase: PipelineProgress['phase'] | null = null;

    const onProgress = (progress: PipelineProgress) => {
      const text =
        progress.total !== undefined
          ? `${PHASE_TEXT[progress.phase]} [${progress.processed ?? 0}/${progress.total}]`
          : PHASE_TEXT[progress.phase];

      if (progress.phase === currentPhase && spinner) {
        spinner.text = text;
        return;
      }

      spinner?.succeed();
      currentPhase = progress.phase;
      spinner = progress.phase === 'complete' ? null : ora(text).start();
    };

    try {
      const inactiveDays = parseInactiveDays(options.inactiveDays);
      const targetProductNames = parseTargetSkus(options.sku);
      const outputDir = resolveOutputDir(options.output);
      const azure = loadAzureConfig();

      spinner = ora('Connecting to Microsoft Graph...').start();
      const graph = await GraphClient.connect(azure);
      spinner.succeed('Connected to Microsoft Graph');
      spinner = null;

      const providers: ReportProviders = {
        catalog: graph,
        identities: graph,
        mailboxes: options.mailboxCsv ? new CsvMailboxSource(options.mailboxCsv) : graph,
        onPrem: options.adLogons ? new CsvLogonSource(options.adLogons) : undefined,
      };

      const result = await runReport(
        providers,
        {
          targetProductNames,
          inactiveDays,
          includeServicePrincipals: options.servicePrincipals,
          validateEmployeeType: options.validateEmployeeType,
        },
        onProgress
      );

      const filePath = writeReport(result, outputDir, result.generatedAt);
      console.log(chalk.green(`\n✓ Report written: ${filePath}`));

      printSummary(result, inactiveDays);
    } catch (error) {
      spinner?.fail();

      if (error instanceof ConfigurationError) {
        console.error(chalk.red(`Configuration error: ${error.message}`));
        error.details.forEach((d) => console.error(chalk.red(`  - ${d}`)));
      } else {
        console.error(chalk.red(`Report failed: ${describeError(error)}`));
      }

      logger.error('Report run failed', error);
      process.exit(1);
    }
  });

function printSummary(result: PipelineResult, inactiveDays: number): void {
  const { counters, skus, flagged } = result;

  console.log(chalk.bold('\nTarget SKUs:'));
  for (const [name, skuId] of skus.targets) {
    console.log(skuId ? `  ${chalk.green('✓')} ${name} (${skuId})` : `  ${chalk.dim(`- ${name} (not subscribed)`)}`);
  }

  console.log(chalk.bold('\nSummary:'));
  console.log(
    table([
      ['Metric', 'Count'],
      ['Identities reported', result.rows.length.toString()],
      ['Target-licensed users', counters.totalLicensed.toString()],
      ['Licensed, account disabled', counters.licensedDisabled.toString()],
      ['Licensed, shared mailbox', counters.licensedShared.toString()],
      [`Licensed, no sign-in for over ${inactiveDays} days`, counters.licensedInactive.toString()],
    ])
  );

  if (flagged.length > 0) {
    console.log(chalk.yellow(`Users with an unexpected employee type (${flagged.length}):`));
    flagged.forEach((upn) => console.log(chalk.yellow(`  ! ${upn}`)));
  }
}
