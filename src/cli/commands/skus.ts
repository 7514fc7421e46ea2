/**
 * SKU catalog CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { table } from 'table';
import { GraphClient } from '../../core/graph';
import { loadAzureConfig, parseTargetSkus } from '../../core/config';
import { describeError } from '../../utils/errors';

export const skuCommands = new Command('skus')
  .description('Inspect the tenant license catalog');

skuCommands
  .command('list')
  .alias('ls')
  .description('List subscribed SKUs and mark the report targets')
  .option('--sku <names...>', 'Target SKU part numbers to highlight')
  .action(async (options: { sku?: string[] }) => {
    const spinner = ora('Reading subscribed SKUs...').start();

    try {
      const targets = new Set(parseTargetSkus(options.sku));
      const graph = await GraphClient.connect(loadAzureConfig());
      const catalog = await graph.listSubscribedSkus();
      spinner.succeed(`Found ${catalog.length} subscribed SKU(s)`);

      if (catalog.length === 0) {
        console.log(chalk.yellow('No subscribed SKUs.'));
        return;
      }

      const sorted = [...catalog].sort((a, b) => a.skuPartNumber.localeCompare(b.skuPartNumber));
      const data = [
        ['SKU', 'SKU ID', 'Assigned', 'Enabled', 'Target'],
        ...sorted.map((sku) => [
          targets.has(sku.skuPartNumber) ? chalk.green(sku.skuPartNumber) : sku.skuPartNumber,
          sku.skuId,
          sku.consumedUnits?.toString() ?? '-',
          sku.enabledUnits?.toString() ?? '-',
          targets.has(sku.skuPartNumber) ? chalk.green('✓') : '',
        ]),
      ];

      console.log(table(data));

      const missing = [...targets].filter((t) => !catalog.some((s) => s.skuPartNumber === t));
      if (missing.length === targets.size) {
        console.log(chalk.red('None of the target SKUs are subscribed; the report cannot run.'));
      } else if (missing.length > 0) {
        console.log(chalk.yellow(`Not subscribed: ${missing.join(', ')}`));
      }
    } catch (error) {
      spinner.fail(`Failed to read SKUs: ${describeError(error)}`);
      process.exit(1);
    }
  });
