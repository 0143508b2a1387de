#!/usr/bin/env tsx

import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

import chalk from 'chalk';
import { createUserFriendlyMessage, EXTRACT_CATEGORIES, safeCall } from '@optionlens/shared';
import { buildConfig, Config } from '../config';
import { MoneynessBreakdown } from '../services/moneyness-engine';
import { ReconciliationResult, runReconciliation } from '../services/reconciliation-pipeline';

export function formatDuration(milliseconds: number): string {
  const seconds = Math.floor(milliseconds / 1000);
  const minutes = Math.floor(seconds / 60);

  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  if (seconds > 0) {
    return `${seconds}s`;
  }
  return `${milliseconds}ms`;
}

function showUsage(config: Config) {
  console.log(chalk.blue('Usage:'));
  console.log('  npm run reconcile                  # Reconcile extracts in DATA_DIR (default ./data)');
  console.log('  npm run reconcile <directory>      # Reconcile extracts in a specific directory');
  console.log('');
  console.log(chalk.blue('File routing (override with PATTERN_* environment variables):'));
  for (const { category, pattern } of config.data.categoryPatterns) {
    console.log(`  ${category.padEnd(18)} ${pattern.source}`);
  }
}

export function formatBreakdown(label: string, breakdown: MoneynessBreakdown): string {
  const mean = breakdown.mean_moneyness === null ? 'n/a' : breakdown.mean_moneyness.toFixed(2);
  return (
    `  ${label.padEnd(8)} contracts=${breakdown.contracts} itm=${breakdown.in_the_money} ` +
    `atm=${breakdown.at_the_money} otm=${breakdown.out_of_the_money} ` +
    `monitored=${breakdown.monitored} mean=${mean}`
  );
}

function printReport(result: ReconciliationResult) {
  const { tables, diagnostics, summary } = result;

  console.log(chalk.blue('Rows loaded per category:'));
  for (const category of EXTRACT_CATEGORIES) {
    console.log(`  ${category.padEnd(18)} ${diagnostics.rowCounts[category]}`);
  }

  console.log(chalk.blue('Derived tables:'));
  console.log(`  contracts          ${tables.universe.length}`);
  console.log(`  stream aggregates  ${tables.streamAggregates.length}`);
  console.log(`  daily prices       ${tables.prices.size}`);
  console.log(`  moneyness records  ${tables.moneyness.length}`);
  console.log(`  ranked contracts   ${tables.ranked.length}`);

  console.log(chalk.blue('Diagnostics:'));
  const violations = diagnostics.identity.violations.length;
  const identityLine = `  identity violations ${violations} of ${diagnostics.identity.checked_ids} ids`;
  console.log(violations > 0 ? chalk.yellow(identityLine) : identityLine);
  console.log(`  orphan streams      ${diagnostics.orphanStreams}`);
  console.log(`  orphan snapshots    ${diagnostics.orphanSnapshots}`);
  const { no_price_on_expiry, unrecognized_contract_type, missing_close_or_strike } = diagnostics.moneynessExcluded;
  console.log(
    `  moneyness excluded  no_price=${no_price_on_expiry} bad_type=${unrecognized_contract_type} ` +
      `missing_values=${missing_close_or_strike}`
  );

  console.log(chalk.blue('Hold-to-expiry outcome:'));
  console.log(formatBreakdown('all', summary.overall));
  console.log(formatBreakdown('calls', summary.byType.Call));
  console.log(formatBreakdown('puts', summary.byType.Put));
}

async function main() {
  const args = process.argv.slice(2);

  const configResult = safeCall(() => buildConfig());
  if (configResult.isErr()) {
    console.error(chalk.red('Invalid configuration:'), createUserFriendlyMessage(configResult.error));
    process.exit(1);
  }
  const config = configResult.value;

  if (args.includes('--help') || args.includes('-h')) {
    showUsage(config);
    return;
  }

  const dataDirectory = args[0] ? path.resolve(args[0]) : config.data.directory;
  console.log(chalk.blue(`Reconciling extracts in ${dataDirectory}...`));

  const startTime = Date.now();
  const result = await runReconciliation({
    dataDirectory,
    categoryPatterns: config.data.categoryPatterns,
    delimiter: config.data.delimiter,
    readConcurrency: config.data.readConcurrency,
  });
  const durationFormatted = formatDuration(Date.now() - startTime);

  if (result.isErr()) {
    console.error(chalk.red('Reconciliation failed:'), createUserFriendlyMessage(result.error));
    console.log(chalk.blue(`Execution time before failure: ${durationFormatted}`));
    process.exit(1);
  }

  printReport(result.value);
  console.log(chalk.green('Reconciliation completed successfully'));
  console.log(chalk.blue(`Total execution time: ${durationFormatted}`));
}

if (require.main === module) {
  main().catch(error => {
    console.error(chalk.red('Unhandled error:'), error);
    process.exit(1);
  });
}
