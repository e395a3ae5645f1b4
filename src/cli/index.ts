#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { listFailures, setupRules, sync } from './commands';
import { formatError } from '../utils/errors';

function positiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive whole number.');
  }
  return parsed;
}

async function runCommand(action: () => Promise<void> | void) {
  try {
    await action();
  } catch (error: unknown) {
    console.error('❌', formatError(error));
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('spend-tracker')
  .description('Turn Wise and PayPal payment emails into spreadsheet rows')
  .version('1.0.0');

program.command('sync')
  .description('Find, claim, categorise and upload new transactions')
  .option('-d, --days <number>', 'Number of days to look back', positiveInt)
  .option('--dry-run', 'Process without claiming, uploading or writing anything')
  .option('--no-sheets', 'Skip the Google Sheets upload')
  .option('--no-output', 'Skip writing the JSON output file')
  .option('--notify', 'Email a run summary to NOTIFICATION_EMAIL')
  .action(async (options: { days?: number; dryRun?: boolean; sheets: boolean; output: boolean; notify?: boolean }) => {
    await runCommand(() => sync(options));
  });

program.command('failures')
  .description('List messages earlier runs skipped or could not claim')
  .option('-l, --limit <number>', 'Number of failures to show', positiveInt, 50)
  .action(async (options: { limit: number }) => {
    await runCommand(() => listFailures(options));
  });

program.command('setup-rules')
  .description('Create a rules.json template with category hints')
  .action(async () => {
    await runCommand(() => setupRules());
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('❌', formatError(error));
  process.exitCode = 1;
});
