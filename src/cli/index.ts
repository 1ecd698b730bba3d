#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { sync, dryRun, parseFile, setup, reauth } from './commands';

const program = new Command();

program
  .name('bank-alert-relay')
  .description('Relay bank alert emails to Telegram and record new expenses in Notion')
  .version('1.0.0');

program.command('sync')
  .description('Fetch alert emails, notify Telegram and save new expenses to Notion')
  .option('-n, --newer-than <period>', 'Gmail search window, e.g. 2d or 12h')
  .action(async (options: { newerThan?: string }) => {
    await sync({ newerThan: options.newerThan });
  });

program.command('dry-run')
  .description('Show what a sync would do without sending or saving anything')
  .option('-n, --newer-than <period>', 'Gmail search window, e.g. 7d')
  .option('--offline', 'Do not load known records from Notion (everything counts as new)')
  .action(async (options: { newerThan?: string; offline?: boolean }) => {
    await dryRun({ newerThan: options.newerThan, offline: options.offline });
  });

program.command('parse <file>')
  .description('Parse a saved alert email (HTML file) and print the extracted transaction')
  .action(async (file: string) => {
    await parseFile(file);
  });

program.command('setup')
  .description('Create settings.json configuration template file')
  .action(async () => {
    await setup();
  });

program.command('reauth')
  .description('Authorize Gmail access again and store a new token')
  .action(async () => {
    await reauth();
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
