#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import {
  DEFAULT_REPORT_TIMEZONE,
  ENGINE_VERSION,
  FatalInputError,
  createLogger,
  toErrorDetail,
} from '@jarsync/types';
import { createSupabaseClient, getMigrationSQL, runMigrations } from '@jarsync/store';
import {
  REPORT_FORMATS,
  createSupabaseGateways,
  parsePositiveInt,
  parseReportFormat,
  runReportCommand,
  runSyncAccountCommand,
  runSyncCommand,
} from './commands.js';

const program = new Command();
const logger = createLogger('cli');

function fail(error: unknown): never {
  const detail = toErrorDetail(error);
  console.error(`[ERROR] ${detail.kind}: ${detail.message}`);
  process.exit(1);
}

program
  .name('jarsync')
  .description('Mirror bank accounts and transactions into Supabase and report daily spend coverage')
  .version(ENGINE_VERSION);

program
  .command('sync')
  .description('Sync accounts and transactions for every active user')
  .option('--accounts-only', 'Only refresh account records, skip transaction sync')
  .option('-c, --concurrency <n>', 'Users processed in parallel', process.env['SYNC_USER_CONCURRENCY'])
  .action(async (options: { accountsOnly?: boolean; concurrency?: string }) => {
    try {
      const gateways = createSupabaseGateways(createSupabaseClient());
      const summary = await runSyncCommand(gateways, {
        accountsOnly: options.accountsOnly === true,
        ...(options.concurrency !== undefined
          ? { concurrency: parsePositiveInt(options.concurrency, '--concurrency') }
          : {}),
        logger,
      });
      console.log(JSON.stringify(summary, null, 2));
    } catch (error) {
      if (error instanceof FatalInputError) {
        logger.fatal({ err: error.message }, 'Sync aborted');
      }
      fail(error);
    }
  });

program
  .command('sync-account')
  .description('Sync transactions of a single account')
  .argument('<userId>', 'User id')
  .argument('<accountId>', 'Provider account id')
  .action(async (userId: string, accountId: string) => {
    try {
      const gateways = createSupabaseGateways(createSupabaseClient());
      const result = await runSyncAccountCommand(gateways, userId, accountId, { logger });
      console.log(JSON.stringify(result, null, 2));
    } catch (error) {
      fail(error);
    }
  });

program
  .command('report')
  .description('Daily coverage report for a user')
  .argument('<userId>', 'User id')
  .option('-d, --date <YYYY-MM-DD>', 'Day to report on (default: today in the timezone)')
  .option('--tz <timezone>', 'IANA timezone', process.env['REPORT_TIMEZONE'] ?? DEFAULT_REPORT_TIMEZONE)
  .option('-f, --format <format>', `Output format (${REPORT_FORMATS.join(', ')})`, 'markdown')
  .action(async (userId: string, options: { date?: string; tz: string; format: string }) => {
    try {
      const gateways = createSupabaseGateways(createSupabaseClient());
      const { output } = await runReportCommand(gateways, userId, {
        ...(options.date !== undefined ? { date: options.date } : {}),
        timezone: options.tz,
        format: parseReportFormat(options.format),
        logger,
      });
      console.log(output);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('migrate')
  .description('Create the database tables, or print the migration SQL')
  .option('--print', 'Print the full migration SQL to stdout')
  .option('--no-rls', 'Exclude RLS policies')
  .option('--database-url <url>', 'PostgreSQL connection string', process.env['DATABASE_URL'])
  .action(async (options: { print?: boolean; rls: boolean; databaseUrl?: string }) => {
    if (options.print === true) {
      console.log(getMigrationSQL({ includeRls: options.rls }));
      return;
    }

    const result = await runMigrations({
      ...(options.databaseUrl !== undefined ? { connectionString: options.databaseUrl } : {}),
      includeRls: options.rls,
      logger,
    });

    if (!result.success) {
      console.error('[ERROR] Migration failed:');
      for (const err of result.errors) {
        console.error(`  - ${err}`);
      }
      process.exit(1);
    }

    console.error('=== Migration Summary ===');
    console.error(`Tables created:   ${result.tablesCreated ? '✓' : '✗'}`);
    console.error(`Indexes created:  ${result.indexesCreated ? '✓' : '✗'}`);
    console.error(`RLS enabled:      ${result.rlsEnabled ? '✓' : 'skipped'}`);
  });

program.parseAsync().catch(fail);
