/**
 * Command implementations, kept apart from the commander wiring so they can run
 * against any set of gateways.
 */

import {
  createSyncPipeline,
  type BankingClient,
  type SyncConfig,
  type SyncResult,
  type SyncSummary,
} from '@jarsync/bank-bridge';
import { CoverageEngine, MarkdownReportRenderer, type ReportCache } from '@jarsync/coverage';
import {
  SupabaseAccountStore,
  SupabaseReportCache,
  SupabaseTransactionStore,
  SupabaseUserDirectory,
  SupabaseWatermarkStore,
  type SupabaseClient,
} from '@jarsync/store';
import {
  ValidationError,
  validateReportOrThrow,
  type AccountStore,
  type DailyReport,
  type Logger,
  type TransactionStore,
  type UserDirectory,
  type WatermarkStore,
} from '@jarsync/types';

export interface Gateways {
  users: UserDirectory;
  accounts: AccountStore;
  transactions: TransactionStore;
  watermarks: WatermarkStore;
  reportCache?: ReportCache;
}

export function createSupabaseGateways(client: SupabaseClient): Gateways {
  return {
    users: new SupabaseUserDirectory(client),
    accounts: new SupabaseAccountStore(client),
    transactions: new SupabaseTransactionStore(client),
    watermarks: new SupabaseWatermarkStore(client),
    reportCache: new SupabaseReportCache(client),
  };
}

export interface SyncCommandOptions {
  accountsOnly?: boolean;
  concurrency?: number;
  bank?: BankingClient;
  config?: Partial<SyncConfig>;
  logger?: Logger;
}

export async function runSyncCommand(gateways: Gateways, options: SyncCommandOptions = {}): Promise<SyncSummary> {
  const { orchestrator } = createSyncPipeline({
    ...gateways,
    bank: options.bank,
    config: {
      ...options.config,
      ...(options.concurrency !== undefined ? { userConcurrency: options.concurrency } : {}),
    },
    syncTransactions: options.accountsOnly !== true,
    logger: options.logger,
  });
  return orchestrator.runAccountSync();
}

export async function runSyncAccountCommand(
  gateways: Gateways,
  userId: string,
  accountId: string,
  options: Omit<SyncCommandOptions, 'accountsOnly' | 'concurrency'> = {}
): Promise<SyncResult> {
  const users = await gateways.users.listActiveUsers();
  const user = users.find((candidate) => candidate.id === userId);
  if (user === undefined) {
    throw new ValidationError(`No active user "${userId}"`);
  }
  const account = await gateways.accounts.getAccount(userId, accountId);
  if (account === null) {
    throw new ValidationError(`User "${userId}" has no account "${accountId}"; run \`jarsync sync --accounts-only\` first`);
  }

  const { engine } = createSyncPipeline({
    ...gateways,
    bank: options.bank,
    config: options.config,
    logger: options.logger,
  });
  return engine.syncAccountTransactions({
    userId,
    accountId,
    credential: user.credential,
    currency: account.currency,
  });
}

export const REPORT_FORMATS = ['markdown', 'json'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export function parseReportFormat(value: string): ReportFormat {
  const match = REPORT_FORMATS.find((format) => format === value);
  if (match === undefined) {
    throw new ValidationError(`Unknown report format "${value}". Use one of: ${REPORT_FORMATS.join(', ')}`);
  }
  return match;
}

export interface ReportCommandOptions {
  date?: string;
  timezone?: string;
  format?: ReportFormat;
  now?: () => number;
  logger?: Logger;
}

export interface ReportCommandOutput {
  report: DailyReport;
  output: string;
}

export async function runReportCommand(
  gateways: Gateways,
  userId: string,
  options: ReportCommandOptions = {}
): Promise<ReportCommandOutput> {
  const engine = new CoverageEngine({
    transactions: gateways.transactions,
    renderer: new MarkdownReportRenderer(),
    cache: gateways.reportCache,
    defaultTimezone: options.timezone,
    now: options.now,
    logger: options.logger,
  });
  const report = await engine.computeDailyCoverage(userId, options.date, options.timezone);

  if (options.format === 'json') {
    validateReportOrThrow(report);
    return { report, output: JSON.stringify(report, null, 2) };
  }
  return { report, output: report.renderedText ?? JSON.stringify(report, null, 2) };
}

export function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}
