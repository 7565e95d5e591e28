/**
 * Supabase-backed gateways for production use.
 *
 * All rows are scoped by `user_id`. Upserts are keyed by the table's primary
 * key, so re-sending a record replaces it instead of duplicating it.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import {
  StoreReadError,
  StoreWriteError,
  validateReport,
  type Account,
  type AccountStore,
  type ActiveUser,
  type DailyReport,
  type Transaction,
  type TransactionStore,
  type UpsertResult,
  type UserDirectory,
  type WatermarkStore,
} from '@jarsync/types';
import { z } from 'zod';
import {
  AccountRowSchema,
  TransactionRowSchema,
  UserRowSchema,
  WatermarkRowSchema,
  accountToRow,
  parseRows,
  rowToAccount,
  rowToTransaction,
  rowToUser,
  transactionToRow,
} from './rows.js';

export const TABLES = {
  users: 'users',
  accounts: 'accounts',
  transactions: 'transactions',
  watermarks: 'sync_watermarks',
  reportCache: 'daily_report_cache',
} as const;

/** PostgREST caps a response at 1000 rows by default. */
const PAGE_SIZE = 1000;

interface PostgrestErrorLike {
  message: string;
  code?: string;
}

function readFailure(what: string, error: PostgrestErrorLike | Error): StoreReadError {
  return new StoreReadError(`Failed to ${what}: ${error.message}`, error);
}

function writeFailure(what: string, error: PostgrestErrorLike | Error): StoreWriteError {
  return new StoreWriteError(`Failed to ${what}: ${error.message}`, error);
}

function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  table: string,
  what: string
): z.output<T>[] {
  try {
    return parseRows(schema, data, table);
  } catch (error) {
    throw readFailure(what, error instanceof Error ? error : new Error(String(error)));
  }
}

export class SupabaseUserDirectory implements UserDirectory {
  constructor(private client: SupabaseClient, private tableName: string = TABLES.users) {}

  async listActiveUsers(): Promise<ActiveUser[]> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select('id, active, bank_token')
      .eq('active', true)
      .order('id', { ascending: true });

    if (error !== null) {
      throw readFailure('list active users', error);
    }
    return parseOrThrow(UserRowSchema, data, this.tableName, 'list active users').map(rowToUser);
  }
}

export class SupabaseAccountStore implements AccountStore {
  constructor(private client: SupabaseClient, private tableName: string = TABLES.accounts) {}

  async getAccounts(userId: string): Promise<Account[]> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select('*')
      .eq('user_id', userId)
      .order('id', { ascending: true });

    if (error !== null) {
      throw readFailure('read accounts', error);
    }
    return parseOrThrow(AccountRowSchema, data, this.tableName, 'read accounts').map(rowToAccount);
  }

  async getAccount(userId: string, accountId: string): Promise<Account | null> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select('*')
      .eq('user_id', userId)
      .eq('id', accountId)
      .maybeSingle();

    if (error !== null) {
      throw readFailure('read account', error);
    }
    if (data === null) {
      return null;
    }
    const [row] = parseOrThrow(AccountRowSchema, [data], this.tableName, 'read account');
    return row === undefined ? null : rowToAccount(row);
  }

  async batchUpsertAccounts(userId: string, accounts: Account[]): Promise<UpsertResult> {
    if (accounts.length === 0) {
      return { inserted: 0, updated: 0, ids: [] };
    }
    const ids = accounts.map((account) => account.id);
    const existing = await existingIds(this.client, this.tableName, { user_id: userId }, ids);

    const rows = accounts.map((account) => ({
      ...accountToRow({ ...account, userId }),
      updated_at: new Date().toISOString(),
    }));
    const { error } = await this.client.from(this.tableName).upsert(rows, { onConflict: 'user_id,id' });
    if (error !== null) {
      throw writeFailure('upsert accounts', error);
    }

    const updated = ids.filter((id) => existing.has(id)).length;
    return { inserted: ids.length - updated, updated, ids };
  }
}

export class SupabaseTransactionStore implements TransactionStore {
  constructor(private client: SupabaseClient, private tableName: string = TABLES.transactions) {}

  async getTransaction(userId: string, accountId: string, transactionId: string): Promise<Transaction | null> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select('*')
      .eq('user_id', userId)
      .eq('account_id', accountId)
      .eq('id', transactionId)
      .maybeSingle();

    if (error !== null) {
      throw readFailure('read transaction', error);
    }
    if (data === null) {
      return null;
    }
    const [row] = parseOrThrow(TransactionRowSchema, [data], this.tableName, 'read transaction');
    return row === undefined ? null : rowToTransaction(row);
  }

  async batchUpsertTransactions(
    userId: string,
    accountId: string,
    transactions: Transaction[]
  ): Promise<UpsertResult> {
    if (transactions.length === 0) {
      return { inserted: 0, updated: 0, ids: [] };
    }
    const ids = transactions.map((tx) => tx.id);
    const existing = await existingIds(this.client, this.tableName, { user_id: userId, account_id: accountId }, ids);

    const rows = transactions.map((tx) => ({
      ...transactionToRow({ ...tx, userId, accountId }),
      updated_at: new Date().toISOString(),
    }));
    const { error } = await this.client
      .from(this.tableName)
      .upsert(rows, { onConflict: 'user_id,account_id,id' });
    if (error !== null) {
      throw writeFailure('upsert transactions', error);
    }

    const updated = ids.filter((id) => existing.has(id)).length;
    return { inserted: ids.length - updated, updated, ids };
  }

  async listTransactionsInRange(userId: string, fromTime: number, toTime: number): Promise<Transaction[]> {
    const result: Transaction[] = [];
    for (let offset = 0; ; offset += PAGE_SIZE) {
      const { data, error } = await this.client
        .from(this.tableName)
        .select('*')
        .eq('user_id', userId)
        .gte('time', fromTime)
        .lte('time', toTime)
        .order('time', { ascending: true })
        .order('id', { ascending: true })
        .range(offset, offset + PAGE_SIZE - 1);

      if (error !== null) {
        throw readFailure('list transactions', error);
      }
      const rows = parseOrThrow(TransactionRowSchema, data, this.tableName, 'list transactions');
      result.push(...rows.map(rowToTransaction));
      if (rows.length < PAGE_SIZE) {
        return result;
      }
    }
  }
}

export class SupabaseWatermarkStore implements WatermarkStore {
  constructor(private client: SupabaseClient, private tableName: string = TABLES.watermarks) {}

  async getWatermark(userId: string, accountId: string): Promise<number | null> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select('last_synced_time')
      .eq('user_id', userId)
      .eq('account_id', accountId)
      .maybeSingle();

    if (error !== null) {
      throw readFailure('read watermark', error);
    }
    if (data === null) {
      return null;
    }
    const [row] = parseOrThrow(WatermarkRowSchema, [data], this.tableName, 'read watermark');
    return row?.last_synced_time ?? null;
  }

  async setWatermark(userId: string, accountId: string, time: number): Promise<void> {
    const { error } = await this.client.from(this.tableName).upsert(
      {
        user_id: userId,
        account_id: accountId,
        last_synced_time: time,
        updated_at: new Date().toISOString(),
      },
      { onConflict: 'user_id,account_id' }
    );
    if (error !== null) {
      throw writeFailure('advance watermark', error);
    }
  }
}

const ReportCacheRowSchema = z.object({
  transaction_set_hash: z.string(),
  report: z.unknown(),
});

/**
 * Report cache table. Structurally identical to the in-memory cache in
 * @jarsync/coverage, so it plugs into the coverage engine directly.
 */
export class SupabaseReportCache {
  constructor(private client: SupabaseClient, private tableName: string = TABLES.reportCache) {}

  async get(key: { userId: string; date: string; timezone: string }): Promise<DailyReport | null> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select('transaction_set_hash, report')
      .eq('user_id', key.userId)
      .eq('date', key.date)
      .eq('timezone', key.timezone)
      .maybeSingle();

    if (error !== null) {
      throw readFailure('read report cache', error);
    }
    if (data === null) {
      return null;
    }
    const [row] = parseOrThrow(ReportCacheRowSchema, [data], this.tableName, 'read report cache');
    const report: unknown = row?.report;
    return isDailyReport(report) ? report : null;
  }

  async set(key: { userId: string; date: string; timezone: string }, report: DailyReport): Promise<void> {
    const { error } = await this.client.from(this.tableName).upsert(
      {
        user_id: key.userId,
        date: key.date,
        timezone: key.timezone,
        transaction_set_hash: report.transactionSetHash,
        report,
        updated_at: new Date().toISOString(),
      },
      { onConflict: 'user_id,date,timezone' }
    );
    if (error !== null) {
      throw writeFailure('write report cache', error);
    }
  }
}

function isDailyReport(value: unknown): value is DailyReport {
  return validateReport(value).valid;
}

/**
 * Ids from `ids` that already have a row matching `scope`.
 */
async function existingIds(
  client: SupabaseClient,
  table: string,
  scope: Record<string, string>,
  ids: string[]
): Promise<Set<string>> {
  let query = client.from(table).select('id').in('id', ids);
  for (const [column, value] of Object.entries(scope)) {
    query = query.eq(column, value);
  }
  const { data, error } = await query;
  if (error !== null) {
    throw writeFailure(`check existing ${table} rows`, error);
  }
  const rows = parseOrThrow(z.object({ id: z.string() }), data, table, `check existing ${table} rows`);
  return new Set(rows.map((row) => row.id));
}
