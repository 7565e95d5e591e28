/**
 * Database schema and migrations for the Supabase tables.
 * Tables are created if they don't exist, over a direct PostgreSQL connection.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import pg from 'pg';
import { createLogger, type Logger } from '@jarsync/types';
import { TABLES } from './gateways.js';

/**
 * SQL schema for all tables. Amounts are integer minor units (bigint); times are
 * unix seconds.
 */
const SCHEMA_SQL = `
create table if not exists users (
  id text primary key,
  active boolean not null default true,
  bank_token text,
  created_at timestamptz not null default now()
);

create table if not exists accounts (
  user_id text not null references users(id) on delete cascade,
  id text not null,
  type text not null check (type in ('jar','card')),
  send_id text,
  currency jsonb not null,
  balance bigint not null default 0,
  is_active boolean not null default true,
  title text,
  goal bigint,
  credit_limit bigint,
  masked_pan jsonb not null default '[]'::jsonb,
  iban text,
  is_budget boolean not null default false,
  invested bigint not null default 0,
  updated_at timestamptz not null default now(),
  primary key (user_id, id)
);

create table if not exists transactions (
  user_id text not null,
  account_id text not null,
  id text not null,
  time bigint not null,
  description text not null default '',
  amount bigint not null,
  operation_amount bigint not null,
  operation_currency_code int,
  balance bigint not null,
  hold boolean not null default false,
  currency jsonb not null,
  mcc_code int,
  original_mcc int,
  comment text,
  commission_rate bigint not null default 0,
  cashback_amount bigint not null default 0,
  updated_at timestamptz not null default now(),
  primary key (user_id, account_id, id),
  foreign key (user_id, account_id) references accounts(user_id, id) on delete cascade
);

create table if not exists sync_watermarks (
  user_id text not null,
  account_id text not null,
  last_synced_time bigint not null,
  updated_at timestamptz not null default now(),
  primary key (user_id, account_id)
);

create table if not exists daily_report_cache (
  user_id text not null,
  date date not null,
  timezone text not null,
  transaction_set_hash text not null,
  report jsonb not null,
  updated_at timestamptz not null default now(),
  primary key (user_id, date, timezone)
);
`;

/**
 * SQL for indexes.
 */
const INDEXES_SQL = `
create index if not exists idx_transactions_user_time on transactions(user_id, time);
create index if not exists idx_transactions_user_account_time on transactions(user_id, account_id, time);
create index if not exists idx_users_active on users(active) where active;
`;

/**
 * SQL for RLS policies. The sync job uses the service role and bypasses them.
 */
const RLS_SQL = `
alter table users enable row level security;
alter table accounts enable row level security;
alter table transactions enable row level security;
alter table sync_watermarks enable row level security;
alter table daily_report_cache enable row level security;

drop policy if exists "select_own_accounts" on accounts;
drop policy if exists "update_own_accounts" on accounts;
drop policy if exists "select_own_transactions" on transactions;
drop policy if exists "select_own_report_cache" on daily_report_cache;

create policy "select_own_accounts" on accounts for select using (user_id = auth.uid()::text);
create policy "update_own_accounts" on accounts for update using (user_id = auth.uid()::text) with check (user_id = auth.uid()::text);
create policy "select_own_transactions" on transactions for select using (user_id = auth.uid()::text);
create policy "select_own_report_cache" on daily_report_cache for select using (user_id = auth.uid()::text);
`;

export const REQUIRED_TABLES: readonly string[] = Object.values(TABLES);

export interface MigrationResult {
  success: boolean;
  tablesCreated: boolean;
  indexesCreated: boolean;
  rlsEnabled: boolean;
  errors: string[];
}

/**
 * Check which tables already exist, through the REST API.
 */
export async function checkExistingTables(
  client: SupabaseClient
): Promise<{ existing: string[]; missing: string[] }> {
  const existing: string[] = [];
  const missing: string[] = [];

  for (const table of REQUIRED_TABLES) {
    const { error } = await client.from(table).select('*', { count: 'exact', head: true });
    if (error === null) {
      existing.push(table);
      continue;
    }
    const isTableMissing =
      error.message.includes('does not exist') ||
      error.code === '42P01' || // PostgreSQL: undefined_table
      error.code === 'PGRST205'; // PostgREST: table not in schema cache
    if (isTableMissing) {
      missing.push(table);
    } else {
      existing.push(table);
    }
  }

  return { existing, missing };
}

export async function needsMigration(client: SupabaseClient): Promise<boolean> {
  const { missing } = await checkExistingTables(client);
  return missing.length > 0;
}

/**
 * Get the full migration SQL for manual execution.
 */
export function getMigrationSQL(options: { includeRls?: boolean } = {}): string {
  const { includeRls = true } = options;

  let sql = '-- jarsync database schema\n';
  sql += '-- Run this SQL in Supabase Dashboard > SQL Editor, or with `jarsync migrate`\n\n';
  sql += '-- STEP 1: Create Tables\n';
  sql += SCHEMA_SQL;
  sql += '\n-- STEP 2: Create Indexes\n';
  sql += INDEXES_SQL;

  if (includeRls) {
    sql += '\n-- STEP 3: Enable Row Level Security\n';
    sql += RLS_SQL;
  }

  return sql;
}

/** The subset of `pg.Client` the migration runner uses. */
export interface MigrationConnection {
  connect(): Promise<unknown>;
  query(sql: string): Promise<unknown>;
  end(): Promise<void>;
}

export interface MigrationConfig {
  /** postgresql:// connection string (DATABASE_URL). */
  connectionString?: string;
  includeRls?: boolean;
  /** Defaults to a `pg.Client` on `connectionString`. */
  connect?: () => MigrationConnection;
  logger?: Logger;
}

/**
 * Run migrations over a direct PostgreSQL connection. Statements are idempotent,
 * so running them against an up-to-date database is a no-op.
 */
export async function runMigrations(config: MigrationConfig = {}): Promise<MigrationResult> {
  const { includeRls = true } = config;
  const logger = config.logger ?? createLogger('migrations');
  const result: MigrationResult = {
    success: false,
    tablesCreated: false,
    indexesCreated: false,
    rlsEnabled: false,
    errors: [],
  };

  const connectionString = config.connectionString ?? process.env['DATABASE_URL'];
  if (config.connect === undefined && (connectionString === undefined || connectionString === '')) {
    result.errors.push('Database connection string is required. Set DATABASE_URL or pass connectionString.');
    return result;
  }

  const client: MigrationConnection =
    config.connect !== undefined
      ? config.connect()
      : new pg.Client({ connectionString, ssl: { rejectUnauthorized: false } });

  let connected = false;
  try {
    await client.connect();
    connected = true;

    await client.query(SCHEMA_SQL);
    result.tablesCreated = true;
    logger.info('Tables created');

    await client.query(INDEXES_SQL);
    result.indexesCreated = true;
    logger.info('Indexes created');

    if (includeRls) {
      await client.query(RLS_SQL);
      result.rlsEnabled = true;
      logger.info('RLS policies enabled');
    }

    result.success = true;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    result.errors.push(message);
    if (message.includes('password authentication failed')) {
      result.errors.push('Hint: Check the password in DATABASE_URL');
    } else if (message.includes('ENOTFOUND') || message.includes('getaddrinfo')) {
      result.errors.push('Hint: Check the host in DATABASE_URL');
    }
    logger.error({ err: message }, 'Migration failed');
  } finally {
    if (connected) {
      await client.end();
    }
  }

  return result;
}
