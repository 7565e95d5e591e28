/**
 * @jarsync/store: Supabase persistence layer.
 */

// Client
export {
  createSupabaseClient,
  getSupabaseConfig,
  type SupabaseConfig,
  type SupabaseClientOptions,
  type SupabaseClient,
} from './client.js';

// Gateways
export {
  SupabaseUserDirectory,
  SupabaseAccountStore,
  SupabaseTransactionStore,
  SupabaseWatermarkStore,
  SupabaseReportCache,
  TABLES,
} from './gateways.js';

// Row mapping
export {
  accountToRow,
  rowToAccount,
  transactionToRow,
  rowToTransaction,
  rowToUser,
  type AccountRow,
  type TransactionRow,
  type UserRow,
} from './rows.js';

// Migrations
export {
  checkExistingTables,
  needsMigration,
  getMigrationSQL,
  runMigrations,
  REQUIRED_TABLES,
  type MigrationConfig,
  type MigrationConnection,
  type MigrationResult,
} from './migrations.js';
