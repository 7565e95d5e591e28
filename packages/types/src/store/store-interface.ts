/**
 * Gateway interfaces for the per-user document store.
 * Kept in @jarsync/types so the bridge, the coverage engine and the Supabase
 * implementations can depend on them without depending on each other.
 */

import type { Account, ActiveUser } from '../schemas/account.js';
import type { Transaction } from '../schemas/transaction.js';

export interface UpsertResult {
  inserted: number;
  updated: number;
  ids: string[];
}

export interface UserDirectory {
  /** Users flagged active. The set is enumerated once per sync run. */
  listActiveUsers(): Promise<ActiveUser[]>;
}

export interface AccountStore {
  getAccounts(userId: string): Promise<Account[]>;
  getAccount(userId: string, accountId: string): Promise<Account | null>;
  /** Upsert keyed by account id; re-upserting an id replaces that record. */
  batchUpsertAccounts(userId: string, accounts: Account[]): Promise<UpsertResult>;
}

export interface TransactionStore {
  getTransaction(userId: string, accountId: string, transactionId: string): Promise<Transaction | null>;
  /** Upsert keyed by transaction id; idempotent per id, atomic per call. */
  batchUpsertTransactions(userId: string, accountId: string, transactions: Transaction[]): Promise<UpsertResult>;
  /** Transactions across all of the user's accounts with `fromTime <= time <= toTime`. */
  listTransactionsInRange(userId: string, fromTime: number, toTime: number): Promise<Transaction[]>;
}

export interface WatermarkStore {
  getWatermark(userId: string, accountId: string): Promise<number | null>;
  setWatermark(userId: string, accountId: string, time: number): Promise<void>;
}
