/**
 * In-memory gateways for development and testing.
 * Records are cloned on the way in and out so callers never share references
 * with the store.
 */

/* eslint-disable @typescript-eslint/require-await */

import type {
  Account,
  AccountStore,
  ActiveUser,
  Transaction,
  TransactionStore,
  UpsertResult,
  UserDirectory,
  WatermarkStore,
} from '@jarsync/types';

export class InMemoryUserDirectory implements UserDirectory {
  private users: Map<string, ActiveUser> = new Map();

  constructor(users: ActiveUser[] = []) {
    for (const user of users) {
      this.saveUser(user);
    }
  }

  async listActiveUsers(): Promise<ActiveUser[]> {
    return [...this.users.values()].filter((user) => user.active).map((user) => ({ ...user }));
  }

  saveUser(user: ActiveUser): void {
    this.users.set(user.id, { ...user });
  }

  clear(): void {
    this.users.clear();
  }
}

export class InMemoryAccountStore implements AccountStore {
  private accounts: Map<string, Map<string, Account>> = new Map();

  async getAccounts(userId: string): Promise<Account[]> {
    return [...(this.accounts.get(userId)?.values() ?? [])].map((account) => structuredClone(account));
  }

  async getAccount(userId: string, accountId: string): Promise<Account | null> {
    const account = this.accounts.get(userId)?.get(accountId);
    return account === undefined ? null : structuredClone(account);
  }

  async batchUpsertAccounts(userId: string, accounts: Account[]): Promise<UpsertResult> {
    const byId = this.userAccounts(userId);
    const result: UpsertResult = { inserted: 0, updated: 0, ids: [] };
    for (const account of accounts) {
      if (byId.has(account.id)) {
        result.updated++;
      } else {
        result.inserted++;
      }
      byId.set(account.id, structuredClone({ ...account, userId }));
      result.ids.push(account.id);
    }
    return result;
  }

  clear(): void {
    this.accounts.clear();
  }

  private userAccounts(userId: string): Map<string, Account> {
    let byId = this.accounts.get(userId);
    if (byId === undefined) {
      byId = new Map();
      this.accounts.set(userId, byId);
    }
    return byId;
  }
}

function transactionKey(accountId: string, transactionId: string): string {
  return `${accountId}/${transactionId}`;
}

function watermarkKey(userId: string, accountId: string): string {
  return `${userId}/${accountId}`;
}

export class InMemoryTransactionStore implements TransactionStore, WatermarkStore {
  private transactions: Map<string, Map<string, Transaction>> = new Map();
  private watermarks: Map<string, number> = new Map();

  async getTransaction(userId: string, accountId: string, transactionId: string): Promise<Transaction | null> {
    const tx = this.transactions.get(userId)?.get(transactionKey(accountId, transactionId));
    return tx === undefined ? null : structuredClone(tx);
  }

  async batchUpsertTransactions(
    userId: string,
    accountId: string,
    transactions: Transaction[]
  ): Promise<UpsertResult> {
    let byKey = this.transactions.get(userId);
    if (byKey === undefined) {
      byKey = new Map();
      this.transactions.set(userId, byKey);
    }
    const result: UpsertResult = { inserted: 0, updated: 0, ids: [] };
    for (const tx of transactions) {
      const key = transactionKey(accountId, tx.id);
      if (byKey.has(key)) {
        result.updated++;
      } else {
        result.inserted++;
      }
      byKey.set(key, structuredClone({ ...tx, userId, accountId }));
      result.ids.push(tx.id);
    }
    return result;
  }

  async listTransactionsInRange(userId: string, fromTime: number, toTime: number): Promise<Transaction[]> {
    return [...(this.transactions.get(userId)?.values() ?? [])]
      .filter((tx) => tx.time >= fromTime && tx.time <= toTime)
      .sort((a, b) => a.time - b.time || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map((tx) => structuredClone(tx));
  }

  async getWatermark(userId: string, accountId: string): Promise<number | null> {
    return this.watermarks.get(watermarkKey(userId, accountId)) ?? null;
  }

  async setWatermark(userId: string, accountId: string, time: number): Promise<void> {
    this.watermarks.set(watermarkKey(userId, accountId), time);
  }

  /** Number of stored transactions for a user, across accounts. */
  count(userId: string): number {
    return this.transactions.get(userId)?.size ?? 0;
  }

  clear(): void {
    this.transactions.clear();
    this.watermarks.clear();
  }
}
