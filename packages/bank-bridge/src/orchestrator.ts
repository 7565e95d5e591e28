/**
 * Account sync across all active users.
 *
 * Users are processed concurrently up to a limit; accounts of one user run
 * sequentially because they share the user's credential budget. A failing user or
 * account is recorded in the summary and never stops the others.
 */

import {
  CredentialError,
  FatalInputError,
  JarsyncError,
  StoreReadError,
  StoreWriteError,
  createLogger,
  mapWithConcurrency,
  toErrorDetail,
  withTimeout,
  type Account,
  type AccountStore,
  type ActiveUser,
  type ErrorDetail,
  type Logger,
  type UserDirectory,
} from '@jarsync/types';
import type { BankingClient } from './client.js';
import { mapAccount } from './mapper.js';
import { RateLimiterRegistry, systemClock, withRetry, type Clock, type RetryOptions } from './retry.js';
import type { SyncResult, TransactionSyncEngine } from './transaction-sync.js';

export type SyncStatus = 'succeeded' | 'failed';

export interface AccountSyncOutcome {
  accountId: string;
  status: SyncStatus;
  result: SyncResult | null;
  error: ErrorDetail | null;
}

export interface UserSyncOutcome {
  userId: string;
  status: SyncStatus;
  /** Account records upserted for the user. */
  accountsSynced: number;
  accounts: AccountSyncOutcome[];
  error: ErrorDetail | null;
  durationMs: number;
}

export interface SyncSummary {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  usersTotal: number;
  usersSucceeded: number;
  usersFailed: number;
  accountsSynced: number;
  accountsSucceeded: number;
  accountsFailed: number;
  transactionsUpserted: number;
  users: UserSyncOutcome[];
}

export interface SyncOrchestratorOptions {
  userConcurrency: number;
  /** Run the transaction sync for each account after the account upsert. */
  syncTransactions: boolean;
  storeTimeoutMs: number;
  minRequestIntervalMs: number;
}

const DEFAULT_ORCHESTRATOR_OPTIONS: SyncOrchestratorOptions = {
  userConcurrency: 4,
  syncTransactions: true,
  storeTimeoutMs: 15_000,
  minRequestIntervalMs: 60_000,
};

export interface SyncOrchestratorDeps {
  users: UserDirectory;
  bank: BankingClient;
  accounts: AccountStore;
  transactionSync: TransactionSyncEngine;
  limiters?: RateLimiterRegistry;
  retry?: RetryOptions;
  storeRetry?: RetryOptions;
  options?: Partial<SyncOrchestratorOptions>;
  clock?: Clock;
  logger?: Logger;
}

export class SyncOrchestrator {
  private readonly users: UserDirectory;
  private readonly bank: BankingClient;
  private readonly accounts: AccountStore;
  private readonly transactionSync: TransactionSyncEngine;
  private readonly options: SyncOrchestratorOptions;
  private readonly clock: Clock;
  private readonly limiters: RateLimiterRegistry;
  private readonly retry: RetryOptions;
  private readonly storeRetry: RetryOptions;
  private readonly logger: Logger;

  constructor(deps: SyncOrchestratorDeps) {
    this.users = deps.users;
    this.bank = deps.bank;
    this.accounts = deps.accounts;
    this.transactionSync = deps.transactionSync;
    this.options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...deps.options };
    this.clock = deps.clock ?? systemClock;
    this.limiters = deps.limiters ?? new RateLimiterRegistry(this.options.minRequestIntervalMs, this.clock);
    this.retry = { sleep: (ms) => this.clock.sleep(ms), ...deps.retry };
    this.storeRetry = { sleep: (ms) => this.clock.sleep(ms), ...deps.storeRetry };
    this.logger = deps.logger ?? createLogger('sync-orchestrator');
  }

  /**
   * Sync accounts (and, unless disabled, transactions) for every active user.
   * Throws only when the user directory cannot be read.
   */
  async runAccountSync(): Promise<SyncSummary> {
    const startedMs = this.clock.now();

    let users: ActiveUser[];
    try {
      users = await this.users.listActiveUsers();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ err: message }, 'Cannot list active users');
      throw new FatalInputError(`Cannot list active users: ${message}`, error);
    }

    const active = users.filter((user) => user.active);
    this.logger.info({ users: active.length, concurrency: this.options.userConcurrency }, 'Starting account sync');

    const outcomes = await mapWithConcurrency(active, this.options.userConcurrency, (user) => this.syncUser(user));

    const finishedMs = this.clock.now();
    const summary = summarize(outcomes, startedMs, finishedMs);
    this.logger.info(
      {
        usersTotal: summary.usersTotal,
        usersFailed: summary.usersFailed,
        accountsSynced: summary.accountsSynced,
        accountsFailed: summary.accountsFailed,
        transactionsUpserted: summary.transactionsUpserted,
        durationMs: summary.durationMs,
      },
      'Account sync complete'
    );
    return summary;
  }

  /**
   * Sync one user. Never throws: every failure ends up in the outcome.
   */
  async syncUser(user: ActiveUser): Promise<UserSyncOutcome> {
    const startedMs = this.clock.now();
    const log = this.logger.child({ userId: user.id });
    const outcome: UserSyncOutcome = {
      userId: user.id,
      status: 'succeeded',
      accountsSynced: 0,
      accounts: [],
      error: null,
      durationMs: 0,
    };

    let synced: Account[];
    try {
      synced = await this.upsertUserAccounts(user, log);
      outcome.accountsSynced = synced.length;
    } catch (error) {
      outcome.status = 'failed';
      outcome.error = toErrorDetail(error);
      outcome.durationMs = this.clock.now() - startedMs;
      log.error({ kind: outcome.error.kind, err: outcome.error.message }, 'Account sync failed for user');
      return outcome;
    }

    if (this.options.syncTransactions) {
      for (const account of synced) {
        outcome.accounts.push(await this.syncAccount(user, account, log));
      }
      const firstFailure = outcome.accounts.find((a) => a.status === 'failed');
      if (firstFailure !== undefined && outcome.accounts.every((a) => a.status === 'failed')) {
        outcome.status = 'failed';
        outcome.error = firstFailure.error;
      }
    }

    outcome.durationMs = this.clock.now() - startedMs;
    log.info(
      { accounts: outcome.accountsSynced, failedAccounts: outcome.accounts.filter((a) => a.status === 'failed').length },
      'User sync complete'
    );
    return outcome;
  }

  private async upsertUserAccounts(user: ActiveUser, log: Logger): Promise<Account[]> {
    if (user.credential.trim() === '') {
      throw new CredentialError('User has no provider credential');
    }

    const limiter = this.limiters.forCredential(user.credential);
    const providerAccounts = await withRetry(
      async () => {
        await limiter.acquire();
        return this.bank.listAccounts(user.credential);
      },
      {
        ...this.retry,
        onRetry: (attempt, error, delayMs) => {
          log.warn({ attempt, delayMs, err: error.message }, 'Account listing failed, retrying');
          this.retry.onRetry?.(attempt, error, delayMs);
        },
      }
    );

    if (providerAccounts.length === 0) {
      log.info('No accounts returned by provider');
      return [];
    }

    const stored = await this.storeCall(
      'read accounts',
      () => this.accounts.getAccounts(user.id),
      (message, cause) => new StoreReadError(message, cause)
    );
    const existingById = new Map(stored.map((account) => [account.id, account]));

    const mapped = providerAccounts.map((provider) =>
      mapAccount(user.id, provider, existingById.get(provider.id) ?? null)
    );

    await withRetry(
      () =>
        this.storeCall(
          'upsert accounts',
          () => this.accounts.batchUpsertAccounts(user.id, mapped),
          (message, cause) => new StoreWriteError(message, cause)
        ),
      this.storeRetry
    );

    log.debug({ cards: mapped.filter((a) => a.type === 'card').length, jars: mapped.filter((a) => a.type === 'jar').length }, 'Accounts upserted');
    return mapped;
  }

  private async syncAccount(user: ActiveUser, account: Account, log: Logger): Promise<AccountSyncOutcome> {
    try {
      const result = await this.transactionSync.syncAccountTransactions({
        userId: user.id,
        accountId: account.id,
        credential: user.credential,
        currency: account.currency,
      });
      return { accountId: account.id, status: 'succeeded', result, error: null };
    } catch (error) {
      const detail = toErrorDetail(error);
      log.error({ accountId: account.id, kind: detail.kind, err: detail.message }, 'Transaction sync failed for account');
      return { accountId: account.id, status: 'failed', result: null, error: detail };
    }
  }

  private async storeCall<T>(
    operation: string,
    fn: () => Promise<T>,
    wrap: (message: string, cause: unknown) => JarsyncError
  ): Promise<T> {
    try {
      return await withTimeout(fn(), this.options.storeTimeoutMs, () =>
        wrap(`${operation} timed out after ${this.options.storeTimeoutMs}ms`, undefined)
      );
    } catch (error) {
      if (error instanceof JarsyncError) throw error;
      throw wrap(`${operation} failed: ${error instanceof Error ? error.message : String(error)}`, error);
    }
  }
}

function summarize(outcomes: UserSyncOutcome[], startedMs: number, finishedMs: number): SyncSummary {
  let accountsSucceeded = 0;
  let accountsFailed = 0;
  let transactionsUpserted = 0;
  for (const user of outcomes) {
    for (const account of user.accounts) {
      if (account.status === 'succeeded') {
        accountsSucceeded++;
        transactionsUpserted += account.result?.upserted ?? 0;
      } else {
        accountsFailed++;
      }
    }
  }

  return {
    startedAt: new Date(startedMs).toISOString(),
    finishedAt: new Date(finishedMs).toISOString(),
    durationMs: finishedMs - startedMs,
    usersTotal: outcomes.length,
    usersSucceeded: outcomes.filter((o) => o.status === 'succeeded').length,
    usersFailed: outcomes.filter((o) => o.status === 'failed').length,
    accountsSynced: outcomes.reduce((sum, o) => sum + o.accountsSynced, 0),
    accountsSucceeded,
    accountsFailed,
    transactionsUpserted,
    users: outcomes,
  };
}
