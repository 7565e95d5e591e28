/**
 * Wires the sync components with one shared per-credential limiter registry.
 */

import type { AccountStore, Logger, TransactionStore, UserDirectory, WatermarkStore } from '@jarsync/types';
import { MonobankClient, type BankingClient } from './client.js';
import { getSyncConfig, type SyncConfig } from './config.js';
import { SyncOrchestrator } from './orchestrator.js';
import { RateLimiterRegistry, systemClock, type Clock, type RetryOptions } from './retry.js';
import { TransactionSyncEngine, type SyncProgressEvent } from './transaction-sync.js';

export interface SyncPipelineDeps {
  users: UserDirectory;
  accounts: AccountStore;
  transactions: TransactionStore;
  watermarks: WatermarkStore;
  /** Defaults to the HTTP client built from `config`. */
  bank?: BankingClient;
  config?: Partial<SyncConfig>;
  syncTransactions?: boolean;
  clock?: Clock;
  logger?: Logger;
  onProgress?: (event: SyncProgressEvent) => void;
}

export interface SyncPipeline {
  config: SyncConfig;
  limiters: RateLimiterRegistry;
  engine: TransactionSyncEngine;
  orchestrator: SyncOrchestrator;
}

export function createSyncPipeline(deps: SyncPipelineDeps): SyncPipeline {
  const config = getSyncConfig(deps.config);
  const clock = deps.clock ?? systemClock;
  const bank = deps.bank ?? new MonobankClient({ baseUrl: config.bankApiUrl, timeoutMs: config.bankTimeoutMs });
  const limiters = new RateLimiterRegistry(config.minRequestIntervalMs, clock);
  const retry: RetryOptions = {
    maxAttempts: config.maxAttempts,
    initialDelayMs: config.initialBackoffMs,
    maxDelayMs: config.maxBackoffMs,
  };
  const childLogger = (component: string): Logger | undefined => deps.logger?.child({ component });

  const engine = new TransactionSyncEngine({
    bank,
    transactions: deps.transactions,
    watermarks: deps.watermarks,
    accounts: deps.accounts,
    limiters,
    retry,
    storeRetry: retry,
    options: {
      lookbackDays: config.lookbackDays,
      overlapSeconds: config.overlapSeconds,
      storeTimeoutMs: config.storeTimeoutMs,
      minRequestIntervalMs: config.minRequestIntervalMs,
    },
    clock,
    logger: childLogger('transaction-sync'),
    onProgress: deps.onProgress,
  });

  const orchestrator = new SyncOrchestrator({
    users: deps.users,
    bank,
    accounts: deps.accounts,
    transactionSync: engine,
    limiters,
    retry,
    storeRetry: retry,
    options: {
      userConcurrency: config.userConcurrency,
      storeTimeoutMs: config.storeTimeoutMs,
      minRequestIntervalMs: config.minRequestIntervalMs,
      ...(deps.syncTransactions !== undefined ? { syncTransactions: deps.syncTransactions } : {}),
    },
    clock,
    logger: childLogger('sync-orchestrator'),
  });

  return { config, limiters, engine, orchestrator };
}
