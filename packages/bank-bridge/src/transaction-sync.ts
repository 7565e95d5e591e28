/**
 * Incremental transaction sync for one account.
 * Combines windowed statement fetching, per-credential pacing, retry, idempotent
 * upserts and watermark bookkeeping.
 */

import {
  DEFAULT_LOOKBACK_DAYS,
  JarsyncError,
  SECONDS_PER_DAY,
  STATEMENT_MAX_WINDOW_SECONDS,
  STATEMENT_PAGE_LIMIT,
  StoreReadError,
  StoreWriteError,
  createLogger,
  withTimeout,
  type AccountStore,
  type Currency,
  type Logger,
  type ProviderStatementItem,
  type Transaction,
  type TransactionStore,
  type UpsertResult,
  type WatermarkStore,
} from '@jarsync/types';
import type { BankingClient } from './client.js';
import { mapTransaction } from './mapper.js';
import { RateLimiterRegistry, systemClock, withRetry, type Clock, type RetryOptions } from './retry.js';

export interface TransactionSyncOptions {
  lookbackDays: number;
  overlapSeconds: number;
  maxWindowSeconds: number;
  pageLimit: number;
  storeTimeoutMs: number;
  minRequestIntervalMs: number;
}

const DEFAULT_SYNC_OPTIONS: TransactionSyncOptions = {
  lookbackDays: DEFAULT_LOOKBACK_DAYS,
  overlapSeconds: 0,
  maxWindowSeconds: STATEMENT_MAX_WINDOW_SECONDS,
  pageLimit: STATEMENT_PAGE_LIMIT,
  storeTimeoutMs: 15_000,
  minRequestIntervalMs: 60_000,
};

export interface TransactionSyncDeps {
  bank: BankingClient;
  transactions: TransactionStore;
  watermarks: WatermarkStore;
  /** Used to look up the account currency when the caller does not pass it. */
  accounts?: AccountStore;
  /** Shared with the orchestrator so account listing and statements use one budget per credential. */
  limiters?: RateLimiterRegistry;
  retry?: RetryOptions;
  storeRetry?: RetryOptions;
  options?: Partial<TransactionSyncOptions>;
  clock?: Clock;
  logger?: Logger;
  onProgress?: (event: SyncProgressEvent) => void;
}

export interface SyncAccountInput {
  userId: string;
  accountId: string;
  credential: string;
  currency?: Currency | null;
}

export type SyncPhase = 'fetching' | 'importing' | 'complete' | 'error';

export interface SyncProgressEvent {
  userId: string;
  accountId: string;
  phase: SyncPhase;
  window: { from: number; to: number } | null;
  fetched: number;
  upserted: number;
  error?: Error | undefined;
}

export interface SyncResult {
  userId: string;
  accountId: string;
  fetched: number;
  upserted: number;
  inserted: number;
  updated: number;
  duplicatesSkipped: number;
  windows: number;
  requests: number;
  watermarkBefore: number | null;
  watermarkAfter: number | null;
  durationMs: number;
}

export class TransactionSyncEngine {
  private readonly bank: BankingClient;
  private readonly transactions: TransactionStore;
  private readonly watermarks: WatermarkStore;
  private readonly accounts: AccountStore | undefined;
  private readonly options: TransactionSyncOptions;
  private readonly clock: Clock;
  private readonly limiters: RateLimiterRegistry;
  private readonly retry: RetryOptions;
  private readonly storeRetry: RetryOptions;
  private readonly logger: Logger;
  private readonly onProgress: ((event: SyncProgressEvent) => void) | undefined;

  constructor(deps: TransactionSyncDeps) {
    this.bank = deps.bank;
    this.transactions = deps.transactions;
    this.watermarks = deps.watermarks;
    this.accounts = deps.accounts;
    this.options = { ...DEFAULT_SYNC_OPTIONS, ...deps.options };
    this.clock = deps.clock ?? systemClock;
    this.limiters = deps.limiters ?? new RateLimiterRegistry(this.options.minRequestIntervalMs, this.clock);
    this.retry = { sleep: (ms) => this.clock.sleep(ms), ...deps.retry };
    this.storeRetry = { sleep: (ms) => this.clock.sleep(ms), ...deps.storeRetry };
    this.logger = deps.logger ?? createLogger('transaction-sync');
    this.onProgress = deps.onProgress;
  }

  /**
   * Fetch everything the account gained since its watermark and persist it.
   *
   * The watermark only moves forward and only after the window's items are stored,
   * so a failure part way leaves earlier windows committed and the rest to be
   * fetched again on the next run. It also stops at the oldest hold still pending,
   * so a later run sees that hold settle.
   */
  async syncAccountTransactions(input: SyncAccountInput): Promise<SyncResult> {
    const { userId, accountId, credential } = input;
    const startedMs = this.clock.now();
    const now = Math.floor(startedMs / 1000);
    const log = this.logger.child({ userId, accountId });
    const limiter = this.limiters.forCredential(credential);

    const watermarkBefore = await this.readStore('read watermark', () =>
      this.watermarks.getWatermark(userId, accountId)
    );
    const currency = input.currency ?? (await this.lookupCurrency(userId, accountId));

    const result: SyncResult = {
      userId,
      accountId,
      fetched: 0,
      upserted: 0,
      inserted: 0,
      updated: 0,
      duplicatesSkipped: 0,
      windows: 0,
      requests: 0,
      watermarkBefore,
      watermarkAfter: watermarkBefore,
      durationMs: 0,
    };

    const seen = new Set<string>();
    // Holds settle later; the watermark must stay at or below the oldest one seen.
    let oldestHoldTime: number | null = null;
    let from = startOfSync(watermarkBefore, now, this.options);

    log.info({ from, watermark: watermarkBefore }, 'Starting transaction sync');

    try {
      for (;;) {
        const windowEnd = Math.min(from + this.options.maxWindowSeconds, now);
        this.emitProgress(result, 'fetching', { from, to: windowEnd });

        let to = windowEnd;
        let windowMaxTime: number | null = null;

        for (;;) {
          const items = await withRetry(
            async () => {
              await limiter.acquire();
              result.requests++;
              return this.bank.listStatementItems(credential, accountId, from, to);
            },
            {
              ...this.retry,
              onRetry: (attempt, error, delayMs) => {
                log.warn({ attempt, delayMs, err: error.message }, 'Statement request failed, retrying');
                this.retry.onRetry?.(attempt, error, delayMs);
              },
            }
          );
          result.fetched += items.length;

          const fresh: Transaction[] = [];
          for (const item of items) {
            if (seen.has(item.id)) {
              result.duplicatesSkipped++;
              continue;
            }
            seen.add(item.id);
            fresh.push(mapTransaction(item, { userId, accountId, accountCurrency: currency }));
          }

          if (fresh.length > 0) {
            this.emitProgress(result, 'importing', { from, to });
            const upsert = await this.commitPage(userId, accountId, fresh);
            result.upserted += fresh.length;
            result.inserted += upsert.inserted;
            result.updated += upsert.updated;
          }

          for (const item of items) {
            windowMaxTime = windowMaxTime === null ? item.time : Math.max(windowMaxTime, item.time);
            if (item.hold) {
              oldestHoldTime = oldestHoldTime === null ? item.time : Math.min(oldestHoldTime, item.time);
            }
          }

          log.debug({ from, to, items: items.length, fresh: fresh.length }, 'Fetched statement page');

          const nextTo = nextPageEnd(items, this.options.pageLimit, from, to);
          if (nextTo === null) break;
          to = nextTo;
        }

        result.windows++;

        const advanceTo = watermarkCandidate(windowMaxTime, oldestHoldTime);
        if (advanceTo !== null && (result.watermarkAfter === null || advanceTo > result.watermarkAfter)) {
          await this.writeStore('advance watermark', () =>
            this.watermarks.setWatermark(userId, accountId, advanceTo)
          );
          result.watermarkAfter = advanceTo;
        }

        if (windowEnd >= now) break;
        from = windowEnd;
      }
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.emitProgress(result, 'error', null, err);
      log.error({ err: err.message, fetched: result.fetched, upserted: result.upserted }, 'Transaction sync failed');
      throw error;
    }

    result.durationMs = this.clock.now() - startedMs;
    this.emitProgress(result, 'complete', null);
    log.info(
      {
        fetched: result.fetched,
        upserted: result.upserted,
        duplicatesSkipped: result.duplicatesSkipped,
        windows: result.windows,
        watermark: result.watermarkAfter,
      },
      'Transaction sync complete'
    );
    return result;
  }

  private async lookupCurrency(userId: string, accountId: string): Promise<Currency | null> {
    const accounts = this.accounts;
    if (accounts === undefined) return null;
    const account = await this.readStore('read account', () => accounts.getAccount(userId, accountId));
    return account?.currency ?? null;
  }

  private commitPage(userId: string, accountId: string, transactions: Transaction[]): Promise<UpsertResult> {
    return this.writeStore('upsert transactions', () =>
      this.transactions.batchUpsertTransactions(userId, accountId, transactions)
    );
  }

  private writeStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(async () => {
      try {
        return await withTimeout(
          fn(),
          this.options.storeTimeoutMs,
          () => new StoreWriteError(`${operation} timed out after ${this.options.storeTimeoutMs}ms`)
        );
      } catch (error) {
        if (error instanceof JarsyncError) throw error;
        throw new StoreWriteError(`${operation} failed: ${error instanceof Error ? error.message : String(error)}`, error);
      }
    }, this.storeRetry);
  }

  private async readStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(
        fn(),
        this.options.storeTimeoutMs,
        () => new StoreReadError(`${operation} timed out after ${this.options.storeTimeoutMs}ms`)
      );
    } catch (error) {
      if (error instanceof JarsyncError) throw error;
      throw new StoreReadError(`${operation} failed: ${error instanceof Error ? error.message : String(error)}`, error);
    }
  }

  private emitProgress(
    result: SyncResult,
    phase: SyncPhase,
    window: SyncProgressEvent['window'],
    error?: Error
  ): void {
    if (this.onProgress === undefined) return;
    this.onProgress({
      userId: result.userId,
      accountId: result.accountId,
      phase,
      window,
      fetched: result.fetched,
      upserted: result.upserted,
      error,
    });
  }
}

/**
 * First second to fetch. Without a watermark this is the lookback bound. With one,
 * the overlap is subtracted but clamped at the lookback bound; an older watermark
 * is kept as is.
 */
export function startOfSync(
  watermark: number | null,
  now: number,
  options: Pick<TransactionSyncOptions, 'lookbackDays' | 'overlapSeconds'>
): number {
  const lookbackStart = now - options.lookbackDays * SECONDS_PER_DAY;
  if (watermark === null) return lookbackStart;
  const from = Math.max(watermark - options.overlapSeconds, Math.min(watermark, lookbackStart));
  return Math.min(from, now);
}

/**
 * Where a committed window may move the watermark: its newest item time, capped at
 * the oldest hold seen so far in the run so the next run fetches that hold again.
 */
export function watermarkCandidate(windowMaxTime: number | null, oldestHoldTime: number | null): number | null {
  if (windowMaxTime === null) return null;
  return oldestHoldTime === null ? windowMaxTime : Math.min(windowMaxTime, oldestHoldTime);
}

/**
 * Upper bound for the next request inside the same window, or null when the
 * window is drained.
 *
 * A full page means older items may remain: the next request ends at the oldest
 * time seen. Items sharing that second come back again and are dropped as
 * duplicates.
 */
export function nextPageEnd(
  items: readonly ProviderStatementItem[],
  pageLimit: number,
  from: number,
  to: number
): number | null {
  if (items.length < pageLimit) return null;
  let oldest = to;
  for (const item of items) {
    if (item.time < oldest) oldest = item.time;
  }
  if (oldest <= from || oldest >= to) return null;
  return oldest;
}
