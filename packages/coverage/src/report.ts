/**
 * Daily coverage report: which of a day's spends were paid for by that day's
 * income. Reports are recomputed from stored transactions on every request.
 */

import { createHash } from 'node:crypto';
import {
  DEFAULT_REPORT_TIMEZONE,
  ReportSourceError,
  ValidationError,
  createLogger,
  isValidTimeZone,
  resolveDayWindow,
  toLocalDate,
  validateReport,
  withTimeout,
  type Currency,
  type DailyReport,
  type DayWindow,
  type Logger,
  type ReportTotals,
  type Transaction,
  type TransactionStore,
} from '@jarsync/types';
import { allocateCoverage, compareTransactions, type EarnSlice } from './allocate.js';
import type { ReportCache, ReportCacheKey } from './cache.js';
import type { ReportRenderer } from './render.js';

export interface CoverageEngineDeps {
  transactions: Pick<TransactionStore, 'listTransactionsInRange'>;
  renderer?: ReportRenderer;
  cache?: ReportCache;
  defaultTimezone?: string;
  /** Milliseconds since the epoch; decides what "today" is. */
  now?: () => number;
  storeTimeoutMs?: number;
  logger?: Logger;
}

export interface CoverageRequestOptions {
  /** Income carried in from outside the day. Off unless given. */
  openingSlices?: readonly EarnSlice[];
  /** Skip the cache for this request. */
  fresh?: boolean;
}

export class CoverageEngine {
  private readonly transactions: Pick<TransactionStore, 'listTransactionsInRange'>;
  private readonly renderer: ReportRenderer | undefined;
  private readonly cache: ReportCache | undefined;
  private readonly defaultTimezone: string;
  private readonly now: () => number;
  private readonly storeTimeoutMs: number;
  private readonly logger: Logger;

  constructor(deps: CoverageEngineDeps) {
    this.transactions = deps.transactions;
    this.renderer = deps.renderer;
    this.cache = deps.cache;
    this.defaultTimezone = deps.defaultTimezone ?? DEFAULT_REPORT_TIMEZONE;
    this.now = deps.now ?? Date.now;
    this.storeTimeoutMs = deps.storeTimeoutMs ?? 15_000;
    this.logger = deps.logger ?? createLogger('coverage');
  }

  async computeDailyCoverage(
    userId: string,
    date?: string,
    timezone?: string,
    options: CoverageRequestOptions = {}
  ): Promise<DailyReport> {
    if (userId.trim() === '') {
      throw new ValidationError('userId is required');
    }
    const tz = timezone ?? this.defaultTimezone;
    if (!isValidTimeZone(tz)) {
      throw new ValidationError(`Unknown timezone "${tz}"`);
    }
    const day = date ?? toLocalDate(Math.floor(this.now() / 1000), tz);
    const window = this.resolveWindow(day, tz);
    const log = this.logger.child({ userId, date: day, timezone: tz });

    const transactions = await this.loadTransactions(userId, window);
    const transactionSetHash = hashTransactionSet(transactions);
    const cacheKey: ReportCacheKey = { userId, date: day, timezone: tz };
    const useCache = this.cache !== undefined && options.fresh !== true && options.openingSlices === undefined;

    if (useCache && this.cache !== undefined) {
      const cached = await this.readCache(this.cache, cacheKey, log);
      if (cached !== null && cached.transactionSetHash === transactionSetHash) {
        log.debug('Serving cached report');
        return cached;
      }
    }

    const allocation = allocateCoverage(
      transactions,
      options.openingSlices !== undefined ? { openingSlices: options.openingSlices } : {}
    );
    const report: DailyReport = {
      userId,
      date: day,
      timezone: tz,
      window,
      currency: reportCurrency(transactions),
      totals: computeTotals(allocation.spends.map((s) => s.amount), allocation.earns.map((e) => e.amount)),
      spends: allocation.spends,
      earns: allocation.earns,
      holdsExcluded: allocation.holdsExcluded,
      transactionSetHash,
      renderedText: null,
      renderError: null,
    };

    if (this.renderer !== undefined) {
      try {
        report.renderedText = await this.renderer.render(report);
      } catch (error) {
        report.renderError = error instanceof Error ? error.message : String(error);
        log.warn({ err: report.renderError }, 'Report rendering failed');
      }
    }

    log.info(
      {
        spends: report.spends.length,
        earns: report.earns.length,
        uncovered: report.spends.filter((s) => !s.covered).length,
        net: report.totals.net,
      },
      'Computed daily coverage'
    );

    if (useCache && this.cache !== undefined) {
      await this.writeCache(this.cache, cacheKey, report, log);
    }
    return report;
  }

  private resolveWindow(date: string, timezone: string): DayWindow {
    try {
      return resolveDayWindow(date, timezone);
    } catch (error) {
      throw new ValidationError(error instanceof Error ? error.message : String(error));
    }
  }

  private async loadTransactions(userId: string, window: DayWindow): Promise<Transaction[]> {
    try {
      return await withTimeout(
        this.transactions.listTransactionsInRange(userId, window.start, window.end),
        this.storeTimeoutMs,
        () => new Error(`timed out after ${this.storeTimeoutMs}ms`)
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ReportSourceError(`Cannot read transactions for ${window.date}: ${message}`, error);
    }
  }

  private async readCache(cache: ReportCache, key: ReportCacheKey, log: Logger): Promise<DailyReport | null> {
    try {
      return await cache.get(key);
    } catch (error) {
      log.warn({ err: error instanceof Error ? error.message : String(error) }, 'Report cache read failed');
      return null;
    }
  }

  private async writeCache(
    cache: ReportCache,
    key: ReportCacheKey,
    report: DailyReport,
    log: Logger
  ): Promise<void> {
    const validation = validateReport(report);
    if (!validation.valid) {
      log.error({ issues: validation.errors.slice(0, 5) }, 'Refusing to cache a report that fails schema validation');
      return;
    }
    try {
      await cache.set(key, report);
    } catch (error) {
      log.warn({ err: error instanceof Error ? error.message : String(error) }, 'Report cache write failed');
    }
  }
}

export function computeTotals(spendMagnitudes: number[], earnAmounts: number[]): ReportTotals {
  const spendTotal = spendMagnitudes.reduce((sum, amount) => sum + amount, 0);
  const earnTotal = earnAmounts.reduce((sum, amount) => sum + amount, 0);
  return { spendTotal, earnTotal, net: earnTotal - spendTotal };
}

/**
 * sha256 over the fields that affect coverage, in time/id order, so the hash
 * does not depend on the order the store returned rows in.
 */
export function hashTransactionSet(transactions: readonly Transaction[]): string {
  const canonical = [...transactions]
    .sort((a, b) => compareTransactions(a, b) || (a.accountId < b.accountId ? -1 : a.accountId > b.accountId ? 1 : 0))
    .map((tx) => [tx.id, tx.accountId, tx.time, tx.amount, tx.hold, tx.description]);
  return createHash('sha256').update(JSON.stringify(canonical)).digest('hex');
}

function reportCurrency(transactions: readonly Transaction[]): Currency | null {
  const first = [...transactions].sort(compareTransactions)[0];
  return first === undefined ? null : { ...first.currency };
}
