/**
 * Report cache. Reports are derived data: a cached entry is only served while its
 * `transactionSetHash` still matches the day's transactions.
 */

/* eslint-disable @typescript-eslint/require-await */

import type { DailyReport } from '@jarsync/types';

export interface ReportCacheKey {
  userId: string;
  date: string;
  timezone: string;
}

export interface ReportCache {
  get(key: ReportCacheKey): Promise<DailyReport | null>;
  set(key: ReportCacheKey, report: DailyReport): Promise<void>;
}

export function reportCacheKey(key: ReportCacheKey): string {
  return `${key.userId}|${key.date}|${key.timezone}`;
}

export class InMemoryReportCache implements ReportCache {
  private entries: Map<string, DailyReport> = new Map();

  async get(key: ReportCacheKey): Promise<DailyReport | null> {
    const report = this.entries.get(reportCacheKey(key));
    return report === undefined ? null : structuredClone(report);
  }

  async set(key: ReportCacheKey, report: DailyReport): Promise<void> {
    this.entries.set(reportCacheKey(key), structuredClone(report));
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
