/**
 * Daily coverage report. Derived on demand from raw transactions and never stored as
 * a system of record.
 */

import type { Currency } from '../schemas/account.js';
import type { UNCOVERED_REASONS } from '../utils/constants.js';

export type UncoveredReason = (typeof UNCOVERED_REASONS)[number];

/** One contribution of an earn towards a spend, in allocation order. */
export interface CoverageSource {
  txId: string;
  amount: number;
}

export interface SpendCoverage {
  txId: string;
  accountId: string;
  time: number;
  description: string;
  /** Spend magnitude in minor units (always positive). */
  amount: number;
  covered: boolean;
  coveredAmount: number;
  uncoveredAmount: number;
  sources: CoverageSource[];
  reason: UncoveredReason | null;
}

export interface EarnUsage {
  txId: string;
  accountId: string;
  time: number;
  description: string;
  amount: number;
  allocated: number;
  remaining: number;
}

export interface ReportTotals {
  spendTotal: number;
  earnTotal: number;
  /** earnTotal - spendTotal, signed. */
  net: number;
}

export interface DayWindow {
  date: string;
  timezone: string;
  /** Unix seconds, inclusive. */
  start: number;
  /** Unix seconds, inclusive. */
  end: number;
}

export interface DailyReport {
  userId: string;
  date: string;
  timezone: string;
  window: DayWindow;
  currency: Currency | null;
  totals: ReportTotals;
  spends: SpendCoverage[];
  earns: EarnUsage[];
  holdsExcluded: number;
  transactionSetHash: string;
  renderedText: string | null;
  renderError: string | null;
}
