/**
 * Greedy FIFO allocation of income against spending.
 *
 * Every earn becomes a slice of available money. Spends, oldest first, draw from
 * the oldest slices that still have money left until they are fully covered or
 * the pool runs dry. The result depends only on the input set.
 */

import type { CoverageSource, EarnUsage, SpendCoverage, Transaction } from '@jarsync/types';

export interface EarnSlice {
  txId: string;
  remaining: number;
}

export interface AllocationOptions {
  /**
   * Slices placed ahead of the day's own earns, e.g. income carried over from an
   * earlier day. Empty unless a caller opts in.
   */
  openingSlices?: readonly EarnSlice[];
}

export interface AllocationResult {
  spends: SpendCoverage[];
  earns: EarnUsage[];
  holdsExcluded: number;
  /** Pool after allocation, in consumption order; includes exhausted slices. */
  closingSlices: EarnSlice[];
}

/** Order by time, then by id. */
export function compareTransactions(a: Pick<Transaction, 'time' | 'id'>, b: Pick<Transaction, 'time' | 'id'>): number {
  if (a.time !== b.time) return a.time - b.time;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

export function allocateCoverage(
  transactions: readonly Transaction[],
  options: AllocationOptions = {}
): AllocationResult {
  const settled = transactions.filter((tx) => !tx.hold);
  const holdsExcluded = transactions.length - settled.length;

  const earns = settled.filter((tx) => tx.amount > 0).sort(compareTransactions);
  const spends = settled.filter((tx) => tx.amount < 0).sort(compareTransactions);

  const opening = (options.openingSlices ?? []).filter((slice) => slice.remaining > 0).map((slice) => ({ ...slice }));
  const earnSlices = earns.map((tx): EarnSlice => ({ txId: tx.id, remaining: tx.amount }));
  const pool: EarnSlice[] = [...opening, ...earnSlices];
  let head = 0;

  const coverage = spends.map((spend): SpendCoverage => {
    const magnitude = -spend.amount;
    const sources: CoverageSource[] = [];
    let needed = magnitude;

    while (needed > 0 && head < pool.length) {
      const slice = pool[head];
      if (slice === undefined) break;
      if (slice.remaining === 0) {
        head++;
        continue;
      }
      const take = Math.min(needed, slice.remaining);
      slice.remaining -= take;
      needed -= take;
      sources.push({ txId: slice.txId, amount: take });
    }

    const coveredAmount = magnitude - needed;
    return {
      txId: spend.id,
      accountId: spend.accountId,
      time: spend.time,
      description: spend.description,
      amount: magnitude,
      covered: needed === 0,
      coveredAmount,
      uncoveredAmount: needed,
      sources,
      reason: needed === 0 ? null : 'insufficient_income',
    };
  });

  // Slices are shared with the pool, so each holds its earn's remainder.
  const usage = earns.map((earn, index): EarnUsage => {
    const remaining = earnSlices[index]?.remaining ?? earn.amount;
    return {
      txId: earn.id,
      accountId: earn.accountId,
      time: earn.time,
      description: earn.description,
      amount: earn.amount,
      allocated: earn.amount - remaining,
      remaining,
    };
  });

  return { spends: coverage, earns: usage, holdsExcluded, closingSlices: pool };
}
