import { describe, it, expect, vi } from 'vitest';
import {
  InMemoryAccountStore,
  InMemoryTransactionStore,
  TransactionSyncEngine,
  nextPageEnd,
  resolveCurrency,
  startOfSync,
  watermarkCandidate,
  type SyncPhase,
  type TransactionSyncOptions,
} from '@jarsync/bank-bridge';
import {
  RateLimitError,
  RetryExhaustedError,
  SECONDS_PER_DAY,
  createSilentLogger,
  type UpsertResult,
} from '@jarsync/types';
import { FakeBank, fakeClock } from '../helpers/fake-bank.js';
import { UAH, makeAccount, makeStatementItem } from '../helpers/fixtures.js';

const NOW = 1710500000;
const LOOKBACK_START = NOW - 31 * SECONDS_PER_DAY;

function setup(options: Partial<TransactionSyncOptions> = {}, pageLimit = 500) {
  const bank = new FakeBank(pageLimit);
  const store = new InMemoryTransactionStore();
  const clock = fakeClock(NOW * 1000);
  const phases: SyncPhase[] = [];
  const engine = new TransactionSyncEngine({
    bank,
    transactions: store,
    watermarks: store,
    clock,
    logger: createSilentLogger(),
    options: { minRequestIntervalMs: 0, pageLimit, ...options },
    onProgress: (event) => phases.push(event.phase),
  });
  return { bank, store, clock, phases, engine };
}

const input = { userId: 'user-1', accountId: 'card-1', credential: 'test-token', currency: UAH };

describe('TransactionSyncEngine', () => {
  it('should leave the watermark alone when the provider has nothing new', async () => {
    const { bank, store, engine } = setup();

    const result = await engine.syncAccountTransactions(input);

    expect(result).toMatchObject({ fetched: 0, upserted: 0, windows: 1, requests: 1, watermarkAfter: null });
    expect(bank.statementCalls).toEqual([
      { credential: 'test-token', accountId: 'card-1', from: LOOKBACK_START, to: NOW },
    ]);
    expect(await store.getWatermark('user-1', 'card-1')).toBeNull();
  });

  it('should store mapped transactions and advance the watermark to the newest item', async () => {
    const { bank, store, engine, phases } = setup();
    bank.statements.set('card-1', [
      makeStatementItem({ id: 'tx-1', time: NOW - 3600, amount: 50000, description: 'Salary' }),
      makeStatementItem({ id: 'tx-2', time: NOW - 60 }),
    ]);

    const result = await engine.syncAccountTransactions(input);

    expect(result).toMatchObject({ fetched: 2, upserted: 2, inserted: 2, updated: 0, watermarkAfter: NOW - 60 });
    expect(phases).toEqual(['fetching', 'importing', 'complete']);
    expect(await store.getWatermark('user-1', 'card-1')).toBe(NOW - 60);
    expect(await store.getTransaction('user-1', 'card-1', 'tx-1')).toEqual({
      id: 'tx-1',
      userId: 'user-1',
      accountId: 'card-1',
      time: NOW - 3600,
      description: 'Salary',
      amount: 50000,
      operationAmount: 50000,
      operationCurrencyCode: 980,
      balance: 100000,
      hold: false,
      currency: UAH,
      mccCode: null,
      originalMcc: null,
      comment: null,
      commissionRate: 0,
      cashbackAmount: 0,
    });
  });

  it('should be idempotent when windows overlap', async () => {
    const { bank, store, engine } = setup({ overlapSeconds: 3600 });
    bank.statements.set('card-1', [
      makeStatementItem({ id: 'tx-1', time: NOW - 1800 }),
      makeStatementItem({ id: 'tx-2', time: NOW - 60 }),
    ]);

    await engine.syncAccountTransactions(input);
    const second = await engine.syncAccountTransactions(input);

    expect(bank.statementCalls[1]).toMatchObject({ from: NOW - 60 - 3600, to: NOW });
    expect(second).toMatchObject({ upserted: 2, inserted: 0, updated: 2, watermarkAfter: NOW - 60 });
    expect(store.count('user-1')).toBe(2);
  });

  it('should page backwards through a full page and skip repeated items', async () => {
    const { bank, engine } = setup({}, 2);
    bank.statements.set('card-1', [
      makeStatementItem({ id: 'a', time: NOW - 100 }),
      makeStatementItem({ id: 'b', time: NOW - 200 }),
      makeStatementItem({ id: 'c', time: NOW - 300 }),
      makeStatementItem({ id: 'd', time: NOW - 400 }),
    ]);

    const result = await engine.syncAccountTransactions(input);

    expect(bank.statementCalls.map((call) => call.to)).toEqual([NOW, NOW - 200, NOW - 300, NOW - 400]);
    expect(result).toMatchObject({
      requests: 4,
      fetched: 7,
      upserted: 4,
      duplicatesSkipped: 3,
      windows: 1,
      watermarkAfter: NOW - 100,
    });
  });

  it('should split long gaps into provider-sized windows and commit the watermark per window', async () => {
    const { bank, store, engine } = setup();
    const watermark = NOW - 40 * SECONDS_PER_DAY;
    await store.setWatermark('user-1', 'card-1', watermark);
    bank.statements.set('card-1', [
      makeStatementItem({ id: 'old', time: NOW - 2_000_000 }),
      makeStatementItem({ id: 'new', time: NOW - 1000 }),
    ]);
    const setWatermark = vi.spyOn(store, 'setWatermark');

    const result = await engine.syncAccountTransactions(input);

    const firstEnd = watermark + 31 * SECONDS_PER_DAY + 3600;
    expect(bank.statementCalls.map(({ from, to }) => [from, to])).toEqual([
      [watermark, firstEnd],
      [firstEnd, NOW],
    ]);
    expect(result).toMatchObject({ windows: 2, upserted: 2, watermarkBefore: watermark, watermarkAfter: NOW - 1000 });
    expect(setWatermark).toHaveBeenNthCalledWith(1, 'user-1', 'card-1', NOW - 2_000_000);
    expect(setWatermark).toHaveBeenNthCalledWith(2, 'user-1', 'card-1', NOW - 1000);
  });

  it('should wait out a rate limit and carry on', async () => {
    const { bank, clock, engine } = setup();
    bank.statementFailures.push(new RateLimitError('429', 60000));
    bank.statements.set('card-1', [makeStatementItem({ id: 'tx-1', time: NOW - 60 })]);

    const result = await engine.syncAccountTransactions(input);

    expect(clock.slept).toEqual([60000]);
    expect(result).toMatchObject({ requests: 2, upserted: 1 });
  });

  it('should not advance the watermark when the store keeps failing', async () => {
    class FailingStore extends InMemoryTransactionStore {
      override async batchUpsertTransactions(): Promise<UpsertResult> {
        throw new Error('connection reset');
      }
    }
    const bank = new FakeBank();
    const store = new FailingStore();
    const phases: SyncPhase[] = [];
    const engine = new TransactionSyncEngine({
      bank,
      transactions: store,
      watermarks: store,
      clock: fakeClock(NOW * 1000),
      logger: createSilentLogger(),
      options: { minRequestIntervalMs: 0 },
      onProgress: (event) => phases.push(event.phase),
    });
    bank.statements.set('card-1', [makeStatementItem({ id: 'tx-1', time: NOW - 60 })]);

    const error = await engine.syncAccountTransactions(input).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error instanceof RetryExhaustedError ? [error.kind, error.message] : null).toEqual([
      'store_write',
      'Gave up after 3 attempts: upsert transactions failed: connection reset',
    ]);
    expect(phases).toEqual(['fetching', 'importing', 'error']);
    expect(await store.getWatermark('user-1', 'card-1')).toBeNull();
  });

  it('should fetch a pending hold again and store it once it settles', async () => {
    const { bank, store, engine } = setup();
    bank.statements.set('card-1', [
      makeStatementItem({ id: 'purchase', time: NOW - 7200, hold: true }),
      makeStatementItem({ id: 'salary', time: NOW - 3600, amount: 50000 }),
    ]);

    const first = await engine.syncAccountTransactions(input);
    expect(first.watermarkAfter).toBe(NOW - 7200);

    bank.statements.set('card-1', [
      makeStatementItem({ id: 'purchase', time: NOW - 7200, hold: false }),
      makeStatementItem({ id: 'salary', time: NOW - 3600, amount: 50000 }),
    ]);
    const second = await engine.syncAccountTransactions(input);

    expect(bank.statementCalls[1]).toMatchObject({ from: NOW - 7200, to: NOW });
    expect(second).toMatchObject({ upserted: 2, inserted: 0, updated: 2, watermarkAfter: NOW - 3600 });
    expect((await store.getTransaction('user-1', 'card-1', 'purchase'))?.hold).toBe(false);
  });

  it('should keep the watermark at a hold from an earlier window', async () => {
    const { bank, store, engine } = setup();
    const watermark = NOW - 40 * SECONDS_PER_DAY;
    await store.setWatermark('user-1', 'card-1', watermark);
    bank.statements.set('card-1', [
      makeStatementItem({ id: 'old-hold', time: NOW - 2_000_000, hold: true }),
      makeStatementItem({ id: 'new', time: NOW - 1000 }),
    ]);

    const result = await engine.syncAccountTransactions(input);

    expect(result).toMatchObject({ windows: 2, upserted: 2, watermarkAfter: NOW - 2_000_000 });
    expect(await store.getWatermark('user-1', 'card-1')).toBe(NOW - 2_000_000);
  });

  it('should keep the last committed window when a later window fails to store', async () => {
    class SecondWriteFails extends InMemoryTransactionStore {
      private writes = 0;

      override async batchUpsertTransactions(
        ...args: Parameters<InMemoryTransactionStore['batchUpsertTransactions']>
      ): Promise<UpsertResult> {
        this.writes++;
        if (this.writes > 1) throw new Error('connection reset');
        return super.batchUpsertTransactions(...args);
      }
    }
    const bank = new FakeBank();
    const store = new SecondWriteFails();
    const engine = new TransactionSyncEngine({
      bank,
      transactions: store,
      watermarks: store,
      clock: fakeClock(NOW * 1000),
      logger: createSilentLogger(),
      options: { minRequestIntervalMs: 0 },
    });
    await store.setWatermark('user-1', 'card-1', NOW - 40 * SECONDS_PER_DAY);
    bank.statements.set('card-1', [
      makeStatementItem({ id: 'old', time: NOW - 2_000_000 }),
      makeStatementItem({ id: 'new', time: NOW - 1000 }),
    ]);

    const error = await engine.syncAccountTransactions(input).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(await store.getWatermark('user-1', 'card-1')).toBe(NOW - 2_000_000);
    expect(await store.getTransaction('user-1', 'card-1', 'old')).not.toBeNull();
    expect(await store.getTransaction('user-1', 'card-1', 'new')).toBeNull();
  });

  it('should read the account currency when the caller does not pass one', async () => {
    const bank = new FakeBank();
    const store = new InMemoryTransactionStore();
    const accounts = new InMemoryAccountStore();
    await accounts.batchUpsertAccounts('user-1', [makeAccount({ id: 'card-1', currency: resolveCurrency(840) })]);
    const engine = new TransactionSyncEngine({
      bank,
      transactions: store,
      watermarks: store,
      accounts,
      clock: fakeClock(NOW * 1000),
      logger: createSilentLogger(),
      options: { minRequestIntervalMs: 0 },
    });
    bank.statements.set('card-1', [makeStatementItem({ id: 'tx-1', time: NOW - 60, currencyCode: 980 })]);

    await engine.syncAccountTransactions({ userId: 'user-1', accountId: 'card-1', credential: 'test-token' });

    const stored = await store.getTransaction('user-1', 'card-1', 'tx-1');
    expect(stored?.currency.code).toBe(840);
    expect(stored?.operationCurrencyCode).toBe(980);
  });
});

describe('startOfSync', () => {
  const now = 1_000_000;
  const lookbackStart = now - SECONDS_PER_DAY;

  it('should start at the lookback bound without a watermark', () => {
    expect(startOfSync(null, now, { lookbackDays: 1, overlapSeconds: 0 })).toBe(lookbackStart);
  });

  it('should subtract the overlap from the watermark', () => {
    expect(startOfSync(990_000, now, { lookbackDays: 1, overlapSeconds: 600 })).toBe(989_400);
  });

  it('should not let the overlap reach below the lookback bound', () => {
    expect(startOfSync(914_000, now, { lookbackDays: 1, overlapSeconds: 3600 })).toBe(lookbackStart);
  });

  it('should keep a watermark older than the lookback bound', () => {
    expect(startOfSync(900_000, now, { lookbackDays: 1, overlapSeconds: 3600 })).toBe(900_000);
  });

  it('should never start in the future', () => {
    expect(startOfSync(2_000_000, now, { lookbackDays: 1, overlapSeconds: 0 })).toBe(now);
  });
});

describe('watermarkCandidate', () => {
  it('should use the newest item time when nothing is on hold', () => {
    expect(watermarkCandidate(500, null)).toBe(500);
  });

  it('should stop at the oldest hold', () => {
    expect(watermarkCandidate(500, 300)).toBe(300);
  });

  it('should ignore a hold newer than the window', () => {
    expect(watermarkCandidate(500, 700)).toBe(500);
  });

  it('should return null for an empty window', () => {
    expect(watermarkCandidate(null, 300)).toBeNull();
  });
});

describe('nextPageEnd', () => {
  const page = [makeStatementItem({ id: 'a', time: 500 }), makeStatementItem({ id: 'b', time: 300 })];

  it('should stop after a short page', () => {
    expect(nextPageEnd(page, 3, 100, 600)).toBeNull();
  });

  it('should continue from the oldest item of a full page', () => {
    expect(nextPageEnd(page, 2, 100, 600)).toBe(300);
  });

  it('should stop when the oldest item sits on a window edge', () => {
    expect(nextPageEnd(page, 2, 300, 600)).toBeNull();
    expect(nextPageEnd([makeStatementItem({ id: 'a', time: 600 })], 1, 100, 600)).toBeNull();
  });
});
