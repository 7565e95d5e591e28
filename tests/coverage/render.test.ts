import { describe, it, expect } from 'vitest';
import { InMemoryTransactionStore } from '@jarsync/bank-bridge';
import { CoverageEngine, MarkdownReportRenderer, type EarnSlice } from '@jarsync/coverage';
import { createSilentLogger, type Transaction } from '@jarsync/types';
import { HOUR, KYIV_0900, makeTransaction } from '../helpers/fixtures.js';

async function renderDay(transactions: Transaction[], openingSlices?: EarnSlice[]): Promise<string | null> {
  const store = new InMemoryTransactionStore();
  for (const tx of transactions) {
    await store.batchUpsertTransactions(tx.userId, tx.accountId, [tx]);
  }
  const engine = new CoverageEngine({
    transactions: store,
    renderer: new MarkdownReportRenderer(),
    logger: createSilentLogger(),
  });
  const report = await engine.computeDailyCoverage(
    'user-1',
    '2024-03-15',
    'Europe/Kyiv',
    openingSlices !== undefined ? { openingSlices } : {}
  );
  return report.renderedText;
}

describe('MarkdownReportRenderer', () => {
  it('should render covered and uncovered spends with their sources', async () => {
    const text = await renderDay([
      makeTransaction({ id: 'E1', amount: 50000, time: KYIV_0900, description: 'Salary' }),
      makeTransaction({ id: 'S1', amount: -30000, time: KYIV_0900 + HOUR, description: 'Groceries' }),
      makeTransaction({ id: 'H1', amount: -500, time: KYIV_0900 + 2 * HOUR, hold: true }),
      makeTransaction({ id: 'S2', amount: -40000, time: KYIV_0900 + 3 * HOUR, description: '  ' }),
    ]);

    expect(text).toBe(
      [
        '## Daily coverage report: 2024-03-15 (Europe/Kyiv)',
        '',
        '**Spent:** 700.00 UAH',
        '**Earned:** 500.00 UAH',
        '**Net:** -200.00 UAH',
        '',
        '### Spends',
        '- ✅ 10:00 Groceries: 300.00 UAH',
        '  - Covered by: Salary (300.00 UAH)',
        '- ❌ 12:00 (no description): 400.00 UAH',
        '  - Covered by: Salary (200.00 UAH)',
        '  - Uncovered: 200.00 UAH (insufficient income)',
        '',
        '### Earnings',
        '- 💰 09:00 Salary: 500.00 UAH (allocated 500.00 UAH, left 0.00 UAH)',
        '',
        '### Notes',
        '- 1 of 2 spends not fully covered.',
        '- 1 pending transaction excluded.',
        '',
      ].join('\n')
    );
  });

  it('should render an empty day', async () => {
    expect(await renderDay([])).toBe(
      [
        '## Daily coverage report: 2024-03-15 (Europe/Kyiv)',
        '',
        '**Spent:** 0.00',
        '**Earned:** 0.00',
        '**Net:** 0.00',
        '',
        '### Spends',
        '_No spends._',
        '',
        '### Earnings',
        '_No earnings._',
        '',
      ].join('\n')
    );
  });

  it('should pluralise excluded holds', async () => {
    const text = await renderDay([
      makeTransaction({ id: 'H1', amount: -100, hold: true }),
      makeTransaction({ id: 'H2', amount: 100, hold: true }),
    ]);

    expect(text?.endsWith('### Notes\n- 2 pending transactions excluded.\n')).toBe(true);
  });

  it('should label carried-in income by its id', async () => {
    const text = await renderDay(
      [makeTransaction({ id: 'S1', amount: -2500, time: KYIV_0900, description: 'Taxi' })],
      [{ txId: 'carry-2024-03-14', remaining: 10000 }]
    );

    expect(text).toContain('- ✅ 09:00 Taxi: 25.00 UAH\n  - Covered by: carry-2024-03-14 (25.00 UAH)\n');
  });
});
