/* eslint-disable @typescript-eslint/require-await */

import type { BankingClient, Clock } from '@jarsync/bank-bridge';
import type { ProviderAccount, ProviderStatementItem } from '@jarsync/types';

export interface StatementCall {
  credential: string;
  accountId: string;
  from: number;
  to: number;
}

/**
 * In-process banking provider. Statements are filtered by window, returned newest
 * first and cut at `pageLimit`, like the real API.
 */
export class FakeBank implements BankingClient {
  readonly accountsByCredential = new Map<string, ProviderAccount[]>();
  readonly statements = new Map<string, ProviderStatementItem[]>();
  readonly accountFailures = new Map<string, Error>();
  /** Thrown, in order, by the next statement requests. */
  readonly statementFailures: Error[] = [];
  readonly accountCalls: string[] = [];
  readonly statementCalls: StatementCall[] = [];

  constructor(private readonly pageLimit = 500) {}

  async listAccounts(credential: string): Promise<ProviderAccount[]> {
    this.accountCalls.push(credential);
    const failure = this.accountFailures.get(credential);
    if (failure !== undefined) throw failure;
    return structuredClone(this.accountsByCredential.get(credential) ?? []);
  }

  async listStatementItems(
    credential: string,
    accountId: string,
    from: number,
    to: number
  ): Promise<ProviderStatementItem[]> {
    this.statementCalls.push({ credential, accountId, from, to });
    const failure = this.statementFailures.shift();
    if (failure !== undefined) throw failure;
    return (this.statements.get(accountId) ?? [])
      .filter((item) => item.time >= from && item.time <= to)
      .sort((a, b) => b.time - a.time)
      .slice(0, this.pageLimit)
      .map((item) => ({ ...item }));
  }
}

export function fakeClock(startMs = 0): Clock & { slept: number[] } {
  let now = startMs;
  const slept: number[] = [];
  return {
    slept,
    now: () => now,
    sleep: async (ms: number) => {
      slept.push(ms);
      now += ms;
    },
  };
}
