/**
 * Mapping of provider payloads to canonical account and transaction records.
 * Both functions are pure: the same input always yields a deep-equal record.
 */

import type {
  Account,
  AppOwnedAccountFields,
  Currency,
  ProviderAccount,
  ProviderStatementItem,
  Transaction,
} from '@jarsync/types';
import { resolveCurrency } from './currency.js';

const DEFAULT_APP_FIELDS = { isBudget: false, invested: 0 } as const;

/**
 * Build the canonical account for `provider`.
 *
 * App-owned fields (`isBudget`, `invested`) come from `explicit` when given,
 * otherwise from `existing`, otherwise defaults. Provider-owned fields always
 * come from the payload.
 */
export function mapAccount(
  userId: string,
  provider: ProviderAccount,
  existing: Account | null = null,
  explicit: AppOwnedAccountFields = {}
): Account {
  if (existing !== null && existing.id !== provider.id) {
    throw new Error(`Cannot merge account ${provider.id} into stored record ${existing.id}`);
  }

  const isBudget = explicit.isBudget ?? existing?.isBudget ?? DEFAULT_APP_FIELDS.isBudget;
  const invested = explicit.invested ?? existing?.invested ?? DEFAULT_APP_FIELDS.invested;
  const currency = resolveCurrency(provider.currencyCode);

  if (provider.kind === 'jar') {
    return {
      id: provider.id,
      userId,
      type: 'jar',
      sendId: provider.sendId ?? null,
      currency,
      balance: provider.balance,
      isActive: true,
      title: provider.title ?? null,
      goal: provider.goal ?? null,
      creditLimit: null,
      maskedPan: [],
      iban: null,
      isBudget,
      invested,
    };
  }

  return {
    id: provider.id,
    userId,
    type: 'card',
    sendId: provider.sendId ?? null,
    currency,
    balance: provider.balance,
    isActive: true,
    title: null,
    goal: null,
    creditLimit: provider.creditLimit ?? null,
    maskedPan: [...(provider.maskedPan ?? [])],
    iban: provider.iban ?? null,
    isBudget,
    invested,
  };
}

export interface TransactionMappingContext {
  userId: string;
  accountId: string;
  /** Currency the account is held in; `amount` and `balance` are expressed in it. */
  accountCurrency?: Currency | null;
}

/**
 * Build the canonical transaction for a statement item.
 * Without an account currency, the operation currency is used instead.
 */
export function mapTransaction(item: ProviderStatementItem, context: TransactionMappingContext): Transaction {
  const currency = context.accountCurrency ?? resolveCurrency(item.currencyCode ?? 0);

  return {
    id: item.id,
    userId: context.userId,
    accountId: context.accountId,
    time: item.time,
    description: item.description ?? '',
    amount: item.amount,
    operationAmount: item.operationAmount ?? item.amount,
    operationCurrencyCode: item.currencyCode ?? null,
    balance: item.balance,
    hold: item.hold ?? false,
    currency: { ...currency },
    mccCode: item.mcc ?? null,
    originalMcc: item.originalMcc ?? null,
    comment: item.comment ?? null,
    commissionRate: item.commissionRate ?? 0,
    cashbackAmount: item.cashbackAmount ?? 0,
  };
}
