import type { Account, Currency, ProviderStatementItem, Transaction } from '@jarsync/types';

export const UAH: Currency = { code: 980, name: 'UAH', symbol: '₴', flag: '🇺🇦' };

/** 2024-03-15 09:00 in Europe/Kyiv. */
export const KYIV_0900 = 1710486000;
export const HOUR = 3600;

export function makeTransaction(overrides: Partial<Transaction> & Pick<Transaction, 'id' | 'amount'>): Transaction {
  return {
    userId: 'user-1',
    accountId: 'card-1',
    time: KYIV_0900,
    description: '',
    operationAmount: overrides.amount,
    operationCurrencyCode: 980,
    balance: 0,
    hold: false,
    currency: UAH,
    mccCode: null,
    originalMcc: null,
    comment: null,
    commissionRate: 0,
    cashbackAmount: 0,
    ...overrides,
  };
}

export function makeStatementItem(
  overrides: Partial<ProviderStatementItem> & Pick<ProviderStatementItem, 'id' | 'time'>
): ProviderStatementItem {
  return {
    amount: -1000,
    balance: 100000,
    description: 'Coffee',
    currencyCode: 980,
    hold: false,
    ...overrides,
  };
}

export function makeAccount(overrides: Partial<Account> & Pick<Account, 'id'>): Account {
  return {
    userId: 'user-1',
    type: 'card',
    sendId: null,
    currency: UAH,
    balance: 0,
    isActive: true,
    title: null,
    goal: null,
    creditLimit: null,
    maskedPan: [],
    iban: null,
    isBudget: false,
    invested: 0,
    ...overrides,
  };
}
