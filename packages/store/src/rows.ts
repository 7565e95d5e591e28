/**
 * Row shapes of the Supabase tables and their conversion to canonical records.
 * Rows are parsed with zod on the way out of the database.
 */

import { z } from 'zod';
import {
  CurrencySchema,
  type Account,
  type ActiveUser,
  type Transaction,
} from '@jarsync/types';

const int = z.coerce.number().int();

export const UserRowSchema = z.object({
  id: z.string(),
  active: z.boolean(),
  bank_token: z.string().nullable(),
});
export type UserRow = z.infer<typeof UserRowSchema>;

export const AccountRowSchema = z.object({
  user_id: z.string(),
  id: z.string(),
  type: z.enum(['jar', 'card']),
  send_id: z.string().nullable(),
  currency: CurrencySchema,
  balance: int,
  is_active: z.boolean(),
  title: z.string().nullable(),
  goal: int.nullable(),
  credit_limit: int.nullable(),
  masked_pan: z.array(z.string()).nullable(),
  iban: z.string().nullable(),
  is_budget: z.boolean(),
  invested: int,
});
export type AccountRow = z.infer<typeof AccountRowSchema>;

export const TransactionRowSchema = z.object({
  user_id: z.string(),
  account_id: z.string(),
  id: z.string(),
  time: int,
  description: z.string(),
  amount: int,
  operation_amount: int,
  operation_currency_code: int.nullable(),
  balance: int,
  hold: z.boolean(),
  currency: CurrencySchema,
  mcc_code: int.nullable(),
  original_mcc: int.nullable(),
  comment: z.string().nullable(),
  commission_rate: int,
  cashback_amount: int,
});
export type TransactionRow = z.infer<typeof TransactionRowSchema>;

export const WatermarkRowSchema = z.object({
  last_synced_time: int,
});

export function rowToUser(row: UserRow): ActiveUser {
  return { id: row.id, active: row.active, credential: row.bank_token ?? '' };
}

export function accountToRow(account: Account): AccountRow {
  return {
    user_id: account.userId,
    id: account.id,
    type: account.type,
    send_id: account.sendId,
    currency: account.currency,
    balance: account.balance,
    is_active: account.isActive,
    title: account.title,
    goal: account.goal,
    credit_limit: account.creditLimit,
    masked_pan: account.maskedPan,
    iban: account.iban,
    is_budget: account.isBudget,
    invested: account.invested,
  };
}

export function rowToAccount(row: AccountRow): Account {
  return {
    id: row.id,
    userId: row.user_id,
    type: row.type,
    sendId: row.send_id,
    currency: row.currency,
    balance: row.balance,
    isActive: row.is_active,
    title: row.title,
    goal: row.goal,
    creditLimit: row.credit_limit,
    maskedPan: row.masked_pan ?? [],
    iban: row.iban,
    isBudget: row.is_budget,
    invested: row.invested,
  };
}

export function transactionToRow(tx: Transaction): TransactionRow {
  return {
    user_id: tx.userId,
    account_id: tx.accountId,
    id: tx.id,
    time: tx.time,
    description: tx.description,
    amount: tx.amount,
    operation_amount: tx.operationAmount,
    operation_currency_code: tx.operationCurrencyCode,
    balance: tx.balance,
    hold: tx.hold,
    currency: tx.currency,
    mcc_code: tx.mccCode,
    original_mcc: tx.originalMcc,
    comment: tx.comment,
    commission_rate: tx.commissionRate,
    cashback_amount: tx.cashbackAmount,
  };
}

export function rowToTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    userId: row.user_id,
    accountId: row.account_id,
    time: row.time,
    description: row.description,
    amount: row.amount,
    operationAmount: row.operation_amount,
    operationCurrencyCode: row.operation_currency_code,
    balance: row.balance,
    hold: row.hold,
    currency: row.currency,
    mccCode: row.mcc_code,
    originalMcc: row.original_mcc,
    comment: row.comment,
    commissionRate: row.commission_rate,
    cashbackAmount: row.cashback_amount,
  };
}

/**
 * Parse rows returned by PostgREST, naming the table in the error.
 */
export function parseRows<T extends z.ZodTypeAny>(schema: T, data: unknown, table: string): z.output<T>[] {
  const result = z.array(schema).safeParse(data ?? []);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Unexpected ${table} row shape at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'unknown issue'}`);
  }
  return result.data;
}
