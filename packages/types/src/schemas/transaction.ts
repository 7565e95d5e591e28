import { z } from 'zod';
import { CurrencySchema } from './account.js';

/**
 * Canonical transaction record. `id` is the provider statement-item id and doubles
 * as the store's idempotency key.
 *
 * Amounts are signed integer minor units in the account's currency: negative is a
 * spend, positive an earn.
 */
export const TransactionSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  accountId: z.string().min(1),
  time: z.number().int(),
  description: z.string(),
  amount: z.number().int(),
  /** Amount in the currency of the operation itself (`operationCurrencyCode`). */
  operationAmount: z.number().int(),
  operationCurrencyCode: z.number().int().nullable(),
  balance: z.number().int(),
  hold: z.boolean(),
  currency: CurrencySchema,
  mccCode: z.number().int().nullable(),
  originalMcc: z.number().int().nullable(),
  comment: z.string().nullable(),
  commissionRate: z.number().int(),
  cashbackAmount: z.number().int(),
});
export type Transaction = z.infer<typeof TransactionSchema>;
