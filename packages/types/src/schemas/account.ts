import { z } from 'zod';

export const CurrencySchema = z.object({
  code: z.number().int().nonnegative(),
  name: z.string(),
  symbol: z.string(),
  flag: z.string(),
});
export type Currency = z.infer<typeof CurrencySchema>;

export const AccountTypeSchema = z.enum(['jar', 'card']);
export type AccountType = z.infer<typeof AccountTypeSchema>;

/**
 * Canonical account record, one per provider account under a user.
 *
 * `isBudget` and `invested` belong to the app: the provider never sends them and a
 * sync must carry them over from the stored record.
 */
export const AccountSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  type: AccountTypeSchema,
  sendId: z.string().nullable(),
  currency: CurrencySchema,
  balance: z.number().int(),
  isActive: z.boolean(),

  // Provider-owned, jar only
  title: z.string().nullable(),
  goal: z.number().int().nullable(),

  // Provider-owned, card only
  creditLimit: z.number().int().nullable(),
  maskedPan: z.array(z.string()),
  iban: z.string().nullable(),

  // App-owned
  isBudget: z.boolean(),
  invested: z.number().int(),
});
export type Account = z.infer<typeof AccountSchema>;

export const AppOwnedAccountFieldsSchema = AccountSchema.pick({ isBudget: true, invested: true }).partial();
export type AppOwnedAccountFields = z.infer<typeof AppOwnedAccountFieldsSchema>;

export const ActiveUserSchema = z.object({
  id: z.string().min(1),
  active: z.boolean(),
  credential: z.string(),
});
export type ActiveUser = z.infer<typeof ActiveUserSchema>;
