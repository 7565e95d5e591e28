/**
 * Payload shapes of the banking provider's personal API.
 * Parsed at the client boundary so the mapper only ever sees validated data.
 */

import { z } from 'zod';

export const ProviderCardSchema = z.object({
  id: z.string().min(1),
  sendId: z.string().nullish(),
  balance: z.number().int(),
  creditLimit: z.number().int().nullish(),
  type: z.string().nullish(),
  currencyCode: z.number().int(),
  cashbackType: z.string().nullish(),
  maskedPan: z.array(z.string()).nullish(),
  iban: z.string().nullish(),
});
export type ProviderCard = z.infer<typeof ProviderCardSchema>;

export const ProviderJarSchema = z.object({
  id: z.string().min(1),
  sendId: z.string().nullish(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  currencyCode: z.number().int(),
  balance: z.number().int(),
  goal: z.number().int().nullish(),
});
export type ProviderJar = z.infer<typeof ProviderJarSchema>;

export const ClientInfoSchema = z.object({
  clientId: z.string().nullish(),
  name: z.string().nullish(),
  accounts: z.array(ProviderCardSchema).default([]),
  jars: z.array(ProviderJarSchema).default([]),
});
export type ClientInfo = z.infer<typeof ClientInfoSchema>;

export type ProviderAccount =
  | ({ kind: 'card' } & ProviderCard)
  | ({ kind: 'jar' } & ProviderJar);

export const ProviderStatementItemSchema = z.object({
  id: z.string().min(1),
  time: z.number().int(),
  description: z.string().nullish(),
  mcc: z.number().int().nullish(),
  originalMcc: z.number().int().nullish(),
  hold: z.boolean().nullish(),
  amount: z.number().int(),
  operationAmount: z.number().int().nullish(),
  currencyCode: z.number().int().nullish(),
  commissionRate: z.number().int().nullish(),
  cashbackAmount: z.number().int().nullish(),
  balance: z.number().int(),
  comment: z.string().nullish(),
  receiptId: z.string().nullish(),
  counterName: z.string().nullish(),
});
export type ProviderStatementItem = z.infer<typeof ProviderStatementItemSchema>;

export const StatementSchema = z.array(ProviderStatementItemSchema);
