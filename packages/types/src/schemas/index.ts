export {
  CurrencySchema,
  AccountTypeSchema,
  AccountSchema,
  AppOwnedAccountFieldsSchema,
  ActiveUserSchema,
  type Currency,
  type AccountType,
  type Account,
  type AppOwnedAccountFields,
  type ActiveUser,
} from './account.js';

export { TransactionSchema, type Transaction } from './transaction.js';

export {
  ProviderCardSchema,
  ProviderJarSchema,
  ClientInfoSchema,
  ProviderStatementItemSchema,
  StatementSchema,
  type ProviderCard,
  type ProviderJar,
  type ClientInfo,
  type ProviderAccount,
  type ProviderStatementItem,
} from './provider.js';
