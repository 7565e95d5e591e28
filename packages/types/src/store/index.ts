export type {
  UpsertResult,
  UserDirectory,
  AccountStore,
  TransactionStore,
  WatermarkStore,
} from './store-interface.js';
