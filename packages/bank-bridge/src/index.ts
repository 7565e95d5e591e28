// HTTP client
export { MonobankClient, classifyResponse, type BankingClient, type BankClientConfig } from './client.js';

// Configuration
export { getSyncConfig, DEFAULT_SYNC_CONFIG, type SyncConfig } from './config.js';

// Mapping
export { resolveCurrency } from './currency.js';
export { mapAccount, mapTransaction, type TransactionMappingContext } from './mapper.js';

// Retry and pacing
export {
  withRetry,
  calculateDelay,
  isRetryableError,
  RateLimiter,
  RateLimiterRegistry,
  systemClock,
  type RetryOptions,
  type Clock,
} from './retry.js';

// Sync
export {
  TransactionSyncEngine,
  nextPageEnd,
  startOfSync,
  watermarkCandidate,
  type TransactionSyncDeps,
  type TransactionSyncOptions,
  type SyncAccountInput,
  type SyncPhase,
  type SyncProgressEvent,
  type SyncResult,
} from './transaction-sync.js';
export {
  SyncOrchestrator,
  type SyncOrchestratorDeps,
  type SyncOrchestratorOptions,
  type SyncStatus,
  type AccountSyncOutcome,
  type UserSyncOutcome,
  type SyncSummary,
} from './orchestrator.js';
export { createSyncPipeline, type SyncPipeline, type SyncPipelineDeps } from './pipeline.js';

// In-memory gateways
export { InMemoryUserDirectory, InMemoryAccountStore, InMemoryTransactionStore } from './memory-store.js';
