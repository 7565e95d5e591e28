/**
 * Sync configuration from environment variables or explicit config.
 * Priority: explicit config > environment variables > defaults.
 */

import { z } from 'zod';
import {
  DEFAULT_BANK_API_URL,
  DEFAULT_LOOKBACK_DAYS,
  DEFAULT_MIN_REQUEST_INTERVAL_MS,
} from '@jarsync/types';

export interface SyncConfig {
  bankApiUrl: string;
  bankTimeoutMs: number;
  lookbackDays: number;
  /** Seconds re-fetched below the watermark on each run. */
  overlapSeconds: number;
  minRequestIntervalMs: number;
  maxAttempts: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  userConcurrency: number;
  storeTimeoutMs: number;
}

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const SyncConfigSchema = z.object({
  bankApiUrl: z.string().url(),
  bankTimeoutMs: positiveInt,
  lookbackDays: positiveInt,
  overlapSeconds: nonNegativeInt,
  minRequestIntervalMs: nonNegativeInt,
  maxAttempts: positiveInt,
  initialBackoffMs: nonNegativeInt,
  maxBackoffMs: nonNegativeInt,
  userConcurrency: positiveInt,
  storeTimeoutMs: positiveInt,
});

const ENV_KEYS: Record<keyof SyncConfig, string> = {
  bankApiUrl: 'BANK_API_URL',
  bankTimeoutMs: 'BANK_TIMEOUT_MS',
  lookbackDays: 'SYNC_LOOKBACK_DAYS',
  overlapSeconds: 'SYNC_OVERLAP_SECONDS',
  minRequestIntervalMs: 'SYNC_MIN_REQUEST_INTERVAL_MS',
  maxAttempts: 'SYNC_MAX_ATTEMPTS',
  initialBackoffMs: 'SYNC_INITIAL_BACKOFF_MS',
  maxBackoffMs: 'SYNC_MAX_BACKOFF_MS',
  userConcurrency: 'SYNC_USER_CONCURRENCY',
  storeTimeoutMs: 'SYNC_STORE_TIMEOUT_MS',
};

export const DEFAULT_SYNC_CONFIG: SyncConfig = {
  bankApiUrl: DEFAULT_BANK_API_URL,
  bankTimeoutMs: 30_000,
  lookbackDays: DEFAULT_LOOKBACK_DAYS,
  overlapSeconds: 0,
  minRequestIntervalMs: DEFAULT_MIN_REQUEST_INTERVAL_MS,
  maxAttempts: 3,
  initialBackoffMs: 1000,
  maxBackoffMs: 60_000,
  userConcurrency: 4,
  storeTimeoutMs: 15_000,
};

/**
 * Resolve the sync configuration. Empty environment values count as unset.
 */
export function getSyncConfig(
  config?: Partial<SyncConfig>,
  env: NodeJS.ProcessEnv = process.env
): SyncConfig {
  const pick = <K extends keyof SyncConfig>(key: K): SyncConfig[K] | string => {
    const explicit = config?.[key];
    if (explicit !== undefined) return explicit;
    const fromEnv = env[ENV_KEYS[key]];
    if (fromEnv !== undefined && fromEnv.trim() !== '') return fromEnv.trim();
    return DEFAULT_SYNC_CONFIG[key];
  };

  const raw = {
    bankApiUrl: pick('bankApiUrl'),
    bankTimeoutMs: pick('bankTimeoutMs'),
    lookbackDays: pick('lookbackDays'),
    overlapSeconds: pick('overlapSeconds'),
    minRequestIntervalMs: pick('minRequestIntervalMs'),
    maxAttempts: pick('maxAttempts'),
    initialBackoffMs: pick('initialBackoffMs'),
    maxBackoffMs: pick('maxBackoffMs'),
    userConcurrency: pick('userConcurrency'),
    storeTimeoutMs: pick('storeTimeoutMs'),
  };

  const result = SyncConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => {
        const field = issue.path[0];
        const name = typeof field === 'string' && isConfigKey(field) ? ENV_KEYS[field] : String(field);
        return `${name}: ${issue.message}`;
      })
      .join('; ');
    throw new Error(`Invalid sync configuration. ${problems}`);
  }
  return result.data;
}

function isConfigKey(key: string): key is keyof SyncConfig {
  return key in ENV_KEYS;
}
