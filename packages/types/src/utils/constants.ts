export const ENGINE_VERSION = '0.3.0';

export const DEFAULT_BANK_API_URL = 'https://api.monobank.ua';

/**
 * Provider limits for the personal statement endpoint.
 * A single request may span at most 31 days + 1 hour and returns at most 500 items,
 * newest first.
 */
export const STATEMENT_MAX_WINDOW_SECONDS = 31 * 24 * 60 * 60 + 60 * 60;
export const STATEMENT_PAGE_LIMIT = 500;

/** The personal API allows one request per credential per 60 seconds. */
export const DEFAULT_MIN_REQUEST_INTERVAL_MS = 60_000;

export const DEFAULT_LOOKBACK_DAYS = 31;

export const DEFAULT_REPORT_TIMEZONE = 'Europe/Kyiv';

export const SECONDS_PER_DAY = 24 * 60 * 60;

export const UNCOVERED_REASONS = ['insufficient_income'] as const;
