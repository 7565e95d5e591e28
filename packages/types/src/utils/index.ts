export {
  ENGINE_VERSION,
  DEFAULT_BANK_API_URL,
  STATEMENT_MAX_WINDOW_SECONDS,
  STATEMENT_PAGE_LIMIT,
  DEFAULT_MIN_REQUEST_INTERVAL_MS,
  DEFAULT_LOOKBACK_DAYS,
  DEFAULT_REPORT_TIMEZONE,
  SECONDS_PER_DAY,
  UNCOVERED_REASONS,
} from './constants.js';
export {
  isValidISODate,
  isValidTimeZone,
  timeZoneOffsetSeconds,
  toLocalDate,
  formatLocalTime,
  resolveDayWindow,
  nowUnixSeconds,
} from './date.js';
export { formatMinorUnits, sumMinorUnits, isMinorUnits } from './money.js';
export { mapWithConcurrency, withTimeout, sleep } from './concurrency.js';
export { rootLogger, createLogger, createSilentLogger, type Logger } from './logger.js';
