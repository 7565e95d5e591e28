import { pino, type Logger } from 'pino';

export type { Logger };

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';

/**
 * Structured JSON logger. Provider credentials are redacted wherever they appear in
 * the log context.
 */
export const rootLogger: Logger = pino({
  level: LOG_LEVEL,
  base: { service: 'jarsync' },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      'credential',
      'token',
      '*.credential',
      '*.token',
      'headers["X-Token"]',
      '*.headers["X-Token"]',
    ],
    censor: '[REDACTED]',
  },
});

export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}

/** Logger that drops everything; for tests and library callers that bring their own. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
