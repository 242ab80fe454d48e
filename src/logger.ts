import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

/**
 * Structured JSON logger.
 *
 * Components derive their own child logger with `logger.child({ component })`.
 * Provider credentials are redacted if they end up in a log object.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['apiKey', '*.apiKey', 'headers.authorization'],
      censor: '[REDACTED]',
    },
  });
}
