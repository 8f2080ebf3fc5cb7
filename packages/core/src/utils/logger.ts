/**
 * Logger utility (pino wrapper)
 *
 * Structured JSON logging. Components prefix messages with a bracketed tag,
 * e.g. `logger.info({ provider }, '[oauth-client] Token refreshed')`.
 */

import { pino } from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;

/**
 * Shorten an opaque secret-ish value (state, token) for log lines
 */
export function redactId(value: string, visible = 8): string {
  return value.length <= visible ? value : `${value.substring(0, visible)}...`;
}
