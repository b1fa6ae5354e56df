/**
 * Structured logging for the conference lock service.
 * Uses pino for JSON output with configurable levels.
 *
 * Usage:
 *   import { createLogger } from './shared/logging/logger.js';
 *   const log = createLogger('lock-manager');
 *   log.debug({ resourceId, userId }, 'acquiring lock');
 */

import pino from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

const rootLogger = pino({
  name: 'conference-lock',
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
});

/**
 * Create a child logger scoped to a module.
 * @param module - Module name (e.g. 'lock-store', 'lifecycle-hooks')
 */
export function createLogger(module: string): pino.Logger {
  return rootLogger.child({ module });
}

/** Root logger for top-level app use (startup, shutdown). */
export const logger = rootLogger;
