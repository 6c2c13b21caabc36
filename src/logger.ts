/**
 * logger.ts: Structured logging through pino.
 *
 * Each client gets a child logger tagged with its organization id, so output
 * from several clients in one process stays apart. Callers can hand in their
 * own pino instance through ClientOptions.logger.
 */

import { pino, type Level, type Logger } from 'pino';

export type { Logger };

const LEVELS: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string | undefined): value is Level | 'silent' {
  return value !== undefined && LEVELS.includes(value);
}

/**
 * Default logger: JSON lines on stdout, level from LOG_LEVEL, else `warn`.
 */
export function createLogger(level: string | undefined = process.env.LOG_LEVEL): Logger {
  return pino({
    name: 'so24-client',
    level: isLevel(level) ? level : 'warn',
  });
}
