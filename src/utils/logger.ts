import { isTest } from './environment.js';

/**
 * Log levels matching Pino's level system.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

/**
 * Log level numeric values (matching Pino).
 * Used for level comparison.
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 60,
  error: 50,
  warn: 40,
  info: 30,
  debug: 20,
};

/**
 * Get the default log level based on environment.
 * - test: silent (no logs)
 * - otherwise: info
 */
export function getDefaultLogLevel(): LogLevel {
  return isTest() ? 'silent' : 'info';
}

/**
 * Logger interface used by the HTTP adapter and app composition.
 *
 * Compatible with the context-aware Pino logger from `observability/pino-logger`.
 */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;

  /**
   * Create a child logger with bound context (Pino-compatible).
   */
  child?(bindings: Record<string, unknown>): Logger;
}

/**
 * Create a console logger that prefixes every message.
 *
 * @param prefix - Prefix to add to all log messages
 * @param level - Log level (default: 'silent' in test, 'info' otherwise)
 *
 * @example
 * ```typescript
 * const logger = createLogger('QueryRoutes');
 * logger.info('Mounted query routes'); // [QueryRoutes] Mounted query routes
 * ```
 */
export function createLogger(prefix: string, level?: LogLevel): Logger {
  const levelValue = LOG_LEVELS[level ?? getDefaultLogLevel()];
  const noop = () => {};

  return {
    debug:
      levelValue <= LOG_LEVELS.debug
        ? (msg, ...meta) => console.debug(`[${prefix}] ${msg}`, ...meta)
        : noop,
    info:
      levelValue <= LOG_LEVELS.info
        ? (msg, ...meta) => console.log(`[${prefix}] ${msg}`, ...meta)
        : noop,
    warn:
      levelValue <= LOG_LEVELS.warn
        ? (msg, ...meta) => console.warn(`[${prefix}] ${msg}`, ...meta)
        : noop,
    error:
      levelValue <= LOG_LEVELS.error
        ? (msg, ...meta) => console.error(`[${prefix}] ${msg}`, ...meta)
        : noop,
  };
}
