import type { MiddlewareHandler } from 'hono';
import type { LoggerOptions } from 'pino';
import type { Logger, LogLevel } from '../utils/logger.js';
import { getRequestContext } from './request-context.js';

/**
 * Pino logger interface - subset of pino.Logger for type compatibility.
 */
export interface PinoLogger {
  level: string;
  debug: (obj: object, msg?: string) => void;
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  child: (bindings: Record<string, unknown>) => PinoLogger;
}

export interface ContextAwarePinoOptions {
  /**
   * Base Pino logger instance.
   * Create with: `pino(createPinoOptions('info'))`
   */
  pino: PinoLogger;

  /**
   * Service name to include in all logs.
   */
  service?: string;
}

/**
 * Create a logger that adds the current request context to every line.
 *
 * Injects the request id and custom context from AsyncLocalStorage, plus the
 * service name. Plain-object meta arguments are merged into the log object.
 *
 * @example
 * ```typescript
 * const logger = createContextAwarePinoLogger({
 *   pino: pino(createPinoOptions('info')),
 *   service: 'query-binder',
 * });
 *
 * logger.info('Query executed', { queryType: 'historic-incident', results: 12 });
 * // {"level":"info","requestId":"abc-123","service":"query-binder","queryType":"historic-incident","results":12,"msg":"Query executed"}
 * ```
 */
export function createContextAwarePinoLogger(options: ContextAwarePinoOptions): Logger {
  const { pino, service } = options;

  function createLogObject(meta: unknown[]): object {
    const ctx = getRequestContext();
    let obj: Record<string, unknown> = {};

    if (ctx) {
      obj.requestId = ctx.requestId;
      obj = { ...obj, ...ctx.custom };
    }
    if (service) {
      obj.service = service;
    }

    for (const item of meta) {
      if (item && typeof item === 'object' && !Array.isArray(item)) {
        obj = { ...obj, ...item };
      }
    }

    return obj;
  }

  return {
    debug(msg: string, ...meta: unknown[]) {
      pino.debug(createLogObject(meta), msg);
    },
    info(msg: string, ...meta: unknown[]) {
      pino.info(createLogObject(meta), msg);
    },
    warn(msg: string, ...meta: unknown[]) {
      pino.warn(createLogObject(meta), msg);
    },
    error(msg: string, ...meta: unknown[]) {
      pino.error(createLogObject(meta), msg);
    },
    child(bindings: Record<string, unknown>) {
      return createContextAwarePinoLogger({
        pino: pino.child(bindings),
        service,
      });
    },
  };
}

/**
 * HTTP access log middleware for Pino.
 *
 * Logs method, path, status and duration once the response is ready;
 * 5xx at error level, 4xx at warn, everything else at info.
 */
export function createPinoHttpMiddleware(pino: PinoLogger): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const logObject = {
      requestId: getRequestContext()?.requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration: Date.now() - start,
    };

    if (c.res.status >= 500) {
      pino.error(logObject, 'HTTP Request');
    } else if (c.res.status >= 400) {
      pino.warn(logObject, 'HTTP Request');
    } else {
      pino.info(logObject, 'HTTP Request');
    }
  };
}

/**
 * Pino options for JSON output without pid/hostname.
 */
export function createPinoOptions(level: LogLevel): LoggerOptions {
  return {
    level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    base: undefined,
  };
}
