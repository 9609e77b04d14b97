import { AsyncLocalStorage } from 'node:async_hooks';
import type { MiddlewareHandler } from 'hono';

/**
 * Request context stored in AsyncLocalStorage.
 * Available anywhere in the code during a request lifecycle.
 */
export interface RequestContext {
  /** Unique request identifier for correlation */
  requestId: string;
  method: string;
  path: string;
  /** Custom context data, merged into every log line */
  custom: Record<string, unknown>;
}

/**
 * AsyncLocalStorage instance for request context.
 * @internal
 */
export const requestContextStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context.
 * Returns undefined if called outside a request lifecycle.
 */
export function getRequestContext(): RequestContext | undefined {
  return requestContextStorage.getStore();
}

/**
 * Get the current request ID.
 * Returns undefined if called outside a request lifecycle.
 */
export function getRequestId(): string | undefined {
  return requestContextStorage.getStore()?.requestId;
}

/**
 * Set custom context data for the current request.
 *
 * @example
 * ```typescript
 * setRequestContextValue('queryType', 'historic-incident');
 * ```
 */
export function setRequestContextValue(key: string, value: unknown): void {
  const store = requestContextStorage.getStore();
  if (store) {
    store.custom[key] = value;
  }
}

/**
 * Middleware that initializes AsyncLocalStorage request context.
 * Picks up the id set by Hono's `requestId()` middleware when present.
 */
export function createRequestContextMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    const context: RequestContext = {
      requestId: c.get('requestId') || crypto.randomUUID(),
      method: c.req.method,
      path: c.req.path,
      custom: {},
    };

    await requestContextStorage.run(context, async () => {
      await next();
    });
  };
}
