import type { Context, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { createLogger, type Logger } from '../utils/logger.js';
import { DomainException, getStatusCodeFromErrorCode } from './errors.js';

/**
 * Error as rendered to the client
 */
export interface FormattedError {
  type: string;
  message: string;
  statusCode: ContentfulStatusCode;
}

export interface ErrorHandlerOptions {
  /**
   * Logger for 5xx and unexpected errors. Client errors are not logged.
   * @default Console logger with the default log level (silent in test)
   */
  logger?: Logger;

  /**
   * Custom error response handler
   */
  responseHandler?: (error: FormattedError, context: Context) => Response | Promise<Response>;
}

/**
 * Default response handler - returns `{ type, message }` JSON
 */
function defaultResponseHandler(error: FormattedError, context: Context): Response {
  return context.json({ type: error.type, message: error.message }, error.statusCode);
}

function handleDomainException(err: DomainException, logger: Logger): FormattedError {
  const statusCode = getStatusCodeFromErrorCode(err.code);

  if (statusCode >= 500) {
    logger.error(`${err.code}: ${err.message}`, { stack: err.stack });
  }

  return {
    type: err.name,
    message: err.message,
    // codes only map to contentful statuses
    statusCode: statusCode as ContentfulStatusCode,
  };
}

function handleHTTPException(err: HTTPException, logger: Logger): FormattedError {
  if (err.status >= 500) {
    logger.error(`HTTPException ${err.status}: ${err.message}`);
  }

  return { type: 'HTTPException', message: err.message, statusCode: err.status };
}

function handleUnexpectedError(err: unknown, logger: Logger): FormattedError {
  logger.error('Unhandled error', { error: err instanceof Error ? err.stack : String(err) });
  return { type: 'InternalServerError', message: 'Internal server error', statusCode: 500 };
}

/**
 * Create an error handler for Hono
 *
 * Handles:
 * - DomainException (status from its code; binding, sort and engine failures are 400)
 * - HTTPException (Hono's built-in HTTP exceptions)
 * - Generic errors (returns 500 without leaking the message)
 */
export function createErrorHandler(options: ErrorHandlerOptions = {}): ErrorHandler {
  const { logger = createLogger('QueryBinder:ErrorHandler'), responseHandler = defaultResponseHandler } =
    options;

  return (err, context) => {
    let error: FormattedError;

    if (err instanceof DomainException) {
      error = handleDomainException(err, logger);
    } else if (err instanceof HTTPException) {
      error = handleHTTPException(err, logger);
    } else {
      error = handleUnexpectedError(err, logger);
    }

    return responseHandler(error, context);
  };
}

/**
 * Default error handler instance
 */
export const defaultErrorHandler = createErrorHandler();
