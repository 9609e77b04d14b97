/**
 * Options for configuring exception behavior
 */
export interface DomainExceptionOptions {
  /**
   * Underlying error that caused this exception (e.g. an error raised by the query engine).
   */
  cause?: unknown;
}

/**
 * Base domain exception class for request-level failures.
 *
 * The `code` decides the HTTP status the error handler responds with.
 *
 * @example
 * ```typescript
 * throw new BadRequestException('Cannot set both "active" and "suspended"');
 *
 * // Keep the original error around for logging
 * throw new BadRequestException('Query rejected', { cause: engineError });
 * ```
 */
export class DomainException extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: DomainExceptionOptions
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
  }
}

/**
 * Standard HTTP exception classes
 */
export class BadRequestException extends DomainException {
  constructor(message = 'Bad request', options?: DomainExceptionOptions) {
    super(message, 'BAD_REQUEST', options);
  }
}

export class NotFoundException extends DomainException {
  constructor(message = 'Not found', options?: DomainExceptionOptions) {
    super(message, 'NOT_FOUND', options);
  }
}

/**
 * Map error codes to HTTP status codes
 */
export function getStatusCodeFromErrorCode(code: string): number {
  const codeMap: Record<string, number> = {
    BAD_REQUEST: 400,
    NOT_FOUND: 404,
  };

  return codeMap[code] || 500;
}
