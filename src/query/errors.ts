import { BadRequestException } from '../http/errors.js';

/**
 * Thrown when a request parameter cannot be converted to its declared type.
 * No filter values are produced for the request.
 */
export class ParameterBindingException extends BadRequestException {
  readonly parameter: string;
  readonly value: string;

  constructor(parameter: string, value: string, reason: string) {
    super(`Cannot set query parameter '${parameter}' to value '${value}': ${reason}`);
    this.parameter = parameter;
    this.value = value;
  }
}

/**
 * Thrown when a sort request is malformed or names a field outside the
 * query type's whitelist. Raised before any engine call.
 */
export class InvalidSortException extends BadRequestException {
  readonly field: string;
  readonly queryType: string;

  constructor(field: string, queryType: string, message?: string) {
    super(message ?? `Cannot sort ${queryType} by '${field}': not a valid sort field`);
    this.field = field;
    this.queryType = queryType;
  }
}

/**
 * Thrown when the query engine rejects a constructed query.
 * The engine error is kept as `cause`.
 */
export class QueryExecutionException extends BadRequestException {
  readonly queryType: string;

  constructor(queryType: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot execute ${queryType} query: ${reason}`, { cause });
    this.queryType = queryType;
  }
}
