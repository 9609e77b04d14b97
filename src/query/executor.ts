import type { EngineQuery } from '../engine/types.js';
import { DomainException } from '../http/errors.js';
import { QueryExecutionException } from './errors.js';
import type { PageSpec } from './types.js';

/**
 * Upper page bound used when a page is requested without `maxResults`.
 * Largest count the engine's 32-bit page arguments can represent.
 */
export const UNBOUNDED_MAX_RESULTS = 2_147_483_647;

type TerminalQuery<TResult> = Pick<EngineQuery<unknown, TResult>, 'list' | 'listPage' | 'count'>;

/**
 * Run an engine call, translating engine failures into a QueryExecutionException.
 * Domain exceptions pass through untouched.
 */
export async function runEngineCall<T>(queryType: string, call: () => T | Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof DomainException) {
      throw error;
    }
    throw new QueryExecutionException(queryType, error);
  }
}

/**
 * Whether a page spec asks for the paginated path.
 * Only presence counts, not the bound values.
 */
export function isPaged(page: PageSpec | undefined): boolean {
  return page?.firstResult !== undefined || page?.maxResults !== undefined;
}

export function listUnbounded<TResult>(
  queryType: string,
  query: TerminalQuery<TResult>
): Promise<TResult[]> {
  return runEngineCall(queryType, () => query.list());
}

/**
 * Execute one page. A missing `firstResult` starts at 0, a missing
 * `maxResults` leaves the page unbounded at the top.
 */
export function listPage<TResult>(
  queryType: string,
  query: TerminalQuery<TResult>,
  page: PageSpec
): Promise<TResult[]> {
  const firstResult = page.firstResult ?? 0;
  const maxResults = page.maxResults ?? UNBOUNDED_MAX_RESULTS;
  return runEngineCall(queryType, () => query.listPage(firstResult, maxResults));
}

/**
 * List results, choosing the page path only when a bound is present.
 */
export function executeList<TResult>(
  queryType: string,
  query: TerminalQuery<TResult>,
  page?: PageSpec
): Promise<TResult[]> {
  if (page && isPaged(page)) {
    return listPage(queryType, query, page);
  }
  return listUnbounded(queryType, query);
}

export function countResults(queryType: string, query: TerminalQuery<unknown>): Promise<number> {
  return runEngineCall(queryType, () => query.count());
}
