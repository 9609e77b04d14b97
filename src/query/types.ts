import type { EngineQuery, ProcessEngine } from '../engine/types.js';
import type { Converter } from './converters.js';

/**
 * Raw request parameters: parameter name -> one or more text values.
 * Keys are untrusted and may not be known to any query type.
 */
export type RawParameters = Readonly<Record<string, readonly string[]>>;

/**
 * Sort direction
 */
export type SortDirection = 'asc' | 'desc';

/**
 * A single requested ordering. The first criterion of a request is the primary one.
 */
export interface SortCriterion {
  readonly field: string;
  readonly direction: SortDirection;
}

/**
 * Pagination bounds. An absent bound is unbounded on that side.
 */
export interface PageSpec {
  readonly firstResult?: number;
  readonly maxResults?: number;
}

/**
 * Describes how one external parameter binds into a filter field.
 *
 * `name` defaults to the field name. `multiValued` defaults to the converter's
 * own multiplicity: multi-valued parameters read every raw value, single-valued
 * ones only the first.
 */
export interface ParameterDescriptor<TValue> {
  readonly name?: string;
  readonly converter: Converter<TValue>;
  readonly multiValued?: boolean;
}

/**
 * Parameter table of a query type, keyed by target field.
 */
export type ParameterTable<TFilters> = {
  readonly [K in keyof TFilters]-?: ParameterDescriptor<TFilters[K]>;
};

/**
 * Filter values bound from a request. Unset fields are absent.
 */
export type FilterValues<TFilters> = Partial<TFilters>;

/**
 * Ordering call table of a query type: whitelisted sort field -> ordering call.
 */
export type SortTable<THandle, TSortField extends string = string> = Readonly<
  Record<TSortField, (query: THandle) => unknown>
>;

/**
 * Contract every query type satisfies. The binder, sort resolver and query
 * service operate only through this interface.
 */
export interface QueryType<
  TFilters,
  THandle extends EngineQuery<THandle, TResult>,
  TResult,
  TDto = TResult,
> {
  /** Unique name of the query type, used in errors and for registry lookups */
  readonly name: string;
  /** Route path the query type is served under, relative to the base path */
  readonly path: string;
  /** Whitelisted sort fields, in declaration order */
  readonly sortFields: readonly string[];

  bind(parameters: RawParameters): FilterValues<TFilters>;
  isValidSortField(field: string): boolean;
  newEngineQuery(engine: ProcessEngine): THandle;
  applyFilters(query: THandle, filters: FilterValues<TFilters>): void;
  applySort(query: THandle, criterion: SortCriterion): void;
  toDto(result: TResult): TDto;
}

/**
 * Query type with its type parameters erased, for registries and routing.
 */
// biome-ignore lint/suspicious/noExplicitAny: type parameters are erased for heterogeneous storage
export type AnyQueryType = QueryType<any, any, any, any>;

/**
 * Count result returned by the count operations
 */
export interface CountResult {
  count: number;
}
