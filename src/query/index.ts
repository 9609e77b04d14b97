export { assertUniqueParameterNames, bindParameters } from './binder.js';
export { type ConversionResult, type Converter, convert, converters } from './converters.js';
export { defineQueryType, type QueryTypeConfig } from './define-query.js';
export { InvalidSortException, ParameterBindingException, QueryExecutionException } from './errors.js';
export {
  countResults,
  executeList,
  isPaged,
  listPage,
  listUnbounded,
  runEngineCall,
  UNBOUNDED_MAX_RESULTS,
} from './executor.js';
export { FIRST_RESULT_PARAMETER, MAX_RESULTS_PARAMETER, parsePageSpec } from './page-spec.js';
export { createQueryTypeRegistry, QueryTypeRegistry } from './query-registry.js';
export { QueryService, type QueryServiceDependencies } from './query-service.js';
export { getFirstValue, getValues, toRawParameters } from './raw-parameters.js';
export {
  parseSortCriteria,
  resolveSorting,
  SORT_BY_PARAMETER,
  SORT_ORDER_PARAMETER,
  type SortFieldValidator,
} from './sort-resolver.js';
export type {
  AnyQueryType,
  CountResult,
  FilterValues,
  PageSpec,
  ParameterDescriptor,
  ParameterTable,
  QueryType,
  RawParameters,
  SortCriterion,
  SortDirection,
  SortTable,
} from './types.js';
