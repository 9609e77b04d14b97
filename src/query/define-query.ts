import type { EngineQuery, ProcessEngine } from '../engine/types.js';
import { assertUniqueParameterNames, bindParameters } from './binder.js';
import { InvalidSortException } from './errors.js';
import type {
  FilterValues,
  ParameterTable,
  QueryType,
  RawParameters,
  SortCriterion,
  SortTable,
} from './types.js';

/**
 * Declaration of a query type, see {@link defineQueryType}.
 */
export interface QueryTypeConfig<
  TFilters,
  THandle extends EngineQuery<THandle, TResult>,
  TResult,
  TDto,
  TSortField extends string,
> {
  name: string;
  path: string;
  parameters: ParameterTable<TFilters>;
  sorting: SortTable<THandle, TSortField>;
  createQuery: (engine: ProcessEngine) => THandle;
  /**
   * Apply bound filter values to a fresh engine query. Must skip unset fields.
   */
  applyFilters: (query: THandle, filters: FilterValues<TFilters>) => void;
  toDto: (result: TResult) => TDto;
}

/**
 * Define a query type from a parameter table, an ordering table and a filter function.
 *
 * Tables are checked and compiled once here; the returned query type is
 * stateless and safe to share between requests.
 *
 * @example
 * ```typescript
 * const taskQuery = defineQueryType({
 *   name: 'task',
 *   path: 'task',
 *   parameters: {
 *     assignee: { converter: converters.string },
 *     unassigned: { converter: converters.boolean },
 *   },
 *   sorting: {
 *     created: (query) => query.orderByCreated(),
 *   },
 *   createQuery: (engine) => engine.taskService.createTaskQuery(),
 *   applyFilters: (query, filters) => {
 *     if (filters.assignee !== undefined) query.taskAssignee(filters.assignee);
 *     if (filters.unassigned === true) query.taskUnassigned();
 *   },
 *   toDto: (task) => ({ id: task.id, name: task.name }),
 * });
 * ```
 */
export function defineQueryType<
  TFilters,
  THandle extends EngineQuery<THandle, TResult>,
  TResult,
  TDto,
  TSortField extends string,
>(
  config: QueryTypeConfig<TFilters, THandle, TResult, TDto, TSortField>
): QueryType<TFilters, THandle, TResult, TDto> {
  validateQueryTypeConfig(config);

  const orderings = new Map<string, (query: THandle) => unknown>(Object.entries(config.sorting));
  const { name, path, parameters } = config;

  return {
    name,
    path,
    sortFields: [...orderings.keys()],

    bind(raw: RawParameters): FilterValues<TFilters> {
      return bindParameters(parameters, raw);
    },

    isValidSortField(field: string): boolean {
      return orderings.has(field);
    },

    newEngineQuery(engine: ProcessEngine): THandle {
      return config.createQuery(engine);
    },

    applyFilters(query: THandle, filters: FilterValues<TFilters>): void {
      config.applyFilters(query, filters);
    },

    applySort(query: THandle, criterion: SortCriterion): void {
      const orderBy = orderings.get(criterion.field);
      if (!orderBy) {
        throw new InvalidSortException(criterion.field, name);
      }
      orderBy(query);
      if (criterion.direction === 'desc') {
        query.desc();
      } else {
        query.asc();
      }
    },

    toDto(result: TResult): TDto {
      return config.toDto(result);
    },
  };
}

function validateQueryTypeConfig<TFilters>(config: {
  name: string;
  path: string;
  parameters: ParameterTable<TFilters>;
}): void {
  if (!config.name) {
    throw new Error('Query type name is required');
  }

  if (config.path.startsWith('/') || config.path.endsWith('/')) {
    throw new Error(`Query type "${config.name}" path must not start or end with "/"`);
  }

  assertUniqueParameterNames(config.name, config.parameters);
}
