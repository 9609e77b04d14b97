import type { EngineQuery, ProcessEngine } from '../engine/types.js';
import { countResults, executeList, runEngineCall } from './executor.js';
import { parseSortCriteria, resolveSorting } from './sort-resolver.js';
import type { CountResult, PageSpec, QueryType, RawParameters } from './types.js';

/**
 * Dependencies resolved from the container
 */
export interface QueryServiceDependencies {
  processEngine: ProcessEngine;
}

/**
 * Service façade running any query type against the process engine.
 *
 * Each call binds the parameters, resolves sorting, then builds a fresh
 * engine query that never leaves the call.
 *
 * @example
 * ```typescript
 * const service = new QueryService({ processEngine });
 *
 * const incidents = await service.list(historicIncidentQuery, {
 *   incidentType: ['failedJob'],
 *   sortBy: ['createTime'],
 *   sortOrder: ['desc'],
 * }, { firstResult: 0, maxResults: 20 });
 *
 * const { count } = await service.count(historicIncidentQuery, { open: ['true'] });
 * ```
 */
export class QueryService {
  private readonly processEngine: ProcessEngine;

  constructor({ processEngine }: QueryServiceDependencies) {
    this.processEngine = processEngine;
  }

  /**
   * Build a filtered and ordered engine query.
   *
   * Binding and sort validation both finish before the engine is touched, so
   * a rejected request never leaves a half-built query behind.
   *
   * @throws {ParameterBindingException} If a parameter cannot be converted
   * @throws {InvalidSortException} If sorting is malformed or not whitelisted
   * @throws {QueryExecutionException} If the engine rejects a filter or ordering call
   */
  async buildQuery<TFilters, THandle extends EngineQuery<THandle, TResult>, TResult, TDto>(
    queryType: QueryType<TFilters, THandle, TResult, TDto>,
    parameters: RawParameters
  ): Promise<THandle> {
    const filters = queryType.bind(parameters);
    const sorting = resolveSorting(queryType, parseSortCriteria(queryType.name, parameters));

    return runEngineCall(queryType.name, () => {
      const query = queryType.newEngineQuery(this.processEngine);
      queryType.applyFilters(query, filters);
      for (const criterion of sorting) {
        queryType.applySort(query, criterion);
      }
      return query;
    });
  }

  /**
   * List matching results as DTOs. The page path is used only when the page
   * spec carries `firstResult` or `maxResults`.
   */
  async list<TFilters, THandle extends EngineQuery<THandle, TResult>, TResult, TDto>(
    queryType: QueryType<TFilters, THandle, TResult, TDto>,
    parameters: RawParameters,
    page?: PageSpec
  ): Promise<TDto[]> {
    const query = await this.buildQuery(queryType, parameters);
    const results = await executeList(queryType.name, query, page);
    return results.map((result) => queryType.toDto(result));
  }

  async count<TFilters, THandle extends EngineQuery<THandle, TResult>, TResult, TDto>(
    queryType: QueryType<TFilters, THandle, TResult, TDto>,
    parameters: RawParameters
  ): Promise<CountResult> {
    const query = await this.buildQuery(queryType, parameters);
    const count = await countResults(queryType.name, query);
    return { count };
  }
}
