import { Hono } from 'hono';
import { parsePageSpec } from '../query/page-spec.js';
import type { QueryService } from '../query/query-service.js';
import type { QueryTypeRegistry } from '../query/query-registry.js';
import type { AnyQueryType, RawParameters } from '../query/types.js';
import { setRequestContextValue } from '../observability/request-context.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { queryParameters, readBodyParameters } from './request-parameters.js';

export interface QueryRoutesOptions {
  queryService: QueryService;
  queryTypes: QueryTypeRegistry;
  logger?: Logger;
}

/**
 * Create a router serving list and count endpoints for every registered query type.
 *
 * For a query type with path `history/incident`:
 * - `GET  /history/incident` and `POST /history/incident` list results
 * - `GET  /history/incident/count` and `POST /history/incident/count` count them
 *
 * GET reads filters from the query string, POST from a JSON body. Pagination
 * (`firstResult`, `maxResults`) always comes from the query string.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(createErrorHandler());
 * app.route('/', createQueryRoutes({ queryService, queryTypes }));
 *
 * // GET /history/incident?incidentType=failedJob&sortBy=createTime&sortOrder=desc&maxResults=20
 * ```
 */
export function createQueryRoutes(options: QueryRoutesOptions): Hono {
  const { queryService, queryTypes, logger = createLogger('QueryRoutes') } = options;
  const router = new Hono();

  async function list(queryType: AnyQueryType, parameters: RawParameters, query: RawParameters) {
    setRequestContextValue('queryType', queryType.name);
    const page = parsePageSpec(query);
    const results = await queryService.list(queryType, parameters, page);
    logger.debug('Query executed', { queryType: queryType.name, results: results.length });
    return results;
  }

  async function count(queryType: AnyQueryType, parameters: RawParameters) {
    setRequestContextValue('queryType', queryType.name);
    const result = await queryService.count(queryType, parameters);
    logger.debug('Query counted', { queryType: queryType.name, count: result.count });
    return result;
  }

  for (const queryType of queryTypes.list()) {
    const path = `/${queryType.path}`;

    router.get(path, async (c) => {
      const query = queryParameters(c);
      return c.json(await list(queryType, query, query));
    });

    router.post(path, async (c) => {
      const body = await readBodyParameters(c);
      return c.json(await list(queryType, body, queryParameters(c)));
    });

    router.get(`${path}/count`, async (c) => {
      return c.json(await count(queryType, queryParameters(c)));
    });

    router.post(`${path}/count`, async (c) => {
      return c.json(await count(queryType, await readBodyParameters(c)));
    });

    logger.debug(`Mounted ${queryType.name} at ${path}`);
  }

  return router;
}
