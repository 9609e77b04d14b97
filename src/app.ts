import { type AwilixContainer, asClass, asValue, createContainer, InjectionMode } from 'awilix';
import { Hono } from 'hono';
import { requestId } from 'hono/request-id';
import { pino } from 'pino';
import type { AppConfig } from './config/app-config.js';
import type { ProcessEngine } from './engine/types.js';
import { createErrorHandler } from './http/error-handler.js';
import { createQueryRoutes } from './http/query-routes.js';
import {
  createContextAwarePinoLogger,
  createPinoHttpMiddleware,
  createPinoOptions,
  type PinoLogger,
} from './observability/pino-logger.js';
import { createRequestContextMiddleware } from './observability/request-context.js';
import { builtInQueryTypes } from './queries/index.js';
import { QueryTypeRegistry } from './query/query-registry.js';
import { QueryService } from './query/query-service.js';
import type { AnyQueryType } from './query/types.js';
import type { Logger } from './utils/logger.js';

/**
 * Services registered in the container
 */
export interface AppCradle {
  config: AppConfig;
  processEngine: ProcessEngine;
  logger: Logger;
  queryTypes: QueryTypeRegistry;
  queryService: QueryService;
}

export interface CreateAppOptions {
  /** Query engine the query types run against */
  engine: ProcessEngine;
  config: AppConfig;
  /**
   * Query types to serve.
   * @default The historic incident and process instance query types
   */
  queryTypes?: readonly AnyQueryType[];
  /**
   * Base Pino instance. Created from `config.logLevel` when omitted.
   */
  pino?: PinoLogger;
}

export interface CreateAppResult {
  app: Hono;
  container: AwilixContainer<AppCradle>;
}

/**
 * Compose the HTTP application: container, logging, error handling and query routes.
 *
 * @example
 * ```typescript
 * const config = await loadAppConfig();
 * const { app } = createApp({ engine: processEngine, config: config.data });
 *
 * const res = await app.request('/history/incident?open=true');
 * ```
 */
export function createApp(options: CreateAppOptions): CreateAppResult {
  const { engine, config, queryTypes = builtInQueryTypes } = options;
  const basePino: PinoLogger = options.pino ?? pino(createPinoOptions(config.logLevel));
  const logger = createContextAwarePinoLogger({ pino: basePino, service: config.serviceName });

  const container = createContainer<AppCradle>({
    injectionMode: InjectionMode.PROXY,
    strict: true,
  });

  container.register({
    config: asValue(config),
    processEngine: asValue(engine),
    logger: asValue(logger),
    queryTypes: asValue(new QueryTypeRegistry([...queryTypes])),
    queryService: asClass(QueryService).singleton(),
  });

  const app = new Hono();
  app.use('*', requestId());
  app.use('*', createRequestContextMiddleware());
  app.use('*', createPinoHttpMiddleware(basePino));
  app.onError(createErrorHandler({ logger }));

  const routes = createQueryRoutes({
    queryService: container.resolve('queryService'),
    queryTypes: container.resolve('queryTypes'),
    logger,
  });
  app.route(config.basePath, routes);

  logger.info('Query routes ready', {
    basePath: config.basePath,
    queryTypes: container.cradle.queryTypes.list().map((queryType) => queryType.name),
  });

  return { app, container };
}
