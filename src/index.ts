/**
 * query-binder - declarative parameter binding, whitelisted sorting and
 * paginated execution for process engine queries, served over Hono.
 *
 * @packageDocumentation
 */

// App composition
export { type AppCradle, type CreateAppOptions, type CreateAppResult, createApp } from './app.js';
// Configuration
export {
  type AppConfig,
  appConfigSchema,
  type Config,
  type ConfigOptions,
  type ConfigProvider,
  ConfigValidationException,
  createConfig,
  type DotenvProviderOptions,
  dotenvProvider,
  ENV_PREFIX,
  type EnvProviderOptions,
  envProvider,
  loadAppConfig,
  objectProvider,
  toCamelCase,
} from './config/index.js';
// Engine surface
export type {
  EngineQuery,
  HistoricIncident,
  HistoricIncidentQuery,
  HistoryService,
  ProcessEngine,
  ProcessInstance,
  ProcessInstanceQuery,
  RuntimeService,
} from './engine/types.js';
// HTTP
export {
  createErrorHandler,
  defaultErrorHandler,
  type ErrorHandlerOptions,
  type FormattedError,
} from './http/error-handler.js';
export {
  BadRequestException,
  DomainException,
  type DomainExceptionOptions,
  getStatusCodeFromErrorCode,
  NotFoundException,
} from './http/errors.js';
export { createQueryRoutes, type QueryRoutesOptions } from './http/query-routes.js';
export {
  bodyParameters,
  queryParameters,
  readBodyParameters,
  SORTING_PROPERTY,
} from './http/request-parameters.js';
// Observability
export {
  type ContextAwarePinoOptions,
  createContextAwarePinoLogger,
  createPinoHttpMiddleware,
  createPinoOptions,
  type PinoLogger,
} from './observability/pino-logger.js';
export {
  createRequestContextMiddleware,
  getRequestContext,
  getRequestId,
  type RequestContext,
  setRequestContextValue,
} from './observability/request-context.js';
// Query types
export * from './queries/index.js';
// Query core
export * from './query/index.js';
// Utils
export { createLogger, getDefaultLogLevel, type Logger, type LogLevel } from './utils/logger.js';
