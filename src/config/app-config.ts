import { type InferOutput, object, optional, picklist, pipe, string, trim } from 'valibot';
import { LOG_LEVEL_NAMES } from '../utils/logger.js';
import { createConfig, toCamelCase } from './config-service.js';
import { envProvider } from './providers.js';
import type { Config, ConfigProvider } from './types.js';

/**
 * Prefix of the environment variables read by {@link loadAppConfig}
 */
export const ENV_PREFIX = 'QUERY_BINDER_';

/**
 * Settings of the HTTP application, after key transformation
 * (`QUERY_BINDER_LOG_LEVEL` -> `logLevel`).
 */
export const appConfigSchema = object({
  logLevel: optional(picklist(LOG_LEVEL_NAMES), 'info'),
  serviceName: optional(pipe(string(), trim()), 'query-binder'),
  /** Path the query routes are mounted under */
  basePath: optional(pipe(string(), trim()), '/'),
});

export type AppConfig = InferOutput<typeof appConfigSchema>;

/**
 * Load the application config, by default from `QUERY_BINDER_*` environment variables.
 */
export function loadAppConfig(
  providers: ConfigProvider[] = [envProvider({ prefix: ENV_PREFIX })]
): Promise<Config<typeof appConfigSchema>> {
  return createConfig({ schema: appConfigSchema, providers, transformKey: toCamelCase });
}
