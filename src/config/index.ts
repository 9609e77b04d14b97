/**
 * Configuration management: load settings from environment variables,
 * .env files or plain objects and validate them with Valibot schemas.
 *
 * @module config
 */

export { type AppConfig, appConfigSchema, ENV_PREFIX, loadAppConfig } from './app-config.js';
export { ConfigValidationException, createConfig, toCamelCase } from './config-service.js';
export {
  type DotenvProviderOptions,
  dotenvProvider,
  type EnvProviderOptions,
  envProvider,
  objectProvider,
} from './providers.js';
export type { Config, ConfigOptions, ConfigProvider } from './types.js';
