/**
 * Type definitions for configuration management.
 *
 * @module config/types
 */

import type { BaseIssue, BaseSchema, InferOutput } from 'valibot';

/**
 * A config provider loads configuration from a specific source.
 * Later providers overwrite keys of earlier ones.
 */
export type ConfigProvider = () => Promise<Record<string, unknown>>;

/**
 * Options for creating a config service.
 */
export interface ConfigOptions<TSchema extends BaseSchema<unknown, unknown, BaseIssue<unknown>>> {
  /**
   * Valibot schema to validate the configuration.
   */
  schema: TSchema;

  /**
   * Providers to load from, in order of increasing precedence.
   *
   * @default [envProvider()]
   */
  providers?: ConfigProvider[];

  /**
   * Optional function to transform keys (e.g. `LOG_LEVEL` -> `logLevel`).
   */
  transformKey?: (key: string) => string;
}

/**
 * A validated, type-safe configuration object.
 */
export interface Config<TSchema extends BaseSchema<unknown, unknown, BaseIssue<unknown>>> {
  readonly data: InferOutput<TSchema>;

  get<K extends keyof InferOutput<TSchema>>(key: K): InferOutput<TSchema>[K];
}
