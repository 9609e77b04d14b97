/**
 * Configuration loading and validation.
 *
 * @module config/config-service
 */

import { type BaseIssue, type BaseSchema, type InferOutput, safeParse } from 'valibot';
import { envProvider } from './providers.js';
import type { Config, ConfigOptions } from './types.js';

/**
 * Exception thrown when config validation fails.
 */
export class ConfigValidationException extends Error {
  constructor(
    message: string,
    public readonly issues: readonly BaseIssue<unknown>[]
  ) {
    super(message);
    this.name = 'ConfigValidationException';
  }
}

class ConfigImpl<TSchema extends BaseSchema<unknown, unknown, BaseIssue<unknown>>>
  implements Config<TSchema>
{
  constructor(public readonly data: InferOutput<TSchema>) {}

  get<K extends keyof InferOutput<TSchema>>(key: K): InferOutput<TSchema>[K] {
    return this.data[key];
  }
}

/**
 * Transforms a SNAKE_CASE or kebab-case string to camelCase.
 *
 * @example
 * ```typescript
 * toCamelCase('LOG_LEVEL') // 'logLevel'
 * toCamelCase('service-name') // 'serviceName'
 * ```
 */
export function toCamelCase(key: string): string {
  return key.toLowerCase().replace(/[_-]([a-z0-9])/g, (_, char: string) => char.toUpperCase());
}

/**
 * Load configuration from providers and validate it with Valibot.
 *
 * Providers run in order; later providers win on key conflicts.
 *
 * @throws {ConfigValidationException} If validation fails
 *
 * @example
 * ```typescript
 * const config = await createConfig({
 *   schema: appConfigSchema,
 *   providers: [dotenvProvider(), envProvider({ prefix: 'QUERY_BINDER_' })],
 *   transformKey: toCamelCase,
 * });
 *
 * config.get('logLevel'); // 'info'
 * ```
 */
export async function createConfig<
  TSchema extends BaseSchema<unknown, unknown, BaseIssue<unknown>>,
>(options: ConfigOptions<TSchema>): Promise<Config<TSchema>> {
  const { schema, providers = [envProvider()], transformKey } = options;

  let rawConfig: Record<string, unknown> = {};
  for (const provider of providers) {
    rawConfig = { ...rawConfig, ...(await provider()) };
  }

  if (transformKey) {
    rawConfig = Object.fromEntries(
      Object.entries(rawConfig).map(([key, value]) => [transformKey(key), value])
    );
  }

  const result = safeParse(schema, rawConfig);
  if (!result.success) {
    throw new ConfigValidationException('Configuration validation failed', result.issues);
  }

  return new ConfigImpl<TSchema>(result.output);
}
