/**
 * Built-in configuration providers.
 *
 * @module config/providers
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'dotenv';
import type { ConfigProvider } from './types.js';

export interface EnvProviderOptions {
  /**
   * Only include variables starting with this prefix.
   *
   * @example 'QUERY_BINDER_'
   */
  prefix?: string;

  /**
   * Whether to remove the prefix from the key names.
   *
   * @default true
   */
  removePrefix?: boolean;
}

/**
 * Creates a provider that loads configuration from process.env.
 *
 * @example
 * ```typescript
 * envProvider({ prefix: 'QUERY_BINDER_' }) // QUERY_BINDER_LOG_LEVEL -> LOG_LEVEL
 * ```
 */
export function envProvider(options: EnvProviderOptions = {}): ConfigProvider {
  return async () => {
    const { prefix, removePrefix = true } = options;
    const config: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(process.env)) {
      if (value === undefined) continue;

      if (!prefix) {
        config[key] = value;
      } else if (key.startsWith(prefix)) {
        config[removePrefix ? key.slice(prefix.length) : key] = value;
      }
    }

    return config;
  };
}

export interface DotenvProviderOptions {
  /**
   * Path to the .env file to load.
   *
   * @default '.env'
   */
  path?: string;
}

/**
 * Creates a provider that loads configuration from a .env file.
 * A missing file yields an empty config.
 */
export function dotenvProvider(options: DotenvProviderOptions = {}): ConfigProvider {
  return async () => {
    const { path = '.env' } = options;

    try {
      return parse(await readFile(path, 'utf8'));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }
  };
}

/**
 * Creates a provider from a static object.
 * Useful for defaults and for tests.
 */
export function objectProvider(config: Record<string, unknown>): ConfigProvider {
  return async () => config;
}
