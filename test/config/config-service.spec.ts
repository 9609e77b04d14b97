import { number, object, optional, string } from 'valibot';
import { describe, expect, it } from 'vitest';
import {
  ConfigValidationException,
  createConfig,
  toCamelCase,
} from '../../src/config/config-service.js';
import { objectProvider } from '../../src/config/providers.js';

describe('createConfig', () => {
  it('should create config from single provider', async () => {
    const schema = object({
      name: string(),
      port: number(),
    });

    const config = await createConfig({
      schema,
      providers: [
        objectProvider({
          name: 'test-app',
          port: 3000,
        }),
      ],
    });

    expect(config.get('name')).toBe('test-app');
    expect(config.get('port')).toBe(3000);
    expect(config.data).toEqual({
      name: 'test-app',
      port: 3000,
    });
  });

  it('should merge multiple providers in order', async () => {
    const schema = object({
      name: string(),
      port: number(),
    });

    const config = await createConfig({
      schema,
      providers: [
        objectProvider({ name: 'first', port: 3000 }),
        objectProvider({ name: 'second' }), // Overrides name, keeps port
      ],
    });

    expect(config.get('name')).toBe('second');
    expect(config.get('port')).toBe(3000);
  });

  it('should validate config and throw on invalid data', async () => {
    const schema = object({
      name: string(),
      port: number(),
    });

    const result = createConfig({
      schema,
      providers: [objectProvider({ name: 'test', port: 'invalid' })],
    });

    await expect(result).rejects.toThrow(ConfigValidationException);
    await expect(result).rejects.toMatchObject({
      message: 'Configuration validation failed',
      issues: [expect.objectContaining({ path: [expect.objectContaining({ key: 'port' })] })],
    });
  });

  it('should handle optional fields', async () => {
    const schema = object({
      name: string(),
      description: optional(string()),
    });

    const config = await createConfig({
      schema,
      providers: [objectProvider({ name: 'test' })],
    });

    expect(config.get('name')).toBe('test');
    expect(config.get('description')).toBeUndefined();
  });

  it('should transform keys when transformKey is provided', async () => {
    const schema = object({
      serviceName: string(),
      basePath: string(),
    });

    const config = await createConfig({
      schema,
      providers: [objectProvider({ SERVICE_NAME: 'query-binder', BASE_PATH: '/engine-rest' })],
      transformKey: toCamelCase,
    });

    expect(config.data).toEqual({ serviceName: 'query-binder', basePath: '/engine-rest' });
  });

  it('should use envProvider by default', async () => {
    const schema = object({
      TEST_VAR: string(),
    });

    process.env.TEST_VAR = 'from-env';

    const config = await createConfig({ schema });

    expect(config.get('TEST_VAR')).toBe('from-env');

    delete process.env.TEST_VAR;
  });
});

describe('toCamelCase', () => {
  it('should convert SNAKE_CASE and kebab-case keys', () => {
    expect(toCamelCase('LOG_LEVEL')).toBe('logLevel');
    expect(toCamelCase('service-name')).toBe('serviceName');
    expect(toCamelCase('BASE_PATH_2')).toBe('basePath2');
  });

  it('should lower-case single words', () => {
    expect(toCamelCase('PORT')).toBe('port');
  });
});
