import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { dotenvProvider, envProvider, objectProvider } from '../../src/config/providers.js';

describe('envProvider', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // Reset process.env before each test
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should load all environment variables', async () => {
    process.env.TEST_VAR = 'value1';
    process.env.ANOTHER_VAR = 'value2';

    const provider = envProvider();
    const config = await provider();

    expect(config.TEST_VAR).toBe('value1');
    expect(config.ANOTHER_VAR).toBe('value2');
  });

  it('should filter by prefix', async () => {
    process.env.QUERY_BINDER_LOG_LEVEL = 'debug';
    process.env.QUERY_BINDER_BASE_PATH = '/engine-rest';
    process.env.OTHER_VAR = 'excluded';

    const provider = envProvider({ prefix: 'QUERY_BINDER_' });
    const config = await provider();

    expect(config).toEqual({ LOG_LEVEL: 'debug', BASE_PATH: '/engine-rest' });
  });

  it('should keep prefix when removePrefix is false', async () => {
    process.env.QUERY_BINDER_LOG_LEVEL = 'debug';

    const provider = envProvider({ prefix: 'QUERY_BINDER_', removePrefix: false });
    const config = await provider();

    expect(config.QUERY_BINDER_LOG_LEVEL).toBe('debug');
    expect(config.LOG_LEVEL).toBeUndefined();
  });

  it('should skip undefined values', async () => {
    process.env.DEFINED = 'value';
    process.env.UNDEFINED = undefined;

    const provider = envProvider();
    const config = await provider();

    expect(config.DEFINED).toBe('value');
    expect('UNDEFINED' in config).toBe(false);
  });

  it('should handle empty environment', async () => {
    process.env = {};

    const provider = envProvider();
    const config = await provider();

    expect(Object.keys(config)).toHaveLength(0);
  });
});

describe('objectProvider', () => {
  it('should return the provided object', async () => {
    const config = { LOG_LEVEL: 'warn', SERVICE_NAME: 'incident-api' };

    expect(await objectProvider(config)()).toEqual(config);
  });
});

describe('dotenvProvider', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'query-binder-config-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should return empty object when file does not exist', async () => {
    const provider = dotenvProvider({ path: join(directory, '.env.missing') });
    const config = await provider();
    expect(config).toEqual({});
  });

  it('should parse the file at the given path', async () => {
    const path = join(directory, '.env');
    await writeFile(
      path,
      ['# local overrides', 'QUERY_BINDER_LOG_LEVEL=debug', 'QUERY_BINDER_BASE_PATH="/engine-rest"'].join(
        '\n'
      )
    );

    const config = await dotenvProvider({ path })();

    expect(config).toEqual({
      QUERY_BINDER_LOG_LEVEL: 'debug',
      QUERY_BINDER_BASE_PATH: '/engine-rest',
    });
  });

  it('should rethrow errors other than a missing file', async () => {
    const provider = dotenvProvider({ path: directory });
    await expect(provider()).rejects.toMatchObject({ code: 'EISDIR' });
  });
});
