import { describe, expect, test } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
  test('applies defaults in development and generates a secret', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      NODE_ENV: 'development',
      PORT: 4000,
      JWT_ALGORITHM: 'HS256',
      TOKEN_TTL_SECONDS: 900,
      TOKEN_MAX_USES: 1000,
      STORE_DRIVER: 'memory',
      STORE_TIMEOUT_MS: 2000,
      ADMIN_USERNAME: 'admin',
      ADMIN_PASSWORD: 'change-me',
      secretSource: 'generated',
    });
    expect(config.JWT_SECRET).toHaveLength(43);
  });

  test('reads quota, ttl and secret from the environment', () => {
    const config = loadConfig({
      JWT_SECRET: 'test-secret',
      JWT_ALGORITHM: 'HS384',
      TOKEN_MAX_USES: '3',
      TOKEN_TTL_SECONDS: '60',
    });

    expect(config).toMatchObject({
      JWT_SECRET: 'test-secret',
      JWT_ALGORITHM: 'HS384',
      TOKEN_MAX_USES: 3,
      TOKEN_TTL_SECONDS: 60,
      secretSource: 'env',
    });
  });

  test('refuses to start in production without a signing secret', () => {
    expect(() => loadConfig({ NODE_ENV: 'production', ADMIN_PASSWORD: 'test-password' })).toThrowError(ConfigError);
    expect(() => loadConfig({ NODE_ENV: 'production', ADMIN_PASSWORD: 'test-password' })).toThrowError(
      'invalid configuration: JWT_SECRET: required in production',
    );
  });

  test('treats an empty secret as missing', () => {
    expect(() => loadConfig({ NODE_ENV: 'production', JWT_SECRET: '', ADMIN_PASSWORD: 'test-password' })).toThrowError(
      ConfigError,
    );
  });

  test('requires a redis url for the redis driver', () => {
    expect(() => loadConfig({ STORE_DRIVER: 'redis' })).toThrowError('REDIS_URL: required when STORE_DRIVER=redis');
  });

  test.each([{ TOKEN_MAX_USES: '0' }, { TOKEN_MAX_USES: 'many' }, { JWT_ALGORITHM: 'RS256' }])(
    'rejects %j',
    (env) => {
      expect(() => loadConfig(env)).toThrowError(ConfigError);
    },
  );
});
