/**
 * Configuration Loading Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { getConfig, loadConfig, resetConfig, validateConfigSchema } from '../../../src/config';

describe('loadConfig', () => {
  beforeEach(() => {
    // Validation failures print a banner before throwing
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      server: { nodeEnv: 'development', port: 3000, basePath: '' },
      i18n: { defaultLocale: 'en' },
      mvc: { viewFolder: 'views/', redirectStatus: 303 },
      redirectScope: {
        ttlMs: 60000,
        sweepIntervalMs: 30000,
        carrier: 'query',
        paramName: 'scopeId',
        cookieName: 'mvc.redirect-scope',
      },
      redis: { url: '', enabled: false },
      logging: { level: 'info' },
    });
  });

  it('should map environment variables', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      MVC_BASE_PATH: '/shop',
      DEFAULT_LOCALE: 'de-AT',
      MVC_LEGACY_REDIRECTS: 'true',
      REDIRECT_SCOPE_TTL_MS: '5000',
      REDIRECT_SCOPE_CARRIER: 'cookie',
      REDIS_URL: ' redis://cache:6379 ',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.server).toEqual({ nodeEnv: 'production', port: 8080, basePath: '/shop' });
    expect(config.i18n.defaultLocale).toBe('de-AT');
    expect(config.mvc.redirectStatus).toBe(302);
    expect(config.redirectScope).toMatchObject({ ttlMs: 5000, carrier: 'cookie' });
    expect(config.redis).toEqual({ url: 'redis://cache:6379', enabled: true });
    expect(config.logging.level).toBe('debug');
  });

  it.each([
    [{ MVC_BASE_PATH: '/shop/' }, 'server.basePath'],
    [{ MVC_BASE_PATH: 'shop' }, 'server.basePath'],
    [{ PORT: '80a' }, 'server.port'],
    [{ DEFAULT_LOCALE: 'en_US' }, 'i18n.defaultLocale'],
    [{ REDIRECT_SCOPE_TTL_MS: '10' }, 'redirectScope.ttlMs'],
    [{ REDIRECT_SCOPE_CARRIER: 'header' }, 'redirectScope.carrier'],
    [{ LOG_LEVEL: 'verbose' }, 'logging.level'],
  ])('should reject %j', (env, path) => {
    expect(() => loadConfig(env)).toThrow(`Configuration validation failed: ${path}:`);
  });
});

describe('getConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('should load once and reuse the result', () => {
    const first = getConfig();

    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});

describe('validateConfigSchema', () => {
  it('should list every problem with its path', () => {
    const result = validateConfigSchema({ server: { nodeEnv: 'staging', port: -1, basePath: '' } });

    expect(result.success).toBe(false);
    expect(result.errors).toContain('server.port: Number must be greater than or equal to 0');
    expect(result.errors.some((e) => e.startsWith('server.nodeEnv:'))).toBe(true);
    expect(result.errors.some((e) => e.startsWith('redirectScope:'))).toBe(true);
  });
});
