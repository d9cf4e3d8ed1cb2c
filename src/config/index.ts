/**
 * Application Configuration
 *
 * Maps environment variables onto the nested AppConfig object and validates
 * it before anything else starts. Invalid configuration is fatal.
 */

import dotenv from 'dotenv';
import path from 'path';
import { assertValidConfig } from './schema';
import type { AppConfig } from './types';

// Load environment variables
dotenv.config({ path: path.join(__dirname, '../../.env') });

export * from './types';
export { validateConfigSchema, assertValidConfig } from './schema';

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  // Number() rejects trailing garbage that parseInt would accept
  return Number(value);
}

function parseBoolean(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

/**
 * Build and validate configuration from an environment map
 *
 * @throws Error listing every invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const redisUrl = env.REDIS_URL?.trim() ?? '';

  const raw = {
    server: {
      nodeEnv: env.NODE_ENV || 'development',
      port: parseInteger(env.PORT, 3000),
      basePath: env.MVC_BASE_PATH ?? '',
    },
    i18n: {
      defaultLocale: env.DEFAULT_LOCALE || 'en',
    },
    mvc: {
      viewFolder: env.MVC_VIEW_FOLDER ?? 'views/',
      redirectStatus: parseBoolean(env.MVC_LEGACY_REDIRECTS) ? 302 : 303,
    },
    redirectScope: {
      ttlMs: parseInteger(env.REDIRECT_SCOPE_TTL_MS, 60000),
      sweepIntervalMs: parseInteger(env.REDIRECT_SCOPE_SWEEP_INTERVAL_MS, 30000),
      carrier: env.REDIRECT_SCOPE_CARRIER || 'query',
      paramName: env.REDIRECT_SCOPE_PARAM || 'scopeId',
      cookieName: env.REDIRECT_SCOPE_COOKIE || 'mvc.redirect-scope',
    },
    redis: {
      url: redisUrl,
      enabled: redisUrl.length > 0,
    },
    logging: {
      level: env.LOG_LEVEL?.toLowerCase() || 'info',
    },
  };

  assertValidConfig(raw);
  return raw;
}

let cachedConfig: AppConfig | null = null;

/**
 * Get the process-wide configuration (validated once)
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Drop the cached configuration (tests)
 */
export function resetConfig(): void {
  cachedConfig = null;
}
