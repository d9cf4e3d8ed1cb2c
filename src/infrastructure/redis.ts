/**
 * Redis Infrastructure Module
 *
 * Connection management for the redirect-scope store.
 *
 * ## Features
 *
 * - Automatic fallback to the in-memory store when Redis is unavailable
 * - Graceful degradation with logging
 * - Credentials masked in logs
 *
 * ## Usage
 *
 * ```typescript
 * import { createRedirectScopeStore } from './infrastructure/redis';
 *
 * // At startup
 * const store = await createRedirectScopeStore(config.redis);
 * ```
 */

import Redis from 'ioredis';
import type { RedisConfig } from '../config/types';
import { MemoryRedirectScopeStore } from '../redirectScope/memoryStore';
import { RedisRedirectScopeStore, type RedirectScopeRedisClient } from '../redirectScope/redisStore';
import type { RedirectScopeStore } from '../redirectScope/types';
import { createLogger, extractError } from '../utils/logger';

const log = createLogger('RedisInfra');

const CONNECT_TIMEOUT_MS = 10000;

/**
 * Hide credentials in a Redis URL
 */
export function maskRedisUrl(url: string): string {
  return url.replace(/\/\/.*@/, '//<credentials>@');
}

/**
 * Create a client and wait until it is ready (not just connected)
 */
export async function connectRedis(url: string, timeoutMs: number = CONNECT_TIMEOUT_MS): Promise<Redis> {
  const client = new Redis(url, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      if (times > 10) {
        log.error('Redis connection failed after 10 retries');
        return null; // Stop retrying
      }
      const delay = Math.min(times * 100, 3000);
      log.warn(`Redis connection retry ${times}, waiting ${delay}ms`);
      return delay;
    },
    reconnectOnError(err) {
      return err.message.includes('READONLY');
    },
  });

  try {
    await new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new Error('Redis connection timeout'));
      }, timeoutMs);

      client.once('ready', () => {
        clearTimeout(timeout);
        resolve();
      });

      client.once('error', (err) => {
        clearTimeout(timeout);
        reject(err);
      });
    });
  } catch (error) {
    client.disconnect();
    throw error;
  }

  return client;
}

/**
 * Narrow an ioredis client to what the redirect-scope store uses
 */
export function toRedirectScopeClient(redis: Redis): RedirectScopeRedisClient {
  return {
    set: (key, value, mode, ttlMs, condition) => redis.set(key, value, mode, ttlMs, condition),
    getdel: (key) => redis.getdel(key),
    quit: () => redis.quit(),
  };
}

/**
 * Pick the redirect-scope store for this process
 *
 * Redis when configured and reachable, otherwise the in-memory store.
 */
export async function createRedirectScopeStore(config: RedisConfig): Promise<RedirectScopeStore> {
  if (!config.enabled) {
    log.info('Redis not configured, using in-memory redirect-scope store');
    return new MemoryRedirectScopeStore();
  }

  try {
    log.info('Connecting to Redis', { url: maskRedisUrl(config.url) });
    const client = await connectRedis(config.url);
    log.info('Redis redirect-scope store ready');
    return new RedisRedirectScopeStore(toRedirectScopeClient(client));
  } catch (error) {
    log.error('Failed to initialize Redis, falling back to in-memory', extractError(error));
    return new MemoryRedirectScopeStore();
  }
}
