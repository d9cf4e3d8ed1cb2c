/**
 * Redis redirect-scope store
 *
 * Shares redirect scopes between server instances, so the follow-up request
 * may land on a different instance than the one that issued the redirect.
 *
 * - save:    SET key value PX ttl NX (a token is never overwritten)
 * - consume: GETDEL key, atomic across instances
 * - sweep:   handled by Redis key expiry
 *
 * Once consumed the entry only exists in the consuming request's memory, so
 * release has nothing left to delete. Bag values must be JSON-serializable.
 *
 * @module redirectScope/redisStore
 */

import { z } from 'zod';
import { ErrorCodes, InternalError, RequestError } from '../errors/ApiError';
import { createLogger, extractError } from '../utils/logger';
import { maskToken } from '../utils/redact';
import { isExpired, type RedirectScopeEntry, type RedirectScopeStore } from './types';

const log = createLogger('SCOPE:REDIS');

/**
 * The subset of the ioredis client this store needs
 */
export interface RedirectScopeRedisClient {
  set(key: string, value: string, mode: 'PX', ttlMs: number, condition: 'NX'): Promise<'OK' | null>;
  getdel(key: string): Promise<string | null>;
  quit(): Promise<'OK'>;
}

const StoredEntrySchema = z.object({
  token: z.string(),
  bag: z.record(z.unknown()),
  createdAt: z.number(),
  expiresAfter: z.number(),
});

export const DEFAULT_KEY_PREFIX = 'mvc:redirect-scope';

export class RedisRedirectScopeStore implements RedirectScopeStore {
  readonly kind = 'redis' as const;

  constructor(
    private readonly redis: RedirectScopeRedisClient,
    private readonly prefix: string = DEFAULT_KEY_PREFIX
  ) {}

  private key(token: string): string {
    return `${this.prefix}:${token}`;
  }

  async save(entry: RedirectScopeEntry): Promise<void> {
    let serialized: string;
    try {
      serialized = JSON.stringify(entry);
    } catch (error) {
      throw new RequestError('Redirect scope values must be JSON-serializable', ErrorCodes.REQUEST_ERROR, {
        keys: Object.keys(entry.bag),
        ...extractError(error),
      });
    }

    const result = await this.redis.set(this.key(entry.token), serialized, 'PX', entry.expiresAfter, 'NX');
    if (result !== 'OK') {
      throw new InternalError('Redirect scope token already in use');
    }
  }

  async consume(token: string, now: number): Promise<RedirectScopeEntry | null> {
    const raw = await this.redis.getdel(this.key(token));
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log.warn('Discarding unreadable redirect scope', { token: maskToken(token), ...extractError(error) });
      return null;
    }

    const result = StoredEntrySchema.safeParse(parsed);
    if (!result.success || result.data.token !== token) {
      log.warn('Discarding malformed redirect scope', { token: maskToken(token) });
      return null;
    }

    // Redis expiry has millisecond precision but may lag slightly
    if (isExpired(result.data, now)) {
      return null;
    }

    return result.data;
  }

  async release(token: string): Promise<void> {
    log.debug('Redirect scope released', { token: maskToken(token) });
  }

  async sweep(): Promise<number> {
    return 0;
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
