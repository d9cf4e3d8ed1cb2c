/**
 * Redirect Scope Module
 *
 * Values that survive exactly one redirect, correlated by a token.
 *
 * @module redirectScope
 */

export { RedirectScopeBag } from './bag';
export type { ScopeRecord } from './bag';
export { isExpired } from './types';
export type { RedirectScopeEntry, RedirectScopeState, RedirectScopeStore } from './types';
export { MemoryRedirectScopeStore } from './memoryStore';
export { RedisRedirectScopeStore, DEFAULT_KEY_PREFIX } from './redisStore';
export type { RedirectScopeRedisClient } from './redisStore';
export { RedirectScopeManager } from './redirectScopeManager';
export type { RedirectScopeManagerOptions, RedirectScopeStats, ResumedScope } from './redirectScopeManager';
export {
  CookieTokenCarrier,
  QueryParameterTokenCarrier,
  setQueryParameter,
  createTokenCarrier,
  readCookie,
} from './tokenCarrier';
export type { CookieTokenCarrierOptions, TokenCarrier } from './tokenCarrier';
