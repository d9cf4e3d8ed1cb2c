/**
 * Redirect-scope types
 *
 * Lifecycle per token:
 *
 *   Active ──redirect──▶ Pending ──next request──▶ Consumed ──request ends──▶ Destroyed
 *                           └────────────── expiry ─────────────────────────────┘
 *
 * Active is the bag attached to the request that issues the redirect; it
 * never reaches a store. Stores own Pending and Consumed entries.
 *
 * @module redirectScope/types
 */

import type { ScopeRecord } from './bag';

export type RedirectScopeState = 'active' | 'pending' | 'consumed' | 'destroyed';

export interface RedirectScopeEntry {
  token: string;
  bag: ScopeRecord;
  /** Epoch milliseconds */
  createdAt: number;
  /** Milliseconds after createdAt at which an unconsumed entry is an orphan */
  expiresAfter: number;
}

/**
 * Token-keyed table of redirect scopes
 *
 * Implementations must make consume() atomic: for a given token at most one
 * caller ever receives the entry. sweep() must never remove an entry that has
 * been consumed but not yet released.
 */
export interface RedirectScopeStore {
  readonly kind: 'memory' | 'redis';

  /** Store a new Pending entry; fails if the token already exists */
  save(entry: RedirectScopeEntry): Promise<void>;

  /** Pending → Consumed; null for unknown, consumed or expired tokens */
  consume(token: string, now: number): Promise<RedirectScopeEntry | null>;

  /** Consumed → Destroyed */
  release(token: string): Promise<void>;

  /** Pending → Destroyed for expired entries; returns how many were removed */
  sweep(now: number): Promise<number>;

  close(): Promise<void>;
}

export function isExpired(entry: RedirectScopeEntry, now: number): boolean {
  return now >= entry.createdAt + entry.expiresAfter;
}
