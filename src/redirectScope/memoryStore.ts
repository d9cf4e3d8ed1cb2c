/**
 * In-memory redirect-scope store
 *
 * Single-process store. Every method mutates the table before its first
 * await point, so each call runs to completion without interleaving with
 * another request's call: a token can be consumed once, and a sweep never
 * observes an entry halfway through consumption.
 *
 * @module redirectScope/memoryStore
 */

import { InternalError } from '../errors/ApiError';
import { isExpired, type RedirectScopeEntry, type RedirectScopeStore } from './types';

interface StoredEntry {
  entry: RedirectScopeEntry;
  state: 'pending' | 'consumed';
}

export class MemoryRedirectScopeStore implements RedirectScopeStore {
  readonly kind = 'memory' as const;
  private readonly entries = new Map<string, StoredEntry>();

  async save(entry: RedirectScopeEntry): Promise<void> {
    if (this.entries.has(entry.token)) {
      throw new InternalError('Redirect scope token already in use');
    }
    this.entries.set(entry.token, {
      entry: { ...entry, bag: { ...entry.bag } },
      state: 'pending',
    });
  }

  async consume(token: string, now: number): Promise<RedirectScopeEntry | null> {
    const stored = this.entries.get(token);
    if (!stored || stored.state !== 'pending') {
      return null;
    }

    if (isExpired(stored.entry, now)) {
      this.entries.delete(token);
      return null;
    }

    stored.state = 'consumed';
    return stored.entry;
  }

  async release(token: string): Promise<void> {
    if (this.entries.get(token)?.state === 'consumed') {
      this.entries.delete(token);
    }
  }

  async sweep(now: number): Promise<number> {
    let removed = 0;
    for (const [token, stored] of this.entries) {
      // Consumed entries belong to an in-flight request and are released by it
      if (stored.state === 'pending' && isExpired(stored.entry, now)) {
        this.entries.delete(token);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Number of live entries, pending and consumed
   */
  get size(): number {
    return this.entries.size;
  }

  stateOf(token: string): 'pending' | 'consumed' | 'destroyed' {
    return this.entries.get(token)?.state ?? 'destroyed';
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
