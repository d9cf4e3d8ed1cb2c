/**
 * Redirect-Scope Manager
 *
 * Correlates a redirect with the request that follows it:
 *
 * - createScope: the redirecting request's bag is snapshotted under a fresh
 *   token (even when empty) and stored as Pending.
 * - resume: a later request presenting the token takes the entry
 *   (Pending → Consumed). Unknown, replayed or expired tokens simply yield
 *   no scope.
 * - complete: called when that request ends (Consumed → Destroyed),
 *   whatever its own outcome was.
 * - sweepExpired: runs on an unref'd interval and destroys Pending entries
 *   nobody came back for.
 *
 * ## Usage
 *
 * ```typescript
 * const scopes = new RedirectScopeManager(new MemoryRedirectScopeStore(), { ttlMs: 60000, sweepIntervalMs: 30000 });
 * scopes.start();
 *
 * const token = await scopes.createScope(bag);
 * // ...next request
 * const resumed = await scopes.resume(token);
 * await scopes.complete(token);
 * ```
 *
 * @module redirectScope/redirectScopeManager
 */

import crypto from 'crypto';
import { createLogger, extractError } from '../utils/logger';
import { maskToken } from '../utils/redact';
import { RedirectScopeBag } from './bag';
import type { RedirectScopeEntry, RedirectScopeStore } from './types';

const log = createLogger('SCOPE');

/** Tokens accepted from clients; anything else is ignored without a lookup */
const TOKEN_PATTERN = /^[A-Za-z0-9_-]{16,128}$/;

export interface RedirectScopeManagerOptions {
  /** How long a pending scope waits for its follow-up request */
  ttlMs: number;
  /** Orphan sweep interval */
  sweepIntervalMs: number;
  /** Token generator (default: 128 random bits, hex) */
  generateToken?: () => string;
  /** Clock (default: Date.now) */
  now?: () => number;
}

export interface ResumedScope {
  token: string;
  bag: RedirectScopeBag;
  createdAt: number;
}

export interface RedirectScopeStats {
  created: number;
  resumed: number;
  rejected: number;
  completed: number;
  expired: number;
  inFlight: number;
}

function generateToken(): string {
  return crypto.randomBytes(16).toString('hex');
}

export class RedirectScopeManager {
  private sweepInterval: NodeJS.Timeout | null = null;
  private readonly inFlight = new Set<string>();
  private readonly generateToken: () => string;
  private readonly now: () => number;
  private stats = { created: 0, resumed: 0, rejected: 0, completed: 0, expired: 0 };

  constructor(
    private readonly store: RedirectScopeStore,
    private readonly options: RedirectScopeManagerOptions
  ) {
    this.generateToken = options.generateToken ?? generateToken;
    this.now = options.now ?? Date.now;
  }

  /**
   * Active → Pending
   *
   * @returns the token the redirect response must carry
   */
  async createScope(bag: RedirectScopeBag): Promise<string> {
    const entry: RedirectScopeEntry = {
      token: this.generateToken(),
      bag: bag.snapshot(),
      createdAt: this.now(),
      expiresAfter: this.options.ttlMs,
    };

    await this.store.save(entry);
    this.stats.created++;

    log.debug('Redirect scope created', {
      token: maskToken(entry.token),
      keys: Object.keys(entry.bag),
    });
    return entry.token;
  }

  /**
   * Pending → Consumed
   *
   * @returns the restored scope, or null when the token is absent, malformed,
   * already consumed or expired
   */
  async resume(token: string | undefined): Promise<ResumedScope | null> {
    if (!token || !TOKEN_PATTERN.test(token)) {
      if (token) this.stats.rejected++;
      return null;
    }

    const entry = await this.store.consume(token, this.now());
    if (!entry) {
      this.stats.rejected++;
      log.debug('Redirect scope token not found or expired', { token: maskToken(token) });
      return null;
    }

    this.inFlight.add(token);
    this.stats.resumed++;
    log.debug('Redirect scope resumed', { token: maskToken(token), keys: Object.keys(entry.bag) });

    return { token, bag: RedirectScopeBag.restore(entry.bag), createdAt: entry.createdAt };
  }

  /**
   * Consumed → Destroyed; ignored for tokens this manager did not resume
   * or already completed
   */
  async complete(token: string): Promise<void> {
    if (!this.inFlight.delete(token)) return;

    await this.store.release(token);
    this.stats.completed++;
    log.debug('Redirect scope destroyed', { token: maskToken(token) });
  }

  /**
   * Pending → Destroyed for every expired entry
   */
  async sweepExpired(): Promise<number> {
    const removed = await this.store.sweep(this.now());
    if (removed > 0) {
      this.stats.expired += removed;
      log.debug('Expired redirect scopes removed', { removed });
    }
    return removed;
  }

  /**
   * Start the periodic orphan sweep
   */
  start(): void {
    if (this.sweepInterval) return;

    this.sweepInterval = setInterval(() => {
      this.sweepExpired().catch((error) => {
        log.error('Redirect scope sweep failed', extractError(error));
      });
    }, this.options.sweepIntervalMs);

    // Don't keep process alive just for the sweep
    this.sweepInterval.unref();

    log.info('Redirect scope sweep started', {
      store: this.store.kind,
      ttlMs: this.options.ttlMs,
      intervalMs: this.options.sweepIntervalMs,
    });
  }

  stop(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
      log.debug('Redirect scope sweep stopped');
    }
  }

  isRunning(): boolean {
    return this.sweepInterval !== null;
  }

  getStats(): RedirectScopeStats {
    return { ...this.stats, inFlight: this.inFlight.size };
  }

  /**
   * Stop the sweep and close the store
   */
  async close(): Promise<void> {
    this.stop();
    this.inFlight.clear();
    await this.store.close();
  }
}
