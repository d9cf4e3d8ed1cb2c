/**
 * Request Context
 *
 * Provides request-scoped context using AsyncLocalStorage so the request ID
 * is available to every log line written while a request is processed,
 * without passing it through each call.
 *
 * Usage:
 *   // In middleware (set up by requestLogger)
 *   requestContext.run({ requestId: 'abc123', startTime: Date.now() }, next);
 *
 *   // Anywhere in request handling
 *   const ctx = requestContext.get();
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface RequestContextData {
  /** Unique request correlation ID for tracing */
  requestId: string;
  /** Request start time for duration calculation */
  startTime: number;
  /** Request path */
  path?: string;
  /** Request method */
  method?: string;
  /** Resolved request locale, once known */
  locale?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContextData>();

export const requestContext = {
  /**
   * Run a function within a request context
   */
  run<T>(context: RequestContextData, fn: () => T): T {
    return asyncLocalStorage.run(context, fn);
  },

  /**
   * Get the current request context (undefined outside request scope)
   */
  get(): RequestContextData | undefined {
    return asyncLocalStorage.getStore();
  },

  /**
   * Get the current request ID (returns 'no-request' if not in request scope)
   */
  getRequestId(): string {
    return asyncLocalStorage.getStore()?.requestId ?? 'no-request';
  },

  /**
   * Record the locale resolved for the current request
   */
  setLocale(locale: string): void {
    const store = asyncLocalStorage.getStore();
    if (store) {
      store.locale = locale;
    }
  },

  /**
   * Calculate request duration in milliseconds
   */
  getDuration(): number {
    const store = asyncLocalStorage.getStore();
    if (!store) return 0;
    return Date.now() - store.startTime;
  },

  /**
   * Generate a new request ID
   */
  generateRequestId(): string {
    // Short format: 8 characters from UUID for readability in logs
    return randomUUID().split('-')[0];
  },
};

export default requestContext;
