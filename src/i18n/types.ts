/**
 * Locale Resolution Types
 *
 * @module i18n/types
 */

import type { IncomingHttpHeaders } from 'http';
import { defineCapability } from '../registry/componentRegistry';
import type { Locale } from './locale';

/**
 * The parts of an inbound request that resolvers may read
 *
 * An Express Request satisfies this interface.
 */
export interface RequestInfo {
  readonly method: string;
  readonly path: string;
  readonly headers: IncomingHttpHeaders;
  readonly query: Record<string, unknown>;
}

/**
 * Pluggable locale resolution strategy
 *
 * Returns null to decline, letting the next resolver in the chain try.
 * Must be synchronous: the chain stops at the first non-null result.
 */
export interface LocaleResolver {
  readonly name: string;
  resolve(request: RequestInfo): Locale | null;
}

/**
 * Capability under which locale resolvers are registered
 */
export const LOCALE_RESOLVER = defineCapability<LocaleResolver>('LocaleResolver');

/**
 * Priority of the built-in Accept-Language resolver
 */
export const DEFAULT_RESOLVER_PRIORITY = 0;

/**
 * Translation options: interpolation values plus an optional locale
 */
export interface TranslateOptions {
  locale?: string;
  [key: string]: string | number | boolean | undefined;
}

/**
 * Read a single header value (first one if repeated)
 */
export function headerValue(request: RequestInfo, name: string): string | undefined {
  const value = request.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
