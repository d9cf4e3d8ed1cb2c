/**
 * Locale Resolver Chain
 *
 * Chain of responsibility over every registered LocaleResolver:
 *
 * 1. Query the registry for LOCALE_RESOLVER implementations (priority 1000
 *    when registration metadata omits one).
 * 2. Add the default resolver at priority 0 unless the application
 *    registered its own priority-0 resolver.
 * 3. Order by priority, highest first; ties keep registration order.
 * 4. Call each resolver in turn and stop at the first non-null locale.
 *    Later resolvers are never invoked once one has answered.
 * 5. Exhausting the chain is a configuration error.
 *
 * The chain holds no per-request state; MvcContext caches the result so a
 * request resolves its locale at most once.
 *
 * @module i18n/localeResolverChain
 */

import { NoLocaleResolvedError } from '../errors/ApiError';
import { orderByPriority } from '../registry/componentRegistry';
import type { ComponentRegistry, RegisteredComponent } from '../registry/types';
import { createLogger, extractError } from '../utils/logger';
import type { Locale } from './locale';
import {
  DEFAULT_RESOLVER_PRIORITY,
  LOCALE_RESOLVER,
  type LocaleResolver,
  type RequestInfo,
} from './types';

const log = createLogger('LOCALE');

/** Request with no headers or parameters, used to probe the chain at startup */
const EMPTY_REQUEST: RequestInfo = { method: 'GET', path: '/', headers: {}, query: {} };

export class LocaleResolverChain {
  constructor(
    private readonly registry: ComponentRegistry,
    private readonly defaultResolver: LocaleResolver
  ) {}

  /**
   * Resolvers in the order they will be consulted
   */
  orderedResolvers(): RegisteredComponent<LocaleResolver>[] {
    const registered = this.registry.listImplementations(LOCALE_RESOLVER);
    const hasOwnDefault = registered.some((c) => c.priority === DEFAULT_RESOLVER_PRIORITY);

    const all = hasOwnDefault
      ? registered
      : [...registered, { instance: this.defaultResolver, priority: DEFAULT_RESOLVER_PRIORITY }];

    return orderByPriority(all);
  }

  /**
   * Resolve the locale for one request
   *
   * A resolver that throws is logged and treated as having declined.
   *
   * @throws NoLocaleResolvedError when every resolver declines
   */
  resolve(request: RequestInfo): Locale {
    const resolvers = this.orderedResolvers();

    for (const { instance, priority } of resolvers) {
      let locale: Locale | null;
      try {
        locale = instance.resolve(request);
      } catch (error) {
        log.warn('Locale resolver failed, skipping', {
          resolver: instance.name,
          priority,
          ...extractError(error),
        });
        continue;
      }

      if (locale) {
        log.debug('Locale resolved', { resolver: instance.name, priority, locale: locale.tag });
        return locale;
      }
    }

    throw new NoLocaleResolvedError(resolvers.map((r) => r.instance.name));
  }

  /**
   * Fail fast at startup if a request without any locale hints would go
   * unresolved
   *
   * @throws NoLocaleResolvedError
   */
  verify(): Locale {
    return this.resolve(EMPTY_REQUEST);
  }
}

/**
 * One-shot resolution without keeping the chain around
 */
export function resolveRequestLocale(
  request: RequestInfo,
  registry: ComponentRegistry,
  defaultResolver: LocaleResolver
): Locale {
  return new LocaleResolverChain(registry, defaultResolver).resolve(request);
}
