/**
 * Locale Resolver Chain Tests
 *
 * Invocation counts verify that resolution stops at the first answer.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Locale } from '../../../src/i18n/locale';
import { LocaleResolverChain, resolveRequestLocale } from '../../../src/i18n/localeResolverChain';
import { DefaultLocaleResolver } from '../../../src/i18n/resolvers';
import { LOCALE_RESOLVER, type LocaleResolver } from '../../../src/i18n/types';
import { NoLocaleResolvedError } from '../../../src/errors/ApiError';
import { InMemoryComponentRegistry } from '../../../src/registry/componentRegistry';
import { createRequest } from '../../helpers/requests';

vi.mock('../../../src/utils/logger', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/utils/logger')>();
  return {
    ...actual,
    createLogger: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  };
});

function countingResolver(name: string, tag: string | null) {
  const resolve = vi.fn(() => (tag ? Locale.of(tag) : null));
  const resolver: LocaleResolver = { name, resolve };
  return { resolver, resolve };
}

describe('LocaleResolverChain', () => {
  let registry: InMemoryComponentRegistry;
  let defaultResolver: DefaultLocaleResolver;
  let chain: LocaleResolverChain;

  beforeEach(() => {
    registry = new InMemoryComponentRegistry();
    defaultResolver = new DefaultLocaleResolver(Locale.of('en'));
    chain = new LocaleResolverChain(registry, defaultResolver);
  });

  it('should use the default resolver when nothing is registered', () => {
    expect(chain.orderedResolvers().map((r) => [r.instance.name, r.priority])).toEqual([['accept-language', 0]]);
    expect(chain.resolve(createRequest({ 'accept-language': 'sv' })).tag).toBe('sv');
    expect(chain.resolve(createRequest()).tag).toBe('en');
  });

  it('should stop at the highest-priority resolver that answers', () => {
    const high = countingResolver('high', 'de');
    const low = countingResolver('low', 'fr');
    registry.register(LOCALE_RESOLVER, low.resolver, { priority: 10 });
    registry.register(LOCALE_RESOLVER, high.resolver, { priority: 20 });

    const locale = chain.resolve(createRequest({ 'accept-language': 'it' }));

    expect(locale.tag).toBe('de');
    expect(high.resolve).toHaveBeenCalledTimes(1);
    expect(low.resolve).not.toHaveBeenCalled();
  });

  it('should skip resolvers that decline', () => {
    const declining = countingResolver('declining', null);
    const answering = countingResolver('answering', 'nl');
    registry.register(LOCALE_RESOLVER, declining.resolver, { priority: 50 });
    registry.register(LOCALE_RESOLVER, answering.resolver, { priority: 5 });

    expect(chain.resolve(createRequest()).tag).toBe('nl');
    expect(declining.resolve).toHaveBeenCalledTimes(1);
    expect(answering.resolve).toHaveBeenCalledTimes(1);
  });

  it('should fall through to the default resolver last', () => {
    const declining = countingResolver('declining', null);
    registry.register(LOCALE_RESOLVER, declining.resolver, { priority: 1 });

    expect(chain.resolve(createRequest({ 'accept-language': 'da' })).tag).toBe('da');
  });

  it('should never reach resolvers below the default', () => {
    const below = countingResolver('below', 'fi');
    registry.register(LOCALE_RESOLVER, below.resolver, { priority: -5 });

    expect(chain.resolve(createRequest()).tag).toBe('en');
    expect(below.resolve).not.toHaveBeenCalled();
  });

  it('should apply priority 1000 when none is given', () => {
    const unspecified = countingResolver('unspecified', null);
    const explicit = countingResolver('explicit', null);
    registry.register(LOCALE_RESOLVER, unspecified.resolver);
    registry.register(LOCALE_RESOLVER, explicit.resolver, { priority: 2000 });

    expect(chain.orderedResolvers().map((r) => [r.instance.name, r.priority])).toEqual([
      ['explicit', 2000],
      ['unspecified', 1000],
      ['accept-language', 0],
    ]);
  });

  it('should keep registration order for equal priorities', () => {
    const first = countingResolver('first', 'de');
    const second = countingResolver('second', 'fr');
    registry.register(LOCALE_RESOLVER, first.resolver, { priority: 7 });
    registry.register(LOCALE_RESOLVER, second.resolver, { priority: 7 });

    expect(chain.resolve(createRequest()).tag).toBe('de');
    expect(second.resolve).not.toHaveBeenCalled();
  });

  it('should treat a throwing resolver as having declined', () => {
    const failing: LocaleResolver = {
      name: 'failing',
      resolve: vi.fn(() => {
        throw new Error('lookup failed');
      }),
    };
    registry.register(LOCALE_RESOLVER, failing, { priority: 100 });

    expect(chain.resolve(createRequest({ 'accept-language': 'pl' })).tag).toBe('pl');
  });

  it('should let the application replace the default resolver at priority 0', () => {
    const replacement = countingResolver('replacement', 'ja');
    registry.register(LOCALE_RESOLVER, replacement.resolver, { priority: 0 });

    expect(chain.orderedResolvers().map((r) => r.instance.name)).toEqual(['replacement']);
    expect(chain.resolve(createRequest({ 'accept-language': 'ko' })).tag).toBe('ja');
  });

  it('should raise a configuration error when every resolver declines', () => {
    registry.register(LOCALE_RESOLVER, countingResolver('custom-default', null).resolver, { priority: 0 });
    registry.register(LOCALE_RESOLVER, countingResolver('override', null).resolver, { priority: 3 });

    let caught: unknown;
    try {
      chain.resolve(createRequest());
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(NoLocaleResolvedError);
    expect(caught).toMatchObject({
      code: 'NO_LOCALE_RESOLVED',
      isOperational: false,
      details: { resolvers: ['override', 'custom-default'] },
    });
  });

  it('should verify with a request that carries no hints', () => {
    expect(chain.verify().tag).toBe('en');

    registry.register(LOCALE_RESOLVER, countingResolver('empty', null).resolver, { priority: 0 });
    expect(() => chain.verify()).toThrow(NoLocaleResolvedError);
  });

  it('should resolve in one shot with resolveRequestLocale', () => {
    registry.register(LOCALE_RESOLVER, countingResolver('fixed', 'cs').resolver, { priority: 1 });

    expect(resolveRequestLocale(createRequest(), registry, defaultResolver).tag).toBe('cs');
  });
});
