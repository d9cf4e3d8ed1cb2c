/**
 * MVC Request Context Tests
 */

import { describe, it, expect, vi, beforeAll } from 'vitest';
import { MvcContext } from '../../../src/mvc/mvcContext';
import { UriBuilder } from '../../../src/mvc/uriBuilder';
import { I18nService } from '../../../src/i18n/i18nService';
import { Locale } from '../../../src/i18n/locale';
import { LocaleResolverChain } from '../../../src/i18n/localeResolverChain';
import { DefaultLocaleResolver } from '../../../src/i18n/resolvers';
import { LOCALE_RESOLVER } from '../../../src/i18n/types';
import { RedirectScopeBag } from '../../../src/redirectScope/bag';
import { InMemoryComponentRegistry } from '../../../src/registry/componentRegistry';
import { requestContext } from '../../../src/utils/requestContext';
import { createRequest } from '../../helpers/requests';

function createChain(): LocaleResolverChain {
  return new LocaleResolverChain(new InMemoryComponentRegistry(), new DefaultLocaleResolver(Locale.of('en')));
}

describe('MvcContext', () => {
  const i18n = new I18nService('en');

  beforeAll(async () => {
    await i18n.initialize();
  });

  it('should resolve the locale once and cache it', () => {
    const registry = new InMemoryComponentRegistry();
    const resolve = vi.fn(() => Locale.of('de'));
    registry.register(LOCALE_RESOLVER, { name: 'counting', resolve }, { priority: 5 });
    const chain = new LocaleResolverChain(registry, new DefaultLocaleResolver(Locale.of('en')));
    const ctx = new MvcContext({ request: createRequest(), chain, uris: new UriBuilder('') });

    expect(ctx.locale.tag).toBe('de');
    expect(ctx.locale.tag).toBe('de');
    expect(ctx.t('saved')).toBe('saved');
    expect(resolve).toHaveBeenCalledTimes(1);
  });

  it('should not resolve the locale until it is read', () => {
    const chain = createChain();
    const spy = vi.spyOn(chain, 'resolve');

    new MvcContext({ request: createRequest(), chain, uris: new UriBuilder('') });

    expect(spy).not.toHaveBeenCalled();
  });

  it('should record the locale in the request context', () => {
    const ctx = new MvcContext({
      request: createRequest({ 'accept-language': 'fr' }),
      chain: createChain(),
      uris: new UriBuilder(''),
    });

    const recorded = requestContext.run({ requestId: 'req-1', startTime: 0 }, () => {
      void ctx.locale;
      return requestContext.get()?.locale;
    });

    expect(recorded).toBe('fr');
  });

  it('should translate in the request locale', () => {
    const ctx = new MvcContext({
      request: createRequest({ 'accept-language': 'de-CH' }),
      chain: createChain(),
      uris: new UriBuilder(''),
      i18n,
    });

    expect(ctx.t('greeting', { name: 'Grace' })).toBe('Hallo, Grace!');
  });

  it('should build links under the base path', () => {
    const uris = new UriBuilder('/shop').register('product', '/products/:sku');
    const ctx = new MvcContext({ request: createRequest(), chain: createChain(), uris });

    expect(ctx.basePath).toBe('/shop');
    expect(ctx.uri('product', { sku: 'X-1' }, { ref: 'home' })).toBe('/shop/products/X-1?ref=home');
  });

  it('should start with an empty redirect scope', () => {
    const ctx = new MvcContext({ request: createRequest(), chain: createChain(), uris: new UriBuilder('') });

    expect(ctx.redirectScope.size).toBe(0);
    expect(ctx.redirectScope.restored).toBe(false);
  });

  it('should overlay models on redirect-scope values in the view model', () => {
    const ctx = new MvcContext({
      request: createRequest(),
      chain: createChain(),
      uris: new UriBuilder(''),
      redirectScope: RedirectScopeBag.restore({ notice: 'saved', title: 'Old' }),
    });
    ctx.models.put('title', 'New').put('items', [1, 2]);

    expect(Object.fromEntries(ctx.viewModel())).toEqual({ notice: 'saved', title: 'New', items: [1, 2] });
  });
});
