/**
 * MVC Request Context
 *
 * Per-request state handed to controllers and view engines: the model map,
 * the redirect-scope bag, the lazily resolved locale and link building.
 *
 * The locale is resolved through the resolver chain on first access and
 * cached, so every reader in the request sees the same value and the chain
 * runs at most once.
 *
 * @module mvc/mvcContext
 */

import type { I18nService } from '../i18n/i18nService';
import type { Locale } from '../i18n/locale';
import type { LocaleResolverChain } from '../i18n/localeResolverChain';
import type { RequestInfo, TranslateOptions } from '../i18n/types';
import { RedirectScopeBag } from '../redirectScope/bag';
import { requestContext } from '../utils/requestContext';
import { Models } from './models';
import type { UriBuilder, UriValue } from './uriBuilder';

export interface MvcContextOptions {
  request: RequestInfo;
  chain: LocaleResolverChain;
  uris: UriBuilder;
  i18n?: I18nService;
  /** Bag restored from a redirect token; a fresh bag when absent */
  redirectScope?: RedirectScopeBag;
}

export class MvcContext {
  readonly models = new Models();
  readonly redirectScope: RedirectScopeBag;
  private resolvedLocale: Locale | null = null;

  constructor(private readonly options: MvcContextOptions) {
    this.redirectScope = options.redirectScope ?? RedirectScopeBag.empty();
  }

  get request(): RequestInfo {
    return this.options.request;
  }

  get basePath(): string {
    return this.options.uris.basePath;
  }

  /**
   * Locale of this request
   *
   * @throws NoLocaleResolvedError when the resolver chain is exhausted
   */
  get locale(): Locale {
    if (!this.resolvedLocale) {
      this.resolvedLocale = this.options.chain.resolve(this.options.request);
      requestContext.setLocale(this.resolvedLocale.tag);
    }
    return this.resolvedLocale;
  }

  /**
   * Link to a named route under the application base path
   */
  uri(name: string, params?: Record<string, UriValue>, query?: Record<string, UriValue | undefined>): string {
    return this.options.uris.build(name, params, query);
  }

  /**
   * Translate a message key in the request locale
   */
  t(key: string, values: Omit<TranslateOptions, 'locale'> = {}): string {
    if (!this.options.i18n) return key;
    return this.options.i18n.translate(key, { ...values, locale: this.locale.tag });
  }

  /**
   * What a view sees: redirect-scope values, overridden by models of the
   * same name
   */
  viewModel(): ReadonlyMap<string, unknown> {
    const merged = new Map<string, unknown>(Object.entries(this.redirectScope.toRecord()));
    for (const [name, value] of this.models.asMap()) {
      merged.set(name, value);
    }
    return merged;
  }
}
