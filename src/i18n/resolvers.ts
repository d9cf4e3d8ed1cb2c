/**
 * Built-in Locale Resolvers
 *
 * - DefaultLocaleResolver: Accept-Language, else the system default locale.
 *   Always present in the chain at priority 0 unless the application
 *   registers its own priority-0 resolver.
 * - HeaderLocaleResolver: explicit override header such as X-Locale.
 * - QueryParameterLocaleResolver: explicit override parameter such as ?lang=de.
 *
 * The two override resolvers decline on absent or malformed values and, when
 * given a list of supported languages, on anything outside it.
 *
 * @module i18n/resolvers
 */

import { preferredLanguage } from './acceptLanguage';
import { Locale } from './locale';
import { headerValue, type LocaleResolver, type RequestInfo } from './types';

export class DefaultLocaleResolver implements LocaleResolver {
  readonly name = 'accept-language';

  constructor(private readonly systemDefault: Locale) {}

  resolve(request: RequestInfo): Locale {
    return preferredLanguage(headerValue(request, 'accept-language')) ?? this.systemDefault;
  }

  get defaultLocale(): Locale {
    return this.systemDefault;
  }
}

function isSupported(locale: Locale, supported: readonly string[] | undefined): boolean {
  if (!supported) return true;
  return supported.some((tag) => tag.toLowerCase() === locale.language || Locale.parse(tag)?.equals(locale));
}

export class HeaderLocaleResolver implements LocaleResolver {
  readonly name: string;

  constructor(
    private readonly headerName: string = 'x-locale',
    private readonly supported?: readonly string[]
  ) {
    this.name = `header:${headerName.toLowerCase()}`;
  }

  resolve(request: RequestInfo): Locale | null {
    const locale = Locale.parse(headerValue(request, this.headerName));
    return locale && isSupported(locale, this.supported) ? locale : null;
  }
}

export class QueryParameterLocaleResolver implements LocaleResolver {
  readonly name: string;

  constructor(
    private readonly parameter: string = 'lang',
    private readonly supported?: readonly string[]
  ) {
    this.name = `query:${parameter}`;
  }

  resolve(request: RequestInfo): Locale | null {
    const raw = request.query[this.parameter];
    if (typeof raw !== 'string') return null;

    const locale = Locale.parse(raw);
    return locale && isSupported(locale, this.supported) ? locale : null;
  }
}
