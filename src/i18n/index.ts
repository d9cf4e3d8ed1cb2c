/**
 * Internationalization Module
 *
 * Request locale resolution (pluggable, priority-ordered resolvers) and
 * message translation.
 *
 * @module i18n
 */

export { Locale, LANGUAGE_TAG_PATTERN } from './locale';
export { parseAcceptLanguage, preferredLanguage } from './acceptLanguage';
export type { LanguagePreference } from './acceptLanguage';
export {
  DefaultLocaleResolver,
  HeaderLocaleResolver,
  QueryParameterLocaleResolver,
} from './resolvers';
export { LocaleResolverChain, resolveRequestLocale } from './localeResolverChain';
export { I18nService, createI18nService, BUNDLED_LOCALES } from './i18nService';
export {
  LOCALE_RESOLVER,
  DEFAULT_RESOLVER_PRIORITY,
  headerValue,
} from './types';
export type { LocaleResolver, RequestInfo, TranslateOptions } from './types';
