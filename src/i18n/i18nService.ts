/**
 * Internationalization Service
 *
 * Message translation for views and controllers using i18next. Bundled
 * locales: English, German and French, all under the "messages" namespace.
 * Regional tags fall back to their language (de-AT → de), anything else to
 * the system default locale.
 *
 * Locale is passed per call, never stored on the service, so concurrent
 * requests in different locales share one instance safely.
 *
 * @module i18n/i18nService
 */

import i18next, { type i18n } from 'i18next';
import { createLogger } from '../utils/logger';
import type { TranslateOptions } from './types';

import enMessages from './locales/en/messages.json';
import deMessages from './locales/de/messages.json';
import frMessages from './locales/fr/messages.json';

const log = createLogger('I18N');

export const BUNDLED_LOCALES = ['en', 'de', 'fr'] as const;

export class I18nService {
  private instance: i18n | null = null;

  constructor(private readonly fallbackLocale: string = 'en') {}

  /**
   * Initialize i18next (idempotent)
   */
  async initialize(): Promise<void> {
    if (this.instance) return;

    const instance = i18next.createInstance();
    await instance.init({
      lng: this.fallbackLocale,
      fallbackLng: [this.fallbackLocale, 'en'],
      ns: ['messages'],
      defaultNS: 'messages',
      resources: {
        en: { messages: enMessages },
        de: { messages: deMessages },
        fr: { messages: frMessages },
      },
      interpolation: {
        // Views escape on output
        escapeValue: false,
      },
      returnNull: false,
      returnEmptyString: false,
    });

    this.instance = instance;
    log.info('I18n service initialized', {
      fallbackLocale: this.fallbackLocale,
      bundledLocales: BUNDLED_LOCALES,
    });
  }

  isInitialized(): boolean {
    return this.instance !== null;
  }

  /**
   * Translate a key in the given locale
   *
   * Returns the key itself when the service is not initialized or no bundle
   * has a translation.
   *
   * @example
   * i18n.translate('greeting', { locale: 'de', name: 'Ada' }) // 'Hallo, Ada!'
   */
  translate(key: string, options: TranslateOptions = {}): string {
    if (!this.instance) {
      log.warn('I18n not initialized, returning key', { key });
      return key;
    }

    const { locale, ...values } = options;
    const result: unknown = this.instance.t(key, { ...values, lng: locale ?? this.fallbackLocale });
    return typeof result === 'string' && result.length > 0 ? result : key;
  }
}

/**
 * Create a service falling back to the given locale
 */
export function createI18nService(fallbackLocale: string): I18nService {
  return new I18nService(fallbackLocale);
}
