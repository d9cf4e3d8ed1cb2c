/**
 * Accept-Language parsing
 *
 * Format: comma-separated language ranges, each with an optional quality
 * factor, e.g. "fr-CH, fr;q=0.9, en;q=0.8, *;q=0.5".
 *
 * Entries are dropped when the range is a wildcard or not a well-formed tag,
 * when q is malformed, or when q=0 (explicitly not acceptable). A header
 * with nothing left after that yields no preference at all.
 *
 * @module i18n/acceptLanguage
 */

import { Locale } from './locale';

export interface LanguagePreference {
  locale: Locale;
  quality: number;
  /** Zero-based position in the header, used to break quality ties */
  position: number;
}

// qvalue = ( "0" [ "." 0*3DIGIT ] ) / ( "1" [ "." 0*3("0") ] )
const QVALUE_PATTERN = /^(0(\.\d{0,3})?|1(\.0{0,3})?)$/;

function parseQuality(params: string[]): number | null {
  for (const param of params) {
    const [name, value] = param.split('=').map((s) => s.trim());
    if (name.toLowerCase() !== 'q') continue;
    if (value === undefined || !QVALUE_PATTERN.test(value)) return null;
    return Number(value);
  }
  return 1.0;
}

/**
 * Parse a header into preferences, best first
 *
 * @example
 * parseAcceptLanguage('fr;q=0.5,en;q=0.9').map((p) => p.locale.tag) // ['en', 'fr']
 */
export function parseAcceptLanguage(header: string | undefined): LanguagePreference[] {
  if (!header) return [];

  const preferences: LanguagePreference[] = [];

  header.split(',').forEach((part, position) => {
    const [range, ...params] = part.split(';').map((s) => s.trim());
    if (!range || range === '*') return;

    const locale = Locale.parse(range);
    if (!locale) return;

    const quality = parseQuality(params);
    if (quality === null || quality === 0) return;

    preferences.push({ locale, quality, position });
  });

  return preferences.sort((a, b) => b.quality - a.quality || a.position - b.position);
}

/**
 * The single most preferred locale in a header, or null
 *
 * @example
 * preferredLanguage('da')?.tag                  // 'da'
 * preferredLanguage('en;q=0.8,de;q=0.8')?.tag   // 'en' (first listed wins)
 * preferredLanguage('*;q=0.5')                  // null
 */
export function preferredLanguage(header: string | undefined): Locale | null {
  return parseAcceptLanguage(header)[0]?.locale ?? null;
}
