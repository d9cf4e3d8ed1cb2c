/**
 * Locale value object
 *
 * Wraps a well-formed language tag. Instances are immutable and compare by
 * canonical tag: language lower-case, script title-case, region upper-case.
 *
 * @module i18n/locale
 */

/** Well-formed language tag: primary subtag plus optional subtags */
export const LANGUAGE_TAG_PATTERN = /^[A-Za-z]{2,8}(-[A-Za-z0-9]{1,8})*$/;

function canonicalSubtag(subtag: string, index: number): string {
  if (index === 0) return subtag.toLowerCase();
  if (/^[A-Za-z]{2}$/.test(subtag)) return subtag.toUpperCase();
  if (/^[A-Za-z]{4}$/.test(subtag)) {
    return subtag.charAt(0).toUpperCase() + subtag.slice(1).toLowerCase();
  }
  return subtag.toLowerCase();
}

export class Locale {
  readonly tag: string;
  readonly language: string;
  readonly region?: string;

  private constructor(subtags: string[]) {
    const canonical = subtags.map(canonicalSubtag);
    this.tag = canonical.join('-');
    this.language = canonical[0];
    this.region = canonical.slice(1).find((s) => /^([A-Z]{2}|\d{3})$/.test(s));
    Object.freeze(this);
  }

  /**
   * Parse a language tag; underscores are accepted as separators
   *
   * @returns null when the value is not a well-formed tag
   *
   * @example
   * Locale.parse('en_us')?.tag // 'en-US'
   * Locale.parse('*')          // null
   */
  static parse(value: string | null | undefined): Locale | null {
    if (!value) return null;
    const normalized = value.trim().replace(/_/g, '-');
    if (!LANGUAGE_TAG_PATTERN.test(normalized)) return null;
    return new Locale(normalized.split('-'));
  }

  /**
   * Parse a language tag known to be valid (configuration, constants)
   */
  static of(tag: string): Locale {
    const locale = Locale.parse(tag);
    if (!locale) {
      throw new TypeError(`Invalid language tag: ${tag}`);
    }
    return locale;
  }

  equals(other: Locale | null | undefined): boolean {
    return other?.tag === this.tag;
  }

  toString(): string {
    return this.tag;
  }

  toJSON(): string {
    return this.tag;
  }
}
