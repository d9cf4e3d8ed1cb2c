/**
 * Redaction helpers for log output
 *
 * Redirect-scope tokens grant access to another request's data, so they are
 * never written to logs in full.
 *
 * Usage:
 *   import { maskToken } from '../utils/redact';
 *   log.debug('Scope resumed', { token: maskToken(token) });
 */

/** Placeholder value for redacted content */
export const REDACTED = '[REDACTED]';

/**
 * Convert any thrown value into a log-safe shape
 *
 * Stack traces are only included in development.
 */
export function safeError(error: unknown): { message: string; name?: string; stack?: string } {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: process.env.NODE_ENV === 'development' ? error.stack : undefined,
    };
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  return { message: String(error) };
}

/**
 * Mask a string, showing only first and last N characters
 *
 * @example
 * maskToken('0123456789abcdef'); // '0123***cdef'
 */
export function maskToken(value: string, visibleChars: number = 4): string {
  if (!value || value.length <= visibleChars * 2) {
    return REDACTED;
  }

  const start = value.substring(0, visibleChars);
  const end = value.substring(value.length - visibleChars);
  return `${start}***${end}`;
}
