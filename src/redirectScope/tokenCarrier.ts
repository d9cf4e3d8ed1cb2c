/**
 * Redirect-scope token carriers
 *
 * How the token travels from the redirect response to the follow-up request:
 *
 * - query:  appended to the redirect Location (?scopeId=<token>) and read
 *           back from the query string. Works without cookies.
 * - cookie: HTTP-only, SameSite=Lax cookie scoped to the application base
 *           path, cleared by the request that consumes it.
 *
 * @module redirectScope/tokenCarrier
 */

import type { Request, Response } from 'express';
import type { RedirectScopeConfig, TokenCarrierKind } from '../config/types';

export interface TokenCarrier {
  readonly kind: TokenCarrierKind;
  /** Token presented by an inbound request, if any */
  read(req: Request): string | undefined;
  /** Attach a token to a redirect; returns the Location to send */
  attach(res: Response, location: string, token: string): string;
  /** Called once the inbound token has been resumed */
  consumed(res: Response): void;
}

/**
 * Set a query parameter, replacing any existing occurrences and keeping the
 * rest of the query and the fragment as they are
 *
 * @example
 * setQueryParameter('/done?x=1#top', 'scopeId', 'abc')         // '/done?x=1&scopeId=abc#top'
 * setQueryParameter('/done?scopeId=old&x=1', 'scopeId', 'abc') // '/done?x=1&scopeId=abc'
 */
export function setQueryParameter(uri: string, name: string, value: string): string {
  const hashIndex = uri.indexOf('#');
  const base = hashIndex === -1 ? uri : uri.slice(0, hashIndex);
  const fragment = hashIndex === -1 ? '' : uri.slice(hashIndex);

  const queryIndex = base.indexOf('?');
  const path = queryIndex === -1 ? base : base.slice(0, queryIndex);
  const encodedName = encodeURIComponent(name);
  const params =
    queryIndex === -1
      ? []
      : base
          .slice(queryIndex + 1)
          .split('&')
          .filter((pair) => pair !== '' && pair.split('=')[0] !== encodedName);

  params.push(`${encodedName}=${encodeURIComponent(value)}`);
  return `${path}?${params.join('&')}${fragment}`;
}

/**
 * Read one cookie from a Cookie header
 */
export function readCookie(header: string | undefined, name: string): string | undefined {
  if (!header) return undefined;

  for (const pair of header.split(';')) {
    const separator = pair.indexOf('=');
    if (separator === -1) continue;
    if (pair.slice(0, separator).trim() !== name) continue;

    const value = pair.slice(separator + 1).trim();
    try {
      return decodeURIComponent(value);
    } catch {
      return undefined;
    }
  }
  return undefined;
}

export class QueryParameterTokenCarrier implements TokenCarrier {
  readonly kind = 'query' as const;

  constructor(private readonly parameter: string) {}

  read(req: Request): string | undefined {
    const value = req.query[this.parameter];
    return typeof value === 'string' ? value : undefined;
  }

  attach(_res: Response, location: string, token: string): string {
    return setQueryParameter(location, this.parameter, token);
  }

  consumed(): void {
    // Nothing to clean up: the token is only part of one URL
  }
}

export interface CookieTokenCarrierOptions {
  /** Cookie path (the application base path, '/' when empty) */
  path: string;
  maxAgeMs: number;
  secure?: boolean;
}

export class CookieTokenCarrier implements TokenCarrier {
  readonly kind = 'cookie' as const;

  constructor(
    private readonly cookieName: string,
    private readonly options: CookieTokenCarrierOptions
  ) {}

  read(req: Request): string | undefined {
    return readCookie(req.headers.cookie, this.cookieName);
  }

  attach(res: Response, location: string, token: string): string {
    res.cookie(this.cookieName, token, {
      httpOnly: true,
      sameSite: 'lax',
      path: this.options.path,
      maxAge: this.options.maxAgeMs,
      secure: this.options.secure ?? false,
    });
    return location;
  }

  consumed(res: Response): void {
    res.clearCookie(this.cookieName, { path: this.options.path });
  }
}

/**
 * Build the carrier selected by configuration
 */
export function createTokenCarrier(config: RedirectScopeConfig, basePath: string): TokenCarrier {
  if (config.carrier === 'cookie') {
    return new CookieTokenCarrier(config.cookieName, {
      path: basePath || '/',
      maxAgeMs: config.ttlMs,
    });
  }
  return new QueryParameterTokenCarrier(config.paramName);
}
