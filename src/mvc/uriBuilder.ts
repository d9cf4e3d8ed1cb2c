/**
 * Outbound link builder
 *
 * Builds URIs for named controller routes so views never hard-code paths
 * or the application base path.
 *
 * ```typescript
 * uris.register('book', '/books/:id');
 * uris.build('book', { id: 42 }, { tab: 'reviews' }); // '/app/books/42?tab=reviews'
 * ```
 *
 * @module mvc/uriBuilder
 */

import { ConfigurationError, ErrorCodes, RequestError } from '../errors/ApiError';

export type UriValue = string | number | boolean;

const PLACEHOLDER = /:([A-Za-z_][A-Za-z0-9_]*)/g;

export class UriBuilder {
  private readonly routes = new Map<string, string>();

  constructor(readonly basePath: string) {}

  /**
   * Register a named route
   *
   * @throws ConfigurationError when the name is already taken by another path
   */
  register(name: string, path: string): this {
    const existing = this.routes.get(name);
    if (existing !== undefined && existing !== path) {
      throw new ConfigurationError(`Route name ${name} is already bound to ${existing}`, ErrorCodes.CONFIGURATION_ERROR, {
        name,
        path,
      });
    }
    this.routes.set(name, path);
    return this;
  }

  has(name: string): boolean {
    return this.routes.has(name);
  }

  /**
   * Build a link to a named route
   *
   * Path parameters are URI-encoded; query values that are undefined are
   * skipped.
   *
   * @throws RequestError for an unknown route or a missing path parameter
   */
  build(
    name: string,
    params: Record<string, UriValue> = {},
    query: Record<string, UriValue | undefined> = {}
  ): string {
    const template = this.routes.get(name);
    if (template === undefined) {
      throw new RequestError(`Unknown route: ${name}`, ErrorCodes.UNKNOWN_ROUTE, { name });
    }

    const path = template.replace(PLACEHOLDER, (_match, param: string) => {
      const value = params[param];
      if (value === undefined) {
        throw new RequestError(`Missing parameter ${param} for route ${name}`, ErrorCodes.UNKNOWN_ROUTE, {
          name,
          param,
        });
      }
      return encodeURIComponent(String(value));
    });

    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) search.append(key, String(value));
    }
    const queryString = search.toString();

    return `${this.basePath}${path}${queryString ? `?${queryString}` : ''}`;
  }
}
