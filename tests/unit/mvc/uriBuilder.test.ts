/**
 * URI Builder Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { UriBuilder } from '../../../src/mvc/uriBuilder';
import { ConfigurationError, RequestError } from '../../../src/errors/ApiError';

describe('UriBuilder', () => {
  let uris: UriBuilder;

  beforeEach(() => {
    uris = new UriBuilder('/app');
    uris.register('order', '/orders/:id').register('orderItem', '/orders/:orderId/items/:itemId');
  });

  it('should substitute and encode path parameters', () => {
    expect(uris.build('order', { id: 'a b/c' })).toBe('/app/orders/a%20b%2Fc');
    expect(uris.build('orderItem', { orderId: 7, itemId: 3 })).toBe('/app/orders/7/items/3');
  });

  it('should append query parameters, skipping undefined values', () => {
    expect(uris.build('order', { id: 1 }, { tab: 'items', page: 2, filter: undefined })).toBe(
      '/app/orders/1?tab=items&page=2'
    );
  });

  it('should fail for a missing parameter', () => {
    expect(() => uris.build('orderItem', { orderId: 7 })).toThrow(RequestError);
  });

  it('should fail for an unknown route', () => {
    expect(() => uris.build('missing')).toThrow(RequestError);
  });

  it('should reject rebinding a name to another path', () => {
    expect(() => uris.register('order', '/purchases/:id')).toThrow(ConfigurationError);
    expect(() => uris.register('order', '/orders/:id')).not.toThrow();
    expect(uris.has('order')).toBe(true);
  });

  it('should build unprefixed links without a base path', () => {
    const root = new UriBuilder('').register('home', '/');

    expect(root.build('home')).toBe('/');
  });
});
