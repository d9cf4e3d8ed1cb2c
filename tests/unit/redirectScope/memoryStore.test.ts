/**
 * In-Memory Redirect-Scope Store Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryRedirectScopeStore } from '../../../src/redirectScope/memoryStore';
import type { RedirectScopeEntry } from '../../../src/redirectScope/types';
import { InternalError } from '../../../src/errors/ApiError';

const entry = (token: string, createdAt = 1000, bag: Record<string, unknown> = { notice: 'saved' }): RedirectScopeEntry => ({
  token,
  bag,
  createdAt,
  expiresAfter: 500,
});

describe('MemoryRedirectScopeStore', () => {
  let store: MemoryRedirectScopeStore;

  beforeEach(() => {
    store = new MemoryRedirectScopeStore();
  });

  it('should hand an entry out exactly once', async () => {
    await store.save(entry('token-a'));

    expect(store.stateOf('token-a')).toBe('pending');
    expect(await store.consume('token-a', 1200)).toMatchObject({ token: 'token-a', bag: { notice: 'saved' } });
    expect(store.stateOf('token-a')).toBe('consumed');
    expect(await store.consume('token-a', 1200)).toBeNull();
  });

  it('should let only one of two concurrent consumers win', async () => {
    await store.save(entry('token-a'));

    const results = await Promise.all([store.consume('token-a', 1200), store.consume('token-a', 1200)]);

    expect(results.filter((r) => r !== null)).toHaveLength(1);
  });

  it('should return null for unknown tokens', async () => {
    expect(await store.consume('unknown', 0)).toBeNull();
  });

  it('should refuse to reuse a token', async () => {
    await store.save(entry('token-a'));

    await expect(store.save(entry('token-a'))).rejects.toThrow(InternalError);
  });

  it('should copy the bag on save', async () => {
    const bag: Record<string, unknown> = { notice: 'saved' };
    await store.save(entry('token-a', 1000, bag));
    bag.notice = 'changed';

    expect((await store.consume('token-a', 1000))?.bag).toEqual({ notice: 'saved' });
  });

  it('should not hand out an expired entry and destroy it', async () => {
    await store.save(entry('token-a'));

    expect(await store.consume('token-a', 1500)).toBeNull();
    expect(store.stateOf('token-a')).toBe('destroyed');
  });

  it('should destroy consumed entries on release only', async () => {
    await store.save(entry('token-a'));
    await store.save(entry('token-b'));
    await store.consume('token-a', 1000);

    await store.release('token-a');
    await store.release('token-b');

    expect(store.stateOf('token-a')).toBe('destroyed');
    expect(store.stateOf('token-b')).toBe('pending');
  });

  it('should sweep expired pending entries but never consumed ones', async () => {
    await store.save(entry('old-pending', 0));
    await store.save(entry('old-consumed', 0));
    await store.save(entry('fresh', 1000));
    await store.consume('old-consumed', 100);

    expect(await store.sweep(1400)).toBe(1);
    expect(store.stateOf('old-pending')).toBe('destroyed');
    expect(store.stateOf('old-consumed')).toBe('consumed');
    expect(store.stateOf('fresh')).toBe('pending');
    expect(store.size).toBe(2);
  });

  it('should empty the table on close', async () => {
    await store.save(entry('token-a'));
    await store.close();

    expect(store.size).toBe(0);
  });
});
