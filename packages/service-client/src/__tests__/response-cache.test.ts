import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  ResponseCache,
  createCacheStore,
  generateCacheKey,
  serviceKeyPattern,
  stableStringify,
} from '../cache/ResponseCache.js';
import { InMemoryCacheStore } from '../cache/InMemoryCacheStore.js';
import { DEFAULT_CACHE_CONFIG } from '../config/client-config.js';
import type { CacheStore } from '../cache/types.js';

vi.mock('../logging/logger.js', () => {
  const stub = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() });
  return { getLogger: stub, createLogger: stub };
});

function failingStore(): CacheStore {
  const boom = () => Promise.reject(new Error('store offline'));
  return {
    get: vi.fn(boom),
    setex: vi.fn(boom),
    scan: vi.fn(boom),
    del: vi.fn(boom),
    flush: vi.fn(boom),
    size: vi.fn(boom),
    disconnect: vi.fn(() => Promise.resolve()),
  };
}

describe('cache keys', () => {
  it('ignores parameter order', () => {
    expect(generateCacheKey('billing-service', '/items', 'GET', { a: 1, b: 2 })).toBe(
      generateCacheKey('billing-service', '/items', 'GET', { b: 2, a: 1 })
    );
  });

  it('ignores nested parameter order', () => {
    expect(generateCacheKey('billing-service', '/items', 'GET', { filter: { x: 1, y: [1, 2] } })).toBe(
      generateCacheKey('billing-service', '/items', 'GET', { filter: { y: [1, 2], x: 1 } })
    );
  });

  it('distinguishes different parameters', () => {
    expect(generateCacheKey('billing-service', '/items', 'GET', { page: 1 })).not.toBe(
      generateCacheKey('billing-service', '/items', 'GET', { page: 2 })
    );
  });

  it('treats the method case-insensitively', () => {
    expect(generateCacheKey('billing-service', '/items', 'get')).toBe(
      generateCacheKey('billing-service', '/items', 'GET')
    );
  });

  it('namespaces the key by service and endpoint', () => {
    expect(generateCacheKey('billing-service', '/items', 'GET')).toMatch(
      /^service:billing-service:endpoint:\/items:[0-9a-f]{32}$/
    );
    expect(serviceKeyPattern('billing-service')).toBe('service:billing-service:*');
  });

  it('serializes with sorted keys at every depth', () => {
    expect(stableStringify({ b: { d: 1, c: 2 }, a: [{ y: 1, x: 2 }], skip: undefined })).toBe(
      '{"a":[{"x":2,"y":1}],"b":{"c":2,"d":1}}'
    );
  });
});

describe('ResponseCache', () => {
  let store: InMemoryCacheStore;
  let cache: ResponseCache;

  beforeEach(() => {
    store = new InMemoryCacheStore();
    cache = new ResponseCache(DEFAULT_CACHE_CONFIG, store);
  });

  it('misses when nothing is stored', async () => {
    await expect(cache.get('billing-service', '/items', 'GET')).resolves.toEqual({ hit: false });
  });

  it('stores the JSON body under the derived key', async () => {
    await cache.set('billing-service', '/items', 'GET', { page: 1 }, { data: 'success' });

    const key = generateCacheKey('billing-service', '/items', 'GET', { page: 1 });
    await expect(store.get(key)).resolves.toBe('{"data":"success"}');
    await expect(cache.get('billing-service', '/items', 'GET', { page: 1 })).resolves.toEqual({
      hit: true,
      value: { data: 'success' },
    });
  });

  it('reports a cached null as a hit', async () => {
    await cache.set('billing-service', '/items', 'GET', {}, null);
    await expect(cache.get('billing-service', '/items', 'GET')).resolves.toEqual({ hit: true, value: null });
  });

  it('treats an undecodable entry as a miss', async () => {
    await store.setex(generateCacheKey('billing-service', '/items', 'GET'), 60, '{not json');
    await expect(cache.get('billing-service', '/items', 'GET')).resolves.toEqual({ hit: false });
  });

  it('skips values that cannot be serialized', async () => {
    await expect(cache.set('billing-service', '/items', 'GET', {}, { id: BigInt(1) })).resolves.toBeUndefined();
    await expect(cache.set('billing-service', '/other', 'GET', {}, undefined)).resolves.toBeUndefined();
    await expect(store.size()).resolves.toBe(0);
  });

  it('clears a single service', async () => {
    await cache.set('billing-service', '/items', 'GET', {}, [1]);
    await cache.set('search-service', '/items', 'GET', {}, [2]);

    await cache.clear('billing-service');

    await expect(cache.get('billing-service', '/items', 'GET')).resolves.toEqual({ hit: false });
    await expect(cache.get('search-service', '/items', 'GET')).resolves.toEqual({ hit: true, value: [2] });
  });

  it('clears everything', async () => {
    await cache.set('billing-service', '/items', 'GET', {}, [1]);
    await cache.set('search-service', '/items', 'GET', {}, [2]);

    await cache.clear();

    await expect(cache.getStats()).resolves.toEqual({ enabled: true, totalEntries: 0 });
  });

  it('reports entry counts', async () => {
    await cache.set('billing-service', '/a', 'GET', {}, 1);
    await cache.set('billing-service', '/b', 'GET', {}, 2);
    await expect(cache.getStats()).resolves.toEqual({ enabled: true, totalEntries: 2 });
  });

  it('does nothing when disabled', async () => {
    const disabled = new ResponseCache({ enabled: false }, store);
    await disabled.set('billing-service', '/items', 'GET', {}, [1]);

    expect(disabled.enabled).toBe(false);
    await expect(store.size()).resolves.toBe(0);
    await expect(disabled.get('billing-service', '/items', 'GET')).resolves.toEqual({ hit: false });
    await expect(disabled.getStats()).resolves.toEqual({ enabled: false, totalEntries: 0 });
  });

  it('misses without a store', async () => {
    const storeless = new ResponseCache({ enabled: true }, null);
    expect(storeless.enabled).toBe(false);
    await expect(storeless.get('billing-service', '/items', 'GET')).resolves.toEqual({ hit: false });
  });

  it('never surfaces store failures', async () => {
    const broken = new ResponseCache(DEFAULT_CACHE_CONFIG, failingStore());

    await expect(broken.get('billing-service', '/items', 'GET')).resolves.toEqual({ hit: false });
    await expect(broken.set('billing-service', '/items', 'GET', {}, [1])).resolves.toBeUndefined();
    await expect(broken.clear('billing-service')).resolves.toBeUndefined();
    await expect(broken.getStats()).resolves.toEqual({ enabled: true, totalEntries: 0 });
  });

  it('writes with the configured TTL', async () => {
    const spy = vi.spyOn(store, 'setex');
    const shortLived = new ResponseCache({ ...DEFAULT_CACHE_CONFIG, ttlSeconds: 5 }, store);

    await shortLived.set('billing-service', '/items', 'GET', {}, 'x');

    expect(spy).toHaveBeenCalledWith(generateCacheKey('billing-service', '/items', 'GET'), 5, '"x"');
  });
});

describe('createCacheStore', () => {
  it('returns no store when caching is disabled', () => {
    expect(createCacheStore({ ...DEFAULT_CACHE_CONFIG, enabled: false }, 'orders-service')).toBeNull();
  });

  it('falls back to the in-memory store without a Redis URL', () => {
    expect(createCacheStore(DEFAULT_CACHE_CONFIG, 'orders-service')).toBeInstanceOf(InMemoryCacheStore);
  });
});
