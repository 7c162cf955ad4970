/**
 * Response Cache
 *
 * Memoizes GET responses from target services and serves them back when a
 * fresh call fails. Nothing here ever fails the caller's request: unreadable
 * entries are misses, and write failures are logged.
 */

import { createHash } from 'node:crypto';
import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import { DEFAULT_CACHE_CONFIG, type CacheConfig } from '../config/client-config.js';
import { InMemoryCacheStore } from './InMemoryCacheStore.js';
import { RedisCacheStore } from './RedisCacheStore.js';
import type { CacheLookup, CacheStats, CacheStore, QueryParams } from './types.js';

const logger = getLogger('response-cache');

/**
 * JSON serialization with object keys sorted at every depth, so that two
 * logically equal values always serialize identically.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map(item => stableStringify(item)).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
  return `{${entries.join(',')}}`;
}

export function serviceKeyPattern(service: string): string {
  return `service:${service}:*`;
}

export function generateCacheKey(service: string, endpoint: string, method: string, params: QueryParams = {}): string {
  const fingerprint = stableStringify({ service, endpoint, method: method.toUpperCase(), params });
  const hash = createHash('md5').update(fingerprint).digest('hex');
  return `service:${service}:endpoint:${endpoint}:${hash}`;
}

export function createCacheStore(config: CacheConfig, serviceName: string): CacheStore | null {
  if (!config.enabled) return null;
  if (config.redisUrl) {
    return new RedisCacheStore({ serviceName, url: config.redisUrl, keyPrefix: config.keyPrefix });
  }
  return new InMemoryCacheStore(config.maxEntries);
}

export class ResponseCache {
  readonly config: CacheConfig;

  constructor(
    config: Partial<CacheConfig>,
    private readonly store: CacheStore | null
  ) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
    if (this.config.enabled && !store) {
      logger.warn('Response cache enabled without a store, all lookups will miss');
    }
  }

  get enabled(): boolean {
    return this.config.enabled && this.store !== null;
  }

  async get(service: string, endpoint: string, method: string, params: QueryParams = {}): Promise<CacheLookup> {
    if (!this.config.enabled || !this.store) return { hit: false };

    const key = generateCacheKey(service, endpoint, method, params);
    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      logger.warn('Cache read failed, treating as miss', { key, error: serializeError(error).message });
      return { hit: false };
    }
    if (raw === null) return { hit: false };

    try {
      return { hit: true, value: JSON.parse(raw) };
    } catch {
      logger.debug('Discarding undecodable cache entry', { key });
      return { hit: false };
    }
  }

  async set(service: string, endpoint: string, method: string, params: QueryParams, data: unknown): Promise<void> {
    if (!this.config.enabled || !this.store) return;

    const key = generateCacheKey(service, endpoint, method, params);
    let serialized: string | undefined;
    try {
      serialized = JSON.stringify(data);
    } catch (error) {
      logger.warn('Could not cache response', { key, error: serializeError(error).message });
      return;
    }
    if (serialized === undefined) {
      logger.warn('Could not cache response', { key, error: 'value is not JSON-serializable' });
      return;
    }

    try {
      const stored = await this.store.setex(key, this.config.ttlSeconds, serialized);
      if (!stored) {
        logger.warn('Cache store rejected write', { key });
      }
    } catch (error) {
      logger.warn('Could not cache response', { key, error: serializeError(error).message });
    }
  }

  /**
   * Removes every entry, or only those of one target service.
   */
  async clear(service?: string): Promise<void> {
    if (!this.config.enabled || !this.store) return;

    try {
      if (service) {
        const keys = await this.store.scan(serviceKeyPattern(service));
        if (keys.length > 0) {
          await this.store.del(keys);
        }
      } else {
        await this.store.flush();
      }
    } catch (error) {
      logger.warn('Cache clear failed', { service, error: serializeError(error).message });
    }
  }

  async getStats(): Promise<CacheStats> {
    if (!this.config.enabled || !this.store) {
      return { enabled: false, totalEntries: 0 };
    }
    try {
      return { enabled: true, totalEntries: await this.store.size() };
    } catch (error) {
      logger.warn('Cache stats unavailable', { error: serializeError(error).message });
      return { enabled: true, totalEntries: 0 };
    }
  }

  async close(): Promise<void> {
    await this.store?.disconnect();
  }
}
