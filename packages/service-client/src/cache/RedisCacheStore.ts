/**
 * Redis-backed cache store
 *
 * Connection failures never surface to callers: reads degrade to misses and
 * writes report `false`, with the error logged.
 *
 * @example
 * const store = new RedisCacheStore({
 *   serviceName: 'orders-service',
 *   url: 'redis://localhost:6379/0',
 *   keyPrefix: 'meshline:',
 * });
 */

import Redis from 'ioredis';
import type { Logger } from 'winston';
import { createLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import type { CacheStore } from './types.js';

export interface RedisCacheStoreConfig {
  serviceName: string;
  url: string;
  keyPrefix?: string;
  maxRetriesPerRequest?: number;
  lazyConnect?: boolean;
}

const SCAN_BATCH_SIZE = 100;

export class RedisCacheStore implements CacheStore {
  private readonly client: Redis;
  private readonly keyPrefix: string;
  private readonly logger: Logger;
  private isConnected = false;

  constructor(config: RedisCacheStoreConfig) {
    this.keyPrefix = config.keyPrefix ?? '';
    this.logger = createLogger(`${config.serviceName}-redis-cache`);

    this.client = new Redis(config.url, {
      maxRetriesPerRequest: config.maxRetriesPerRequest ?? 3,
      enableReadyCheck: true,
      lazyConnect: config.lazyConnect ?? true,
    });

    this.client.on('connect', () => {
      this.logger.info('Connected to Redis');
      this.isConnected = true;
    });

    // An unhandled 'error' event would crash the process while Redis is down.
    this.client.on('error', (err: Error) => {
      this.logger.error('Redis connection error', { error: err.message });
      this.isConnected = false;
    });

    this.client.on('close', () => {
      this.isConnected = false;
    });
  }

  private prefixKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private unprefixKey(key: string): string {
    return key.startsWith(this.keyPrefix) ? key.slice(this.keyPrefix.length) : key;
  }

  async get(key: string): Promise<string | null> {
    try {
      return await this.client.get(this.prefixKey(key));
    } catch (error) {
      this.logger.error('Get error', { error: serializeError(error) });
      return null;
    }
  }

  async setex(key: string, ttlSeconds: number, value: string): Promise<boolean> {
    try {
      const result = await this.client.setex(this.prefixKey(key), ttlSeconds, value);
      return result === 'OK';
    } catch (error) {
      this.logger.error('Set error', { error: serializeError(error) });
      return false;
    }
  }

  async scan(pattern: string): Promise<string[]> {
    const keys: string[] = [];
    let cursor = '0';
    try {
      do {
        const [next, batch] = await this.client.scan(
          cursor,
          'MATCH',
          this.prefixKey(pattern),
          'COUNT',
          SCAN_BATCH_SIZE
        );
        cursor = next;
        keys.push(...batch.map(k => this.unprefixKey(k)));
      } while (cursor !== '0');
    } catch (error) {
      this.logger.error('Scan error', { pattern, error: serializeError(error) });
    }
    return keys;
  }

  async del(keys: string[]): Promise<number> {
    if (keys.length === 0) return 0;
    try {
      return await this.client.del(...keys.map(k => this.prefixKey(k)));
    } catch (error) {
      this.logger.error('Delete error', { error: serializeError(error) });
      return 0;
    }
  }

  /**
   * With a key prefix only the prefixed namespace is removed; without one the
   * whole database is flushed.
   */
  async flush(): Promise<boolean> {
    try {
      if (this.keyPrefix) {
        await this.del(await this.scan('*'));
        return true;
      }
      const result = await this.client.flushdb();
      return result === 'OK';
    } catch (error) {
      this.logger.error('Flush error', { error: serializeError(error) });
      return false;
    }
  }

  async size(): Promise<number> {
    try {
      if (this.keyPrefix) {
        return (await this.scan('*')).length;
      }
      return await this.client.dbsize();
    } catch (error) {
      this.logger.error('Size error', { error: serializeError(error) });
      return 0;
    }
  }

  isReady(): boolean {
    return this.isConnected && this.client.status === 'ready';
  }

  async disconnect(): Promise<void> {
    try {
      await this.client.quit();
      this.logger.info('Redis connection closed gracefully');
    } catch (error) {
      this.logger.error('Disconnect error', { error: serializeError(error) });
      this.client.disconnect();
    }
  }
}
