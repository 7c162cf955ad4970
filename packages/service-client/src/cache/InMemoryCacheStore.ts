/**
 * In-process cache store: a TTL-aware LRU map. Used when no Redis URL is
 * configured, and as the store in tests.
 */

import type { CacheStore } from './types.js';

interface Entry {
  value: string;
  expiresAt: number;
}

export function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`);
}

export class InMemoryCacheStore implements CacheStore {
  private cache = new Map<string, Entry>();

  constructor(private readonly maxEntries: number = 1000) {}

  private live(key: string): Entry | null {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }
    return entry;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.live(key);
    if (!entry) return null;
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.value;
  }

  async setex(key: string, ttlSeconds: number, value: string): Promise<boolean> {
    this.cache.delete(key);
    if (this.cache.size >= this.maxEntries) {
      const oldest = this.cache.keys().next().value;
      if (oldest !== undefined) this.cache.delete(oldest);
    }
    this.cache.set(key, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
    return true;
  }

  async scan(pattern: string): Promise<string[]> {
    const matcher = globToRegExp(pattern);
    return Array.from(this.cache.keys()).filter(key => matcher.test(key) && this.live(key) !== null);
  }

  async del(keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.cache.delete(key)) removed++;
    }
    return removed;
  }

  async flush(): Promise<boolean> {
    this.cache.clear();
    return true;
  }

  async size(): Promise<number> {
    for (const key of Array.from(this.cache.keys())) {
      this.live(key);
    }
    return this.cache.size;
  }

  async disconnect(): Promise<void> {
    this.cache.clear();
  }
}
