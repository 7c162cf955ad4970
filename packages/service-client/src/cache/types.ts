/**
 * Key/value store behind the response cache. TTLs are enforced by the store.
 */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  setex(key: string, ttlSeconds: number, value: string): Promise<boolean>;
  /** Keys matching a glob pattern where `*` matches any run of characters. */
  scan(pattern: string): Promise<string[]>;
  del(keys: string[]): Promise<number>;
  flush(): Promise<boolean>;
  size(): Promise<number>;
  disconnect(): Promise<void>;
}

export type CacheLookup = { hit: true; value: unknown } | { hit: false };

export interface CacheStats {
  enabled: boolean;
  totalEntries: number;
}

export type QueryParams = Record<string, unknown>;
