/**
 * Cache Module
 */

export * from './types.js';
export * from './InMemoryCacheStore.js';
export * from './RedisCacheStore.js';
export * from './ResponseCache.js';
