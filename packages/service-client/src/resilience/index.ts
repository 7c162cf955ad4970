export * from './types.js';
export * from './serial-lock.js';
export * from './retry-handler.js';
export * from './circuit-breaker.js';
