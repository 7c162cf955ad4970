export * from './logger.js';
export * from './formatting.js';
export * from './correlation.js';
export * from './error-serializer.js';
