export * from './client-config.js';
export * from './env-config.js';
export { parsePositiveInt, parseBoolean, parseIntMap, type Env } from './env-utils.js';
