/**
 * Environment Configuration
 *
 * Builds a service client configuration from `SERVICE_CLIENT_*` variables.
 * Unset variables fall through to the schema defaults.
 */

import { parseServiceClientConfig, type ServiceClientConfig } from './client-config.js';
import { parseBoolean, parseIntMap, parsePositiveInt, withoutUndefined, type Env } from './env-utils.js';

const PREFIX = 'SERVICE_CLIENT_';

export function loadServiceClientConfigFromEnv(env: Env = process.env): ServiceClientConfig {
  const read = (name: string): string | undefined => env[`${PREFIX}${name}`];
  const int = (name: string, min = 1) => parsePositiveInt(env, `${PREFIX}${name}`, min);

  return parseServiceClientConfig(
    withoutUndefined({
      gatewayUrl: read('GATEWAY_URL'),
      gatewayTimeoutMs: int('GATEWAY_TIMEOUT_MS'),
      gatewayHealthCheckIntervalMs: int('GATEWAY_HEALTH_CHECK_INTERVAL_MS'),
      serviceName: read('SERVICE_NAME'),
      serviceToken: read('SERVICE_TOKEN'),
      serviceTimeouts: parseIntMap(env, `${PREFIX}SERVICE_TIMEOUTS`),
      circuitBreaker: withoutUndefined({
        failureThreshold: int('CIRCUIT_FAILURE_THRESHOLD'),
        recoveryTimeoutMs: int('CIRCUIT_RECOVERY_TIMEOUT_MS', 0),
        successThreshold: int('CIRCUIT_SUCCESS_THRESHOLD'),
        gatewaySyncIntervalMs: int('CIRCUIT_GATEWAY_SYNC_INTERVAL_MS', 0),
        gatewaySyncTimeoutMs: int('CIRCUIT_GATEWAY_SYNC_TIMEOUT_MS'),
      }),
      retry: withoutUndefined({
        maxAttempts: int('RETRY_MAX_ATTEMPTS'),
        backoffStrategy: read('RETRY_BACKOFF_STRATEGY')?.toLowerCase(),
        initialDelayMs: int('RETRY_INITIAL_DELAY_MS'),
        maxDelayMs: int('RETRY_MAX_DELAY_MS'),
      }),
      cache: withoutUndefined({
        enabled: parseBoolean(env, `${PREFIX}CACHE_ENABLED`),
        ttlSeconds: int('CACHE_TTL_SECONDS'),
        redisUrl: read('CACHE_REDIS_URL') ?? env.REDIS_URL,
        keyPrefix: read('CACHE_KEY_PREFIX'),
        maxEntries: int('CACHE_MAX_ENTRIES'),
      }),
    })
  );
}
