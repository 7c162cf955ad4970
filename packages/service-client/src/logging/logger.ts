import * as winston from 'winston';
import { hostname } from 'node:os';
import { correlationStorage } from './correlation.js';
import { createDevFormat, createProdFormat } from './formatting.js';

export type { Logger } from 'winston';

/** Fields stamped on every line a logger writes. */
export interface LoggerDefaults {
  service: string;
  env: string;
  version?: string;
  instanceId?: string;
}

const LEVEL_BY_ENV: Record<string, string> = {
  production: 'info',
  staging: 'debug',
  test: 'warn',
};

function logLevel(env: string): string {
  return process.env.LOG_LEVEL ?? LEVEL_BY_ENV[env] ?? 'debug';
}

export function createLogger(name: string, overrides: Partial<LoggerDefaults> = {}): winston.Logger {
  const env = process.env.NODE_ENV ?? 'development';
  const defaults: LoggerDefaults = {
    service: name,
    env,
    version: process.env.npm_package_version,
    instanceId: process.env.INSTANCE_ID ?? process.env.HOSTNAME ?? hostname(),
    ...overrides,
  };

  return winston.createLogger({
    level: logLevel(env),
    defaultMeta: defaults,
    format: env === 'development' ? createDevFormat(correlationStorage) : createProdFormat(correlationStorage),
    transports: [new winston.transports.Console()],
  });
}

const loggers = new Map<string, winston.Logger>();

/** Shared logger for a module, created on first use. */
export function getLogger(name: string): winston.Logger {
  const existing = loggers.get(name);
  if (existing) return existing;

  const logger = createLogger(name);
  loggers.set(name, logger);
  return logger;
}
