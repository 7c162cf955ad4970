import { InvalidConfigurationError } from '../error-handling/errors.js';

export type Env = Record<string, string | undefined>;

export function parsePositiveInt(env: Env, envVar: string, minValue = 1): number | undefined {
  const value = env[envVar];
  if (!value) return undefined;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < minValue) {
    throw new InvalidConfigurationError(
      envVar,
      value,
      `Invalid ${envVar}: "${value}". Must be an integer >= ${minValue}.`
    );
  }
  return parsed;
}

export function parseBoolean(env: Env, envVar: string): boolean | undefined {
  const value = env[envVar];
  if (value === undefined || value === '') return undefined;

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new InvalidConfigurationError(envVar, value, `Invalid ${envVar}: "${value}". Must be true or false.`);
}

/**
 * Parses `name=value` pairs separated by commas, e.g. `orders=5000,billing=12000`.
 */
export function parseIntMap(env: Env, envVar: string): Record<string, number> | undefined {
  const value = env[envVar];
  if (!value) return undefined;

  const entries: Record<string, number> = {};
  for (const pair of value.split(',').map(item => item.trim()).filter(Boolean)) {
    const [name, raw] = pair.split('=').map(part => part.trim());
    const parsed = Number(raw);
    if (!name || !Number.isInteger(parsed) || parsed <= 0) {
      throw new InvalidConfigurationError(envVar, value, `Invalid ${envVar} entry "${pair}". Expected name=milliseconds.`);
    }
    entries[name] = parsed;
  }
  return entries;
}

export function withoutUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, value]) => value !== undefined));
}
