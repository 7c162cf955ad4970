export interface SerializedError {
  message: string;
  stack?: string;
  name?: string;
  cause?: SerializedError;
  code?: string;
  statusCode?: number;
  details?: Record<string, unknown>;
}

const MAX_CAUSE_DEPTH = 3;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

function serializeInstance(error: Error, remaining: number): SerializedError {
  const serialized: SerializedError = { name: error.name, message: error.message, stack: error.stack };

  const code = stringField(error, 'code');
  if (code !== undefined) serialized.code = code;

  const statusCode: unknown = Reflect.get(error, 'statusCode');
  if (typeof statusCode === 'number') serialized.statusCode = statusCode;

  const details: unknown = Reflect.get(error, 'details');
  if (isRecord(details)) serialized.details = details;

  if (error.cause !== undefined && remaining > 0) {
    serialized.cause = serializeError(error.cause, remaining - 1);
  }
  return serialized;
}

/**
 * Flattens a thrown value into plain log metadata. Causes are followed a few
 * levels deep.
 */
export function serializeError(error: unknown, remaining = MAX_CAUSE_DEPTH): SerializedError {
  if (error instanceof Error) return serializeInstance(error, remaining);
  if (typeof error === 'string') return { message: error };
  if (!isRecord(error)) return { message: String(error) };

  const message = stringField(error, 'message') ?? stringField(error, 'error') ?? JSON.stringify(error);
  return { message, name: stringField(error, 'name'), code: stringField(error, 'code') };
}
