import * as winston from 'winston';
import type { CallContextSource } from './correlation.js';

// Outbound calls carry the service token in a header, so these keys never reach a log line.
const SECRET_KEY = /authorization|cookie|api[-_]?key|token|secret|password|bearer|credential/i;

export const REDACTED = '[REDACTED]';

export const isSecretKey = (key: string): boolean => SECRET_KEY.test(key);

/**
 * Copies `value` with every credential-like key replaced by {@link REDACTED}.
 * Nesting below `depth` levels is returned untouched.
 */
export function maskSecrets(value: unknown, depth = 3): unknown {
  if (depth <= 0 || typeof value !== 'object' || value === null) return value;
  if (Array.isArray(value)) return value.map(item => maskSecrets(item, depth - 1));

  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [key, isSecretKey(key) ? REDACTED : maskSecrets(entry, depth - 1)])
  );
}

export function safeStringify(value: unknown, maxLength = 10000): string {
  let text: string;
  try {
    text = JSON.stringify(maskSecrets(value, 5));
  } catch {
    return '[CIRCULAR_OR_INVALID_JSON]';
  }
  return text.length > maxLength ? `${text.slice(0, maxLength)}...[TRUNCATED]` : text;
}

function withCallContext(source: CallContextSource): winston.Logform.Format {
  return winston.format(info => {
    const context = source.getStore();
    if (!context) return info;
    for (const [key, value] of Object.entries(context)) {
      if (value !== undefined && info[key] === undefined) info[key] = value;
    }
    return info;
  })();
}

/**
 * One colorized line per entry: `time level [service] target#request: message {meta}`.
 */
export function createDevFormat(source: CallContextSource): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
    withCallContext(source),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, requestId, targetService, ...meta }) => {
      const call = targetService ? ` ${String(targetService)}` : '';
      const request = requestId ? `#${String(requestId).slice(0, 8)}` : '';
      const extra = Object.keys(meta).length > 0 ? ` ${safeStringify(meta, 1000)}` : '';
      return `${String(timestamp)} ${level} [${String(service)}]${call}${request}: ${String(message)}${extra}`;
    })
  );
}

export function createProdFormat(source: CallContextSource): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    withCallContext(source),
    winston.format.printf(info => safeStringify(info, 50000))
  );
}
