import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { getLogger } from '../logging/logger.js';
import { DomainErrorCode, ServiceClientError } from '../error-handling/errors.js';

const logger = getLogger('response-validation');

export class ContractViolationError extends ServiceClientError {
  readonly zodError: ZodError;

  constructor(sourceService: string, endpoint: string, zodError: ZodError) {
    super(`Response contract violation from ${sourceService} at ${endpoint}`, 502, DomainErrorCode.GATEWAY_ERROR, undefined, {
      sourceService,
      endpoint,
      issues: zodError.issues.map(i => ({
        path: i.path.join('.'),
        message: i.message,
        code: i.code,
      })),
    });
    this.name = 'ContractViolationError';
    this.zodError = zodError;
  }
}

/**
 * Validates a decoded response body against the caller's schema.
 */
export function parseServiceResponse<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, sourceService: string, endpoint: string): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  logger.error('Response contract violation', {
    sourceService,
    endpoint,
    issues: result.error.issues.map(i => ({ path: i.path.join('.'), expected: i.message, code: i.code })),
    receivedKeys: data && typeof data === 'object' ? Object.keys(data) : typeof data,
  });

  throw new ContractViolationError(sourceService, endpoint, result.error);
}
