import { z } from 'zod';
import { GatewayErrorResponse, ServiceClientError, ServiceUnavailableError } from '../error-handling/errors.js';
import type { GatewayResponse } from './types.js';

const gatewayErrorBodySchema = z.object({
  error: z.object({
    type: z.string().default('Unknown'),
    message: z.string().default('Unknown error'),
    correlation_id: z.string().nullish(),
  }),
});

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Maps a 4xx answer to an error: the gateway's structured
 * `{ error: { type, message, correlation_id } }` body when present,
 * otherwise a generic client error carrying status and raw text.
 */
export function parseClientErrorResponse(response: GatewayResponse): ServiceClientError {
  const parsed = gatewayErrorBodySchema.safeParse(tryParseJson(response.body));
  if (parsed.success) {
    const { type, message, correlation_id } = parsed.data.error;
    return new GatewayErrorResponse(type, message, response.status, correlation_id ?? undefined);
  }
  return ServiceClientError.fromStatus(response.status, response.body);
}

export function serverErrorResponse(targetService: string, response: GatewayResponse): ServiceUnavailableError {
  const status = response.status >= 500 && response.status < 600 ? response.status : 503;
  return new ServiceUnavailableError(targetService, `Service returned ${response.status}: ${response.body}`, status);
}

/**
 * Decodes a success body: JSON when it parses, the raw text otherwise, and
 * `null` for an empty body.
 */
export function decodeBody(body: string): unknown {
  if (body.trim() === '') return null;
  const parsed = tryParseJson(body);
  return parsed === undefined ? body : parsed;
}
