import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Per-call fields that every log line written while the call is in flight
 * picks up, whichever module writes it.
 */
export interface CallContext {
  requestId: string;
  targetService?: string;
  endpoint?: string;
  method?: string;
}

export interface CallContextSource {
  getStore(): CallContext | undefined;
}

export const correlationStorage = new AsyncLocalStorage<CallContext>();

export const getCorrelationContext = (): CallContext | undefined => correlationStorage.getStore();

export const runWithContext = <T>(context: CallContext, fn: () => T): T => correlationStorage.run(context, fn);

export const generateRequestId = (): string => randomUUID();
