import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped fields merged into every log line written while the
 * request is in flight.
 */
export interface LogContext {
  correlationId: string;
  participantId?: string;
  operation?: string;
  [key: string]: unknown;
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.correlationId;
};

export const getLogContext = (): LogContext | undefined => {
  return asyncLocalStorage.getStore();
};

/**
 * Add fields to the current request's context; a no-op outside a request
 */
export const addLogContext = (context: Partial<LogContext>): void => {
  const store = asyncLocalStorage.getStore();
  if (store) {
    Object.assign(store, context);
  }
};
