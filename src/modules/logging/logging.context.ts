import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped logging context, carried through AsyncLocalStorage so any
 * log line written while handling a request can be correlated with it.
 */
export interface RequestContext {
  requestId: string;
}

export const loggingContext = new AsyncLocalStorage<RequestContext>();

/**
 * Returns undefined outside of a request scope.
 */
export function getRequestId(): string | undefined {
  return loggingContext.getStore()?.requestId;
}
