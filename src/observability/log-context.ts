import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped fields merged into every log line
 */
export interface LogContext {
  correlationId: string;
  userId?: string;
  subsidyId?: string;
  transactionId?: string;
  learnerId?: number;
  contentKey?: string;
}

export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => asyncLocalStorage.getStore()?.correlationId;

export const getLogContext = (): LogContext | undefined => asyncLocalStorage.getStore();

/**
 * Merge fields into the current context; no-op outside a request
 */
export const addLogContext = (context: Partial<LogContext>): void => {
  const store = asyncLocalStorage.getStore();
  if (store) {
    Object.assign(store, context);
  }
};

export const runWithContext = <T>(context: LogContext, fn: () => T): T => asyncLocalStorage.run(context, fn);
