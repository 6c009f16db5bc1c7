/**
 * @fileoverview Logging Context - AsyncLocalStorage for automatic context propagation
 *
 * Carries per-call fields (trace id, batch index) through the async work a
 * single RPC call fans out into, without threading them through every handler.
 */

import { AsyncLocalStorage } from 'async_hooks';

export interface LoggingContext {
  traceId?: string;
  method?: string;
  requestId?: string | number | null;
  batchIndex?: number;
}

const loggingContext = new AsyncLocalStorage<LoggingContext>();

/**
 * Run a function with the specified logging context.
 * Fields merge over any context already active in the caller.
 *
 * @example
 * withLoggingContext({ traceId: 'abc' }, () => {
 *   logger.info('This log will have traceId attached');
 * });
 */
export function withLoggingContext<T>(context: LoggingContext, fn: () => T): T {
  const parentContext = loggingContext.getStore() ?? {};
  return loggingContext.run({ ...parentContext, ...context }, fn);
}

/**
 * Get the current logging context.
 * Returns an empty object outside of a withLoggingContext block.
 */
export function getLoggingContext(): LoggingContext {
  return loggingContext.getStore() ?? {};
}
