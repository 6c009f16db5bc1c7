/**
 * @fileoverview Handler middleware
 *
 * Middleware wraps the handler of every resolved request. It never sees a
 * malformed request or an unknown method; those are answered before the
 * chain is built. Throwing an RpcError reports that error to the client.
 */

import type { ISwitchyardLogger } from '@switchyard/core';
import type { RpcRequest } from '../types.js';

export type MiddlewareNext = (request: RpcRequest) => Promise<unknown>;

/**
 * Receives the request and the rest of the chain. It may rewrite the
 * request, transform the result, answer without calling `next`, or throw.
 */
export type Middleware = (request: RpcRequest, next: MiddlewareNext) => Promise<unknown>;

/**
 * Compose middleware around a handler; `middleware[0]` runs outermost.
 */
export function buildMiddlewareChain(middleware: readonly Middleware[], handler: MiddlewareNext): MiddlewareNext {
  return middleware.reduceRight<MiddlewareNext>((next, layer) => (request) => layer(request, next), handler);
}

export interface HandlerTiming {
  method: string;
  durationMs: number;
  /** False when the rest of the chain threw */
  ok: boolean;
}

/**
 * Report the duration of every handler call, whether it resolved or threw
 */
export function createTimingMiddleware(onTiming: (timing: HandlerTiming) => void): Middleware {
  return async (request, next) => {
    const start = performance.now();
    let ok = false;
    try {
      const result = await next(request);
      ok = true;
      return result;
    } finally {
      onTiming({ method: request.method, durationMs: performance.now() - start, ok });
    }
  };
}

/**
 * Trace each handler call at debug. A failure goes to warn and is rethrown.
 */
export function createLoggingMiddleware(logger: ISwitchyardLogger): Middleware {
  return async (request, next) => {
    const fields = { method: request.method, id: request.id ?? null };
    logger.debug('Handler started', fields);

    try {
      const result = await next(request);
      logger.debug('Handler finished', fields);
      return result;
    } catch (error) {
      logger.warn('Handler threw', { ...fields, error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  };
}

export {
  createValidationMiddleware,
  invalidParams,
  toParamIssues,
  describeIssues,
  type ParamSchemas,
  type ParamIssue,
  type ParamsValidationOptions,
} from './validation.js';
