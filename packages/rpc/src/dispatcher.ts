/**
 * @fileoverview Single-request dispatch
 *
 * Drives one request through validate, resolve, invoke, shape and suppress.
 * Every path ends either with a response or, for a well-formed
 * notification, with nothing; the handler of a notification still runs.
 */

import { createLogger, withLoggingContext, type ISwitchyardLogger } from '@switchyard/core';
import {
  decodeRequest,
  errorResponse,
  isNotification,
  successResponse,
  toJsonValue,
} from './envelope.js';
import {
  HandlerTimeoutError,
  InternalError,
  InvalidRequestError,
  MethodNotFoundError,
  classifyError,
} from './errors.js';
import { buildMiddlewareChain, type Middleware } from './middleware/index.js';
import type { RpcRegistry, RpcHandler, ResolutionKind } from './registry.js';
import type { RpcId, RpcRequest, RpcResponse } from './types.js';

// =============================================================================
// Types
// =============================================================================

export type DispatchOutcome =
  | { state: 'responded'; response: RpcResponse }
  | { state: 'suppressed' };

export interface DispatchOptions {
  /** Per-handler time limit in milliseconds; 0 or absent means none */
  timeoutMs?: number;
}

export interface DispatcherOptions {
  middleware?: readonly Middleware[];
  logger?: ISwitchyardLogger;
}

// =============================================================================
// Timeout
// =============================================================================

/**
 * Race work against a timer. The work keeps running after the timer fires;
 * its late settlement is absorbed here so it never surfaces as an
 * unhandled rejection.
 */
export function withTimeout<T>(work: Promise<T>, timeoutMs: number | undefined): Promise<T> {
  if (timeoutMs === undefined || timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
    return work;
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new HandlerTimeoutError(timeoutMs)), timeoutMs);
    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

// =============================================================================
// Dispatcher
// =============================================================================

export class Dispatcher<C> {
  private readonly middleware: readonly Middleware[];
  private readonly logger: ISwitchyardLogger;

  constructor(
    private readonly registry: RpcRegistry<C>,
    options: DispatcherOptions = {}
  ) {
    this.middleware = options.middleware ?? [];
    this.logger = options.logger ?? createLogger('rpc-dispatcher');
  }

  /**
   * Dispatch one decoded JSON value as a request.
   * Never rejects.
   */
  async dispatch(candidate: unknown, context: C, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    // 1. Validate
    const decoded = decodeRequest(candidate);
    if (!decoded.ok) {
      this.logger.debug('Rejected malformed request', { id: decoded.id, reason: decoded.reason });
      return this.respondWithError(decoded.id, new InvalidRequestError(decoded.reason));
    }

    const { request } = decoded;
    const id: RpcId = request.id ?? null;
    const notification = isNotification(request);

    // 2. Resolve
    const resolution = this.registry.lookup(request.method);
    let response: RpcResponse;

    if (resolution.kind === 'not_found') {
      this.logger.debug('Method not found', { method: request.method, id });
      response = errorResponse(id, classifyError(new MethodNotFoundError(request.method)).error);
    } else {
      // 3 + 4. Invoke and shape
      const { kind, handler } = resolution;
      response = await withLoggingContext({ method: request.method, requestId: id }, () =>
        this.invoke(request, id, kind, handler, context, options)
      );
    }

    // 5. Suppress
    if (notification) {
      return { state: 'suppressed' };
    }
    return { state: 'responded', response };
  }

  private async invoke(
    request: RpcRequest,
    id: RpcId,
    resolution: ResolutionKind,
    handler: RpcHandler<C>,
    context: C,
    options: DispatchOptions
  ): Promise<RpcResponse> {
    const logFields = { method: request.method, id, resolution };
    this.logger.debug('Dispatching RPC request', logFields);

    const start = performance.now();
    const chain = buildMiddlewareChain(this.middleware, (req) => handler(req, context));

    try {
      // async wrapper turns a synchronous throw into a rejection
      const value = await withTimeout((async () => chain(request))(), options.timeoutMs);
      const result = toJsonValue(value);
      if (result === undefined) {
        throw new InternalError('Handler result is not serializable');
      }

      this.logger.debug('RPC request completed', {
        ...logFields,
        durationMs: Math.round(performance.now() - start),
      });
      return successResponse(id, result);
    } catch (error) {
      const shaped = classifyError(error);
      const durationMs = Math.round(performance.now() - start);

      switch (shaped.fault) {
        case 'reported':
          this.logger.warn('RPC request failed', { ...logFields, code: shaped.error.code, durationMs });
          break;
        case 'invalid_code':
          this.logger.error('Handler reported an error code outside the application range', {
            ...logFields,
            durationMs,
          });
          break;
        case 'unexpected':
          this.logger.error('Handler failed unexpectedly', {
            ...logFields,
            durationMs,
            err: error instanceof Error ? error : new Error(String(error)),
          });
          break;
      }

      return errorResponse(id, shaped.error);
    }
  }

  private respondWithError(id: RpcId, error: Error): DispatchOutcome {
    return { state: 'responded', response: errorResponse(id, classifyError(error).error) };
  }
}
