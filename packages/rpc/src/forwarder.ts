/**
 * @fileoverview Upstream forwarding fallback
 *
 * A fallback handler that relays requests to an upstream JSON-RPC node,
 * e.g. every `eth_*` call to an execution-layer client while the local
 * service implements only its own extensions.
 */

import { z } from 'zod';
import { createLogger, type ISwitchyardLogger } from '@switchyard/core';
import {
  ApplicationError,
  InternalError,
  InvalidParamsError,
  MethodNotFoundError,
  RpcErrorCode,
  isApplicationCode,
} from './errors.js';
import type { RpcHandler } from './registry.js';

export interface ForwardingOptions {
  /** Upstream JSON-RPC endpoint */
  url: string;
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
  /** Abort the upstream call after this many milliseconds; 0 or absent means never */
  timeoutMs?: number;
  headers?: Record<string, string>;
  logger?: ISwitchyardLogger;
}

const upstreamResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

type UpstreamError = NonNullable<z.infer<typeof upstreamResponseSchema>['error']>;

const UPSTREAM_FAILED = 'Upstream request failed';

/**
 * Translate an upstream error object into the local taxonomy
 */
export function mapUpstreamError(error: UpstreamError, method: string): Error {
  switch (error.code) {
    case RpcErrorCode.METHOD_NOT_FOUND:
      return new MethodNotFoundError(method);
    case RpcErrorCode.INVALID_PARAMS:
      return new InvalidParamsError(error.message, error.data);
    case RpcErrorCode.INTERNAL_ERROR:
      return new InternalError(error.message, error.data);
    default:
      // parse / invalid-request from upstream mean our forward was bad
      return isApplicationCode(error.code)
        ? new ApplicationError(error.code, error.message, error.data)
        : new InternalError(UPSTREAM_FAILED);
  }
}

export function createForwardingFallback<C = unknown>(options: ForwardingOptions): RpcHandler<C> {
  const doFetch = options.fetch ?? fetch;
  const logger = options.logger ?? createLogger('rpc-forwarder');
  let nextId = 1;

  return async (request) => {
    const upstreamId = nextId++;
    const body = JSON.stringify({
      jsonrpc: '2.0',
      id: upstreamId,
      method: request.method,
      ...(request.params !== undefined ? { params: request.params } : {}),
    });

    let raw: unknown;
    try {
      const response = await doFetch(options.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...options.headers },
        body,
        ...(options.timeoutMs ? { signal: AbortSignal.timeout(options.timeoutMs) } : {}),
      });

      if (!response.ok) {
        logger.warn('Upstream returned an error status', {
          url: options.url,
          method: request.method,
          status: response.status,
        });
        throw new InternalError(UPSTREAM_FAILED);
      }

      raw = await response.json();
    } catch (error) {
      if (error instanceof InternalError) {
        throw error;
      }
      logger.warn('Upstream request failed', {
        url: options.url,
        method: request.method,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new InternalError(UPSTREAM_FAILED);
    }

    const parsed = upstreamResponseSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Upstream response is not a JSON-RPC response', {
        url: options.url,
        method: request.method,
      });
      throw new InternalError(UPSTREAM_FAILED);
    }

    if (parsed.data.error) {
      throw mapUpstreamError(parsed.data.error, request.method);
    }

    return parsed.data.result ?? null;
  };
}
