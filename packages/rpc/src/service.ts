/**
 * @fileoverview RPC Service
 *
 * Binds a context and a registry behind one entry point: raw body in,
 * raw response body out (or nothing, for notifications). Transport-agnostic;
 * see http.ts for the HTTP binding.
 */

import { randomUUID } from 'crypto';
import {
  createLogger,
  getSettings,
  withLoggingContext,
  type ISwitchyardLogger,
  type RpcSettings,
} from '@switchyard/core';
import { isStructuredBody, processPayload } from './batch.js';
import { Dispatcher } from './dispatcher.js';
import { errorResponse, parseBody, serialize } from './envelope.js';
import { ParseError, shapeError } from './errors.js';
import type { Middleware } from './middleware/index.js';
import type { RpcRegistry } from './registry.js';
import type { RpcPayload } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface RpcServiceOptions {
  /** Middleware wrapped around every handler invocation */
  middleware?: readonly Middleware[];
  /** Overrides for the rpc section of the loaded settings */
  settings?: Partial<RpcSettings>;
  logger?: ISwitchyardLogger;
}

export interface HandleOptions {
  /** Per-handler limit for this call; overrides the service default */
  timeoutMs?: number;
}

export interface RpcServiceResult {
  /** Response JSON, or null when nothing is to be sent back */
  body: string | null;
  /** True when the body was not JSON, or JSON that is neither an object nor an array */
  malformed: boolean;
}

// =============================================================================
// Service
// =============================================================================

/**
 * @example
 * ```typescript
 * const service = new RpcService(appContext, registry);
 * const reply = await service.handle('{"jsonrpc":"2.0","method":"eth_chainId","id":1}');
 * ```
 */
export class RpcService<C> {
  private readonly dispatcher: Dispatcher<C>;
  private readonly logger: ISwitchyardLogger;
  private readonly settings: RpcSettings;

  constructor(
    private readonly context: C,
    readonly registry: RpcRegistry<C>,
    options: RpcServiceOptions = {}
  ) {
    registry.seal();
    // settings first: loading them sets the level new loggers start at
    this.settings = { ...getSettings().rpc, ...options.settings };
    this.logger = options.logger ?? createLogger('rpc-service');
    this.dispatcher = new Dispatcher(registry, {
      middleware: options.middleware,
      logger: this.logger,
    });
  }

  /**
   * Handle a raw request body.
   *
   * @returns The response body, or null for notification-only submissions
   */
  async handle(body: string | Uint8Array, options: HandleOptions = {}): Promise<string | null> {
    const result = await this.process(body, options);
    return result.body;
  }

  /**
   * Handle a raw body and report whether it was malformed, so a transport
   * can pick its status code.
   */
  async process(body: string | Uint8Array, options: HandleOptions = {}): Promise<RpcServiceResult> {
    const parsed = parseBody(body);
    if (!parsed.ok) {
      this.logger.debug('Rejected body that is not valid JSON');
      return {
        body: serialize(errorResponse(null, shapeError(new ParseError()))),
        malformed: true,
      };
    }

    const payload = await this.run(parsed.value, options);
    return {
      body: payload === null ? null : serialize(payload),
      malformed: !isStructuredBody(parsed.value),
    };
  }

  /**
   * Handle a body that was already decoded from JSON
   */
  async handleValue(value: unknown, options: HandleOptions = {}): Promise<RpcPayload | null> {
    return this.run(value, options);
  }

  private run(value: unknown, options: HandleOptions): Promise<RpcPayload | null> {
    const timeoutMs = options.timeoutMs ?? this.settings.handlerTimeoutMs;

    return withLoggingContext({ traceId: randomUUID() }, async () => {
      try {
        return await processPayload(
          value,
          (candidate, index) =>
            index === undefined
              ? this.dispatcher.dispatch(candidate, this.context, { timeoutMs })
              : withLoggingContext({ batchIndex: index }, () =>
                  this.dispatcher.dispatch(candidate, this.context, { timeoutMs })
                ),
          { maxBatchSize: this.settings.maxBatchSize }
        );
      } catch (error) {
        // The dispatcher never rejects; reaching this is a bug in the core itself
        this.logger.error('RPC processing failed', error instanceof Error ? error : { error: String(error) });
        return errorResponse(null, shapeError(error));
      }
    });
  }
}
