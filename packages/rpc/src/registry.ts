/**
 * @fileoverview RPC Method Registry
 *
 * Maps method names to handlers, and namespaces to fallback handlers.
 * Built once at startup, then sealed and shared read-only by every
 * concurrent call.
 *
 * Resolution order:
 * 1. Exact method match
 * 2. Fallback registered for the method's namespace
 * 3. Not found
 *
 * An exact registration always wins over a fallback, whichever was
 * registered first, so a service can override a few methods of a namespace
 * it otherwise forwards wholesale.
 */

import { isValidNamespace, resolveNamespace } from './namespace.js';
import type { RpcRequest } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Handler signature shared by exact methods and fallbacks.
 *
 * Resolve with the result value; reject with an RpcError to report a
 * JSON-RPC error. Any other rejection is treated as an internal fault.
 *
 * @param request - The validated request
 * @param context - Shared application context, owned by the caller
 */
export type RpcHandler<C> = (request: RpcRequest, context: C) => Promise<unknown>;

export interface MethodDefinition<C> {
  method: string;
  handler: RpcHandler<C>;
}

export type Resolution<C> =
  | { kind: 'exact'; handler: RpcHandler<C> }
  | { kind: 'fallback'; namespace: string; handler: RpcHandler<C> }
  | { kind: 'not_found' };

export type ResolutionKind = Resolution<unknown>['kind'];

// =============================================================================
// Registry Implementation
// =============================================================================

/**
 * @example
 * ```typescript
 * const registry = new RpcRegistry<AppContext>()
 *   .withFallback('eth', forwardToUpstream)
 *   .withHandler('eth_sendRawTransaction', submitToMempool)
 *   .withHandler('moj_getProof', getProof);
 *
 * registry.lookup('eth_chainId');            // fallback
 * registry.lookup('eth_sendRawTransaction'); // exact
 * ```
 */
export class RpcRegistry<C> {
  private readonly handlers: Map<string, RpcHandler<C>> = new Map();
  private readonly fallbacks: Map<string, RpcHandler<C>> = new Map();
  private sealed = false;

  // ===========================================================================
  // Registration
  // ===========================================================================

  /**
   * Register a method handler. Re-registering a method replaces the
   * previous handler.
   *
   * @throws TypeError if the method name is empty
   * @throws Error if the registry is sealed
   */
  register(method: string, handler: RpcHandler<C>): this {
    this.assertMutable();
    if (method.length === 0) {
      throw new TypeError('Method name must be non-empty');
    }
    this.handlers.set(method, handler);
    return this;
  }

  /**
   * Register the fallback for every unregistered method of a namespace.
   * Re-registering a namespace replaces the previous fallback.
   *
   * @throws TypeError if the namespace is empty or contains an underscore
   * @throws Error if the registry is sealed
   */
  registerFallback(namespace: string, handler: RpcHandler<C>): this {
    this.assertMutable();
    if (!isValidNamespace(namespace)) {
      throw new TypeError(
        `Invalid namespace "${namespace}": must be non-empty and contain no underscore`
      );
    }
    this.fallbacks.set(namespace, handler);
    return this;
  }

  withHandler(method: string, handler: RpcHandler<C>): this {
    return this.register(method, handler);
  }

  withFallback(namespace: string, handler: RpcHandler<C>): this {
    return this.registerFallback(namespace, handler);
  }

  /**
   * Register several methods in order
   */
  registerAll(definitions: Iterable<MethodDefinition<C>>): this {
    for (const { method, handler } of definitions) {
      this.register(method, handler);
    }
    return this;
  }

  /**
   * Freeze the tables. Called by the service before it starts serving.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  private assertMutable(): void {
    if (this.sealed) {
      throw new Error('Registry is sealed; register handlers before the service starts');
    }
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  lookup(method: string): Resolution<C> {
    const handler = this.handlers.get(method);
    if (handler) {
      return { kind: 'exact', handler };
    }

    const namespace = resolveNamespace(method);
    if (namespace !== undefined) {
      const fallback = this.fallbacks.get(namespace);
      if (fallback) {
        return { kind: 'fallback', namespace, handler: fallback };
      }
    }

    return { kind: 'not_found' };
  }

  has(method: string): boolean {
    return this.handlers.has(method);
  }

  hasFallback(namespace: string): boolean {
    return this.fallbacks.has(namespace);
  }

  /**
   * Registered method names, in first-registration order
   */
  list(): string[] {
    return Array.from(this.handlers.keys());
  }

  listFallbacks(): string[] {
    return Array.from(this.fallbacks.keys());
  }

  get size(): number {
    return this.handlers.size;
  }
}
