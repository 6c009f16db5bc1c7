/**
 * @fileoverview Typed method definitions
 *
 * Lets a handler declare its params as a Zod schema and receive them
 * already validated. Positional params are normalized first:
 * - absent or `[]`  -> null
 * - `[x]`           -> x
 * - `[x, y, ...]`   -> the array as is
 * - an object       -> the object as is
 *
 * So a method with no params uses `z.null()`, a single param its own schema,
 * and several params a `z.tuple([...])`.
 */

import type { z, ZodTypeAny } from 'zod';
import { invalidParams } from './middleware/validation.js';
import type { MethodDefinition } from './registry.js';
import type { RpcParams, RpcRequest } from './types.js';

export interface TypedMethod<C, S extends ZodTypeAny> {
  method: string;
  params: S;
  handler: (params: z.output<S>, context: C, request: RpcRequest) => Promise<unknown>;
}

export function normalizeParams(params: RpcParams | undefined): unknown {
  if (params === undefined) {
    return null;
  }
  if (Array.isArray(params)) {
    if (params.length === 0) return null;
    if (params.length === 1) return params[0];
  }
  return params;
}

/**
 * @example
 * ```typescript
 * const getProof = defineMethod({
 *   method: 'moj_getProof',
 *   params: z.string().regex(/^0x[0-9a-f]+$/i),
 *   handler: async (jobId, ctx: AppContext) => ctx.proofs.get(jobId),
 * });
 *
 * registry.registerAll([getProof]);
 * ```
 */
export function defineMethod<C, S extends ZodTypeAny>(definition: TypedMethod<C, S>): MethodDefinition<C> {
  const { method, params: schema, handler } = definition;

  return {
    method,
    handler: async (request, context) => {
      const parsed = schema.safeParse(normalizeParams(request.params));
      if (!parsed.success) {
        throw invalidParams(parsed.error, 'Invalid params');
      }
      return handler(parsed.data, context, request);
    },
  };
}
