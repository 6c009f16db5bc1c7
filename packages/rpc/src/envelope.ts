/**
 * @fileoverview Request decoding and response construction
 *
 * Shape validation only: nothing here looks at the registry or runs a handler.
 */

import { z } from 'zod';
import type {
  JsonValue,
  RpcErrorObject,
  RpcErrorResponse,
  RpcId,
  RpcPayload,
  RpcRequest,
  RpcSuccessResponse,
} from './types.js';

const requestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string().min(1),
  params: z.union([z.array(z.unknown()), z.record(z.unknown())]).nullish(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
});

const FIELD_REASONS: Record<string, string> = {
  jsonrpc: 'jsonrpc must be "2.0"',
  method: 'method must be a non-empty string',
  params: 'params must be an array or an object',
  id: 'id must be a string, a number or null',
};

export const NOT_AN_OBJECT_REASON = 'request must be an object';

export type DecodeResult =
  | { ok: true; request: RpcRequest }
  | { ok: false; id: RpcId; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The id to echo on a malformed request: only a string or number counts.
 */
export function usableId(candidate: unknown): RpcId {
  if (!isRecord(candidate)) {
    return null;
  }
  const { id } = candidate;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

/**
 * Validate a decoded JSON value as a single request.
 *
 * A malformed request, batch items included, keeps a string or number id
 * in its error so the client can match the reply; anything else gets null.
 */
export function decodeRequest(candidate: unknown): DecodeResult {
  if (!isRecord(candidate)) {
    return { ok: false, id: null, reason: NOT_AN_OBJECT_REASON };
  }

  const parsed = requestSchema.safeParse(candidate);
  if (!parsed.success) {
    const field = parsed.error.errors[0]?.path[0];
    const reason = (typeof field === 'string' && FIELD_REASONS[field]) || 'malformed request';
    return { ok: false, id: usableId(candidate), reason };
  }

  const { jsonrpc, method, params, id } = parsed.data;
  const request: RpcRequest = { jsonrpc, method };
  if (params !== undefined && params !== null) {
    request.params = params;
  }
  if (id !== undefined) {
    request.id = id;
  }
  return { ok: true, request };
}

export function isNotification(request: RpcRequest): boolean {
  return request.id === undefined || request.id === null;
}

/**
 * Convert an arbitrary handler value to plain JSON.
 * Returns undefined when the value cannot be represented (cycles, BigInt).
 * A top-level undefined becomes null.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === undefined) {
    return null;
  }
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch {
    return undefined;
  }
  // functions and symbols stringify to undefined
  if (text === undefined) {
    return undefined;
  }
  const json: JsonValue = JSON.parse(text);
  return json;
}

export function successResponse(id: RpcId, result: JsonValue): RpcSuccessResponse {
  return { jsonrpc: '2.0', id, result };
}

export function errorResponse(id: RpcId, error: RpcErrorObject): RpcErrorResponse {
  return { jsonrpc: '2.0', id, error };
}

export type ParseBodyResult = { ok: true; value: unknown } | { ok: false };

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode raw body bytes as UTF-8 JSON.
 */
export function parseBody(body: string | Uint8Array): ParseBodyResult {
  let text: string;
  if (typeof body === 'string') {
    text = body;
  } else {
    try {
      text = utf8.decode(body);
    } catch {
      return { ok: false };
    }
  }

  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

export function serialize(payload: RpcPayload): string {
  return JSON.stringify(payload);
}
