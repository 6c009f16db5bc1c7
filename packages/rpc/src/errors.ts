/**
 * @fileoverview RPC Error Types and the Error Shaper
 *
 * Handlers report failures by throwing one of the RpcError classes below.
 * `classifyError` is the only place that assigns JSON-RPC wire codes; every
 * other module goes through it, so the code table cannot drift.
 */

import { toJsonValue } from './envelope.js';
import type { RpcErrorObject } from './types.js';

// =============================================================================
// Taxonomy
// =============================================================================

export type RpcErrorKind =
  | 'ParseError'
  | 'InvalidRequest'
  | 'MethodNotFound'
  | 'InvalidParams'
  | 'InternalError'
  | 'Application';

/**
 * Reserved JSON-RPC 2.0 codes
 */
export const RpcErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export type RpcErrorCodeType = (typeof RpcErrorCode)[keyof typeof RpcErrorCode];

/**
 * Lowest code an application error may carry. Everything below is reserved
 * by the protocol.
 */
export const MIN_APPLICATION_CODE = -32000;

const CODE_BY_KIND: Record<Exclude<RpcErrorKind, 'Application'>, RpcErrorCodeType> = {
  ParseError: RpcErrorCode.PARSE_ERROR,
  InvalidRequest: RpcErrorCode.INVALID_REQUEST,
  MethodNotFound: RpcErrorCode.METHOD_NOT_FOUND,
  InvalidParams: RpcErrorCode.INVALID_PARAMS,
  InternalError: RpcErrorCode.INTERNAL_ERROR,
};

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base RPC error class
 */
export class RpcError extends Error {
  override readonly name: string = 'RpcError';

  constructor(
    public readonly kind: RpcErrorKind,
    message: string,
    public readonly data?: unknown
  ) {
    super(message);
  }
}

export class ParseError extends RpcError {
  override readonly name: string = 'ParseError';

  constructor() {
    super('ParseError', 'Parse error');
  }
}

/**
 * Malformed request object. The reason travels in `data`.
 */
export class InvalidRequestError extends RpcError {
  override readonly name: string = 'InvalidRequestError';

  constructor(reason?: string) {
    super('InvalidRequest', 'Invalid Request', reason);
  }
}

export class MethodNotFoundError extends RpcError {
  override readonly name: string = 'MethodNotFoundError';

  constructor(public readonly method: string) {
    super('MethodNotFound', 'Method not found');
  }
}

export class InvalidParamsError extends RpcError {
  override readonly name: string = 'InvalidParamsError';

  constructor(message = 'Invalid params', data?: unknown) {
    super('InvalidParams', message, data);
  }
}

/**
 * A failure the handler chose to report. Its message reaches the client,
 * unlike an arbitrary thrown Error.
 */
export class InternalError extends RpcError {
  override readonly name: string = 'InternalError';

  constructor(message = 'Internal error', data?: unknown) {
    super('InternalError', message, data);
  }
}

export class HandlerTimeoutError extends InternalError {
  override readonly name: string = 'HandlerTimeoutError';

  constructor(public readonly timeoutMs: number) {
    super('Handler timed out');
  }
}

/**
 * Business error with a handler-chosen code (e.g. insufficient balance).
 * Codes must be integers >= -32000.
 */
export class ApplicationError extends RpcError {
  override readonly name: string = 'ApplicationError';

  constructor(
    public readonly code: number,
    message: string,
    data?: unknown
  ) {
    super('Application', message, data);
  }
}

export function isRpcError(error: unknown): error is RpcError {
  return error instanceof RpcError;
}

// =============================================================================
// Error Shaper
// =============================================================================

/**
 * How a failure was classified:
 * - reported: an RpcError, passed through
 * - unexpected: anything else, replaced by an opaque internal error
 * - invalid_code: an ApplicationError whose code is outside the application range
 */
export type FaultKind = 'reported' | 'unexpected' | 'invalid_code';

export interface ShapedError {
  error: RpcErrorObject;
  fault: FaultKind;
}

const OPAQUE_INTERNAL: RpcErrorObject = {
  code: RpcErrorCode.INTERNAL_ERROR,
  message: 'Internal error',
};

function withData(code: number, message: string, data: unknown): RpcErrorObject {
  const json = data === undefined ? undefined : toJsonValue(data);
  return json === undefined ? { code, message } : { code, message, data: json };
}

export function isApplicationCode(code: number): boolean {
  return Number.isInteger(code) && code >= MIN_APPLICATION_CODE;
}

/**
 * Map any failure to its wire error object.
 */
export function classifyError(error: unknown): ShapedError {
  if (!(error instanceof RpcError)) {
    return { error: { ...OPAQUE_INTERNAL }, fault: 'unexpected' };
  }

  if (error instanceof ApplicationError) {
    if (!isApplicationCode(error.code)) {
      return { error: { ...OPAQUE_INTERNAL }, fault: 'invalid_code' };
    }
    return { error: withData(error.code, error.message, error.data), fault: 'reported' };
  }

  if (error.kind === 'Application') {
    // Application kind without a code cannot be placed on the wire
    return { error: { ...OPAQUE_INTERNAL }, fault: 'invalid_code' };
  }

  return {
    error: withData(CODE_BY_KIND[error.kind], error.message, error.data),
    fault: 'reported',
  };
}

export function shapeError(error: unknown): RpcErrorObject {
  return classifyError(error).error;
}
