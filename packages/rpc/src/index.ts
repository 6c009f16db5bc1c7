/**
 * @fileoverview @switchyard/rpc
 *
 * Transport-agnostic JSON-RPC 2.0 dispatch engine.
 */

export type {
  JsonPrimitive,
  JsonValue,
  RpcId,
  RpcParams,
  RpcRequest,
  RpcErrorObject,
  RpcSuccessResponse,
  RpcErrorResponse,
  RpcResponse,
  RpcPayload,
} from './types.js';
export { isErrorResponse } from './types.js';

export {
  decodeRequest,
  isNotification,
  usableId,
  toJsonValue,
  successResponse,
  errorResponse,
  parseBody,
  serialize,
  type DecodeResult,
  type ParseBodyResult,
} from './envelope.js';

export {
  RpcError,
  ParseError,
  InvalidRequestError,
  MethodNotFoundError,
  InvalidParamsError,
  InternalError,
  HandlerTimeoutError,
  ApplicationError,
  RpcErrorCode,
  MIN_APPLICATION_CODE,
  isRpcError,
  isApplicationCode,
  classifyError,
  shapeError,
  type RpcErrorKind,
  type RpcErrorCodeType,
  type FaultKind,
  type ShapedError,
} from './errors.js';

export {
  NAMESPACE_SEPARATOR,
  resolveNamespace,
  isValidNamespace,
} from './namespace.js';

export {
  RpcRegistry,
  type RpcHandler,
  type MethodDefinition,
  type Resolution,
  type ResolutionKind,
} from './registry.js';

export {
  Dispatcher,
  withTimeout,
  type DispatchOutcome,
  type DispatchOptions,
  type DispatcherOptions,
} from './dispatcher.js';

export {
  processPayload,
  isStructuredBody,
  type DispatchFn,
  type BatchOptions,
} from './batch.js';

export {
  RpcService,
  type RpcServiceOptions,
  type HandleOptions,
  type RpcServiceResult,
} from './service.js';

export {
  buildMiddlewareChain,
  createTimingMiddleware,
  createLoggingMiddleware,
  createValidationMiddleware,
  invalidParams,
  toParamIssues,
  describeIssues,
  type Middleware,
  type MiddlewareNext,
  type HandlerTiming,
  type ParamSchemas,
  type ParamIssue,
  type ParamsValidationOptions,
} from './middleware/index.js';

export { defineMethod, normalizeParams, type TypedMethod } from './params.js';

export { createForwardingFallback, mapUpstreamError, type ForwardingOptions } from './forwarder.js';

export { RpcHttpServer, type RpcHttpServerOptions } from './http.js';
