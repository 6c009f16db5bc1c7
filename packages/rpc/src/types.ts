/**
 * @fileoverview JSON-RPC 2.0 wire types
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/**
 * Request id. An absent id or an explicit null marks a notification.
 */
export type RpcId = string | number | null;

export type RpcParams = unknown[] | Record<string, unknown>;

export interface RpcRequest {
  jsonrpc: '2.0';
  method: string;
  params?: RpcParams;
  id?: RpcId;
}

export interface RpcErrorObject {
  code: number;
  message: string;
  data?: JsonValue;
}

export interface RpcSuccessResponse {
  jsonrpc: '2.0';
  id: RpcId;
  result: JsonValue;
}

export interface RpcErrorResponse {
  jsonrpc: '2.0';
  id: RpcId;
  error: RpcErrorObject;
}

export type RpcResponse = RpcSuccessResponse | RpcErrorResponse;

/**
 * What a call produces on the wire: one response, or an array for a batch.
 */
export type RpcPayload = RpcResponse | RpcResponse[];

export function isErrorResponse(response: RpcResponse): response is RpcErrorResponse {
  return 'error' in response;
}
