/**
 * JSON-RPC envelope types
 *
 * Inbound/outbound envelopes are JSON-RPC 2.0 (callers of the gateway).
 * Node envelopes are JSON-RPC 1.0 as spoken by Bitcoin Core.
 */

export const JSONRPC_VERSION = '2.0';
export const NODE_JSONRPC_VERSION = '1.0';

/**
 * Request identifier. Echoed back verbatim and never inspected, so any JSON
 * value is carried through untouched.
 */
export type JsonRpcId = unknown;

export type JsonRpcParams = Record<string, unknown>;

export interface JsonRpcRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params?: JsonRpcParams;
  id?: JsonRpcId;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse<T = unknown> {
  jsonrpc: typeof JSONRPC_VERSION;
  result: T;
  id: JsonRpcId;
}

export interface JsonRpcErrorResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  error: JsonRpcErrorObject;
  id: JsonRpcId;
}

export type JsonRpcResponse<T = unknown> = JsonRpcSuccessResponse<T> | JsonRpcErrorResponse;

export function isJsonRpcErrorResponse(response: JsonRpcResponse): response is JsonRpcErrorResponse {
  return 'error' in response;
}

// =============================================================================
// Bitcoin Core (JSON-RPC 1.0)
// =============================================================================

export interface NodeRpcRequest {
  jsonrpc: typeof NODE_JSONRPC_VERSION;
  id: string;
  method: string;
  params: readonly unknown[];
}

export interface NodeRpcError {
  code: number;
  message: string;
}

export interface NodeRpcResponse<T = unknown> {
  result: T | null;
  error: NodeRpcError | null;
  id: string | null;
}
