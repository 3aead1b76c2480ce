/**
 * Gateway error taxonomy
 *
 * A closed set of error kinds, each bound to one JSON-RPC numeric code.
 * Upstream clients raise these, the dispatcher renders them. Anything that
 * is not a GatewayError reaching the dispatcher becomes an InternalError.
 *
 * Kinds are a string-literal union rather than a class hierarchy so callers
 * can `switch (err.kind)` exhaustively.
 */

import type { JsonRpcErrorObject } from './jsonrpc';

export type GatewayErrorKind =
  | 'ParseError'
  | 'InvalidRequestError'
  | 'MethodNotFoundError'
  | 'InvalidParamsError'
  | 'InternalError'
  | 'BitcoinMCPError'
  | 'BitcoinRPCError'
  | 'ValidationError'
  | 'NetworkError'
  | 'RateLimitError';

export const ERROR_CODES = {
  ParseError: -32700,
  InvalidRequestError: -32600,
  MethodNotFoundError: -32601,
  InvalidParamsError: -32602,
  InternalError: -32603,
  BitcoinMCPError: -32000,
  BitcoinRPCError: -32001,
  ValidationError: -32002,
  NetworkError: -32003,
  RateLimitError: -32004,
} as const satisfies Record<GatewayErrorKind, number>;

export type GatewayErrorCode = (typeof ERROR_CODES)[GatewayErrorKind];

/** Structured payload attached to the wire error (offending field, upstream error, ...). */
export type ErrorData = Record<string, unknown>;

export interface GatewayErrorOptions {
  data?: ErrorData;
  cause?: unknown;
}

export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly code: GatewayErrorCode;
  readonly data?: ErrorData;

  constructor(kind: GatewayErrorKind, message: string, options: GatewayErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = kind;
    this.kind = kind;
    this.code = ERROR_CODES[kind];
    if (options.data !== undefined) {
      this.data = options.data;
    }
    // Ensure instanceof works correctly across module boundaries
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Wire form of the error. `cause` never leaves the process.
   */
  toJsonRpcError(): JsonRpcErrorObject {
    const wire: JsonRpcErrorObject = { code: this.code, message: this.message };
    if (this.data !== undefined) {
      wire.data = this.data;
    }
    return wire;
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}

const KINDS = new Set<string>(Object.keys(ERROR_CODES));

export function isErrorKind(value: string): value is GatewayErrorKind {
  return KINDS.has(value);
}

/**
 * Reverse lookup used when a numeric code arrives from elsewhere
 * (e.g. a forwarded JSON-RPC error). Unknown codes map to undefined.
 */
export function kindForCode(code: number): GatewayErrorKind | undefined {
  for (const [kind, value] of Object.entries(ERROR_CODES)) {
    if (value === code && isErrorKind(kind)) {
      return kind;
    }
  }
  return undefined;
}

// =============================================================================
// Factories
// =============================================================================

export function parseError(message = 'Parse error'): GatewayError {
  return new GatewayError('ParseError', message);
}

export function invalidRequest(message = 'Invalid Request', data?: ErrorData): GatewayError {
  return new GatewayError('InvalidRequestError', message, { data });
}

export function methodNotFound(method: string): GatewayError {
  return new GatewayError('MethodNotFoundError', `Method not found: ${method}`, { data: { method } });
}

export function invalidParams(message: string, field?: string): GatewayError {
  return new GatewayError('InvalidParamsError', message, field !== undefined ? { data: { field } } : {});
}

export function internalError(cause?: unknown): GatewayError {
  return new GatewayError('InternalError', 'Internal error', { cause });
}

export function rpcError(message: string, options: GatewayErrorOptions = {}): GatewayError {
  return new GatewayError('BitcoinRPCError', message, options);
}

export function validationError(message: string, field?: string): GatewayError {
  return new GatewayError('ValidationError', message, field !== undefined ? { data: { field } } : {});
}

export function networkError(message: string, options: GatewayErrorOptions = {}): GatewayError {
  return new GatewayError('NetworkError', message, options);
}

export function rateLimitError(message = 'Rate limit exceeded', data?: ErrorData): GatewayError {
  return new GatewayError('RateLimitError', message, { data });
}
