/**
 * JSON-RPC 2.0 Request Dispatcher
 *
 * Lifecycle of one request: received → parsed → routed → executed →
 * responded. Every path ends in exactly one response envelope; nothing
 * escapes `handle()` as a rejection.
 *
 * | Failure                                   | Error               | id        |
 * |-------------------------------------------|---------------------|-----------|
 * | body is not JSON                          | ParseError          | null      |
 * | not an object / bad jsonrpc / bad method  | InvalidRequestError | echoed*   |
 * | method not registered                     | MethodNotFoundError | echoed    |
 * | params present but not an object          | InvalidParamsError  | echoed    |
 * | handler throws a GatewayError             | that error          | echoed    |
 * | handler throws anything else              | InternalError       | echoed    |
 *
 * (*) when the body was an object carrying an `id`, else null.
 */

import type { ILogger } from '@btc-gateway/core';
import { createLogger, getErrorMessage } from '@btc-gateway/core';
import {
  GatewayError,
  JSONRPC_VERSION,
  JsonRpcId,
  JsonRpcParams,
  JsonRpcResponse,
  internalError,
  invalidParams,
  invalidRequest,
  isGatewayError,
  methodNotFound,
  parseError,
} from '@btc-gateway/types';
import type { MethodRegistry } from './method-registry';
import type { HandlerServices } from './types';

export interface RequestDispatcherOptions {
  registry: MethodRegistry;
  services: HandlerServices;
  logger?: ILogger;
}

export interface DispatchOptions {
  /** Aborted when the caller disconnects */
  signal?: AbortSignal;
}

interface RoutedRequest {
  id: JsonRpcId;
  method: string;
  params: unknown;
}

type EnvelopeCheck = { valid: true; request: RoutedRequest } | { valid: false; id: JsonRpcId; error: GatewayError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkEnvelope(body: unknown): EnvelopeCheck {
  if (!isRecord(body)) {
    const reason = Array.isArray(body) ? 'Batch requests are not supported' : 'Request must be a JSON object';
    return { valid: false, id: null, error: invalidRequest(reason) };
  }

  const id = 'id' in body ? body.id : null;

  if (body.jsonrpc !== JSONRPC_VERSION) {
    return { valid: false, id, error: invalidRequest(`jsonrpc must be "${JSONRPC_VERSION}"`) };
  }
  if (typeof body.method !== 'string' || body.method.length === 0) {
    return { valid: false, id, error: invalidRequest('method must be a non-empty string') };
  }

  return { valid: true, request: { id, method: body.method, params: body.params } };
}

function normalizeParams(params: unknown): JsonRpcParams {
  if (params === undefined) {
    return {};
  }
  if (!isRecord(params)) {
    throw invalidParams('params must be an object', 'params');
  }
  return params;
}

export class RequestDispatcher {
  private readonly registry: MethodRegistry;
  private readonly services: HandlerServices;
  private readonly logger: ILogger;

  constructor(options: RequestDispatcherOptions) {
    this.registry = options.registry;
    this.services = options.services;
    this.logger = options.logger ?? createLogger('dispatcher');
  }

  /**
   * Handle one raw HTTP body.
   */
  async handle(rawBody: string, options: DispatchOptions = {}): Promise<JsonRpcResponse> {
    let body: unknown;
    try {
      body = JSON.parse(rawBody);
    } catch (error) {
      this.logger.debug('Parse error', { error: getErrorMessage(error) });
      return this.errorResponse(null, parseError());
    }
    return this.dispatch(body, options);
  }

  /**
   * Handle an already-decoded request body.
   */
  async dispatch(body: unknown, options: DispatchOptions = {}): Promise<JsonRpcResponse> {
    const envelope = checkEnvelope(body);
    if (!envelope.valid) {
      this.logger.debug('Invalid request', { error: envelope.error.message });
      return this.errorResponse(envelope.id, envelope.error);
    }

    const { id, method } = envelope.request;
    const handler = this.registry.get(method);
    if (!handler) {
      this.logger.debug('Method not found', { method, id });
      return this.errorResponse(id, methodNotFound(method));
    }

    const started = Date.now();
    try {
      const params = normalizeParams(envelope.request.params);
      const result = await handler(params, {
        ...this.services,
        logger: this.services.logger.child({ method }),
        signal: options.signal,
      });
      this.logger.debug('Request completed', { method, id, durationMs: Date.now() - started });
      return { jsonrpc: JSONRPC_VERSION, result: result ?? null, id };
    } catch (error) {
      return this.errorResponse(id, this.toGatewayError(error, method, id));
    }
  }

  private toGatewayError(error: unknown, method: string, id: JsonRpcId): GatewayError {
    if (isGatewayError(error)) {
      this.logger.warn('Request failed', { method, id, kind: error.kind, error: error.message });
      return error;
    }
    this.logger.error('Unhandled error in handler', {
      method,
      id,
      error: getErrorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return internalError(error);
  }

  private errorResponse(id: JsonRpcId, error: GatewayError): JsonRpcResponse {
    return { jsonrpc: JSONRPC_VERSION, error: error.toJsonRpcError(), id };
  }
}
