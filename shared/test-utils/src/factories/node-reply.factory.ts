/**
 * Bitcoin Core reply factories for FetchStub.
 */

import { jsonReply, Reply, RecordedRequest } from '../mocks/fetch.mock';

function requestId(request: RecordedRequest): unknown {
  const body = request.body;
  return typeof body === 'object' && body !== null && 'id' in body ? body.id : null;
}

function requestMethod(request: RecordedRequest): string {
  const body = request.body;
  return typeof body === 'object' && body !== null && 'method' in body && typeof body.method === 'string'
    ? body.method
    : '';
}

function requestParams(request: RecordedRequest): unknown[] {
  const body = request.body;
  return typeof body === 'object' && body !== null && 'params' in body && Array.isArray(body.params)
    ? body.params
    : [];
}

export function nodeResult(result: unknown): Reply {
  return (request) => jsonReply({ result, error: null, id: requestId(request) })(request);
}

/** Bitcoin Core answers RPC errors with HTTP 500 (404 for unknown methods). */
export function nodeError(code: number, message: string, status = 500): Reply {
  return (request) => jsonReply({ result: null, error: { code, message }, id: requestId(request) }, status)(request);
}

export type NodeRoute = (params: unknown[]) => Reply;

/**
 * Answer node calls by RPC method name. Unrouted methods get the node's own
 * "Method not found" error.
 *
 * ```typescript
 * stub.otherwise(nodeRouter({
 *   getblockhash: ([height]) => nodeResult(`hash-${height}`),
 * }));
 * ```
 */
export function nodeRouter(routes: Record<string, NodeRoute>): Reply {
  return (request) => {
    const method = requestMethod(request);
    const route = routes[method];
    if (!route) {
      return nodeError(-32601, 'Method not found', 404)(request);
    }
    return route(requestParams(request))(request);
  };
}

/**
 * Router for methods with fixed results.
 */
export function nodeResults(results: Record<string, unknown>): Reply {
  const routes: Record<string, NodeRoute> = {};
  for (const [method, result] of Object.entries(results)) {
    routes[method] = () => nodeResult(result);
  }
  return nodeRouter(routes);
}

export { requestMethod, requestParams };
