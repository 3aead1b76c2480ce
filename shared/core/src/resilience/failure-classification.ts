/**
 * Upstream failure classification.
 *
 * Transient failures may succeed on retry (timeouts, resets, 5xx, 429).
 * Terminal failures will not (a semantic rejection by the node, a 2xx body
 * that is not the expected JSON). Clients retry only the former.
 */

export enum FailureCategory {
  TRANSIENT = 'transient',
  TERMINAL = 'terminal',
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNREFUSED',
  'EAI_AGAIN', 'EPIPE', 'EHOSTUNREACH', 'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_SOCKET', 'UND_ERR_HEADERS_TIMEOUT',
]);

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

/**
 * Status classification for REST upstreams. The node client does not use
 * this: for the node any non-2xx without an RPC error body is transient.
 */
export function classifyHttpStatus(status: number): FailureCategory {
  return TRANSIENT_STATUSES.has(status) ? FailureCategory.TRANSIENT : FailureCategory.TERMINAL;
}

function readCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

/**
 * Describe a fetch rejection for logs and error messages. Undici wraps the
 * socket error in `cause`, so the code is looked up there first.
 */
export function describeTransportError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const code = readCode(error.cause) ?? readCode(error);
  if (error.name === 'TimeoutError' || error.name === 'AbortedError') {
    return error.message || 'timed out';
  }
  if (code && TRANSIENT_CODES.has(code)) {
    return `${error.message} (${code})`;
  }
  const causeMessage = error.cause instanceof Error ? error.cause.message : undefined;
  return causeMessage ? `${error.message}: ${causeMessage}` : error.message;
}
