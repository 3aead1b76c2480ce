/**
 * Scripted fetch stand-in.
 *
 * Replaces the network for client and handler tests: each call consumes the
 * next queued reply (or the fallback) and is recorded for assertions.
 *
 * ```typescript
 * const stub = new FetchStub()
 *   .enqueue(httpStatus(503), nodeResult({ blocks: 1 }));
 * const client = new BitcoinRpcClient({ ...opts, fetch: stub.fetch });
 * ```
 */

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  /** JSON-decoded request body, if any */
  body: unknown;
  signal?: AbortSignal;
}

export type Reply = (request: RecordedRequest) => Response | Promise<Response>;

function normalizeHeaders(headers: RequestInit['headers']): Record<string, string> {
  const normalized: Record<string, string> = {};
  new Headers(headers).forEach((value, key) => {
    normalized[key] = value;
  });
  return normalized;
}

function decodeBody(body: RequestInit['body']): unknown {
  if (typeof body !== 'string') return undefined;
  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
}

export class FetchStub {
  readonly calls: RecordedRequest[] = [];
  private readonly queue: Reply[] = [];
  private fallback: Reply | undefined;

  enqueue(...replies: Reply[]): this {
    this.queue.push(...replies);
    return this;
  }

  /** Reply used once the queue is empty. */
  otherwise(reply: Reply): this {
    this.fallback = reply;
    return this;
  }

  get callCount(): number {
    return this.calls.length;
  }

  readonly fetch = async (url: string, init: RequestInit = {}): Promise<Response> => {
    const request: RecordedRequest = {
      url,
      method: init.method ?? 'GET',
      headers: normalizeHeaders(init.headers),
      body: decodeBody(init.body),
      signal: init.signal ?? undefined,
    };
    this.calls.push(request);

    const reply = this.queue.shift() ?? this.fallback;
    if (!reply) {
      throw new Error(`FetchStub: no reply for ${request.method} ${url}`);
    }
    return reply(request);
  };
}

// =============================================================================
// Reply factories
// =============================================================================

export function jsonReply(body: unknown, status = 200, statusText = ''): Reply {
  return () =>
    new Response(JSON.stringify(body), {
      status,
      statusText,
      headers: { 'Content-Type': 'application/json' },
    });
}

export function textReply(text: string, status = 200, statusText = ''): Reply {
  return () => new Response(text, { status, statusText });
}

/** An HTTP error with an empty body. */
export function httpStatus(status: number, statusText = ''): Reply {
  return () => new Response(null, { status, statusText });
}

/** A fetch rejection, as undici raises for refused connections. */
export function networkFailure(message = 'fetch failed', code = 'ECONNREFUSED'): Reply {
  return () => {
    const cause = Object.assign(new Error(`connect ${code} 127.0.0.1:8332`), { code });
    throw new TypeError(message, { cause });
  };
}

/** Never settles until the request's signal aborts. */
export function hang(): Reply {
  return (request) =>
    new Promise<Response>((_resolve, reject) => {
      const signal = request.signal;
      if (!signal) return;
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
}

/**
 * Answer by origin and path (the query string is ignored). Unrouted URLs
 * get a 404.
 *
 * ```typescript
 * stub.otherwise(urlRouter({
 *   'https://mempool.space/api/address/bc1q.../utxo': jsonReply([]),
 * }));
 * ```
 */
export function urlRouter(routes: Record<string, Reply>): Reply {
  return (request) => {
    const url = new URL(request.url);
    const reply = routes[`${url.origin}${url.pathname}`];
    return reply ? reply(request) : httpStatus(404, 'Not Found')(request);
  };
}
