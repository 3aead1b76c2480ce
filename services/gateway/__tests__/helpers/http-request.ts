/**
 * Minimal HTTP client for tests against a server listening on 127.0.0.1.
 */

import http from 'http';

export interface TestResponse {
  statusCode: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export function makeRequest(
  port: number,
  options: { method?: string; path?: string; headers?: Record<string, string>; body?: string } = {}
): Promise<TestResponse> {
  const { method = 'GET', path = '/', headers = {}, body } = options;

  return new Promise((resolve, reject) => {
    const req = http.request({ hostname: '127.0.0.1', port, path, method, headers }, (res) => {
      let data = '';
      res.setEncoding('utf8');
      res.on('data', (chunk: string) => {
        data += chunk;
      });
      res.on('end', () => {
        resolve({ statusCode: res.statusCode ?? 0, headers: res.headers, body: data });
      });
    });
    req.on('error', reject);
    if (body !== undefined) {
      req.write(body);
    }
    req.end();
  });
}

export function postJson(port: number, payload: unknown, headers: Record<string, string> = {}): Promise<TestResponse> {
  return makeRequest(port, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: typeof payload === 'string' ? payload : JSON.stringify(payload),
  });
}

/**
 * Send a JSON-RPC POST without waiting for the answer, so the test can
 * drop the connection mid-request.
 */
export function startPost(port: number, body: string): http.ClientRequest {
  const req = http.request({
    hostname: '127.0.0.1',
    port,
    path: '/',
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
  });
  // destroy() before a response raises "socket hang up"
  req.on('error', () => undefined);
  req.end(body);
  return req;
}

/**
 * Poll until `condition` holds; response 'finish' hooks may run after the
 * client has already read the body.
 */
export async function waitFor(condition: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
