import { describe, it, expect, beforeEach } from '@jest/globals';
import { GatewayError } from '@btc-gateway/types';
import { FetchStub, httpStatus, jsonReply, networkFailure, textReply } from '@btc-gateway/test-utils';
import { NullLogger } from '../../src/logging';
import { buildUrl, HttpJsonClient } from '../../src/rpc/http-json-client';

describe('HttpJsonClient', () => {
  let stub: FetchStub;
  let sleeps: number[];
  let client: HttpJsonClient;

  beforeEach(() => {
    stub = new FetchStub();
    sleeps = [];
    client = new HttpJsonClient({
      fetch: stub.fetch,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      backoff: { baseMs: 100, maxAttempts: 3 },
      logger: new NullLogger(),
    });
  });

  it('should GET JSON with query parameters', async () => {
    stub.enqueue(jsonReply({ bitcoin: { usd: 65000 } }));

    const body = await client.getJson('https://api.example.test/simple/price', {
      query: { ids: 'bitcoin', vs_currencies: 'usd', include_24hr_change: true },
    });

    expect(body).toEqual({ bitcoin: { usd: 65000 } });
    expect(stub.calls[0].method).toBe('GET');
    expect(stub.calls[0].url).toBe(
      'https://api.example.test/simple/price?ids=bitcoin&vs_currencies=usd&include_24hr_change=true'
    );
    expect(stub.calls[0].headers.accept).toBe('application/json');
  });

  it('should retry 429 and 5xx responses with backoff', async () => {
    stub.enqueue(httpStatus(429, 'Too Many Requests'), httpStatus(503), jsonReply([]));

    await expect(client.getJson('https://api.example.test/x')).resolves.toEqual([]);
    expect(sleeps).toEqual([100, 200]);
  });

  it('should retry network failures', async () => {
    stub.enqueue(networkFailure(), jsonReply({ ok: true }));
    await expect(client.getJson('https://api.example.test/x')).resolves.toEqual({ ok: true });
    expect(stub.callCount).toBe(2);
  });

  it('should fail with NetworkError after exhausting attempts', async () => {
    stub.otherwise(httpStatus(500, 'Internal Server Error'));

    let caught: unknown;
    try {
      await client.getJson('https://api.example.test/x');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(GatewayError);
    if (caught instanceof GatewayError) {
      expect(caught.kind).toBe('NetworkError');
      expect(caught.code).toBe(-32003);
      expect(caught.message).toBe(
        'Request to https://api.example.test/x failed after 3 attempts: HTTP 500 Internal Server Error'
      );
    }
    expect(stub.callCount).toBe(3);
  });

  it('should not retry client errors', async () => {
    stub.otherwise(httpStatus(404, 'Not Found'));

    await expect(client.getJson('https://api.example.test/address/x')).rejects.toThrow(
      'Upstream API error: HTTP 404 Not Found'
    );
    expect(stub.callCount).toBe(1);
  });

  it('should not retry an unparsable body', async () => {
    stub.otherwise(textReply('not json'));

    await expect(client.getJson('https://api.example.test/x')).rejects.toThrow(
      'Invalid JSON response from upstream API'
    );
    expect(stub.callCount).toBe(1);
  });
});

describe('buildUrl', () => {
  it('should skip undefined values', () => {
    expect(buildUrl('https://api.example.test/fng/', { limit: 30, format: undefined })).toBe(
      'https://api.example.test/fng/?limit=30'
    );
  });

  it('should keep existing query parameters', () => {
    expect(buildUrl('https://api.example.test/x?a=1', { b: 'two' })).toBe('https://api.example.test/x?a=1&b=two');
  });
});
