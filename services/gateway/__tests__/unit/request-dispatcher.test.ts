/**
 * RequestDispatcher tests
 *
 * Envelope validation, routing, parameter normalization and the mapping of
 * handler failures onto JSON-RPC error responses.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { RecordingLogger, SlidingWindowRateLimiter } from '@btc-gateway/core';
import { rpcError } from '@btc-gateway/types';
import type { JsonRpcParams } from '@btc-gateway/types';
import { blockchainInfoFixture, nodeResults } from '@btc-gateway/test-utils';
import { MethodRegistry } from '../../src/dispatcher/method-registry';
import { RequestDispatcher } from '../../src/dispatcher/request-dispatcher';
import type { HandlerContext } from '../../src/dispatcher/types';
import { blockchainHandlers } from '../../src/handlers/blockchain.handlers';
import { createHarness, errorOf, resultOf, TestHarness } from '../helpers/handler-context';

describe('RequestDispatcher', () => {
  let harness: TestHarness;
  let logger: RecordingLogger;
  let seenContexts: HandlerContext[];

  const createDispatcher = (registry: MethodRegistry): RequestDispatcher =>
    new RequestDispatcher({ registry, services: harness.ctx, logger });

  const testRegistry = (): MethodRegistry =>
    MethodRegistry.build([
      {
        method: 'echo',
        handler: async (params: JsonRpcParams, ctx: HandlerContext) => {
          seenContexts.push(ctx);
          return params;
        },
      },
      { method: 'nothing', handler: async () => undefined },
      {
        method: 'node_down',
        handler: async () => {
          throw rpcError('Bitcoin RPC error: Loading block index...');
        },
      },
      {
        method: 'crash',
        handler: async () => {
          throw new TypeError("Cannot read properties of undefined (reading 'secret')");
        },
      },
    ]);

  beforeEach(() => {
    logger = new RecordingLogger();
    harness = createHarness();
    seenContexts = [];
  });

  // ===========================================================================
  // Success path
  // ===========================================================================

  describe('successful calls', () => {
    it('should echo the request id with the handler result', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.handle('{"jsonrpc":"2.0","method":"echo","params":{"a":1},"id":1}');

      expect(response).toEqual({ jsonrpc: '2.0', result: { a: 1 }, id: 1 });
    });

    it('should echo string ids unchanged', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.dispatch({ jsonrpc: '2.0', method: 'echo', id: 'req-42' });

      expect(response.id).toBe('req-42');
    });

    it('should default missing params to an empty object', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.dispatch({ jsonrpc: '2.0', method: 'echo', id: 3 });

      expect(response).toEqual({ jsonrpc: '2.0', result: {}, id: 3 });
    });

    it('should answer requests without an id using a null id', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.dispatch({ jsonrpc: '2.0', method: 'echo', params: {} });

      expect(response).toEqual({ jsonrpc: '2.0', result: {}, id: null });
    });

    it('should render an undefined result as null', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.dispatch({ jsonrpc: '2.0', method: 'nothing', id: 5 });

      expect(response).toEqual({ jsonrpc: '2.0', result: null, id: 5 });
    });

    it('should pass the caller signal to the handler', async () => {
      const dispatcher = createDispatcher(testRegistry());
      const controller = new AbortController();

      await dispatcher.dispatch({ jsonrpc: '2.0', method: 'echo', id: 1 }, { signal: controller.signal });

      expect(seenContexts).toHaveLength(1);
      expect(seenContexts[0]?.signal).toBe(controller.signal);
      expect(seenContexts[0]?.rpc).toBe(harness.rpc);
    });
  });

  // ===========================================================================
  // Protocol errors
  // ===========================================================================

  describe('protocol errors', () => {
    it('should return ParseError with a null id for malformed JSON', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.handle('{');

      expect(response).toEqual({ jsonrpc: '2.0', error: { code: -32700, message: 'Parse error' }, id: null });
    });

    it('should return ParseError for an empty body', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.handle('');

      expect(errorOf(response).code).toBe(-32700);
    });

    it('should reject batch requests', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.handle('[{"jsonrpc":"2.0","method":"echo","id":1}]');

      expect(response).toEqual({
        jsonrpc: '2.0',
        error: { code: -32600, message: 'Batch requests are not supported' },
        id: null,
      });
    });

    it('should reject a scalar body', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.handle('42');

      expect(response).toEqual({
        jsonrpc: '2.0',
        error: { code: -32600, message: 'Request must be a JSON object' },
        id: null,
      });
    });

    it('should reject a wrong protocol version and echo the id', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.dispatch({ jsonrpc: '1.0', method: 'echo', id: 9 });

      expect(response).toEqual({
        jsonrpc: '2.0',
        error: { code: -32600, message: 'jsonrpc must be "2.0"' },
        id: 9,
      });
    });

    it('should reject a missing method', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.dispatch({ jsonrpc: '2.0', id: 2 });

      expect(response).toEqual({
        jsonrpc: '2.0',
        error: { code: -32600, message: 'method must be a non-empty string' },
        id: 2,
      });
    });

    it('should return MethodNotFound for unregistered methods', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.handle('{"jsonrpc":"2.0","method":"nope","id":7}');

      expect(response).toEqual({
        jsonrpc: '2.0',
        error: { code: -32601, message: 'Method not found: nope', data: { method: 'nope' } },
        id: 7,
      });
    });

    it('should reject params that are not an object', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.dispatch({ jsonrpc: '2.0', method: 'echo', params: [1, 2], id: 4 });

      expect(response).toEqual({
        jsonrpc: '2.0',
        error: { code: -32602, message: 'params must be an object', data: { field: 'params' } },
        id: 4,
      });
      expect(seenContexts).toHaveLength(0);
    });
  });

  // ===========================================================================
  // Handler failures
  // ===========================================================================

  describe('handler failures', () => {
    it('should pass gateway errors through with their own code', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.dispatch({ jsonrpc: '2.0', method: 'node_down', id: 11 });

      expect(response).toEqual({
        jsonrpc: '2.0',
        error: { code: -32001, message: 'Bitcoin RPC error: Loading block index...' },
        id: 11,
      });
      expect(logger.hasLogWithMeta('warn', { method: 'node_down', kind: 'BitcoinRPCError' })).toBe(true);
    });

    it('should hide unexpected exceptions behind InternalError', async () => {
      const dispatcher = createDispatcher(testRegistry());

      const response = await dispatcher.dispatch({ jsonrpc: '2.0', method: 'crash', id: 12 });

      expect(response).toEqual({ jsonrpc: '2.0', error: { code: -32603, message: 'Internal error' }, id: 12 });
      expect(logger.hasLogMatching('error', 'Unhandled error in handler')).toBe(true);
    });
  });

  // ===========================================================================
  // Rate limiting
  // ===========================================================================

  describe('rate limiting', () => {
    it('should reject the call once the window is full without reaching the node', async () => {
      harness = createHarness({ rateLimiter: new SlidingWindowRateLimiter({ maxRequests: 1, windowMs: 60_000 }) });
      harness.stub.otherwise(nodeResults({ getblockchaininfo: blockchainInfoFixture() }));
      const dispatcher = createDispatcher(MethodRegistry.build(blockchainHandlers));

      const first = await dispatcher.dispatch({ jsonrpc: '2.0', method: 'get_blockchain_info', id: 1 });
      const second = await dispatcher.dispatch({ jsonrpc: '2.0', method: 'get_blockchain_info', id: 2 });

      expect(resultOf(first)).toEqual(blockchainInfoFixture());
      expect(errorOf(second).code).toBe(-32004);
      expect(errorOf(second).message).toBe('Rate limit exceeded: at most 1 requests per 60000ms');
      expect(second.id).toBe(2);
      expect(harness.stub.callCount).toBe(1);
    });
  });
});
