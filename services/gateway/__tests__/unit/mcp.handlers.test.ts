/**
 * MCP surface tests, driven through the dispatcher as clients use it.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { z } from 'zod';
import { NullLogger } from '@btc-gateway/core';
import { blockchainInfoFixture, networkInfoFixture, nodeResults } from '@btc-gateway/test-utils';
import { RequestDispatcher } from '../../src/dispatcher/request-dispatcher';
import { buildMethodRegistry } from '../../src/handlers';
import { DEFAULT_PROTOCOL_VERSION, loadMcpCatalog } from '../../src/handlers/mcp.handlers';
import { createHarness, errorOf, resultOf, TestHarness } from '../helpers/handler-context';

const ResourceContents = z.object({ contents: z.array(z.object({ text: z.string() })) });

describe('MCP handlers', () => {
  let harness: TestHarness;
  let dispatcher: RequestDispatcher;

  const call = (method: string, params?: Record<string, unknown>) =>
    dispatcher.dispatch({ jsonrpc: '2.0', method, params, id: 1 });

  beforeEach(() => {
    harness = createHarness();
    harness.stub.otherwise(
      nodeResults({ getblockchaininfo: blockchainInfoFixture(), getnetworkinfo: networkInfoFixture() })
    );
    dispatcher = new RequestDispatcher({
      registry: buildMethodRegistry(),
      services: harness.ctx,
      logger: new NullLogger(),
    });
  });

  describe('catalog', () => {
    it('should describe nineteen tools and three resources', () => {
      const catalog = loadMcpCatalog();

      expect(catalog.tools).toHaveLength(19);
      expect(catalog.resources.map((resource) => resource.uri)).toEqual([
        'bitcoin:blockchain:info',
        'bitcoin:network:status',
        'bitcoin:market:stats',
      ]);
    });
  });

  describe('initialize', () => {
    it('should answer with server identity and capabilities', async () => {
      const response = await call('initialize', { clientInfo: { name: 'test-client' } });

      expect(resultOf(response)).toEqual({
        protocolVersion: DEFAULT_PROTOCOL_VERSION,
        capabilities: { tools: {}, resources: {} },
        serverInfo: { name: 'btc-rpc-gateway', version: '1.0.0' },
      });
    });

    it('should echo the protocol version the client asks for', async () => {
      const response = await call('initialize', { protocolVersion: '2025-03-26' });

      expect(resultOf(response)).toMatchObject({ protocolVersion: '2025-03-26' });
    });
  });

  describe('tools', () => {
    it('should list tools with their input schemas', async () => {
      const response = await call('tools/list');
      const result = resultOf(response);

      expect(result).toMatchObject({
        tools: expect.arrayContaining([
          expect.objectContaining({
            name: 'get_block_by_height',
            inputSchema: expect.objectContaining({ type: 'object', required: ['height'] }),
          }),
        ]),
      });
    });

    it('should wrap a tool result in content', async () => {
      const response = await call('tools/call', { name: 'get_peer_info' });

      expect(resultOf(response)).toMatchObject({ content: { connection_count: 10, connections_in: 2 } });
    });

    it('should pass arguments through to the tool', async () => {
      const response = await call('tools/call', { name: 'get_latest_blocks', arguments: { count: 0 } });

      expect(errorOf(response)).toEqual({
        code: -32002,
        message: 'count must be between 1 and 50',
        data: { field: 'count' },
      });
    });

    it('should reject unknown tools', async () => {
      const response = await call('tools/call', { name: 'get_weather' });

      expect(errorOf(response)).toEqual({ code: -32002, message: 'Unknown tool: get_weather', data: { field: 'name' } });
    });

    it('should not expose MCP methods as tools', async () => {
      const response = await call('tools/call', { name: 'tools/list' });

      expect(errorOf(response).message).toBe('Unknown tool: tools/list');
    });

    it('should require a tool name', async () => {
      const response = await call('tools/call', {});

      expect(errorOf(response)).toEqual({
        code: -32002,
        message: 'Missing required parameter: name',
        data: { field: 'name' },
      });
    });
  });

  describe('resources', () => {
    it('should list resources without their backing method', async () => {
      const response = await call('resources/list');

      expect(resultOf(response)).toEqual({
        resources: [
          {
            uri: 'bitcoin:blockchain:info',
            name: 'Bitcoin Blockchain Information',
            description: 'Current blockchain status and statistics',
            mimeType: 'application/json',
          },
          {
            uri: 'bitcoin:network:status',
            name: 'Bitcoin Network Status',
            description: 'Current network status and peer information',
            mimeType: 'application/json',
          },
          {
            uri: 'bitcoin:market:stats',
            name: 'Bitcoin Market Statistics',
            description: 'Current market statistics and price data',
            mimeType: 'application/json',
          },
        ],
      });
    });

    it('should read a resource as JSON text', async () => {
      const response = await call('resources/read', { uri: 'bitcoin:blockchain:info' });
      const result = resultOf(response);

      expect(result).toMatchObject({ contents: [{ uri: 'bitcoin:blockchain:info', mimeType: 'application/json' }] });
      const [content] = ResourceContents.parse(result).contents;
      expect(JSON.parse(content?.text ?? '')).toEqual(blockchainInfoFixture());
    });

    it('should reject unknown resources', async () => {
      const response = await call('resources/read', { uri: 'bitcoin:wallet:keys' });

      expect(errorOf(response)).toEqual({
        code: -32002,
        message: 'Unknown resource: bitcoin:wallet:keys',
        data: { field: 'uri' },
      });
    });
  });
});
