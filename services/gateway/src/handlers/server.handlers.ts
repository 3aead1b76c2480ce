/**
 * get_server_status: gateway identity, node connectivity and the method
 * list. A node that cannot be reached is reported, not thrown.
 */

import { maskRpcUrl } from '@btc-gateway/config';
import type { BitcoinRpcClient, CallOptions } from '@btc-gateway/core';
import { isGatewayError } from '@btc-gateway/types';
import type { JsonRpcParams } from '@btc-gateway/types';
import type { HandlerBinding, HandlerContext } from '../dispatcher/types';

/**
 * `connected: null` means the check was refused by the rate limiter, so
 * nothing is known about the node.
 */
export type NodeStatus =
  | { connected: true; chain: string; blocks: number; difficulty: number }
  | { connected: false; error: string }
  | { connected: null; rate_limited: true; error: string };

/**
 * Probe the node with getblockchaininfo. Shared with GET /health.
 */
export async function probeNode(rpc: BitcoinRpcClient, options: CallOptions = {}): Promise<NodeStatus> {
  try {
    const info = await rpc.getBlockchainInfo(options);
    return { connected: true, chain: info.chain, blocks: info.blocks, difficulty: info.difficulty };
  } catch (error) {
    if (!isGatewayError(error) || options.signal?.aborted) {
      throw error;
    }
    if (error.kind === 'RateLimitError') {
      return { connected: null, rate_limited: true, error: error.message };
    }
    return { connected: false, error: error.message };
  }
}

export function createServerHandlers(listMethods: () => string[]): HandlerBinding[] {
  const getServerStatus = async (_params: JsonRpcParams, ctx: HandlerContext) => {
    const { config } = ctx;
    return {
      server: {
        name: config.service.name,
        version: config.service.version,
        uptime_seconds: Math.floor(process.uptime()),
        timestamp: new Date().toISOString(),
        config: {
          network: config.bitcoin.network,
          rpc_url: maskRpcUrl(config.bitcoin.rpcUrl, config.bitcoin.rpcPassword),
        },
      },
      bitcoin_node: await probeNode(ctx.rpc, { signal: ctx.signal }),
      rpc_client: ctx.rpc.getStats(),
      capabilities: {
        blockchain_queries: true,
        network_monitoring: true,
        address_analysis: true,
        market_data: true,
        transaction_lookup: true,
        utxo_tracking: true,
      },
      available_methods: listMethods(),
    };
  };

  return [{ method: 'get_server_status', handler: getServerStatus }];
}
