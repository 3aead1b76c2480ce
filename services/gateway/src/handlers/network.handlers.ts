/**
 * Network monitoring handlers: node connectivity, mempool, mining, peers.
 */

import type { MempoolInfo } from '@btc-gateway/core';
import { isGatewayError } from '@btc-gateway/types';
import type { JsonRpcParams } from '@btc-gateway/types';
import type { HandlerBinding, HandlerContext } from '../dispatcher/types';

/** Confirmation targets (in blocks) sampled by get_mempool_stats */
export const FEE_ESTIMATE_TARGETS = [1, 3, 6, 12, 24, 144] as const;

export interface FeeEstimate {
  feerate: number;
  blocks: number;
}

export async function getNetworkStatus(_params: JsonRpcParams, ctx: HandlerContext): Promise<Record<string, unknown>> {
  const options = { signal: ctx.signal };
  const [networkInfo, blockchainInfo, mempoolInfo] = await Promise.all([
    ctx.rpc.getNetworkInfo(options),
    ctx.rpc.getBlockchainInfo(options),
    ctx.rpc.getMempoolInfo(options),
  ]);

  return {
    network: {
      version: networkInfo.version,
      subversion: networkInfo.subversion,
      protocol_version: networkInfo.protocolversion,
      connections: networkInfo.connections,
      connections_in: networkInfo.connections_in ?? null,
      connections_out: networkInfo.connections_out ?? null,
      network_active: networkInfo.networkactive ?? null,
      networks: networkInfo.networks ?? [],
    },
    blockchain: {
      chain: blockchainInfo.chain,
      blocks: blockchainInfo.blocks,
      headers: blockchainInfo.headers,
      best_block_hash: blockchainInfo.bestblockhash,
      difficulty: blockchainInfo.difficulty,
      verification_progress: blockchainInfo.verificationprogress,
      initial_block_download: blockchainInfo.initialblockdownload ?? null,
      size_on_disk: blockchainInfo.size_on_disk ?? null,
      pruned: blockchainInfo.pruned ?? null,
    },
    mempool: {
      size: mempoolInfo.size,
      bytes: mempoolInfo.bytes,
      usage: mempoolInfo.usage,
      max_mempool: mempoolInfo.maxmempool,
      mempool_min_fee: mempoolInfo.mempoolminfee,
      min_relay_tx_fee: mempoolInfo.minrelaytxfee,
    },
  };
}

/**
 * Mempool totals plus smart-fee estimates. A target the node cannot
 * estimate (no feerate, or an RPC failure) is left out of `fee_estimates`.
 */
export async function getMempoolStats(
  _params: JsonRpcParams,
  ctx: HandlerContext
): Promise<{ mempool: MempoolInfo; fee_estimates: Record<string, FeeEstimate>; timestamp: number }> {
  const mempool = await ctx.rpc.getMempoolInfo({ signal: ctx.signal });

  const estimates = await Promise.all(
    FEE_ESTIMATE_TARGETS.map(async (target): Promise<[number, FeeEstimate | undefined]> => {
      try {
        const estimate = await ctx.rpc.estimateSmartFee(target, { signal: ctx.signal });
        if (estimate.feerate === undefined) {
          return [target, undefined];
        }
        return [target, { feerate: estimate.feerate, blocks: estimate.blocks }];
      } catch (error) {
        if (!isGatewayError(error) || ctx.signal?.aborted) {
          throw error;
        }
        ctx.logger.debug('Fee estimate unavailable', { target, error: error.message });
        return [target, undefined];
      }
    })
  );

  const feeEstimates: Record<string, FeeEstimate> = {};
  for (const [target, estimate] of estimates) {
    if (estimate) {
      feeEstimates[`${target}_blocks`] = estimate;
    }
  }

  return { mempool, fee_estimates: feeEstimates, timestamp: Date.now() };
}

export async function getMiningInfo(_params: JsonRpcParams, ctx: HandlerContext): Promise<Record<string, unknown>> {
  const options = { signal: ctx.signal };
  const [miningInfo, blockchainInfo] = await Promise.all([
    ctx.rpc.getMiningInfo(options),
    ctx.rpc.getBlockchainInfo(options),
  ]);

  return {
    blocks: miningInfo.blocks,
    current_block_weight: miningInfo.currentblockweight ?? null,
    current_block_tx: miningInfo.currentblocktx ?? null,
    difficulty: miningInfo.difficulty,
    network_hash_ps: miningInfo.networkhashps,
    pooled_tx: miningInfo.pooledtx,
    chain: miningInfo.chain,
    warnings: miningInfo.warnings ?? null,
    median_time: blockchainInfo.mediantime ?? null,
    chain_work: blockchainInfo.chainwork ?? null,
  };
}

/**
 * Connection summary from getnetworkinfo; getpeerinfo is not exposed by
 * every node's RPC whitelist.
 */
export async function getPeerInfo(_params: JsonRpcParams, ctx: HandlerContext): Promise<Record<string, unknown>> {
  const networkInfo = await ctx.rpc.getNetworkInfo({ signal: ctx.signal });

  return {
    connection_count: networkInfo.connections,
    connections_in: networkInfo.connections_in ?? 0,
    connections_out: networkInfo.connections_out ?? 0,
    network_active: networkInfo.networkactive ?? false,
    networks: networkInfo.networks ?? [],
    relay_fee: networkInfo.relayfee ?? 0,
    incremental_fee: networkInfo.incrementalfee ?? 0,
    local_addresses: networkInfo.localaddresses ?? [],
  };
}

export const networkHandlers: HandlerBinding[] = [
  { method: 'get_network_status', handler: getNetworkStatus },
  { method: 'get_mempool_stats', handler: getMempoolStats },
  { method: 'get_mining_info', handler: getMiningInfo },
  { method: 'get_peer_info', handler: getPeerInfo },
];
