/**
 * Blockchain query handlers: chain state, blocks, transactions.
 */

import { z } from 'zod';
import { mapConcurrent } from '@btc-gateway/core';
import type { Block } from '@btc-gateway/core';
import { validationError } from '@btc-gateway/types';
import type { JsonRpcParams } from '@btc-gateway/types';
import type { HandlerBinding, HandlerContext } from '../dispatcher/types';
import { BlockHeightParam, boundedInt, hashParam, parseParams } from './params';

/** Node calls issued in parallel by the multi-block handlers */
const BLOCK_FETCH_CONCURRENCY = 4;

export const MAX_SEARCH_SPAN = 100;

const BlockByHeightParams = z.object({
  height: BlockHeightParam,
  include_transactions: z.boolean().default(false),
});

const BlockByHashParams = z.object({
  block_hash: hashParam('block hash'),
  include_transactions: z.boolean().default(false),
});

const TransactionParams = z.object({
  tx_hash: hashParam('transaction hash'),
});

const LatestBlocksParams = z.object({
  count: boundedInt(1, 50, 'count').default(10),
});

const SearchBlocksParams = z.object({
  start_height: BlockHeightParam,
  end_height: BlockHeightParam,
});

export interface BlockSummary {
  height: number;
  hash: string;
  time: number;
  size: number;
  tx_count: number;
  difficulty: number;
}

export interface BlockHeaderSummary {
  height: number;
  hash: string;
  time: number;
  difficulty: number;
  merkleroot: string;
}

function verbosityFor(includeTransactions: boolean): 1 | 2 {
  return includeTransactions ? 2 : 1;
}

export async function getBlockchainInfo(_params: JsonRpcParams, ctx: HandlerContext): Promise<unknown> {
  return ctx.rpc.getBlockchainInfo({ signal: ctx.signal });
}

export async function getBlockByHeight(params: JsonRpcParams, ctx: HandlerContext): Promise<Block> {
  const { height, include_transactions } = parseParams(BlockByHeightParams, params);
  const hash = await ctx.rpc.getBlockHash(height, { signal: ctx.signal });
  return ctx.rpc.getBlock(hash, verbosityFor(include_transactions), { signal: ctx.signal });
}

export async function getBlockByHash(params: JsonRpcParams, ctx: HandlerContext): Promise<Block> {
  const { block_hash, include_transactions } = parseParams(BlockByHashParams, params);
  return ctx.rpc.getBlock(block_hash, verbosityFor(include_transactions), { signal: ctx.signal });
}

export async function getTransaction(params: JsonRpcParams, ctx: HandlerContext): Promise<unknown> {
  const { tx_hash } = parseParams(TransactionParams, params);
  return ctx.rpc.getRawTransaction(tx_hash, { signal: ctx.signal });
}

/**
 * The `count` most recent blocks, newest first. Stops at genesis.
 */
export async function getLatestBlocks(
  params: JsonRpcParams,
  ctx: HandlerContext
): Promise<{ current_height: number; blocks: BlockSummary[] }> {
  const { count } = parseParams(LatestBlocksParams, params);
  const currentHeight = await ctx.rpc.getBlockCount({ signal: ctx.signal });

  const heights: number[] = [];
  for (let height = currentHeight; height >= 0 && heights.length < count; height--) {
    heights.push(height);
  }

  const blocks = await mapConcurrent(
    heights,
    async (height, _index, signal): Promise<BlockSummary> => {
      const hash = await ctx.rpc.getBlockHash(height, { signal });
      const block = await ctx.rpc.getBlock(hash, 1, { signal });
      return {
        height,
        hash,
        time: block.time,
        size: block.size,
        tx_count: block.tx.length,
        difficulty: block.difficulty,
      };
    },
    BLOCK_FETCH_CONCURRENCY,
    ctx.signal
  );

  return { current_height: currentHeight, blocks };
}

/**
 * Header summaries for every height in `[start_height, end_height]`.
 */
export async function searchBlocks(
  params: JsonRpcParams,
  ctx: HandlerContext
): Promise<{ start_height: number; end_height: number; total_blocks: number; blocks: BlockHeaderSummary[] }> {
  const { start_height, end_height } = parseParams(SearchBlocksParams, params);

  if (start_height > end_height) {
    throw validationError('start_height must be less than or equal to end_height', 'start_height');
  }
  if (end_height - start_height > MAX_SEARCH_SPAN) {
    throw validationError(`Range too large, maximum ${MAX_SEARCH_SPAN} blocks`, 'end_height');
  }

  const heights = Array.from({ length: end_height - start_height + 1 }, (_, i) => start_height + i);
  const blocks = await mapConcurrent(
    heights,
    async (height, _index, signal): Promise<BlockHeaderSummary> => {
      const hash = await ctx.rpc.getBlockHash(height, { signal });
      const header = await ctx.rpc.getBlockHeader(hash, { signal });
      return {
        height,
        hash,
        time: header.time,
        difficulty: header.difficulty,
        merkleroot: header.merkleroot,
      };
    },
    BLOCK_FETCH_CONCURRENCY,
    ctx.signal
  );

  return { start_height, end_height, total_blocks: blocks.length, blocks };
}

export const blockchainHandlers: HandlerBinding[] = [
  { method: 'get_blockchain_info', handler: getBlockchainInfo },
  { method: 'get_block_by_height', handler: getBlockByHeight },
  { method: 'get_block_by_hash', handler: getBlockByHash },
  { method: 'get_transaction', handler: getTransaction },
  { method: 'get_latest_blocks', handler: getLatestBlocks },
  { method: 'search_blocks', handler: searchBlocks },
];
