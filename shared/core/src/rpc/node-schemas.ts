/**
 * Bitcoin Core RPC result schemas
 *
 * Only the fields the gateway reads are required. Everything else the node
 * returns is kept (`passthrough`) so handlers that forward raw objects lose
 * nothing across node versions.
 */

import { z } from 'zod';

const Warnings = z.union([z.string(), z.array(z.string())]).optional();

export const BlockchainInfoSchema = z
  .object({
    chain: z.string(),
    blocks: z.number(),
    headers: z.number(),
    bestblockhash: z.string(),
    difficulty: z.number(),
    mediantime: z.number().optional(),
    verificationprogress: z.number(),
    initialblockdownload: z.boolean().optional(),
    chainwork: z.string().optional(),
    size_on_disk: z.number().optional(),
    pruned: z.boolean().optional(),
    warnings: Warnings,
  })
  .passthrough();

export const NetworkInfoSchema = z
  .object({
    version: z.number(),
    subversion: z.string(),
    protocolversion: z.number(),
    connections: z.number(),
    connections_in: z.number().optional(),
    connections_out: z.number().optional(),
    networkactive: z.boolean().optional(),
    relayfee: z.number().optional(),
    incrementalfee: z.number().optional(),
    localaddresses: z.array(z.object({ address: z.string(), port: z.number() }).passthrough()).optional(),
    localservicesnames: z.array(z.string()).optional(),
    networks: z
      .array(z.object({ name: z.string(), reachable: z.boolean() }).passthrough())
      .optional(),
    warnings: Warnings,
  })
  .passthrough();

export const MempoolInfoSchema = z
  .object({
    loaded: z.boolean().optional(),
    size: z.number(),
    bytes: z.number(),
    usage: z.number(),
    maxmempool: z.number(),
    mempoolminfee: z.number(),
    minrelaytxfee: z.number(),
    total_fee: z.number().optional(),
  })
  .passthrough();

export const MiningInfoSchema = z
  .object({
    blocks: z.number(),
    difficulty: z.number(),
    networkhashps: z.number(),
    currentblockweight: z.number().optional(),
    currentblocktx: z.number().optional(),
    pooledtx: z.number(),
    chain: z.string(),
    warnings: Warnings,
  })
  .passthrough();

export const BlockHeaderSchema = z
  .object({
    hash: z.string(),
    confirmations: z.number(),
    height: z.number(),
    version: z.number(),
    merkleroot: z.string(),
    time: z.number(),
    mediantime: z.number().optional(),
    nonce: z.number(),
    bits: z.string(),
    difficulty: z.number(),
    nTx: z.number(),
    previousblockhash: z.string().optional(),
    nextblockhash: z.string().optional(),
  })
  .passthrough();

export const RawTransactionSchema = z
  .object({
    txid: z.string(),
    hash: z.string().optional(),
    size: z.number(),
    vsize: z.number().optional(),
    weight: z.number().optional(),
    locktime: z.number().optional(),
    vin: z.array(z.object({}).passthrough()),
    vout: z.array(
      z
        .object({
          value: z.number(),
          n: z.number(),
          scriptPubKey: z.object({ type: z.string().optional(), address: z.string().optional() }).passthrough(),
        })
        .passthrough()
    ),
    blockhash: z.string().optional(),
    confirmations: z.number().optional(),
    time: z.number().optional(),
    blocktime: z.number().optional(),
  })
  .passthrough();

/** `getblock` lists txids at verbosity 1 and full transactions at verbosity 2. */
export const BlockSchema = BlockHeaderSchema.extend({
  size: z.number(),
  weight: z.number().optional(),
  tx: z.array(z.union([z.string(), RawTransactionSchema])),
}).passthrough();

export const ValidateAddressSchema = z
  .object({
    isvalid: z.boolean(),
    address: z.string().optional(),
    scriptPubKey: z.string().optional(),
    isscript: z.boolean().optional(),
    iswitness: z.boolean().optional(),
    witness_version: z.number().optional(),
    witness_program: z.string().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export const SmartFeeEstimateSchema = z
  .object({
    feerate: z.number().optional(),
    errors: z.array(z.string()).optional(),
    blocks: z.number(),
  })
  .passthrough();

export type BlockchainInfo = z.infer<typeof BlockchainInfoSchema>;
export type NetworkInfo = z.infer<typeof NetworkInfoSchema>;
export type MempoolInfo = z.infer<typeof MempoolInfoSchema>;
export type MiningInfo = z.infer<typeof MiningInfoSchema>;
export type BlockHeader = z.infer<typeof BlockHeaderSchema>;
export type RawTransaction = z.infer<typeof RawTransactionSchema>;
export type Block = z.infer<typeof BlockSchema>;
export type ValidateAddressResult = z.infer<typeof ValidateAddressSchema>;
export type SmartFeeEstimate = z.infer<typeof SmartFeeEstimateSchema>;
