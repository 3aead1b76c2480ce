/**
 * Third-party REST payloads (mempool.space, CoinGecko, alternative.me).
 *
 * Like the node schemas, only fields the handlers read are declared and
 * the rest passes through. A payload that fails its schema is reported as
 * NetworkError: the upstream answered, but not with what it documents.
 */

import { z } from 'zod';
import type { QueryValue } from '@btc-gateway/core';
import { networkError } from '@btc-gateway/types';
import type { HandlerContext } from '../dispatcher/types';

// =============================================================================
// mempool.space
// =============================================================================

const TxoStatsSchema = z
  .object({
    funded_txo_sum: z.number().default(0),
    spent_txo_sum: z.number().default(0),
    tx_count: z.number().default(0),
  })
  .passthrough();

export const AddressStatsSchema = z
  .object({
    address: z.string().optional(),
    chain_stats: TxoStatsSchema.default({}),
    mempool_stats: TxoStatsSchema.default({}),
  })
  .passthrough();

const TxStatusSchema = z
  .object({
    confirmed: z.boolean().default(false),
    block_height: z.number().optional(),
    block_hash: z.string().optional(),
    block_time: z.number().optional(),
  })
  .passthrough();

const TxOutputSchema = z
  .object({
    scriptpubkey_address: z.string().optional(),
    value: z.number().default(0),
  })
  .passthrough();

export const AddressTransactionSchema = z
  .object({
    txid: z.string(),
    vin: z.array(z.object({ prevout: TxOutputSchema.nullish() }).passthrough()).default([]),
    vout: z.array(TxOutputSchema).default([]),
    size: z.number().optional(),
    weight: z.number().optional(),
    fee: z.number().optional(),
    status: TxStatusSchema.default({}),
  })
  .passthrough();

export const AddressTransactionsSchema = z.array(AddressTransactionSchema);

export const UtxoSchema = z
  .object({
    txid: z.string(),
    vout: z.number(),
    value: z.number(),
    status: TxStatusSchema.default({}),
  })
  .passthrough();

export const UtxoListSchema = z.array(UtxoSchema);

export type AddressStats = z.infer<typeof AddressStatsSchema>;
export type AddressTransaction = z.infer<typeof AddressTransactionSchema>;
export type Utxo = z.infer<typeof UtxoSchema>;

// =============================================================================
// CoinGecko
// =============================================================================

export const SimplePriceSchema = z.object({
  bitcoin: z.record(z.number().nullable()).default({}),
});

const Point = z.tuple([z.number(), z.number()]);

export const MarketChartSchema = z
  .object({
    prices: z.array(Point).default([]),
    market_caps: z.array(Point).default([]),
    total_volumes: z.array(Point).default([]),
  })
  .passthrough();

const UsdAmount = z.record(z.union([z.number(), z.string()]).nullable()).default({});

export const CoinDetailsSchema = z
  .object({
    name: z.string().optional(),
    symbol: z.string().optional(),
    market_cap_rank: z.number().nullish(),
    last_updated: z.string().nullish(),
    market_data: z
      .object({
        current_price: UsdAmount,
        market_cap: UsdAmount,
        total_volume: UsdAmount,
        high_24h: UsdAmount,
        low_24h: UsdAmount,
        price_change_24h: z.number().nullish(),
        price_change_percentage_24h: z.number().nullish(),
        price_change_percentage_7d: z.number().nullish(),
        price_change_percentage_30d: z.number().nullish(),
        price_change_percentage_1y: z.number().nullish(),
        circulating_supply: z.number().nullish(),
        total_supply: z.number().nullish(),
        max_supply: z.number().nullish(),
        ath: UsdAmount,
        ath_date: UsdAmount,
        ath_change_percentage: UsdAmount,
        atl: UsdAmount,
        atl_date: UsdAmount,
        atl_change_percentage: UsdAmount,
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

// =============================================================================
// alternative.me
// =============================================================================

export const FearGreedSchema = z
  .object({
    data: z
      .array(
        z
          .object({
            value: z.string(),
            value_classification: z.string(),
            timestamp: z.string(),
            time_until_update: z.string().optional(),
          })
          .passthrough()
      )
      .default([]),
    metadata: z.record(z.unknown()).default({}),
  })
  .passthrough();

// =============================================================================
// Fetch helpers
// =============================================================================

/**
 * Join a configured base URL and a path, tolerating a trailing slash on
 * the base.
 */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

/**
 * GET a JSON document and validate it.
 *
 * @throws GatewayError of kind NetworkError
 */
export async function fetchUpstream<T>(
  ctx: HandlerContext,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  url: string,
  query?: Record<string, QueryValue>
): Promise<T> {
  const body = await ctx.rest.getJson(url, { query, signal: ctx.signal });
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw networkError(`Unexpected response shape from ${new URL(url).host}`, {
      data: { url, issues: parsed.error.issues.map((issue) => issue.path.join('.') || '(root)') },
    });
  }
  return parsed.data;
}
