/**
 * Market data handlers backed by CoinGecko and the alternative.me
 * Fear & Greed index.
 */

import { z } from 'zod';
import type { JsonRpcParams } from '@btc-gateway/types';
import type { HandlerBinding, HandlerContext } from '../dispatcher/types';
import { boundedInt, CurrencyParam, parseParams } from './params';
import {
  CoinDetailsSchema,
  FearGreedSchema,
  MarketChartSchema,
  SimplePriceSchema,
  fetchUpstream,
  joinUrl,
} from './upstream';

/** Above this many days CoinGecko is asked for daily points */
const HOURLY_HISTORY_MAX_DAYS = 30;
const FEAR_GREED_HISTORY_DAYS = 30;
const FEAR_GREED_REPORTED_DAYS = 10;

const CurrentPriceParams = z.object({
  currency: CurrencyParam.default('usd'),
});

const PriceHistoryParams = z.object({
  days: boundedInt(1, 365, 'days').default(7),
  currency: CurrencyParam.default('usd'),
});

export interface PricePoint {
  timestamp: number;
  price: number;
  market_cap: number | null;
  volume: number | null;
}

export async function getCurrentPrice(params: JsonRpcParams, ctx: HandlerContext): Promise<Record<string, unknown>> {
  const { currency } = parseParams(CurrentPriceParams, params);
  const data = await fetchUpstream(ctx, SimplePriceSchema, joinUrl(ctx.config.apis.coingeckoUrl, 'simple/price'), {
    ids: 'bitcoin',
    vs_currencies: currency,
    include_market_cap: true,
    include_24hr_vol: true,
    include_24hr_change: true,
    include_last_updated_at: true,
  });

  const quote = data.bitcoin;
  return {
    currency: currency.toUpperCase(),
    price: quote[currency] ?? null,
    market_cap: quote[`${currency}_market_cap`] ?? null,
    volume_24h: quote[`${currency}_24h_vol`] ?? null,
    change_24h: quote[`${currency}_24h_change`] ?? null,
    last_updated: quote.last_updated_at ?? null,
  };
}

export async function getPriceHistory(params: JsonRpcParams, ctx: HandlerContext): Promise<Record<string, unknown>> {
  const { days, currency } = parseParams(PriceHistoryParams, params);
  const chart = await fetchUpstream(
    ctx,
    MarketChartSchema,
    joinUrl(ctx.config.apis.coingeckoUrl, 'coins/bitcoin/market_chart'),
    {
      vs_currency: currency,
      days,
      interval: days > HOURLY_HISTORY_MAX_DAYS ? 'daily' : undefined,
    }
  );

  const history: PricePoint[] = chart.prices.map(([timestamp, price], i) => ({
    timestamp,
    price,
    market_cap: chart.market_caps[i]?.[1] ?? null,
    volume: chart.total_volumes[i]?.[1] ?? null,
  }));
  const prices = history.map((point) => point.price);
  const first = history[0];
  const last = history[history.length - 1];

  return {
    currency: currency.toUpperCase(),
    period_days: days,
    data_points: history.length,
    price_history: history,
    summary: {
      start_price: first ? first.price : null,
      end_price: last ? last.price : null,
      min_price: prices.length > 0 ? Math.min(...prices) : null,
      max_price: prices.length > 0 ? Math.max(...prices) : null,
      avg_price: prices.length > 0 ? prices.reduce((sum, price) => sum + price, 0) / prices.length : null,
    },
  };
}

export async function getMarketStats(_params: JsonRpcParams, ctx: HandlerContext): Promise<Record<string, unknown>> {
  const coin = await fetchUpstream(ctx, CoinDetailsSchema, joinUrl(ctx.config.apis.coingeckoUrl, 'coins/bitcoin'), {
    localization: false,
    tickers: false,
    market_data: true,
    community_data: false,
    developer_data: false,
    sparkline: false,
  });
  const market = coin.market_data;

  return {
    basic_info: {
      name: coin.name ?? null,
      symbol: coin.symbol ?? null,
      rank: coin.market_cap_rank ?? null,
      last_updated: coin.last_updated ?? null,
    },
    price_data: {
      current_price_usd: market.current_price.usd ?? null,
      market_cap_usd: market.market_cap.usd ?? null,
      total_volume_usd: market.total_volume.usd ?? null,
      high_24h_usd: market.high_24h.usd ?? null,
      low_24h_usd: market.low_24h.usd ?? null,
      price_change_24h: market.price_change_24h ?? null,
      price_change_percentage_24h: market.price_change_percentage_24h ?? null,
      price_change_percentage_7d: market.price_change_percentage_7d ?? null,
      price_change_percentage_30d: market.price_change_percentage_30d ?? null,
      price_change_percentage_1y: market.price_change_percentage_1y ?? null,
    },
    supply_data: {
      circulating_supply: market.circulating_supply ?? null,
      total_supply: market.total_supply ?? null,
      max_supply: market.max_supply ?? null,
    },
    all_time: {
      ath: market.ath.usd ?? null,
      ath_date: market.ath_date.usd ?? null,
      ath_change_percentage: market.ath_change_percentage.usd ?? null,
      atl: market.atl.usd ?? null,
      atl_date: market.atl_date.usd ?? null,
      atl_change_percentage: market.atl_change_percentage.usd ?? null,
    },
  };
}

export async function getFearGreedIndex(_params: JsonRpcParams, ctx: HandlerContext): Promise<Record<string, unknown>> {
  const index = await fetchUpstream(ctx, FearGreedSchema, ctx.config.apis.fearGreedUrl, {
    limit: FEAR_GREED_HISTORY_DAYS,
  });
  const current = index.data[0];

  return {
    current: {
      value: current?.value ?? null,
      value_classification: current?.value_classification ?? null,
      timestamp: current?.timestamp ?? null,
      time_until_update: current?.time_until_update ?? null,
    },
    historical: index.data.slice(0, FEAR_GREED_REPORTED_DAYS).map((entry) => ({
      value: entry.value,
      classification: entry.value_classification,
      timestamp: entry.timestamp,
    })),
    metadata: index.metadata,
  };
}

export const marketHandlers: HandlerBinding[] = [
  { method: 'get_current_price', handler: getCurrentPrice },
  { method: 'get_price_history', handler: getPriceHistory },
  { method: 'get_market_stats', handler: getMarketStats },
  { method: 'get_fear_greed_index', handler: getFearGreedIndex },
];
