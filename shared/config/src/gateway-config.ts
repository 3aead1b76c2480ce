/**
 * Gateway Configuration Loader
 *
 * Reads the process environment (or any env mapping, for tests), applies
 * defaults, and validates the result against GatewayConfigSchema.
 *
 * | Env                    | Default                          |
 * |------------------------|----------------------------------|
 * | HOST / PORT            | 0.0.0.0 / 8000                   |
 * | BITCOIN_RPC_URL        | http://127.0.0.1:8332/           |
 * | REQUEST_TIMEOUT        | 30 (seconds)                     |
 * | MAX_RETRIES            | 3 (attempts per call)            |
 * | RATE_LIMIT_PER_MINUTE  | 60                               |
 */

import { envString, parseEnvBoolean, safeParseInt } from './utils/env-parsing';
import { GatewayConfig, GatewayConfigSchema, validateOrThrow } from './schemas';

export const DEFAULT_RPC_URL = 'http://127.0.0.1:8332/';
export const DEFAULT_RPC_USER = 'user';
export const DEFAULT_RPC_PASSWORD = 'pass';
export const DEFAULT_MEMPOOL_SPACE_URL = 'https://mempool.space/api';
export const DEFAULT_COINGECKO_URL = 'https://api.coingecko.com/api/v3';
export const DEFAULT_FEAR_GREED_URL = 'https://api.alternative.me/fng/';

export const SERVICE_NAME = 'btc-rpc-gateway';
export const SERVICE_VERSION = '1.0.0';

export type Env = Record<string, string | undefined>;

export function isProductionEnv(env: Env): boolean {
  return env.NODE_ENV === 'production' || env.RENDER_SERVICE_NAME !== undefined;
}

/**
 * Warn if node credentials were left at their defaults in production.
 */
function warnOnProductionDefaults(env: Env, config: GatewayConfig): void {
  if (!isProductionEnv(env)) return;
  if (config.bitcoin.rpcPassword === DEFAULT_RPC_PASSWORD) {
    console.warn(
      '[CONFIG WARNING] Using default BITCOIN_RPC_PASSWORD in production!\n' +
        'Set BITCOIN_RPC_PASSWORD environment variable for production deployment.'
    );
  }
  if (env.BITCOIN_RPC_URL === undefined) {
    console.warn(`[CONFIG WARNING] Using default BITCOIN_RPC_URL (${DEFAULT_RPC_URL}) in production!`);
  }
}

/**
 * Load and validate the gateway configuration.
 *
 * @throws ConfigValidationError listing every invalid setting
 *
 * @example
 * ```typescript
 * const config = loadGatewayConfig();
 * const client = BitcoinRpcClient.fromConfig(config.bitcoin, config.rpc);
 * ```
 */
export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  const timeoutSeconds = safeParseInt(env.REQUEST_TIMEOUT, 30, 'REQUEST_TIMEOUT');

  const raw = {
    service: {
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
    },
    server: {
      host: envString(env.HOST, '0.0.0.0'),
      port: safeParseInt(env.PORT, 8000, 'PORT'),
      debug: parseEnvBoolean(env.DEBUG, false, 'DEBUG'),
    },
    bitcoin: {
      rpcUrl: envString(env.BITCOIN_RPC_URL, DEFAULT_RPC_URL),
      rpcUser: env.BITCOIN_RPC_USER ?? DEFAULT_RPC_USER,
      rpcPassword: env.BITCOIN_RPC_PASSWORD ?? DEFAULT_RPC_PASSWORD,
      network: envString(env.BITCOIN_NETWORK, 'mainnet').toLowerCase(),
    },
    rpc: {
      timeoutMs: timeoutSeconds * 1000,
      maxAttempts: safeParseInt(env.MAX_RETRIES, 3, 'MAX_RETRIES'),
      backoffBaseMs: safeParseInt(env.RETRY_BASE_DELAY_MS, 1000, 'RETRY_BASE_DELAY_MS'),
      rateLimit: {
        maxRequests: safeParseInt(env.RATE_LIMIT_PER_MINUTE, 60, 'RATE_LIMIT_PER_MINUTE'),
        windowMs: safeParseInt(env.RATE_LIMIT_WINDOW_MS, 60_000, 'RATE_LIMIT_WINDOW_MS'),
      },
    },
    apis: {
      mempoolSpaceUrl: envString(env.MEMPOOL_SPACE_API_URL, DEFAULT_MEMPOOL_SPACE_URL),
      coingeckoUrl: envString(env.COINGECKO_API_URL, DEFAULT_COINGECKO_URL),
      fearGreedUrl: envString(env.FEAR_GREED_API_URL, DEFAULT_FEAR_GREED_URL),
      timeoutMs: timeoutSeconds * 1000,
    },
  };

  const config = validateOrThrow(GatewayConfigSchema, raw, 'gateway');
  warnOnProductionDefaults(env, config);
  return config;
}

/**
 * Mask the node password wherever it appears in the RPC URL, for status
 * output. Credentials embedded as `user:pass@` are masked too.
 */
export function maskRpcUrl(rpcUrl: string, password: string): string {
  const withoutUserInfo = rpcUrl.replace(/\/\/([^:/@]+):([^@/]*)@/, '//$1:***@');
  return password ? withoutUserInfo.split(password).join('***') : withoutUserInfo;
}
