export {
  SlidingWindowRateLimiter,
  GLOBAL_CLIENT_KEY,
} from './sliding-window-rate-limiter';
export type { SlidingWindowConfig, RateLimiterStats, WindowState } from './sliding-window-rate-limiter';

export { BitcoinRpcClient } from './bitcoin-rpc-client';
export type {
  BitcoinRpcClientOptions,
  BitcoinRpcClientStats,
  CallOptions,
  FetchLike,
  SleepFn,
} from './bitcoin-rpc-client';

export { HttpJsonClient, buildUrl } from './http-json-client';
export type { GetJsonOptions, HttpJsonClientOptions, QueryValue } from './http-json-client';

export * from './node-schemas';
