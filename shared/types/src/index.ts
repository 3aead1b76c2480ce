/**
 * Shared types for the Bitcoin RPC gateway
 *
 * @example
 * ```typescript
 * import { GatewayError, rpcError, JsonRpcResponse } from '@btc-gateway/types';
 * ```
 */

export * from './errors';
export * from './jsonrpc';
