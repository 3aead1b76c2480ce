/**
 * Dispatcher Types
 *
 * Handlers receive the request's params mapping plus a context carrying the
 * upstream clients. The context is assembled per request so that the
 * caller's AbortSignal reaches every upstream call the handler makes.
 */

import type { GatewayConfig } from '@btc-gateway/config';
import type { BitcoinRpcClient, HttpJsonClient, ILogger } from '@btc-gateway/core';
import type { JsonRpcParams } from '@btc-gateway/types';

/**
 * Request-independent dependencies shared by every handler.
 */
export interface HandlerServices {
  rpc: BitcoinRpcClient;
  rest: HttpJsonClient;
  config: GatewayConfig;
  logger: ILogger;
}

export interface HandlerContext extends HandlerServices {
  /** Aborted when the caller goes away */
  signal?: AbortSignal;
}

export type MethodHandler = (params: JsonRpcParams, context: HandlerContext) => Promise<unknown>;

/**
 * A named handler, as contributed by a handler module.
 */
export interface HandlerBinding {
  method: string;
  handler: MethodHandler;
}
