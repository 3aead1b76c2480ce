/**
 * API Types for the Gateway Service
 *
 * Routes receive their collaborators through GatewayApiDeps rather than
 * reaching into GatewayService, so each router can be mounted on a bare
 * express app in tests.
 */

import type { GatewayConfig } from '@btc-gateway/config';
import type { BitcoinRpcClient, ILogger } from '@btc-gateway/core';
import type { RequestDispatcher } from '../dispatcher/request-dispatcher';

export interface GatewayApiDeps {
  dispatcher: RequestDispatcher;
  /** Used by GET /health to probe the node */
  rpc: BitcoinRpcClient;
  config: GatewayConfig;
  logger: ILogger;
  /** Method names listed by GET / */
  listMethods(): string[];
}

/** Request bodies above this size are refused before dispatch */
export const MAX_BODY_SIZE = '1mb';
