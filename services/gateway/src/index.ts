/**
 * Gateway Service Entry Point & Public API
 *
 * Environment Variables (see @btc-gateway/config for the full list):
 * - HOST / PORT: listen address (default: 0.0.0.0:8000)
 * - BITCOIN_RPC_URL, BITCOIN_RPC_USER, BITCOIN_RPC_PASSWORD: node endpoint
 * - DEBUG: log at debug level
 */

export { GatewayService } from './gateway-service';
export type { GatewayServiceOptions } from './gateway-service';
export * from './api';
export * from './dispatcher';
export * from './handlers';
export * from './validation/bitcoin-validators';

import { SERVICE_NAME, loadGatewayConfig } from '@btc-gateway/config';
import { createPinoLogger, runServiceMain, setupServiceShutdown } from '@btc-gateway/core';
import { GatewayService } from './gateway-service';

async function main(): Promise<void> {
  const config = loadGatewayConfig();
  const logger = createPinoLogger({ name: SERVICE_NAME, level: config.server.debug ? 'debug' : undefined });

  logger.info(`Starting ${config.service.name} v${config.service.version}`, {
    network: config.bitcoin.network,
    rateLimit: config.rpc.rateLimit,
  });

  const service = new GatewayService({ config, logger });

  setupServiceShutdown({
    logger,
    serviceName: SERVICE_NAME,
    onShutdown: () => service.stop(),
  });

  await service.start();
}

runServiceMain({ main, serviceName: SERVICE_NAME });
