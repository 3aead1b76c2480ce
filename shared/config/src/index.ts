/**
 * Gateway configuration
 *
 * @example
 * ```typescript
 * import { loadGatewayConfig, GatewayConfig } from '@btc-gateway/config';
 * ```
 */

export * from './schemas';
export * from './gateway-config';
export * from './utils/env-parsing';
