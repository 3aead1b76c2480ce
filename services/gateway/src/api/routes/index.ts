/**
 * Route Aggregator
 */

import type { Express } from 'express';
import type { GatewayApiDeps } from '../types';
import { createHealthRoutes } from './health.routes';
import { createInfoRoutes } from './info.routes';
import { createRpcRoutes } from './rpc.routes';

export function setupAllRoutes(app: Express, deps: GatewayApiDeps): void {
  app.use(createHealthRoutes(deps));
  app.use(createInfoRoutes(deps));
  app.use(createRpcRoutes(deps));
}

export { createHealthRoutes, HEALTH_CLIENT_KEY } from './health.routes';
export { createInfoRoutes } from './info.routes';
export { createRpcRoutes } from './rpc.routes';
