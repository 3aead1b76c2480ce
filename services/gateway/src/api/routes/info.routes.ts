/**
 * GET /: service identity and the methods it serves.
 */

import { Router, Request, Response } from 'express';
import type { GatewayApiDeps } from '../types';

export function createInfoRoutes(deps: Pick<GatewayApiDeps, 'config' | 'listMethods'>): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      name: deps.config.service.name,
      version: deps.config.service.version,
      description: 'JSON-RPC 2.0 gateway for Bitcoin blockchain, address and market data',
      network: deps.config.bitcoin.network,
      endpoints: {
        rpc: 'POST /',
        health: 'GET /health',
        liveness: 'GET /health/live',
      },
      methods: deps.listMethods(),
    });
  });

  return router;
}
