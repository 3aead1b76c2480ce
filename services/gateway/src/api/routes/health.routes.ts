/**
 * Health Check Routes
 *
 * Public endpoints for load balancer and orchestrator probes.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { probeNode } from '../../handlers/server.handlers';
import type { NodeStatus } from '../../handlers/server.handlers';
import type { GatewayApiDeps } from '../types';

/** Rate-limit bucket for health probes, kept apart from client traffic */
export const HEALTH_CLIENT_KEY = 'health';

type HealthStatus = 'healthy' | 'degraded' | 'rate_limited';

function healthOf(node: NodeStatus): [number, HealthStatus] {
  if (node.connected === null) return [429, 'rate_limited'];
  return node.connected ? [200, 'healthy'] : [503, 'degraded'];
}

export function createHealthRoutes(deps: Pick<GatewayApiDeps, 'rpc' | 'config'>): Router {
  const router = Router();

  /**
   * GET /health
   * 200 when the node answers, 503 when it does not, 429 when the probe
   * itself was rate limited.
   */
  router.get('/health', (_req: Request, res: Response, next: NextFunction) => {
    probeNode(deps.rpc, { clientKey: HEALTH_CLIENT_KEY })
      .then((node) => {
        const [httpStatus, status] = healthOf(node);
        res.status(httpStatus).json({
          status,
          service: deps.config.service.name,
          version: deps.config.service.version,
          node,
          timestamp: Date.now(),
        });
      })
      .catch(next);
  });

  /**
   * GET /health/live
   * Liveness probe: 200 while the process is serving requests.
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.json({ status: 'alive', timestamp: Date.now() });
  });

  return router;
}
