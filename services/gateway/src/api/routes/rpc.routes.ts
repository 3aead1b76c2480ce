/**
 * JSON-RPC endpoint
 *
 * POST / takes the raw body whatever its Content-Type, so a malformed
 * body reaches the dispatcher and comes back as a ParseError instead of an
 * express 400. The HTTP status is always 200; errors travel in the envelope.
 */

import express, { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { GatewayApiDeps } from '../types';
import { MAX_BODY_SIZE } from '../types';

export function createRpcRoutes(deps: Pick<GatewayApiDeps, 'dispatcher'>): Router {
  const router = Router();

  router.post(
    '/',
    express.text({ type: () => true, limit: MAX_BODY_SIZE }),
    (req: Request, res: Response, next: NextFunction) => {
      // Abandon node calls and retries once the client has gone away
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) {
          controller.abort();
        }
      });

      const rawBody: unknown = req.body;
      deps.dispatcher
        .handle(typeof rawBody === 'string' ? rawBody : '', { signal: controller.signal })
        .then((response) => {
          if (!res.writableEnded) {
            res.status(200).json(response);
          }
        })
        .catch(next);
    }
  );

  return router;
}
