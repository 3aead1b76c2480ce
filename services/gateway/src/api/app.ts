/**
 * Express application for the gateway.
 */

import express from 'express';
import type { Express } from 'express';
import { configureMiddleware, createErrorHandler } from './middleware';
import { setupAllRoutes } from './routes';
import type { GatewayApiDeps } from './types';

export function createGatewayApp(deps: GatewayApiDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  configureMiddleware(app, deps.logger);
  setupAllRoutes(app, deps);

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(createErrorHandler(deps.logger));

  return app;
}
