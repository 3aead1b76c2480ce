/**
 * Express middleware: security headers, CORS, request logging and the
 * final error handler.
 */

import type { ErrorRequestHandler, Express, NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import type { ILogger } from '@btc-gateway/core';
import { getErrorMessage } from '@btc-gateway/core';
import { JSONRPC_VERSION, internalError, invalidRequest } from '@btc-gateway/types';

/**
 * Install the middleware that runs ahead of every route.
 */
export function configureMiddleware(app: Express, logger: ILogger): void {
  // JSON-only API: no CSP needed, and browsers on other origins may call it
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginResourcePolicy: { policy: 'cross-origin' },
    })
  );

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }

    next();
  });

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const clientIP = req.ip ?? req.socket.remoteAddress ?? 'unknown';

    res.on('finish', () => {
      logger.info('API Request', {
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        duration: Date.now() - start,
        ip: clientIP,
      });
    });

    next();
  });
}

function bodyParserErrorType(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string') {
    return error.type;
  }
  return undefined;
}

/**
 * Last-resort error handler. Failures on the JSON-RPC endpoint still
 * answer with a JSON-RPC envelope; anything else gets a plain 500.
 */
export function createErrorHandler(logger: ILogger): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const type = bodyParserErrorType(error);
    if (type === 'entity.too.large') {
      logger.warn('Request body too large', { url: req.originalUrl });
      res.json({
        jsonrpc: JSONRPC_VERSION,
        error: invalidRequest('Request body too large').toJsonRpcError(),
        id: null,
      });
      return;
    }

    logger.error('Unhandled API error', { url: req.originalUrl, error: getErrorMessage(error) });
    if (req.method === 'POST' && req.path === '/') {
      res.json({ jsonrpc: JSONRPC_VERSION, error: internalError(error).toJsonRpcError(), id: null });
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  };
}
