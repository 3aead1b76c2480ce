/**
 * API Module
 *
 * Re-exports all API components: app factory, routes, middleware, and types.
 */

export * from './types';
export { createGatewayApp } from './app';
export { configureMiddleware, createErrorHandler } from './middleware';
export { setupAllRoutes, createHealthRoutes, createInfoRoutes, createRpcRoutes, HEALTH_CLIENT_KEY } from './routes';
