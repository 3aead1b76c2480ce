/**
 * @btc-gateway/core
 *
 * Logging, async utilities, resilience policies and the upstream clients
 * (Bitcoin node JSON-RPC, third-party REST).
 */

export * from './logging';
export * from './async';
export * from './resilience';
export * from './rpc';
export * from './service-lifecycle';
