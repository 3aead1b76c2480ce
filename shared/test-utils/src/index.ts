/**
 * Test Utilities for the Bitcoin RPC gateway
 *
 * ```typescript
 * import { FetchStub, nodeResult, nodeError, httpStatus } from '@btc-gateway/test-utils';
 * ```
 */

export * from './mocks/fetch.mock';
export * from './factories/node-reply.factory';
export * from './factories/fixtures';
