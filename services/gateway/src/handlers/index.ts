/**
 * Handler Registry Assembly
 *
 * Domain methods (blockchain, network, address, market) form the tool
 * registry that MCP `tools/call` dispatches into; the public registry adds
 * get_server_status and the MCP methods on top.
 */

import { MethodRegistry } from '../dispatcher/method-registry';
import { addressHandlers } from './address.handlers';
import { blockchainHandlers } from './blockchain.handlers';
import { createMcpHandlers, McpCatalog, loadMcpCatalog } from './mcp.handlers';
import { marketHandlers } from './market.handlers';
import { networkHandlers } from './network.handlers';
import { createServerHandlers } from './server.handlers';

export const domainHandlers = [...blockchainHandlers, ...networkHandlers, ...addressHandlers, ...marketHandlers];

/**
 * Build the immutable registry served by the dispatcher.
 *
 * @throws DuplicateMethodError or a catalog mismatch, at startup
 */
export function buildMethodRegistry(catalog: McpCatalog = loadMcpCatalog()): MethodRegistry {
  const tools = MethodRegistry.build(domainHandlers);
  const serverHandlers = createServerHandlers(() => ['get_server_status', ...tools.list()]);
  return MethodRegistry.build([...serverHandlers, ...domainHandlers, ...createMcpHandlers(tools, catalog)]);
}

export * from './address.handlers';
export * from './blockchain.handlers';
export * from './market.handlers';
export * from './mcp.handlers';
export * from './network.handlers';
export * from './server.handlers';
export { parseParams, toParamsError } from './params';
export { fetchUpstream, joinUrl } from './upstream';
