/**
 * MCP tool surface
 *
 * Exposes the domain handlers as MCP tools and three read-only resources.
 * The catalog (tool input schemas, resource descriptors) is data in
 * mcp-catalog.json; every tool and resource must name a registered method.
 */

import { z } from 'zod';
import { validationError } from '@btc-gateway/types';
import type { JsonRpcParams } from '@btc-gateway/types';
import type { MethodRegistry } from '../dispatcher/method-registry';
import type { HandlerBinding, HandlerContext, MethodHandler } from '../dispatcher/types';
import catalogJson from './mcp-catalog.json';
import { parseParams } from './params';

export const DEFAULT_PROTOCOL_VERSION = '2024-11-05';

const ToolSchema = z.object({
  name: z.string(),
  description: z.string(),
  inputSchema: z.object({ type: z.literal('object') }).passthrough(),
});

const ResourceSchema = z.object({
  uri: z.string(),
  name: z.string(),
  description: z.string(),
  mimeType: z.string(),
  /** Method whose result is the resource's content */
  method: z.string(),
});

export const McpCatalogSchema = z.object({
  tools: z.array(ToolSchema),
  resources: z.array(ResourceSchema),
});

export type McpTool = z.infer<typeof ToolSchema>;
export type McpResource = z.infer<typeof ResourceSchema>;
export type McpCatalog = z.infer<typeof McpCatalogSchema>;

export function loadMcpCatalog(): McpCatalog {
  return McpCatalogSchema.parse(catalogJson);
}

const InitializeParams = z.object({
  protocolVersion: z.string().default(DEFAULT_PROTOCOL_VERSION),
  clientInfo: z.object({}).passthrough().optional(),
});

const ToolCallParams = z.object({
  name: z.string().min(1, 'Missing tool name'),
  arguments: z.record(z.unknown()).default({}),
});

const ResourceReadParams = z.object({
  uri: z.string().min(1, 'Missing resource URI'),
});

/**
 * Build the MCP handlers over the registry of domain methods.
 *
 * @throws Error when the catalog names a method the registry lacks
 */
export function createMcpHandlers(tools: MethodRegistry, catalog: McpCatalog = loadMcpCatalog()): HandlerBinding[] {
  const resolve = (method: string, owner: string): MethodHandler => {
    const handler = tools.get(method);
    if (!handler) {
      throw new Error(`MCP catalog entry ${owner} refers to unregistered method ${method}`);
    }
    return handler;
  };

  const toolHandlers = new Map(catalog.tools.map((tool) => [tool.name, resolve(tool.name, tool.name)]));
  const resources = new Map(
    catalog.resources.map((resource) => [resource.uri, { resource, handler: resolve(resource.method, resource.uri) }])
  );

  const initialize = async (params: JsonRpcParams, ctx: HandlerContext) => {
    const { protocolVersion } = parseParams(InitializeParams, params);
    return {
      protocolVersion,
      capabilities: { tools: {}, resources: {} },
      serverInfo: { name: ctx.config.service.name, version: ctx.config.service.version },
    };
  };

  const listTools = async () => ({ tools: catalog.tools });

  const callTool = async (params: JsonRpcParams, ctx: HandlerContext) => {
    const { name, arguments: args } = parseParams(ToolCallParams, params);
    const handler = toolHandlers.get(name);
    if (!handler) {
      throw validationError(`Unknown tool: ${name}`, 'name');
    }
    ctx.logger.debug('Calling tool', { tool: name });
    return { content: await handler(args, ctx) };
  };

  const listResources = async () => ({
    resources: catalog.resources.map(({ uri, name, description, mimeType }) => ({ uri, name, description, mimeType })),
  });

  const readResource = async (params: JsonRpcParams, ctx: HandlerContext) => {
    const { uri } = parseParams(ResourceReadParams, params);
    const entry = resources.get(uri);
    if (!entry) {
      throw validationError(`Unknown resource: ${uri}`, 'uri');
    }
    const content = await entry.handler({}, ctx);
    return {
      contents: [{ uri, mimeType: entry.resource.mimeType, text: JSON.stringify(content, null, 2) }],
    };
  };

  return [
    { method: 'initialize', handler: initialize },
    { method: 'tools/list', handler: listTools },
    { method: 'tools/call', handler: callTool },
    { method: 'resources/list', handler: listResources },
    { method: 'resources/read', handler: readResource },
  ];
}
