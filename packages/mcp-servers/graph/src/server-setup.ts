/**
 * Graph Server Setup
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { initializeService, type GraphServiceConfig } from './graph-service.js';
import { getRegisteredTools, callRegisteredTool } from './tool-registry.js';

// Import tools to trigger registration
import './tools/index.js';

/**
 * Create and configure the graph MCP server.
 */
export function createGraphServer(config: GraphServiceConfig): Server {
  initializeService(config);

  const server = new Server(
    {
      name: 'mcp-graph',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: getRegisteredTools() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callRegisteredTool(name, args);
  });

  return server;
}
