/**
 * Factory function for creating the MCP server with all tools.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Toolkit } from '../toolkit.js';
import { registerAllTools } from './tools/index.js';

export const SERVER_NAME = 'bioscout';
export const SERVER_VERSION = '0.1.0';

/**
 * Create and configure an MCP server bound to the given clients.
 */
export function createMcpServer(toolkit: Toolkit): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  registerAllTools(server, toolkit);

  return server;
}
