#!/usr/bin/env node
/**
 * MCP stdio transport entry point.
 *
 * Usage: bioscout-mcp [configPath]
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/loader.js';
import { createToolkit } from './toolkit.js';
import { createMcpServer } from './mcp/index.js';

async function main() {
  const configPath = process.argv[2];

  // Redirect all console to stderr so stdout stays clean for MCP JSON-RPC
  console.log = (...args: unknown[]) => process.stderr.write(args.map(String).join(' ') + '\n');
  console.warn = (...args: unknown[]) => process.stderr.write(args.map(String).join(' ') + '\n');
  console.error = (...args: unknown[]) => process.stderr.write(args.map(String).join(' ') + '\n');

  const config = await loadConfig(configPath !== undefined ? { configPath } : {});
  console.log('Initializing bioscout MCP server');

  const mcpServer = createMcpServer(createToolkit(config));

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);

  console.log('MCP server connected via stdio');
}

main().catch((err) => {
  process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
