/**
 * Public exports for the MCP server layer.
 */

export { createMcpServer, SERVER_NAME, SERVER_VERSION } from './McpServerFactory.js';
export { textResult, jsonResult, errorResult, outcomeResult } from './helpers.js';
