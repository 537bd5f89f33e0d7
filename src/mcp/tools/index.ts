/**
 * Aggregator that registers all MCP tools on the server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Toolkit } from '../../toolkit.js';
import { registerTaxonomyTools } from './taxonomyTools.js';
import { registerArchiveTools } from './archiveTools.js';
import { registerStudyTools } from './studyTools.js';
import { registerWorkflowTools } from './workflowTools.js';

export function registerAllTools(server: McpServer, toolkit: Toolkit): void {
  registerTaxonomyTools(server, toolkit);
  registerArchiveTools(server, toolkit);
  registerStudyTools(server, toolkit);
  registerWorkflowTools(server, toolkit);
}
