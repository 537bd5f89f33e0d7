/**
 * MCP tools for the IWC Galaxy workflow catalog.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Toolkit } from '../../toolkit.js';
import { callClient } from '../helpers.js';

export function registerWorkflowTools(server: McpServer, toolkit: Toolkit): void {
  // ── workflow_search ────────────────────────────────────────────
  server.tool(
    'workflow_search',
    'List tested Galaxy workflows from the IWC manifest, optionally filtered by category.',
    {
      category: z.string().optional().describe('Category name, matched case-insensitively'),
      limit: z.number().int().positive().optional().describe('Maximum workflows to return'),
    },
    async (args) =>
      callClient(toolkit, () =>
        toolkit.workflows.search({
          ...(args.category !== undefined ? { category: args.category } : {}),
          ...(args.limit !== undefined ? { limit: args.limit } : {}),
        })
      )
  );

  // ── workflow_categories ────────────────────────────────────────
  server.tool(
    'workflow_categories',
    'List the categories used by tested IWC workflows.',
    {},
    async () => callClient(toolkit, () => toolkit.workflows.listCategories())
  );
}
