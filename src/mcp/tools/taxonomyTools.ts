/**
 * MCP tools for NCBI Taxonomy lookups.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Toolkit } from '../../toolkit.js';
import { callClient, errorResult } from '../helpers.js';

export function registerTaxonomyTools(server: McpServer, toolkit: Toolkit): void {
  // ── taxonomy_lookup ────────────────────────────────────────────
  server.tool(
    'taxonomy_lookup',
    'Resolve an organism name (or a taxonomy id) to its NCBI Taxonomy record: tax id, scientific and common name, rank and lineage.',
    {
      name: z.string().optional().describe('Organism name, e.g. "Homo sapiens". The first NCBI suggestion is taken.'),
      taxId: z.number().int().positive().optional().describe('NCBI taxonomy id; use instead of name'),
    },
    async (args) => {
      const name = args.name?.trim();
      if (name && args.taxId !== undefined) {
        return errorResult('Pass either name or taxId, not both');
      }
      if (args.taxId !== undefined) {
        const taxId = args.taxId;
        return callClient(toolkit, () => toolkit.taxonomy.getByTaxId(taxId));
      }
      if (!name) {
        return errorResult('Either name or taxId is required');
      }
      return callClient(toolkit, () => toolkit.taxonomy.searchByName(name));
    }
  );
}
