/**
 * MCP tools for the European Nucleotide Archive portal search.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Toolkit } from '../../toolkit.js';
import { describeResultTypes } from '../../archive/query.js';
import { callClient } from '../helpers.js';

export function registerArchiveTools(server: McpServer, toolkit: Toolkit): void {
  // ── archive_search ─────────────────────────────────────────────
  server.tool(
    'archive_search',
    'Search ENA for sequencing runs, assemblies, studies, samples and more. Read-run results are grouped by study.',
    {
      query: z
        .string()
        .describe('Organism name, NCBI tax id, or an ENA portal expression such as study_accession=PRJEB1234'),
      resultType: z.string().optional().describe(`Result type (default read_run): ${describeResultTypes()}`),
      limit: z.number().int().positive().optional().describe('Page size (default 10)'),
      offset: z.number().int().nonnegative().optional().describe('Records to skip (default 0)'),
      fields: z.array(z.string()).optional().describe('Fields to return instead of the result type defaults'),
      includeUrls: z.boolean().optional().describe('Attach HTTPS FASTQ download links per run'),
    },
    async (args) =>
      callClient(toolkit, () =>
        toolkit.archive.search(args.query, {
          ...(args.resultType !== undefined ? { resultType: args.resultType } : {}),
          ...(args.limit !== undefined ? { limit: args.limit } : {}),
          ...(args.offset !== undefined ? { offset: args.offset } : {}),
          ...(args.fields !== undefined ? { fields: args.fields } : {}),
          ...(args.includeUrls !== undefined ? { includeUrls: args.includeUrls } : {}),
        })
      )
  );

  // ── archive_fastq_urls ─────────────────────────────────────────
  server.tool(
    'archive_fastq_urls',
    'List HTTPS download URLs for the FASTQ files of one sequencing run.',
    {
      runAccession: z.string().describe('Run accession, e.g. SRR000001 or ERR000001'),
    },
    async (args) => callClient(toolkit, () => toolkit.archive.getFastqUrls(args.runAccession))
  );
}
