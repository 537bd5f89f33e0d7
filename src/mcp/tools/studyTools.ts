/**
 * MCP tools for ENA study metadata.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Toolkit } from '../../toolkit.js';
import { withRetry } from '../../retry/RetryPolicy.js';
import { callClient, outcomeResult, retryOptions } from '../helpers.js';

export function registerStudyTools(server: McpServer, toolkit: Toolkit): void {
  // ── study_details ──────────────────────────────────────────────
  server.tool(
    'study_details',
    'Fetch title, description, organism, center and dates for one or more study accessions (PRJEB, PRJNA, PRJDB).',
    {
      accessions: z.array(z.string()).min(1).describe('Study accessions; one accession returns a single record'),
    },
    async (args) => {
      const [only] = args.accessions;
      if (args.accessions.length === 1 && only !== undefined) {
        return callClient(toolkit, () => toolkit.studies.getDetails(only));
      }
      const retry = retryOptions(toolkit);
      const batch = await toolkit.studies.getMultipleDetails(args.accessions, (accession) =>
        withRetry(() => toolkit.studies.getDetails(accession), retry)
      );
      return outcomeResult(batch);
    }
  );
}
