/**
 * Integration tests for the MCP server layer.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';

import { createMcpServer } from './McpServerFactory.js';
import { errorResult, jsonResult, outcomeResult, textResult } from './helpers.js';
import { dnsFailure, jsonResponse, testToolkit, type FakeHandler, type RecordedRequest } from '../testing/fakeFetch.js';

function remoteServices(request: RecordedRequest) {
  const url = new URL(request.url);
  if (url.host === 'taxonomy.test') {
    if (url.pathname.includes('/taxon_suggest/')) {
      return jsonResponse({ sci_name_and_ids: [{ sci_name: 'Escherichia coli', tax_id: '562' }] });
    }
    return jsonResponse({ taxonomy_nodes: [{ taxonomy: { tax_id: 562, organism_name: 'Escherichia coli', rank: 'species' } }] });
  }
  if (url.host === 'catalog.test') {
    return jsonResponse([
      { workflows: [{ trsID: '#workflow/a', collections: ['Virology', 'Assembly'], tests: [], definition: { name: 'A' } }] },
    ]);
  }
  if (url.searchParams.get('result') === 'study') {
    return jsonResponse([]);
  }
  return jsonResponse([
    { run_accession: 'ERR1', study_accession: 'PRJEB1', fastq_ftp: 'files.example.org/ERR1.fastq.gz' },
    { run_accession: 'ERR2', study_accession: 'PRJEB1' },
  ]);
}

async function connect(handler: FakeHandler, retry: { maxAttempts?: number; baseDelayMs?: number } = {}) {
  const { toolkit, requests } = testToolkit(handler, retry);
  const server = createMcpServer(toolkit);
  const client = new Client({ name: 'bioscout-test-client', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  return { server, client, requests };
}

async function callTool(client: Client, name: string, args: Record<string, unknown>) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [first] = result.content;
  if (first?.type !== 'text') {
    throw new Error(`expected text content from ${name}`);
  }
  const parsed: unknown = JSON.parse(first.text);
  return { isError: result.isError ?? false, body: parsed };
}

describe('MCP Server', () => {
  let client: Client;
  let server: McpServer;

  beforeEach(async () => {
    ({ client, server } = await connect(remoteServices));
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  describe('createMcpServer', () => {
    it('creates an McpServer instance', () => {
      expect(server).toBeInstanceOf(McpServer);
    });

    it('registers one tool per client operation', async () => {
      const { tools } = await client.listTools();
      expect(tools.map((t) => t.name).sort()).toEqual([
        'archive_fastq_urls',
        'archive_search',
        'study_details',
        'taxonomy_lookup',
        'workflow_categories',
        'workflow_search',
      ]);
    });
  });

  describe('tools', () => {
    it('taxonomy_lookup resolves a name', async () => {
      const { isError, body } = await callTool(client, 'taxonomy_lookup', { name: 'Escherichia coli' });
      expect(isError).toBe(false);
      expect(body).toEqual({ success: true, taxId: 562, scientificName: 'Escherichia coli', rank: 'species', lineage: [] });
    });

    it('taxonomy_lookup needs a name or an id', async () => {
      const result = CallToolResultSchema.parse(await client.callTool({ name: 'taxonomy_lookup', arguments: {} }));
      expect(result.isError).toBe(true);
      expect(result.content).toEqual([{ type: 'text', text: 'Either name or taxId is required' }]);
    });

    it('archive_search groups runs by study', async () => {
      const { body } = await callTool(client, 'archive_search', { query: 'Escherichia coli', limit: 2 });
      expect(body).toMatchObject({ success: true, count: 2, totalStudies: 1 });
    });

    it('archive_search reports usage errors with isError', async () => {
      const { isError, body } = await callTool(client, 'archive_search', { query: 'x', resultType: 'genome' });
      expect(isError).toBe(true);
      expect(body).toMatchObject({ success: false, errorKind: 'usage' });
    });

    it('archive_fastq_urls returns HTTPS URLs', async () => {
      const { body } = await callTool(client, 'archive_fastq_urls', { runAccession: 'ERR1' });
      expect(body).toEqual({ success: true, runAccession: 'ERR1', fastqUrls: ['https://files.example.org/ERR1.fastq.gz'] });
    });

    it('study_details reports a missing study as found: false', async () => {
      const { isError, body } = await callTool(client, 'study_details', { accessions: ['PRJEB1234'] });
      expect(isError).toBe(false);
      expect(body).toEqual({ success: true, accession: 'PRJEB1234', found: false, message: 'Study not found' });
    });

    it('study_details batches several accessions', async () => {
      const { body } = await callTool(client, 'study_details', { accessions: ['PRJEB1', 'PRJEB2'] });
      expect(body).toMatchObject({ success: true, count: 2 });
    });

    it('workflow_search and workflow_categories read the manifest', async () => {
      const search = await callTool(client, 'workflow_search', { category: 'virology' });
      expect(search.body).toMatchObject({ success: true, count: 1 });

      const categories = await callTool(client, 'workflow_categories', {});
      expect(categories.body).toEqual({ success: true, count: 2, categories: ['Assembly', 'Virology'] });
    });
  });

  describe('transport failures', () => {
    it('return the structured error with isError', async () => {
      const offline = await connect((request) => {
        throw dnsFailure(new URL(request.url).host);
      });
      try {
        const { isError, body } = await callTool(offline.client, 'workflow_categories', {});
        expect(isError).toBe(true);
        expect(body).toEqual({
          success: false,
          errorKind: 'network',
          error: 'Network error: getaddrinfo ENOTFOUND catalog.test',
          suggestion: 'Check network settings and ensure catalog.test is reachable',
        });
      } finally {
        await offline.client.close();
        await offline.server.close();
      }
    });
  });

  describe('retries', () => {
    it('study_details retries each accession of a batch', async () => {
      const log = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      let failedOnce = false;
      const flaky = await connect(
        (request) => {
          if (request.url.includes('PRJEB2') && !failedOnce) {
            failedOnce = true;
            throw dnsFailure('archive.test');
          }
          return jsonResponse([]);
        },
        { maxAttempts: 2, baseDelayMs: 0 }
      );
      try {
        const { isError, body } = await callTool(flaky.client, 'study_details', { accessions: ['PRJEB1', 'PRJEB2'] });
        expect(isError).toBe(false);
        expect(body).toEqual({
          success: true,
          count: 2,
          results: {
            PRJEB1: { success: true, accession: 'PRJEB1', found: false, message: 'Study not found' },
            PRJEB2: { success: true, accession: 'PRJEB2', found: false, message: 'Study not found' },
          },
        });
        expect(flaky.requests).toHaveLength(3);
        expect(log).toHaveBeenCalledWith('[mcp] attempt 1 failed (NETWORK_UNREACHABLE); retrying in 0ms');
      } finally {
        log.mockRestore();
        await flaky.client.close();
        await flaky.server.close();
      }
    });
  });

  describe('helpers', () => {
    it('textResult creates text content', () => {
      const result = textResult('hello');
      expect(result.content).toEqual([{ type: 'text', text: 'hello' }]);
    });

    it('jsonResult creates JSON text content', () => {
      const result = jsonResult({ foo: 1 });
      expect(result.content).toEqual([{ type: 'text', text: '{\n  "foo": 1\n}' }]);
    });

    it('errorResult creates error content', () => {
      const result = errorResult('bad');
      expect(result.content).toEqual([{ type: 'text', text: 'bad' }]);
      expect(result.isError).toBe(true);
    });

    it('outcomeResult marks error objects', () => {
      expect(outcomeResult({ success: true }).isError).toBeUndefined();
      expect(outcomeResult({ success: false }).isError).toBe(true);
    });
  });
});
