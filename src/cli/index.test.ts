import { describe, expect, it, vi } from 'vitest';
import { MAIN_USAGE, runCli, type CommandDeps } from './index.js';
import { SEARCH_USAGE } from './searchCommand.js';
import { ConfigValidationError } from '../config/loader.js';
import type { Toolkit } from '../toolkit.js';
import {
  dnsFailure,
  jsonResponse,
  noContent,
  testToolkit,
  textResponse,
  type FakeHandler,
  type RecordedRequest,
} from '../testing/fakeFetch.js';

function harness(handler: FakeHandler, retry: { maxAttempts?: number } = {}) {
  const { toolkit, requests } = testToolkit(handler, retry);
  const stdout: string[] = [];
  const stderr: string[] = [];
  const loadToolkit = vi.fn(async (_configPath?: string): Promise<Toolkit> => toolkit);
  const deps: CommandDeps = {
    io: { stdout: (text) => stdout.push(text), stderr: (text) => stderr.push(text) },
    loadToolkit,
    sleep: async () => undefined,
  };
  return { deps, stdout, stderr, requests, loadToolkit };
}

const unreachable: FakeHandler = (request) => {
  throw dnsFailure(new URL(request.url).host);
};

function taxonomyService(request: RecordedRequest) {
  if (request.url.includes('/taxon_suggest/Homo%20sapiens')) {
    return jsonResponse({ sci_name_and_ids: [{ sci_name: 'Homo sapiens', tax_id: '9606' }] });
  }
  if (request.url.endsWith('/taxonomy/taxon/9606')) {
    return jsonResponse({ taxonomy_nodes: [{ taxonomy: { tax_id: 9606, organism_name: 'Homo sapiens', rank: 'SPECIES' } }] });
  }
  return jsonResponse({ sci_name_and_ids: [] });
}

const MANIFEST = [
  {
    workflows: [
      { trsID: '#workflow/a', iwcID: 'a-main', collections: ['Virology'], tests: [], definition: { name: 'A' } },
      { trsID: '#workflow/b', iwcID: 'b-main', collections: ['Assembly'], definition: { name: 'B' } },
    ],
  },
];

describe('runCli', () => {
  it('prints the command list and fails without a command', async () => {
    const { deps, stdout } = harness(unreachable);
    expect(await runCli([], deps)).toBe(1);
    expect(stdout).toEqual([MAIN_USAGE]);
  });

  it('rejects an unknown command', async () => {
    const { deps, stderr } = harness(unreachable);
    expect(await runCli(['download'], deps)).toBe(1);
    expect(stderr[0]).toBe("Unknown command 'download'");
  });

  it('prints subcommand help and succeeds', async () => {
    const { deps, stdout, loadToolkit } = harness(unreachable);
    expect(await runCli(['search', '--help'], deps)).toBe(0);
    expect(stdout).toEqual([SEARCH_USAGE]);
    expect(loadToolkit).not.toHaveBeenCalled();
  });

  it('reports unknown options as usage errors', async () => {
    const { deps, stderr, requests } = harness(unreachable);
    expect(await runCli(['search', 'yeast', '--bogus'], deps)).toBe(1);
    expect(stderr[0]?.startsWith('Usage error: ')).toBe(true);
    expect(stderr[1]).toBe("Run 'bioscout search --help' for usage.");
    expect(requests).toHaveLength(0);
  });

  it('reports configuration errors', async () => {
    const { deps, stderr } = harness(unreachable);
    deps.loadToolkit = async () => {
      throw new ConfigValidationError('timeoutMs must be a positive number', 'http.timeoutMs', 0);
    };
    expect(await runCli(['workflows'], deps)).toBe(1);
    expect(stderr).toEqual(["Config validation error at 'http.timeoutMs': timeoutMs must be a positive number"]);
  });

  it('passes --config to the toolkit loader', async () => {
    const { deps, loadToolkit } = harness(() => jsonResponse(MANIFEST));
    await runCli(['workflows', '--config', 'custom.yaml'], deps);
    expect(loadToolkit).toHaveBeenCalledWith('custom.yaml');
  });
});

describe('taxonomy command', () => {
  it('prints the resolved record', async () => {
    const { deps, stdout } = harness(taxonomyService);
    expect(await runCli(['taxonomy', 'Homo', 'sapiens'], deps)).toBe(0);
    expect(stdout).toEqual(['Taxonomy ID: 9606\nScientific Name: Homo sapiens\nRank: species']);
  });

  it('looks up --tax-id directly', async () => {
    const { deps, requests } = harness(taxonomyService);
    expect(await runCli(['taxonomy', '--tax-id', '9606', '--format', 'json'], deps)).toBe(0);
    expect(requests).toHaveLength(1);
  });

  it('exits 1 when nothing matches', async () => {
    const { deps, stdout } = harness(taxonomyService);
    expect(await runCli(['taxonomy', 'Imaginarius'], deps)).toBe(1);
    expect(stdout).toEqual(["Error: No taxonomy match found for 'Imaginarius'\nCheck the spelling or try the full scientific name"]);
  });

  it('rejects a name together with --tax-id', async () => {
    const { deps, stderr, requests } = harness(taxonomyService);
    expect(await runCli(['taxonomy', 'Homo sapiens', '--tax-id', '9606'], deps)).toBe(1);
    expect(stderr[0]).toBe('Usage error: pass either an organism name or --tax-id, not both');
    expect(requests).toHaveLength(0);
  });

  it('exits 1 on a DNS failure', async () => {
    const { deps, stdout } = harness(unreachable);
    expect(await runCli(['taxonomy', 'Homo sapiens'], deps)).toBe(1);
    expect(stdout).toEqual([
      'Error: Network error: getaddrinfo ENOTFOUND taxonomy.test\nCheck network settings and ensure taxonomy.test is reachable',
    ]);
  });
});

describe('search command', () => {
  it('exits 0 for zero results', async () => {
    const { deps, stdout } = harness(() => noContent());
    expect(await runCli(['search', 'Imaginarius fictus'], deps)).toBe(0);
    expect(stdout).toEqual(['Query: Imaginarius fictus\nResult Type: read_run\nResults Found: 0\n\nNo results found']);
  });

  it('exits 1 on a DNS failure', async () => {
    const { deps, stdout } = harness(unreachable);
    expect(await runCli(['search', 'yeast', '--format', 'json'], deps)).toBe(1);
    expect(JSON.parse(stdout[0] ?? '')).toEqual({
      success: false,
      errorKind: 'network',
      error: 'Network error: getaddrinfo ENOTFOUND archive.test',
      suggestion: 'Check network settings and ensure archive.test is reachable',
    });
  });

  it('rejects an unknown data type before any request', async () => {
    const { deps, stderr, requests } = harness(unreachable);
    expect(await runCli(['search', 'yeast', '--data-type', 'genome'], deps)).toBe(1);
    expect(stderr[0]?.startsWith("Usage error: unknown data type 'genome'")).toBe(true);
    expect(requests).toHaveLength(0);
  });

  it('rejects a negative limit', async () => {
    const { deps, stderr } = harness(unreachable);
    expect(await runCli(['search', 'yeast', '--limit', '-3'], deps)).toBe(1);
    expect(stderr[0]?.startsWith('Usage error: ')).toBe(true);
  });

  it('sends the paging and field options', async () => {
    const { deps, requests } = harness(() => jsonResponse([]));
    await runCli(['search', 'Mus musculus', '--data-type', 'sample', '--limit', '3', '--offset', '6', '--fields', 'sample_accession, country'], deps);

    const params = new URL(requests[0]?.url ?? 'https://invalid.test').searchParams;
    expect([params.get('result'), params.get('limit'), params.get('offset'), params.get('fields')]).toEqual([
      'sample',
      '3',
      '6',
      'sample_accession,country',
    ]);
  });

  it('retries a transient failure when --retries allows it', async () => {
    let calls = 0;
    const { deps, stderr } = harness(() => {
      calls += 1;
      return calls === 1 ? textResponse('', 503, 'Service Unavailable') : jsonResponse([]);
    });

    expect(await runCli(['search', 'yeast', '--retries', '3'], deps)).toBe(0);
    expect(calls).toBe(2);
    expect(stderr).toEqual(['Attempt 1 failed (REMOTE_SERVER_ERROR); retrying in 1000ms']);
  });
});

describe('fastq command', () => {
  it('prints the URLs of a run', async () => {
    const { deps, stdout } = harness(() => jsonResponse([{ run_accession: 'ERR1', fastq_ftp: 'files.example.org/ERR1.fastq.gz' }]));
    expect(await runCli(['fastq', 'ERR1'], deps)).toBe(0);
    expect(stdout).toEqual(['Run: ERR1\nFASTQ URLs:\n  - https://files.example.org/ERR1.fastq.gz']);
  });

  it('requires exactly one accession', async () => {
    const { deps } = harness(unreachable);
    expect(await runCli(['fastq', 'ERR1', 'ERR2'], deps)).toBe(1);
  });
});

describe('study command', () => {
  it('exits 0 when the study does not exist', async () => {
    const { deps, stdout } = harness(() => jsonResponse([]));
    expect(await runCli(['study', 'PRJEB1234'], deps)).toBe(0);
    expect(stdout).toEqual(['Study: PRJEB1234\nStudy not found']);
  });

  it('exits 1 when any lookup in a batch fails', async () => {
    const { deps } = harness((request) => {
      if (request.url.includes('PRJEB0002')) throw dnsFailure('archive.test');
      return jsonResponse([]);
    });
    expect(await runCli(['study', 'PRJEB0001', 'PRJEB0002'], deps)).toBe(1);
  });

  it('retries each lookup of a batch under --retries', async () => {
    let failedOnce = false;
    const { deps, stdout, stderr, requests } = harness((request) => {
      if (request.url.includes('PRJEB0002') && !failedOnce) {
        failedOnce = true;
        throw dnsFailure('archive.test');
      }
      return jsonResponse([]);
    });

    expect(await runCli(['study', 'PRJEB0001', 'PRJEB0002', '--retries', '2', '--format', 'json'], deps)).toBe(0);
    expect(requests).toHaveLength(3);
    expect(stderr).toEqual(['Attempt 1 failed (NETWORK_UNREACHABLE); retrying in 1000ms']);
    expect(JSON.parse(stdout[0] ?? '')).toEqual({
      success: true,
      count: 2,
      results: {
        PRJEB0001: { success: true, accession: 'PRJEB0001', found: false, message: 'Study not found' },
        PRJEB0002: { success: true, accession: 'PRJEB0002', found: false, message: 'Study not found' },
      },
    });
  });

  it('rejects a bare number as an accession', async () => {
    const { deps, stderr, loadToolkit } = harness(unreachable);
    expect(await runCli(['study', 'PRJEB0001', '12345'], deps)).toBe(1);
    expect(stderr[0]).toBe("Usage error: '12345' is not a valid accession");
    expect(loadToolkit).not.toHaveBeenCalled();
  });

  it('exits 0 for a batch of not-found studies', async () => {
    const { deps, requests } = harness(() => jsonResponse([]));
    expect(await runCli(['study', 'PRJEB0001', 'PRJNA0002'], deps)).toBe(0);
    expect(requests).toHaveLength(2);
  });
});

describe('workflows command', () => {
  it('prints JSON by default', async () => {
    const { deps, stdout } = harness(() => jsonResponse(MANIFEST));
    expect(await runCli(['workflows'], deps)).toBe(0);
    const parsed: unknown = JSON.parse(stdout[0] ?? '');
    expect(parsed).toMatchObject({ success: true, count: 1, workflows: [{ name: 'A', iwcId: 'a-main' }] });
  });

  it('lists categories of tested workflows', async () => {
    const { deps, stdout } = harness(() => jsonResponse(MANIFEST));
    expect(await runCli(['workflows', '--list-categories', '--format', 'human'], deps)).toBe(0);
    expect(stdout[0]?.split('\n').slice(-1)).toEqual(['  - Virology']);
  });

  it('rejects --list-categories with --limit before loading the config', async () => {
    const { deps, stderr, loadToolkit } = harness(unreachable);
    expect(await runCli(['workflows', '--list-categories', '--limit', '3'], deps)).toBe(1);
    expect(stderr[0]).toBe('Usage error: --list-categories cannot be combined with --category or --limit');
    expect(loadToolkit).not.toHaveBeenCalled();
  });

  it('exits 1 when the manifest is unreachable', async () => {
    const { deps } = harness(unreachable);
    expect(await runCli(['workflows', '--category', 'Virology'], deps)).toBe(1);
  });
});
