/**
 * Wires the four clients to one HttpClient and one resolved config.
 *
 * Both outer surfaces (the CLI and the MCP server) build their clients here,
 * which is also where tests inject a fake fetch and stub endpoints.
 */

import type { ResolvedConfig } from './config/types.js';
import { HttpClient, type FetchLike } from './http/HttpClient.js';
import { TaxonomyClient } from './taxonomy/TaxonomyClient.js';
import { ArchiveSearchClient } from './archive/ArchiveSearchClient.js';
import { StudyMetadataClient } from './study/StudyMetadataClient.js';
import { WorkflowCatalogClient } from './workflows/WorkflowCatalogClient.js';

export interface Toolkit {
  config: ResolvedConfig;
  taxonomy: TaxonomyClient;
  archive: ArchiveSearchClient;
  studies: StudyMetadataClient;
  workflows: WorkflowCatalogClient;
}

export interface ToolkitOptions {
  fetchFn?: FetchLike;
}

export function createToolkit(config: ResolvedConfig, options: ToolkitOptions = {}): Toolkit {
  const http = new HttpClient({
    timeoutMs: config.http.timeoutMs,
    userAgent: config.http.userAgent,
    debug: config.logLevel === 'debug',
    ...(options.fetchFn ? { fetchFn: options.fetchFn } : {}),
  });

  return {
    config,
    taxonomy: new TaxonomyClient(http, config.taxonomy),
    archive: new ArchiveSearchClient(http, config.archive),
    studies: new StudyMetadataClient(http, config.archive),
    workflows: new WorkflowCatalogClient(http, config.workflows),
  };
}
