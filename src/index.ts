/**
 * bioscout: public sequencing data and workflow discovery.
 *
 * This is the main entry point for the library.
 */

// Result envelopes
export * from './types/index.js';

// Configuration
export * from './config/types.js';
export { loadConfig, resolveConfig, validateConfig, ConfigValidationError, DEFAULT_CONFIG_PATH } from './config/loader.js';
export type { LoadConfigOptions, PartialConfig } from './config/loader.js';

// HTTP plumbing
export { HttpClient, MAX_GET_URL_LENGTH } from './http/HttpClient.js';
export type { FetchLike, FetchLikeInit, FetchLikeResponse, HttpClientOptions, HttpOutcome } from './http/HttpClient.js';

// Clients
export { TaxonomyClient } from './taxonomy/TaxonomyClient.js';
export * from './taxonomy/types.js';
export { ArchiveSearchClient } from './archive/ArchiveSearchClient.js';
export { formatQuery, parseResultType } from './archive/query.js';
export { toHttpsUrl, toHttpsUrls } from './archive/urls.js';
export { groupByStudy } from './archive/grouping.js';
export * from './archive/types.js';
export { StudyMetadataClient } from './study/StudyMetadataClient.js';
export * from './study/types.js';
export { WorkflowCatalogClient } from './workflows/WorkflowCatalogClient.js';
export * from './workflows/types.js';
export { createToolkit } from './toolkit.js';
export type { Toolkit, ToolkitOptions } from './toolkit.js';

// Retry
export { withRetry, classifyFailure, backoffDelay } from './retry/RetryPolicy.js';
export type { RetryOptions, RetryPolicyResult, FailureClass } from './retry/RetryPolicy.js';

// MCP server
export { createMcpServer } from './mcp/index.js';
