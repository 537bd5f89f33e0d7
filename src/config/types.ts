/**
 * Configuration types for bioscout.
 *
 * A loaded config is deep-frozen and handed to each client at construction,
 * so tests can point clients at stub endpoints without touching globals.
 */

/**
 * Archive (ENA portal) result types.
 */
export type ResultType =
  | 'read_run'
  | 'assembly'
  | 'wgs_set'
  | 'sequence'
  | 'study'
  | 'sample'
  | 'analysis';

export const RESULT_TYPES: readonly ResultType[] = [
  'read_run',
  'assembly',
  'wgs_set',
  'sequence',
  'study',
  'sample',
  'analysis',
];

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Root configuration.
 */
export interface BioscoutConfig {
  logLevel: LogLevel;
  http: HttpConfig;
  taxonomy: TaxonomyConfig;
  archive: ArchiveConfig;
  workflows: WorkflowCatalogConfig;
  retry: RetryConfig;
}

export interface HttpConfig {
  /** Applied uniformly to every outbound request. */
  timeoutMs: number;
  userAgent: string;
}

export interface TaxonomyConfig {
  /** NCBI Datasets v2 root, e.g. https://api.ncbi.nlm.nih.gov/datasets/v2 */
  baseUrl: string;
}

export interface ArchiveConfig {
  /** ENA portal API root, e.g. https://www.ebi.ac.uk/ena/portal/api */
  baseUrl: string;
  /** Field list requested when a search names none. */
  defaultFields: Record<ResultType, readonly string[]>;
}

export interface WorkflowCatalogConfig {
  manifestUrl: string;
}

/**
 * Call-site retry settings. The clients themselves never retry.
 */
export interface RetryConfig {
  /** Total attempts, including the first. 1 disables retrying. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type ResolvedConfig = DeepReadonly<BioscoutConfig>;

const FALLBACK_FIELDS = ['accession', 'scientific_name'];

export const DEFAULT_ARCHIVE_FIELDS: Record<ResultType, readonly string[]> = {
  read_run: [
    'run_accession',
    'study_accession',
    'sample_accession',
    'scientific_name',
    'instrument_platform',
    'library_layout',
    'fastq_ftp',
    'fastq_bytes',
    'library_strategy',
    'study_title',
  ],
  assembly: [
    'accession',
    'scientific_name',
    'assembly_level',
    'genome_representation',
    'assembly_name',
    'assembly_title',
  ],
  study: ['study_accession', 'study_title', 'study_alias', 'scientific_name', 'study_description'],
  sample: ['sample_accession', 'scientific_name', 'collection_date', 'country', 'host', 'isolation_source'],
  wgs_set: FALLBACK_FIELDS,
  sequence: FALLBACK_FIELDS,
  analysis: FALLBACK_FIELDS,
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: BioscoutConfig = {
  logLevel: 'info',
  http: {
    timeoutMs: 30_000,
    userAgent: 'bioscout/0.1',
  },
  taxonomy: {
    baseUrl: 'https://api.ncbi.nlm.nih.gov/datasets/v2',
  },
  archive: {
    baseUrl: 'https://www.ebi.ac.uk/ena/portal/api',
    defaultFields: DEFAULT_ARCHIVE_FIELDS,
  },
  workflows: {
    manifestUrl: 'https://iwc.galaxyproject.org/workflow_manifest.json',
  },
  retry: {
    maxAttempts: 1,
    baseDelayMs: 1_000,
    maxDelayMs: 8_000,
  },
};
