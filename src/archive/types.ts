/**
 * Types for the archive (ENA portal) search client.
 */

import type { ResultType } from '../config/types.js';

/** One search hit: field name → value, exactly as the portal returned it. */
export type ArchiveRecord = Readonly<Record<string, string>>;

/**
 * Records of a run-level search that share one study accession.
 */
export interface StudyGroup {
  studyAccession: string;
  studyTitle?: string;
  recordCount: number;
  /** Distinct library_strategy values, first-seen order. */
  libraryStrategies: string[];
  /** Distinct instrument_platform values, first-seen order. */
  instrumentPlatforms: string[];
  records: ArchiveRecord[];
}

/**
 * HTTPS download URLs derived from one record's `fastq_ftp`.
 */
export interface DownloadLinks {
  /** Position of the record in `records`. */
  index: number;
  runAccession?: string;
  fastqUrls: string[];
}

export interface SearchOptions {
  /** Result type or alias; defaults to read_run. */
  resultType?: string;
  limit?: number;
  offset?: number;
  /** Overrides the result type's default field list. */
  fields?: readonly string[];
  /** Derive HTTPS download URLs from fastq_ftp. */
  includeUrls?: boolean;
}

export interface ArchiveSearchResult {
  query: string;
  /** The filter expression actually sent. */
  filter: string;
  resultType: ResultType;
  fields: string[];
  limit: number;
  offset: number;
  count: number;
  records: ArchiveRecord[];
  studyGroups?: StudyGroup[];
  totalStudies?: number;
  downloadLinks?: DownloadLinks[];
  message?: string;
}

export interface FastqUrlsResult {
  runAccession: string;
  fastqUrls: string[];
}
