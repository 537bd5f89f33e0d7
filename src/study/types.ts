import type { ErrorResult, Success } from '../types/results.js';

export interface StudyMetadataRecord {
  accession: string;
  title?: string;
  description?: string;
  alias?: string;
  organism?: string;
  taxId?: string;
  centerName?: string;
  firstPublic?: string;
  lastUpdated?: string;
}

export type StudyLookup =
  | { accession: string; found: true; study: StudyMetadataRecord }
  | { accession: string; found: false; message: string };

/** Error results carry the accession they were about. */
export type StudyError = ErrorResult & { accession?: string };

export type StudyOutcome = Success<StudyLookup> | StudyError;

export interface BatchStudyResult {
  count: number;
  /** Keyed by accession, in request order. */
  results: Record<string, StudyOutcome>;
}
