/**
 * Study (BioProject) metadata lookups against the ENA portal search endpoint.
 *
 * Accepts ENA (PRJEB…), NCBI (PRJNA…) and DDBJ (PRJDB…) project accessions
 * unchanged. An accession the portal does not know is a successful lookup
 * with `found: false`, not an error.
 */

import { z } from 'zod';
import type { ResolvedConfig } from '../config/types.js';
import type { HttpClient } from '../http/HttpClient.js';
import { httpError, networkError, parseJsonBody, unexpectedResponse } from '../http/HttpClient.js';
import { lenient } from '../http/lenient.js';
import type { Outcome } from '../types/results.js';
import { usageError } from '../types/results.js';
import type { BatchStudyResult, StudyLookup, StudyMetadataRecord, StudyOutcome } from './types.js';

export const STUDY_FIELDS = [
  'study_accession',
  'study_title',
  'study_description',
  'study_alias',
  'center_name',
  'first_public',
  'last_updated',
  'scientific_name',
  'tax_id',
] as const;

const Text = lenient(z.union([z.string(), z.number().transform(String)]));

const StudyRowSchema = z
  .object({
    study_accession: Text,
    study_title: Text,
    study_description: Text,
    study_alias: Text,
    center_name: Text,
    first_public: Text,
    last_updated: Text,
    scientific_name: Text,
    tax_id: Text,
  })
  .passthrough();

const StudyRowsSchema = z.array(z.unknown());

/** Study accessions carry a letter prefix; bare numbers are rejected. */
const DIGITS_ONLY = /^\d+$/;

function digitsOnlyError(accession: string) {
  return usageError(`'${accession}' is not a study accession`, 'Pass a project accession such as PRJEB1234 or PRJNA123456');
}

type StudyRow = z.infer<typeof StudyRowSchema>;

function toRecord(accession: string, row: StudyRow): StudyMetadataRecord {
  const pick = (value: string | undefined) => (value ? value : undefined);
  const record: StudyMetadataRecord = { accession: pick(row.study_accession) ?? accession };
  const entries: Array<[Exclude<keyof StudyMetadataRecord, 'accession'>, string | undefined]> = [
    ['title', row.study_title],
    ['description', row.study_description],
    ['alias', row.study_alias],
    ['organism', row.scientific_name],
    ['taxId', row.tax_id],
    ['centerName', row.center_name],
    ['firstPublic', row.first_public],
    ['lastUpdated', row.last_updated],
  ];
  for (const [key, value] of entries) {
    const present = pick(value);
    if (present !== undefined) {
      record[key] = present;
    }
  }
  return record;
}

export class StudyMetadataClient {
  constructor(
    private readonly http: HttpClient,
    private readonly config: ResolvedConfig['archive']
  ) {}

  private get searchUrl(): string {
    return `${this.config.baseUrl.replace(/\/+$/, '')}/search`;
  }

  async getDetails(accession: string): Promise<StudyOutcome> {
    const trimmed = accession.trim();
    if (trimmed.length === 0) {
      return usageError('study accession must not be empty', 'Pass a project accession such as PRJEB1234 or PRJNA123456');
    }
    if (DIGITS_ONLY.test(trimmed)) {
      return { ...digitsOnlyError(trimmed), accession: trimmed };
    }

    const outcome = await this.http.get(this.searchUrl, {
      result: 'study',
      query: `study_accession=${trimmed}`,
      fields: STUDY_FIELDS.join(','),
      format: 'json',
    });

    const notFound: StudyLookup = { accession: trimmed, found: false, message: 'Study not found' };

    switch (outcome.kind) {
      case 'transport-error':
        return { ...networkError(outcome.detail, this.searchUrl), accession: trimmed };
      case 'http-error':
        return { ...httpError(outcome.status, outcome.statusText, 'Try again or check the accession'), accession: trimmed };
      case 'no-content':
        return { success: true, ...notFound };
      case 'body':
        break;
    }

    if (outcome.body.trim().length === 0) {
      return { success: true, ...notFound };
    }
    const json = parseJsonBody(outcome.body);
    if (!json.ok) {
      return { ...unexpectedResponse(json.detail, this.searchUrl), accession: trimmed };
    }
    const rows = StudyRowsSchema.safeParse(json.value);
    if (!rows.success) {
      return { ...unexpectedResponse('expected a JSON array of studies', this.searchUrl), accession: trimmed };
    }

    if (rows.data.length === 0) {
      return { success: true, ...notFound };
    }
    const row = StudyRowSchema.safeParse(rows.data[0]);
    if (!row.success) {
      return { ...unexpectedResponse('expected each study to be a JSON object', this.searchUrl), accession: trimmed };
    }
    return { success: true, accession: trimmed, found: true, study: toRecord(trimmed, row.data) };
  }

  /**
   * Look up several accessions, one request each, in order. A failure for
   * one accession is recorded under that accession and the batch continues.
   *
   * `lookup` replaces the single-accession call, e.g. to retry each lookup.
   */
  async getMultipleDetails(
    accessions: readonly string[],
    lookup: (accession: string) => Promise<StudyOutcome> = (accession) => this.getDetails(accession)
  ): Promise<Outcome<BatchStudyResult>> {
    const distinct = [...new Set(accessions.map((a) => a.trim()).filter((a) => a.length > 0))];
    if (distinct.length === 0) {
      return usageError('at least one study accession is required', 'Pass one or more accessions such as PRJEB1234');
    }
    const bare = distinct.find((accession) => DIGITS_ONLY.test(accession));
    if (bare !== undefined) {
      return digitsOnlyError(bare);
    }

    const results: BatchStudyResult['results'] = {};
    for (const accession of distinct) {
      results[accession] = await lookup(accession);
    }
    return { success: true, count: distinct.length, results };
  }
}
