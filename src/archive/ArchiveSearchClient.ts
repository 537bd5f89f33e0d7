/**
 * Client for the ENA portal search endpoint.
 *
 * Endpoint: {baseUrl}/search?result=…&query=…&fields=…&limit=…&offset=…&format=json
 * A 204 (or an empty 200 body) means zero matches and is reported as an
 * empty success, never as an error.
 */

import { z } from 'zod';
import type { ResolvedConfig, ResultType } from '../config/types.js';
import type { HttpClient } from '../http/HttpClient.js';
import { httpError, networkError, parseJsonBody, unexpectedResponse } from '../http/HttpClient.js';
import type { Outcome } from '../types/results.js';
import { usageError } from '../types/results.js';
import { collectDownloadLinks, groupByStudy } from './grouping.js';
import { describeResultTypes, formatQuery, isPageBound, parseResultType } from './query.js';
import { toHttpsUrls } from './urls.js';
import type { ArchiveRecord, ArchiveSearchResult, FastqUrlsResult, SearchOptions } from './types.js';

const DEFAULT_LIMIT = 10;

const PortalRowsSchema = z.array(z.record(z.string(), z.unknown()));

/**
 * Flatten one portal row to string values. Scalars are stringified; null and
 * structured values are dropped.
 */
export function normalizeRecord(row: Record<string, unknown>): ArchiveRecord {
  const record: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    if (typeof value === 'string') {
      record[key] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      record[key] = String(value);
    }
  }
  return record;
}

export class ArchiveSearchClient {
  constructor(
    private readonly http: HttpClient,
    private readonly config: ResolvedConfig['archive']
  ) {}

  get searchUrl(): string {
    return `${this.config.baseUrl.replace(/\/+$/, '')}/search`;
  }

  defaultFieldsFor(resultType: ResultType): string[] {
    return [...this.config.defaultFields[resultType]];
  }

  async search(query: string, options: SearchOptions = {}): Promise<Outcome<ArchiveSearchResult>> {
    const resultTypeInput = options.resultType ?? 'read_run';
    const resultType = parseResultType(resultTypeInput);
    if (!resultType) {
      return usageError(`unknown result type '${resultTypeInput}'`, `Use one of: ${describeResultTypes()}`);
    }
    if (query.trim().length === 0) {
      return usageError('query must not be empty', 'Pass an organism name or a portal query expression');
    }

    const limit = options.limit ?? DEFAULT_LIMIT;
    const offset = options.offset ?? 0;
    if (!isPageBound(limit) || !isPageBound(offset)) {
      return usageError('limit and offset must be non-negative integers', 'Pass whole numbers such as --limit 10 --offset 0');
    }

    const fields = options.fields && options.fields.length > 0 ? [...options.fields] : this.defaultFieldsFor(resultType);
    const filter = formatQuery(query);

    const outcome = await this.http.query(this.searchUrl, {
      result: resultType,
      query: filter,
      fields: fields.join(','),
      limit,
      offset,
      format: 'json',
    });

    const base = { query, filter, resultType, fields, limit, offset };

    switch (outcome.kind) {
      case 'transport-error':
        return networkError(outcome.detail, this.searchUrl);
      case 'http-error':
        return httpError(outcome.status, outcome.statusText, 'Try a different search term or check the query syntax');
      case 'no-content':
        return { success: true, ...base, count: 0, records: [], message: 'No results found' };
      case 'body':
        break;
    }

    if (outcome.body.trim().length === 0) {
      return { success: true, ...base, count: 0, records: [], message: 'No results found' };
    }

    const json = parseJsonBody(outcome.body);
    if (!json.ok) {
      return unexpectedResponse(json.detail, this.searchUrl);
    }
    const rows = PortalRowsSchema.safeParse(json.value);
    if (!rows.success) {
      return unexpectedResponse('expected a JSON array of records', this.searchUrl);
    }

    const records = rows.data.map(normalizeRecord);
    const result: ArchiveSearchResult = { ...base, count: records.length, records };

    if (resultType === 'read_run' && records.length > 0) {
      const studyGroups = groupByStudy(records);
      result.studyGroups = studyGroups;
      result.totalStudies = studyGroups.length;
    }
    if (options.includeUrls) {
      result.downloadLinks = collectDownloadLinks(records);
    }
    if (records.length === 0) {
      result.message = 'No results found';
    }

    return { success: true, ...result };
  }

  /**
   * HTTPS download URLs for one run's FASTQ files. A run with no fastq_ftp
   * value, or no matching run, yields an empty list.
   */
  async getFastqUrls(runAccession: string): Promise<Outcome<FastqUrlsResult>> {
    const accession = runAccession.trim();
    if (accession.length === 0) {
      return usageError('run accession must not be empty', 'Pass a run accession such as ERR000001');
    }

    const result = await this.search(`run_accession=${accession}`, {
      resultType: 'read_run',
      limit: 1,
      fields: ['run_accession', 'fastq_ftp'],
    });
    if (!result.success) {
      return result;
    }

    const record = result.records[0];
    return {
      success: true,
      runAccession: record?.run_accession ?? accession,
      fastqUrls: toHttpsUrls(record?.fastq_ftp),
    };
  }
}
