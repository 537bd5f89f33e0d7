/**
 * NCBI Datasets v2 taxonomy client.
 *
 * Endpoints:
 *   {baseUrl}/taxonomy/taxon_suggest/{name}  → { sci_name_and_ids: [{ tax_id, sci_name, ... }] }
 *   {baseUrl}/taxonomy/taxon/{id}            → { taxonomy_nodes: [{ taxonomy: { ... } }] }
 *
 * Name resolution takes the first suggestion as the most relevant one, in the
 * order the service ranks them. No re-ranking happens here.
 */

import { z } from 'zod';
import type { ResolvedConfig } from '../config/types.js';
import type { HttpClient, HttpOutcome } from '../http/HttpClient.js';
import { httpError, networkError, parseJsonBody, unexpectedResponse } from '../http/HttpClient.js';
import { lenient, parseEach } from '../http/lenient.js';
import type { ErrorResult, Outcome } from '../types/results.js';
import { notFoundError, usageError } from '../types/results.js';
import type { LineageEntry, TaxonomyRecord } from './types.js';

/** Ranks of the `classification` block, root first. */
export const CLASSIFICATION_RANKS = [
  'domain',
  'superkingdom',
  'kingdom',
  'phylum',
  'class',
  'order',
  'family',
  'genus',
  'species',
] as const;

const TaxId = z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]);

const SuggestionSchema = z
  .object({
    tax_id: lenient(TaxId),
    sci_name: lenient(z.string()),
  })
  .passthrough();

const SuggestResponseSchema = z.object({
  sci_name_and_ids: lenient(z.array(z.unknown())),
});

const ClassificationEntrySchema = z
  .object({
    name: lenient(z.string()),
    id: lenient(TaxId),
  })
  .passthrough();

const TaxonomySchema = z
  .object({
    tax_id: lenient(TaxId),
    organism_name: lenient(z.string()),
    common_names: lenient(z.array(z.string())),
    genbank_common_name: lenient(z.string()),
    rank: lenient(z.string()),
    parent_tax_id: lenient(TaxId),
    lineage: lenient(z.array(TaxId)),
    classification: lenient(z.record(z.string(), z.unknown())),
  })
  .passthrough();

const TaxonResponseSchema = z.object({
  taxonomy_nodes: lenient(z.array(z.unknown())),
});

const TaxonomyNodeSchema = z.object({ taxonomy: lenient(TaxonomySchema) }).passthrough();

type Taxonomy = z.infer<typeof TaxonomySchema>;

/**
 * Build the root → parent lineage from a taxonomy node.
 *
 * Ids come from `lineage`; names and ranks are attached from `classification`
 * where it mentions the same id. Without a lineage id list the classification
 * alone is used, in rank order, minus the node itself.
 */
export function extractLineage(taxonomy: Taxonomy): LineageEntry[] {
  const classified = new Map<number, { name?: string; rank: string }>();
  for (const rank of CLASSIFICATION_RANKS) {
    const parsed = ClassificationEntrySchema.safeParse(taxonomy.classification?.[rank]);
    const entry = parsed.success ? parsed.data : undefined;
    if (entry?.id !== undefined) {
      classified.set(entry.id, { ...(entry.name ? { name: entry.name } : {}), rank });
    }
  }

  if (taxonomy.lineage && taxonomy.lineage.length > 0) {
    return taxonomy.lineage
      .filter((taxId) => taxId !== taxonomy.tax_id)
      .map((taxId) => ({ taxId, ...classified.get(taxId) }));
  }

  return [...classified.entries()]
    .filter(([taxId]) => taxId !== taxonomy.tax_id)
    .map(([taxId, info]) => ({ taxId, ...info }));
}

export class TaxonomyClient {
  constructor(
    private readonly http: HttpClient,
    private readonly config: ResolvedConfig['taxonomy']
  ) {}

  private get root(): string {
    return this.config.baseUrl.replace(/\/+$/, '');
  }

  /**
   * Resolve a free-text organism name to a full taxonomy record.
   */
  async searchByName(name: string): Promise<Outcome<TaxonomyRecord>> {
    if (name.trim().length === 0) {
      return usageError('organism name must not be empty', 'Pass a scientific or common name, or use --tax-id');
    }

    const url = `${this.root}/taxonomy/taxon_suggest/${encodeURIComponent(name)}`;
    const decoded = decodeJson(await this.http.get(url), url);
    if (!decoded.ok) return decoded.error;

    const parsed = SuggestResponseSchema.safeParse(decoded.value);
    if (!parsed.success) {
      return unexpectedResponse('malformed taxon suggestion payload', url);
    }

    // First suggestion = most relevant, per the service's own ranking
    const [top] = parseEach(SuggestionSchema, parsed.data.sci_name_and_ids?.slice(0, 1) ?? []);
    if (top?.tax_id === undefined) {
      return notFoundError(`No taxonomy match found for '${name}'`, 'Check the spelling or try the full scientific name');
    }
    return this.getByTaxId(top.tax_id);
  }

  /**
   * Fetch one taxonomy record by numeric identifier.
   */
  async getByTaxId(taxId: number): Promise<Outcome<TaxonomyRecord>> {
    if (!Number.isInteger(taxId) || taxId <= 0) {
      return usageError(`invalid taxonomy id '${taxId}'`, 'Taxonomy ids are positive integers, e.g. 9606');
    }

    const url = `${this.root}/taxonomy/taxon/${taxId}`;
    const decoded = decodeJson(await this.http.get(url), url);
    if (!decoded.ok) return decoded.error;

    const parsed = TaxonResponseSchema.safeParse(decoded.value);
    if (!parsed.success) {
      return unexpectedResponse('malformed taxonomy node payload', url);
    }

    const [node] = parseEach(TaxonomyNodeSchema, parsed.data.taxonomy_nodes?.slice(0, 1) ?? []);
    const taxonomy = node?.taxonomy;
    if (taxonomy?.tax_id === undefined) {
      return notFoundError(`No taxonomy record found for id ${taxId}`, 'Check that the taxonomy id exists in NCBI Taxonomy');
    }

    const commonName = taxonomy.common_names?.[0] ?? taxonomy.genbank_common_name;
    const record: TaxonomyRecord = {
      taxId: taxonomy.tax_id,
      ...(taxonomy.organism_name ? { scientificName: taxonomy.organism_name } : {}),
      ...(commonName ? { commonName } : {}),
      ...(taxonomy.rank ? { rank: taxonomy.rank.toLowerCase() } : {}),
      ...(taxonomy.parent_tax_id !== undefined ? { parentTaxId: taxonomy.parent_tax_id } : {}),
      lineage: extractLineage(taxonomy),
    };
    return { success: true, ...record };
  }
}

function decodeJson(
  outcome: HttpOutcome,
  url: string
): { ok: true; value: unknown } | { ok: false; error: ErrorResult } {
  switch (outcome.kind) {
    case 'transport-error':
      return { ok: false, error: networkError(outcome.detail, url) };
    case 'http-error':
      if (outcome.status === 404) {
        return { ok: false, error: notFoundError('Taxonomy record not found', 'Check the organism name or taxonomy id') };
      }
      return { ok: false, error: httpError(outcome.status, outcome.statusText, 'Try again later or check the query') };
    case 'no-content':
      return { ok: true, value: {} };
    case 'body': {
      const json = parseJsonBody(outcome.body);
      return json.ok ? json : { ok: false, error: unexpectedResponse(json.detail, url) };
    }
  }
}
