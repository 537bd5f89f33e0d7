/**
 * Taxonomy record types. Every field is transcribed from the NCBI response;
 * fields the response lacks are left out.
 */

export interface LineageEntry {
  taxId: number;
  name?: string;
  rank?: string;
}

export interface TaxonomyRecord {
  taxId: number;
  scientificName?: string;
  commonName?: string;
  /** Lower-cased, e.g. `species`. */
  rank?: string;
  parentTaxId?: number;
  /** Ancestors, root first, ending at the immediate parent. */
  lineage: LineageEntry[];
}
