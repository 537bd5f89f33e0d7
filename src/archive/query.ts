/**
 * Query construction for the ENA portal search endpoint.
 */

import type { ResultType } from '../config/types.js';
import { RESULT_TYPES } from '../config/types.js';

/**
 * Shorthand names accepted wherever a result type is.
 */
export const RESULT_TYPE_ALIASES: Readonly<Record<string, ResultType>> = {
  read: 'read_run',
  fastq: 'read_run',
  run: 'read_run',
  wgs: 'wgs_set',
};

/** Tokens that mark a query as already written in portal syntax. */
const PORTAL_SYNTAX_MARKERS = ['tax_eq', 'tax_tree', 'study_accession', 'sample_accession', 'run_accession', '='];

/**
 * Resolve a result type or alias. Returns undefined for anything else.
 */
export function parseResultType(value: string): ResultType | undefined {
  const normalized = value.trim().toLowerCase();
  const alias = RESULT_TYPE_ALIASES[normalized];
  if (alias) return alias;
  return RESULT_TYPES.find((type) => type === normalized);
}

export function describeResultTypes(): string {
  return [...RESULT_TYPES, ...Object.keys(RESULT_TYPE_ALIASES)].join(', ');
}

/**
 * Turn a caller query into a portal filter expression.
 *
 * Portal expressions pass through untouched, a bare number is a taxonomy
 * subtree, and anything else is a scientific name. Backslashes and double
 * quotes inside a name are backslash-escaped.
 */
export function formatQuery(query: string): string {
  if (PORTAL_SYNTAX_MARKERS.some((marker) => query.includes(marker))) {
    return query;
  }
  const trimmed = query.trim();
  if (/^\d+$/.test(trimmed)) {
    return `tax_tree(${trimmed})`;
  }
  return `scientific_name="${query.replace(/["\\]/g, '\\$&')}"`;
}

export function isPageBound(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}
