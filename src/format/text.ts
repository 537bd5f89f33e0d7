/**
 * Helpers shared by the human-readable formatters.
 */

import type { ErrorResult } from '../types/results.js';

export const RULE = '='.repeat(60);
export const DIVIDER = '-'.repeat(60);

export const MAX_FIELD_LENGTH = 100;

/** Cut `value` to `max` characters, the last three being an ellipsis. */
export function truncate(value: string, max = MAX_FIELD_LENGTH): string {
  if (value.length <= max) return value;
  return `${value.slice(0, max - 3)}...`;
}

/** `study_accession` → `Study Accession` */
export function displayKey(key: string): string {
  return key
    .split('_')
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(' ');
}

export function formatErrorText(error: ErrorResult): string {
  return `Error: ${error.error}\n${error.suggestion}`;
}

export function toJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}
