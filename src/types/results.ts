/**
 * Result envelopes shared by every client.
 *
 * Client operations never throw past their boundary: they resolve to either
 * a success payload or an ErrorResult that callers branch on.
 */

export type ErrorKind = 'usage' | 'network' | 'http' | 'not-found' | 'unexpected';

export interface ErrorResult {
  success: false;
  errorKind: ErrorKind;
  error: string;
  suggestion: string;
  /** HTTP status, when the remote service answered. */
  status?: number;
}

export type Success<T extends object> = { success: true } & T;

export type Outcome<T extends object> = Success<T> | ErrorResult;

export function isErrorResult(value: { success: boolean }): value is ErrorResult {
  return value.success === false;
}

export function usageError(message: string, suggestion: string): ErrorResult {
  return { success: false, errorKind: 'usage', error: `Usage error: ${message}`, suggestion };
}

export function notFoundError(message: string, suggestion: string): ErrorResult {
  return { success: false, errorKind: 'not-found', error: message, suggestion };
}

/** Output shapes understood by every formatter. */
export type OutputFormat = 'human' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json'];
