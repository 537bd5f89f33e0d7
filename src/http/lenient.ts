/**
 * Schema helpers for remote payloads.
 *
 * Optional fields read as absent when a service sends null or a value of the
 * wrong type, so one odd field never costs the whole response.
 */

import { z } from 'zod';

export function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(undefined);
}

/**
 * Parse each element on its own; elements that do not match are skipped.
 */
export function parseEach<T extends z.ZodTypeAny>(schema: T, values: readonly unknown[]): Array<z.infer<T>> {
  const parsed: Array<z.infer<T>> = [];
  for (const value of values) {
    const result = schema.safeParse(value);
    if (result.success) {
      parsed.push(result.data);
    }
  }
  return parsed;
}
