import type { OutputFormat, Outcome } from '../types/results.js';
import { formatErrorText, toJson } from '../format/text.js';
import type { TaxonomyRecord } from './types.js';

export function formatTaxonomyResult(
  result: Outcome<TaxonomyRecord>,
  format: OutputFormat,
  detailed = false
): string {
  if (format === 'json') {
    return toJson(result);
  }
  if (!result.success) {
    return formatErrorText(result);
  }

  const lines = [`Taxonomy ID: ${result.taxId}`, `Scientific Name: ${result.scientificName ?? 'N/A'}`];
  if (result.commonName) {
    lines.push(`Common Name: ${result.commonName}`);
  }
  lines.push(`Rank: ${result.rank ?? 'N/A'}`);

  if (detailed && result.lineage.length > 0) {
    lines.push('', 'Lineage:');
    for (const entry of result.lineage) {
      lines.push(`  ${entry.rank ?? 'no rank'}: ${entry.name ?? 'unnamed'} (${entry.taxId})`);
    }
  }
  return lines.join('\n');
}
