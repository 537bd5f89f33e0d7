import type { OutputFormat, Outcome } from '../types/results.js';
import { DIVIDER, RULE, formatErrorText, toJson, truncate } from '../format/text.js';
import type { BatchStudyResult, StudyMetadataRecord, StudyOutcome } from './types.js';

const BATCH_DESCRIPTION_LENGTH = 200;

function organismLine(study: StudyMetadataRecord): string {
  return `Organism: ${study.organism ?? 'N/A'} (Tax ID: ${study.taxId ?? 'N/A'})`;
}

function formatSingle(result: StudyOutcome): string {
  if (!result.success) {
    return formatErrorText(result);
  }
  if (!result.found) {
    return `Study: ${result.accession}\n${result.message}`;
  }

  const { study } = result;
  return [
    `Study: ${result.accession}`,
    RULE,
    `Title: ${study.title ?? 'N/A'}`,
    '',
    'Description:',
    study.description ?? 'N/A',
    '',
    organismLine(study),
    `Center: ${study.centerName ?? 'N/A'}`,
    `Alias: ${study.alias ?? 'N/A'}`,
    `First Public: ${study.firstPublic ?? 'N/A'}`,
    `Last Updated: ${study.lastUpdated ?? 'N/A'}`,
  ].join('\n');
}

function formatBatchEntry(accession: string, result: StudyOutcome): string[] {
  const lines = [`\nStudy: ${accession}`];
  if (!result.success) {
    lines.push(`Error: ${result.error}`, `Suggestion: ${result.suggestion}`);
  } else if (!result.found) {
    lines.push(result.message);
  } else {
    const { study } = result;
    lines.push(
      `Title: ${study.title ?? 'N/A'}`,
      `Description: ${study.description ? truncate(study.description, BATCH_DESCRIPTION_LENGTH) : 'N/A'}`,
      organismLine(study),
      `Center: ${study.centerName ?? 'N/A'}`,
      `First Public: ${study.firstPublic ?? 'N/A'}`,
      `Last Updated: ${study.lastUpdated ?? 'N/A'}`
    );
  }
  lines.push(DIVIDER);
  return lines;
}

export function formatStudyResult(result: StudyOutcome, format: OutputFormat): string {
  return format === 'json' ? toJson(result) : formatSingle(result);
}

export function formatBatchStudyResult(result: Outcome<BatchStudyResult>, format: OutputFormat): string {
  if (format === 'json') {
    return toJson(result);
  }
  if (!result.success) {
    return formatErrorText(result);
  }
  const lines = [`Retrieved details for ${result.count} stud${result.count === 1 ? 'y' : 'ies'}`, RULE];
  for (const [accession, entry] of Object.entries(result.results)) {
    lines.push(...formatBatchEntry(accession, entry));
  }
  return lines.join('\n');
}
