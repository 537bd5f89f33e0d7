/**
 * Human and JSON renderings of archive search results. Both work from the
 * same normalized result; nothing here issues a request.
 */

import type { OutputFormat, Outcome } from '../types/results.js';
import { DIVIDER, RULE, displayKey, formatErrorText, toJson, truncate } from '../format/text.js';
import { toHttpsUrls } from './urls.js';
import type { ArchiveRecord, ArchiveSearchResult, FastqUrlsResult, StudyGroup } from './types.js';

export interface SearchFormatOptions {
  format: OutputFormat;
  /** Expand *_ftp fields into HTTPS URL lists. */
  showUrls?: boolean;
}

const SAMPLE_RUNS_SHOWN = 3;

function isFtpField(key: string): boolean {
  return key.toLowerCase().endsWith('_ftp');
}

function formatRecordLines(record: ArchiveRecord, showUrls: boolean): string[] {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(record)) {
    if (!value) continue;
    const label = displayKey(key);
    if (showUrls && isFtpField(key)) {
      const urls = toHttpsUrls(value);
      if (urls.length === 1) {
        lines.push(`  ${label}: ${urls[0]}`);
      } else {
        lines.push(`  ${label}:`);
        for (const url of urls) {
          lines.push(`    - ${url}`);
        }
      }
      continue;
    }
    lines.push(`  ${label}: ${truncate(value)}`);
  }
  return lines;
}

function formatGroupLines(group: StudyGroup, position: number, showUrls: boolean): string[] {
  const lines = [
    `\nStudy ${position}:`,
    `  Accession: ${group.studyAccession}`,
    `  Runs: ${group.recordCount}`,
  ];
  if (group.studyTitle) {
    lines.push(`  Title: ${truncate(group.studyTitle)}`);
  }
  if (group.libraryStrategies.length > 0) {
    lines.push(`  Library Strategies: ${group.libraryStrategies.join(', ')}`);
  }
  if (group.instrumentPlatforms.length > 0) {
    lines.push(`  Platforms: ${group.instrumentPlatforms.join(', ')}`);
  }

  lines.push('  Sample Runs:');
  group.records.slice(0, SAMPLE_RUNS_SHOWN).forEach((run, i) => {
    lines.push(`    ${i + 1}. ${run.run_accession ?? 'N/A'} - ${run.library_layout ?? 'N/A'}`);
    if (showUrls) {
      for (const url of toHttpsUrls(run.fastq_ftp)) {
        lines.push(`       ${url}`);
      }
    }
  });
  const hidden = group.records.length - SAMPLE_RUNS_SHOWN;
  if (hidden > 0) {
    lines.push(`    ... and ${hidden} more`);
  }
  lines.push(DIVIDER);
  return lines;
}

function formatSearchHuman(result: ArchiveSearchResult, showUrls: boolean): string {
  const lines = [
    `Query: ${result.query}`,
    `Result Type: ${result.resultType}`,
    `Results Found: ${result.count}`,
  ];
  if (result.studyGroups) {
    lines.push(`Total Studies: ${result.totalStudies ?? result.studyGroups.length}`);
  }
  if (result.message) {
    lines.push(`\n${result.message}`);
  }

  if (result.studyGroups && result.studyGroups.length > 0) {
    lines.push(`\n${RULE}`, 'RESULTS GROUPED BY STUDY', RULE);
    result.studyGroups.forEach((group, i) => {
      lines.push(...formatGroupLines(group, i + 1, showUrls));
    });
    return lines.join('\n');
  }

  if (result.records.length > 0) {
    lines.push(`\n${RULE}`);
    result.records.forEach((record, i) => {
      lines.push(`\nResult ${i + 1}:`, ...formatRecordLines(record, showUrls), DIVIDER);
    });
  }
  return lines.join('\n');
}

export function formatSearchResult(result: Outcome<ArchiveSearchResult>, options: SearchFormatOptions): string {
  if (options.format === 'json') {
    return toJson(result);
  }
  if (!result.success) {
    return formatErrorText(result);
  }
  return formatSearchHuman(result, options.showUrls ?? false);
}

export function formatFastqUrls(result: Outcome<FastqUrlsResult>, format: OutputFormat): string {
  if (format === 'json') {
    return toJson(result);
  }
  if (!result.success) {
    return formatErrorText(result);
  }
  if (result.fastqUrls.length === 0) {
    return `Run: ${result.runAccession}\nNo FASTQ files found`;
  }
  return [`Run: ${result.runAccession}`, 'FASTQ URLs:', ...result.fastqUrls.map((url) => `  - ${url}`)].join('\n');
}
