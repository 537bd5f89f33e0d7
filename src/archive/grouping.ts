import type { ArchiveRecord, DownloadLinks, StudyGroup } from './types.js';
import { toHttpsUrls } from './urls.js';

export const UNKNOWN_STUDY = 'Unknown';

function pushDistinct(values: string[], value: string | undefined): void {
  if (value && !values.includes(value)) {
    values.push(value);
  }
}

/**
 * Group run records by `study_accession`.
 *
 * Groups come out in order of each study's first appearance and records keep
 * their relative order, so concatenating every group's records yields a
 * permutation of the input with nothing dropped or duplicated.
 */
export function groupByStudy(records: readonly ArchiveRecord[]): StudyGroup[] {
  const groups = new Map<string, StudyGroup>();

  for (const record of records) {
    const key = record.study_accession || UNKNOWN_STUDY;
    let group = groups.get(key);
    if (!group) {
      group = {
        studyAccession: key,
        recordCount: 0,
        libraryStrategies: [],
        instrumentPlatforms: [],
        records: [],
      };
      groups.set(key, group);
    }

    group.records.push(record);
    group.recordCount += 1;
    if (!group.studyTitle && record.study_title) {
      group.studyTitle = record.study_title;
    }
    pushDistinct(group.libraryStrategies, record.library_strategy);
    pushDistinct(group.instrumentPlatforms, record.instrument_platform);
  }

  return [...groups.values()];
}

/**
 * Derive HTTPS download links for every record that lists fastq_ftp paths.
 */
export function collectDownloadLinks(records: readonly ArchiveRecord[]): DownloadLinks[] {
  const links: DownloadLinks[] = [];
  records.forEach((record, index) => {
    const fastqUrls = toHttpsUrls(record.fastq_ftp);
    if (fastqUrls.length === 0) return;
    links.push({
      index,
      ...(record.run_accession ? { runAccession: record.run_accession } : {}),
      fastqUrls,
    });
  });
  return links;
}
