import { describe, expect, it } from 'vitest';
import { splitPaths, toHttpsUrl, toHttpsUrls } from './urls.js';

describe('toHttpsUrl', () => {
  it('rewrites ftp:// to https:// and keeps the rest of the URL', () => {
    expect(toHttpsUrl('ftp://ftp.sra.example.org/vol1/fastq/ERR000/ERR000001/ERR000001_1.fastq.gz')).toBe(
      'https://ftp.sra.example.org/vol1/fastq/ERR000/ERR000001/ERR000001_1.fastq.gz'
    );
  });

  it('prefixes a bare host path', () => {
    expect(toHttpsUrl('ftp.sra.example.org/vol1/a.fastq.gz')).toBe('https://ftp.sra.example.org/vol1/a.fastq.gz');
  });

  it('leaves http(s) URLs alone, so applying it twice changes nothing', () => {
    const once = toHttpsUrl('ftp://files.example.org/a.fastq.gz');
    expect(toHttpsUrl(once)).toBe(once);
    expect(toHttpsUrl('http://files.example.org/b.fastq.gz')).toBe('http://files.example.org/b.fastq.gz');
  });
});

describe('toHttpsUrls', () => {
  it('splits a semicolon list of paired-end files', () => {
    expect(toHttpsUrls('files.example.org/r_1.fastq.gz;files.example.org/r_2.fastq.gz')).toEqual([
      'https://files.example.org/r_1.fastq.gz',
      'https://files.example.org/r_2.fastq.gz',
    ]);
  });

  it('drops empty entries and handles a missing value', () => {
    expect(splitPaths('a;; b ;')).toEqual(['a', 'b']);
    expect(toHttpsUrls('')).toEqual([]);
    expect(toHttpsUrls(undefined)).toEqual([]);
  });
});
