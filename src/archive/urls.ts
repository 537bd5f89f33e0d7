/**
 * FTP → HTTPS rewriting for archive file paths. Purely textual; nothing here
 * checks that a derived URL resolves.
 */

/**
 * Rewrite one path. `ftp://host/path` and bare `host/path` become
 * `https://host/path`; http(s) URLs are returned unchanged.
 */
export function toHttpsUrl(path: string): string {
  if (/^https?:\/\//i.test(path)) {
    return path;
  }
  if (/^ftp:\/\//i.test(path)) {
    return `https://${path.slice('ftp://'.length)}`;
  }
  return `https://${path}`;
}

/** Split a semicolon-separated path list, dropping empty entries. */
export function splitPaths(value: string): string[] {
  return value
    .split(';')
    .map((path) => path.trim())
    .filter((path) => path.length > 0);
}

export function toHttpsUrls(value: string | undefined): string[] {
  if (!value) return [];
  return splitPaths(value).map(toHttpsUrl);
}
