/**
 * Shared fetch-and-decode primitive for every remote client.
 *
 * Each request resolves to a tagged HttpOutcome; transport failures
 * (DNS, refused connections, timeouts) become a `transport-error` outcome
 * instead of a rejected promise.
 */

import type { ErrorResult } from '../types/results.js';

export type FetchLikeResponse = {
  ok: boolean;
  status: number;
  statusText: string;
  text: () => Promise<string>;
};

export type FetchLikeInit = {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
};

export type FetchLike = (input: string, init?: FetchLikeInit) => Promise<FetchLikeResponse>;

export type HttpOutcome =
  | { kind: 'body'; status: number; body: string }
  | { kind: 'no-content'; status: number }
  | { kind: 'http-error'; status: number; statusText: string; body: string }
  | { kind: 'transport-error'; detail: string };

export type QueryParams = Record<string, string | number | undefined>;

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent: string;
  /** Log each outbound request to stderr. */
  debug?: boolean;
  fetchFn?: FetchLike;
}

/** Longest GET URL sent before switching to a form-encoded POST. */
export const MAX_GET_URL_LENGTH = 2_000;

const defaultFetch: FetchLike = (input, init) => fetch(input, init);

export class HttpClient {
  private readonly fetchFn: FetchLike;
  private readonly headers: Record<string, string>;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.headers = {
      'User-Agent': options.userAgent,
      Accept: 'application/json',
    };
  }

  /**
   * GET `url` with query parameters appended.
   */
  async get(url: string, params: QueryParams = {}): Promise<HttpOutcome> {
    const qs = encodeParams(params).toString();
    return this.send(qs ? `${url}?${qs}` : url, { method: 'GET', headers: this.headers });
  }

  /**
   * GET `url` with query parameters, or POST them form-encoded when the
   * resulting URL would be longer than MAX_GET_URL_LENGTH.
   */
  async query(url: string, params: QueryParams): Promise<HttpOutcome> {
    const body = encodeParams(params).toString();
    const getUrl = `${url}?${body}`;
    if (getUrl.length <= MAX_GET_URL_LENGTH) {
      return this.send(getUrl, { method: 'GET', headers: this.headers });
    }
    return this.send(url, {
      method: 'POST',
      headers: { ...this.headers, 'Content-Type': 'application/x-www-form-urlencoded' },
      body,
    });
  }

  private async send(url: string, init: FetchLikeInit): Promise<HttpOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    if (this.options.debug) {
      console.error(`[http] ${init.method ?? 'GET'} ${url}`);
    }

    try {
      const res = await this.fetchFn(url, { ...init, signal: controller.signal });
      if (res.status === 204) {
        return { kind: 'no-content', status: res.status };
      }
      const body = await res.text();
      if (!res.ok) {
        return { kind: 'http-error', status: res.status, statusText: res.statusText, body };
      }
      return { kind: 'body', status: res.status, body };
    } catch (err) {
      return { kind: 'transport-error', detail: describeTransportError(err, this.options.timeoutMs) };
    } finally {
      clearTimeout(timer);
    }
  }
}

function encodeParams(params: QueryParams): URLSearchParams {
  const qs = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      qs.set(key, String(value));
    }
  }
  return qs;
}

/**
 * Turn a rejected fetch into a one-line detail. Node's fetch rejects with
 * `TypeError('fetch failed')` and puts the socket error in `cause`.
 */
export function describeTransportError(err: unknown, timeoutMs: number): string {
  if (err instanceof Error && err.name === 'AbortError') {
    return `request timed out after ${timeoutMs}ms`;
  }
  if (err instanceof Error) {
    const cause: unknown = err.cause;
    if (cause instanceof Error && cause.message) {
      return cause.message;
    }
    return err.message;
  }
  return String(err);
}

export function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

/**
 * Error result for a request that never got an HTTP answer.
 */
export function networkError(detail: string, endpoint: string): ErrorResult {
  return {
    success: false,
    errorKind: 'network',
    error: `Network error: ${detail}`,
    suggestion: `Check network settings and ensure ${hostOf(endpoint)} is reachable`,
  };
}

/**
 * Error result for a non-success HTTP status.
 */
export function httpError(status: number, statusText: string, suggestion: string): ErrorResult {
  const reason = statusText ? `: ${statusText}` : '';
  return { success: false, errorKind: 'http', status, error: `HTTP error ${status}${reason}`, suggestion };
}

/**
 * Error result for a response whose body is not the expected shape.
 */
export function unexpectedResponse(detail: string, endpoint: string): ErrorResult {
  return {
    success: false,
    errorKind: 'unexpected',
    error: `Unexpected response from ${hostOf(endpoint)}: ${detail}`,
    suggestion: 'The remote service may have changed its response format; report this if it persists',
  };
}

/**
 * Parse a JSON body, reporting a syntax error as a value instead of throwing.
 */
export function parseJsonBody(body: string): { ok: true; value: unknown } | { ok: false; detail: string } {
  try {
    const value: unknown = JSON.parse(body);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, detail: `invalid JSON (${err instanceof Error ? err.message : String(err)})` };
  }
}
