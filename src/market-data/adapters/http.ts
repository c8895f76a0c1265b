/**
 * Shared plumbing for HTTP-backed quote adapters.
 *
 * Each adapter turns one provider response into a normalized value. The
 * public `fetch` is the adapter boundary: any network error, bad status,
 * malformed payload or invalid reading is logged and reported as `null`.
 */

import { type Clock, epochSeconds, formatLocalTime } from '../../clock.js';
import { type Logger, errorFields } from '../../logger.js';
import { percentOf, round2 } from '../../decimal.js';
import { AdapterError } from '../errors.js';
import type { Quote } from '../models.js';
import type { SourceDescriptor } from '../sources.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** The subset of `fetch` the adapters rely on; injectable for tests. */
export type HttpFetch = (url: string, init: RequestInit) => Promise<Response>;

/** One provider integration producing values of type `T` for a key. */
export interface QuoteAdapter<T> {
  /** Matches `SourceDescriptor.type`. */
  readonly type: string;

  /** Fetch and parse one value, or `null` on any failure. Never throws. */
  fetch(source: SourceDescriptor, key: string): Promise<T | null>;
}

export interface AdapterDeps {
  readonly http: HttpFetch;
  readonly clock: Clock;
  readonly logger: Logger;
}

export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'application/json, text/plain, */*',
  'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
};

// ---------------------------------------------------------------------------
// HttpAdapter
// ---------------------------------------------------------------------------

export abstract class HttpAdapter<T> implements QuoteAdapter<T> {
  abstract readonly type: string;
  protected readonly deps: AdapterDeps;

  constructor(deps: AdapterDeps) {
    this.deps = deps;
  }

  async fetch(source: SourceDescriptor, key: string): Promise<T | null> {
    try {
      return await this.load(source, key);
    } catch (err: unknown) {
      this.deps.logger.warn({ source: source.name, key, ...errorFields(err) }, 'Adapter fetch failed');
      return null;
    }
  }

  /** Perform the request(s) and parse; throw on any problem. */
  protected abstract load(source: SourceDescriptor, key: string): Promise<T>;

  /**
   * GET a URL and decode the body as text.
   *
   * The charset comes from the Content-Type header when present, otherwise
   * `defaultCharset` (some providers still answer in GBK without saying so).
   */
  protected async getText(
    source: SourceDescriptor,
    url: string,
    options: { headers?: Record<string, string>; defaultCharset?: string; timeout?: number } = {},
  ): Promise<string> {
    let resp: Response;
    try {
      resp = await this.deps.http(url, {
        method: 'GET',
        headers: { ...BROWSER_HEADERS, ...options.headers },
        signal: AbortSignal.timeout(options.timeout ?? source.timeout),
      });
    } catch (err: unknown) {
      throw new AdapterError(source.name, 'request failed', { cause: err });
    }

    if (!resp.ok) {
      throw new AdapterError(source.name, `HTTP ${resp.status}`);
    }

    const bytes = await resp.arrayBuffer();
    const charset = charsetOf(resp.headers.get('content-type')) ?? options.defaultCharset ?? 'utf-8';
    return new TextDecoder(charset).decode(bytes);
  }

  protected async getJson(
    source: SourceDescriptor,
    url: string,
    options: { headers?: Record<string, string> } = {},
  ): Promise<unknown> {
    const text = await this.getText(source, url, options);
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err: unknown) {
      throw new AdapterError(source.name, 'response is not valid JSON', { cause: err });
    }
  }
}

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

export function charsetOf(contentType: string | null): string | null {
  if (contentType === null) {
    return null;
  }
  const match = /charset=([^;]+)/i.exec(contentType);
  return match === null ? null : match[1].trim().toLowerCase();
}

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Coerce a numeric-ish field; missing, blank or non-numeric values yield `fallback`. */
export function num(value: unknown, fallback: number = 0): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

/** The first double-quoted segment of a `var x="...";` style payload. */
export function quotedPayload(source: string, text: string): string {
  const match = /"([^"]+)"/.exec(text);
  if (match === null) {
    throw new AdapterError(source, 'no quoted payload in response');
  }
  return match[1];
}

/** The argument of a JSONP callback, parsed as JSON. */
export function jsonpPayload(source: string, text: string): unknown {
  const match = /\(([\s\S]*)\)/.exec(text);
  if (match === null || match[1].trim() === '') {
    throw new AdapterError(source, 'empty JSONP payload');
  }
  try {
    const parsed: unknown = JSON.parse(match[1]);
    return parsed;
  } catch (err: unknown) {
    throw new AdapterError(source, 'JSONP payload is not valid JSON', { cause: err });
  }
}

export interface RawQuote {
  price: number;
  open: number;
  high: number;
  low: number;
  yesterday_close: number;
  change: number;
  /** Omit to derive from `change` and `yesterday_close`. */
  change_percent?: number;
}

/**
 * Round a raw reading into a `Quote`.
 *
 * @throws {AdapterError} when the price is not positive.
 */
export function buildQuote(source: string, raw: RawQuote, at: Date): Quote {
  if (!(raw.price > 0)) {
    throw new AdapterError(source, `invalid price ${raw.price}`);
  }
  const changePercent = raw.change_percent ?? percentOf(raw.change, raw.yesterday_close);
  return {
    price: round2(raw.price),
    open: round2(raw.open),
    high: round2(raw.high),
    low: round2(raw.low),
    yesterday_close: round2(raw.yesterday_close),
    change: round2(raw.change),
    change_percent: round2(changePercent),
    timestamp: epochSeconds(at),
    time_str: formatLocalTime(at),
    source,
  };
}
