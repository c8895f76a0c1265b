/**
 * Market data model types.
 *
 * Quotes are plain JSON-safe objects so they can be buffered, cached and
 * persisted without conversion. Currency values are rounded to 2 decimals;
 * `timestamp` is epoch seconds and `time_str` the local wall-clock time.
 */

// ---------------------------------------------------------------------------
// Quote
// ---------------------------------------------------------------------------

/** A normalized gold price snapshot from one provider. */
export interface Quote {
  readonly price: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly yesterday_close: number;
  readonly change: number;
  readonly change_percent: number;
  readonly timestamp: number;
  readonly time_str: string;
  readonly source: string;
}

// ---------------------------------------------------------------------------
// FundQuote
// ---------------------------------------------------------------------------

/** Intraday estimate for one mutual fund. */
export interface FundQuote {
  readonly code: string;
  readonly name: string;
  /** Intraday estimated net asset value. */
  readonly price: number;
  /** Last published net asset value. */
  readonly nav: number;
  readonly change: number;
  readonly change_percent: number;
  readonly timestamp: number;
  readonly time_str: string;
  readonly source: string;
  /** Set only on placeholder records for keys that could not be fetched. */
  readonly error?: string;
}

/** Source tag carried by placeholder fund records. */
export const ERROR_SOURCE = 'Error';

/** Placeholder returned for a fund that failed with nothing cached. */
export function failedFundQuote(code: string, error: string): FundQuote {
  return {
    code,
    name: 'load failed',
    price: 0,
    nav: 0,
    change: 0,
    change_percent: 0,
    timestamp: 0,
    time_str: '--',
    source: ERROR_SOURCE,
    error,
  };
}

// ---------------------------------------------------------------------------
// FundPortfolio
// ---------------------------------------------------------------------------

export interface PortfolioPosition {
  readonly name: string;
  /** Percent of net assets. */
  readonly weight: number;
}

/** Top stock positions of a fund as of its latest report. */
export interface FundPortfolio {
  readonly code: string;
  /** Epoch seconds at which the breakdown was fetched. */
  readonly timestamp: number;
  /** Reporting date of the breakdown, e.g. "2024-09-30". */
  readonly report_period: string;
  readonly holdings_info: Readonly<Record<string, PortfolioPosition>>;
  readonly source: string;
}

// ---------------------------------------------------------------------------
// Source annotations
// ---------------------------------------------------------------------------

/** Appended to the source of a cached value served past its fresh TTL. */
export const STALE_MARKER = '(stale)';

/** Appended to the source of a cached value served because a refetch failed. */
export const EXPIRED_MARKER = '(expired)';

/** Anything carrying a provider source name. */
export interface Sourced {
  readonly source: string;
}

/**
 * Copy `value` with `marker` appended to its source, at most once.
 */
export function annotateSource<T extends Sourced>(value: T, marker: string): T {
  if (value.source.includes(marker)) {
    return value;
  }
  return { ...value, source: `${value.source}${marker}` };
}
