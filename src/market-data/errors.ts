/**
 * Failure taxonomy for market data acquisition.
 *
 * `AdapterError` never leaves an adapter: the adapter boundary logs it and
 * reports a plain failure. Callers of the failover fetcher only ever see one
 * of the terminal `FetchErrorReason` values.
 */

/** Network, payload or validation failure inside one adapter call. */
export class AdapterError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, options);
    this.name = 'AdapterError';
    this.source = source;
  }
}

/** Terminal outcome of a failover fetch that produced no value. */
export type FetchErrorReason = 'no_enabled_sources' | 'all_sources_muted' | 'all_sources_failed';

const FETCH_ERROR_MESSAGES: Record<FetchErrorReason, string> = {
  no_enabled_sources: 'No data sources are enabled',
  all_sources_muted: 'All data sources are cooling down after repeated failures, try again later',
  all_sources_failed: 'All available data sources failed, check the network or try again later',
};

export function fetchErrorMessage(reason: FetchErrorReason): string {
  return FETCH_ERROR_MESSAGES[reason];
}
