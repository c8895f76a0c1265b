/**
 * Per-key quote cache with fresh / stale / expired bands.
 *
 * Lookups never fail: every requested key comes back with either a fetched
 * value, a cached value (tagged stale or expired in its source), or a
 * placeholder built from the fetch error. Network calls go through the worker
 * pool; cache writes happen after each batch completes.
 */

import type { Clock } from '../clock.js';
import { type Logger, errorFields } from '../logger.js';
import { fetchErrorMessage } from './errors.js';
import type { FetchOutcome, KeyedFetcher } from './failover.js';
import { EXPIRED_MARKER, STALE_MARKER, type Sourced, annotateSource } from './models.js';
import { mapWithConcurrency } from './pool.js';
import type { RefreshCoordinator } from './refresh.js';

// ---------------------------------------------------------------------------
// Freshness
// ---------------------------------------------------------------------------

export type Freshness = 'fresh' | 'stale' | 'expired';

/** Fresh and maximum-stale ages (ms). */
export interface TtlPair {
  readonly fresh: number;
  readonly stale: number;
}

/**
 * Classify an age against a TTL pair.
 *
 * Negative ages (clock skew) count as fresh.
 */
export function classifyAge(age: number, ttl: TtlPair): Freshness {
  if (age < ttl.fresh) {
    return 'fresh';
  }
  if (age < ttl.stale) {
    return 'stale';
  }
  return 'expired';
}

export interface CacheEntry<T> {
  readonly key: string;
  readonly value: T;
  /** Epoch ms of the fetch that produced `value`. */
  readonly fetched_at: number;
}

// ---------------------------------------------------------------------------
// QuoteCache
// ---------------------------------------------------------------------------

export interface QuoteCacheOptions<T> {
  /** Refresh scope name shared with the RefreshCoordinator. */
  readonly scope: string;
  readonly ttl: TtlPair;
  readonly fetcher: KeyedFetcher<T>;
  readonly refresh: RefreshCoordinator;
  readonly maxWorkers: number;
  /** Build the record returned for a key that failed with nothing cached. */
  readonly placeholder: (key: string, error: string) => T;
  readonly clock: Clock;
  readonly logger: Logger;
}

export class QuoteCache<T extends Sourced> {
  readonly #entries = new Map<string, CacheEntry<T>>();
  readonly #options: QuoteCacheOptions<T>;
  /** Deletion sequence number per deleted key; fetches begun earlier skip it. */
  readonly #deletedAt = new Map<string, number>();
  #deletions = 0;

  constructor(options: QuoteCacheOptions<T>) {
    this.#options = options;
  }

  get scope(): string {
    return this.#options.scope;
  }

  // -- Point access ---------------------------------------------------------

  get(key: string): CacheEntry<T> | null {
    return this.#entries.get(key) ?? null;
  }

  set(key: string, value: T, fetchedAt: number = this.#now()): void {
    this.#deletedAt.delete(key);
    this.#entries.set(key, { key, value, fetched_at: fetchedAt });
  }

  /**
   * Drop `key`. A fetch already in flight for it will not write it back.
   */
  delete(key: string): boolean {
    this.#deletions += 1;
    this.#deletedAt.set(key, this.#deletions);
    return this.#entries.delete(key);
  }

  /** Band of the cached entry for `key`, or null when nothing is cached. */
  classify(key: string): Freshness | null {
    const entry = this.#entries.get(key);
    if (entry === undefined) {
      return null;
    }
    return classifyAge(this.#now() - entry.fetched_at, this.#options.ttl);
  }

  // -- Fetching -------------------------------------------------------------

  /** Fetch one key through the failover fetcher, caching a success. */
  async fetchOne(key: string): Promise<FetchOutcome<T>> {
    const started = this.#deletions;
    const outcome = await this.#options.fetcher.fetch(key);
    if (outcome.value !== null) {
      this.#store(key, outcome.value, this.#now(), started);
    }
    return outcome;
  }

  /**
   * Fetch several keys through the bounded pool, caching every success.
   *
   * Returns the outcome per key, or null for a key whose fetch threw.
   */
  fetchMany(keys: readonly string[]): Promise<Map<string, FetchOutcome<T> | null>> {
    return this.#fetchMany(keys, this.#deletions);
  }

  async #fetchMany(
    keys: readonly string[],
    started: number,
  ): Promise<Map<string, FetchOutcome<T> | null>> {
    const settled = await mapWithConcurrency(keys, this.#options.maxWorkers, (key) =>
      this.#options.fetcher.fetch(key),
    );

    const fetchedAt = this.#now();
    const outcomes = new Map<string, FetchOutcome<T> | null>();
    settled.forEach((result, i) => {
      const key = keys[i];
      if (result.status === 'rejected') {
        this.#options.logger.error({ key, ...errorFields(result.reason) }, 'Quote fetch threw');
        outcomes.set(key, null);
        return;
      }
      if (result.value.value !== null) {
        this.#store(key, result.value.value, fetchedAt, started);
      }
      outcomes.set(key, result.value);
    });
    return outcomes;
  }

  /**
   * Resolve every key to a value.
   *
   * - fresh entry: returned as-is;
   * - stale entry in fast mode: returned tagged stale, refreshed in background;
   * - otherwise: fetched now; on failure the previous value tagged expired or
   *   a placeholder is returned.
   */
  async getMany(keys: readonly string[], fastMode: boolean): Promise<Map<string, T>> {
    const now = this.#now();
    const resolved = new Map<string, T>();
    const toFetch: string[] = [];
    const toRefresh: string[] = [];

    for (const key of new Set(keys)) {
      const entry = this.#entries.get(key);
      const band = entry === undefined ? null : classifyAge(now - entry.fetched_at, this.#options.ttl);
      if (entry !== undefined && band === 'fresh') {
        resolved.set(key, entry.value);
      } else if (entry !== undefined && fastMode && band === 'stale') {
        resolved.set(key, annotateSource(entry.value, STALE_MARKER));
        toRefresh.push(key);
      } else {
        toFetch.push(key);
      }
    }

    if (toFetch.length > 0) {
      const outcomes = await this.fetchMany(toFetch);
      for (const key of toFetch) {
        const outcome = outcomes.get(key) ?? null;
        if (outcome !== null && outcome.value !== null) {
          resolved.set(key, outcome.value);
          continue;
        }
        const previous = this.#entries.get(key);
        if (previous !== undefined) {
          resolved.set(key, annotateSource(previous.value, EXPIRED_MARKER));
        } else {
          const message =
            outcome === null ? 'Fetch failed unexpectedly' : fetchErrorMessage(outcome.error);
          resolved.set(key, this.#options.placeholder(key, message));
        }
      }
    }

    if (toRefresh.length > 0) {
      this.scheduleRefresh(toRefresh);
    }

    const ordered = new Map<string, T>();
    for (const key of keys) {
      const value = resolved.get(key);
      if (value !== undefined) {
        ordered.set(key, value);
      }
    }
    return ordered;
  }

  /**
   * Refresh `keys` in the background unless this cache's scope already has a
   * refresh in flight. Returns whether a refresh was started.
   */
  scheduleRefresh(keys: readonly string[]): boolean {
    const batch = [...keys];
    const started = this.#deletions;
    return this.#options.refresh.schedule(this.#options.scope, async () => {
      const outcomes = await this.#fetchMany(batch, started);
      const refreshed = [...outcomes.values()].filter((o) => o !== null && o.value !== null).length;
      this.#options.logger.debug(
        { scope: this.#options.scope, requested: batch.length, refreshed },
        'Background refresh finished',
      );
    });
  }

  /** Cache a fetched value unless its key was deleted after `started`. */
  #store(key: string, value: T, fetchedAt: number, started: number): void {
    const deletedAt = this.#deletedAt.get(key);
    if (deletedAt !== undefined && deletedAt > started) {
      this.#options.logger.debug({ scope: this.#options.scope, key }, 'Dropping fetch for deleted key');
      return;
    }
    this.set(key, value, fetchedAt);
  }

  #now(): number {
    return this.#options.clock.now().getTime();
  }
}
