/**
 * Priority-ordered failover across the sources of one registry.
 *
 * Sources are tried strictly in configured order; the first success wins and
 * no later source is called. Sources inside their mute window are skipped and
 * counted so "everything is cooling down" can be told apart from "everything
 * failed".
 */

import { type Logger, errorFields } from '../logger.js';
import type { FetchErrorReason } from './errors.js';
import type { QuoteAdapter } from './adapters/http.js';
import type { SourceRegistry } from './sources.js';

// ---------------------------------------------------------------------------
// FetchOutcome
// ---------------------------------------------------------------------------

export type FetchOutcome<T> =
  | { readonly value: T; readonly error: null; readonly muted_count: number }
  | { readonly value: null; readonly error: FetchErrorReason; readonly muted_count: number };

/** Anything that can fetch a value for a key with failover semantics. */
export interface KeyedFetcher<T> {
  fetch(key: string): Promise<FetchOutcome<T>>;
}

// ---------------------------------------------------------------------------
// FailoverFetcher
// ---------------------------------------------------------------------------

export class FailoverFetcher<T> implements KeyedFetcher<T> {
  readonly #registry: SourceRegistry;
  readonly #adapters: ReadonlyMap<string, QuoteAdapter<T>>;
  readonly #logger: Logger;

  constructor(registry: SourceRegistry, adapters: Iterable<QuoteAdapter<T>>, logger: Logger) {
    this.#registry = registry;
    this.#adapters = new Map(Array.from(adapters, (a) => [a.type, a] as const));
    this.#logger = logger;
  }

  get registry(): SourceRegistry {
    return this.#registry;
  }

  async fetch(key: string): Promise<FetchOutcome<T>> {
    const sources = this.#registry.enabledSources();
    if (sources.length === 0) {
      return { value: null, error: 'no_enabled_sources', muted_count: 0 };
    }

    let mutedCount = 0;
    for (const source of sources) {
      if (this.#registry.isMuted(source)) {
        mutedCount += 1;
        continue;
      }

      const adapter = this.#adapters.get(source.type);
      if (adapter === undefined) {
        this.#logger.warn({ source: source.name, type: source.type }, 'No adapter for source type');
        continue;
      }

      // The network call runs with no state held; breaker updates follow it.
      let value: T | null;
      try {
        value = await adapter.fetch(source, key);
      } catch (err: unknown) {
        this.#logger.warn({ source: source.name, key, ...errorFields(err) }, 'Adapter threw');
        value = null;
      }
      if (value !== null) {
        this.#registry.recordSuccess(source);
        return { value, error: null, muted_count: mutedCount };
      }
      this.#registry.recordFailure(source);
    }

    if (mutedCount === sources.length) {
      return { value: null, error: 'all_sources_muted', muted_count: mutedCount };
    }
    this.#logger.warn({ key, muted: mutedCount }, 'All available sources failed');
    return { value: null, error: 'all_sources_failed', muted_count: mutedCount };
  }
}
