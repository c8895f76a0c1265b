/**
 * Memoized holdings valuation.
 *
 * Holds at most one computed response. Mutations call `invalidate()`, which
 * bumps a generation counter: a recompute that began under an older generation
 * still returns its result to its own caller but never stores it.
 */

import type { Clock } from '../clock.js';
import type { Logger } from '../logger.js';
import { type TtlPair, classifyAge } from '../market-data/quote-cache.js';
import type { RefreshCoordinator } from '../market-data/refresh.js';
import type { HoldingsResponse } from './models.js';

export interface HoldingsCacheOptions {
  readonly ttl: TtlPair;
  readonly refresh: RefreshCoordinator;
  /** Refresh scope; defaults to "holdings". */
  readonly scope?: string;
  /** Produce a fresh response from current holdings and quotes. */
  readonly compute: () => Promise<HoldingsResponse>;
  readonly clock: Clock;
  readonly logger: Logger;
}

export interface HoldingsLookup {
  /** Allow serving a stale response while refreshing in the background. */
  readonly fast: boolean;
  /** Always recompute. */
  readonly force: boolean;
}

interface CachedResponse {
  readonly response: HoldingsResponse;
  /** Epoch ms at which the recompute started. */
  readonly computed_at: number;
}

export class HoldingsCache {
  readonly #options: HoldingsCacheOptions;
  readonly #scope: string;
  #entry: CachedResponse | null = null;
  #generation = 0;

  constructor(options: HoldingsCacheOptions) {
    this.#options = options;
    this.#scope = options.scope ?? 'holdings';
  }

  get scope(): string {
    return this.#scope;
  }

  get generation(): number {
    return this.#generation;
  }

  async get(lookup: HoldingsLookup): Promise<HoldingsResponse> {
    const entry = this.#entry;
    if (lookup.fast && !lookup.force && entry !== null) {
      const age = this.#options.clock.now().getTime() - entry.computed_at;
      const band = classifyAge(age, this.#options.ttl);
      if (band === 'fresh') {
        return entry.response;
      }
      if (band === 'stale') {
        this.scheduleRefresh();
        return { ...entry.response, stale: true };
      }
    }
    return this.recompute();
  }

  /** Compute now and store the result unless invalidated meanwhile. */
  async recompute(): Promise<HoldingsResponse> {
    const generation = this.#generation;
    const startedAt = this.#options.clock.now().getTime();
    const response = await this.#options.compute();
    if (generation === this.#generation) {
      this.#entry = { response, computed_at: startedAt };
    } else {
      this.#options.logger.debug(
        { started: generation, current: this.#generation },
        'Discarding holdings computed before invalidation',
      );
    }
    return response;
  }

  scheduleRefresh(): boolean {
    return this.#options.refresh.schedule(this.#scope, async () => {
      await this.recompute();
    });
  }

  invalidate(): void {
    this.#generation += 1;
    this.#entry = null;
  }

  peek(): HoldingsResponse | null {
    return this.#entry?.response ?? null;
  }
}
