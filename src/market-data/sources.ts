/**
 * Source registry and per-source circuit breaker.
 *
 * The registry holds the configured sources of one kind in priority order.
 * Breaker state lives on each descriptor and is only mutated through
 * `recordSuccess` / `recordFailure`, which the failover fetcher calls.
 */

import type { Clock } from '../clock.js';
import type { BreakerConfig, SourceConfig } from '../config.js';
import type { Logger } from '../logger.js';

// ---------------------------------------------------------------------------
// SourceDescriptor
// ---------------------------------------------------------------------------

/** A configured source plus its mutable breaker state. */
export interface SourceDescriptor {
  readonly name: string;
  readonly type: string;
  readonly enabled: boolean;
  /** Per-call timeout (ms). */
  readonly timeout: number;
  /** Consecutive failures since the last success or trip. */
  fail_count: number;
  /** Epoch ms until which the source is skipped; 0 when not muted. */
  mute_until: number;
}

export function sourceFromConfig(config: SourceConfig): SourceDescriptor {
  return {
    name: config.name,
    type: config.type,
    enabled: config.enabled,
    timeout: config.timeout,
    fail_count: 0,
    mute_until: 0,
  };
}

/** Read-only view of breaker state, for diagnostics output. */
export interface SourceStatus {
  readonly name: string;
  readonly type: string;
  readonly enabled: boolean;
  readonly fail_count: number;
  readonly muted: boolean;
  readonly mute_until: number;
}

// ---------------------------------------------------------------------------
// SourceRegistry
// ---------------------------------------------------------------------------

export class SourceRegistry {
  readonly #sources: SourceDescriptor[];
  readonly #breaker: BreakerConfig;
  readonly #clock: Clock;
  readonly #logger: Logger;

  constructor(
    sources: SourceConfig[],
    breaker: BreakerConfig,
    clock: Clock,
    logger: Logger,
  ) {
    this.#sources = sources.map(sourceFromConfig);
    this.#breaker = breaker;
    this.#clock = clock;
    this.#logger = logger;
  }

  /** Enabled sources in configured priority order. */
  enabledSources(): SourceDescriptor[] {
    return this.#sources.filter((s) => s.enabled);
  }

  /** Look up a source by name. */
  get(name: string): SourceDescriptor | null {
    return this.#sources.find((s) => s.name === name) ?? null;
  }

  /** Whether the source is inside its mute window right now. */
  isMuted(source: SourceDescriptor): boolean {
    return this.#clock.now().getTime() < source.mute_until;
  }

  recordSuccess(source: SourceDescriptor): void {
    source.fail_count = 0;
    source.mute_until = 0;
  }

  /**
   * Count a failure; trip the breaker once the threshold is reached.
   *
   * Tripping resets the counter, so after cooling down the source needs a
   * fresh run of failures before it is muted again.
   */
  recordFailure(source: SourceDescriptor): void {
    source.fail_count += 1;
    if (source.fail_count >= this.#breaker.max_fail_count) {
      source.mute_until = this.#clock.now().getTime() + this.#breaker.mute_duration;
      source.fail_count = 0;
      this.#logger.warn(
        {
          source: source.name,
          failures: this.#breaker.max_fail_count,
          mute_ms: this.#breaker.mute_duration,
        },
        'Source muted after consecutive failures',
      );
    }
  }

  status(): SourceStatus[] {
    return this.#sources.map((s) => ({
      name: s.name,
      type: s.type,
      enabled: s.enabled,
      fail_count: s.fail_count,
      muted: this.isMuted(s),
      mute_until: s.mute_until,
    }));
  }
}
