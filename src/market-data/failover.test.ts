import { describe, it, expect, beforeEach } from 'vitest';
import { ManualClock } from '../clock.js';
import type { SourceConfig } from '../config.js';
import { silentLogger } from '../logger.js';
import type { QuoteAdapter } from './adapters/http.js';
import { FailoverFetcher } from './failover.js';
import type { Quote } from './models.js';
import { type SourceDescriptor, SourceRegistry } from './sources.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const START = new Date('2024-09-30T06:00:00Z');

function makeQuote(price: number, source: string): Quote {
  return {
    price,
    open: price,
    high: price,
    low: price,
    yesterday_close: price,
    change: 0,
    change_percent: 0,
    timestamp: START.getTime() / 1000,
    time_str: '14:00:00',
    source,
  };
}

/** An adapter answering with a fixed value (or null) and counting calls. */
class StubAdapter implements QuoteAdapter<Quote> {
  readonly type: string;
  result: Quote | null;
  calls: string[] = [];

  constructor(type: string, result: Quote | null) {
    this.type = type;
    this.result = result;
  }

  async fetch(source: SourceDescriptor, key: string): Promise<Quote | null> {
    this.calls.push(`${source.name}:${key}`);
    return this.result;
  }
}

/** An adapter that breaks its no-throw contract. */
class ThrowingAdapter implements QuoteAdapter<Quote> {
  readonly type: string;
  calls = 0;

  constructor(type: string) {
    this.type = type;
  }

  async fetch(_source: SourceDescriptor, _key: string): Promise<Quote | null> {
    this.calls += 1;
    throw new Error('boom');
  }
}

function config(name: string, enabled = true): SourceConfig {
  return { name, type: name, enabled, timeout: 1000 };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('FailoverFetcher', () => {
  let clock: ManualClock;
  let a: StubAdapter;
  let b: StubAdapter;

  function fetcher(configs: SourceConfig[], adapters: QuoteAdapter<Quote>[] = [a, b]) {
    const registry = new SourceRegistry(
      configs,
      { max_fail_count: 3, mute_duration: 60_000 },
      clock,
      silentLogger(),
    );
    return new FailoverFetcher<Quote>(registry, adapters, silentLogger());
  }

  beforeEach(() => {
    clock = new ManualClock(START);
    a = new StubAdapter('a', makeQuote(550.0, 'a'));
    b = new StubAdapter('b', makeQuote(550.12, 'b'));
  });

  it('returns the first success without calling later sources', async () => {
    const f = fetcher([config('a'), config('b')]);

    const outcome = await f.fetch('AU9999');

    expect(outcome).toEqual({ value: makeQuote(550.0, 'a'), error: null, muted_count: 0 });
    expect(a.calls).toEqual(['a:AU9999']);
    expect(b.calls).toEqual([]);
  });

  it('falls through to the next source and counts the failure', async () => {
    a.result = null;
    const f = fetcher([config('a'), config('b')]);

    const outcome = await f.fetch('AU9999');

    expect(outcome.value?.source).toBe('b');
    expect(f.registry.get('a')?.fail_count).toBe(1);
  });

  it('skips a muted source and reports it in muted_count', async () => {
    a.result = null;
    const f = fetcher([config('a'), config('b')]);
    for (let i = 0; i < 3; i++) {
      await f.fetch('AU9999');
    }
    const muted = f.registry.get('a');
    expect(muted?.mute_until).toBe(START.getTime() + 60_000);

    a.calls = [];
    const outcome = await f.fetch('AU9999');

    expect(a.calls).toEqual([]);
    expect(outcome.value?.price).toBe(550.12);
    expect(outcome.error).toBeNull();
    expect(outcome.muted_count).toBe(1);
  });

  it('resets the failure count on success', async () => {
    a.result = null;
    const f = fetcher([config('a'), config('b')]);
    await f.fetch('AU9999');
    a.result = makeQuote(551, 'a');

    await f.fetch('AU9999');

    expect(f.registry.get('a')?.fail_count).toBe(0);
  });

  it('treats a throwing adapter as a failed source', async () => {
    const thrower = new ThrowingAdapter('a');
    const f = fetcher([config('a'), config('b')], [thrower, b]);

    const outcome = await f.fetch('AU9999');

    expect(outcome).toEqual({ value: makeQuote(550.12, 'b'), error: null, muted_count: 0 });
    expect(thrower.calls).toBe(1);
    expect(f.registry.get('a')?.fail_count).toBe(1);
  });

  it('reports all_sources_failed when the only adapter throws', async () => {
    const f = fetcher([config('a')], [new ThrowingAdapter('a')]);

    expect(await f.fetch('AU9999')).toEqual({ value: null, error: 'all_sources_failed', muted_count: 0 });
  });

  it('reports no_enabled_sources when nothing is enabled', async () => {
    const f = fetcher([config('a', false), config('b', false)]);

    expect(await f.fetch('AU9999')).toEqual({ value: null, error: 'no_enabled_sources', muted_count: 0 });
    expect(a.calls).toEqual([]);
  });

  it('reports all_sources_muted when every enabled source is cooling down', async () => {
    a.result = null;
    b.result = null;
    const f = fetcher([config('a'), config('b')]);
    for (let i = 0; i < 3; i++) {
      await f.fetch('AU9999');
    }

    expect(await f.fetch('AU9999')).toEqual({ value: null, error: 'all_sources_muted', muted_count: 2 });
  });

  it('reports all_sources_failed when live sources fail', async () => {
    a.result = null;
    b.result = null;
    const f = fetcher([config('a'), config('b')]);

    expect(await f.fetch('AU9999')).toEqual({ value: null, error: 'all_sources_failed', muted_count: 0 });
    expect(a.calls).toHaveLength(1);
    expect(b.calls).toHaveLength(1);
  });

  it('lets a source back in after its mute window', async () => {
    a.result = null;
    const f = fetcher([config('a'), config('b')]);
    for (let i = 0; i < 3; i++) {
      await f.fetch('AU9999');
    }
    clock.advance(60_000);
    a.result = makeQuote(552, 'a');
    a.calls = [];

    const outcome = await f.fetch('AU9999');

    expect(a.calls).toEqual(['a:AU9999']);
    expect(outcome.value?.price).toBe(552);
    expect(outcome.muted_count).toBe(0);
  });

  it('skips sources whose type has no adapter', async () => {
    const f = fetcher([{ name: 'x', type: 'unknown', enabled: true, timeout: 1000 }, config('b')]);

    const outcome = await f.fetch('AU9999');

    expect(outcome.value?.source).toBe('b');
    expect(outcome.muted_count).toBe(0);
    expect(f.registry.get('x')?.fail_count).toBe(0);
  });
});
