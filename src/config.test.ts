import { describe, it, expect } from 'vitest';
import path from 'node:path';
import {
  parseConfig,
  resolveDataDir,
  defaultConfig,
  DEFAULT_BREAKER_CONFIG,
  DEFAULT_CACHE_CONFIG,
  DEFAULT_HISTORY_CONFIG,
  DEFAULT_SOURCES,
} from './config.js';

describe('parseConfig', () => {
  it('returns defaults for an empty string', () => {
    const config = parseConfig('');
    expect(config).toEqual(defaultConfig());
    expect(config.data_dir).toBeUndefined();
  });

  it('parses breaker settings', () => {
    const config = parseConfig(`
[breaker]
max_fail_count = 5
mute_duration = "2m"
`);
    expect(config.breaker).toEqual({ max_fail_count: 5, mute_duration: 120_000 });
  });

  it('parses cache TTLs and keeps defaults for missing keys', () => {
    const config = parseConfig(`
[cache]
fund_fresh = "10s"
fund_stale = "1m"
`);
    expect(config.cache.fund_fresh).toBe(10_000);
    expect(config.cache.fund_stale).toBe(60_000);
    expect(config.cache.holdings_fresh).toBe(DEFAULT_CACHE_CONFIG.holdings_fresh);
    expect(config.cache.portfolio_ttl).toBe(DEFAULT_CACHE_CONFIG.portfolio_ttl);
  });

  it('reads bare numbers as seconds', () => {
    const config = parseConfig(`
[history]
poll_interval = 2
`);
    expect(config.history.poll_interval).toBe(2_000);
    expect(config.history.capacity).toBe(DEFAULT_HISTORY_CONFIG.capacity);
  });

  it('rejects a fresh TTL longer than the stale TTL', () => {
    expect(() =>
      parseConfig(`
[cache]
holdings_fresh = "5m"
holdings_stale = "1m"
`),
    ).toThrow("'cache.holdings_fresh' must not exceed 'cache.holdings_stale'");
  });

  it('rejects a non-positive worker count', () => {
    expect(() => parseConfig('[fetch]\nmax_workers = 0\n')).toThrow(
      "Config key 'fetch.max_workers' must be a positive integer",
    );
  });

  it('replaces the source list for a kind that is configured', () => {
    const config = parseConfig(`
[[sources.gold]]
name = "primary"
type = "sina"
timeout = "2s"

[[sources.gold]]
type = "eastmoney"
enabled = false
`);
    expect(config.sources.gold).toEqual([
      { name: 'primary', type: 'sina', enabled: true, timeout: 2_000 },
      { name: 'eastmoney', type: 'eastmoney', enabled: false, timeout: 5_000 },
    ]);
    expect(config.sources.fund).toEqual(DEFAULT_SOURCES.fund);
  });

  it('rejects a source without a type', () => {
    expect(() => parseConfig('[[sources.fund]]\nname = "x"\n')).toThrow(
      "Config entry sources.fund[0] is missing 'type'",
    );
  });

  it('parses log level and data_dir', () => {
    const config = parseConfig('log_level = "debug"\ndata_dir = "state"\n');
    expect(config.log_level).toBe('debug');
    expect(config.data_dir).toBe('state');
  });

  it('rejects an unknown log level', () => {
    expect(() => parseConfig('log_level = "loud"\n')).toThrow("unknown level 'loud'");
  });

  it('throws on invalid TOML', () => {
    expect(() => parseConfig('[breaker\n')).toThrow();
  });

  it('does not share default objects between results', () => {
    const a = parseConfig('');
    a.breaker.max_fail_count = 99;
    a.sources.gold[0].enabled = false;
    const b = parseConfig('');
    expect(b.breaker.max_fail_count).toBe(DEFAULT_BREAKER_CONFIG.max_fail_count);
    expect(b.sources.gold[0].enabled).toBe(true);
  });
});

describe('resolveDataDir', () => {
  const configDir = path.join(path.sep, 'home', 'user', 'pricewatch');

  it('uses a data subdirectory by default', () => {
    expect(resolveDataDir(defaultConfig(), configDir)).toBe(path.join(configDir, 'data'));
  });

  it('keeps an absolute data_dir', () => {
    const abs = path.join(path.sep, 'var', 'lib', 'pricewatch');
    expect(resolveDataDir({ ...defaultConfig(), data_dir: abs }, configDir)).toBe(abs);
  });

  it('joins a relative data_dir onto the config directory', () => {
    expect(resolveDataDir({ ...defaultConfig(), data_dir: 'state' }, configDir)).toBe(
      path.join(configDir, 'state'),
    );
  });
});
