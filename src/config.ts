/**
 * Configuration module for pricewatch.
 *
 * Parses TOML configuration and fills every missing key with a default.
 * Duration fields are human-readable strings (e.g. "30s", "7d") converted to
 * milliseconds; bare numbers are read as seconds.
 */

import path from 'node:path';
import toml from 'toml';
import { durationValue } from './duration.js';
import { type LogLevel, isLogLevel } from './logger.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** Which family of upstream endpoints a source belongs to. */
export type SourceKind = 'gold' | 'fund' | 'portfolio';

export const SOURCE_KINDS: readonly SourceKind[] = ['gold', 'fund', 'portfolio'];

/** Static description of one upstream source, in priority order within its kind. */
export interface SourceConfig {
  name: string;
  /** Adapter type, e.g. "eastmoney" or "fundgz". */
  type: string;
  enabled: boolean;
  /** Per-call timeout (ms). */
  timeout: number;
}

export interface BreakerConfig {
  /** Consecutive failures that trip a source. */
  max_fail_count: number;
  /** How long a tripped source is skipped (ms). */
  mute_duration: number;
}

export interface CacheConfig {
  /** Fund quotes younger than this are served as-is (ms). */
  fund_fresh: number;
  /** Fund quotes younger than this may be served stale in fast mode (ms). */
  fund_stale: number;
  holdings_fresh: number;
  holdings_stale: number;
  /** How long a fetched fund portfolio breakdown stays valid (ms). */
  portfolio_ttl: number;
  /** Age past which the latest buffered gold quote triggers a live fetch (ms). */
  price_stale: number;
}

export interface HistoryConfig {
  /** Maximum number of buffered gold quotes. */
  capacity: number;
  /** Delay between background polls (ms). */
  poll_interval: number;
  /** Delay after an unexpected poller failure (ms). */
  error_backoff: number;
  /** Manual records older than this many days are dropped. */
  records_keep_days: number;
}

export interface FetchConfig {
  /** Worker pool size for batch quote fetches. */
  max_workers: number;
}

export interface Config {
  /** Optional path to the data directory. */
  data_dir?: string;
  log_level: LogLevel;
  breaker: BreakerConfig;
  cache: CacheConfig;
  history: HistoryConfig;
  fetch: FetchConfig;
  sources: Record<SourceKind, SourceConfig[]>;
}

export interface ResolvedConfig extends Omit<Config, 'data_dir'> {
  /** Resolved (absolute) path to the data directory. */
  data_dir: string;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

const MS_PER_SECOND = 1000;
const MS_PER_DAY = 24 * 60 * 60 * MS_PER_SECOND;

export const DEFAULT_BREAKER_CONFIG: BreakerConfig = {
  max_fail_count: 3,
  mute_duration: 60 * MS_PER_SECOND,
};

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  fund_fresh: 30 * MS_PER_SECOND,
  fund_stale: 120 * MS_PER_SECOND,
  holdings_fresh: 30 * MS_PER_SECOND,
  holdings_stale: 120 * MS_PER_SECOND,
  portfolio_ttl: 7 * MS_PER_DAY,
  price_stale: 30 * MS_PER_SECOND,
};

export const DEFAULT_HISTORY_CONFIG: HistoryConfig = {
  capacity: 720,
  poll_interval: 5 * MS_PER_SECOND,
  error_backoff: 30 * MS_PER_SECOND,
  records_keep_days: 7,
};

export const DEFAULT_FETCH_CONFIG: FetchConfig = {
  max_workers: 8,
};

const DEFAULT_TIMEOUT = 5 * MS_PER_SECOND;

export const DEFAULT_SOURCES: Record<SourceKind, SourceConfig[]> = {
  gold: [
    { name: 'eastmoney', type: 'eastmoney', enabled: true, timeout: 5 * MS_PER_SECOND },
    { name: 'sina', type: 'sina', enabled: true, timeout: 5 * MS_PER_SECOND },
    { name: 'tencent', type: 'tencent', enabled: true, timeout: 3 * MS_PER_SECOND },
    { name: 'netease', type: 'netease', enabled: true, timeout: 3 * MS_PER_SECOND },
  ],
  fund: [
    { name: 'fundgz', type: 'fundgz', enabled: true, timeout: 5 * MS_PER_SECOND },
    { name: 'sina_fund', type: 'sina_fund', enabled: true, timeout: 5 * MS_PER_SECOND },
  ],
  portfolio: [
    {
      name: 'eastmoney_portfolio',
      type: 'eastmoney_portfolio',
      enabled: true,
      timeout: 8 * MS_PER_SECOND,
    },
  ],
};

function cloneSources(sources: Record<SourceKind, SourceConfig[]>): Record<SourceKind, SourceConfig[]> {
  return {
    gold: sources.gold.map((s) => ({ ...s })),
    fund: sources.fund.map((s) => ({ ...s })),
    portfolio: sources.portfolio.map((s) => ({ ...s })),
  };
}

export function defaultConfig(): Config {
  return {
    log_level: 'info',
    breaker: { ...DEFAULT_BREAKER_CONFIG },
    cache: { ...DEFAULT_CACHE_CONFIG },
    history: { ...DEFAULT_HISTORY_CONFIG },
    fetch: { ...DEFAULT_FETCH_CONFIG },
    sources: cloneSources(DEFAULT_SOURCES),
  };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function table(raw: Table, key: string): Table {
  const value = raw[key];
  if (value === undefined) {
    return {};
  }
  if (!isTable(value)) {
    throw new Error(`Config section [${key}] must be a table`);
  }
  return value;
}

function positiveInt(raw: unknown, key: string, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  if (typeof raw !== 'number' || !Number.isInteger(raw) || raw <= 0) {
    throw new Error(`Config key '${key}' must be a positive integer`);
  }
  return raw;
}

function parseSource(raw: unknown, kind: SourceKind, index: number): SourceConfig {
  const where = `sources.${kind}[${index}]`;
  if (!isTable(raw)) {
    throw new Error(`Config entry ${where} must be a table`);
  }
  if (typeof raw.type !== 'string' || raw.type.trim() === '') {
    throw new Error(`Config entry ${where} is missing 'type'`);
  }
  const type = raw.type.trim();
  const name = typeof raw.name === 'string' && raw.name.trim() !== '' ? raw.name.trim() : type;
  return {
    name,
    type,
    enabled: typeof raw.enabled === 'boolean' ? raw.enabled : true,
    timeout: durationValue(raw.timeout, DEFAULT_TIMEOUT),
  };
}

function parseSources(raw: Table): Record<SourceKind, SourceConfig[]> {
  const sources = cloneSources(DEFAULT_SOURCES);
  const sourcesRaw = table(raw, 'sources');
  for (const kind of SOURCE_KINDS) {
    const list = sourcesRaw[kind];
    if (list === undefined) {
      continue;
    }
    if (!Array.isArray(list)) {
      throw new Error(`Config key 'sources.${kind}' must be an array of tables`);
    }
    sources[kind] = list.map((entry, i) => parseSource(entry, kind, i));
  }
  return sources;
}

function checkTtlPair(fresh: number, stale: number, prefix: string): void {
  if (fresh > stale) {
    throw new Error(`Config key 'cache.${prefix}_fresh' must not exceed 'cache.${prefix}_stale'`);
  }
}

/**
 * Parse a TOML configuration string into a `Config`.
 *
 * Missing keys are filled with defaults; a present but malformed key throws.
 */
export function parseConfig(tomlStr: string): Config {
  const parsed: unknown = tomlStr.trim().length === 0 ? {} : toml.parse(tomlStr);
  if (!isTable(parsed)) {
    throw new Error('Config root must be a table');
  }

  const breakerRaw = table(parsed, 'breaker');
  const cacheRaw = table(parsed, 'cache');
  const historyRaw = table(parsed, 'history');
  const fetchRaw = table(parsed, 'fetch');

  const breaker: BreakerConfig = {
    max_fail_count: positiveInt(
      breakerRaw.max_fail_count,
      'breaker.max_fail_count',
      DEFAULT_BREAKER_CONFIG.max_fail_count,
    ),
    mute_duration: durationValue(breakerRaw.mute_duration, DEFAULT_BREAKER_CONFIG.mute_duration),
  };

  const cache: CacheConfig = {
    fund_fresh: durationValue(cacheRaw.fund_fresh, DEFAULT_CACHE_CONFIG.fund_fresh),
    fund_stale: durationValue(cacheRaw.fund_stale, DEFAULT_CACHE_CONFIG.fund_stale),
    holdings_fresh: durationValue(cacheRaw.holdings_fresh, DEFAULT_CACHE_CONFIG.holdings_fresh),
    holdings_stale: durationValue(cacheRaw.holdings_stale, DEFAULT_CACHE_CONFIG.holdings_stale),
    portfolio_ttl: durationValue(cacheRaw.portfolio_ttl, DEFAULT_CACHE_CONFIG.portfolio_ttl),
    price_stale: durationValue(cacheRaw.price_stale, DEFAULT_CACHE_CONFIG.price_stale),
  };
  checkTtlPair(cache.fund_fresh, cache.fund_stale, 'fund');
  checkTtlPair(cache.holdings_fresh, cache.holdings_stale, 'holdings');

  const history: HistoryConfig = {
    capacity: positiveInt(historyRaw.capacity, 'history.capacity', DEFAULT_HISTORY_CONFIG.capacity),
    poll_interval: durationValue(historyRaw.poll_interval, DEFAULT_HISTORY_CONFIG.poll_interval),
    error_backoff: durationValue(historyRaw.error_backoff, DEFAULT_HISTORY_CONFIG.error_backoff),
    records_keep_days: positiveInt(
      historyRaw.records_keep_days,
      'history.records_keep_days',
      DEFAULT_HISTORY_CONFIG.records_keep_days,
    ),
  };

  const fetch: FetchConfig = {
    max_workers: positiveInt(fetchRaw.max_workers, 'fetch.max_workers', DEFAULT_FETCH_CONFIG.max_workers),
  };

  let logLevel: LogLevel = 'info';
  if (parsed.log_level !== undefined) {
    if (!isLogLevel(parsed.log_level)) {
      throw new Error(`Config key 'log_level' has unknown level '${String(parsed.log_level)}'`);
    }
    logLevel = parsed.log_level;
  }

  const config: Config = {
    log_level: logLevel,
    breaker,
    cache,
    history,
    fetch,
    sources: parseSources(parsed),
  };

  if (typeof parsed.data_dir === 'string') {
    config.data_dir = parsed.data_dir;
  }

  return config;
}

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

/**
 * Resolve the data directory for a config.
 *
 * - If `config.data_dir` is set and absolute, return it directly.
 * - If `config.data_dir` is set and relative, join it with `configDir`.
 * - If `config.data_dir` is not set, use `configDir/data`.
 */
export function resolveDataDir(config: Config, configDir: string): string {
  if (config.data_dir == null) {
    return path.join(configDir, 'data');
  }
  if (path.isAbsolute(config.data_dir)) {
    return config.data_dir;
  }
  return path.join(configDir, config.data_dir);
}
