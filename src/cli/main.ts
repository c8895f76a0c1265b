#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';

// App layer
import { loadConfig, configOutput, stateFilePath } from '../app/config.js';
import { MarketContext } from '../app/context.js';
import { addFund, deleteFund, getFundPortfolio, getFunds } from '../app/funds.js';
import { deleteHolding, getHoldings, saveHolding } from '../app/holdings.js';
import { calculate, getHistory, getPrice } from '../app/price.js';
import { addRecord, clearRecords, getRecords, getSettings, updateSettings } from '../app/settings.js';

// Library
import type { ResolvedConfig } from '../config.js';
import { parseDuration } from '../duration.js';
import { type Logger, createLogger, errorFields, isLogLevel } from '../logger.js';
import { JsonFileStateStore } from '../storage/json-file.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface GlobalOptions {
  config?: string;
  logLevel?: string;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`'${value}' is not a number`);
  }
  return parsed;
}

function parseDurationArg(value: string): number {
  try {
    return parseDuration(value);
  } catch (err: unknown) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

function print(result: unknown): void {
  console.log(JSON.stringify(result, null, 2));
}

function buildLogger(config: ResolvedConfig, override: string | undefined): Logger {
  let level = config.log_level;
  if (override !== undefined) {
    if (!isLogLevel(override)) {
      throw new Error(`Unknown log level '${override}'`);
    }
    level = override;
  }
  return createLogger({ level, pretty: process.stderr.isTTY === true });
}

async function run(fn: () => Promise<unknown>): Promise<void> {
  try {
    print(await fn());
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    print({ success: false, message });
    process.exitCode = 1;
  }
}

/**
 * Build a context from the selected config, load saved state, run `fn`,
 * then wait for background work before returning its result.
 */
async function runWithContext(fn: (ctx: MarketContext) => Promise<unknown>): Promise<void> {
  await run(async () => {
    const opts = program.opts<GlobalOptions>();
    const { config } = await loadConfig(opts.config);
    const logger = buildLogger(config, opts.logLevel);
    const ctx = new MarketContext({
      config,
      store: new JsonFileStateStore(stateFilePath(config)),
      logger,
    });
    await ctx.load();
    try {
      return await fn(ctx);
    } finally {
      await ctx.shutdown();
    }
  });
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('pricewatch')
  .description('Gold and mutual fund price tracker')
  .version('0.1.0')
  .option('-c, --config <path>', 'path to config file')
  .option('--log-level <level>', 'override the configured log level');

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------

program
  .command('config')
  .description('Print configuration as JSON')
  .action(async () => {
    await run(async () => {
      const cfg = await loadConfig(program.opts<GlobalOptions>().config);
      return configOutput(cfg.configPath, cfg.config);
    });
  });

// ---------------------------------------------------------------------------
// gold price
// ---------------------------------------------------------------------------

program
  .command('price')
  .description('Latest gold price with the buffered summary')
  .action(async () => {
    await runWithContext((ctx) => getPrice(ctx));
  });

program
  .command('history')
  .description("Today's buffered gold prices")
  .action(async () => {
    await runWithContext(async (ctx) => getHistory(ctx));
  });

program
  .command('calculate <buy_price>')
  .description('Sell prices for the profit targets, after fees')
  .option('--current <price>', 'current price, for the current profit rate', parseNumber)
  .action(async (buyPrice: string, opts: { current?: number }) => {
    await run(async () =>
      calculate({ buy_price: parseNumber(buyPrice), current_price: opts.current ?? 0 }),
    );
  });

program
  .command('sources')
  .description('Circuit breaker state of every configured source')
  .action(async () => {
    await runWithContext(async (ctx) => ({
      success: true,
      data: {
        gold: ctx.goldFetcher.registry.status(),
        fund: ctx.fundFetcher.registry.status(),
        portfolio: ctx.portfolioFetcher.registry.status(),
      },
    }));
  });

program
  .command('watch')
  .description('Poll the gold price in the foreground until interrupted')
  .option('--for <duration>', 'stop after this long (e.g. "10m")', parseDurationArg)
  .action(async (opts: { for?: number }) => {
    await runWithContext(async (ctx) => {
      ctx.poller.start();
      await new Promise<void>((resolve) => {
        const finish = () => {
          process.off('SIGINT', finish);
          process.off('SIGTERM', finish);
          clearTimeout(timer);
          resolve();
        };
        const timer = opts.for === undefined ? undefined : setTimeout(finish, opts.for);
        process.on('SIGINT', finish);
        process.on('SIGTERM', finish);
      });
      await ctx.poller.stop();
      return { success: true, data: { points: ctx.history.size, latest: ctx.history.latest() } };
    });
  });

// ---------------------------------------------------------------------------
// funds
// ---------------------------------------------------------------------------

const funds = program.command('funds').description('Fund watchlist commands');

funds
  .command('list')
  .description('Quotes for every watchlist fund')
  .option('--fast', 'serve stale cached quotes while refreshing', false)
  .action(async (opts: { fast: boolean }) => {
    await runWithContext((ctx) => getFunds(ctx, { fast: opts.fast }));
  });

funds
  .command('add <code>')
  .description('Add a fund to the watchlist')
  .action(async (code: string) => {
    await runWithContext((ctx) => addFund(ctx, code));
  });

funds
  .command('remove <code>')
  .description('Remove a fund from the watchlist')
  .action(async (code: string) => {
    await runWithContext((ctx) => deleteFund(ctx, code));
  });

funds
  .command('portfolio <code>')
  .description('Top stock positions of a fund')
  .option('--refresh', 'ignore the saved breakdown', false)
  .action(async (code: string, opts: { refresh: boolean }) => {
    await runWithContext((ctx) => getFundPortfolio(ctx, code, { refresh: opts.refresh }));
  });

// ---------------------------------------------------------------------------
// holdings
// ---------------------------------------------------------------------------

const holdings = program.command('holdings').description('Fund holdings commands');

holdings
  .command('list')
  .description('Value every holding against live estimates')
  .option('--fast', 'serve a stale valuation while refreshing', false)
  .option('--refresh', 'always recompute', false)
  .action(async (opts: { fast: boolean; refresh: boolean }) => {
    await runWithContext((ctx) => getHoldings(ctx, opts));
  });

holdings
  .command('set <code>')
  .description('Add or replace a holding')
  .requiredOption('--cost <price>', 'average cost per share', parseNumber)
  .requiredOption('--shares <count>', 'number of shares', parseNumber)
  .option('--note <text>', 'free-form note', '')
  .action(async (code: string, opts: { cost: number; shares: number; note: string }) => {
    await runWithContext((ctx) =>
      saveHolding(ctx, { code, cost_price: opts.cost, shares: opts.shares, note: opts.note }),
    );
  });

holdings
  .command('remove <code>')
  .description('Remove a holding')
  .action(async (code: string) => {
    await runWithContext((ctx) => deleteHolding(ctx, code));
  });

// ---------------------------------------------------------------------------
// settings & records
// ---------------------------------------------------------------------------

const settings = program.command('settings').description('Price alert settings');

settings
  .command('show')
  .description('Print the alert settings')
  .action(async () => {
    await runWithContext(async (ctx) => getSettings(ctx));
  });

settings
  .command('set')
  .description('Update the alert settings')
  .option('--high <price>', 'upper alert price (0 disables)', parseNumber)
  .option('--low <price>', 'lower alert price (0 disables)', parseNumber)
  .option('--enabled', 'turn price alerts on')
  .option('--no-enabled', 'turn price alerts off')
  .option('--trading-events', 'turn trading session alerts on')
  .option('--no-trading-events', 'turn trading session alerts off')
  .action(
    async (opts: { high?: number; low?: number; enabled?: boolean; tradingEvents?: boolean }) => {
      await runWithContext((ctx) =>
        updateSettings(ctx, {
          ...(opts.high !== undefined ? { high: opts.high } : {}),
          ...(opts.low !== undefined ? { low: opts.low } : {}),
          ...(opts.enabled !== undefined ? { enabled: opts.enabled } : {}),
          ...(opts.tradingEvents !== undefined ? { trading_events_enabled: opts.tradingEvents } : {}),
        }),
      );
    },
  );

const records = program.command('records').description('Manual price records');

records
  .command('list')
  .description('Print saved records')
  .action(async () => {
    await runWithContext(async (ctx) => getRecords(ctx));
  });

records
  .command('add')
  .description('Save a price record')
  .option('--price <price>', 'price at the time of the record', parseNumber)
  .option('--buy-price <price>', 'purchase price', parseNumber)
  .option('--profit <rate>', 'profit rate', parseNumber)
  .option('--note <text>', 'free-form note', '')
  .action(async (opts: { price?: number; buyPrice?: number; profit?: number; note: string }) => {
    await runWithContext((ctx) =>
      addRecord(ctx, {
        price: opts.price ?? null,
        buy_price: opts.buyPrice ?? null,
        profit: opts.profit ?? null,
        note: opts.note,
      }),
    );
  });

records
  .command('clear')
  .description('Delete every saved record')
  .action(async () => {
    await runWithContext((ctx) => clearRecords(ctx));
  });

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(JSON.stringify({ success: false, ...errorFields(err) }));
  process.exitCode = 1;
});
