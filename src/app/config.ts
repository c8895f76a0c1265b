/**
 * CLI-specific config loading utilities.
 *
 * Wraps the library-level config parsing (`../config.js`) with file-system
 * awareness: locating the config file, reading TOML, resolving paths, and
 * producing the JSON output shape expected by the `config` command.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

import {
  type Config,
  type ResolvedConfig,
  defaultConfig,
  parseConfig,
  resolveDataDir,
} from '../config.js';

export const CONFIG_FILE_NAME = 'pricewatch.toml';

/** Name of the state file inside the data directory. */
export const STATE_FILE_NAME = 'data.json';

// ---------------------------------------------------------------------------
// Default config path discovery
// ---------------------------------------------------------------------------

/**
 * Determine the default configuration file path.
 *
 * Resolution order:
 * 1. `./pricewatch.toml` if it exists in the current working directory.
 * 2. `$XDG_DATA_HOME/pricewatch/pricewatch.toml` (or
 *    `~/.local/share/pricewatch/pricewatch.toml` when `XDG_DATA_HOME` is not
 *    set), whether or not it exists yet.
 */
export function defaultConfigPath(): string {
  const localConfig = path.resolve(CONFIG_FILE_NAME);
  if (fs.existsSync(localConfig)) {
    return localConfig;
  }

  const xdgDataHome = process.env.XDG_DATA_HOME || path.join(os.homedir(), '.local', 'share');
  return path.join(xdgDataHome, 'pricewatch', CONFIG_FILE_NAME);
}

// ---------------------------------------------------------------------------
// Config loading
// ---------------------------------------------------------------------------

function resolve(parsed: Config, configDir: string): ResolvedConfig {
  return { ...parsed, data_dir: resolveDataDir(parsed, configDir) };
}

/**
 * Load and resolve the pricewatch configuration.
 *
 * @param configPath - Explicit path to a TOML config file. When omitted the
 *   result of {@link defaultConfigPath} is used.
 * @returns The resolved path that was used and the fully-resolved config.
 *   A missing file yields the defaults.
 */
export async function loadConfig(
  configPath?: string,
): Promise<{ configPath: string; config: ResolvedConfig }> {
  const resolvedPath = configPath ? path.resolve(configPath) : defaultConfigPath();
  const configDir = path.dirname(resolvedPath);

  if (fs.existsSync(resolvedPath)) {
    const tomlStr = await fs.promises.readFile(resolvedPath, 'utf-8');
    let parsed: Config;
    try {
      parsed = parseConfig(tomlStr);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Invalid config file ${resolvedPath}: ${reason}`, { cause: err });
    }
    return { configPath: resolvedPath, config: resolve(parsed, configDir) };
  }

  return { configPath: resolvedPath, config: resolve(defaultConfig(), configDir) };
}

/** Path of the JSON state file for a resolved config. */
export function stateFilePath(config: ResolvedConfig): string {
  return path.join(config.data_dir, STATE_FILE_NAME);
}

// ---------------------------------------------------------------------------
// CLI output
// ---------------------------------------------------------------------------

/**
 * Build the JSON-serialisable output object for the `config` CLI command.
 */
export function configOutput(configPath: string, config: ResolvedConfig): object {
  return {
    config_file: configPath,
    data_directory: config.data_dir,
    state_file: stateFilePath(config),
    log_level: config.log_level,
    sources: {
      gold: config.sources.gold.map((s) => s.name),
      fund: config.sources.fund.map((s) => s.name),
      portfolio: config.sources.portfolio.map((s) => s.name),
    },
  };
}
