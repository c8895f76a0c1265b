import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export interface LoggerConfig {
  level: LogLevel;
  /** Render human-readable lines through pino-pretty instead of JSON. */
  pretty: boolean;
}

/**
 * Build the process logger.
 *
 * JSON lines go to stderr so command output on stdout stays machine-readable.
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    level: config.level,
    base: { service: 'pricewatch' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/** A logger that drops everything. Handy default for library callers and tests. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** Flatten an unknown thrown value into loggable fields. */
export function errorFields(err: unknown): { error: string; stack?: string } {
  if (err instanceof Error) {
    return { error: err.message, ...(err.stack !== undefined ? { stack: err.stack } : {}) };
  }
  return { error: String(err) };
}
