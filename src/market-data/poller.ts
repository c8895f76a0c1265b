/**
 * Background poller feeding the time-series buffer.
 *
 * One long-lived loop per poller: fetch, append, persist, sleep. A failed
 * fetch just waits the normal interval; an unexpected exception is logged and
 * waits the longer backoff. The loop only ends through `stop()`.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { type Logger, errorFields } from '../logger.js';
import type { KeyedFetcher } from './failover.js';
import type { TimeSeriesBuffer } from './history.js';
import type { Quote } from './models.js';

/** Resolve after `ms`, or early once `signal` aborts. Never rejects. */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err: unknown) {
    if (!signal.aborted) {
      throw err;
    }
  }
};

export interface BackgroundPollerOptions {
  /** Key passed to the fetcher on each poll. */
  readonly key: string;
  readonly fetcher: KeyedFetcher<Quote>;
  readonly buffer: TimeSeriesBuffer<Quote>;
  /** Called after every appended quote. */
  readonly persist: () => Promise<void>;
  readonly interval: number;
  readonly errorBackoff: number;
  readonly logger: Logger;
  readonly sleep?: Sleep;
}

export class BackgroundPoller {
  readonly #options: BackgroundPollerOptions;
  readonly #sleep: Sleep;
  #controller: AbortController | null = null;
  #loop: Promise<void> | null = null;

  constructor(options: BackgroundPollerOptions) {
    this.#options = options;
    this.#sleep = options.sleep ?? abortableSleep;
  }

  get running(): boolean {
    return this.#controller !== null;
  }

  /** Start the loop. Returns false if it is already running. */
  start(): boolean {
    if (this.#controller !== null) {
      return false;
    }
    const controller = new AbortController();
    this.#controller = controller;
    this.#options.logger.info({ key: this.#options.key }, 'Background poller started');
    this.#loop = this.#run(controller.signal);
    return true;
  }

  /** Signal the loop to stop and wait for it to exit. */
  async stop(): Promise<void> {
    const controller = this.#controller;
    if (controller === null) {
      return;
    }
    controller.abort();
    await this.whenStopped();
    this.#controller = null;
    this.#options.logger.info({ key: this.#options.key }, 'Background poller stopped');
  }

  /** Resolve once the current loop (if any) has exited. */
  async whenStopped(): Promise<void> {
    await this.#loop;
  }

  /**
   * Run one poll cycle and return the delay before the next one.
   */
  async tick(): Promise<number> {
    const { fetcher, buffer, persist, interval, errorBackoff, logger, key } = this.#options;
    try {
      const outcome = await fetcher.fetch(key);
      if (outcome.value !== null) {
        buffer.append(outcome.value);
        logger.debug({ key, price: outcome.value.price, source: outcome.value.source }, 'Recorded quote');
        await persist();
      } else {
        logger.debug({ key, reason: outcome.error }, 'Poll produced no quote');
      }
      return interval;
    } catch (err: unknown) {
      logger.error({ key, ...errorFields(err) }, 'Background poll failed');
      return errorBackoff;
    }
  }

  async #run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const wait = await this.tick();
      if (signal.aborted) {
        break;
      }
      await this.#sleep(wait, signal);
    }
  }
}
