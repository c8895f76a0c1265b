/**
 * Background refresh deduplication.
 *
 * Each scope (e.g. "funds", "holdings") owns a single in-flight slot. A
 * refresh is only started when the slot is empty, and the slot is always
 * released when the task settles, whether it resolved or threw.
 */

import { type Logger, errorFields } from '../logger.js';

export class RefreshCoordinator {
  readonly #inFlight = new Map<string, Promise<void>>();
  readonly #logger: Logger;

  constructor(logger: Logger) {
    this.#logger = logger;
  }

  /**
   * Start `task` for `scope` unless one is already running.
   *
   * The task begins on a later microtask, never inside the caller's frame.
   * Returns whether a task was started.
   */
  schedule(scope: string, task: () => Promise<void>): boolean {
    if (this.#inFlight.has(scope)) {
      this.#logger.debug({ scope }, 'Refresh already in flight');
      return false;
    }

    const run = Promise.resolve()
      .then(task)
      .catch((err: unknown) => {
        this.#logger.error({ scope, ...errorFields(err) }, 'Background refresh failed');
      })
      .finally(() => {
        this.#inFlight.delete(scope);
      });
    this.#inFlight.set(scope, run);
    return true;
  }

  isRefreshing(scope: string): boolean {
    return this.#inFlight.has(scope);
  }

  /** Resolve once the scope's current refresh (if any) has settled. */
  async settled(scope: string): Promise<void> {
    await this.#inFlight.get(scope);
  }

  /** Resolve once every in-flight refresh has settled. */
  async settledAll(): Promise<void> {
    await Promise.all(this.#inFlight.values());
  }
}
