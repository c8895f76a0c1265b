import { type StateSnapshot, type StateStore } from './storage.js';

/**
 * In-memory state store.
 *
 * Keeps a deep copy of the last saved snapshot so callers cannot mutate what
 * was "persisted".
 */
export class MemoryStateStore implements StateStore {
  private snapshot: StateSnapshot | null;
  private saves = 0;

  constructor(initial: StateSnapshot | null = null) {
    this.snapshot = initial === null ? null : structuredClone(initial);
  }

  async load(): Promise<StateSnapshot | null> {
    return this.snapshot === null ? null : structuredClone(this.snapshot);
  }

  async save(snapshot: StateSnapshot): Promise<void> {
    this.snapshot = structuredClone(snapshot);
    this.saves += 1;
  }

  /** Number of completed saves. */
  get saveCount(): number {
    return this.saves;
  }
}
