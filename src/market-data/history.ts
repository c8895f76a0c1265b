/**
 * Capacity-bounded, insertion-ordered buffer of timestamped points.
 *
 * Appending past capacity drops the oldest point. Points are expected to
 * arrive in non-decreasing timestamp order; the buffer does not reorder.
 */
export class TimeSeriesBuffer<T extends { readonly timestamp: number }> {
  readonly #capacity: number;
  #items: T[] = [];

  constructor(capacity: number, initial: Iterable<T> = []) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.#capacity = capacity;
    this.replace(initial);
  }

  get capacity(): number {
    return this.#capacity;
  }

  get size(): number {
    return this.#items.length;
  }

  append(item: T): void {
    this.#items.push(item);
    if (this.#items.length > this.#capacity) {
      this.#items.splice(0, this.#items.length - this.#capacity);
    }
  }

  latest(): T | null {
    return this.#items.length === 0 ? null : this.#items[this.#items.length - 1];
  }

  /**
   * Drop every point whose timestamp (epoch seconds) is before `cutoff`.
   *
   * Returns how many points were removed.
   */
  pruneBefore(cutoff: number): number {
    const before = this.#items.length;
    this.#items = this.#items.filter((item) => item.timestamp >= cutoff);
    return before - this.#items.length;
  }

  /** Replace the contents, keeping only the newest `capacity` points. */
  replace(items: Iterable<T>): void {
    const all = [...items];
    this.#items = all.slice(Math.max(0, all.length - this.#capacity));
  }

  clear(): void {
    this.#items = [];
  }

  /** Snapshot copy in insertion order. */
  toArray(): T[] {
    return [...this.#items];
  }
}
