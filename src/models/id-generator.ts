import { v4 as uuidv4 } from 'uuid';

/** Source of manual record ids; injected so tests can pin them. */
export interface IdGenerator {
  newId(): string;
}

/** Random v4 uuids. */
export class UuidIdGenerator implements IdGenerator {
  newId(): string {
    return uuidv4();
  }
}

/**
 * Hands out a pre-seeded list of ids in order and throws once it runs dry,
 * so a test that creates more records than it expects fails loudly.
 */
export class FixedIdGenerator implements IdGenerator {
  readonly #queue: string[];

  constructor(ids: Iterable<string>) {
    this.#queue = [...ids];
  }

  /** Ids not yet handed out. */
  get remaining(): number {
    return this.#queue.length;
  }

  newId(): string {
    const next = this.#queue.shift();
    if (next === undefined) {
      throw new Error('fixed id generator exhausted');
    }
    return next;
  }
}
