import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { type IdGenerator, UuidIdGenerator } from '../models/id-generator.js';
import { decodeSnapshot } from './snapshot.js';
import { type StateSnapshot, type StateStore } from './storage.js';

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * State store backed by one pretty-printed JSON file.
 *
 * Saves write a sibling `.tmp` file and rename it over the target, so readers
 * see either the old or the new file. Saves are applied one at a time in call
 * order.
 */
export class JsonFileStateStore implements StateStore {
  readonly filePath: string;
  private readonly ids: IdGenerator;
  private queue: Promise<void> = Promise.resolve();

  constructor(filePath: string, ids: IdGenerator = new UuidIdGenerator()) {
    this.filePath = filePath;
    this.ids = ids;
  }

  async load(): Promise<StateSnapshot | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (e: unknown) {
      if (isNotFound(e)) {
        return null;
      }
      throw e;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (e: unknown) {
      throw new Error(`State file ${this.filePath} is not valid JSON`, { cause: e });
    }
    return decodeSnapshot(raw, this.ids);
  }

  save(snapshot: StateSnapshot): Promise<void> {
    const content = JSON.stringify(snapshot, null, 2);
    const write = this.queue.then(() => this.writeAtomic(content));
    // Keep the queue usable after a failed write; the caller still sees the error.
    this.queue = write.catch(() => undefined);
    return write;
  }

  private async writeAtomic(content: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, this.filePath);
  }
}
