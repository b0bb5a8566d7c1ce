import type { BlobStorage } from "./blob_storage.js";
import { decodeCollection, encodeCollection, type Entry, type NewEntry } from "./entry.js";
import { StoreError } from "./errors.js";
import { logger } from "./logger.js";
import { Mutex } from "./mutex.js";

/**
 * The persisted collection. Nothing is cached between calls: every
 * operation loads the blob, and every append rewrites it whole. Both
 * operations run under one lock owned by the store, so an append is never
 * observed half done and concurrent appends never lose each other's entries.
 */
export class RecordStore {
  private readonly lock = new Mutex();

  constructor(private readonly storage: BlobStorage) {}

  readAll(): Promise<Entry[]> {
    return this.lock.runExclusive(() => this.load());
  }

  /**
   * Appends `batch` in order and returns the full resulting collection.
   * Ids continue from the current collection: count + 1, count + 2, ...
   */
  appendBatch(batch: readonly NewEntry[]): Promise<Entry[]> {
    return this.lock.runExclusive(async () => {
      const entries = await this.load();
      const base = nextIdBase(entries);
      const added: Entry[] = batch.map((e, i) => ({
        id: base + i + 1,
        item: e.item,
        completed: e.completed,
      }));
      const next = [...entries, ...added];
      await this.save(next);
      logger.debug(`appended ${added.length} entries, collection size ${next.length}`);
      return next;
    });
  }

  private async load(): Promise<Entry[]> {
    let raw: string | null;
    try {
      raw = await this.storage.read();
    } catch (e) {
      throw new StoreError("read", `cannot read ${this.storage.name}`, { cause: e });
    }
    if (raw === null || raw.trim() === "") return [];

    const decoded = decodeCollection(raw);
    if (!decoded.ok) {
      throw new StoreError("corrupt", `malformed data in ${this.storage.name}: ${decoded.error}`);
    }
    return decoded.value;
  }

  private async save(entries: Entry[]): Promise<void> {
    try {
      await this.storage.write(encodeCollection(entries));
    } catch (e) {
      throw new StoreError("write", `cannot write ${this.storage.name}`, { cause: e });
    }
  }
}

// Equal to the count for any collection this store wrote; the max guards
// against reusing an id if the file was edited by hand.
function nextIdBase(entries: readonly Entry[]): number {
  let max = entries.length;
  for (const e of entries) if (e.id > max) max = e.id;
  return max;
}
