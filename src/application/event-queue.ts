import type { Logger } from 'pino';
import type { EventRecord } from '../domain/index.js';
import { decodeRecord, encodeRecord } from '../infrastructure/store/index.js';
import type { PersistentStore } from '../infrastructure/store/index.js';

/**
 * FIFO of EventRecords layered on a PersistentStore.
 *
 * The in-memory array is the working copy; every mutation writes the full
 * resulting snapshot through to the store before its promise resolves.
 * Snapshot writes are chained so they land in mutation order.
 */
export class EventQueue {
  private items: EventRecord[];
  private readonly store: PersistentStore;
  private readonly log: Logger;
  private writes: Promise<void> = Promise.resolve();

  private constructor(store: PersistentStore, log: Logger, items: EventRecord[]) {
    this.store = store;
    this.log = log;
    this.items = items;
  }

  /**
   * Opens a queue over `store`, loading whatever it already holds.
   * Blobs that fail to decode are skipped; the rest keep their order.
   */
  static async open(store: PersistentStore, log: Logger): Promise<EventQueue> {
    const blobs = await store.load();
    const items: EventRecord[] = [];

    blobs.forEach((blob, index) => {
      try {
        items.push(decodeRecord(blob));
      } catch (err: unknown) {
        log.warn({ err, store: store.name, index }, 'Skipping undecodable queued record');
      }
    });

    log.debug({ store: store.name, backend: store.kind, count: items.length }, 'Event queue opened');
    return new EventQueue(store, log, items);
  }

  get count(): number {
    return this.items.length;
  }

  get storeName(): string {
    return this.store.name;
  }

  async save(item: EventRecord): Promise<void> {
    this.items.push(item);
    await this.persist();
  }

  getFirstItem(): EventRecord | undefined {
    return this.items[0];
  }

  getLastItem(): EventRecord | undefined {
    return this.items.at(-1);
  }

  /** Peeks up to `n` records from the head, oldest first. */
  getFirstItems(n: number): EventRecord[] {
    return this.items.slice(0, Math.max(0, n));
  }

  async removeFirstItem(): Promise<EventRecord | undefined> {
    const item = this.items.shift();
    if (item !== undefined) await this.persist();
    return item;
  }

  async removeLastItem(): Promise<EventRecord | undefined> {
    const item = this.items.pop();
    if (item !== undefined) await this.persist();
    return item;
  }

  /**
   * Removes `expected` from the head, stopping at the first record that is
   * no longer the one peeked (the queue was cleared in between).
   *
   * @returns how many records were removed.
   */
  async removeFirstItems(expected: readonly EventRecord[]): Promise<number> {
    let removed = 0;
    while (removed < expected.length && this.items[removed] === expected[removed]) {
      removed++;
    }
    if (removed === 0) return 0;

    this.items.splice(0, removed);
    await this.persist();
    return removed;
  }

  async clear(): Promise<void> {
    this.items = [];
    const done = this.writes.then(() => this.store.clear()).catch((err: unknown) => {
      this.log.error({ err, store: this.store.name }, 'Queue clear failed');
    });
    this.writes = done;
    await done;
  }

  /** Resolves once every snapshot written so far has reached the store. */
  persisted(): Promise<void> {
    return this.writes;
  }

  private persist(): Promise<void> {
    const snapshot = this.items.map(encodeRecord);
    const done = this.writes.then(() => this.store.save(snapshot)).catch((err: unknown) => {
      this.log.error({ err, store: this.store.name }, 'Queue snapshot write failed');
    });
    this.writes = done;
    return done;
  }
}
