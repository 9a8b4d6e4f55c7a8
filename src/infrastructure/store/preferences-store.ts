import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { StoreIOError } from '../../domain/index.js';
import { decodeSnapshot, encodeSnapshot } from './snapshot.js';
import type { PersistentStore } from './types.js';

/** Key namespace for queue snapshots in the preference store. */
export const PREFERENCE_KEY_PREFIX = 'event_queue:';

/**
 * The slice of a key-value preference client the store needs.
 * An ioredis `Redis` instance satisfies it.
 */
export interface PreferenceClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

export interface PreferencesStoreOptions {
  client: PreferenceClient;
  name: string;
  log: Logger;
}

/**
 * Creates the Redis connection used as the preference mechanism.
 * The caller connects it and quits it on shutdown.
 */
export function createPreferenceClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}

/**
 * Preference-backed store: the whole snapshot lives under one key and is
 * replaced with a single SET, so readers see either the old or the new
 * snapshot, never a mix.
 */
export class PreferencesStore implements PersistentStore {
  readonly kind = 'preferences' as const;
  readonly name: string;
  readonly key: string;
  private readonly client: PreferenceClient;
  private readonly log: Logger;

  constructor(options: PreferencesStoreOptions) {
    this.name = options.name;
    this.key = `${PREFERENCE_KEY_PREFIX}${options.name}`;
    this.client = options.client;
    this.log = options.log;
  }

  async load(): Promise<Uint8Array[]> {
    try {
      const content = await this.client.get(this.key);
      if (content === null) return [];
      return decodeSnapshot(content);
    } catch (err: unknown) {
      this.log.error({ err: new StoreIOError(this.name, 'load', err), key: this.key }, 'Failed to read queue preference');
      return [];
    }
  }

  async save(items: readonly Uint8Array[]): Promise<void> {
    try {
      await this.client.set(this.key, encodeSnapshot(items));
    } catch (err: unknown) {
      this.log.error(
        { err: new StoreIOError(this.name, 'save', err), key: this.key, count: items.length },
        'Failed to write queue preference, snapshot dropped',
      );
    }
  }

  async clear(): Promise<void> {
    try {
      await this.client.del(this.key);
    } catch (err: unknown) {
      this.log.error({ err: new StoreIOError(this.name, 'clear', err), key: this.key }, 'Failed to remove queue preference');
    }
  }
}
