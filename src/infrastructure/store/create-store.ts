import type { Logger } from 'pino';
import { FileStore } from './file-store.js';
import { MemoryStore } from './memory-store.js';
import { PreferencesStore } from './preferences-store.js';
import type { PreferenceClient } from './preferences-store.js';
import type { PersistentStore } from './types.js';

/** Tagged backend choice, resolved once at dispatcher construction. */
export type StoreConfig =
  | { kind: 'memory'; name: string }
  | { kind: 'file'; name: string; directory: string }
  | { kind: 'preferences'; name: string; client: PreferenceClient };

export function createStore(config: StoreConfig, log: Logger): PersistentStore {
  switch (config.kind) {
    case 'memory':
      return new MemoryStore(config.name);
    case 'file':
      return new FileStore({ directory: config.directory, name: config.name, log });
    case 'preferences':
      return new PreferencesStore({ client: config.client, name: config.name, log });
  }
}
