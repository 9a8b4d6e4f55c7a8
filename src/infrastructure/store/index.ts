export type { BackendKind, PersistentStore } from './types.js';
export { MemoryStore } from './memory-store.js';
export { FileStore, queueFileName } from './file-store.js';
export type { FileStoreOptions } from './file-store.js';
export { PreferencesStore, createPreferenceClient, PREFERENCE_KEY_PREFIX } from './preferences-store.js';
export type { PreferenceClient, PreferencesStoreOptions } from './preferences-store.js';
export { createStore } from './create-store.js';
export type { StoreConfig } from './create-store.js';
export { encodeSnapshot, decodeSnapshot } from './snapshot.js';
export { encodeRecord, decodeRecord } from './record-codec.js';
