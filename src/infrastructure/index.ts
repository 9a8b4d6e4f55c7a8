export {
  MemoryStore,
  FileStore,
  PreferencesStore,
  createStore,
  createPreferenceClient,
  queueFileName,
  encodeSnapshot,
  decodeSnapshot,
  encodeRecord,
  decodeRecord,
  PREFERENCE_KEY_PREFIX,
} from './store/index.js';
export type {
  BackendKind,
  PersistentStore,
  PreferenceClient,
  StoreConfig,
  FileStoreOptions,
  PreferencesStoreOptions,
} from './store/index.js';
export { createHttpSender } from './sender/index.js';
export type { HttpSenderOptions } from './sender/index.js';
