export { EventDispatcher } from './dispatcher.js';
export type { EventDispatcherOptions } from './dispatcher.js';
export { EventQueue } from './event-queue.js';
export { ExclusiveLock } from './exclusive-lock.js';
export { FlushScheduler } from './flush-scheduler.js';
export { DestinationStore, sharedDestinations, DEFAULT_EVENT_ENDPOINT } from './destination-store.js';
export { combineJsonPayloads } from './payload-combiner.js';
export type { PayloadCombiner } from './payload-combiner.js';
export type { Sender } from './sender.js';
export {
  dispatcherConfigSchema,
  loadDispatcherConfig,
  normalizeBatchSize,
  normalizeFlushInterval,
  MAX_FLUSH_INTERVAL_SECONDS,
  DEFAULT_BATCH_SIZE,
  DEFAULT_FLUSH_INTERVAL_SECONDS,
  DEFAULT_MAX_QUEUE_SIZE,
  DEFAULT_STORE_IDENTIFIER,
  DEFAULT_SEND_TIMEOUT_MS,
  DEFAULT_REDIS_URL,
} from './dispatcher-config.js';
export type { DispatcherConfig } from './dispatcher-config.js';
