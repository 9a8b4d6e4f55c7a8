import { resolve } from 'node:path';
import { z } from 'zod';

export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_FLUSH_INTERVAL_SECONDS = 60;
export const DEFAULT_MAX_QUEUE_SIZE = 10_000;
export const DEFAULT_STORE_IDENTIFIER = 'EventQueue';
export const DEFAULT_SEND_TIMEOUT_MS = 10_000;
export const DEFAULT_REDIS_URL = 'redis://localhost:6379';
/** Largest interval a Node timer can hold; longer delays fire after 1 ms. */
export const MAX_FLUSH_INTERVAL_SECONDS = Math.floor(0x7fffffff / 1000);

/**
 * Zero or negative batch sizes would make the drain loop take nothing, so
 * they are replaced by the default rather than rejected.
 */
export function normalizeBatchSize(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value < 1) return DEFAULT_BATCH_SIZE;
  return Math.floor(value);
}

/**
 * Non-finite intervals fall back to the default, negative ones mean 0 and
 * anything past the timer limit is clamped to it.
 */
export function normalizeFlushInterval(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return DEFAULT_FLUSH_INTERVAL_SECONDS;
  return Math.min(Math.max(0, value), MAX_FLUSH_INTERVAL_SECONDS);
}

/**
 * Dispatcher configuration. Every field falls back to its default when the
 * supplied value is missing or invalid; loading never fails.
 */
export const dispatcherConfigSchema = z.object({
  batchSize: z.coerce.number().catch(DEFAULT_BATCH_SIZE).transform(normalizeBatchSize),
  /** 0 = no periodic timer, flush on every dispatch. */
  flushIntervalSeconds: z.coerce
    .number()
    .finite()
    .min(0)
    .catch(DEFAULT_FLUSH_INTERVAL_SECONDS)
    .transform(normalizeFlushInterval),
  maxQueueSize: z.coerce.number().int().positive().catch(DEFAULT_MAX_QUEUE_SIZE),
  backendKind: z.enum(['memory', 'file', 'preferences']).catch('file'),
  storeIdentifier: z.string().trim().min(1).catch(DEFAULT_STORE_IDENTIFIER),
  queueDirectory: z.string().min(1).catch(() => resolve(process.cwd(), 'data')),
  /** Custom default destination; unset means the built-in endpoint. */
  endpoint: z.string().url().optional().catch(undefined),
  sendTimeoutMs: z.coerce.number().int().positive().catch(DEFAULT_SEND_TIMEOUT_MS),
  redisUrl: z.string().min(1).catch(DEFAULT_REDIS_URL),
});

export type DispatcherConfig = z.infer<typeof dispatcherConfigSchema>;

/**
 * Reads the dispatcher configuration from environment variables.
 * Blank values count as unset.
 */
export function loadDispatcherConfig(env: NodeJS.ProcessEnv = process.env): DispatcherConfig {
  const read = (key: string): string | undefined => {
    const value = env[key]?.trim();
    return value === '' ? undefined : value;
  };

  return dispatcherConfigSchema.parse({
    batchSize: read('EVENT_BATCH_SIZE'),
    flushIntervalSeconds: read('EVENT_FLUSH_INTERVAL_SECONDS'),
    maxQueueSize: read('EVENT_MAX_QUEUE_SIZE'),
    backendKind: read('EVENT_QUEUE_BACKEND'),
    storeIdentifier: read('EVENT_QUEUE_NAME'),
    queueDirectory: read('EVENT_QUEUE_DIR'),
    endpoint: read('EVENT_ENDPOINT'),
    sendTimeoutMs: read('EVENT_SEND_TIMEOUT_MS'),
    redisUrl: read('REDIS_URL'),
  });
}
