import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_FLUSH_INTERVAL_SECONDS,
  DEFAULT_MAX_QUEUE_SIZE,
  DEFAULT_REDIS_URL,
  DEFAULT_SEND_TIMEOUT_MS,
  MAX_FLUSH_INTERVAL_SECONDS,
  loadDispatcherConfig,
  normalizeBatchSize,
  normalizeFlushInterval,
} from '../../src/application/index.js';

describe('normalizeBatchSize', () => {
  it('keeps positive sizes', () => {
    expect(normalizeBatchSize(1)).toBe(1);
    expect(normalizeBatchSize(25)).toBe(25);
  });

  it('floors fractional sizes', () => {
    expect(normalizeBatchSize(2.7)).toBe(2);
  });

  it('replaces zero, negative and missing sizes with the default', () => {
    expect(normalizeBatchSize(0)).toBe(DEFAULT_BATCH_SIZE);
    expect(normalizeBatchSize(-4)).toBe(DEFAULT_BATCH_SIZE);
    expect(normalizeBatchSize(0.5)).toBe(DEFAULT_BATCH_SIZE);
    expect(normalizeBatchSize(Number.NaN)).toBe(DEFAULT_BATCH_SIZE);
    expect(normalizeBatchSize(undefined)).toBe(DEFAULT_BATCH_SIZE);
  });
});

describe('loadDispatcherConfig', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadDispatcherConfig({})).toEqual({
      batchSize: DEFAULT_BATCH_SIZE,
      flushIntervalSeconds: DEFAULT_FLUSH_INTERVAL_SECONDS,
      maxQueueSize: DEFAULT_MAX_QUEUE_SIZE,
      backendKind: 'file',
      storeIdentifier: 'EventQueue',
      queueDirectory: resolve(process.cwd(), 'data'),
      endpoint: undefined,
      sendTimeoutMs: DEFAULT_SEND_TIMEOUT_MS,
      redisUrl: DEFAULT_REDIS_URL,
    });
  });

  it('reads every variable', () => {
    const config = loadDispatcherConfig({
      EVENT_BATCH_SIZE: '5',
      EVENT_FLUSH_INTERVAL_SECONDS: '2.5',
      EVENT_MAX_QUEUE_SIZE: '100',
      EVENT_QUEUE_BACKEND: 'preferences',
      EVENT_QUEUE_NAME: 'impressions',
      EVENT_QUEUE_DIR: '/var/lib/events',
      EVENT_ENDPOINT: 'https://collector.test/v1/events',
      EVENT_SEND_TIMEOUT_MS: '2500',
      REDIS_URL: 'redis://cache:6379',
    });

    expect(config).toEqual({
      batchSize: 5,
      flushIntervalSeconds: 2.5,
      maxQueueSize: 100,
      backendKind: 'preferences',
      storeIdentifier: 'impressions',
      queueDirectory: '/var/lib/events',
      endpoint: 'https://collector.test/v1/events',
      sendTimeoutMs: 2500,
      redisUrl: 'redis://cache:6379',
    });
  });

  it('coerces a non-positive batch size to the default', () => {
    expect(loadDispatcherConfig({ EVENT_BATCH_SIZE: '0' }).batchSize).toBe(DEFAULT_BATCH_SIZE);
    expect(loadDispatcherConfig({ EVENT_BATCH_SIZE: '-3' }).batchSize).toBe(DEFAULT_BATCH_SIZE);
  });

  it('accepts a zero flush interval as immediate mode', () => {
    expect(loadDispatcherConfig({ EVENT_FLUSH_INTERVAL_SECONDS: '0' }).flushIntervalSeconds).toBe(0);
  });

  it('clamps a flush interval past the timer limit', () => {
    const config = loadDispatcherConfig({ EVENT_FLUSH_INTERVAL_SECONDS: '3000000' });

    expect(config.flushIntervalSeconds).toBe(MAX_FLUSH_INTERVAL_SECONDS);
    expect(MAX_FLUSH_INTERVAL_SECONDS).toBe(2_147_483);
  });

  it('falls back to the default flush interval for NaN and Infinity', () => {
    expect(loadDispatcherConfig({ EVENT_FLUSH_INTERVAL_SECONDS: 'NaN' }).flushIntervalSeconds).toBe(
      DEFAULT_FLUSH_INTERVAL_SECONDS,
    );
    expect(loadDispatcherConfig({ EVENT_FLUSH_INTERVAL_SECONDS: 'Infinity' }).flushIntervalSeconds).toBe(
      DEFAULT_FLUSH_INTERVAL_SECONDS,
    );
  });

  it('treats blank values as unset', () => {
    const config = loadDispatcherConfig({ EVENT_FLUSH_INTERVAL_SECONDS: '  ', EVENT_QUEUE_NAME: '' });

    expect(config.flushIntervalSeconds).toBe(DEFAULT_FLUSH_INTERVAL_SECONDS);
    expect(config.storeIdentifier).toBe('EventQueue');
  });

  it('falls back per field on invalid values', () => {
    const config = loadDispatcherConfig({
      EVENT_BATCH_SIZE: 'many',
      EVENT_FLUSH_INTERVAL_SECONDS: '-1',
      EVENT_MAX_QUEUE_SIZE: '0',
      EVENT_QUEUE_BACKEND: 'sqlite',
      EVENT_ENDPOINT: 'not a url',
      EVENT_SEND_TIMEOUT_MS: 'soon',
    });

    expect(config.batchSize).toBe(DEFAULT_BATCH_SIZE);
    expect(config.flushIntervalSeconds).toBe(DEFAULT_FLUSH_INTERVAL_SECONDS);
    expect(config.maxQueueSize).toBe(DEFAULT_MAX_QUEUE_SIZE);
    expect(config.backendKind).toBe('file');
    expect(config.endpoint).toBeUndefined();
    expect(config.sendTimeoutMs).toBe(DEFAULT_SEND_TIMEOUT_MS);
  });
});

describe('normalizeFlushInterval', () => {
  it('keeps intervals within the timer range', () => {
    expect(normalizeFlushInterval(0)).toBe(0);
    expect(normalizeFlushInterval(2.5)).toBe(2.5);
  });

  it('maps negative intervals to 0', () => {
    expect(normalizeFlushInterval(-5)).toBe(0);
  });

  it('replaces missing and non-finite intervals with the default', () => {
    expect(normalizeFlushInterval(undefined)).toBe(DEFAULT_FLUSH_INTERVAL_SECONDS);
    expect(normalizeFlushInterval(Number.NaN)).toBe(DEFAULT_FLUSH_INTERVAL_SECONDS);
    expect(normalizeFlushInterval(Number.POSITIVE_INFINITY)).toBe(DEFAULT_FLUSH_INTERVAL_SECONDS);
  });

  it('clamps to the longest delay a timer can hold', () => {
    expect(normalizeFlushInterval(3_000_000)).toBe(MAX_FLUSH_INTERVAL_SECONDS);
  });
});
