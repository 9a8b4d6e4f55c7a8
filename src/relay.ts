#!/usr/bin/env node
import { createInterface } from 'node:readline';
import pino from 'pino';
import type { Redis } from 'ioredis';
import { loadDispatcherConfig } from './application/index.js';
import type { EventDispatcher } from './application/index.js';
import { createPreferenceClient } from './infrastructure/index.js';
import { createDispatcherFromConfig } from './bootstrap.js';

/**
 * Standalone relay process.
 *
 * Reads newline-delimited encoded events from stdin and dispatches each one
 * through a durable queue to the configured collector. Events that could not
 * be delivered before exit stay in the queue and go out on the next run.
 *
 * Configuration comes from the environment (see loadDispatcherConfig).
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

const config = loadDispatcherConfig();

let redis: Redis | null = null;
let dispatcher: EventDispatcher | null = null;
let shuttingDown = false;

async function main(): Promise<void> {
  if (config.backendKind === 'preferences') {
    redis = createPreferenceClient(config.redisUrl);
    await redis.connect();
    log.info('Redis connected');
  }

  const active = await createDispatcherFromConfig(config, {
    log,
    preferenceClient: redis ?? undefined,
  });
  dispatcher = active;

  const lines = createInterface({ input: process.stdin, crlfDelay: Infinity });
  const encoder = new TextEncoder();

  lines.on('line', (line: string) => {
    const body = line.trim();
    if (body === '') return;

    active.dispatch({ payload: encoder.encode(body) }, (result) => {
      if (!result.ok) {
        log.debug({ err: result.error }, 'Event not delivered yet, kept for retry');
      }
    });
  });

  lines.on('close', () => {
    log.info('Input closed');
    void shutdown(0);
  });
}

// Graceful shutdown: stop the timer, give queued events one last flush,
// then release the store connection.
async function shutdown(code: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info('Shutting down relay...');

  // A send that never completes would hold close() forever.
  setTimeout(() => {
    log.warn('Shutdown timed out, exiting with events still queued');
    process.exit(code);
  }, 5000).unref();

  try {
    await dispatcher?.close();
  } catch (err: unknown) {
    log.error({ err }, 'Dispatcher close failed');
  }

  if (redis) {
    await redis.quit().catch((err: unknown) => {
      log.warn({ err }, 'Redis quit failed');
    });
  }

  process.exit(code);
}

process.on('SIGINT', () => void shutdown(0));
process.on('SIGTERM', () => void shutdown(0));

main().catch((err: unknown) => {
  log.fatal({ err }, 'Relay crashed');
  process.exit(1);
});
