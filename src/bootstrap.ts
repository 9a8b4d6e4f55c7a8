import type { Logger } from 'pino';
import { DestinationStore, EventDispatcher, sharedDestinations } from './application/index.js';
import type { DispatcherConfig, Sender } from './application/index.js';
import { createHttpSender, createStore } from './infrastructure/index.js';
import type { PreferenceClient, StoreConfig } from './infrastructure/index.js';

export interface BootstrapDeps {
  log: Logger;
  /** Defaults to the HTTP sender with the configured timeout. */
  sender?: Sender;
  /** Required when `backendKind` is `preferences`. */
  preferenceClient?: PreferenceClient;
  /** Defaults to the process-wide cell. */
  destinations?: DestinationStore;
}

function storeConfigFor(config: DispatcherConfig, preferenceClient: PreferenceClient | undefined): StoreConfig {
  switch (config.backendKind) {
    case 'memory':
      return { kind: 'memory', name: config.storeIdentifier };
    case 'file':
      return { kind: 'file', name: config.storeIdentifier, directory: config.queueDirectory };
    case 'preferences':
      if (preferenceClient === undefined) {
        throw new Error('The preferences backend needs a preference client');
      }
      return { kind: 'preferences', name: config.storeIdentifier, client: preferenceClient };
  }
}

/**
 * Wires a dispatcher from loaded configuration: picks the backing store,
 * applies the configured default destination and opens the queue.
 */
export async function createDispatcherFromConfig(
  config: DispatcherConfig,
  deps: BootstrapDeps,
): Promise<EventDispatcher> {
  const destinations = deps.destinations ?? sharedDestinations;
  if (config.endpoint !== undefined) destinations.set(config.endpoint);

  const store = createStore(storeConfigFor(config, deps.preferenceClient), deps.log);
  const sender = deps.sender ?? createHttpSender({ log: deps.log, timeoutMs: config.sendTimeoutMs });

  return EventDispatcher.open({
    store,
    sender,
    log: deps.log,
    batchSize: config.batchSize,
    flushIntervalSeconds: config.flushIntervalSeconds,
    maxQueueSize: config.maxQueueSize,
    destinations,
  });
}
