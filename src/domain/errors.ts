/**
 * Raised (and only ever logged) when a backing store read, write or clear fails.
 * The pipeline treats it as an empty load or a dropped write.
 */
export class StoreIOError extends Error {
  readonly store: string;
  readonly operation: 'load' | 'save' | 'clear';

  constructor(store: string, operation: 'load' | 'save' | 'clear', cause: unknown) {
    super(`Store "${store}" failed to ${operation}`, { cause });
    this.name = 'StoreIOError';
    this.store = store;
    this.operation = operation;
  }
}

/** Network or transport failure for one batch. */
export class SendFailureError extends Error {
  readonly destination: string;

  constructor(destination: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SendFailureError';
    this.destination = destination;
  }
}

/** The queue already holds `maxQueueSize` records; the event was not stored. */
export class QueueFullError extends Error {
  readonly maxQueueSize: number;

  constructor(maxQueueSize: number) {
    super(`Event queue is full (${maxQueueSize} records), event dropped`);
    this.name = 'QueueFullError';
    this.maxQueueSize = maxQueueSize;
  }
}
