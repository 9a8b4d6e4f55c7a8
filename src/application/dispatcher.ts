import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { DispatchCompletion, EventRecord, SendResult } from '../domain/index.js';
import { QueueFullError, SendFailureError } from '../domain/index.js';
import type { PersistentStore } from '../infrastructure/store/index.js';
import { sharedDestinations } from './destination-store.js';
import type { DestinationStore } from './destination-store.js';
import { DEFAULT_MAX_QUEUE_SIZE, normalizeBatchSize } from './dispatcher-config.js';
import { EventQueue } from './event-queue.js';
import { ExclusiveLock } from './exclusive-lock.js';
import { FlushScheduler } from './flush-scheduler.js';
import { combineJsonPayloads } from './payload-combiner.js';
import type { PayloadCombiner } from './payload-combiner.js';
import type { Sender } from './sender.js';

export interface EventDispatcherOptions {
  store: PersistentStore;
  sender: Sender;
  log: Logger;
  /** Records per network attempt. Values below 1 fall back to the default. */
  batchSize?: number;
  /**
   * 0 disables the timer and flushes on every dispatch. Non-finite values
   * fall back to the default; values past the timer limit are clamped.
   */
  flushIntervalSeconds?: number;
  maxQueueSize?: number;
  /** Defaults to the process-wide `sharedDestinations` cell. */
  destinations?: DestinationStore;
  combinePayloads?: PayloadCombiner;
}

/** One network attempt's worth of records. */
interface Batch {
  readonly records: readonly EventRecord[];
  readonly destination: string;
  readonly payload: Uint8Array;
}

/**
 * Owns the durable queue and the flush timer, and drives the drain loop.
 *
 * Concurrency model:
 * - Every queue mutation and the "flush in progress" flag live behind one
 *   ExclusiveLock.
 * - The Sender is called outside the lock, so dispatches keep appending
 *   while a batch is on the wire; batches of one flush still go out one at
 *   a time, oldest first.
 * - A record leaves the queue only after the Sender reported success for
 *   its batch. A failed batch stops the drain and waits for the next trigger
 *   (timer tick, dispatch in immediate mode, or manual flush).
 *
 * State: Idle → Flushing (→ Sending → Flushing)* → Idle. The loop re-checks
 * the queue after every batch, so records appended mid-flush are drained by
 * the same flush.
 */
export class EventDispatcher {
  private readonly queue: EventQueue;
  private readonly sender: Sender;
  private readonly log: Logger;
  private readonly destinations: DestinationStore;
  private readonly combinePayloads: PayloadCombiner;
  private readonly scheduler: FlushScheduler;
  private readonly lock = new ExclusiveLock();
  private readonly completions = new Map<string, DispatchCompletion>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly maxQueueSize: number;
  private readonly batchSizeValue: number;
  private flushing = false;
  private activeFlush: Promise<void> | undefined;
  private foreground = true;

  private constructor(queue: EventQueue, options: EventDispatcherOptions) {
    this.queue = queue;
    this.sender = options.sender;
    this.log = options.log;
    this.destinations = options.destinations ?? sharedDestinations;
    this.combinePayloads = options.combinePayloads ?? combineJsonPayloads;
    this.batchSizeValue = normalizeBatchSize(options.batchSize);
    this.maxQueueSize = options.maxQueueSize ?? DEFAULT_MAX_QUEUE_SIZE;

    this.scheduler = new FlushScheduler(options.flushIntervalSeconds, () => this.onTimerTick(), this.log);
    this.scheduler.start();
  }

  /**
   * Opens the backing store, loads any records a previous process left
   * behind and starts the flush timer.
   */
  static async open(options: EventDispatcherOptions): Promise<EventDispatcher> {
    const queue = await EventQueue.open(options.store, options.log);
    const dispatcher = new EventDispatcher(queue, options);
    options.log.info(
      {
        store: options.store.name,
        backend: options.store.kind,
        queued: queue.count,
        batchSize: dispatcher.batchSize,
        flushIntervalSeconds: dispatcher.flushIntervalSeconds,
      },
      'Event dispatcher ready',
    );
    return dispatcher;
  }

  get batchSize(): number {
    return this.batchSizeValue;
  }

  get flushIntervalSeconds(): number {
    return this.scheduler.interval;
  }

  get count(): number {
    return this.queue.count;
  }

  get eventQueue(): EventQueue {
    return this.queue;
  }

  get isFlushing(): boolean {
    return this.flushing;
  }

  get timerRunning(): boolean {
    return this.scheduler.running;
  }

  get defaultDestination(): string {
    return this.destinations.get();
  }

  setDefaultDestination(url: string | undefined): void {
    this.destinations.set(url);
  }

  /**
   * Appends `event` to the durable queue and returns without waiting for the
   * network. `completion` fires exactly once with the outcome of the first
   * attempt that carries the event.
   */
  dispatch(event: EventRecord, completion?: DispatchCompletion): void {
    const id = randomUUID();
    const record: EventRecord = {
      payload: new Uint8Array(event.payload),
      destination: event.destination ?? this.destinations.get(),
      id,
    };

    const appended = this.lock.runExclusive(async () => {
      if (this.queue.count >= this.maxQueueSize) {
        this.log.warn({ count: this.queue.count, maxQueueSize: this.maxQueueSize }, 'Event queue full, dropping event');
        this.notify(completion, { ok: false, error: new QueueFullError(this.maxQueueSize) });
        return false;
      }

      if (completion !== undefined) this.completions.set(id, completion);
      await this.queue.save(record);
      this.log.debug({ id, count: this.queue.count }, 'Event queued');
      return true;
    });

    this.track(
      appended.then((stored) => {
        if (stored && this.immediateMode) return this.flush();
        return undefined;
      }),
    );
  }

  /**
   * Drains the queue batch by batch. A call made while a flush is running
   * returns that flush instead of starting a second one.
   */
  flush(): Promise<void> {
    if (this.flushing && this.activeFlush !== undefined) return this.activeFlush;

    this.flushing = true;
    const run = this.drain();
    this.activeFlush = run;
    void run.finally(() => {
      if (this.activeFlush === run) this.activeFlush = undefined;
    });
    return run;
  }

  /** (Re)arms the periodic timer when the interval is positive. */
  onForeground(): void {
    this.foreground = true;
    this.scheduler.start();
  }

  /** Disarms the timer. A flush already running is left to finish. */
  onBackground(): void {
    this.foreground = false;
    this.scheduler.stop();
  }

  setFlushInterval(seconds: number): void {
    this.scheduler.reschedule(seconds);
    if (this.foreground) this.scheduler.start();
  }

  /**
   * Drops every queued record. Pending completions of dropped records are
   * failed so each still fires exactly once.
   */
  async clear(): Promise<void> {
    await this.lock.runExclusive(async () => {
      await this.queue.clear();
      const dropped = [...this.completions.values()];
      this.completions.clear();
      for (const completion of dropped) {
        this.notify(completion, { ok: false, error: new Error('Event queue cleared before delivery') });
      }
      this.log.info({ store: this.queue.storeName, dropped: dropped.length }, 'Event queue cleared');
    });
  }

  /** Resolves once no flush, append or snapshot write is in flight. */
  async settle(): Promise<void> {
    while (this.inFlight.size > 0 || this.activeFlush !== undefined || this.lock.busy) {
      await Promise.all([...this.inFlight, this.activeFlush, this.lock.idle()]);
    }
    await this.queue.persisted();
  }

  /** Stops the timer, attempts a final flush and waits for everything to settle. */
  async close(): Promise<void> {
    this.onBackground();
    await this.flush();
    await this.settle();
    this.log.info({ remaining: this.queue.count }, 'Event dispatcher closed');
  }

  private get immediateMode(): boolean {
    return this.batchSizeValue === 1 || this.scheduler.interval === 0;
  }

  private onTimerTick(): void {
    if (this.queue.count === 0) return;
    this.track(this.flush());
  }

  private async drain(): Promise<void> {
    let sent = 0;
    try {
      for (;;) {
        const batch = await this.lock.runExclusive(() => this.nextBatch());
        if (batch === null) break;

        const result = await this.send(batch);
        this.completeBatch(batch, result);

        if (!result.ok) {
          await this.lock.runExclusive(() => {
            this.flushing = false;
          });
          this.log.warn(
            { err: result.error, destination: batch.destination, batch: batch.records.length, queued: this.queue.count },
            'Batch send failed, events left queued',
          );
          return;
        }

        await this.lock.runExclusive(() => this.queue.removeFirstItems(batch.records));
        sent += batch.records.length;
      }
    } catch (err: unknown) {
      this.flushing = false;
      this.log.error({ err, sent }, 'Flush aborted');
      return;
    }

    if (sent > 0) this.log.debug({ sent }, 'Flush drained queue');
  }

  /**
   * Builds the next batch from the head of the queue, or clears the flushing
   * flag and returns null when the queue is empty. Runs under the lock.
   *
   * A batch covers the leading run of head records that resolve to the same
   * destination. If the combiner declines, only the head record goes out.
   */
  private nextBatch(): Batch | null {
    const head = this.queue.getFirstItems(this.batchSizeValue);
    const [first] = head;
    if (first === undefined) {
      this.flushing = false;
      return null;
    }

    const destination = this.destinations.resolve(first);
    const run: EventRecord[] = [];
    for (const record of head) {
      if (this.destinations.resolve(record) !== destination) break;
      run.push(record);
    }

    if (run.length > 1) {
      const combined = this.combinePayloads(run.map((record) => record.payload));
      if (combined !== null) return { records: run, destination, payload: combined };
      this.log.debug({ candidates: run.length }, 'Payloads not combinable, sending head event alone');
    }

    return { records: [first], destination, payload: first.payload };
  }

  private async send(batch: Batch): Promise<SendResult> {
    this.log.debug({ destination: batch.destination, batch: batch.records.length }, 'Sending batch');
    try {
      return await this.sender.send(batch.destination, batch.payload);
    } catch (err: unknown) {
      return { ok: false, error: new SendFailureError(batch.destination, 'Sender rejected the batch', err) };
    }
  }

  private completeBatch(batch: Batch, result: SendResult): void {
    for (const record of batch.records) {
      if (record.id === undefined) continue;
      const completion = this.completions.get(record.id);
      if (completion === undefined) continue;
      this.completions.delete(record.id);
      this.notify(completion, result);
    }
  }

  private notify(completion: DispatchCompletion | undefined, result: SendResult): void {
    if (completion === undefined) return;
    try {
      completion(result);
    } catch (err: unknown) {
      this.log.warn({ err }, 'Dispatch completion handler threw');
    }
  }

  private track(task: Promise<unknown>): void {
    const tracked = task.then(
      () => undefined,
      (err: unknown) => {
        this.log.error({ err }, 'Background dispatch task failed');
      },
    );
    this.inFlight.add(tracked);
    void tracked.finally(() => this.inFlight.delete(tracked));
  }
}
