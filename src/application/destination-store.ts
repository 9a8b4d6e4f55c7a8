import type { EventRecord } from '../domain/index.js';

/** Collector endpoint used when nothing more specific is configured. */
export const DEFAULT_EVENT_ENDPOINT = 'https://events.example.com/v1/events';

/**
 * Holds the process-wide custom default destination.
 *
 * `get()`/`set()` are synchronous single-value operations, so a reader
 * always sees either the old or the new value. The dispatcher reads it when
 * an event is dispatched, so a new default applies to later dispatches
 * only. `resolve()` covers stored records that carry no destination.
 */
export class DestinationStore {
  private custom: string | undefined;
  private readonly fallback: string;

  constructor(fallback: string = DEFAULT_EVENT_ENDPOINT) {
    this.fallback = fallback;
  }

  /** Current default: the custom value if set, else the built-in one. */
  get(): string {
    return this.custom ?? this.fallback;
  }

  /** Replaces the custom default. `undefined` reverts to the built-in one. */
  set(next: string | undefined): void {
    this.custom = next;
  }

  /** Per-event override, else the current default. */
  resolve(record: EventRecord): string {
    return record.destination ?? this.get();
  }
}

/** Shared cell used by dispatchers that are not handed their own. */
export const sharedDestinations = new DestinationStore();
