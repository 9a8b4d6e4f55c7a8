/**
 * Core domain types for the event dispatch pipeline.
 *
 * These types describe a queued unit of telemetry as it flows from
 * `dispatch()` through the durable queue to the Sender. They carry no
 * framework dependencies.
 */

/** Encoded analytics body, usually a JSON document. */
export type EventPayload = Uint8Array;

/**
 * One unit of telemetry queued for delivery.
 *
 * `destination` is filled in by the dispatcher with the default current at
 * dispatch time. Only records stored without one by older revisions resolve
 * the default when their batch is built.
 *
 * `id` is assigned by the dispatcher so a completion callback can be matched
 * to the network attempt that carries the record. Records persisted by older
 * revisions have no id.
 */
export interface EventRecord {
  readonly payload: EventPayload;
  readonly destination?: string | undefined;
  readonly id?: string | undefined;
}

/** Outcome of one network attempt. */
export type SendResult =
  | { readonly ok: true; readonly response: Uint8Array }
  | { readonly ok: false; readonly error: Error };

/**
 * Invoked exactly once per dispatched event with the outcome of the first
 * network attempt that included it.
 */
export type DispatchCompletion = (result: SendResult) => void;
