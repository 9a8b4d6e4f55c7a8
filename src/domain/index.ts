export type { EventRecord, EventPayload, SendResult, DispatchCompletion } from './event-record.js';
export { StoreIOError, SendFailureError, QueueFullError } from './errors.js';
