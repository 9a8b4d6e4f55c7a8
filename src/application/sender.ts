import type { SendResult } from '../domain/index.js';

/**
 * Performs one network attempt for one batch.
 *
 * Owns its own timeouts and transport-level retries; the dispatcher treats a
 * rejected promise the same as `{ ok: false }`.
 */
export interface Sender {
  send(destination: string, payload: Uint8Array): Promise<SendResult>;
}
