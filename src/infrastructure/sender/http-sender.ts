import type { Logger } from 'pino';
import type { SendResult } from '../../domain/index.js';
import { SendFailureError } from '../../domain/index.js';
import type { Sender } from '../../application/sender.js';

export interface HttpSenderOptions {
  log: Logger;
  /** Per-request timeout. The dispatcher itself never times a send out. */
  timeoutMs: number;
  fetchFn?: typeof fetch;
  headers?: Record<string, string>;
}

/**
 * Sender that POSTs each batch payload to its destination.
 *
 * A 2xx response is a success carrying the response body; any other status,
 * a network error or a timeout is a failure. Never throws.
 */
export function createHttpSender(options: HttpSenderOptions): Sender {
  const fetchFn = options.fetchFn ?? fetch;
  const { log, timeoutMs } = options;

  return {
    async send(destination: string, payload: Uint8Array): Promise<SendResult> {
      try {
        const response = await fetchFn(destination, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', ...options.headers },
          body: payload,
          signal: AbortSignal.timeout(timeoutMs),
        });

        if (!response.ok) {
          log.warn({ status: response.status, destination }, 'Collector returned non-OK status');
          return {
            ok: false,
            error: new SendFailureError(destination, `Collector responded with status ${response.status}`),
          };
        }

        const body = new Uint8Array(await response.arrayBuffer());
        log.debug({ status: response.status, destination, bytes: payload.byteLength }, 'Batch delivered');
        return { ok: true, response: body };
      } catch (err: unknown) {
        log.warn({ err, destination }, 'Failed to send batch');
        return { ok: false, error: new SendFailureError(destination, 'Request to collector failed', err) };
      }
    },
  };
}
