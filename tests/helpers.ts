import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Sender } from '../src/application/index.js';
import type { SendResult } from '../src/domain/index.js';
import type { PreferenceClient } from '../src/infrastructure/index.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function bytes(text: string): Uint8Array {
  return encoder.encode(text);
}

export function text(data: Uint8Array): string {
  return decoder.decode(data);
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
  } as unknown as Logger;
}

export interface SentBatch {
  destination: string;
  payload: Uint8Array;
}

export type Responder = (call: SentBatch, index: number) => SendResult | Promise<SendResult>;

export const succeed: Responder = () => ({ ok: true, response: new Uint8Array() });

export const fail: Responder = (call) => ({ ok: false, error: new Error(`rejected by ${call.destination}`) });

/** Sender that records every batch and answers through `respond`. */
export class RecordingSender implements Sender {
  readonly calls: SentBatch[] = [];
  respond: Responder;

  constructor(respond: Responder = succeed) {
    this.respond = respond;
  }

  async send(destination: string, payload: Uint8Array): Promise<SendResult> {
    const call = { destination, payload };
    this.calls.push(call);
    return this.respond(call, this.calls.length - 1);
  }

  get payloads(): string[] {
    return this.calls.map((call) => text(call.payload));
  }
}

/** In-process stand-in for the Redis preference client. */
export class MapPreferenceClient implements PreferenceClient {
  readonly data = new Map<string, string>();
  failing = false;

  async get(key: string): Promise<string | null> {
    if (this.failing) throw new Error('connection refused');
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<'OK'> {
    if (this.failing) throw new Error('connection refused');
    this.data.set(key, value);
    return 'OK';
  }

  async del(key: string): Promise<number> {
    if (this.failing) throw new Error('connection refused');
    return this.data.delete(key) ? 1 : 0;
  }
}

/** A promise plus the functions that settle it, for holding a send open. */
export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
