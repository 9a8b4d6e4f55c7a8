import { z } from 'zod';
import type { EventRecord } from '../../domain/index.js';

/**
 * Wire shape of one stored record. `url` and `id` are optional so blobs
 * written before either field existed still decode; unknown keys are dropped.
 */
const storedRecordSchema = z.object({
  url: z.string().nullish(),
  body: z.string(),
  id: z.string().nullish(),
});

export function encodeRecord(record: EventRecord): Uint8Array {
  const stored: z.input<typeof storedRecordSchema> = {
    body: Buffer.from(record.payload).toString('base64'),
  };
  if (record.destination !== undefined) stored.url = record.destination;
  if (record.id !== undefined) stored.id = record.id;
  return new Uint8Array(Buffer.from(JSON.stringify(stored), 'utf-8'));
}

/** Decodes one blob. Throws if the blob is not a stored record. */
export function decodeRecord(blob: Uint8Array): EventRecord {
  const parsed = storedRecordSchema.parse(JSON.parse(Buffer.from(blob).toString('utf-8')));
  return {
    payload: new Uint8Array(Buffer.from(parsed.body, 'base64')),
    destination: parsed.url ?? undefined,
    id: parsed.id ?? undefined,
  };
}
