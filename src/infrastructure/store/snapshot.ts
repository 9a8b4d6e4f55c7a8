import { z } from 'zod';

/**
 * On-disk / preference representation of a queue: a plain JSON array of
 * base64-encoded record blobs. There is no version envelope, so snapshots
 * written by earlier revisions stay readable.
 */
const snapshotSchema = z.array(z.string());

export function encodeSnapshot(items: readonly Uint8Array[]): string {
  return JSON.stringify(items.map((item) => Buffer.from(item).toString('base64')));
}

/**
 * Parses a snapshot. Throws on malformed JSON or a non-array document;
 * callers decide how to surface that.
 */
export function decodeSnapshot(content: string): Uint8Array[] {
  if (content.trim() === '') return [];
  const blobs = snapshotSchema.parse(JSON.parse(content));
  return blobs.map((blob) => new Uint8Array(Buffer.from(blob, 'base64')));
}
