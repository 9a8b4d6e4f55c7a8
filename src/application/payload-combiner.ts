/**
 * Merges the payloads of one batch into a single request body.
 * Returns `null` to decline, in which case the batch shrinks to its head record.
 */
export type PayloadCombiner = (payloads: readonly Uint8Array[]) => Uint8Array | null;

const decoder = new TextDecoder('utf-8', { fatal: true });
const encoder = new TextEncoder();

/**
 * Default combiner: a batch of JSON payloads becomes one JSON array of those
 * documents, in order. Any payload that is not valid UTF-8 JSON (an empty
 * body included) makes it decline.
 */
export const combineJsonPayloads: PayloadCombiner = (payloads) => {
  const [first] = payloads;
  if (first === undefined) return null;
  if (payloads.length === 1) return first;

  const documents: unknown[] = [];
  for (const payload of payloads) {
    try {
      documents.push(JSON.parse(decoder.decode(payload)));
    } catch {
      return null;
    }
  }

  return encoder.encode(JSON.stringify(documents));
};
