/** Which durability mechanism backs a queue. */
export type BackendKind = 'memory' | 'file' | 'preferences';

/**
 * Durable storage for an ordered sequence of encoded records.
 *
 * Implementations never reject: I/O failures are logged and degrade to an
 * empty load or a dropped write.
 */
export interface PersistentStore {
  readonly kind: BackendKind;
  readonly name: string;
  save(items: readonly Uint8Array[]): Promise<void>;
  load(): Promise<Uint8Array[]>;
  clear(): Promise<void>;
}
