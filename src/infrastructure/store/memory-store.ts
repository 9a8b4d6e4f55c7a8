import type { PersistentStore } from './types.js';

/**
 * Process-lifetime store. Nothing survives a restart.
 */
export class MemoryStore implements PersistentStore {
  readonly kind = 'memory' as const;
  readonly name: string;
  private items: Uint8Array[] = [];

  constructor(name: string) {
    this.name = name;
  }

  async save(items: readonly Uint8Array[]): Promise<void> {
    this.items = [...items];
  }

  async load(): Promise<Uint8Array[]> {
    return [...this.items];
  }

  async clear(): Promise<void> {
    this.items = [];
  }
}
