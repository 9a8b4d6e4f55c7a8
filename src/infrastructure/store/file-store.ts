import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { StoreIOError } from '../../domain/index.js';
import { decodeSnapshot, encodeSnapshot } from './snapshot.js';
import type { PersistentStore } from './types.js';

export interface FileStoreOptions {
  /** Directory holding one snapshot file per queue. */
  directory: string;
  /** Logical queue name; becomes the file name. */
  name: string;
  log: Logger;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Maps a store identifier to a file name inside the queue directory.
 * Characters outside `[A-Za-z0-9_-]` become `%` plus four hex digits, so
 * distinct identifiers never share a file and none can leave the directory.
 */
export function queueFileName(name: string): string {
  return name.replace(/[^A-Za-z0-9_-]/g, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase().padStart(4, '0')}`);
}

/**
 * File-backed store.
 *
 * Every save rewrites the whole snapshot: the new content goes to a unique
 * temp file which is then renamed over the target, so a crash mid-write
 * leaves the previous snapshot intact.
 */
export class FileStore implements PersistentStore {
  readonly kind = 'file' as const;
  readonly name: string;
  readonly path: string;
  private readonly directory: string;
  private readonly log: Logger;
  private writeSeq = 0;

  constructor(options: FileStoreOptions) {
    this.name = options.name;
    this.directory = options.directory;
    this.path = join(options.directory, queueFileName(options.name));
    this.log = options.log;
  }

  async load(): Promise<Uint8Array[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        this.log.debug({ path: this.path }, 'No queue file yet, starting empty');
        return [];
      }
      this.log.error({ err: new StoreIOError(this.name, 'load', err), path: this.path }, 'Failed to read queue file');
      return [];
    }

    try {
      return decodeSnapshot(content);
    } catch (err: unknown) {
      this.log.error({ err: new StoreIOError(this.name, 'load', err), path: this.path }, 'Queue file is corrupt, starting empty');
      return [];
    }
  }

  async save(items: readonly Uint8Array[]): Promise<void> {
    this.writeSeq++;
    const tempPath = `${this.path}.${process.pid}.${this.writeSeq}.tmp`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tempPath, encodeSnapshot(items), 'utf-8');
      await rename(tempPath, this.path);
    } catch (err: unknown) {
      this.log.error(
        { err: new StoreIOError(this.name, 'save', err), path: this.path, count: items.length },
        'Failed to write queue file, snapshot dropped',
      );
      await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        this.log.warn({ err: cleanupErr, tempPath }, 'Failed to remove temp queue file');
      });
    }
  }

  async clear(): Promise<void> {
    try {
      await rm(this.path, { force: true });
    } catch (err: unknown) {
      this.log.error({ err: new StoreIOError(this.name, 'clear', err), path: this.path }, 'Failed to remove queue file');
    }
  }
}
