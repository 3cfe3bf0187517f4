/**
 * chunkframe — byte stores
 *
 * Where an engine's table files live. FileStore maps paths onto the local
 * filesystem; MemoryStore keeps whole files in a Map for in-process tables
 * and tests.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { TableIOError } from './errors';

export interface TableStore {
  /** @throws TableIOError when nothing readable exists at `path`. */
  read(path: string): Uint8Array;
  write(path: string, bytes: Uint8Array): void;
}

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ─── FileStore ────────────────────────────────────────────────────────────────

export class FileStore implements TableStore {
  /**
   * @param root  Relative paths resolve against this directory.
   *              Defaults to the process working directory.
   */
  constructor(private readonly root: string = process.cwd()) {}

  resolve(path: string): string {
    return resolve(this.root, path);
  }

  read(path: string): Uint8Array {
    const full = this.resolve(path);
    try {
      return readFileSync(full);
    } catch (error) {
      throw new TableIOError(`Cannot read table '${path}' (${full}): ${reason(error)}`, { cause: error });
    }
  }

  write(path: string, bytes: Uint8Array): void {
    const full = this.resolve(path);
    try {
      mkdirSync(dirname(full), { recursive: true });
      writeFileSync(full, bytes);
    } catch (error) {
      throw new TableIOError(`Cannot write table '${path}' (${full}): ${reason(error)}`, { cause: error });
    }
  }
}

// ─── MemoryStore ──────────────────────────────────────────────────────────────

export class MemoryStore implements TableStore {
  private readonly files = new Map<string, Uint8Array>();

  read(path: string): Uint8Array {
    const bytes = this.files.get(path);
    if (bytes === undefined) {
      throw new TableIOError(`No table stored at '${path}'.`);
    }
    return bytes;
  }

  /** Stores a private copy, so later writes to `bytes` do not leak in. */
  write(path: string, bytes: Uint8Array): void {
    this.files.set(path, bytes.slice());
  }

  has(path: string): boolean {
    return this.files.has(path);
  }

  delete(path: string): boolean {
    return this.files.delete(path);
  }

  paths(): string[] {
    return [...this.files.keys()];
  }
}
