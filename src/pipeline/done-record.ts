/**
 * DoneRecord - durable set of keys that completed the pipeline
 *
 * Stored as one key per line. Appends are idempotent and serialized; the file
 * is only rewritten when keys are explicitly removed for reprocessing.
 */

import { appendFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { IntegrityError, toError } from '../errors.js';
import { SerialQueue } from '../utils/serial.js';

export class DoneRecord {
  private readonly writes = new SerialQueue();

  private constructor(
    public readonly path: string,
    private readonly keys: Set<string>
  ) {}

  /**
   * Load the record, creating an empty one when the file does not exist
   */
  static async open(path: string): Promise<DoneRecord> {
    let content = '';
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (!isNotFound(error)) {
        throw new IntegrityError(`Cannot read done record ${path}: ${toError(error).message}`, toError(error));
      }
    }

    const keys = new Set(
      content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
    );
    return new DoneRecord(path, keys);
  }

  has(key: string): boolean {
    return this.keys.has(key);
  }

  get size(): number {
    return this.keys.size;
  }

  list(): string[] {
    return [...this.keys];
  }

  /**
   * Record a completed key. Re-appending an existing key is a no-op.
   *
   * @throws IntegrityError when the file cannot be written
   */
  append(key: string): Promise<void> {
    return this.writes.run(async () => {
      if (this.keys.has(key)) return;
      try {
        await mkdir(dirname(this.path), { recursive: true });
        await appendFile(this.path, `${key}\n`, 'utf-8');
      } catch (error) {
        throw new IntegrityError(`Cannot append to done record ${this.path}: ${toError(error).message}`, toError(error));
      }
      this.keys.add(key);
    });
  }

  /**
   * Forget keys so they are processed again
   *
   * @returns Keys that were actually removed
   */
  remove(keys: readonly string[]): Promise<string[]> {
    return this.writes.run(async () => {
      const removed = [...new Set(keys)].filter((key) => this.keys.has(key));
      if (removed.length === 0) return removed;

      const dropped = new Set(removed);
      const remaining = [...this.keys].filter((key) => !dropped.has(key));
      const temp = `${this.path}.tmp`;
      try {
        await mkdir(dirname(this.path), { recursive: true });
        await writeFile(temp, remaining.map((key) => `${key}\n`).join(''), 'utf-8');
        await rename(temp, this.path);
      } catch (error) {
        throw new IntegrityError(`Cannot rewrite done record ${this.path}: ${toError(error).message}`, toError(error));
      }

      for (const key of removed) {
        this.keys.delete(key);
      }
      return removed;
    });
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
