/**
 * Pipeline checkpoints
 *
 * A checkpoint is one JSON document overwritten atomically on every save.
 * Workers never write it directly: they report completions to a single
 * CheckpointWriter which serializes saves.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { IntegrityError, toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../api/logger.js';
import { SerialQueue } from '../utils/serial.js';

export const CHECKPOINT_VERSION = 1;

export interface Checkpoint {
  version: typeof CHECKPOINT_VERSION;
  runId: string;
  /** Keys that reached a terminal state (done or failed) */
  processedKeys: string[];
  /** Keys not yet processed, in queue order (includes in-flight keys) */
  pendingQueue: string[];
  lastUpdated: string;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

/**
 * Validate a parsed checkpoint document
 */
export function isCheckpoint(value: unknown): value is Checkpoint {
  if (value === null || typeof value !== 'object') return false;
  const record: Record<string, unknown> = { ...value };
  return (
    record.version === CHECKPOINT_VERSION &&
    typeof record.runId === 'string' &&
    isStringArray(record.processedKeys) &&
    isStringArray(record.pendingQueue) &&
    typeof record.lastUpdated === 'string'
  );
}

/**
 * File-backed checkpoint persistence
 */
export class CheckpointStore {
  private readonly log: Logger;

  constructor(
    public readonly path: string,
    options: { logger?: Logger } = {}
  ) {
    this.log = (options.logger ?? defaultLogger).child({ component: 'checkpoint' });
  }

  /**
   * @returns The saved checkpoint, or undefined when none is usable
   */
  async load(): Promise<Checkpoint | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw new IntegrityError(`Cannot read checkpoint ${this.path}: ${toError(error).message}`, toError(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.log.warn('Ignoring unreadable checkpoint', { path: this.path, error: toError(error).message });
      return undefined;
    }

    if (!isCheckpoint(parsed)) {
      this.log.warn('Ignoring checkpoint with unexpected shape', { path: this.path });
      return undefined;
    }
    return parsed;
  }

  /**
   * @throws IntegrityError when the checkpoint cannot be written
   */
  async save(checkpoint: Checkpoint): Promise<void> {
    const temp = `${this.path}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(temp, JSON.stringify(checkpoint, null, 2), 'utf-8');
      await rename(temp, this.path);
    } catch (error) {
      throw new IntegrityError(`Cannot write checkpoint ${this.path}: ${toError(error).message}`, toError(error));
    }
    this.log.debug('Checkpoint saved', {
      processed: checkpoint.processedKeys.length,
      pending: checkpoint.pendingQueue.length,
    });
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
  }
}

/**
 * Anything that can persist a checkpoint
 */
export type CheckpointSink = Pick<CheckpointStore, 'save'>;

/**
 * Single writer that owns the in-run checkpoint state
 */
export class CheckpointWriter {
  private readonly processed: Set<string>;
  private readonly pending: string[];
  private readonly writes = new SerialQueue();
  private readonly every: number;
  private readonly now: () => Date;
  private sinceSave = 0;

  constructor(
    private readonly sink: CheckpointSink,
    private readonly runId: string,
    options: {
      processed?: Iterable<string>;
      pending: readonly string[];
      every: number;
      now?: () => Date;
    }
  ) {
    this.processed = new Set(options.processed ?? []);
    this.pending = options.pending.filter((key) => !this.processed.has(key));
    this.every = Math.max(1, options.every);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Record a key that reached a terminal state; saves every `every` completions
   */
  complete(key: string): Promise<void> {
    return this.writes.run(async () => {
      this.processed.add(key);
      const index = this.pending.indexOf(key);
      if (index >= 0) {
        this.pending.splice(index, 1);
      }

      this.sinceSave++;
      if (this.sinceSave >= this.every) {
        await this.persist();
      }
    });
  }

  /**
   * Save the current state now
   */
  flush(): Promise<void> {
    return this.writes.run(() => this.persist());
  }

  snapshot(): Checkpoint {
    return {
      version: CHECKPOINT_VERSION,
      runId: this.runId,
      processedKeys: [...this.processed],
      pendingQueue: [...this.pending],
      lastUpdated: this.now().toISOString(),
    };
  }

  private async persist(): Promise<void> {
    await this.sink.save(this.snapshot());
    this.sinceSave = 0;
  }
}
