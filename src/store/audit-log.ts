/**
 * JSON-lines audit trail
 *
 * One record per reconciliation operation or pipeline item, appended to
 * `<dir>/<name>-YYYYMMDD.jsonl`. Appends are serialized.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { dateStamp } from '../utils/dates.js';
import { SerialQueue } from '../utils/serial.js';

export type AuditChannel = 'reconcile' | 'pipeline';

/**
 * Minimal sink used by the executor and the pipeline
 */
export interface AuditSink {
  append(record: Record<string, unknown>): Promise<void>;
}

export class AuditLog implements AuditSink {
  readonly path: string;
  private readonly writes = new SerialQueue();

  constructor(
    private readonly dir: string,
    channel: AuditChannel,
    now: Date = new Date()
  ) {
    this.path = join(dir, `${channel}-${dateStamp(now)}.jsonl`);
  }

  append(record: Record<string, unknown>): Promise<void> {
    const line = JSON.stringify({ at: new Date().toISOString(), ...record }) + '\n';
    return this.writes.run(async () => {
      await mkdir(this.dir, { recursive: true });
      await appendFile(this.path, line, 'utf-8');
    });
  }
}

/**
 * Sink that keeps records in memory
 */
export class MemoryAuditSink implements AuditSink {
  readonly records: Record<string, unknown>[] = [];

  async append(record: Record<string, unknown>): Promise<void> {
    this.records.push(record);
  }
}
