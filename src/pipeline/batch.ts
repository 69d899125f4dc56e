/**
 * BatchPipeline - bounded worker pool over the item queue
 *
 * - N workers pull keys from one shared queue; each key is dequeued once
 * - Each worker drives its item through the stages in order
 * - Per-item errors become Failed(stage, reason) and never stop the pool
 * - Integrity errors (done record, checkpoint) stop the run
 * - An abort signal switches the pool to draining: in-flight items finish,
 *   the checkpoint is saved, nothing new is dequeued
 */

import { toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../api/logger.js';
import type { AuditSink } from '../store/audit-log.js';
import type { CheckpointStore } from './checkpoint.js';
import { CheckpointWriter } from './checkpoint.js';
import type { DoneRecord } from './done-record.js';
import {
  describeFailure,
  extractStage,
  fetchStage,
  renderStage,
  summarizeStage,
  type StageDeps,
} from './stages.js';
import type {
  FailedItem,
  ItemIndex,
  ItemOutcome,
  ItemState,
  RunSummary,
  StageConfig,
  StageName,
} from './types.js';

export interface PipelineDeps extends Omit<StageDeps, 'logger' | 'existingDocuments'> {
  items: ItemIndex;
  doneRecord: DoneRecord;
  checkpoints: Pick<CheckpointStore, 'load' | 'save' | 'clear'>;
  existingDocuments?: ReadonlyMap<string, string>;
  audit?: AuditSink;
  logger?: Logger;
}

interface QueueSelection {
  runId: string;
  /** Keys this invocation works through */
  queue: string[];
  /** Keys the checkpoint tracks as pending; longer than `queue` when a resumed run is limited */
  backlog: string[];
  processed: string[];
  skipped: number;
  resumed: boolean;
}

function generateRunId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `run-${timestamp}-${random}`;
}

function unique(keys: readonly string[]): string[] {
  return [...new Set(keys)];
}

export class BatchPipeline {
  private readonly log: Logger;
  private readonly states = new Map<string, ItemState>();
  private readonly active = new Set<string>();

  constructor(private readonly deps: PipelineDeps) {
    this.log = (deps.logger ?? defaultLogger).child({ component: 'pipeline' });
  }

  /**
   * Current state of an item in the last or running run
   */
  getState(key: string): ItemState | undefined {
    return this.states.get(key);
  }

  /**
   * Keys currently inside a stage
   */
  get inFlight(): string[] {
    return [...this.active];
  }

  /**
   * Process candidate keys
   *
   * @throws IntegrityError when the done record or checkpoint cannot be written
   */
  async run(candidateKeys: readonly string[], config: StageConfig, signal?: AbortSignal): Promise<RunSummary> {
    const startedAt = new Date().toISOString();
    const candidates = unique(candidateKeys);

    if (config.force && candidates.length > 0) {
      const removed = await this.deps.doneRecord.remove(candidates);
      if (removed.length > 0) {
        this.log.info(`Force reprocess: ${removed.length} key(s) removed from done record`);
      }
    }

    const selection = await this.selectQueue(candidates, config);
    const { queue, runId } = selection;
    const writer = new CheckpointWriter(this.deps.checkpoints, runId, {
      processed: selection.processed,
      pending: selection.backlog,
      every: config.checkpointEvery,
    });

    this.states.clear();
    for (const key of queue) {
      this.states.set(key, { status: 'Queued' });
    }

    const stageDeps: StageDeps = {
      fetchAttachment: this.deps.fetchAttachment,
      extractor: this.deps.extractor,
      summarizer: this.deps.summarizer,
      renderer: this.deps.renderer,
      store: this.deps.store,
      existingDocuments: this.deps.existingDocuments ?? new Map<string, string>(),
      logger: this.log,
    };

    const control: { draining: boolean; fatal?: Error } = { draining: false };
    const onAbort = (): void => {
      if (control.draining) return;
      control.draining = true;
      this.log.warn('Stop requested; finishing in-flight items before saving the checkpoint');
    };
    if (signal?.aborted) {
      onAbort();
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    const succeeded: string[] = [];
    const failed: FailedItem[] = [];
    let cursor = 0;

    const poolSize = Math.min(Math.max(1, config.workers), Math.max(1, queue.length));
    this.log.info(`Processing ${queue.length} item(s) with ${poolSize} worker(s)`, {
      runId,
      resumed: selection.resumed,
      skipped: selection.skipped,
    });

    const worker = async (): Promise<void> => {
      for (;;) {
        if (control.draining || control.fatal) return;
        if (cursor >= queue.length) return;
        const key = queue[cursor];
        cursor++;

        const outcome = await this.processItem(key, config, stageDeps);

        try {
          if (outcome.state.status === 'Done') {
            await this.deps.doneRecord.append(key);
            succeeded.push(key);
          } else {
            failed.push({ key, stage: outcome.state.stage, reason: outcome.state.reason });
          }
          await writer.complete(key);
        } catch (error) {
          control.fatal = control.fatal ?? toError(error);
          control.draining = true;
          return;
        }

        this.logOutcome(outcome, succeeded.length + failed.length, queue.length);
        await this.audit({ type: 'item', runId, ...flattenOutcome(outcome) });
      }
    };

    try {
      await Promise.all(Array.from({ length: poolSize }, () => worker()));
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    const { fatal } = control;
    if (fatal) {
      this.log.error('Run aborted', fatal);
      try {
        await writer.flush();
      } catch (error) {
        this.log.error('Checkpoint could not be saved after abort', toError(error));
      }
      throw fatal;
    }

    const remaining = queue.slice(cursor);
    const interrupted = remaining.length > 0;
    const pending = writer.snapshot().pendingQueue;
    if (interrupted) {
      await writer.flush();
      this.log.warn(`Run interrupted with ${remaining.length} item(s) left; resume with --resume`);
    } else if (pending.length > 0) {
      await writer.flush();
      this.log.info(`Limit reached; ${pending.length} item(s) of run ${runId} remain for --resume`);
    } else {
      await this.deps.checkpoints.clear();
    }

    const summary: RunSummary = {
      runId,
      startedAt,
      finishedAt: new Date().toISOString(),
      candidates: candidates.length,
      skipped: selection.skipped,
      queued: queue.length,
      succeeded,
      failed,
      remaining,
      interrupted,
      resumed: selection.resumed,
      success: failed.length === 0 && !interrupted,
    };
    await this.audit({
      type: 'run',
      runId,
      succeeded: succeeded.length,
      failed: failed.length,
      remaining: remaining.length,
      interrupted,
    });
    return summary;
  }

  /**
   * Decide which keys this run processes
   */
  private async selectQueue(candidates: string[], config: StageConfig): Promise<QueueSelection> {
    const done = this.deps.doneRecord;

    if (config.resume) {
      const checkpoint = await this.deps.checkpoints.load();
      if (checkpoint) {
        const processed = new Set(checkpoint.processedKeys);
        const queue = unique(checkpoint.pendingQueue).filter((key) => !processed.has(key) && !done.has(key));
        this.log.info(`Resuming run ${checkpoint.runId}: ${processed.size} processed, ${queue.length} pending`);
        return {
          runId: checkpoint.runId,
          queue: limit(queue, config.limit),
          backlog: queue,
          processed: checkpoint.processedKeys,
          skipped: checkpoint.pendingQueue.length - queue.length,
          resumed: true,
        };
      }
      this.log.info('No checkpoint found; starting a fresh run');
    }

    const pending = candidates.filter((key) => !done.has(key));
    const queue = limit(pending, config.limit);
    return {
      runId: generateRunId(),
      queue,
      backlog: queue,
      processed: [],
      skipped: candidates.length - pending.length,
      resumed: false,
    };
  }

  /**
   * Drive one item through every stage. Never throws.
   */
  private async processItem(key: string, config: StageConfig, deps: StageDeps): Promise<ItemOutcome> {
    const started = Date.now();
    let stage: StageName = 'Fetching';
    const enter = (next: StageName): void => {
      stage = next;
      this.states.set(key, { status: next });
    };

    this.active.add(key);
    try {
      enter('Fetching');
      const item = this.deps.items.get(key);
      if (!item) {
        throw new Error('item not found in library');
      }
      const pdf = await fetchStage(item, deps);

      enter('Extracting');
      const content = await extractStage(item, pdf, deps);

      enter('Summarizing');
      const summary = await summarizeStage(item, content, config, deps);

      enter('Rendering');
      const relativePath = await renderStage(item, summary, content, pdf, config, deps);

      const state = { status: 'Done', relativePath } as const;
      this.states.set(key, state);
      return { key, state, durationMs: Date.now() - started };
    } catch (error) {
      const { stage: failedStage, reason } = describeFailure(error, stage);
      const state = { status: 'Failed', stage: failedStage, reason } as const;
      this.states.set(key, state);
      return { key, state, durationMs: Date.now() - started };
    } finally {
      this.active.delete(key);
    }
  }

  private logOutcome(outcome: ItemOutcome, position: number, total: number): void {
    const item = this.deps.items.get(outcome.key);
    const title = item ? ` ${item.title}` : '';
    const prefix = `[${position}/${total}] ${outcome.key}${title}`;
    if (outcome.state.status === 'Done') {
      this.log.info(`✓ ${prefix} -> ${outcome.state.relativePath}`, { durationMs: outcome.durationMs });
    } else {
      this.log.warn(`✗ ${prefix} failed at ${outcome.state.stage}: ${outcome.state.reason}`, {
        durationMs: outcome.durationMs,
      });
    }
  }

  private async audit(record: Record<string, unknown>): Promise<void> {
    if (!this.deps.audit) return;
    try {
      await this.deps.audit.append(record);
    } catch (error) {
      this.log.warn('Could not write audit record', { error: toError(error).message });
    }
  }
}

function limit(keys: string[], max: number | undefined): string[] {
  return max !== undefined && max >= 0 ? keys.slice(0, max) : keys;
}

function flattenOutcome(outcome: ItemOutcome): Record<string, unknown> {
  return {
    key: outcome.key,
    durationMs: outcome.durationMs,
    ...outcome.state,
  };
}
