/**
 * Document reconciliation apply logic
 *
 * 1. Snapshot the whole store (abort on failure, nothing mutated yet)
 * 2. Move relocated documents, never overwriting an occupied destination
 * 3. Archive documents of removed items under `_archived/YYYYMMDD/`
 * 4. Remove folders left empty (a failure here is reported, not thrown)
 * 5. Report added keys for the batch pipeline
 *
 * Every operation re-checks the filesystem before acting, so re-running an
 * interrupted plan converges without duplicating moves or archives.
 */

import { ConflictError, IntegrityError, toError } from '../../errors.js';
import { logger as defaultLogger, type Logger } from '../../api/logger.js';
import type { DocumentStore } from '../../store/document-store.js';
import { ARCHIVE_DIR } from '../../store/document-store.js';
import type { Snapshotter } from '../../store/backup.js';
import type { AuditSink } from '../../store/audit-log.js';
import { dateStamp } from '../../utils/dates.js';
import type {
  ApplyOptions,
  ExecutionReport,
  OperationResult,
  PlannedOperation,
  ReconciliationPlan,
} from './types.js';

/**
 * Collaborators of the executor
 */
export interface ExecutorDeps {
  store: DocumentStore;
  /** Required unless every apply call passes backup: false or dryRun */
  snapshotter?: Snapshotter;
  audit?: AuditSink;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Expand a plan into the ordered list of file operations for a given run date
 */
export function planOperations(plan: ReconciliationPlan, runDate: string): PlannedOperation[] {
  const operations: PlannedOperation[] = [];

  for (const entry of plan.moved) {
    operations.push({
      kind: 'move',
      key: entry.key,
      from: entry.source,
      to: [...entry.toPath, entry.fileName].join('/'),
    });
  }

  for (const entry of plan.deleted) {
    operations.push({
      kind: 'archive',
      key: entry.key,
      from: entry.relativePath,
      to: `${ARCHIVE_DIR}/${runDate}/${entry.relativePath}`,
    });
  }

  for (const conflict of plan.conflicts) {
    for (const duplicate of conflict.duplicates) {
      operations.push({ kind: 'duplicate', key: conflict.key, from: duplicate, to: conflict.kept });
    }
  }

  for (const entry of plan.added) {
    operations.push({ kind: 'add', key: entry.key, to: entry.destination.join('/') });
  }

  return operations;
}

/**
 * Applies reconciliation plans to a document store
 */
export class ReconciliationExecutor {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: ExecutorDeps) {
    this.log = (deps.logger ?? defaultLogger).child({ component: 'reconcile' });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Apply a plan
   *
   * @throws IntegrityError when the backup cannot be created
   */
  async apply(plan: ReconciliationPlan, options: ApplyOptions): Promise<ExecutionReport> {
    const runDate = dateStamp(this.now());
    const operations = planOperations(plan, runDate);
    const mutating = operations.filter((op) => op.kind === 'move' || op.kind === 'archive');

    if (options.dryRun) {
      const results = operations.map((operation): OperationResult => ({
        operation,
        status: operation.kind === 'duplicate' ? 'failed' : 'planned',
        error: operation.kind === 'duplicate' ? duplicateMessage(operation) : undefined,
      }));
      return this.buildReport(plan, runDate, true, results, [], undefined);
    }

    let backupPath: string | undefined;
    if ((options.backup ?? true) && mutating.length > 0) {
      if (!this.deps.snapshotter) {
        throw new IntegrityError('Backup requested but no snapshotter is configured');
      }
      // IntegrityError propagates: nothing has been touched yet
      backupPath = await this.deps.snapshotter.snapshot(this.deps.store.root);
    }

    const results: OperationResult[] = [];
    for (const operation of operations) {
      const result = await this.execute(operation);
      results.push(result);
      this.logResult(result);
      await this.audit({ type: 'operation', planId: plan.planId, runDate, ...flatten(result) });
    }

    let removedFolders: string[] = [];
    const cleanupErrors: string[] = [];
    if (mutating.length > 0) {
      try {
        removedFolders = await this.deps.store.removeEmptyFolders();
      } catch (error) {
        const message = `empty folder cleanup failed: ${toError(error).message}`;
        this.log.warn(message);
        cleanupErrors.push(message);
      }
    }
    for (const folder of removedFolders) {
      await this.audit({ type: 'folder-removed', planId: plan.planId, runDate, path: folder });
    }

    return this.buildReport(plan, runDate, false, results, removedFolders, backupPath, cleanupErrors);
  }

  private async audit(record: Record<string, unknown>): Promise<void> {
    if (!this.deps.audit) return;
    try {
      await this.deps.audit.append(record);
    } catch (error) {
      this.log.warn('Could not write audit record', { error: toError(error).message });
    }
  }

  private async execute(operation: PlannedOperation): Promise<OperationResult> {
    try {
      switch (operation.kind) {
        case 'move':
          return await this.relocate(operation, 'already at destination');
        case 'archive':
          return await this.relocate(operation, 'already archived');
        case 'duplicate':
          return { operation, status: 'failed', error: duplicateMessage(operation) };
        case 'add':
          return { operation, status: 'reported' };
      }
    } catch (error) {
      return { operation, status: 'failed', error: toError(error).message };
    }
  }

  /**
   * Move or archive one document after checking where it currently is
   */
  private async relocate(operation: PlannedOperation, noopReason: string): Promise<OperationResult> {
    const { from, to } = operation;
    if (!from || !to) {
      return { operation, status: 'failed', error: 'operation is missing a source or destination' };
    }

    const [sourceExists, targetExists] = await Promise.all([
      this.deps.store.exists(from),
      this.deps.store.exists(to),
    ]);

    if (!sourceExists && targetExists) {
      this.log.debug(`${operation.key}: ${noopReason}`, { to });
      return { operation, status: 'noop' };
    }
    if (!sourceExists) {
      return { operation, status: 'failed', error: `source document not found: ${from}` };
    }
    if (targetExists) {
      const conflict = new ConflictError(`destination already exists: ${to}`, to);
      return { operation, status: 'failed', error: conflict.message };
    }

    await this.deps.store.move(from, to);
    return { operation, status: 'applied' };
  }

  private logResult(result: OperationResult): void {
    const { operation } = result;
    const context = { key: operation.key, kind: operation.kind, from: operation.from, to: operation.to };
    if (result.status === 'failed') {
      this.log.warn(`${operation.kind} ${operation.key} failed: ${result.error ?? 'unknown error'}`, context);
    } else {
      this.log.debug(`${operation.kind} ${operation.key}: ${result.status}`, context);
    }
  }

  private buildReport(
    plan: ReconciliationPlan,
    runDate: string,
    dryRun: boolean,
    results: OperationResult[],
    removedFolders: string[],
    backupPath: string | undefined,
    cleanupErrors: readonly string[] = []
  ): ExecutionReport {
    const count = (kind: PlannedOperation['kind'], status: OperationResult['status']): number =>
      results.filter((r) => r.operation.kind === kind && r.status === status).length;

    const failures = results
      .filter((r) => r.status === 'failed')
      .map((r) => `${r.operation.kind} ${r.operation.key}: ${r.error ?? 'unknown error'}`);
    const errors = [...failures, ...cleanupErrors];

    const applied = dryRun ? 'planned' : 'applied';

    return {
      planId: plan.planId,
      runDate,
      dryRun,
      backupPath,
      results,
      added: [...plan.added],
      removedFolders,
      summary: {
        moved: count('move', applied),
        archived: count('archive', applied),
        unchanged: results.filter((r) => r.status === 'noop').length,
        failed: failures.length,
        added: plan.added.length,
        foldersRemoved: removedFolders.length,
      },
      errors,
      success: errors.length === 0,
    };
  }
}

function duplicateMessage(operation: PlannedOperation): string {
  return `duplicate document for key ${operation.key} at ${operation.from ?? '?'} (kept ${operation.to ?? '?'})`;
}

function flatten(result: OperationResult): Record<string, unknown> {
  return {
    kind: result.operation.kind,
    key: result.operation.key,
    from: result.operation.from,
    to: result.operation.to,
    status: result.status,
    error: result.error,
  };
}
