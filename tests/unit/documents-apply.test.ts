/**
 * Unit Tests: Reconciliation Executor
 *
 * Tests applying plans against a temporary document store:
 * - Backup before mutation, abort when the backup fails
 * - Moves, archives and empty-folder cleanup
 * - Cleanup and audit failures that do not abort the run
 * - Dry-run mode
 * - Conflicts and idempotent re-application
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { computePlan } from '../../src/reconcilers/documents/diff.js';
import { ReconciliationExecutor, planOperations } from '../../src/reconcilers/documents/apply.js';
import { DocumentStore } from '../../src/store/document-store.js';
import { MemoryAuditSink } from '../../src/store/audit-log.js';
import type { Snapshotter } from '../../src/store/backup.js';
import { IntegrityError } from '../../src/errors.js';
import type { LibraryItem } from '../../src/library/types.js';
import { makeDoc, makeItem, makeTempDir, quietLogger, removeDir, writeNote } from '../helpers.js';

// =============================================================================
// Fixtures
// =============================================================================

const RUN_DATE = new Date(2024, 2, 5, 12, 0, 0);

function createSnapshotter(): Snapshotter & { snapshot: ReturnType<typeof vi.fn> } {
  return { snapshot: vi.fn().mockResolvedValue('/backups/store_backup.tar.gz') };
}

describe('ReconciliationExecutor', () => {
  let root: string;
  let store: DocumentStore;
  let snapshotter: ReturnType<typeof createSnapshotter>;
  let audit: MemoryAuditSink;
  let executor: ReconciliationExecutor;

  beforeEach(async () => {
    root = await makeTempDir();
    store = new DocumentStore(root, { logger: quietLogger });
    snapshotter = createSnapshotter();
    audit = new MemoryAuditSink();
    executor = new ReconciliationExecutor({ store, snapshotter, audit, logger: quietLogger, now: () => RUN_DATE });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  async function planFor(items: LibraryItem[]) {
    return computePlan(items, await store.scan());
  }

  const read = (rel: string) => readFile(join(root, ...rel.split('/')), 'utf-8');

  it('archives removed items, keeps in-sync ones and reports new ones', async () => {
    await writeNote(root, 'AI/ML/Paper A_A.md', 'A content');
    await writeNote(root, 'Old/Path/Paper C_C.md', 'C content');
    const plan = await planFor([
      makeItem('A', { collectionPaths: [['AI', 'ML']] }),
      makeItem('B', { collectionPaths: [['AI', 'ML']] }),
    ]);

    const report = await executor.apply(plan, { dryRun: false });

    expect(snapshotter.snapshot).toHaveBeenCalledTimes(1);
    expect(snapshotter.snapshot).toHaveBeenCalledWith(root);
    expect(report.backupPath).toBe('/backups/store_backup.tar.gz');
    expect(report.runDate).toBe('20240305');
    expect(await read('_archived/20240305/Old/Path/Paper C_C.md')).toBe('C content');
    expect(await store.exists('Old/Path/Paper C_C.md')).toBe(false);
    expect(await read('AI/ML/Paper A_A.md')).toBe('A content');
    expect(report.added.map((e) => e.key)).toEqual(['B']);
    expect(report.removedFolders).toEqual(['Old', 'Old/Path']);
    expect(report.summary).toEqual({
      moved: 0,
      archived: 1,
      unchanged: 0,
      failed: 0,
      added: 1,
      foldersRemoved: 2,
    });
    expect(report.success).toBe(true);
  });

  it('moves a document to its new collection and removes the empty folder', async () => {
    await writeNote(root, 'X/Y/Paper D_D.md', 'D content');
    await writeNote(root, 'X/keep_K1.md', 'K1');
    const plan = await planFor([
      makeItem('D', { collectionPaths: [['X', 'Z']] }),
      makeItem('K1', { collectionPaths: [['X']] }),
    ]);

    const report = await executor.apply(plan, { dryRun: false });

    expect(await read('X/Z/Paper D_D.md')).toBe('D content');
    expect(await store.exists('X/Y/Paper D_D.md')).toBe(false);
    expect(report.removedFolders).toEqual(['X/Y']);
    expect(report.summary.moved).toBe(1);
  });

  it('makes no changes in dry-run mode', async () => {
    await writeNote(root, 'X/Y/Paper D_D.md', 'D content');
    await writeNote(root, 'Gone/Paper G_G.md', 'G content');
    const plan = await planFor([makeItem('D', { collectionPaths: [['X', 'Z']] })]);

    const report = await executor.apply(plan, { dryRun: true });

    expect(snapshotter.snapshot).not.toHaveBeenCalled();
    expect(report.dryRun).toBe(true);
    expect(report.results.map((r) => [r.operation.kind, r.status])).toEqual([
      ['move', 'planned'],
      ['archive', 'planned'],
    ]);
    expect(report.summary.moved).toBe(1);
    expect(report.summary.archived).toBe(1);
    expect(await store.exists('X/Y/Paper D_D.md')).toBe(true);
    expect(await store.exists('Gone/Paper G_G.md')).toBe(true);
    expect(audit.records).toEqual([]);
  });

  it('aborts before touching anything when the backup fails', async () => {
    await writeNote(root, 'X/Y/Paper D_D.md', 'D content');
    const plan = await planFor([makeItem('D', { collectionPaths: [['X', 'Z']] })]);
    snapshotter.snapshot.mockRejectedValue(new IntegrityError('Backup failed: disk full'));

    await expect(executor.apply(plan, { dryRun: false })).rejects.toThrow('Backup failed: disk full');
    expect(await store.exists('X/Y/Paper D_D.md')).toBe(true);
    expect(await store.exists('X/Z/Paper D_D.md')).toBe(false);
  });

  it('requires a snapshotter when a backup is requested', async () => {
    await writeNote(root, 'X/Y/Paper D_D.md', 'D content');
    const plan = await planFor([makeItem('D', { collectionPaths: [['X', 'Z']] })]);
    const unguarded = new ReconciliationExecutor({ store, logger: quietLogger });

    await expect(unguarded.apply(plan, { dryRun: false })).rejects.toBeInstanceOf(IntegrityError);

    const report = await unguarded.apply(plan, { dryRun: false, backup: false });
    expect(report.summary.moved).toBe(1);
  });

  it('skips the backup when nothing moves or is archived', async () => {
    const plan = await planFor([makeItem('B', { collectionPaths: [['AI']] })]);

    const report = await executor.apply(plan, { dryRun: false });

    expect(snapshotter.snapshot).not.toHaveBeenCalled();
    expect(report.results.map((r) => r.status)).toEqual(['reported']);
  });

  it('never overwrites an occupied destination', async () => {
    await writeNote(root, 'X/Y/Paper D_D.md', 'moving');
    const plan = await planFor([makeItem('D', { collectionPaths: [['X', 'Z']] })]);
    await writeNote(root, 'X/Z/Paper D_D.md', 'already here');

    const report = await executor.apply(plan, { dryRun: false });

    expect(await read('X/Z/Paper D_D.md')).toBe('already here');
    expect(await read('X/Y/Paper D_D.md')).toBe('moving');
    expect(report.success).toBe(false);
    expect(report.errors).toEqual(['move D: destination already exists: X/Z/Paper D_D.md']);
  });

  it('reports duplicate documents without touching them', async () => {
    await writeNote(root, 'A/Paper M_M.md', 'first');
    await writeNote(root, 'B/Paper M_M.md', 'second');
    const plan = await planFor([makeItem('M', { collectionPaths: [['A']] })]);

    const report = await executor.apply(plan, { dryRun: false });

    expect(snapshotter.snapshot).not.toHaveBeenCalled();
    expect(report.errors).toEqual(['duplicate M: duplicate document for key M at B/Paper M_M.md (kept A/Paper M_M.md)']);
    expect(await read('B/Paper M_M.md')).toBe('second');
  });

  it('converges when the same plan is applied twice', async () => {
    await writeNote(root, 'X/Y/Paper D_D.md', 'D content');
    await writeNote(root, 'Gone/Paper G_G.md', 'G content');
    const plan = await planFor([makeItem('D', { collectionPaths: [['X', 'Z']] })]);

    await executor.apply(plan, { dryRun: false });
    const second = await executor.apply(plan, { dryRun: false });

    expect(second.results.map((r) => r.status)).toEqual(['noop', 'noop']);
    expect(second.summary.unchanged).toBe(2);
    expect(second.success).toBe(true);
    expect(second.removedFolders).toEqual([]);
    expect(await read('X/Z/Paper D_D.md')).toBe('D content');
    expect(await read('_archived/20240305/Gone/Paper G_G.md')).toBe('G content');

    const replanned = computePlan([makeItem('D', { collectionPaths: [['X', 'Z']] })], await store.scan());
    expect(replanned.hasChanges).toBe(false);
  });

  it('writes one audit record per operation', async () => {
    await writeNote(root, 'Gone/Paper G_G.md', 'G content');
    const plan = await planFor([]);

    await executor.apply(plan, { dryRun: false });

    expect(audit.records).toEqual([
      {
        type: 'operation',
        planId: plan.planId,
        runDate: '20240305',
        kind: 'archive',
        key: 'G',
        from: 'Gone/Paper G_G.md',
        to: '_archived/20240305/Gone/Paper G_G.md',
        status: 'applied',
        error: undefined,
      },
      { type: 'folder-removed', planId: plan.planId, runDate: '20240305', path: 'Gone' },
    ]);
  });

  it('still reports applied moves when empty-folder cleanup fails', async () => {
    await writeNote(root, 'X/Y/Paper D_D.md', 'D content');
    const plan = await planFor([makeItem('D', { collectionPaths: [['X', 'Z']] })]);
    vi.spyOn(store, 'removeEmptyFolders').mockRejectedValue(new Error('EBUSY: resource busy, rmdir'));

    const report = await executor.apply(plan, { dryRun: false });

    expect(await read('X/Z/Paper D_D.md')).toBe('D content');
    expect(report.results.map((r) => [r.operation.kind, r.status])).toEqual([['move', 'applied']]);
    expect(report.summary.moved).toBe(1);
    expect(report.summary.failed).toBe(0);
    expect(report.removedFolders).toEqual([]);
    expect(report.errors).toEqual(['empty folder cleanup failed: EBUSY: resource busy, rmdir']);
    expect(report.success).toBe(false);
  });

  it('keeps applying when the audit log cannot be written', async () => {
    await writeNote(root, 'X/Y/Paper D_D.md', 'D content');
    const plan = await planFor([makeItem('D', { collectionPaths: [['X', 'Z']] })]);
    vi.spyOn(audit, 'append').mockRejectedValue(new Error('EACCES: permission denied'));

    const report = await executor.apply(plan, { dryRun: false });

    expect(audit.append).toHaveBeenCalledTimes(2);
    expect(await read('X/Z/Paper D_D.md')).toBe('D content');
    expect(report.removedFolders).toEqual(['X/Y']);
    expect(report.success).toBe(true);
  });
});

describe('planOperations', () => {
  it('orders moves, archives, duplicates and additions', () => {
    const plan = computePlan(
      [makeItem('D', { collectionPaths: [['New']] }), makeItem('B')],
      [makeDoc('D', ['Old'], 'd_D.md'), makeDoc('G', ['Gone'], 'g_G.md')]
    );

    expect(planOperations(plan, '20240101')).toEqual([
      { kind: 'move', key: 'D', from: 'Old/d_D.md', to: 'New/d_D.md' },
      { kind: 'archive', key: 'G', from: 'Gone/g_G.md', to: '_archived/20240101/Gone/g_G.md' },
      { kind: 'add', key: 'B', to: 'Uncategorized' },
    ]);
  });
});
