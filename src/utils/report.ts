/**
 * Text and JSON renderings of plans, execution reports and run summaries
 */

import { formatPath } from '../library/paths.js';
import type { LibraryCollection } from '../library/types.js';
import { describeMove } from '../reconcilers/documents/diff.js';
import type { ExecutionReport, ReconciliationPlan } from '../reconcilers/documents/types.js';
import type { RunSummary } from '../pipeline/types.js';

/**
 * Format a plan as a summary
 */
export function formatPlanSummary(plan: ReconciliationPlan): string {
  const lines: string[] = [];
  const { summary } = plan;

  lines.push('Reconciliation Plan');
  lines.push('===================');
  lines.push('');
  lines.push(`Timestamp: ${plan.timestamp}`);
  lines.push(`Plan ID: ${plan.planId}`);
  if (plan.collectionFilter) lines.push(`Collection filter: ${plan.collectionFilter}`);
  lines.push('');

  lines.push('Actions:');
  if (summary.toAdd > 0) lines.push(`  + Add: ${summary.toAdd}`);
  if (summary.toMove > 0) lines.push(`  ~ Move: ${summary.toMove}`);
  if (summary.toArchive > 0) lines.push(`  - Archive: ${summary.toArchive}`);
  lines.push(`  = In sync: ${summary.inSync}`);
  if (summary.conflicts > 0) lines.push(`  ! Duplicate keys: ${summary.conflicts}`);
  lines.push('');

  if (plan.warnings.length > 0) {
    lines.push('Warnings:');
    for (const warning of plan.warnings) {
      lines.push(`  ! ${warning}`);
    }
    lines.push('');
  }

  lines.push(plan.hasChanges ? 'Status: CHANGES NEEDED' : 'Status: IN SYNC');
  return lines.join('\n');
}

/**
 * One line per planned change
 */
export function formatPlanDetails(plan: ReconciliationPlan): string {
  const lines: string[] = [];

  if (plan.added.length > 0) {
    lines.push('New items:');
    for (const entry of plan.added) {
      lines.push(`  + ${entry.key} ${entry.title} -> ${formatPath(entry.destination)}`);
    }
    lines.push('');
  }

  if (plan.moved.length > 0) {
    lines.push('Moves:');
    for (const entry of plan.moved) {
      lines.push(`  ~ ${describeMove(entry)}`);
    }
    lines.push('');
  }

  if (plan.deleted.length > 0) {
    lines.push('Archive (removed from library):');
    for (const entry of plan.deleted) {
      lines.push(`  - ${entry.key}: ${entry.relativePath}`);
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}

/**
 * Format an execution report as a summary
 */
export function formatExecutionReport(report: ExecutionReport): string {
  const lines: string[] = [];
  const { summary } = report;

  lines.push(report.dryRun ? 'Reconciliation (dry run)' : 'Reconciliation Applied');
  lines.push('');
  if (report.backupPath) lines.push(`Backup: ${report.backupPath}`);
  lines.push(`  ~ Moved: ${summary.moved}`);
  lines.push(`  - Archived: ${summary.archived}`);
  if (summary.unchanged > 0) lines.push(`  = Already done: ${summary.unchanged}`);
  lines.push(`  + New items for processing: ${summary.added}`);
  if (summary.foldersRemoved > 0) lines.push(`  - Empty folders removed: ${summary.foldersRemoved}`);

  if (report.errors.length > 0) {
    lines.push('');
    lines.push('Errors:');
    for (const error of report.errors) {
      lines.push(`  X ${error}`);
    }
  }

  return lines.join('\n');
}

/**
 * Format a pipeline run summary
 */
export function formatRunSummary(summary: RunSummary): string {
  const lines: string[] = [];

  lines.push(`Run ${summary.runId}${summary.resumed ? ' (resumed)' : ''}`);
  lines.push('');
  lines.push(`  Candidates: ${summary.candidates} (${summary.skipped} already done)`);
  lines.push(`  + Succeeded: ${summary.succeeded.length}`);
  if (summary.failed.length > 0) lines.push(`  X Failed: ${summary.failed.length}`);
  if (summary.remaining.length > 0) lines.push(`  ! Not started: ${summary.remaining.length}`);

  if (summary.failed.length > 0) {
    lines.push('');
    lines.push('Failures:');
    for (const failure of summary.failed) {
      lines.push(`  X ${failure.key} at ${failure.stage}: ${failure.reason}`);
    }
  }

  if (summary.interrupted) {
    lines.push('');
    lines.push('Status: INTERRUPTED (continue with --resume)');
  }

  return lines.join('\n');
}

/**
 * Collection tree, one path per line with its item count
 */
export function formatCollections(collections: readonly LibraryCollection[]): string {
  if (collections.length === 0) return 'No collections';
  return collections
    .map((collection) => {
      const count = collection.itemCount !== undefined ? ` (${collection.itemCount})` : '';
      return `${formatPath(collection.path)}${count}`;
    })
    .join('\n');
}
