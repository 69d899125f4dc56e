/**
 * apply command - Move and archive documents so the store matches the library
 */

import type { CommandContext, CommandResult } from '../types.js';
import { dryRunNotice, header, printLines, verbose } from '../utils/output.js';
import { formatExecutionReport, formatPlanSummary } from '../utils/report.js';
import {
  ReconciliationExecutor,
  type ExecutionReport,
  type ReconciliationPlan,
} from '../reconcilers/documents/index.js';
import type { LibraryItem } from '../library/types.js';
import { loadPlan } from './diff.js';
import { createRuntime, type Runtime } from './runtime.js';

export interface ApplyCommandOptions {
  collection?: string;
  dryRun?: boolean;
  /** Snapshot the store first (default: true) */
  backup?: boolean;
}

export interface ApplyResult {
  plan: ReconciliationPlan;
  report: ExecutionReport;
}

/**
 * Compute and apply a plan; shared with sync
 *
 * @throws IntegrityError when the backup fails (nothing has been changed)
 */
export async function reconcile(
  ctx: CommandContext,
  runtime: Runtime,
  options: ApplyCommandOptions
): Promise<ApplyResult & { items: LibraryItem[] }> {
  const { plan, items } = await loadPlan(runtime, options.collection);

  if (ctx.outputFormat === 'human') {
    printLines(formatPlanSummary(plan));
    console.log('');
  }

  const executor = new ReconciliationExecutor({
    store: runtime.store(),
    snapshotter: runtime.snapshotter(),
    audit: runtime.audit('reconcile'),
    logger: ctx.logger,
  });
  const report = await executor.apply(plan, {
    dryRun: options.dryRun ?? false,
    backup: options.backup ?? true,
  });

  if (ctx.outputFormat === 'human') {
    printLines(formatExecutionReport(report));
  }

  return { plan, report, items };
}

/**
 * Execute the apply command
 */
export async function applyCommand(
  ctx: CommandContext,
  options: ApplyCommandOptions = {},
  runtime: Runtime = createRuntime(ctx.settings, ctx.logger)
): Promise<CommandResult<ApplyResult>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose(`Executing apply command`, globalOpts.verbose);
  verbose(`Backup: ${options.backup === false ? 'disabled' : 'enabled'}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Apply Reconciliation');
    if (options.dryRun) {
      dryRunNotice();
    }
  }

  const { plan, report } = await reconcile(ctx, runtime, options);

  return {
    success: report.success,
    message: report.success
      ? `Moved ${report.summary.moved}, archived ${report.summary.archived}, ${report.summary.added} new item(s) pending`
      : `${report.summary.failed} operation(s) failed`,
    data: { plan, report },
    errors: report.errors.length > 0 ? report.errors : undefined,
  };
}
