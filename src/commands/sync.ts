/**
 * sync command - Reconcile the store, then generate documents for new items
 *
 * Reconciliation always runs first so that moved documents are in place
 * before anything new is written.
 */

import type { CommandContext, CommandResult } from '../types.js';
import { dryRunNotice, header, info, verbose } from '../utils/output.js';
import type { ExecutionReport } from '../reconcilers/documents/index.js';
import type { RunSummary } from '../pipeline/index.js';
import { reconcile } from './apply.js';
import { runPipeline } from './run.js';
import { createRuntime, type Runtime } from './runtime.js';

export interface SyncOptions {
  collection?: string;
  dryRun?: boolean;
  backup?: boolean;
  workers?: number;
  skipSummarization?: boolean;
  copyPdfs?: boolean;
  limit?: number;
}

export interface SyncResult {
  report: ExecutionReport;
  run?: RunSummary;
}

/**
 * Execute the sync command
 */
export async function syncCommand(
  ctx: CommandContext,
  options: SyncOptions = {},
  runtime: Runtime = createRuntime(ctx.settings, ctx.logger)
): Promise<CommandResult<SyncResult>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose(`Executing sync command`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Sync');
    if (options.dryRun) {
      dryRunNotice();
    }
  }

  const { report, items } = await reconcile(ctx, runtime, {
    collection: options.collection,
    dryRun: options.dryRun,
    backup: options.backup,
  });

  const newKeys = report.added.map((entry) => entry.key);
  if (options.dryRun || newKeys.length === 0) {
    if (outputFormat === 'human' && newKeys.length === 0) {
      info('No new items to process');
    }
    return {
      success: report.success,
      message: `Reconciled; ${newKeys.length} new item(s)${options.dryRun ? ' would be processed' : ''}`,
      data: { report },
      errors: report.errors.length > 0 ? report.errors : undefined,
    };
  }

  const run = await runPipeline(ctx, runtime, items, newKeys, {
    workers: options.workers,
    skipSummarization: options.skipSummarization,
    copyPdfs: options.copyPdfs,
    limit: options.limit,
  });

  const errors = [...report.errors, ...run.failed.map((f) => `${f.key}: failed at ${f.stage}: ${f.reason}`)];
  return {
    success: report.success && run.success,
    message: `Reconciled; ${run.succeeded.length} of ${newKeys.length} new item(s) generated`,
    data: { report, run },
    errors: errors.length > 0 ? errors : undefined,
  };
}
