/**
 * diff command - Show what reconciliation would change
 */

import type { CommandContext, CommandResult } from '../types.js';
import { header, info, printLines, verbose } from '../utils/output.js';
import { formatPlanDetails, formatPlanSummary } from '../utils/report.js';
import { computePlan, type ReconciliationPlan } from '../reconcilers/documents/index.js';
import type { LibraryItem } from '../library/types.js';
import { createRuntime, type Runtime } from './runtime.js';

export interface DiffOptions {
  /** Only consider collections whose path contains this text */
  collection?: string;
}

export interface LoadedPlan {
  plan: ReconciliationPlan;
  /** Full library listing; the filter is applied by the differ */
  items: LibraryItem[];
}

/**
 * Fetch both sides and compute the plan
 */
export async function loadPlan(runtime: Runtime, collection?: string): Promise<LoadedPlan> {
  // Unfiltered: an item moved out of the filtered collections must not look deleted
  const items = await runtime.library().listItems();
  const documents = await runtime.store().scan();
  const plan = computePlan(items, documents, { collectionFilter: collection });
  return { plan, items };
}

/**
 * Execute the diff command
 */
export async function diffCommand(
  ctx: CommandContext,
  options: DiffOptions = {},
  runtime: Runtime = createRuntime(ctx.settings, ctx.logger)
): Promise<CommandResult<ReconciliationPlan>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose(`Executing diff command`, globalOpts.verbose);
  verbose(`Collection filter: ${options.collection ?? '(all)'}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Library Diff');
    info('Comparing the library with the document store...');
  }

  const { plan } = await loadPlan(runtime, options.collection);

  if (outputFormat === 'human') {
    printLines(formatPlanSummary(plan));
    const details = formatPlanDetails(plan);
    if (details) {
      console.log('');
      printLines(details);
    }
  }

  const changes = plan.summary.toAdd + plan.summary.toMove + plan.summary.toArchive;
  return {
    success: true,
    message: changes === 0 ? 'Document store is in sync' : `Found ${changes} change(s)`,
    data: plan,
  };
}
