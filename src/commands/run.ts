/**
 * run command - Generate documents for library items through the batch pipeline
 */

import type { CommandContext, CommandResult } from '../types.js';
import { dryRunNotice, header, info, printLines, verbose, warn } from '../utils/output.js';
import { formatRunSummary } from '../utils/report.js';
import { canonicalPaths, matchesFilter } from '../library/paths.js';
import type { LibraryItem } from '../library/types.js';
import { BatchPipeline, type RunSummary, type StageConfig, type SummaryCaller } from '../pipeline/index.js';
import { indexDocuments } from '../reconcilers/documents/index.js';
import { createRuntime, type Runtime } from './runtime.js';

export interface RunCommandOptions {
  collection?: string;
  workers?: number;
  resume?: boolean;
  force?: boolean;
  skipSummarization?: boolean;
  copyPdfs?: boolean;
  limit?: number;
  dryRun?: boolean;
  /** Process exactly these keys */
  keys?: string[];
}

export interface RunDryRunResult {
  candidates: string[];
  alreadyDone: number;
}

const summarizationDisabled: SummaryCaller = {
  call: async () => {
    throw new Error('summarization is disabled for this run');
  },
};

/**
 * Candidate keys: explicit keys, else every item in scope of the filter
 */
export function selectCandidates(
  items: readonly LibraryItem[],
  options: Pick<RunCommandOptions, 'collection' | 'keys'>
): { candidates: string[]; unknown: string[] } {
  if (options.keys && options.keys.length > 0) {
    const known = new Set(items.map((item) => item.key));
    return {
      candidates: options.keys.filter((key) => known.has(key)),
      unknown: options.keys.filter((key) => !known.has(key)),
    };
  }

  const filter = options.collection?.trim();
  const candidates = items
    .filter((item) => !filter || canonicalPaths(item).some((path) => matchesFilter(path, filter)))
    .map((item) => item.key);
  return { candidates, unknown: [] };
}

export function buildStageConfig(ctx: CommandContext, options: RunCommandOptions): StageConfig {
  const { pipeline, openai } = ctx.settings;
  return {
    workers: options.workers ?? pipeline.workers,
    checkpointEvery: pipeline.checkpointEvery,
    resume: options.resume ?? false,
    force: options.force ?? false,
    skipSummarization: options.skipSummarization ?? false,
    copyPdfs: options.copyPdfs ?? false,
    languageHint: pipeline.languageHint,
    templateId: pipeline.templateId,
    model: openai.model,
    limit: options.limit,
  };
}

/**
 * Run the pipeline over candidate keys; shared with sync
 *
 * @throws IntegrityError when the done record or checkpoint cannot be written
 */
export async function runPipeline(
  ctx: CommandContext,
  runtime: Runtime,
  items: readonly LibraryItem[],
  candidates: readonly string[],
  options: RunCommandOptions
): Promise<RunSummary> {
  const config = buildStageConfig(ctx, options);
  const store = runtime.store();
  const library = runtime.library();

  // Duplicates resolve to the same document reconciliation keeps
  const existingDocuments = new Map<string, string>();
  for (const [key, doc] of indexDocuments(await store.scan()).byKey) {
    existingDocuments.set(key, doc.relativePath);
  }

  const pipeline = new BatchPipeline({
    items: new Map(items.map((item) => [item.key, item])),
    fetchAttachment: (ref) => library.fetchAttachment(ref),
    extractor: runtime.extractor(),
    summarizer: config.skipSummarization ? summarizationDisabled : runtime.summarizer(),
    renderer: runtime.renderer(),
    store,
    existingDocuments,
    doneRecord: await runtime.doneRecord(),
    checkpoints: runtime.checkpoints(),
    audit: runtime.audit('pipeline'),
    logger: ctx.logger,
  });

  const summary = await pipeline.run(candidates, config, ctx.signal);

  if (ctx.outputFormat === 'human') {
    console.log('');
    printLines(formatRunSummary(summary));
  }
  return summary;
}

/**
 * Execute the run command
 */
export async function runCommand(
  ctx: CommandContext,
  options: RunCommandOptions = {},
  runtime: Runtime = createRuntime(ctx.settings, ctx.logger)
): Promise<CommandResult<RunSummary | RunDryRunResult>> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose(`Executing run command`, globalOpts.verbose);
  verbose(`Workers: ${options.workers ?? ctx.settings.pipeline.workers}`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Generate Documents');
    if (options.dryRun) {
      dryRunNotice();
    }
  }

  const items = await runtime.library().listItems();
  const { candidates, unknown } = selectCandidates(items, options);
  if (unknown.length > 0 && outputFormat === 'human') {
    warn(`Not in the library: ${unknown.join(', ')}`);
  }

  if (options.dryRun) {
    const done = await runtime.doneRecord();
    const pending = candidates.filter((key) => options.force || !done.has(key));
    const selected = options.limit !== undefined ? pending.slice(0, options.limit) : pending;
    if (outputFormat === 'human') {
      info(`${selected.length} item(s) would be processed`);
      const titles = new Map(items.map((item) => [item.key, item.title]));
      for (const key of selected) {
        console.log(`  ${key} ${titles.get(key) ?? ''}`);
      }
    }
    return {
      success: true,
      message: `${selected.length} item(s) would be processed`,
      data: { candidates: selected, alreadyDone: candidates.length - pending.length },
    };
  }

  const summary = await runPipeline(ctx, runtime, items, candidates, options);
  const errors = [
    ...unknown.map((key) => `${key}: not in the library`),
    ...summary.failed.map((f) => `${f.key}: failed at ${f.stage}: ${f.reason}`),
  ];

  return {
    success: summary.success && unknown.length === 0,
    message: summary.interrupted
      ? `Interrupted after ${summary.succeeded.length + summary.failed.length} item(s); ${summary.remaining.length} left`
      : `Processed ${summary.succeeded.length + summary.failed.length} item(s): ${summary.succeeded.length} succeeded, ${summary.failed.length} failed`,
    data: summary,
    errors: errors.length > 0 ? errors : undefined,
  };
}
