/**
 * status command - Show done-record and checkpoint state
 */

import type { CommandContext, CommandResult } from '../types.js';
import { printStatus, verbose } from '../utils/output.js';
import { createRuntime, type Runtime } from './runtime.js';

export interface StatusData {
  configPath?: string;
  outputDir?: string;
  stateDir: string;
  doneCount: number;
  checkpoint?: {
    runId: string;
    processed: number;
    pending: number;
    lastUpdated: string;
  };
}

/**
 * Execute the status command
 */
export async function statusCommand(
  ctx: CommandContext,
  runtime: Runtime = createRuntime(ctx.settings, ctx.logger)
): Promise<CommandResult<StatusData>> {
  verbose(`Executing status command`, ctx.options.verbose);

  const done = await runtime.doneRecord();
  const checkpoint = await runtime.checkpoints().load();

  const data: StatusData = {
    configPath: ctx.settings.configPath,
    outputDir: ctx.settings.outputDir,
    stateDir: ctx.settings.stateDir,
    doneCount: done.size,
    checkpoint: checkpoint && {
      runId: checkpoint.runId,
      processed: checkpoint.processedKeys.length,
      pending: checkpoint.pendingQueue.length,
      lastUpdated: checkpoint.lastUpdated,
    },
  };

  if (ctx.outputFormat === 'human') {
    printStatus('Refnote Status', {
      configFile: data.configPath,
      outputDir: data.outputDir,
      stateDir: data.stateDir,
      documentsDone: data.doneCount,
      checkpoint: data.checkpoint
        ? `${data.checkpoint.runId}: ${data.checkpoint.pending} pending, ${data.checkpoint.processed} processed (${data.checkpoint.lastUpdated})`
        : undefined,
    }, ctx.outputFormat);
  }

  return {
    success: true,
    message: checkpoint
      ? `${done.size} document(s) done; interrupted run ${checkpoint.runId} can be resumed`
      : `${done.size} document(s) done`,
    data,
  };
}
