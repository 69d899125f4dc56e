/**
 * collections command - List library collection paths with item counts
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { LibraryCollection } from '../library/types.js';
import { header, printLines, verbose } from '../utils/output.js';
import { formatCollections } from '../utils/report.js';
import { createRuntime, type Runtime } from './runtime.js';

export async function collectionsCommand(
  ctx: CommandContext,
  runtime: Runtime = createRuntime(ctx.settings, ctx.logger)
): Promise<CommandResult<LibraryCollection[]>> {
  verbose(`Executing collections command`, ctx.options.verbose);

  const collections = await runtime.library().listCollections();

  if (ctx.outputFormat === 'human') {
    header('Collections');
    printLines(formatCollections(collections));
  }

  return {
    success: true,
    message: `${collections.length} collection(s)`,
    data: collections,
  };
}
