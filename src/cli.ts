/**
 * refnote CLI - Keep a Markdown note vault in sync with a Zotero library
 *
 * Commands:
 * - diff: Show what reconciliation would change
 * - apply: Move and archive documents to match the library
 * - run: Generate documents through the batch pipeline
 * - sync: apply, then run for the new items
 * - collections: List collection paths
 * - status: Show done-record and checkpoint state
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import {
  applyCommand,
  collectionsCommand,
  diffCommand,
  runCommand,
  statusCommand,
  syncCommand,
} from './commands/index.js';
import { printResult, error, verbose as verboseLog } from './utils/output.js';
import { trapStopSignals } from './utils/signals.js';
import { resolveSettings } from './config/index.js';
import { logger } from './api/index.js';
import { formatError } from './errors.js';

const VERSION = '0.1.0';

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

/**
 * Create the command context from parsed options
 *
 * @throws ConfigError when the config file is unreadable or invalid
 */
function createContext(
  options: GlobalOptions,
  overrides: { workers?: number } = {},
  signal?: AbortSignal
): CommandContext {
  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
  }

  const settings = resolveSettings({ configPath: options.config, overrides });
  verboseLog(`Config file: ${settings.configPath ?? '(none)'}`, options.verbose);
  verboseLog(`State directory: ${settings.stateDir}`, options.verbose);

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    settings,
    logger,
    signal,
  };
}

/**
 * Run a command, print its result and exit with its status.
 * With `drain`, stop signals are trapped while the command runs.
 */
async function execute<T>(
  label: string,
  run: (ctx: CommandContext) => Promise<CommandResult<T>>,
  overrides: { workers?: number } = {},
  drain = false
): Promise<void> {
  const globalOpts = program.opts<GlobalOptions>();
  const stop = drain ? trapStopSignals() : undefined;

  try {
    const ctx = createContext(globalOpts, overrides, stop?.signal);
    const result = await run(ctx);
    stop?.release();

    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    } else if (!result.success) {
      printResult(result, ctx.outputFormat);
    }

    process.exit(result.success ? 0 : 1);
  } catch (err) {
    stop?.release();
    if (globalOpts.json) {
      printResult({ success: false, message: formatError(err) }, 'json');
    } else {
      error(`${label} failed`);
      console.error(formatError(err));
    }
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('refnote')
  .description('Keep a Markdown note vault in sync with a Zotero library')
  .version(VERSION)
  .addOption(new Option('--config <file>', 'Path to refnote.config.yaml').env('REFNOTE_CONFIG'))
  .addOption(new Option('--json', 'Output JSON for scripting').default(false))
  .addOption(new Option('-v, --verbose', 'Enable verbose logging').default(false));

/**
 * diff command - Show what would change
 */
program
  .command('diff')
  .description('Show how the document store differs from the library')
  .option('--collection <text>', 'Only consider collections whose path contains this text')
  .action(async (cmdOpts: { collection?: string }) => {
    await execute('Diff', (ctx) => diffCommand(ctx, { collection: cmdOpts.collection }));
  });

/**
 * apply command - Move and archive documents
 */
program
  .command('apply')
  .description('Move and archive documents so the store matches the library')
  .option('--collection <text>', 'Only consider collections whose path contains this text')
  .option('--dry-run', 'Show what would happen without making changes', false)
  .option('--no-backup', 'Skip the snapshot taken before changing the store')
  .action(async (cmdOpts: { collection?: string; dryRun: boolean; backup: boolean }) => {
    await execute('Apply', (ctx) =>
      applyCommand(ctx, {
        collection: cmdOpts.collection,
        dryRun: cmdOpts.dryRun,
        backup: cmdOpts.backup,
      })
    );
  });

/**
 * run command - Generate documents
 */
program
  .command('run')
  .description('Generate documents for library items that have none yet')
  .option('--collection <text>', 'Only consider collections whose path contains this text')
  .option('--workers <n>', 'Number of parallel workers', parsePositiveInt)
  .option('--resume', 'Continue the last interrupted run', false)
  .option('--force', 'Reprocess items that already have a document', false)
  .option('--skip-summarization', 'Render documents without calling the summarization service', false)
  .option('--copy-pdfs', 'Copy each PDF into a PDFs/ folder next to its document', false)
  .option('--limit <n>', 'Process at most this many items', parseNonNegativeInt)
  .option('--dry-run', 'List the items that would be processed', false)
  .option('--keys <keys...>', 'Process exactly these item keys')
  .action(
    async (cmdOpts: {
      collection?: string;
      workers?: number;
      resume: boolean;
      force: boolean;
      skipSummarization: boolean;
      copyPdfs: boolean;
      limit?: number;
      dryRun: boolean;
      keys?: string[];
    }) => {
      await execute('Run', (ctx) => runCommand(ctx, cmdOpts), { workers: cmdOpts.workers }, true);
    }
  );

/**
 * sync command - apply, then run for new items
 */
program
  .command('sync')
  .description('Reconcile the document store, then generate documents for new items')
  .option('--collection <text>', 'Only consider collections whose path contains this text')
  .option('--dry-run', 'Show what would happen without making changes', false)
  .option('--no-backup', 'Skip the snapshot taken before changing the store')
  .option('--workers <n>', 'Number of parallel workers', parsePositiveInt)
  .option('--skip-summarization', 'Render documents without calling the summarization service', false)
  .option('--copy-pdfs', 'Copy each PDF into a PDFs/ folder next to its document', false)
  .option('--limit <n>', 'Process at most this many new items', parseNonNegativeInt)
  .action(
    async (cmdOpts: {
      collection?: string;
      dryRun: boolean;
      backup: boolean;
      workers?: number;
      skipSummarization: boolean;
      copyPdfs: boolean;
      limit?: number;
    }) => {
      await execute('Sync', (ctx) => syncCommand(ctx, cmdOpts), { workers: cmdOpts.workers }, true);
    }
  );

/**
 * collections command - List collections
 */
program
  .command('collections')
  .description('List library collection paths with item counts')
  .action(async () => {
    await execute('Collections', (ctx) => collectionsCommand(ctx));
  });

/**
 * status command - Show current state
 */
program
  .command('status')
  .description('Show done-record and checkpoint state')
  .action(async () => {
    await execute('Status', (ctx) => statusCommand(ctx));
  });

await program.parseAsync(process.argv);
