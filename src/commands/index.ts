/**
 * Command exports
 */

export { diffCommand, loadPlan, type DiffOptions, type LoadedPlan } from './diff.js';
export { applyCommand, reconcile, type ApplyCommandOptions, type ApplyResult } from './apply.js';
export { runCommand, runPipeline, selectCandidates, type RunCommandOptions } from './run.js';
export { syncCommand, type SyncOptions, type SyncResult } from './sync.js';
export { collectionsCommand } from './collections.js';
export { statusCommand, type StatusData } from './status.js';
export { createRuntime, type Runtime } from './runtime.js';
