/**
 * Document reconciler exports
 *
 * Keeps the document store's folder layout in line with the library's
 * collections: diff into a plan, then apply moves and archives.
 */

export type {
  AddedEntry,
  DeletedEntry,
  MovedEntry,
  KeyConflict,
  ReconciliationPlan,
  DiffOptions,
  ApplyOptions,
  OperationKind,
  PlannedOperation,
  OperationStatus,
  OperationResult,
  ExecutionReport,
} from './types.js';

export { computePlan, describeMove, indexDocuments } from './diff.js';

export type { ExecutorDeps } from './apply.js';
export { ReconciliationExecutor, planOperations } from './apply.js';
