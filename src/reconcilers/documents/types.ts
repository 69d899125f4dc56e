/**
 * Types for document reconciliation
 *
 * The library is the desired state; the document store is the actual state.
 * A plan is computed once per run and is never mutated afterwards.
 */

import type { CollectionPath } from '../../library/types.js';

/**
 * Library item with no document yet (handed to the batch pipeline)
 */
export interface AddedEntry {
  readonly key: string;
  readonly title: string;
  /** Folder the new document will be written to */
  readonly destination: CollectionPath;
}

/**
 * Document whose key is no longer in the library
 */
export interface DeletedEntry {
  readonly key: string;
  readonly folderPath: CollectionPath;
  readonly relativePath: string;
}

/**
 * Document filed under a folder that matches none of its item's collections
 */
export interface MovedEntry {
  readonly key: string;
  readonly fromPath: CollectionPath;
  readonly toPath: CollectionPath;
  /** Store-relative path of the document today */
  readonly source: string;
  readonly fileName: string;
}

/**
 * Several documents carry the same key. The first path (lexicographic) is
 * reconciled; the rest are reported and left alone.
 */
export interface KeyConflict {
  readonly key: string;
  readonly kept: string;
  readonly duplicates: readonly string[];
}

/**
 * Reconciliation plan. Keys are pairwise disjoint across added, deleted and moved.
 */
export interface ReconciliationPlan {
  readonly planId: string;
  readonly timestamp: string;
  readonly collectionFilter?: string;
  readonly added: readonly AddedEntry[];
  readonly deleted: readonly DeletedEntry[];
  readonly moved: readonly MovedEntry[];
  readonly conflicts: readonly KeyConflict[];
  readonly warnings: readonly string[];
  readonly summary: {
    readonly toAdd: number;
    readonly toMove: number;
    readonly toArchive: number;
    readonly inSync: number;
    readonly conflicts: number;
  };
  readonly hasChanges: boolean;
}

/**
 * Options for computing a plan
 */
export interface DiffOptions {
  /** Case-insensitive substring matched against the '/'-joined collection path */
  collectionFilter?: string;
}

/**
 * Apply options for the executor
 */
export interface ApplyOptions {
  /** If true, only report the operations without touching the filesystem */
  dryRun: boolean;
  /** Snapshot the store before mutating it (default: true) */
  backup?: boolean;
}

export type OperationKind = 'move' | 'archive' | 'duplicate' | 'add';

/**
 * A single filesystem operation derived from the plan
 */
export interface PlannedOperation {
  kind: OperationKind;
  key: string;
  /** Store-relative source path */
  from?: string;
  /** Store-relative destination path (a folder for 'add') */
  to?: string;
}

/**
 * - planned: dry run, nothing executed
 * - applied: the filesystem was changed
 * - noop: already in the desired state
 * - reported: handed on to the pipeline (added keys)
 * - failed: see error
 */
export type OperationStatus = 'planned' | 'applied' | 'noop' | 'reported' | 'failed';

export interface OperationResult {
  operation: PlannedOperation;
  status: OperationStatus;
  error?: string;
}

/**
 * Result of applying a plan
 */
export interface ExecutionReport {
  planId: string;
  /** YYYYMMDD partition used for archives */
  runDate: string;
  dryRun: boolean;
  backupPath?: string;
  results: OperationResult[];
  /** Keys for the batch pipeline */
  added: AddedEntry[];
  removedFolders: string[];
  summary: {
    moved: number;
    archived: number;
    unchanged: number;
    failed: number;
    added: number;
    foldersRemoved: number;
  };
  errors: string[];
  success: boolean;
}
