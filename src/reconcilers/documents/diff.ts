/**
 * Document diff algorithm
 *
 * Compares the library (desired state) with the document store (actual state)
 * and produces a reconciliation plan. Pure: no I/O, no clock other than the
 * plan timestamp.
 */

import type { LibraryItem, LocalDocument } from '../../library/types.js';
import {
  canonicalPaths,
  compareRelativePaths,
  formatPath,
  matchesFilter,
  pathsEqual,
} from '../../library/paths.js';
import type {
  AddedEntry,
  DeletedEntry,
  DiffOptions,
  KeyConflict,
  MovedEntry,
  ReconciliationPlan,
} from './types.js';

/**
 * Generate a unique plan ID
 */
function generatePlanId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `plan-${timestamp}-${random}`;
}

/**
 * Group documents by key; the first path by compareRelativePaths wins
 */
export function indexDocuments(documents: readonly LocalDocument[]): {
  byKey: Map<string, LocalDocument>;
  conflicts: KeyConflict[];
} {
  const groups = new Map<string, LocalDocument[]>();
  for (const doc of documents) {
    const group = groups.get(doc.key);
    if (group) {
      group.push(doc);
    } else {
      groups.set(doc.key, [doc]);
    }
  }

  const byKey = new Map<string, LocalDocument>();
  const conflicts: KeyConflict[] = [];

  for (const [key, group] of groups) {
    const sorted = [...group].sort((a, b) => compareRelativePaths(a.relativePath, b.relativePath));
    byKey.set(key, sorted[0]);
    if (sorted.length > 1) {
      conflicts.push({
        key,
        kept: sorted[0].relativePath,
        duplicates: sorted.slice(1).map((doc) => doc.relativePath),
      });
    }
  }

  return { byKey, conflicts };
}

/**
 * Main diff function - compares library items with local documents
 * and generates a reconciliation plan
 *
 * With a collection filter, an existing item is in scope when any of its
 * collection paths matches; a document whose key is gone from the library is
 * in scope when its own folder matches. Out-of-scope keys appear nowhere.
 */
export function computePlan(
  libraryItems: readonly LibraryItem[],
  localDocuments: readonly LocalDocument[],
  options: DiffOptions = {}
): ReconciliationPlan {
  const filter = options.collectionFilter?.trim() || undefined;
  const warnings: string[] = [];

  const itemsByKey = new Map<string, LibraryItem>();
  for (const item of libraryItems) {
    if (itemsByKey.has(item.key)) {
      warnings.push(`Duplicate key in library: ${item.key}`);
      continue;
    }
    itemsByKey.set(item.key, item);
  }

  const { byKey: docsByKey, conflicts: allConflicts } = indexDocuments(localDocuments);

  const pathsByKey = new Map<string, string[][]>();
  const pathsOf = (item: LibraryItem): string[][] => {
    let paths = pathsByKey.get(item.key);
    if (!paths) {
      paths = canonicalPaths(item);
      pathsByKey.set(item.key, paths);
    }
    return paths;
  };

  const itemInScope = (item: LibraryItem): boolean =>
    !filter || pathsOf(item).some((path) => matchesFilter(path, filter));

  const added: AddedEntry[] = [];
  const deleted: DeletedEntry[] = [];
  const moved: MovedEntry[] = [];
  const inScopeKeys = new Set<string>();
  let inSync = 0;

  for (const [key, doc] of docsByKey) {
    const item = itemsByKey.get(key);

    if (!item) {
      if (filter && !matchesFilter(doc.folderPath, filter)) continue;
      inScopeKeys.add(key);
      deleted.push({ key, folderPath: doc.folderPath, relativePath: doc.relativePath });
      continue;
    }

    if (!itemInScope(item)) continue;
    inScopeKeys.add(key);

    const paths = pathsOf(item);
    if (paths.some((path) => pathsEqual(path, doc.folderPath))) {
      inSync++;
      continue;
    }

    moved.push({
      key,
      fromPath: doc.folderPath,
      toPath: paths[0],
      source: doc.relativePath,
      fileName: doc.fileName,
    });
  }

  for (const item of itemsByKey.values()) {
    if (docsByKey.has(item.key) || !itemInScope(item)) continue;
    added.push({ key: item.key, title: item.title, destination: pathsOf(item)[0] });
  }

  added.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  deleted.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
  moved.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

  const conflicts = allConflicts.filter((conflict) => inScopeKeys.has(conflict.key));
  for (const conflict of conflicts) {
    warnings.push(
      `Key ${conflict.key} appears in ${conflict.duplicates.length + 1} documents; using ${conflict.kept}`
    );
  }

  const summary = {
    toAdd: added.length,
    toMove: moved.length,
    toArchive: deleted.length,
    inSync,
    conflicts: conflicts.length,
  };

  return {
    planId: generatePlanId(),
    timestamp: new Date().toISOString(),
    collectionFilter: filter,
    added,
    deleted,
    moved,
    conflicts,
    warnings,
    summary,
    hasChanges: added.length + moved.length + deleted.length > 0,
  };
}

/**
 * Human-readable one-line description of a move
 */
export function describeMove(entry: MovedEntry): string {
  return `${entry.key}: ${formatPath(entry.fromPath)} -> ${formatPath(entry.toPath)}`;
}
