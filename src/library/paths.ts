/**
 * Collection path helpers
 *
 * Library collection names become folder names on disk, so every segment is
 * sanitized the same way before paths are compared or created.
 */

import { UNCATEGORIZED, type CollectionPath, type LibraryItem } from './types.js';

/**
 * Sanitize a single collection name for use as a folder name
 *
 * @example
 * sanitizeSegment('Theory: Part 1/2') // 'Theory- Part 1-2'
 */
export function sanitizeSegment(name: string): string {
  return name
    .replace(/[/\\:]/g, '-')
    .replace(/[*?"<>|]/g, '')
    .trim();
}

/**
 * Sanitize every segment of a path, dropping segments that become empty
 */
export function sanitizePath(path: CollectionPath): string[] {
  return path.map(sanitizeSegment).filter((segment) => segment.length > 0);
}

/**
 * Filename-safe form of a title: alphanumerics, space, '-' and '_', at most 100 chars
 */
export function safeTitle(title: string): string {
  const kept = Array.from(title)
    .filter((ch) => /[\p{L}\p{N} _-]/u.test(ch))
    .join('');
  return kept.slice(0, 100).trim() || 'Untitled';
}

/**
 * Document file name for an item: `<safeTitle>_<KEY>.md`
 */
export function documentFileName(title: string, key: string): string {
  return `${safeTitle(title)}_${key}.md`;
}

/**
 * Join path segments with '/'
 */
export function formatPath(path: CollectionPath): string {
  return path.join('/');
}

/**
 * Split a '/'-separated path string into segments
 */
export function parsePath(value: string): string[] {
  return value.split('/').map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Segment-wise equality
 */
export function pathsEqual(a: CollectionPath, b: CollectionPath): boolean {
  return a.length === b.length && a.every((segment, i) => segment === b[i]);
}

/**
 * Order of store-relative paths by UTF-16 code units; decides which of
 * several documents for one key is kept
 */
export function compareRelativePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Lexicographic order over segments; a prefix sorts first
 */
export function comparePaths(a: CollectionPath, b: CollectionPath): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] < b[i]) return -1;
    if (a[i] > b[i]) return 1;
  }
  return a.length - b.length;
}

/**
 * The item's collection paths in sanitized, canonical order.
 * An item with no collections lives under the Uncategorized sentinel.
 */
export function canonicalPaths(item: Pick<LibraryItem, 'collectionPaths'>): string[][] {
  const sanitized = item.collectionPaths
    .map(sanitizePath)
    .filter((path) => path.length > 0);

  if (sanitized.length === 0) {
    return [[UNCATEGORIZED]];
  }

  const unique = new Map<string, string[]>();
  for (const path of sanitized) {
    unique.set(formatPath(path), path);
  }
  return [...unique.values()].sort(comparePaths);
}

/**
 * Folder an item's document belongs in when it has none yet
 */
export function primaryPath(item: Pick<LibraryItem, 'collectionPaths'>): string[] {
  return canonicalPaths(item)[0];
}

/**
 * Case-insensitive collection filter: matches when the joined path contains the filter
 */
export function matchesFilter(path: CollectionPath, filter: string): boolean {
  const needle = filter.trim().toLowerCase();
  if (needle.length === 0) return true;
  return formatPath(path).toLowerCase().includes(needle);
}
