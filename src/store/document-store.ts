/**
 * DocumentStore - the local tree of generated notes
 *
 * Layout: `<root>/<collection segments>/<safeTitle>_<KEY>.md`. The store only
 * moves and writes files; it never deletes a document.
 */

import { mkdir, readdir, readFile, rename, rmdir, stat, writeFile } from 'node:fs/promises';
import { dirname, join, posix, relative, sep } from 'node:path';
import { parse as parseYaml } from 'yaml';

import { UNCATEGORIZED, type LocalDocument } from '../library/types.js';
import { compareRelativePaths } from '../library/paths.js';
import { logger as defaultLogger, type Logger } from '../api/logger.js';

/**
 * Folder holding archived documents, partitioned by run date
 */
export const ARCHIVE_DIR = '_archived';

/**
 * Folder holding extracted figures, one subfolder per document
 */
export const IMAGE_DIR = 'img';

/**
 * Folder names never scanned or cleaned up
 */
const SKIPPED_DIRS = new Set([IMAGE_DIR, ARCHIVE_DIR]);

const FRONTMATTER_PATTERN = /^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)/;
const KEY_PATTERN = /^[A-Za-z0-9]+$/;

function isSkippedDir(name: string): boolean {
  return SKIPPED_DIRS.has(name) || name.startsWith('.');
}

function toPosix(path: string): string {
  return path.split(sep).join(posix.sep);
}

/**
 * Read the leading YAML frontmatter block of a note, if any
 */
export function parseFrontmatter(content: string): Record<string, unknown> | undefined {
  const match = FRONTMATTER_PATTERN.exec(content);
  if (!match) return undefined;

  try {
    const parsed: unknown = parseYaml(match[1]);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch {
    // Malformed frontmatter falls back to the filename
    return undefined;
  }
  return undefined;
}

/**
 * Determine a note's library key: frontmatter `key:` first, then the
 * filename suffix after the last `_`.
 */
export function parseDocumentKey(fileName: string, content: string): string | undefined {
  const frontmatter = parseFrontmatter(content);
  const declared = frontmatter?.key;
  if (typeof declared === 'string' && KEY_PATTERN.test(declared.trim())) {
    return declared.trim();
  }

  if (!fileName.endsWith('.md')) return undefined;
  const stem = fileName.slice(0, -'.md'.length);
  const underscore = stem.lastIndexOf('_');
  if (underscore < 0) return undefined;

  const suffix = stem.slice(underscore + 1);
  return KEY_PATTERN.test(suffix) ? suffix : undefined;
}

/**
 * Local note tree with key-aware scanning and atomic writes
 */
export class DocumentStore {
  private readonly log: Logger;

  constructor(
    public readonly root: string,
    options: { logger?: Logger } = {}
  ) {
    this.log = (options.logger ?? defaultLogger).child({ component: 'document-store' });
  }

  /**
   * Absolute path of a '/'-separated store-relative path
   */
  resolve(relativePath: string): string {
    return join(this.root, ...relativePath.split('/'));
  }

  /**
   * Enumerate every note that carries a library key
   */
  async scan(): Promise<LocalDocument[]> {
    const documents: LocalDocument[] = [];

    try {
      await stat(this.root);
    } catch {
      this.log.debug('Document store does not exist yet', { root: this.root });
      return documents;
    }

    await this.walk(this.root, documents);
    documents.sort((a, b) => compareRelativePaths(a.relativePath, b.relativePath));
    return documents;
  }

  private async walk(dir: string, out: LocalDocument[]): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      const absolutePath = join(dir, entry.name);

      if (entry.isDirectory()) {
        if (!isSkippedDir(entry.name)) {
          await this.walk(absolutePath, out);
        }
        continue;
      }

      if (!entry.isFile() || !entry.name.endsWith('.md')) continue;

      const content = await readFile(absolutePath, 'utf-8');
      const key = parseDocumentKey(entry.name, content);
      if (!key) {
        this.log.debug('Skipping note without key', { path: absolutePath });
        continue;
      }

      const relativePath = toPosix(relative(this.root, absolutePath));
      const segments = relativePath.split('/').slice(0, -1);

      out.push({
        key,
        folderPath: segments.length > 0 ? segments : [UNCATEGORIZED],
        fileName: entry.name,
        relativePath,
        absolutePath,
        content,
      });
    }
  }

  async exists(relativePath: string): Promise<boolean> {
    try {
      await stat(this.resolve(relativePath));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Move a file inside the store, creating destination folders as needed
   */
  async move(fromRelative: string, toRelative: string): Promise<void> {
    const target = this.resolve(toRelative);
    await mkdir(dirname(target), { recursive: true });
    await rename(this.resolve(fromRelative), target);
    this.log.debug('Moved document', { from: fromRelative, to: toRelative });
  }

  /**
   * Atomically overwrite (or create) the note at a store-relative path
   * (temp file, then rename)
   *
   * @returns The store-relative path written
   */
  async writeAt(relativePath: string, content: string): Promise<string> {
    await this.writeAtomic(relativePath, content);
    this.log.debug('Wrote document', { path: relativePath });
    return relativePath;
  }

  /**
   * Atomically write a note asset (image, PDF copy) at a store-relative path
   */
  async writeBinary(relativePath: string, data: Uint8Array): Promise<string> {
    await this.writeAtomic(relativePath, data);
    this.log.debug('Wrote asset', { path: relativePath, bytes: data.length });
    return relativePath;
  }

  private async writeAtomic(relativePath: string, content: string | Uint8Array): Promise<void> {
    const target = this.resolve(relativePath);
    const temp = `${target}.${process.pid}.tmp`;

    await mkdir(dirname(target), { recursive: true });
    await writeFile(temp, content);
    await rename(temp, target);
  }

  /**
   * Remove folders left empty, bottom-up. Never touches the root,
   * `img/`, `_archived/` or dot-folders.
   *
   * @returns Store-relative paths of removed folders
   */
  async removeEmptyFolders(): Promise<string[]> {
    const removed: string[] = [];
    try {
      await stat(this.root);
    } catch {
      return removed;
    }
    await this.prune(this.root, removed);
    return removed.sort();
  }

  private async prune(dir: string, removed: string[]): Promise<boolean> {
    const entries = await readdir(dir, { withFileTypes: true });
    let remaining = entries.length;

    for (const entry of entries) {
      if (!entry.isDirectory() || isSkippedDir(entry.name)) continue;
      const child = join(dir, entry.name);
      if (await this.prune(child, removed)) {
        remaining--;
      }
    }

    if (remaining > 0 || dir === this.root) {
      return false;
    }

    await rmdir(dir);
    const relativePath = toPosix(relative(this.root, dir));
    removed.push(relativePath);
    this.log.debug('Removed empty folder', { path: relativePath });
    return true;
  }
}
