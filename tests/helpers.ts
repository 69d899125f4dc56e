/**
 * Shared fixtures for unit tests
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { createLogger } from '../src/api/logger.js';
import type { LibraryItem, LocalDocument } from '../src/library/types.js';

/**
 * Logger that only prints errors
 */
export const quietLogger = createLogger({ level: 'error' });

export async function makeTempDir(prefix = 'refnote-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write a file below root, creating parent folders
 */
export async function writeNote(root: string, relativePath: string, content = ''): Promise<string> {
  const target = join(root, ...relativePath.split('/'));
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, content, 'utf-8');
  return target;
}

export function makeItem(key: string, overrides: Partial<LibraryItem> = {}): LibraryItem {
  return {
    key,
    title: `Paper ${key}`,
    authors: ['Doe, Jane'],
    collectionPaths: [],
    tags: [],
    extra: {},
    ...overrides,
  };
}

/**
 * Local document as DocumentStore.scan would report it
 */
export function makeDoc(key: string, folderPath: string[], fileName = `Paper ${key}_${key}.md`): LocalDocument {
  const relativePath = [...folderPath, fileName].join('/');
  return {
    key,
    folderPath,
    fileName,
    relativePath,
    absolutePath: `/store/${relativePath}`,
    content: '',
  };
}
