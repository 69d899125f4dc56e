/**
 * Unit Tests: DocumentStore
 *
 * Tests key parsing, scanning, atomic writes, moves and empty-folder cleanup
 * against a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';

import { DocumentStore, parseDocumentKey, parseFrontmatter } from '../../src/store/document-store.js';
import { makeTempDir, quietLogger, removeDir, writeNote } from '../helpers.js';

describe('parseDocumentKey', () => {
  it('prefers the frontmatter key over the filename', () => {
    expect(parseDocumentKey('Title_FILEKEY.md', '---\nkey: FMKEY\ntitle: x\n---\nbody')).toBe('FMKEY');
  });

  it('falls back to the suffix after the last underscore', () => {
    expect(parseDocumentKey('A_title_with_parts_KEY42.md', '# no frontmatter')).toBe('KEY42');
  });

  it('rejects suffixes that are not keys', () => {
    expect(parseDocumentKey('Title_bad-key.md', '')).toBeUndefined();
    expect(parseDocumentKey('no-underscore.md', '')).toBeUndefined();
  });

  it('ignores malformed frontmatter', () => {
    expect(parseFrontmatter('---\nkey: [unclosed\n---\n')).toBeUndefined();
    expect(parseDocumentKey('Paper_ABC.md', '---\nkey: [unclosed\n---\n')).toBe('ABC');
  });
});

describe('DocumentStore', () => {
  let root: string;
  let store: DocumentStore;

  beforeEach(async () => {
    root = await makeTempDir();
    store = new DocumentStore(root, { logger: quietLogger });
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe('scan', () => {
    it('returns keyed notes sorted by path and skips reserved folders', async () => {
      await writeNote(root, 'ML/Vision/Paper_ABC123.md', 'body');
      await writeNote(root, 'Root note_XYZ9.md', 'body');
      await writeNote(root, 'Notes/renamed.md', '---\nkey: FM1\n---\nbody');
      await writeNote(root, 'Notes/no-key.md', 'body');
      await writeNote(root, 'Notes/figure.png', '');
      await writeNote(root, '_archived/20240101/Old_OLD1.md', '');
      await writeNote(root, 'img/x_IMG1.md', '');
      await writeNote(root, '.obsidian/y_DOT1.md', '');

      const docs = await store.scan();

      expect(docs.map((d) => d.key)).toEqual(['ABC123', 'FM1', 'XYZ9']);
      expect(docs[0].folderPath).toEqual(['ML', 'Vision']);
      expect(docs[0].relativePath).toBe('ML/Vision/Paper_ABC123.md');
      expect(docs[1].folderPath).toEqual(['Notes']);
      expect(docs[2].folderPath).toEqual(['Uncategorized']);
      expect(docs[2].fileName).toBe('Root note_XYZ9.md');
    });

    it('orders paths by code unit, uppercase before lowercase', async () => {
      await writeNote(root, 'b/Paper_K2.md', 'body');
      await writeNote(root, 'C/Paper_K3.md', 'body');
      await writeNote(root, 'a/Paper_K1.md', 'body');

      const docs = await store.scan();

      expect(docs.map((d) => d.relativePath)).toEqual(['C/Paper_K3.md', 'a/Paper_K1.md', 'b/Paper_K2.md']);
    });

    it('returns nothing when the root does not exist', async () => {
      const missing = new DocumentStore(join(root, 'missing'), { logger: quietLogger });
      expect(await missing.scan()).toEqual([]);
    });
  });

  describe('write', () => {
    it('writes atomically and leaves no temp file', async () => {
      const rel = await store.writeAt('A/B/Note_K1.md', 'hello');

      expect(rel).toBe('A/B/Note_K1.md');
      expect(await readFile(join(root, 'A', 'B', 'Note_K1.md'), 'utf-8')).toBe('hello');
      expect(await readdir(join(root, 'A', 'B'))).toEqual(['Note_K1.md']);
    });

    it('overwrites an existing note in place', async () => {
      await writeNote(root, 'A/Note_K1.md', 'old');
      await store.writeAt('A/Note_K1.md', 'new');
      expect(await readFile(join(root, 'A', 'Note_K1.md'), 'utf-8')).toBe('new');
    });

    it('writes binary assets and keeps them out of the scan', async () => {
      const rel = await store.writeBinary('img/Note_K1/figure_1.png', new Uint8Array([137, 80, 78, 71]));

      expect(rel).toBe('img/Note_K1/figure_1.png');
      expect([...(await readFile(join(root, 'img', 'Note_K1', 'figure_1.png')))]).toEqual([137, 80, 78, 71]);
      expect(await store.scan()).toEqual([]);
    });
  });

  describe('move', () => {
    it('creates destination folders', async () => {
      await writeNote(root, 'Old/Note_K1.md', 'x');
      await store.move('Old/Note_K1.md', 'New/Deep/Note_K1.md');

      expect(await store.exists('Old/Note_K1.md')).toBe(false);
      expect(await store.exists('New/Deep/Note_K1.md')).toBe(true);
    });
  });

  describe('removeEmptyFolders', () => {
    it('removes empty folders bottom-up and keeps reserved ones', async () => {
      await mkdir(join(root, 'A', 'B'), { recursive: true });
      await writeNote(root, 'C/Note_K1.md', 'x');
      await mkdir(join(root, 'img'), { recursive: true });
      await mkdir(join(root, '_archived', '20240101'), { recursive: true });

      const removed = await store.removeEmptyFolders();

      expect(removed).toEqual(['A', 'A/B']);
      expect((await stat(join(root, 'img'))).isDirectory()).toBe(true);
      expect((await stat(join(root, 'C'))).isDirectory()).toBe(true);
      expect((await stat(root)).isDirectory()).toBe(true);
    });
  });
});
