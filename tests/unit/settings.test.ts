/**
 * Unit Tests: Settings resolution
 *
 * Tests the CLI > environment > config file > default precedence, config
 * file validation and the required-setting errors.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';

import {
  DEFAULT_FRESHNESS_HOURS,
  expandPath,
  loadConfigFile,
  requireBackupDir,
  requireOpenAIKey,
  requireOutputDir,
  requireZotero,
  resolveSettings,
  validateConfigFile,
} from '../../src/config/settings.js';
import { ConfigError } from '../../src/errors.js';
import { DEFAULT_ITEM_TYPES } from '../../src/api/zotero.js';
import { makeTempDir, removeDir, writeNote } from '../helpers.js';

const CONFIG = `
outputDir: notes
zotero:
  userId: 12345
  apiKey: test-secret
  itemTypes: [journalArticle]
openai:
  model: gpt-4o
pipeline:
  workers: 3
  languageHint: de
cache:
  freshnessHours: 24
`;

describe('resolveSettings', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('uses defaults when nothing is configured', () => {
    const settings = resolveSettings({ cwd: dir, env: {} });

    expect(settings.outputDir).toBeUndefined();
    expect(settings.stateDir).toBe(join(dir, '.refnote'));
    expect(settings.backupDir).toBeUndefined();
    expect(settings.zotero).toEqual({
      userId: undefined,
      apiKey: undefined,
      libraryType: 'user',
      itemTypes: [...DEFAULT_ITEM_TYPES],
    });
    expect(settings.openai.model).toBe('gpt-4o-mini');
    expect(settings.pipeline).toEqual({ workers: 5, checkpointEvery: 10, languageHint: 'en', templateId: 'literature_note' });
    expect(settings.cache.freshnessHours).toBe(DEFAULT_FRESHNESS_HOURS);
    expect(settings.configPath).toBeUndefined();
  });

  it('reads refnote.config.yaml from the working directory', async () => {
    await writeNote(dir, 'refnote.config.yaml', CONFIG);

    const settings = resolveSettings({ cwd: dir, env: {} });

    expect(settings.configPath).toBe(join(dir, 'refnote.config.yaml'));
    expect(settings.outputDir).toBe(join(dir, 'notes'));
    expect(settings.backupDir).toBe(join(dir, 'backups'));
    expect(settings.zotero).toMatchObject({ userId: '12345', apiKey: 'test-secret', itemTypes: ['journalArticle'] });
    expect(settings.openai.model).toBe('gpt-4o');
    expect(settings.pipeline.workers).toBe(3);
    expect(settings.pipeline.languageHint).toBe('de');
    expect(settings.cache.freshnessHours).toBe(24);
  });

  it('resolves file paths relative to an explicit config file', async () => {
    await writeNote(dir, 'conf/custom.yaml', 'outputDir: ../vault\nstateDir: state\n');

    const settings = resolveSettings({ cwd: '/elsewhere', env: {}, configPath: join(dir, 'conf/custom.yaml') });

    expect(settings.outputDir).toBe(join(dir, 'vault'));
    expect(settings.stateDir).toBe(join(dir, 'conf', 'state'));
  });

  it('lets the environment override the file', async () => {
    await writeNote(dir, 'refnote.config.yaml', CONFIG);

    const settings = resolveSettings({
      cwd: dir,
      env: {
        REFNOTE_OUTPUT_DIR: '/vault',
        ZOTERO_API_KEY: 'test-secret-env',
        ZOTERO_LIBRARY_TYPE: 'group',
        OPENAI_API_KEY: 'test-secret-openai',
        REFNOTE_MODEL: 'gpt-4.1',
        REFNOTE_WORKERS: '8',
        REFNOTE_LANGUAGE: 'fr',
      },
    });

    expect(settings.outputDir).toBe('/vault');
    expect(settings.backupDir).toBe('/backups');
    expect(settings.zotero.apiKey).toBe('test-secret-env');
    expect(settings.zotero.userId).toBe('12345');
    expect(settings.zotero.libraryType).toBe('group');
    expect(settings.openai).toEqual({ apiKey: 'test-secret-openai', model: 'gpt-4.1' });
    expect(settings.pipeline.workers).toBe(8);
    expect(settings.pipeline.languageHint).toBe('fr');
  });

  it('lets CLI flags override the environment', () => {
    const settings = resolveSettings({
      cwd: dir,
      env: { REFNOTE_OUTPUT_DIR: '/vault', REFNOTE_WORKERS: '8', REFNOTE_MODEL: 'gpt-4.1' },
      overrides: { outputDir: 'local', workers: 2, model: 'gpt-4o' },
    });

    expect(settings.outputDir).toBe(join(dir, 'local'));
    expect(settings.pipeline.workers).toBe(2);
    expect(settings.openai.model).toBe('gpt-4o');
  });

  it('accepts OUTPUT_DIR as a fallback name', () => {
    expect(resolveSettings({ cwd: dir, env: { OUTPUT_DIR: '/notes' } }).outputDir).toBe('/notes');
  });

  it('rejects a malformed REFNOTE_WORKERS', () => {
    expect(() => resolveSettings({ cwd: dir, env: { REFNOTE_WORKERS: 'many' } })).toThrow(
      'REFNOTE_WORKERS must be a positive integer, got "many"'
    );
  });

  it('rejects a missing explicit config file', () => {
    expect(() => resolveSettings({ cwd: dir, env: {}, configPath: 'nope.yaml' })).toThrow(ConfigError);
  });
});

describe('validateConfigFile', () => {
  it('accepts an empty document', () => {
    expect(validateConfigFile(null)).toEqual({});
  });

  it('names the offending field', () => {
    expect(() => validateConfigFile({ zotero: 'x' })).toThrow('Config field "zotero" must be a mapping');
    expect(() => validateConfigFile({ outputDir: '' })).toThrow('Config field "outputDir" must be a non-empty string');
    expect(() => validateConfigFile({ pipeline: { workers: 0 } })).toThrow(
      'Config field "pipeline.workers" must be a positive integer'
    );
    expect(() => validateConfigFile({ zotero: { itemTypes: [] } })).toThrow(
      'Config field "zotero.itemTypes" must be a non-empty list of strings'
    );
    expect(() => validateConfigFile({ zotero: { libraryType: 'team' } })).toThrow(
      'zotero.libraryType must be "user" or "group", got "team"'
    );
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => validateConfigFile(['a'])).toThrow('Config file must contain a YAML mapping');
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reports invalid YAML', async () => {
    const path = await writeNote(dir, 'bad.yaml', 'zotero: [unclosed\n');
    expect(() => loadConfigFile(path)).toThrow(`Invalid YAML in ${path}`);
  });

  it('suggests checking the path of an unreadable file', () => {
    try {
      loadConfigFile(join(dir, 'missing.yaml'));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ suggestion: 'Check the --config path' });
    }
  });
});

describe('expandPath', () => {
  it('expands the home directory', () => {
    expect(expandPath('~/notes', '/cwd')).toBe(join(homedir(), 'notes'));
    expect(expandPath('~', '/cwd')).toBe(homedir());
  });

  it('makes relative paths absolute', () => {
    expect(expandPath('notes', '/cwd')).toBe('/cwd/notes');
    expect(expandPath('/abs', '/cwd')).toBe('/abs');
  });
});

describe('required settings', () => {
  const bare = resolveSettings({ cwd: '/work', env: {} });

  it('requires an output directory', () => {
    expect(() => requireOutputDir(bare)).toThrow('No output directory configured');
    expect(() => requireBackupDir(bare)).toThrow('No output directory configured');
  });

  it('requires Zotero credentials', () => {
    expect(() => requireZotero(bare)).toThrow('No Zotero user ID configured');
    const withUser = { ...bare, zotero: { ...bare.zotero, userId: '1' } };
    expect(() => requireZotero(withUser)).toThrow('No Zotero API key configured');
    const complete = { ...bare, zotero: { ...bare.zotero, userId: '1', apiKey: 'test-secret' } };
    expect(requireZotero(complete)).toEqual({ userId: '1', apiKey: 'test-secret' });
  });

  it('requires an OpenAI key and points at --skip-summarization', () => {
    try {
      requireOpenAIKey(bare);
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({
        message: 'No OpenAI API key configured',
        suggestion: 'Set OPENAI_API_KEY, or pass --skip-summarization',
      });
    }
  });

  it('derives the backup directory beside the output directory', () => {
    expect(requireBackupDir({ ...bare, outputDir: '/data/notes' })).toBe('/data/backups');
  });
});
