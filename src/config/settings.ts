/**
 * Settings resolution for refnote
 *
 * Resolution priority order (highest to lowest):
 * 1. CLI flags
 * 2. Environment variables (REFNOTE_*, ZOTERO_*, OPENAI_API_KEY)
 * 3. Config file (refnote.config.yaml in the working directory, or --config)
 * 4. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';

import { ConfigError } from '../errors.js';
import type { LibraryType } from '../api/types.js';
import { DEFAULT_ITEM_TYPES } from '../api/zotero.js';
import { DEFAULT_MODEL } from '../api/openai.js';
import { DEFAULT_STAGE_CONFIG } from '../pipeline/types.js';

/** Config file looked up in the working directory */
export const DEFAULT_CONFIG_FILE = 'refnote.config.yaml';

export const DEFAULT_STATE_DIR = '.refnote';

export const DEFAULT_FRESHNESS_HOURS = 168;

type Env = Record<string, string | undefined>;

export interface ZoteroSettings {
  userId?: string;
  apiKey?: string;
  libraryType: LibraryType;
  itemTypes: string[];
}

export interface OpenAISettings {
  apiKey?: string;
  model: string;
}

export interface PipelineSettings {
  workers: number;
  checkpointEvery: number;
  languageHint: string;
  templateId: string;
}

export interface Settings {
  /** Absolute path of the document store; required by every document command */
  outputDir?: string;
  stateDir: string;
  backupDir?: string;
  zotero: ZoteroSettings;
  openai: OpenAISettings;
  pipeline: PipelineSettings;
  cache: { freshnessHours: number };
  /** Config file that was read, if any */
  configPath?: string;
}

/**
 * Values given on the command line
 */
export interface SettingsOverrides {
  outputDir?: string;
  workers?: number;
  model?: string;
}

export interface ResolveSettingsOptions {
  cwd?: string;
  env?: Env;
  /** Explicit --config path; must exist */
  configPath?: string;
  overrides?: SettingsOverrides;
}

// =============================================================================
// Config file
// =============================================================================

/**
 * Shape of refnote.config.yaml after validation
 */
export interface ConfigFile {
  outputDir?: string;
  stateDir?: string;
  backupDir?: string;
  zotero?: Partial<ZoteroSettings>;
  openai?: Partial<OpenAISettings>;
  pipeline?: Partial<PipelineSettings>;
  cache?: { freshnessHours?: number };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`Config field "${name}" must be a mapping`, name);
  }
  return value;
}

function optionalString(raw: Record<string, unknown>, key: string, field: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`Config field "${field}" must be a non-empty string`, field);
  }
  return value.trim();
}

function optionalPositiveInt(raw: Record<string, unknown>, key: string, field: string): number | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`Config field "${field}" must be a positive integer`, field);
  }
  return value;
}

function optionalStringList(raw: Record<string, unknown>, key: string, field: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || value.length === 0 || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigError(`Config field "${field}" must be a non-empty list of strings`, field);
  }
  return value;
}

function parseLibraryType(value: string | undefined, field: string): LibraryType | undefined {
  if (value === undefined) return undefined;
  if (value === 'user' || value === 'group') return value;
  throw new ConfigError(`${field} must be "user" or "group", got "${value}"`, field);
}

/**
 * Validate a parsed config document field by field
 */
export function validateConfigFile(raw: unknown): ConfigFile {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new ConfigError('Config file must contain a YAML mapping');
  }

  const zotero = section(raw, 'zotero');
  const openai = section(raw, 'openai');
  const pipeline = section(raw, 'pipeline');
  const cache = section(raw, 'cache');

  return {
    outputDir: optionalString(raw, 'outputDir', 'outputDir'),
    stateDir: optionalString(raw, 'stateDir', 'stateDir'),
    backupDir: optionalString(raw, 'backupDir', 'backupDir'),
    zotero: {
      userId: optionalString(zotero, 'userId', 'zotero.userId'),
      apiKey: optionalString(zotero, 'apiKey', 'zotero.apiKey'),
      libraryType: parseLibraryType(optionalString(zotero, 'libraryType', 'zotero.libraryType'), 'zotero.libraryType'),
      itemTypes: optionalStringList(zotero, 'itemTypes', 'zotero.itemTypes'),
    },
    openai: {
      apiKey: optionalString(openai, 'apiKey', 'openai.apiKey'),
      model: optionalString(openai, 'model', 'openai.model'),
    },
    pipeline: {
      workers: optionalPositiveInt(pipeline, 'workers', 'pipeline.workers'),
      checkpointEvery: optionalPositiveInt(pipeline, 'checkpointEvery', 'pipeline.checkpointEvery'),
      languageHint: optionalString(pipeline, 'languageHint', 'pipeline.languageHint'),
      templateId: optionalString(pipeline, 'templateId', 'pipeline.templateId'),
    },
    cache: {
      freshnessHours: optionalPositiveInt(cache, 'freshnessHours', 'cache.freshnessHours'),
    },
  };
}

/**
 * Read and validate a config file
 */
export function loadConfigFile(path: string): ConfigFile {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      'Check the --config path'
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return validateConfigFile(raw);
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Expand a leading `~` and make the path absolute
 */
export function expandPath(path: string, cwd: string): string {
  let expanded = path;
  if (expanded === '~') {
    expanded = homedir();
  } else if (expanded.startsWith('~/')) {
    expanded = join(homedir(), expanded.slice(2));
  }
  return isAbsolute(expanded) ? expanded : resolve(cwd, expanded);
}

function envPositiveInt(env: Env, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`, name);
  }
  return parsed;
}

function envString(env: Env, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value !== undefined && value.trim() !== '') return value.trim();
  }
  return undefined;
}

/**
 * Resolve settings from CLI overrides, environment, config file and defaults
 */
export function resolveSettings(options: ResolveSettingsOptions = {}): Settings {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  let configPath: string | undefined;
  if (options.configPath) {
    configPath = expandPath(options.configPath, cwd);
  } else if (existsSync(join(cwd, DEFAULT_CONFIG_FILE))) {
    configPath = join(cwd, DEFAULT_CONFIG_FILE);
  }
  const file = configPath ? loadConfigFile(configPath) : {};
  // Relative paths in the file are relative to the file itself
  const fileBase = configPath ? dirname(configPath) : cwd;

  const pathSetting = (flag: string | undefined, fromEnv: string | undefined, fromFile: string | undefined) => {
    if (flag) return expandPath(flag, cwd);
    if (fromEnv) return expandPath(fromEnv, cwd);
    if (fromFile) return expandPath(fromFile, fileBase);
    return undefined;
  };

  const outputDir = pathSetting(overrides.outputDir, envString(env, 'REFNOTE_OUTPUT_DIR', 'OUTPUT_DIR'), file.outputDir);
  const stateDir =
    pathSetting(undefined, envString(env, 'REFNOTE_STATE_DIR'), file.stateDir) ?? resolve(cwd, DEFAULT_STATE_DIR);
  const backupDir =
    pathSetting(undefined, envString(env, 'REFNOTE_BACKUP_DIR'), file.backupDir) ??
    (outputDir ? join(dirname(outputDir), 'backups') : undefined);

  return {
    outputDir,
    stateDir,
    backupDir,
    zotero: {
      userId: envString(env, 'ZOTERO_USER_ID') ?? file.zotero?.userId,
      apiKey: envString(env, 'ZOTERO_API_KEY') ?? file.zotero?.apiKey,
      libraryType:
        parseLibraryType(envString(env, 'ZOTERO_LIBRARY_TYPE'), 'ZOTERO_LIBRARY_TYPE') ??
        file.zotero?.libraryType ??
        'user',
      itemTypes: file.zotero?.itemTypes ?? [...DEFAULT_ITEM_TYPES],
    },
    openai: {
      apiKey: envString(env, 'OPENAI_API_KEY') ?? file.openai?.apiKey,
      model: overrides.model ?? envString(env, 'REFNOTE_MODEL') ?? file.openai?.model ?? DEFAULT_MODEL,
    },
    pipeline: {
      workers:
        overrides.workers ??
        envPositiveInt(env, 'REFNOTE_WORKERS') ??
        file.pipeline?.workers ??
        DEFAULT_STAGE_CONFIG.workers,
      checkpointEvery: file.pipeline?.checkpointEvery ?? DEFAULT_STAGE_CONFIG.checkpointEvery,
      languageHint:
        envString(env, 'REFNOTE_LANGUAGE') ?? file.pipeline?.languageHint ?? DEFAULT_STAGE_CONFIG.languageHint,
      templateId: file.pipeline?.templateId ?? DEFAULT_STAGE_CONFIG.templateId,
    },
    cache: {
      freshnessHours: file.cache?.freshnessHours ?? DEFAULT_FRESHNESS_HOURS,
    },
    configPath,
  };
}

// =============================================================================
// Required settings
// =============================================================================

export function requireOutputDir(settings: Settings): string {
  if (!settings.outputDir) {
    throw new ConfigError(
      'No output directory configured',
      'outputDir',
      `Set REFNOTE_OUTPUT_DIR or add "outputDir" to ${DEFAULT_CONFIG_FILE}`
    );
  }
  return settings.outputDir;
}

export function requireBackupDir(settings: Settings): string {
  if (settings.backupDir) return settings.backupDir;
  return join(dirname(requireOutputDir(settings)), 'backups');
}

export function requireZotero(settings: Settings): { userId: string; apiKey: string } {
  const { userId, apiKey } = settings.zotero;
  if (!userId) {
    throw new ConfigError(
      'No Zotero user ID configured',
      'zotero.userId',
      `Set ZOTERO_USER_ID or add "zotero.userId" to ${DEFAULT_CONFIG_FILE}`
    );
  }
  if (!apiKey) {
    throw new ConfigError(
      'No Zotero API key configured',
      'zotero.apiKey',
      'Set ZOTERO_API_KEY (create a read-only key at https://www.zotero.org/settings/keys)'
    );
  }
  return { userId, apiKey };
}

export function requireOpenAIKey(settings: Settings): string {
  if (!settings.openai.apiKey) {
    throw new ConfigError(
      'No OpenAI API key configured',
      'openai.apiKey',
      'Set OPENAI_API_KEY, or pass --skip-summarization'
    );
  }
  return settings.openai.apiKey;
}
