/**
 * Configuration module exports
 */

export {
  resolveSettings,
  loadConfigFile,
  validateConfigFile,
  expandPath,
  requireOutputDir,
  requireBackupDir,
  requireZotero,
  requireOpenAIKey,
  DEFAULT_CONFIG_FILE,
  DEFAULT_STATE_DIR,
  DEFAULT_FRESHNESS_HOURS,
  type Settings,
  type SettingsOverrides,
  type ResolveSettingsOptions,
  type ConfigFile,
  type ZoteroSettings,
  type OpenAISettings,
  type PipelineSettings,
} from './settings.js';
