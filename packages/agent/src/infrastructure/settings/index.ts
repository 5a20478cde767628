/**
 * @fileoverview Settings Module
 *
 * Settings are loaded from ~/.tiller/settings.json over built-in defaults,
 * with environment overrides applied last.
 *
 * @example
 * ```typescript
 * import { getSettings } from './index.js';
 *
 * const { history } = getSettings();
 * console.log(history.summarize.threshold);
 * ```
 */

export type {
  TillerSettings,
  UserSettings,
  DeepPartial,
  ServerSettings,
  StorageSettings,
  WorkspaceSettings,
  ReasoningSettings,
  CompactionTierSettings,
  HistorySettings,
  CheckpointSettings,
  RetrySettings,
  OrchestratorSettings,
  GuidanceSettings,
  SessionSettings,
} from './types.js';

export { DEFAULT_SETTINGS } from './defaults.js';
export { settingsSchema } from './schema.js';
export {
  deepMerge,
  getSettingsDir,
  getSettingsPath,
  loadUserSettings,
  applyEnvOverrides,
  validateSettings,
  loadSettings,
  getSettings,
  resetSettingsCache,
  type LoadSettingsOptions,
} from './loader.js';
export { parseEnvInteger, parseEnvNumber, parseEnvBoolean, type EnvParseLogger } from './env-parsing.js';
