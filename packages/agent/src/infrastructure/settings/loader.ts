/**
 * @fileoverview Settings Loader
 *
 * Loads ~/.tiller/settings.json, deep-merges it over the defaults, applies
 * environment overrides and validates the result. Settings are cached after
 * the first successful load.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigurationError } from '../../core/errors/index.js';
import { createLogger } from '../logging/index.js';
import { DEFAULT_SETTINGS } from './defaults.js';
import { parseEnvBoolean, parseEnvInteger } from './env-parsing.js';
import { settingsSchema } from './schema.js';
import type { TillerSettings } from './types.js';

const logger = createLogger('settings');

// =============================================================================
// Constants
// =============================================================================

const SETTINGS_DIR = '.tiller';
const SETTINGS_FILE = 'settings.json';
const DATABASE_FILE = 'tiller.db';

// =============================================================================
// Merge Utilities
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge `source` over `target`. Arrays and scalars replace; objects merge.
 */
export function deepMerge(target: object, source: unknown): Record<string, unknown> {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(target));
  if (!isPlainObject(source)) {
    return result;
  }

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

// =============================================================================
// Paths
// =============================================================================

export function getSettingsDir(homeDir?: string): string {
  return path.join(homeDir ?? os.homedir(), SETTINGS_DIR);
}

export function getSettingsPath(homeDir?: string): string {
  return path.join(getSettingsDir(homeDir), SETTINGS_FILE);
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Read the user settings file. A missing file yields null; an unreadable or
 * malformed file throws ConfigurationError.
 */
export function loadUserSettings(settingsPath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(settingsPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new ConfigurationError(`Cannot read settings file ${settingsPath}`, { cause: error });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Settings file ${settingsPath} is not valid JSON`, { cause: error });
  }
}

/**
 * Apply environment overrides on top of merged settings.
 */
export function applyEnvOverrides(
  settings: Record<string, unknown>,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const overrides: Record<string, Record<string, unknown>> = {};
  const set = (section: string, key: string, value: unknown): void => {
    overrides[section] = { ...overrides[section], [key]: value };
  };

  if (env.TILLER_HOST) set('server', 'host', env.TILLER_HOST);
  if (env.TILLER_PORT !== undefined) {
    set('server', 'port', parseEnvInteger(env.TILLER_PORT, {
      name: 'TILLER_PORT', fallback: DEFAULT_SETTINGS.server.port, min: 0, max: 65535, logger,
    }));
  }
  if (env.TILLER_DB_PATH) set('storage', 'dbPath', env.TILLER_DB_PATH);
  if (parseEnvBoolean(env.TILLER_EPHEMERAL, { name: 'TILLER_EPHEMERAL', fallback: false, logger })) {
    set('storage', 'dbPath', ':memory:');
  }
  if (env.TILLER_WORKSPACE) set('workspace', 'root', env.TILLER_WORKSPACE);
  if (env.TILLER_MODEL) set('reasoning', 'model', env.TILLER_MODEL);
  if (env.TILLER_CONTEXT_WINDOW !== undefined) {
    set('reasoning', 'contextWindowTokens', parseEnvInteger(env.TILLER_CONTEXT_WINDOW, {
      name: 'TILLER_CONTEXT_WINDOW', fallback: DEFAULT_SETTINGS.reasoning.contextWindowTokens, min: 1, logger,
    }));
  }
  if (env.TILLER_THINKING_BUDGET !== undefined) {
    set('reasoning', 'thinkingBudgetTokens', parseEnvInteger(env.TILLER_THINKING_BUDGET, {
      name: 'TILLER_THINKING_BUDGET', fallback: DEFAULT_SETTINGS.reasoning.thinkingBudgetTokens, min: 0, logger,
    }));
  }
  if (env.TILLER_MAX_ITERATIONS !== undefined) {
    set('orchestrator', 'maxIterations', parseEnvInteger(env.TILLER_MAX_ITERATIONS, {
      name: 'TILLER_MAX_ITERATIONS', fallback: DEFAULT_SETTINGS.orchestrator.maxIterations, min: 1, logger,
    }));
  }
  if (env.TILLER_MAX_RETRIES !== undefined) {
    set('retry', 'maxAttempts', parseEnvInteger(env.TILLER_MAX_RETRIES, {
      name: 'TILLER_MAX_RETRIES', fallback: DEFAULT_SETTINGS.retry.maxAttempts, min: 1, logger,
    }));
  }

  return deepMerge(settings, overrides);
}

/**
 * Validate a merged settings tree.
 */
export function validateSettings(raw: unknown): TillerSettings {
  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new ConfigurationError(`Invalid settings: ${issues.join('; ')}`, { context: { issues } });
  }
  return result.data;
}

export interface LoadSettingsOptions {
  settingsPath?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Load defaults + user file + environment, then resolve relative paths.
 */
export function loadSettings(options: LoadSettingsOptions = {}): TillerSettings {
  const env = options.env ?? process.env;
  const settingsPath = options.settingsPath ?? env.TILLER_SETTINGS_PATH ?? getSettingsPath(options.homeDir);

  const userSettings = loadUserSettings(settingsPath);
  const merged = applyEnvOverrides(deepMerge(DEFAULT_SETTINGS, userSettings), env);
  const settings = validateSettings(merged);

  const cwd = options.cwd ?? process.cwd();
  settings.workspace.root = path.resolve(cwd, settings.workspace.root);
  if (settings.storage.dbPath === '') {
    settings.storage.dbPath = path.join(getSettingsDir(options.homeDir), DATABASE_FILE);
  } else if (settings.storage.dbPath !== ':memory:') {
    settings.storage.dbPath = path.resolve(cwd, settings.storage.dbPath);
  }

  logger.debug('Settings loaded', {
    settingsPath,
    fromFile: userSettings !== null,
    workspace: settings.workspace.root,
    dbPath: settings.storage.dbPath,
  });
  return settings;
}

// =============================================================================
// Singleton Settings Instance
// =============================================================================

let cachedSettings: TillerSettings | null = null;

export function getSettings(): TillerSettings {
  if (!cachedSettings) {
    cachedSettings = loadSettings();
  }
  return cachedSettings;
}

/**
 * Clear cached settings (for testing)
 */
export function resetSettingsCache(): void {
  cachedSettings = null;
}
