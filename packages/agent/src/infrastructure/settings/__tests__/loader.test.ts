import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError } from '../../../core/errors/index.js';
import { DEFAULT_SETTINGS } from '../defaults.js';
import { applyEnvOverrides, deepMerge, loadSettings, validateSettings } from '../loader.js';

describe('settings loader', () => {
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'tiller-settings-'));
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  function writeUserSettings(content: unknown): void {
    fs.mkdirSync(path.join(home, '.tiller'), { recursive: true });
    fs.writeFileSync(path.join(home, '.tiller', 'settings.json'), JSON.stringify(content));
  }

  it('uses defaults when no settings file exists', () => {
    const settings = loadSettings({ homeDir: home, env: {}, cwd: '/work' });

    expect(settings.history).toEqual(DEFAULT_SETTINGS.history);
    expect(settings.workspace.root).toBe(path.resolve('/work'));
    expect(settings.storage.dbPath).toBe(path.join(home, '.tiller', 'tiller.db'));
  });

  it('merges user settings over defaults without dropping siblings', () => {
    writeUserSettings({ retry: { maxAttempts: 9 }, server: { port: 9100 } });

    const settings = loadSettings({ homeDir: home, env: {} });

    expect(settings.retry.maxAttempts).toBe(9);
    expect(settings.retry.backoffBaseMs).toBe(DEFAULT_SETTINGS.retry.backoffBaseMs);
    expect(settings.server.port).toBe(9100);
    expect(settings.server.host).toBe('127.0.0.1');
  });

  it('applies environment overrides after the settings file', () => {
    writeUserSettings({ server: { port: 9100 } });

    const settings = loadSettings({
      homeDir: home,
      env: { TILLER_PORT: '9200', TILLER_EPHEMERAL: 'true', TILLER_MAX_ITERATIONS: '12' },
    });

    expect(settings.server.port).toBe(9200);
    expect(settings.storage.dbPath).toBe(':memory:');
    expect(settings.orchestrator.maxIterations).toBe(12);
  });

  it('keeps the merged value when an override is malformed', () => {
    const merged = applyEnvOverrides(deepMerge(DEFAULT_SETTINGS, {}), { TILLER_PORT: 'not-a-port' });
    expect(validateSettings(merged).server.port).toBe(DEFAULT_SETTINGS.server.port);
  });

  it('rejects thresholds that are not strictly ascending', () => {
    writeUserSettings({ history: { truncate: { threshold: 0.7 } } });

    expect(() => loadSettings({ homeDir: home, env: {} })).toThrow(ConfigurationError);
  });

  it('rejects a tail that grows at a higher tier', () => {
    writeUserSettings({ history: { summarizeAggressive: { tailTurns: 20 } } });

    expect(() => loadSettings({ homeDir: home, env: {} })).toThrow(/tails must not grow/);
  });

  it('reports malformed JSON as a configuration error', () => {
    fs.mkdirSync(path.join(home, '.tiller'), { recursive: true });
    fs.writeFileSync(path.join(home, '.tiller', 'settings.json'), '{ nope');

    expect(() => loadSettings({ homeDir: home, env: {} })).toThrow(ConfigurationError);
  });

  it('deepMerge replaces arrays instead of merging them', () => {
    expect(deepMerge({ a: [1, 2], b: { c: 1, d: 2 } }, { a: [3], b: { d: 5 } })).toEqual({
      a: [3],
      b: { c: 1, d: 5 },
    });
  });
});
