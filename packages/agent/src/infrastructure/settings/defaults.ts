/**
 * @fileoverview Default Settings
 *
 * Fallback values for every setting. The compaction thresholds, tails and
 * retry counts are starting points, not tuned limits.
 */

import type { TillerSettings } from './types.js';

export const DEFAULT_SETTINGS: TillerSettings = {
  server: {
    host: '127.0.0.1',
    port: 8765,
    heartbeatIntervalMs: 30_000,
    maxPayloadBytes: 16 * 1024 * 1024,
  },
  storage: {
    dbPath: '',
  },
  workspace: {
    root: '.',
  },
  reasoning: {
    model: 'claude-sonnet-4-20250514',
    maxOutputTokens: 16_000,
    thinkingBudgetTokens: 0,
    contextWindowTokens: 200_000,
  },
  history: {
    summarize: { threshold: 0.65, tailTurns: 12 },
    summarizeAggressive: { threshold: 0.8, tailTurns: 8 },
    truncate: { threshold: 0.9, tailTurns: 4 },
    referentWindowTurns: 4,
  },
  checkpoints: {
    maxRetained: 25,
  },
  retry: {
    maxAttempts: 6,
    repairAfterRepeats: 3,
    abortAfterRepeats: 5,
    backoffBaseMs: 2_000,
    backoffMaxMs: 30_000,
  },
  orchestrator: {
    maxIterations: 200,
    wrapUpRatio: 0.85,
    maxToolOutputChars: 30_000,
    commandTimeoutMs: 120_000,
    killGraceMs: 2_000,
  },
  guidance: {
    maxLength: 10_000,
    cooldownMs: 2_000,
  },
  sessions: {
    defaultSessionId: 'default',
  },
};
