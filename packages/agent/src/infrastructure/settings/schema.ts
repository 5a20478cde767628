/**
 * @fileoverview Settings validation
 *
 * Merged settings are validated once at load. The compaction tiers must have
 * strictly ascending thresholds and non-increasing tails, so escalating to a
 * higher tier never keeps more verbatim history than a lower one.
 */

import { z } from 'zod';
import type { TillerSettings } from './types.js';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();
const ratio = z.number().gt(0).lt(1);

const tierSchema = z.object({
  threshold: ratio,
  tailTurns: positiveInt,
});

export const settingsSchema: z.ZodType<TillerSettings> = z
  .object({
    server: z.object({
      host: z.string().min(1),
      port: z.number().int().min(0).max(65535),
      heartbeatIntervalMs: positiveInt,
      maxPayloadBytes: positiveInt,
    }),
    storage: z.object({
      dbPath: z.string(),
    }),
    workspace: z.object({
      root: z.string().min(1),
    }),
    reasoning: z.object({
      model: z.string().min(1),
      maxOutputTokens: positiveInt,
      thinkingBudgetTokens: nonNegativeInt,
      contextWindowTokens: positiveInt,
    }),
    history: z.object({
      summarize: tierSchema,
      summarizeAggressive: tierSchema,
      truncate: tierSchema,
      referentWindowTurns: positiveInt,
    }),
    checkpoints: z.object({
      maxRetained: positiveInt,
    }),
    retry: z.object({
      maxAttempts: positiveInt,
      repairAfterRepeats: positiveInt,
      abortAfterRepeats: positiveInt,
      backoffBaseMs: nonNegativeInt,
      backoffMaxMs: nonNegativeInt,
    }),
    orchestrator: z.object({
      maxIterations: positiveInt,
      wrapUpRatio: ratio,
      maxToolOutputChars: positiveInt,
      commandTimeoutMs: positiveInt,
      killGraceMs: nonNegativeInt,
    }),
    guidance: z.object({
      maxLength: positiveInt,
      cooldownMs: nonNegativeInt,
    }),
    sessions: z.object({
      defaultSessionId: z.string().min(1),
    }),
  })
  .superRefine((settings, ctx) => {
    const { summarize, summarizeAggressive, truncate } = settings.history;
    if (!(summarize.threshold < summarizeAggressive.threshold && summarizeAggressive.threshold < truncate.threshold)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['history'],
        message: 'compaction thresholds must be strictly ascending (summarize < summarizeAggressive < truncate)',
      });
    }
    if (!(summarize.tailTurns >= summarizeAggressive.tailTurns && summarizeAggressive.tailTurns >= truncate.tailTurns)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['history'],
        message: 'compaction tails must not grow at higher tiers',
      });
    }
    if (settings.retry.repairAfterRepeats > settings.retry.abortAfterRepeats) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retry', 'repairAfterRepeats'],
        message: 'repairAfterRepeats must not exceed abortAfterRepeats',
      });
    }
  });
