/**
 * @fileoverview Persisted session state schema
 *
 * Every field except the id has a default, so state written by an older
 * build (or with optional sections missing) loads instead of failing.
 */

import { z } from 'zod';
import type { SessionState } from '../../core/types/index.js';

const contentBlockSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('thinking'), thinking: z.string(), signature: z.string().optional() }),
  z.object({
    type: z.literal('tool_use'),
    id: z.string(),
    name: z.string(),
    input: z.record(z.unknown()).default({}),
  }),
  z.object({
    type: z.literal('tool_result'),
    toolUseId: z.string(),
    content: z.string().default(''),
    success: z.boolean().default(true),
  }),
  z.object({ type: z.literal('image'), mediaType: z.string().default('image/png'), data: z.string() }),
]);

const turnSchema = z.object({
  role: z.enum(['user', 'assistant', 'guidance']),
  content: z.array(contentBlockSchema).default([]),
  synthetic: z.boolean().optional(),
});

const fileSnapshotSchema = z.object({
  key: z.string(),
  path: z.string(),
  originalContent: z.string().nullable().default(null),
  existedBefore: z.boolean().default(false),
  capturedAt: z.number().default(0),
});

const checkpointSchema = z.object({
  id: z.string(),
  sequence: z.number().int(),
  label: z.string().nullable().default(null),
  createdAt: z.string().default(() => new Date(0).toISOString()),
  entries: z.array(fileSnapshotSchema).default([]),
  contents: z.record(z.string().nullable()).default({}),
});

const planStepSchema = z.object({
  index: z.number().int(),
  description: z.string(),
  status: z.enum(['pending', 'in_progress', 'completed', 'failed']).default('pending'),
});

const sessionStateSchema = z.object({
  id: z.string().min(1),
  name: z.string().default('Untitled'),
  backendId: z.string().default('local'),
  status: z
    .enum(['idle', 'running', 'awaiting_plan_approval', 'awaiting_keep_revert', 'awaiting_answer', 'cancelled'])
    .catch('idle'),
  history: z.array(turnSchema).default([]),
  changeSet: z
    .object({
      modifiedFiles: z.array(fileSnapshotSchema).default([]),
      checkpoints: z.array(checkpointSchema).default([]),
      nextSequence: z.number().int().positive().default(1),
    })
    .default({}),
  pendingPlan: z
    .object({
      task: z.string().default(''),
      summary: z.string().default(''),
      steps: z.array(planStepSchema).default([]),
    })
    .nullable()
    .default(null),
  todos: z
    .array(
      z.object({
        id: z.string(),
        content: z.string(),
        status: z.enum(['pending', 'in_progress', 'completed']).default('pending'),
      })
    )
    .default([]),
  tokenUsage: z
    .object({
      inputTokens: z.number().default(0),
      outputTokens: z.number().default(0),
      cacheReadTokens: z.number().default(0),
      cacheWriteTokens: z.number().default(0),
    })
    .default({}),
  createdAt: z.string().default(() => new Date().toISOString()),
  updatedAt: z.string().default(() => new Date().toISOString()),
});

/**
 * Parse stored session state, filling defaults for anything missing.
 * @throws ZodError when the value is not a session record at all
 */
export function parseSessionState(raw: unknown): SessionState {
  return sessionStateSchema.parse(raw);
}
