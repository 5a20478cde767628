/**
 * @fileoverview Session aggregate types
 */

import type { Turn } from './turns.js';

export type SessionStatus =
  | 'idle'
  | 'running'
  | 'awaiting_plan_approval'
  | 'awaiting_keep_revert'
  | 'awaiting_answer'
  | 'cancelled';

export const SESSION_STATUSES: readonly SessionStatus[] = [
  'idle',
  'running',
  'awaiting_plan_approval',
  'awaiting_keep_revert',
  'awaiting_answer',
  'cancelled',
];

export function isSessionStatus(value: unknown): value is SessionStatus {
  return typeof value === 'string' && SESSION_STATUSES.some(status => status === value);
}

/** `plan` runs investigate and propose a plan without modifying files */
export type TaskMode = 'build' | 'plan';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens: number;
  cacheWriteTokens: number;
}

export function emptyTokenUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, cacheReadTokens: 0, cacheWriteTokens: 0 };
}

// =============================================================================
// Plans & Todos
// =============================================================================

export type PlanStepStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

export interface PlanStep {
  index: number;
  description: string;
  status: PlanStepStatus;
}

export interface PendingPlan {
  /** Task the plan was produced for, without any feedback annotations */
  task: string;
  summary: string;
  steps: PlanStep[];
}

export type TodoStatus = 'pending' | 'in_progress' | 'completed';

export interface TodoItem {
  id: string;
  content: string;
  status: TodoStatus;
}

export interface PendingQuestion {
  toolUseId: string;
  question: string;
}

// =============================================================================
// Persisted Snapshot
// =============================================================================

/** Serialized form of one ModifiedFiles entry */
export interface SerializedFileSnapshot {
  key: string;
  path: string;
  /** Base64, or null when the file did not exist */
  originalContent: string | null;
  existedBefore: boolean;
  capturedAt: number;
}

export interface SerializedCheckpoint {
  id: string;
  sequence: number;
  label: string | null;
  createdAt: string;
  entries: SerializedFileSnapshot[];
  /** Content (base64) of each tracked key at capture time, null when absent */
  contents: Record<string, string | null>;
}

export interface ChangeSetSnapshot {
  modifiedFiles: SerializedFileSnapshot[];
  checkpoints: SerializedCheckpoint[];
  nextSequence: number;
}

/**
 * Everything persisted for one session apart from its event log.
 */
export interface SessionState {
  id: string;
  name: string;
  backendId: string;
  status: SessionStatus;
  history: Turn[];
  changeSet: ChangeSetSnapshot;
  pendingPlan: PendingPlan | null;
  todos: TodoItem[];
  tokenUsage: TokenUsage;
  createdAt: string;
  updatedAt: string;
}

export interface SessionSummary {
  id: string;
  name: string;
  status: SessionStatus;
  backendId: string;
  turnCount: number;
  updatedAt: string;
}
