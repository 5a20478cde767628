/**
 * @fileoverview Session event types
 *
 * Events are the only channel between the engine and its observers. Every
 * variant holds JSON-serializable fields only. A `SessionEventBody` is what
 * producers emit; the event channel stamps it with a sequence number and a
 * timestamp, giving a `SessionEvent`, before it is persisted and broadcast.
 */

import type { PlanStep, PlanStepStatus, SessionStatus, TodoItem, TokenUsage } from './session.js';

// =============================================================================
// Shared Payload Shapes
// =============================================================================

export type ToolRunStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export interface FileDiff {
  path: string;
  change: 'added' | 'modified' | 'deleted';
  diff: string;
}

export interface FailedPath {
  path: string;
  reason: string;
}

export type CompactionTier = 'summarize' | 'summarize_aggressive' | 'truncate';

export interface HistoryFix {
  kind: 'injected_tool_result' | 'removed_tool_use' | 'removed_orphan_result' | 'removed_duplicate_result' | 'removed_empty_turn';
  toolUseId?: string;
}

// =============================================================================
// Event Bodies
// =============================================================================

export interface UserEvent { type: 'user'; content: string; imageCount: number }
export interface GuidanceEvent { type: 'guidance'; content: string }
export interface StatusEvent { type: 'status'; status: SessionStatus }
export interface ThinkingEvent { type: 'thinking'; delta: string }
export interface TextEvent { type: 'text'; delta: string }

export interface ToolUseEvent {
  type: 'tool_use';
  toolUseId: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultEvent {
  type: 'tool_result';
  toolUseId: string;
  name: string;
  status: 'succeeded' | 'failed' | 'cancelled';
  content: string;
}

export interface CommandOutputEvent {
  type: 'command_output';
  toolUseId: string;
  stream: 'stdout' | 'stderr';
  chunk: string;
}

export interface DiffEvent { type: 'diff'; files: FileDiff[] }
export interface PlanEvent { type: 'plan'; summary: string; steps: PlanStep[] }
export interface PlanStepEvent { type: 'plan_step'; index: number; status: PlanStepStatus }

export interface CheckpointEvent {
  type: 'checkpoint';
  checkpointId: string;
  sequence: number;
  label: string | null;
}

export interface KeepEvent { type: 'keep'; paths: string[]; implicit: boolean }

export interface RevertEvent {
  type: 'revert';
  restored: string[];
  removed: string[];
  failed: FailedPath[];
}

export interface RewindEvent {
  type: 'rewind';
  checkpointId: string;
  restored: string[];
  removed: string[];
  failed: FailedPath[];
  discarded: string[];
}

export interface CompactedEvent {
  type: 'compacted';
  tier: CompactionTier;
  turnsBefore: number;
  turnsAfter: number;
  tokensBefore: number;
  tokensAfter: number;
}

export interface HistoryRepairedEvent { type: 'history_repaired'; fixes: HistoryFix[] }

export interface RetryingEvent {
  type: 'retrying';
  attempt: number;
  delayMs: number;
  reason: string;
  repair: boolean;
}

export interface QuestionEvent { type: 'question'; toolUseId: string; question: string }
export interface TodosEvent { type: 'todos'; todos: TodoItem[] }
export interface SessionRenamedEvent { type: 'session_renamed'; name: string }
export interface DoneEvent { type: 'done'; iterations: number; usage: TokenUsage }
export interface ErrorEvent { type: 'error'; message: string; code: string }
export interface CancelledEvent { type: 'cancelled'; cancelledRuns: string[] }
export interface ResetEvent { type: 'reset' }
export interface InfoEvent { type: 'info'; message: string }

export type SessionEventBody =
  | UserEvent
  | GuidanceEvent
  | StatusEvent
  | ThinkingEvent
  | TextEvent
  | ToolUseEvent
  | ToolResultEvent
  | CommandOutputEvent
  | DiffEvent
  | PlanEvent
  | PlanStepEvent
  | CheckpointEvent
  | KeepEvent
  | RevertEvent
  | RewindEvent
  | CompactedEvent
  | HistoryRepairedEvent
  | RetryingEvent
  | QuestionEvent
  | TodosEvent
  | SessionRenamedEvent
  | DoneEvent
  | ErrorEvent
  | CancelledEvent
  | ResetEvent
  | InfoEvent;

export type SessionEventType = SessionEventBody['type'];

const EVENT_TYPES: Record<SessionEventType, true> = {
  user: true,
  guidance: true,
  status: true,
  thinking: true,
  text: true,
  tool_use: true,
  tool_result: true,
  command_output: true,
  diff: true,
  plan: true,
  plan_step: true,
  checkpoint: true,
  keep: true,
  revert: true,
  rewind: true,
  compacted: true,
  history_repaired: true,
  retrying: true,
  question: true,
  todos: true,
  session_renamed: true,
  done: true,
  error: true,
  cancelled: true,
  reset: true,
  info: true,
};

/**
 * Shallow check used when reading events back from storage: the engine wrote
 * them, so a known `type` tag is enough to trust the rest of the shape.
 */
export function isSessionEventBody(value: unknown): value is SessionEventBody {
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return false;
  }
  const { type } = value;
  return typeof type === 'string' && Object.prototype.hasOwnProperty.call(EVENT_TYPES, type);
}

export interface EventStamp {
  /** Position in the session's log, starting at 1 */
  sequence: number;
  timestamp: string;
}

export type SessionEvent = SessionEventBody & EventStamp;

// =============================================================================
// Connection Messages (never persisted)
// =============================================================================

export interface ResumedMessage {
  type: 'resumed';
  sessionId: string;
  name: string;
  status: SessionStatus;
  backendId: string;
  lastSequence: number;
}

export interface ReplayMessage {
  type: 'replay';
  sequence: number;
  event: SessionEvent;
}

export interface ReplayStateMessage {
  type: 'replay_state';
  status: SessionStatus;
  pendingPlan: { summary: string; steps: PlanStep[] } | null;
  pendingDiff: FileDiff[];
  todos: TodoItem[];
  pendingQuestion: { toolUseId: string; question: string } | null;
}

export interface ReplayDoneMessage { type: 'replay_done'; lastSequence: number }

/** Last message an observer receives from a session that was deleted */
export interface SessionDeletedMessage { type: 'session_deleted'; sessionId: string }

export interface ReplyMessage {
  type: 'reply';
  request: string;
  ok: boolean;
  data?: unknown;
  error?: { code: string; message: string };
}

export type ConnectionMessage =
  | ResumedMessage
  | ReplayMessage
  | ReplayStateMessage
  | ReplayDoneMessage
  | SessionDeletedMessage
  | ReplyMessage;

/** Everything an observer can receive */
export type OutboundMessage = SessionEvent | ConnectionMessage;
