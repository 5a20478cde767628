/**
 * @fileoverview Agent session aggregate
 *
 * Everything the engine knows about one session: its conversation, its open
 * change-set, its plan and todos, and the channel its events flow through.
 * Only the session's own run and control operations mutate it.
 */

import { emptyTokenUsage } from '../../core/types/index.js';
import type {
  FileDiff,
  PendingPlan,
  PendingQuestion,
  SessionEventBody,
  SessionState,
  SessionStatus,
  TodoItem,
  TokenUsage,
} from '../../core/types/index.js';
import type { Summarizer } from '../../context/index.js';
import { HistoryManager } from '../../context/index.js';
import type { ExecutionBackend } from '../../infrastructure/backend/index.js';
import type { TillerSettings } from '../../infrastructure/settings/index.js';
import type { EventChannel, ReplaySource } from '../../interface/events/index.js';
import { CheckpointManager } from '../checkpoints/index.js';
import { GuidanceQueue } from './guidance-queue.js';

/**
 * State of a session that has never run anything.
 */
export function newSessionState(id: string, backendId: string, now: Date = new Date()): SessionState {
  const timestamp = now.toISOString();
  return {
    id,
    name: '',
    backendId,
    status: 'idle',
    history: [],
    changeSet: { modifiedFiles: [], checkpoints: [], nextSequence: 1 },
    pendingPlan: null,
    todos: [],
    tokenUsage: emptyTokenUsage(),
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

export interface AgentSessionOptions {
  state: SessionState;
  backend: ExecutionBackend;
  channel: EventChannel;
  settings: Pick<TillerSettings, 'history' | 'checkpoints' | 'guidance'>;
  summarizer?: Summarizer;
  now?: () => Date;
}

export class AgentSession implements ReplaySource {
  readonly id: string;
  readonly backend: ExecutionBackend;
  readonly channel: EventChannel;
  readonly history: HistoryManager;
  readonly changes: CheckpointManager;
  readonly guidance: GuidanceQueue;
  readonly createdAt: string;

  name: string;
  plan: PendingPlan | null;
  todos: TodoItem[];
  tokenUsage: TokenUsage;
  pendingQuestion: PendingQuestion | null = null;
  /** Diff shown with the keep/revert gate; empty when no gate is open */
  pendingDiff: FileDiff[] = [];
  updatedAt: string;

  private currentStatus: SessionStatus;
  private readonly now: () => Date;

  constructor(options: AgentSessionOptions) {
    const { state, settings } = options;
    this.id = state.id;
    this.backend = options.backend;
    this.channel = options.channel;
    this.now = options.now ?? (() => new Date());
    this.name = state.name;
    this.plan = state.pendingPlan;
    this.todos = state.todos;
    this.tokenUsage = state.tokenUsage;
    this.createdAt = state.createdAt;
    this.updatedAt = state.updatedAt;
    this.currentStatus = state.status;

    this.history = new HistoryManager({
      settings: settings.history,
      summarizer: options.summarizer,
      turns: state.history,
      sessionId: state.id,
    });
    this.changes = new CheckpointManager(options.backend, {
      maxRetained: settings.checkpoints.maxRetained,
      sessionId: state.id,
    });
    this.changes.load(state.changeSet);
    this.guidance = new GuidanceQueue(settings.guidance);
  }

  get status(): SessionStatus {
    return this.currentStatus;
  }

  emit(body: SessionEventBody): void {
    this.channel.emit(body);
  }

  /**
   * Change status, announcing it when it actually changed.
   */
  setStatus(status: SessionStatus): void {
    if (status === this.currentStatus) return;
    this.currentStatus = status;
    this.touch();
    this.emit({ type: 'status', status });
  }

  touch(): void {
    this.updatedAt = this.now().toISOString();
  }

  addUsage(usage: TokenUsage): void {
    this.tokenUsage = {
      inputTokens: this.tokenUsage.inputTokens + usage.inputTokens,
      outputTokens: this.tokenUsage.outputTokens + usage.outputTokens,
      cacheReadTokens: this.tokenUsage.cacheReadTokens + usage.cacheReadTokens,
      cacheWriteTokens: this.tokenUsage.cacheWriteTokens + usage.cacheWriteTokens,
    };
  }

  toState(): SessionState {
    return {
      id: this.id,
      name: this.name,
      backendId: this.backend.id,
      status: this.currentStatus,
      history: [...this.history.turns()],
      changeSet: this.changes.toSnapshot(),
      pendingPlan: this.plan,
      todos: this.todos,
      tokenUsage: this.tokenUsage,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  // ===========================================================================
  // Replay
  // ===========================================================================

  resumed(): { sessionId: string; name: string; status: SessionStatus; backendId: string } {
    return { sessionId: this.id, name: this.name, status: this.currentStatus, backendId: this.backend.id };
  }

  replayState() {
    return {
      status: this.currentStatus,
      pendingPlan: this.plan ? { summary: this.plan.summary, steps: this.plan.steps } : null,
      pendingDiff: this.pendingDiff,
      todos: this.todos,
      pendingQuestion: this.pendingQuestion,
    };
  }
}
