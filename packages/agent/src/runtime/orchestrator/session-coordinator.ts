/**
 * @fileoverview Session Coordinator
 *
 * Owns the registry of sessions loaded in memory. Connections attach and
 * detach through it and send it requests; they never touch session state
 * themselves. Detaching never affects a run: a session keeps working, and
 * keeps its event log, with nobody watching.
 *
 * ## Responsibilities
 *
 * - Create, load and persist sessions
 * - Start task and plan runs, one at a time per session
 * - Route control requests to the orchestrator and controllers
 * - Session management: list, rename, delete, shutdown
 */

import { ErrorCodes, SessionBusyError, TillerError } from '../../core/errors/index.js';
import type { SessionState, SessionSummary } from '../../core/types/index.js';
import { emptyTokenUsage } from '../../core/types/index.js';
import type { Summarizer } from '../../context/index.js';
import type { ToolRegistry } from '../../capabilities/tools/index.js';
import { createDefaultToolRegistry } from '../../capabilities/tools/index.js';
import type { ExecutionBackend } from '../../infrastructure/backend/index.js';
import { createLogger } from '../../infrastructure/logging/index.js';
import type { SessionStore } from '../../infrastructure/persistence/index.js';
import type { TillerSettings } from '../../infrastructure/settings/index.js';
import { EventChannel, ReplayEngine, storeEventLog, type MessageObserver } from '../../interface/events/index.js';
import type { ReasoningService } from '../../llm/index.js';
import { AgentSession, newSessionState } from '../agent/session.js';
import { Orchestrator } from '../agent/orchestrator.js';
import { ChangeController, describePaths } from './controllers/change-controller.js';
import { TodoController } from './controllers/todo-controller.js';
import { MapActiveSessionStore, type ActiveSessionStore } from './session/active-session-store.js';
import type { ActiveSession, Attachment, ControlMessage, TaskRequest } from './types.js';

const logger = createLogger('coordinator');

/** Words of the first task used to name a new session */
const NAME_WORDS = 6;

export function nameFromTask(task: string): string {
  const words = task.trim().split(/\s+/).filter(word => word !== '');
  const name = words.slice(0, NAME_WORDS).join(' ');
  return words.length > NAME_WORDS ? `${name}...` : name;
}

// =============================================================================
// Types
// =============================================================================

export interface SessionCoordinatorConfig {
  store: SessionStore;
  backend: ExecutionBackend;
  service: ReasoningService;
  settings: TillerSettings;
  tools?: ToolRegistry;
  summarizer?: Summarizer;
  /** Retry wait, replaced in tests */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  now?: () => Date;
}

interface ObserverHandle {
  observer: MessageObserver;
  unsubscribe: () => void;
}

// =============================================================================
// SessionCoordinator Class
// =============================================================================

export class SessionCoordinator {
  private readonly config: SessionCoordinatorConfig;
  private readonly sessions: ActiveSessionStore = new MapActiveSessionStore();
  private readonly observers = new Map<string, Set<ObserverHandle>>();
  private readonly replay: ReplayEngine;
  private readonly tools: ToolRegistry;
  private readonly changes = new ChangeController();
  private readonly todos = new TodoController();
  private readonly now: () => Date;

  constructor(config: SessionCoordinatorConfig) {
    this.config = config;
    this.tools = config.tools ?? createDefaultToolRegistry();
    this.now = config.now ?? (() => new Date());
    this.replay = new ReplayEngine(sessionId => this.sessions.get(sessionId)?.session);
  }

  get defaultSessionId(): string {
    return this.config.settings.sessions.defaultSessionId;
  }

  // ===========================================================================
  // Attachment
  // ===========================================================================

  /**
   * Attach an observer to a session, creating the session on first use. The
   * observer receives the replay and then the live stream.
   */
  async attach(sessionId: string | undefined, observer: MessageObserver): Promise<Attachment> {
    const id = sessionId ?? this.defaultSessionId;
    await this.open(id);
    const handle: ObserverHandle = { observer, unsubscribe: this.replay.attach(id, observer) };
    const handles = this.observers.get(id) ?? new Set<ObserverHandle>();
    handles.add(handle);
    this.observers.set(id, handles);
    logger.info('Observer attached', { sessionId: id });
    return {
      sessionId: id,
      detach: () => {
        if (!handles.delete(handle)) return;
        handle.unsubscribe();
        logger.info('Observer detached', { sessionId: id });
      },
    };
  }

  /**
   * The session if it is loaded in memory.
   */
  get(sessionId: string): AgentSession | undefined {
    return this.sessions.get(sessionId)?.session;
  }

  /**
   * Resolves when the session's current run has ended.
   */
  async waitForRun(sessionId: string): Promise<void> {
    await this.sessions.get(sessionId)?.run;
  }

  // ===========================================================================
  // Tasks & Control
  // ===========================================================================

  /**
   * Start a task. Resolves once the run has started; its progress and outcome
   * arrive as events.
   * @throws SessionBusyError when a run is already in progress
   */
  async submitTask(sessionId: string, request: TaskRequest): Promise<void> {
    const entry = await this.open(sessionId);
    const { session, orchestrator } = entry;
    this.assertIdle(entry);

    if (session.status === 'awaiting_keep_revert') {
      this.changes.keep(session, true);
    }
    if (session.plan) {
      session.plan = null;
      session.emit({ type: 'info', message: 'The pending plan was discarded for the new task' });
    }
    if (session.name === '') {
      this.applyName(session, nameFromTask(request.content));
    }

    this.startRun(entry, () =>
      orchestrator.run({ content: request.content, mode: request.mode ?? 'build', images: request.images })
    );
  }

  async handleControl(sessionId: string, message: ControlMessage): Promise<void> {
    const entry = await this.open(sessionId);
    const { session, orchestrator } = entry;

    switch (message.type) {
      case 'guidance': {
        const verdict = session.guidance.submit(message.content, orchestrator.isRunning);
        if (!verdict.accepted && verdict.level === 'error') {
          session.emit({ type: 'error', message: verdict.reason, code: ErrorCodes.INVALID_MESSAGE });
        } else if (!verdict.accepted && verdict.level === 'info') {
          session.emit({ type: 'info', message: verdict.reason });
        }
        return;
      }
      case 'cancel':
        if (!orchestrator.cancel()) {
          session.emit({ type: 'info', message: 'No task is running' });
        }
        return;
      case 'keep':
        this.assertIdle(entry);
        this.changes.keep(session);
        break;
      case 'revert':
        this.assertIdle(entry);
        await this.changes.revert(session);
        break;
      case 'checkpoint_restore':
        this.assertIdle(entry);
        await this.changes.rewind(session, message.id);
        break;
      case 'reset':
        await this.reset(entry);
        break;
      case 'plan_approve':
        this.approvePlan(entry, message.steps);
        return;
      case 'plan_reject':
        this.assertIdle(entry);
        this.pendingPlan(session);
        session.plan = null;
        session.emit({ type: 'info', message: 'Plan rejected' });
        session.setStatus('idle');
        break;
      case 'plan_feedback': {
        this.assertIdle(entry);
        const plan = this.pendingPlan(session);
        session.plan = null;
        this.startRun(entry, () =>
          orchestrator.run({
            content: `${plan.task}\n\nRevise the plan using this feedback: ${message.feedback}`,
            mode: 'plan',
            originalTask: plan.task,
          })
        );
        return;
      }
      case 'answer':
        if (!orchestrator.answer(message.toolUseId, message.answer)) {
          throw new TillerError(`No question ${message.toolUseId} is waiting for an answer`, {
            code: ErrorCodes.INVALID_STATE,
            category: 'invalid_request',
          });
        }
        return;
      case 'add_todo':
        this.todos.add(session, message.content);
        break;
      case 'remove_todo':
        this.todos.remove(session, message.id);
        break;
    }

    session.touch();
    this.save(session);
  }

  // ===========================================================================
  // Session Management
  // ===========================================================================

  listSessions(): SessionSummary[] {
    return this.config.store.listSessions();
  }

  async renameSession(sessionId: string, name: string): Promise<void> {
    const { session } = await this.open(sessionId);
    this.applyName(session, name.trim());
    this.save(session);
  }

  /**
   * Remove a session with its state and event log, cancelling any run first.
   * Attached observers are detached after a final `session_deleted`.
   * @returns false when the session did not exist
   */
  async deleteSession(sessionId: string): Promise<boolean> {
    const entry = this.sessions.get(sessionId);
    if (entry) {
      entry.orchestrator.cancel();
      await entry.run;
      this.sessions.delete(sessionId);
    }

    const handles = this.observers.get(sessionId);
    this.observers.delete(sessionId);
    for (const handle of handles ?? []) {
      handle.unsubscribe();
      handle.observer({ type: 'session_deleted', sessionId });
    }
    handles?.clear();
    const deleted = this.config.store.deleteSession(sessionId);
    logger.info('Session deleted', { sessionId, deleted });
    return deleted || entry !== undefined;
  }

  /**
   * Cancel every run, wait for them to unwind and persist every session.
   */
  async shutdown(): Promise<void> {
    const entries = [...this.sessions.values()];
    for (const entry of entries) {
      entry.orchestrator.cancel();
    }
    await Promise.all(entries.map(entry => entry.run));
    for (const entry of entries) {
      this.save(entry.session);
    }
    this.sessions.clear();
    logger.info('Coordinator shut down', { sessions: entries.length });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private assertIdle(entry: ActiveSession): void {
    if (entry.orchestrator.isRunning) {
      throw new SessionBusyError(entry.session.id);
    }
  }

  private pendingPlan(session: AgentSession) {
    if (session.status !== 'awaiting_plan_approval' || !session.plan) {
      throw new TillerError('No plan is awaiting approval', {
        code: ErrorCodes.INVALID_STATE,
        category: 'invalid_request',
      });
    }
    return session.plan;
  }

  private approvePlan(entry: ActiveSession, steps: string[] | undefined): void {
    const { session, orchestrator } = entry;
    this.assertIdle(entry);
    const plan = this.pendingPlan(session);

    if (steps) {
      const edited = steps.map((description, i) => ({ index: i + 1, description, status: 'pending' as const }));
      session.plan = { ...plan, steps: edited };
      session.emit({ type: 'plan', summary: plan.summary, steps: edited });
    }
    this.startRun(entry, () => orchestrator.runPlan());
  }

  private async reset(entry: ActiveSession): Promise<void> {
    const { session, orchestrator } = entry;
    if (orchestrator.cancel()) {
      await entry.run;
    }

    session.history.clear();
    session.changes.clear();
    session.guidance.clear();
    session.plan = null;
    session.todos = [];
    session.pendingDiff = [];
    session.pendingQuestion = null;
    session.tokenUsage = emptyTokenUsage();
    session.channel.clear();
    session.emit({ type: 'reset' });
    session.setStatus('idle');
    logger.info('Session reset', { sessionId: session.id });
  }

  private applyName(session: AgentSession, name: string): void {
    session.name = name;
    session.touch();
    session.emit({ type: 'session_renamed', name });
  }

  private startRun(entry: ActiveSession, start: () => Promise<void>): void {
    const run: Promise<void> = start()
      .catch((error: unknown) => {
        logger.error('Run ended with an unexpected error', TillerError.from(error));
      })
      .finally(() => {
        if (entry.run === run) {
          entry.run = null;
        }
      });
    entry.run = run;
  }

  private save(session: AgentSession): void {
    try {
      this.config.store.saveSession(session.toState());
    } catch (error) {
      logger.error('Failed to save session', TillerError.from(error, { sessionId: session.id }));
    }
  }

  /**
   * The active session, loading it from the store or creating it first.
   */
  private async open(sessionId: string): Promise<ActiveSession> {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }

    const stored = this.config.store.loadSession(sessionId);
    if (!stored) {
      const state = newSessionState(sessionId, this.config.backend.id, this.now());
      this.config.store.saveSession(state);
      logger.info('Session created', { sessionId });
      return this.activate(state);
    }

    const entry = this.activate(stored);
    this.reportSetAside(entry.session, stored.backendId);
    await this.normalize(entry.session);
    logger.info('Session loaded', { sessionId, status: entry.session.status, turns: entry.session.history.length });
    return entry;
  }

  private activate(state: SessionState): ActiveSession {
    const { store, settings } = this.config;
    const channel = new EventChannel({
      sessionId: state.id,
      log: storeEventLog(store, state.id),
      lastSequence: store.lastSequence(state.id),
      now: this.now,
    });
    const session = new AgentSession({
      state,
      backend: this.config.backend,
      channel,
      settings,
      summarizer: this.config.summarizer,
      now: this.now,
    });
    const orchestrator = new Orchestrator({
      session,
      service: this.config.service,
      tools: this.tools,
      settings,
      sleep: this.config.sleep,
      persist: () => this.save(session),
    });

    const entry: ActiveSession = { session, orchestrator, run: null };
    this.sessions.set(state.id, entry);
    return entry;
  }

  /**
   * Changes captured on a different workspace are never applied to this one.
   */
  private reportSetAside(session: AgentSession, storedBackendId: string): void {
    const paths = session.changes.setAsidePaths();
    if (paths.length === 0) {
      return;
    }
    logger.warn('Changes from another backend set aside', {
      sessionId: session.id,
      storedBackendId,
      backendId: session.backend.id,
      files: paths.length,
    });
    session.emit({
      type: 'info',
      message: `Changes to ${describePaths(paths)} were made in workspace ${storedBackendId} and will not be kept or reverted here`,
    });
  }

  /**
   * A stored session that was mid-run when the process stopped cannot resume
   * the run; put it where the user can decide what to do with its changes.
   */
  private async normalize(session: AgentSession): Promise<void> {
    if (session.status === 'running' || session.status === 'awaiting_answer') {
      session.setStatus(session.changes.hasChanges() ? 'awaiting_keep_revert' : 'idle');
    }
    if (session.status === 'awaiting_plan_approval' && !session.plan) {
      session.setStatus('idle');
    }
    if (session.status === 'awaiting_keep_revert' && !session.changes.hasChanges()) {
      session.setStatus('idle');
    }
    if (session.status === 'awaiting_keep_revert') {
      session.pendingDiff = await session.changes.diff();
    }
    this.save(session);
  }
}
