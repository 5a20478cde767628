/**
 * @fileoverview Tool-Execution Orchestrator
 *
 * Runs one task for one session: a loop of reasoning-service calls and tool
 * dispatches that ends when the service stops asking for tools, proposes a
 * plan, or hits the iteration cap. Every observable step is emitted through
 * the session's event channel.
 *
 * Cancellation is cooperative. The loop checks the run's signal before each
 * service call, between stream chunks and before each tool dispatch; tools
 * receive the same signal. Once a cancelled run unwinds, every tool call it
 * started has a final status and a matching result in history.
 */

import { ErrorCodes, PersistenceError, SessionBusyError, TillerError, formatError } from '../../core/errors/index.js';
import type {
  CompactionTier,
  ContentBlock,
  ImageBlock,
  PendingPlan,
  TaskMode,
  ThinkingBlock,
  TokenUsage,
  ToolResultBlock,
  ToolUseBlock,
  Turn,
} from '../../core/types/index.js';
import { textBlock, toolUsesOf, userTurn } from '../../core/types/index.js';
import {
  CORE_PROMPT,
  PLAN_MODE_SUFFIX,
  WORKING_DIRECTORY_SUFFIX,
  WRAP_UP_NOTE,
} from '../../context/index.js';
import type { ToolEffect, ToolRegistry } from '../../capabilities/tools/index.js';
import { truncateOutput } from '../../capabilities/tools/index.js';
import { createLogger, type TillerLogger } from '../../infrastructure/logging/index.js';
import type { TillerSettings } from '../../infrastructure/settings/index.js';
import type { ReasoningRequest, ReasoningService } from '../../llm/index.js';
import { classifyServiceError, failureSignature, isContextOverflow } from '../../llm/index.js';
import { decideRecovery, type FailureRecord, type StepResult } from './recovery-policy.js';
import type { AgentSession } from './session.js';
import { ToolRunTracker } from './tool-run-tracker.js';

// =============================================================================
// Types
// =============================================================================

export interface TaskInput {
  content: string;
  mode: TaskMode;
  images?: Array<Pick<ImageBlock, 'mediaType' | 'data'>>;
  /** Task recorded on a proposed plan; defaults to `content` */
  originalTask?: string;
}

export type OrchestratorRunSettings = Pick<TillerSettings, 'reasoning' | 'retry' | 'orchestrator'>;

export interface OrchestratorOptions {
  session: AgentSession;
  service: ReasoningService;
  tools: ToolRegistry;
  settings: OrchestratorRunSettings;
  /** Waits between retries; must reject when the signal aborts */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  /** Called at each turn boundary and when a run ends */
  persist?: () => void;
}

type LoopOutcome =
  | { kind: 'completed'; iterations: number }
  | { kind: 'plan'; iterations: number }
  | { kind: 'max_iterations'; iterations: number };

interface Draft {
  thinking: ThinkingBlock[];
  text: string;
  toolUses: ToolUseBlock[];
}

interface PendingAnswer {
  toolUseId: string;
  resolve: (answer: string) => void;
}

const CANCELLED_RESULT = 'Tool execution was cancelled by the user';

export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

// =============================================================================
// Orchestrator
// =============================================================================

export class Orchestrator {
  private readonly session: AgentSession;
  private readonly service: ReasoningService;
  private readonly tools: ToolRegistry;
  private readonly settings: OrchestratorRunSettings;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly persist: () => void;
  private readonly tracker = new ToolRunTracker();
  private readonly logger: TillerLogger;

  private controller: AbortController | null = null;
  private openResults: ToolResultBlock[] | null = null;
  private pendingAnswer: PendingAnswer | null = null;
  private currentTask = '';

  constructor(options: OrchestratorOptions) {
    this.session = options.session;
    this.service = options.service;
    this.tools = options.tools;
    this.settings = options.settings;
    this.sleep = options.sleep ?? abortableSleep;
    this.persist = options.persist ?? (() => undefined);
    this.logger = createLogger('orchestrator', { sessionId: options.session.id });
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  /**
   * Run a task to completion. Resolves once the run has settled, however it
   * ended; failures are reported as events.
   * @throws SessionBusyError when a run is already in progress
   */
  async run(input: TaskInput): Promise<void> {
    this.assertIdle();
    const content: ContentBlock[] = [textBlock(input.content)];
    for (const image of input.images ?? []) {
      content.push({ type: 'image', mediaType: image.mediaType, data: image.data });
    }
    this.currentTask = input.originalTask ?? input.content;
    this.session.emit({ type: 'user', content: input.content, imageCount: input.images?.length ?? 0 });
    this.session.history.append({ role: 'user', content });

    await this.guarded(signal => this.loop(input.mode, signal));
  }

  /**
   * Execute the session's pending plan, one sub-run per step. Each step ends
   * with a checkpoint labelled `step-N`.
   * @throws SessionBusyError when a run is already in progress
   */
  async runPlan(): Promise<void> {
    this.assertIdle();
    const plan = this.session.plan;
    if (!plan) {
      throw new TillerError('No plan is pending', { code: ErrorCodes.INVALID_STATE });
    }
    this.currentTask = plan.task;

    await this.guarded(async signal => {
      try {
        return await this.buildPlan(plan, signal);
      } finally {
        // the plan is spent once its build ends, however it ended
        this.session.plan = null;
      }
    });
  }

  private async buildPlan(plan: PendingPlan, signal: AbortSignal): Promise<LoopOutcome> {
    let iterations = 0;
    const total = plan.steps.length;
    for (const step of plan.steps) {
      step.status = 'in_progress';
      this.session.emit({ type: 'plan_step', index: step.index, status: 'in_progress' });
      this.session.history.append(
        userTurn(
          `Carry out step ${step.index} of ${total} of the approved plan: ${step.description}\n\nOverall task: ${plan.task}`,
          true
        )
      );

      let outcome: LoopOutcome;
      try {
        outcome = await this.loop('build', signal);
      } catch (error) {
        step.status = 'failed';
        this.session.emit({ type: 'plan_step', index: step.index, status: 'failed' });
        throw error;
      }
      iterations += outcome.iterations;

      if (outcome.kind === 'max_iterations') {
        step.status = 'failed';
        this.session.emit({ type: 'plan_step', index: step.index, status: 'failed' });
        return { kind: 'max_iterations', iterations };
      }

      step.status = 'completed';
      this.session.emit({ type: 'plan_step', index: step.index, status: 'completed' });
      const checkpoint = await this.session.changes.checkpoint(`step-${step.index}`);
      this.session.emit({
        type: 'checkpoint',
        checkpointId: checkpoint.id,
        sequence: checkpoint.sequence,
        label: checkpoint.label,
      });
      this.persist();
    }
    return { kind: 'completed', iterations };
  }

  /**
   * Abort the current run. The run unwinds asynchronously; run() or runPlan()
   * resolves once it has.
   * @returns false when nothing was running
   */
  cancel(): boolean {
    if (!this.controller || this.controller.signal.aborted) {
      return false;
    }
    this.logger.info('Cancelling run');
    this.controller.abort(new TillerError('Run cancelled', { code: 'CANCELLED' }));
    return true;
  }

  /**
   * Deliver the answer to the pending clarifying question.
   * @returns false when no question with that id is waiting
   */
  answer(toolUseId: string, answer: string): boolean {
    const pending = this.pendingAnswer;
    if (!pending || pending.toolUseId !== toolUseId) {
      return false;
    }
    this.pendingAnswer = null;
    this.session.pendingQuestion = null;
    this.session.emit({ type: 'user', content: answer, imageCount: 0 });
    this.session.setStatus('running');
    pending.resolve(answer);
    return true;
  }

  // ===========================================================================
  // Run Lifecycle
  // ===========================================================================

  private assertIdle(): void {
    if (this.controller) {
      throw new SessionBusyError(this.session.id);
    }
  }

  private async guarded(body: (signal: AbortSignal) => Promise<LoopOutcome>): Promise<void> {
    const controller = new AbortController();
    this.controller = controller;
    this.tracker.clear();
    this.session.pendingDiff = [];
    this.session.setStatus('running');

    try {
      const outcome = await body(controller.signal);
      this.logger.info('Run finished', { outcome: outcome.kind, iterations: outcome.iterations });

      if (outcome.kind === 'plan') {
        this.session.setStatus('awaiting_plan_approval');
        this.emitDone(outcome.iterations);
        return;
      }
      if (outcome.kind === 'max_iterations') {
        this.session.emit({
          type: 'error',
          message: `Stopped after reaching the limit of ${this.settings.orchestrator.maxIterations} iterations`,
          code: ErrorCodes.MAX_ITERATIONS,
        });
        await this.settle();
        return;
      }
      await this.settle();
      this.emitDone(outcome.iterations);
    } catch (error) {
      if (controller.signal.aborted) {
        await this.finishCancelled();
      } else {
        const wrapped = TillerError.from(error);
        this.logger.error('Run failed', wrapped);
        this.session.emit({ type: 'error', message: formatError(wrapped), code: wrapped.code });
        await this.settle();
      }
    } finally {
      this.controller = null;
      this.openResults = null;
      this.pendingAnswer = null;
      this.session.pendingQuestion = null;
      this.session.touch();
      this.persist();
    }
  }

  private emitDone(iterations: number): void {
    this.session.emit({ type: 'done', iterations, usage: this.session.tokenUsage });
  }

  /**
   * Open the keep/revert gate when files changed, otherwise go idle.
   */
  private async settle(): Promise<void> {
    if (await this.openGate()) return;
    this.session.setStatus('idle');
  }

  private async openGate(): Promise<boolean> {
    if (!this.session.changes.hasChanges()) {
      return false;
    }
    const files = await this.session.changes.diff();
    this.session.pendingDiff = files;
    this.session.emit({ type: 'diff', files });
    this.session.setStatus('awaiting_keep_revert');
    return true;
  }

  private async finishCancelled(): Promise<void> {
    const cancelled = this.tracker.cancelActive();
    for (const run of cancelled) {
      this.session.emit({
        type: 'tool_result',
        toolUseId: run.toolUseId,
        name: run.name,
        status: 'cancelled',
        content: CANCELLED_RESULT,
      });
      this.openResults?.push({ type: 'tool_result', toolUseId: run.toolUseId, content: CANCELLED_RESULT, success: false });
    }
    if (this.openResults) {
      this.session.history.append({ role: 'user', content: this.openResults });
      this.openResults = null;
    }

    this.session.emit({ type: 'cancelled', cancelledRuns: cancelled.map(run => run.toolUseId) });
    this.logger.info('Run cancelled', { cancelledRuns: cancelled.length });

    if (!(await this.openGate())) {
      this.session.setStatus('cancelled');
    }
  }

  // ===========================================================================
  // Turn Loop
  // ===========================================================================

  private async loop(mode: TaskMode, signal: AbortSignal): Promise<LoopOutcome> {
    const { maxIterations, wrapUpRatio } = this.settings.orchestrator;
    const wrapUpAt = Math.ceil(maxIterations * wrapUpRatio);
    let wrappedUp = false;

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      this.applyGuidance();

      if (!wrappedUp && iteration >= wrapUpAt) {
        this.session.history.append(userTurn(WRAP_UP_NOTE, true));
        wrappedUp = true;
      }

      await this.compactHistory(signal);
      this.repairHistory();

      const draft = await this.reason(mode, signal);
      const turn = assistantTurn(draft);
      if (turn.content.length === 0) {
        return { kind: 'completed', iterations: iteration };
      }

      this.session.history.append(turn);
      const calls = toolUsesOf(turn);
      if (calls.length === 0) {
        this.persist();
        return { kind: 'completed', iterations: iteration };
      }

      const results: ToolResultBlock[] = [];
      this.openResults = results;
      for (const call of calls) {
        this.tracker.register(call.id, call.name);
      }

      let planProposed = false;
      for (const call of calls) {
        signal.throwIfAborted();
        const effect = await this.dispatch(call, mode, signal, results);
        if (effect?.kind === 'plan') {
          planProposed = true;
        }
      }
      signal.throwIfAborted();

      this.openResults = null;
      this.session.history.append({ role: 'user', content: results });
      this.persist();

      if (planProposed) {
        return { kind: 'plan', iterations: iteration };
      }
    }

    return { kind: 'max_iterations', iterations: maxIterations };
  }

  private applyGuidance(): void {
    const items = this.session.guidance.drain();
    if (items.length === 0) return;
    this.session.history.append({ role: 'guidance', content: items.map(item => textBlock(item)) });
    for (const item of items) {
      this.session.emit({ type: 'guidance', content: item });
    }
  }

  private async compactHistory(signal: AbortSignal, forceTier?: CompactionTier): Promise<void> {
    const { contextWindowTokens, maxOutputTokens } = this.settings.reasoning;
    const result = await this.session.history.compact(contextWindowTokens - maxOutputTokens, signal, forceTier);
    if (result) {
      this.session.emit({ type: 'compacted', ...result });
    }
  }

  private repairHistory(): void {
    const fixes = this.session.history.repair();
    if (fixes.length > 0) {
      this.session.emit({ type: 'history_repaired', fixes });
    }
  }

  // ===========================================================================
  // Reasoning
  // ===========================================================================

  private async reason(mode: TaskMode, signal: AbortSignal): Promise<Draft> {
    const failures: FailureRecord[] = [];

    for (;;) {
      signal.throwIfAborted();
      const result = await this.attempt(mode, signal);
      if (result.kind === 'ok') {
        return result.value;
      }

      failures.push(result.failure);
      const decision = decideRecovery(failures, this.settings.retry);
      if (decision.action === 'abort') {
        throw decision.error;
      }

      this.logger.warn('Reasoning service call failed, retrying', {
        attempt: decision.attempt,
        delayMs: decision.delayMs,
        repair: decision.repair,
        classification: result.failure.classification,
        error: result.failure.message,
      });
      this.session.emit({
        type: 'retrying',
        attempt: decision.attempt,
        delayMs: decision.delayMs,
        reason: result.failure.message,
        repair: decision.repair,
      });
      await this.sleep(decision.delayMs, signal);
      if (isContextOverflow(result.failure.error)) {
        await this.compactHistory(signal, 'truncate');
      }
      if (decision.repair) {
        this.repairHistory();
      }
    }
  }

  private async attempt(mode: TaskMode, signal: AbortSignal): Promise<StepResult<Draft>> {
    const draft: Draft = { thinking: [], text: '', toolUses: [] };
    // counted only once the attempt succeeds
    const usages: TokenUsage[] = [];
    let thinking = '';

    try {
      for await (const chunk of this.service.stream(this.buildRequest(mode), signal)) {
        signal.throwIfAborted();
        switch (chunk.type) {
          case 'thinking':
            thinking += chunk.delta;
            this.session.emit({ type: 'thinking', delta: chunk.delta });
            break;
          case 'thinking_signature':
            draft.thinking.push({ type: 'thinking', thinking, signature: chunk.signature });
            thinking = '';
            break;
          case 'text':
            draft.text += chunk.delta;
            this.session.emit({ type: 'text', delta: chunk.delta });
            break;
          case 'tool_use':
            draft.toolUses.push({ type: 'tool_use', id: chunk.id, name: chunk.name, input: chunk.input });
            this.session.emit({ type: 'tool_use', toolUseId: chunk.id, name: chunk.name, input: chunk.input });
            break;
          case 'usage':
            usages.push(chunk.usage);
            break;
        }
      }
    } catch (error) {
      if (signal.aborted || error instanceof PersistenceError) throw error;
      const classification = classifyServiceError(error);
      const failure: FailureRecord = {
        classification,
        signature: failureSignature(error),
        message: error instanceof Error ? error.message : String(error),
        error,
      };
      return classification === 'fatal' ? { kind: 'fatal', failure } : { kind: 'retry', failure };
    }

    if (thinking !== '') {
      draft.thinking.push({ type: 'thinking', thinking });
    }
    for (const usage of usages) {
      this.session.addUsage(usage);
    }
    return { kind: 'ok', value: draft };
  }

  private buildRequest(mode: TaskMode): ReasoningRequest {
    const { maxOutputTokens, thinkingBudgetTokens } = this.settings.reasoning;
    let system = CORE_PROMPT;
    if (mode === 'plan') {
      system += PLAN_MODE_SUFFIX;
    }
    system += WORKING_DIRECTORY_SUFFIX.replace('{workingDirectory}', this.session.backend.root);

    return {
      system,
      turns: [...this.session.history.turns()],
      tools: this.tools.definitions(mode),
      maxOutputTokens,
      thinkingBudgetTokens,
    };
  }

  // ===========================================================================
  // Tool Dispatch
  // ===========================================================================

  /**
   * Run one tool call. Never throws for a tool failure; only cancellation
   * escapes.
   */
  private async dispatch(
    call: ToolUseBlock,
    mode: TaskMode,
    signal: AbortSignal,
    results: ToolResultBlock[]
  ): Promise<ToolEffect | undefined> {
    this.tracker.start(call.id);
    let content: string;
    let isError: boolean;
    let effect: ToolEffect | undefined;

    const prepared = this.tools.prepare(call.name, call.input, mode);
    if (!prepared.ok) {
      content = prepared.error;
      isError = true;
    } else {
      try {
        for (const path of prepared.call.mutatedPaths) {
          await this.session.changes.track(path);
        }
        const outcome = await prepared.call.execute({
          backend: this.session.backend,
          signal,
          toolUseId: call.id,
          commandTimeoutMs: this.settings.orchestrator.commandTimeoutMs,
          onOutput: (stream, chunk) => {
            this.session.emit({ type: 'command_output', toolUseId: call.id, stream, chunk });
          },
          ask: question => this.ask(call.id, question, signal),
        });
        content = outcome.content;
        isError = outcome.isError;
        effect = outcome.effect;
      } catch (error) {
        if (signal.aborted) {
          this.tracker.finish(call.id, 'cancelled');
          this.emitResult(call, 'cancelled', CANCELLED_RESULT, results);
          throw error;
        }
        this.logger.warn('Tool execution failed', { tool: call.name, toolUseId: call.id, error: formatError(error) });
        content = `Error executing ${call.name}: ${formatError(error)}`;
        isError = true;
      }
    }

    const { content: capped, truncated, originalChars } = truncateOutput(
      content,
      this.settings.orchestrator.maxToolOutputChars
    );
    if (truncated) {
      this.logger.debug('Tool output truncated', { tool: call.name, originalChars });
    }

    const status = signal.aborted ? 'cancelled' : isError ? 'failed' : 'succeeded';
    this.tracker.finish(call.id, status);
    this.emitResult(call, status, capped, results);

    if (effect && status === 'succeeded') {
      this.applyEffect(effect);
      return effect;
    }
    return undefined;
  }

  private emitResult(
    call: ToolUseBlock,
    status: 'succeeded' | 'failed' | 'cancelled',
    content: string,
    results: ToolResultBlock[]
  ): void {
    results.push({ type: 'tool_result', toolUseId: call.id, content, success: status === 'succeeded' });
    this.session.emit({ type: 'tool_result', toolUseId: call.id, name: call.name, status, content });
  }

  private applyEffect(effect: ToolEffect): void {
    switch (effect.kind) {
      case 'plan': {
        const steps = effect.steps.map((description, i) => ({
          index: i + 1,
          description,
          status: 'pending' as const,
        }));
        this.session.plan = { task: this.currentTask, summary: effect.summary, steps };
        this.session.emit({ type: 'plan', summary: effect.summary, steps });
        break;
      }
      case 'todos':
        this.session.todos = effect.todos;
        this.session.emit({ type: 'todos', todos: effect.todos });
        break;
    }
  }

  private ask(toolUseId: string, question: string, signal: AbortSignal): Promise<string> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      const onAbort = () => {
        this.pendingAnswer = null;
        reject(signal.reason);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.pendingAnswer = {
        toolUseId,
        resolve: answer => {
          signal.removeEventListener('abort', onAbort);
          resolve(answer);
        },
      };
      this.session.pendingQuestion = { toolUseId, question };
      this.session.setStatus('awaiting_answer');
      this.session.emit({ type: 'question', toolUseId, question });
    });
  }
}

function assistantTurn(draft: Draft): Turn {
  const content: ContentBlock[] = [...draft.thinking];
  if (draft.text !== '') {
    content.push(textBlock(draft.text));
  }
  content.push(...draft.toolUses);
  return { role: 'assistant', content };
}
