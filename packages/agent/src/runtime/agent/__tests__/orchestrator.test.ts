/**
 * @fileoverview Orchestrator Tests
 *
 * Drives whole runs against a scripted reasoning service and an in-memory
 * backend, asserting on the emitted event log and the resulting history.
 */

import { describe, it, expect, vi } from 'vitest';
import { SessionBusyError, TransientServiceError } from '../../../core/errors/index.js';
import { repairHistory } from '../../../core/utils/history-repair.js';
import { toolResultsOf, turnText, type SessionState, type Turn } from '../../../core/types/index.js';
import { PLAN_MODE_SUFFIX, WRAP_UP_NOTE } from '../../../context/index.js';
import { DEFAULT_SETTINGS, type TillerSettings } from '../../../infrastructure/settings/index.js';
import type { CommandHandler } from '../../../infrastructure/backend/index.js';
import type { ReasoningChunk } from '../../../llm/index.js';
import {
  createDefaultToolRegistry,
  ToolRegistry,
  type AgentTool,
} from '../../../capabilities/tools/index.js';
import { Orchestrator } from '../orchestrator.js';
import {
  ScriptedReasoningService,
  callTool,
  createTestSession,
  hangAfter,
  say,
  usage,
  type ScriptStep,
} from '../../../__fixtures__/index.js';

// =============================================================================
// Harness
// =============================================================================

interface HarnessOptions {
  files?: Record<string, string>;
  commandHandler?: CommandHandler;
  tools?: ToolRegistry;
  settings?: TillerSettings;
  state?: Partial<SessionState>;
}

function harness(script: ScriptStep[], options: HarnessOptions = {}) {
  const settings = options.settings ?? DEFAULT_SETTINGS;
  const test = createTestSession({
    backend: { files: options.files, commandHandler: options.commandHandler },
    state: options.state,
    settings,
  });
  const service = new ScriptedReasoningService(script);
  const sleep = vi.fn(async (_ms: number, _signal: AbortSignal) => undefined);
  const persist = vi.fn();
  const orchestrator = new Orchestrator({
    session: test.session,
    service,
    tools: options.tools ?? createDefaultToolRegistry(),
    settings,
    sleep,
    persist,
  });
  return { ...test, service, sleep, persist, orchestrator };
}

function withMaxIterations(maxIterations: number): TillerSettings {
  return { ...DEFAULT_SETTINGS, orchestrator: { ...DEFAULT_SETTINGS.orchestrator, maxIterations } };
}

// =============================================================================
// Completion
// =============================================================================

describe('Orchestrator', () => {
  describe('completion', () => {
    it('runs a text-only task to idle and closes with done', async () => {
      const { orchestrator, log, session } = harness([[say('Hello'), usage(10, 5)]]);

      await orchestrator.run({ content: 'Say hello', mode: 'build' });

      expect(log.types()).toEqual(['user', 'status', 'text', 'status', 'done']);
      expect(log.ofType('status').map(e => e.status)).toEqual(['running', 'idle']);
      expect(log.ofType('done')[0]).toMatchObject({
        iterations: 1,
        usage: { inputTokens: 10, outputTokens: 5, cacheReadTokens: 0, cacheWriteTokens: 0 },
      });
      expect(session.history.length).toBe(2);
      expect(session.status).toBe('idle');
      expect(orchestrator.isRunning).toBe(false);
    });

    it('opens the keep/revert gate with a diff after a file write', async () => {
      const { orchestrator, log, session, backend } = harness([
        [callTool('t1', 'write_file', { path: 'a.txt', content: 'new\n' })],
        [say('Wrote it')],
      ]);

      await orchestrator.run({ content: 'Create a.txt', mode: 'build' });

      expect(backend.text('a.txt')).toBe('new\n');
      expect(session.status).toBe('awaiting_keep_revert');
      expect(session.changes.trackedPaths()).toEqual(['a.txt']);

      const diff = log.ofType('diff')[0];
      expect(diff?.files.map(f => [f.path, f.change])).toEqual([['a.txt', 'added']]);
      expect(session.pendingDiff).toEqual(diff?.files);

      expect(log.ofType('tool_result')[0]).toMatchObject({
        toolUseId: 't1',
        name: 'write_file',
        status: 'succeeded',
        content: 'Successfully created a.txt with 4 bytes',
      });
      expect(log.types().at(-1)).toBe('done');
      expect(session.history.turns().map(t => t.role)).toEqual(['user', 'assistant', 'user', 'assistant']);
    });

    it('reports an unknown tool as a failed result and continues', async () => {
      const { orchestrator, log, session } = harness([[callTool('t1', 'nope', {})], [say('Sorry')]]);

      await orchestrator.run({ content: 'Do something', mode: 'build' });

      const result = log.ofType('tool_result')[0];
      expect(result?.status).toBe('failed');
      expect(result?.content).toContain('Unknown tool: nope');
      expect(session.status).toBe('idle');
      expect(log.types().at(-1)).toBe('done');
    });

    it('turns an exception thrown by a tool into a failed result', async () => {
      const exploding: AgentTool = {
        name: 'explode',
        description: 'Always fails',
        modes: ['build', 'plan'],
        definition: () => ({ name: 'explode', description: 'Always fails', inputSchema: { type: 'object' } }),
        prepare: () => ({
          ok: true,
          call: {
            tool: 'explode',
            mutatedPaths: [],
            execute: async () => {
              throw new Error('kaboom');
            },
          },
        }),
      };
      const { orchestrator, log, session } = harness([[callTool('x1', 'explode', {})], [say('It failed')]], {
        tools: new ToolRegistry([exploding]),
      });

      await orchestrator.run({ content: 'Explode', mode: 'build' });

      expect(log.ofType('tool_result')[0]).toMatchObject({
        toolUseId: 'x1',
        status: 'failed',
        content: 'Error executing explode: kaboom',
      });
      const results = session.history.turns()[2];
      expect(results && toolResultsOf(results)).toEqual([
        { type: 'tool_result', toolUseId: 'x1', content: 'Error executing explode: kaboom', success: false },
      ]);
      expect(session.status).toBe('idle');
    });

    it('stops at the iteration cap with an error and a wrap-up note', async () => {
      const { orchestrator, log, service, session } = harness(
        [
          [callTool('r1', 'read_file', { path: 'notes.txt' })],
          [callTool('r2', 'read_file', { path: 'notes.txt' })],
        ],
        { files: { 'notes.txt': 'hello' }, settings: withMaxIterations(2) }
      );

      await orchestrator.run({ content: 'Read forever', mode: 'build' });

      expect(log.ofType('error')).toMatchObject([
        { code: 'MAX_ITERATIONS', message: 'Stopped after reaching the limit of 2 iterations' },
      ]);
      expect(log.ofType('done')).toEqual([]);
      expect(session.status).toBe('idle');

      const secondRequest = service.requests[1];
      const lastTurn = secondRequest?.turns.at(-1);
      expect(lastTurn?.synthetic).toBe(true);
      expect(lastTurn && turnText(lastTurn)).toBe(WRAP_UP_NOTE);
    });

    it('rejects a second run while one is in progress', async () => {
      const { orchestrator, log } = harness([hangAfter()]);

      const first = orchestrator.run({ content: 'First', mode: 'build' });
      await expect(orchestrator.run({ content: 'Second', mode: 'build' })).rejects.toBeInstanceOf(SessionBusyError);

      orchestrator.cancel();
      await first;
      expect(log.ofType('user').map(e => e.content)).toEqual(['First']);
    });
  });

  // ===========================================================================
  // Cancellation
  // ===========================================================================

  describe('cancellation', () => {
    it('leaves no pending runs when cancelled during a command', async () => {
      let cancelRun = (): void => undefined;
      const { orchestrator, log, session } = harness(
        [
          [
            callTool('t1', 'run_command', { command: 'sleep 100' }),
            callTool('t2', 'read_file', { path: 'notes.txt' }),
          ],
        ],
        {
          files: { 'notes.txt': 'hello' },
          commandHandler: () => {
            cancelRun();
            return { exitCode: 130, output: '', timedOut: false, aborted: true };
          },
        }
      );
      cancelRun = () => {
        orchestrator.cancel();
      };

      await orchestrator.run({ content: 'Run it', mode: 'build' });

      expect(log.ofType('tool_result').map(e => [e.toolUseId, e.status])).toEqual([
        ['t1', 'cancelled'],
        ['t2', 'cancelled'],
      ]);
      expect(log.ofType('cancelled')).toMatchObject([{ cancelledRuns: ['t2'] }]);
      expect(session.status).toBe('cancelled');

      const lastTurn = session.history.turns().at(-1);
      expect(lastTurn && toolResultsOf(lastTurn).map(r => r.toolUseId)).toEqual(['t1', 't2']);
      expect(repairHistory(session.history.turns()).fixes).toEqual([]);
      expect(log.ofType('done')).toEqual([]);
    });

    it('discards a partial response when cancelled mid-stream', async () => {
      const { orchestrator, log, session, channel } = harness([hangAfter([say('Thinking about it')])]);
      channel.subscribe(event => {
        if (event.type === 'text') orchestrator.cancel();
      });

      await orchestrator.run({ content: 'Think', mode: 'build' });

      expect(log.types()).toEqual(['user', 'status', 'text', 'cancelled', 'status']);
      expect(log.ofType('cancelled')[0]?.cancelledRuns).toEqual([]);
      expect(session.status).toBe('cancelled');
      expect(session.history.length).toBe(1);
    });

    it('moves to the keep/revert gate when cancelled with changes pending', async () => {
      const { orchestrator, log, session, channel } = harness([
        [callTool('t1', 'write_file', { path: 'a.txt', content: 'A' })],
        hangAfter(),
      ]);
      channel.subscribe(event => {
        if (event.type === 'tool_result') orchestrator.cancel();
      });

      await orchestrator.run({ content: 'Write', mode: 'build' });

      expect(session.status).toBe('awaiting_keep_revert');
      expect(log.ofType('diff')[0]?.files.map(f => f.path)).toEqual(['a.txt']);
      expect(log.ofType('tool_result')[0]?.status).toBe('succeeded');
      expect(log.ofType('cancelled')[0]?.cancelledRuns).toEqual([]);
      const lastTurn = session.history.turns().at(-1);
      expect(lastTurn && toolResultsOf(lastTurn).map(r => r.toolUseId)).toEqual(['t1']);
    });

    it('returns false when nothing is running', () => {
      const { orchestrator } = harness([]);
      expect(orchestrator.cancel()).toBe(false);
    });
  });

  // ===========================================================================
  // Recovery
  // ===========================================================================

  describe('recovery', () => {
    it('retries a transient failure after a backoff', async () => {
      const { orchestrator, log, sleep } = harness([new TransientServiceError('Service overloaded'), [say('ok')]]);

      await orchestrator.run({ content: 'Try', mode: 'build' });

      expect(log.ofType('retrying')).toMatchObject([
        { attempt: 1, delayMs: 2000, reason: 'Service overloaded', repair: false },
      ]);
      expect(sleep).toHaveBeenCalledWith(2000, expect.any(AbortSignal));
      expect(log.types().at(-1)).toBe('done');
    });

    it('ends the run with one error after five identical failures', async () => {
      const failures = Array.from({ length: 5 }, () => new TransientServiceError('Service overloaded'));
      const { orchestrator, log, service, session } = harness(failures);

      await orchestrator.run({ content: 'Try', mode: 'build' });

      expect(service.requests).toHaveLength(5);
      expect(log.ofType('retrying').map(e => e.repair)).toEqual([false, false, true, true]);
      expect(log.ofType('error')).toMatchObject([
        { code: 'STREAM_FAILED', message: 'Reasoning service failed after 5 attempts: Service overloaded' },
      ]);
      expect(log.ofType('done')).toEqual([]);
      expect(session.status).toBe('idle');
    });

    it('counts usage only from the attempt that succeeded', async () => {
      const overloaded = async function* (): AsyncIterable<ReasoningChunk> {
        yield usage(100, 0);
        throw new TransientServiceError('Service overloaded');
      };
      const { orchestrator, log, session } = harness([overloaded, [say('ok'), usage(10, 5)]]);

      await orchestrator.run({ content: 'Try', mode: 'build' });

      const expected = { inputTokens: 10, outputTokens: 5, cacheReadTokens: 0, cacheWriteTokens: 0 };
      expect(log.ofType('done')[0]?.usage).toEqual(expected);
      expect(session.tokenUsage).toEqual(expected);
    });

    it('truncates the history before retrying a context overflow', async () => {
      const history = Array.from({ length: 10 }, (_, i): Turn => ({
        role: i % 2 === 0 ? 'user' : 'assistant',
        content: [{ type: 'text', text: `turn ${i}` }],
      }));
      const { orchestrator, log, service } = harness([new Error('prompt is too long'), [say('ok')]], {
        state: { history },
      });

      await orchestrator.run({ content: 'Continue', mode: 'build' });

      expect(log.ofType('compacted')).toMatchObject([{ tier: 'truncate', turnsBefore: 11, turnsAfter: 5 }]);
      expect(service.requests.map(request => request.turns.length)).toEqual([11, 5]);
      expect(log.types().at(-1)).toBe('done');
    });

    it('ends the run when an event cannot be persisted', async () => {
      const { orchestrator, log, service, session } = harness([[say('Hello')]]);
      const append = log.append.bind(log);
      vi.spyOn(log, 'append').mockImplementation(event => {
        if (event.type === 'text') throw new Error('disk full');
        append(event);
      });

      await orchestrator.run({ content: 'Say hello', mode: 'build' });

      expect(service.requests).toHaveLength(1);
      expect(log.types()).toEqual(['user', 'status', 'error', 'status']);
      expect(log.ofType('error')[0]).toMatchObject({ code: 'PERSISTENCE_ERROR', message: 'Failed to persist event' });
      expect(session.status).toBe('idle');
    });

    it('does not retry a fatal failure', async () => {
      const { orchestrator, log, service } = harness([new Error('invalid x-api-key')]);

      await orchestrator.run({ content: 'Try', mode: 'build' });

      expect(service.requests).toHaveLength(1);
      expect(log.ofType('retrying')).toEqual([]);
      expect(log.ofType('error')[0]?.code).toBe('AUTHENTICATION');
    });
  });

  // ===========================================================================
  // Interaction
  // ===========================================================================

  describe('interaction', () => {
    it('suspends on a question until the answer arrives', async () => {
      const { orchestrator, log, channel, session } = harness([
        [callTool('q1', 'ask_user', { question: 'Which file?' })],
        [say('Thanks')],
      ]);
      channel.subscribe(event => {
        if (event.type === 'question') {
          expect(orchestrator.answer('other', 'nope')).toBe(false);
          expect(orchestrator.answer('q1', 'b.txt')).toBe(true);
        }
      });

      await orchestrator.run({ content: 'Edit a file', mode: 'build' });

      expect(log.ofType('status').map(e => e.status)).toEqual(['running', 'awaiting_answer', 'running', 'idle']);
      expect(log.ofType('question')).toMatchObject([{ toolUseId: 'q1', question: 'Which file?' }]);
      expect(log.ofType('user').map(e => e.content)).toEqual(['Edit a file', 'b.txt']);
      expect(log.ofType('tool_result')[0]?.content).toBe('User answered: b.txt');
      expect(session.pendingQuestion).toBeNull();
    });

    it('applies queued guidance at the next turn boundary', async () => {
      const { orchestrator, log, channel, session, service } = harness(
        [[callTool('t1', 'read_file', { path: 'notes.txt' })], [say('Done')]],
        { files: { 'notes.txt': 'hello' } }
      );
      channel.subscribe(event => {
        if (event.type === 'tool_result') session.guidance.submit('Prefer tabs', true);
      });

      await orchestrator.run({ content: 'Read notes', mode: 'build' });

      expect(log.ofType('guidance').map(e => e.content)).toEqual(['Prefer tabs']);
      const guidanceTurn = service.requests[1]?.turns.at(-1);
      expect(guidanceTurn?.role).toBe('guidance');
      expect(guidanceTurn && turnText(guidanceTurn)).toBe('Prefer tabs');
    });

    it('applies todo updates from the tool', async () => {
      const { orchestrator, log, session } = harness([
        [callTool('u1', 'update_todos', { todos: [{ content: 'Write tests', status: 'in_progress' }] })],
        [say('Tracking')],
      ]);

      await orchestrator.run({ content: 'Plan work', mode: 'build' });

      expect(session.todos).toEqual([{ id: 'todo-1', content: 'Write tests', status: 'in_progress' }]);
      expect(log.ofType('todos')[0]?.todos).toEqual(session.todos);
    });
  });

  // ===========================================================================
  // Plans
  // ===========================================================================

  describe('plans', () => {
    it('records a proposed plan and waits for approval', async () => {
      const { orchestrator, log, session, service } = harness([
        [callTool('p1', 'propose_plan', { summary: 'Add a greeting', steps: ['Create hello.txt', 'Print it'] })],
      ]);

      await orchestrator.run({ content: 'Say hello', mode: 'plan' });

      expect(session.status).toBe('awaiting_plan_approval');
      expect(session.plan).toEqual({
        task: 'Say hello',
        summary: 'Add a greeting',
        steps: [
          { index: 1, description: 'Create hello.txt', status: 'pending' },
          { index: 2, description: 'Print it', status: 'pending' },
        ],
      });
      expect(log.ofType('plan')[0]?.steps).toHaveLength(2);
      expect(log.types().at(-1)).toBe('done');

      const request = service.requests[0];
      expect(request?.system).toContain(PLAN_MODE_SUFFIX.trim());
      expect(request?.tools.map(t => t.name)).not.toContain('write_file');
      expect(request?.tools.map(t => t.name)).toContain('propose_plan');
    });

    it('executes an approved plan step by step with checkpoints', async () => {
      const { orchestrator, log, session } = harness([
        [callTool('w1', 'write_file', { path: 'a.txt', content: 'A' })],
        [say('Step one done')],
        [say('Step two done')],
      ]);
      session.plan = {
        task: 'Build it',
        summary: 'Two steps',
        steps: [
          { index: 1, description: 'Write a.txt', status: 'pending' },
          { index: 2, description: 'Check it', status: 'pending' },
        ],
      };

      await orchestrator.runPlan();

      const progress = log.events.flatMap(e => {
        if (e.type === 'plan_step') return [`${e.index}:${e.status}`];
        if (e.type === 'checkpoint') return [`${e.checkpointId}:${e.label}`];
        return [];
      });
      expect(progress).toEqual([
        '1:in_progress',
        '1:completed',
        'ckpt-1:step-1',
        '2:in_progress',
        '2:completed',
        'ckpt-2:step-2',
      ]);
      expect(session.plan).toBeNull();
      expect(session.status).toBe('awaiting_keep_revert');
      expect(log.ofType('done')[0]?.iterations).toBe(3);
    });

    it('fails the running step and drops the plan when cancelled', async () => {
      const { orchestrator, log, session, channel } = harness([hangAfter([say('Working on it')])]);
      session.plan = {
        task: 'Build it',
        summary: 'Two steps',
        steps: [
          { index: 1, description: 'Write a.txt', status: 'pending' },
          { index: 2, description: 'Check it', status: 'pending' },
        ],
      };
      channel.subscribe(event => {
        if (event.type === 'text') orchestrator.cancel();
      });

      await orchestrator.runPlan();

      expect(log.ofType('plan_step').map(e => `${e.index}:${e.status}`)).toEqual(['1:in_progress', '1:failed']);
      expect(log.types().slice(-3)).toEqual(['plan_step', 'cancelled', 'status']);
      expect(session.plan).toBeNull();
      expect(session.status).toBe('cancelled');
      expect(session.replayState().pendingPlan).toBeNull();
    });

    it('refuses to run without a pending plan', async () => {
      const { orchestrator } = harness([]);
      await expect(orchestrator.runPlan()).rejects.toThrow('No plan is pending');
    });
  });
});
