/**
 * @fileoverview Session Coordinator Tests
 *
 * Runs the coordinator over an in-memory SQLite store and an in-memory
 * backend; the event log is read back from the store.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ErrorCodes, NoSuchCheckpointError, SessionBusyError } from '../../../core/errors/index.js';
import { emptyTokenUsage, turnText, type OutboundMessage, type SessionState } from '../../../core/types/index.js';
import { PLAN_MODE_SUFFIX } from '../../../context/index.js';
import { MemoryBackend } from '../../../infrastructure/backend/index.js';
import { DatabaseConnection, SqliteSessionStore } from '../../../infrastructure/persistence/index.js';
import { DEFAULT_SETTINGS } from '../../../infrastructure/settings/index.js';
import { SessionCoordinator, nameFromTask } from '../index.js';
import type { AgentSession } from '../../agent/index.js';
import {
  ScriptedReasoningService,
  callTool,
  hangAfter,
  say,
  type ScriptStep,
} from '../../../__fixtures__/index.js';

// =============================================================================
// Harness
// =============================================================================

function storedState(overrides: Partial<SessionState> = {}): SessionState {
  return {
    id: 's2',
    name: 'Stored',
    backendId: 'memory',
    status: 'idle',
    history: [],
    changeSet: { modifiedFiles: [], checkpoints: [], nextSequence: 1 },
    pendingPlan: null,
    todos: [],
    tokenUsage: emptyTokenUsage(),
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('SessionCoordinator', () => {
  let store: SqliteSessionStore;
  let backend: MemoryBackend;
  let service: ScriptedReasoningService;
  let coordinator: SessionCoordinator;

  function createCoordinator(): SessionCoordinator {
    return new SessionCoordinator({
      store,
      backend,
      service,
      settings: DEFAULT_SETTINGS,
      sleep: async () => undefined,
    });
  }

  function setup(script: ScriptStep[] = [], files?: Record<string, string>): void {
    backend = new MemoryBackend({ files });
    service = new ScriptedReasoningService(script);
    coordinator = createCoordinator();
  }

  function loaded(sessionId = 's1'): AgentSession {
    const session = coordinator.get(sessionId);
    if (!session) {
      throw new Error(`session ${sessionId} is not loaded`);
    }
    return session;
  }

  function eventTypes(sessionId = 's1'): string[] {
    return store.readEvents(sessionId).map(event => event.type);
  }

  function infoMessages(sessionId = 's1'): string[] {
    return store.readEvents(sessionId).flatMap(event => (event.type === 'info' ? [event.message] : []));
  }

  function historyText(session: AgentSession): string[] {
    return session.history.turns().map(turnText);
  }

  async function runTask(content: string, mode: 'build' | 'plan' = 'build'): Promise<void> {
    await coordinator.submitTask('s1', { content, mode });
    await coordinator.waitForRun('s1');
  }

  beforeEach(() => {
    store = new SqliteSessionStore(new DatabaseConnection(':memory:'));
    setup();
  });

  afterEach(() => {
    store.close();
  });

  describe('nameFromTask', () => {
    it('keeps the first six words', () => {
      expect(nameFromTask('  Fix   the parser ')).toBe('Fix the parser');
      expect(nameFromTask('one two three four five six seven')).toBe('one two three four five six...');
    });
  });

  // ===========================================================================
  // Tasks
  // ===========================================================================

  describe('tasks', () => {
    it('creates the session on first use and names it after the task', async () => {
      await runTask('Fix the flaky parser test in the lexer module');

      const renamed = store.readEvents('s1').flatMap(e => (e.type === 'session_renamed' ? [e.name] : []));
      expect(renamed).toEqual(['Fix the flaky parser test in...']);
      expect(store.listSessions()).toEqual([
        expect.objectContaining({
          id: 's1',
          name: 'Fix the flaky parser test in...',
          status: 'idle',
          backendId: 'memory',
          turnCount: 2,
        }),
      ]);
    });

    it('keeps pending changes implicitly when a new task arrives', async () => {
      setup([[callTool('w1', 'write_file', { path: 'a.txt', content: 'A' })], [say('Created')]]);
      await runTask('Create a.txt');
      expect(loaded().status).toBe('awaiting_keep_revert');

      await runTask('Next task');

      const keeps = store.readEvents('s1').flatMap(e => (e.type === 'keep' ? [e] : []));
      expect(keeps).toEqual([expect.objectContaining({ paths: ['a.txt'], implicit: true })]);
      expect(historyText(loaded())).toContain('[The user kept the changes to 1 file: a.txt]');
      expect(loaded().status).toBe('idle');
      expect(loaded().name).toBe('Create a.txt');
      expect(backend.text('a.txt')).toBe('A');
    });

    it('rejects a task while another is running and cancels on request', async () => {
      setup([hangAfter([say('Working')])]);
      await coordinator.submitTask('s1', { content: 'Long job' });

      await expect(coordinator.submitTask('s1', { content: 'Another' })).rejects.toBeInstanceOf(SessionBusyError);

      await coordinator.handleControl('s1', { type: 'cancel' });
      await coordinator.waitForRun('s1');

      expect(loaded().status).toBe('cancelled');
      expect(eventTypes()).toContain('cancelled');
    });

    it('reports a cancel with nothing running', async () => {
      await coordinator.handleControl('s1', { type: 'cancel' });
      expect(infoMessages()).toEqual(['No task is running']);
    });

    it('answers guidance sent while idle with an info event', async () => {
      await coordinator.handleControl('s1', { type: 'guidance', content: 'Use tabs' });
      expect(infoMessages()).toEqual(['No task is running; send it as a new task instead']);
    });

    it('rejects an answer when no question is waiting', async () => {
      await expect(
        coordinator.handleControl('s1', { type: 'answer', toolUseId: 'q1', answer: 'yes' })
      ).rejects.toMatchObject({ code: ErrorCodes.INVALID_STATE });
    });
  });

  // ===========================================================================
  // Change control
  // ===========================================================================

  describe('change control', () => {
    it('reports keep and revert with nothing pending', async () => {
      await coordinator.handleControl('s1', { type: 'keep' });
      await coordinator.handleControl('s1', { type: 'revert' });

      expect(infoMessages()).toEqual(['No pending changes to keep', 'No pending changes to revert']);
      expect(loaded().status).toBe('idle');
    });

    it('keeps changes explicitly and returns to idle', async () => {
      setup([[callTool('w1', 'write_file', { path: 'a.txt', content: 'A' })], [say('Created')]]);
      await runTask('Create a.txt');

      await coordinator.handleControl('s1', { type: 'keep' });

      const session = loaded();
      expect(session.status).toBe('idle');
      expect(session.changes.hasChanges()).toBe(false);
      expect(session.pendingDiff).toEqual([]);
      expect(historyText(session)).toContain('[The user kept the changes to 1 file: a.txt]');
      expect(store.loadSession('s1')?.status).toBe('idle');
    });

    it('removes a created file and restores an edited one on revert', async () => {
      setup(
        [
          [
            callTool('w1', 'write_file', { path: 'a.py', content: 'print(1)\n' }),
            callTool('w2', 'write_file', { path: 'b.py', content: 'x=2\n' }),
          ],
          [say('Edited')],
        ],
        { 'b.py': 'x=1\n' }
      );
      await runTask('Edit the scripts');
      expect(loaded().pendingDiff.map(f => [f.path, f.change])).toEqual([
        ['a.py', 'added'],
        ['b.py', 'modified'],
      ]);

      await coordinator.handleControl('s1', { type: 'revert' });

      expect(backend.text('a.py')).toBeUndefined();
      expect(backend.text('b.py')).toBe('x=1\n');
      const reverts = store.readEvents('s1').flatMap(e => (e.type === 'revert' ? [e] : []));
      expect(reverts).toEqual([expect.objectContaining({ restored: ['b.py'], removed: ['a.py'], failed: [] })]);
      expect(historyText(loaded())).toContain('[The user reverted the changes to 2 files: b.py, a.py.]');
      expect(loaded().status).toBe('idle');
    });

    it('rewinds to a checkpoint and keeps the gate open', async () => {
      setup([[callTool('w1', 'write_file', { path: 'a.txt', content: 'A' })], [say('Created')]]);
      await runTask('Create a.txt');
      const checkpoint = await loaded().changes.checkpoint('manual');
      expect(checkpoint.id).toBe('ckpt-1');
      await backend.writeFile('a.txt', 'B');

      await coordinator.handleControl('s1', { type: 'checkpoint_restore', id: 'ckpt-1' });

      expect(backend.text('a.txt')).toBe('A');
      const rewinds = store.readEvents('s1').flatMap(e => (e.type === 'rewind' ? [e] : []));
      expect(rewinds).toEqual([
        expect.objectContaining({ checkpointId: 'ckpt-1', restored: ['a.txt'], removed: [], discarded: [] }),
      ]);
      expect(historyText(loaded())).toContain(
        '[The user rewound the files to checkpoint ckpt-1, restoring 1 file: a.txt.]'
      );
      expect(loaded().status).toBe('awaiting_keep_revert');
      expect(loaded().pendingDiff.map(f => f.path)).toEqual(['a.txt']);
    });

    it('rejects an unknown checkpoint', async () => {
      await expect(
        coordinator.handleControl('s1', { type: 'checkpoint_restore', id: 'ckpt-9' })
      ).rejects.toBeInstanceOf(NoSuchCheckpointError);
    });

    it('resets history, changes and the event log', async () => {
      setup([[callTool('w1', 'write_file', { path: 'a.txt', content: 'A' })], [say('Created')]]);
      await runTask('Create a.txt');

      await coordinator.handleControl('s1', { type: 'reset' });

      const session = loaded();
      expect(session.history.length).toBe(0);
      expect(session.changes.hasChanges()).toBe(false);
      expect(session.tokenUsage).toEqual(emptyTokenUsage());
      expect(store.readEvents('s1').map(e => [e.sequence, e.type])).toEqual([
        [1, 'reset'],
        [2, 'status'],
      ]);
      expect(backend.text('a.txt')).toBe('A');
    });
  });

  // ===========================================================================
  // Plans
  // ===========================================================================

  describe('plans', () => {
    const proposal = callTool('p1', 'propose_plan', { summary: 'Two steps', steps: ['Write a.txt', 'Check it'] });

    it('runs an approved plan with edited steps', async () => {
      setup([[proposal], [callTool('w1', 'write_file', { path: 'a.txt', content: 'A' })], [say('Written')]]);
      await runTask('Say hello', 'plan');
      expect(loaded().status).toBe('awaiting_plan_approval');

      await coordinator.handleControl('s1', { type: 'plan_approve', steps: ['Write a.txt'] });
      await coordinator.waitForRun('s1');

      const plans = store.readEvents('s1').flatMap(e => (e.type === 'plan' ? [e] : []));
      expect(plans.at(-1)).toMatchObject({
        summary: 'Two steps',
        steps: [{ index: 1, description: 'Write a.txt', status: 'pending' }],
      });
      const steps = store.readEvents('s1').flatMap(e => (e.type === 'plan_step' ? [`${e.index}:${e.status}`] : []));
      expect(steps).toEqual(['1:in_progress', '1:completed']);
      expect(turnText(service.requests[1]?.turns.at(-1) ?? { role: 'user', content: [] })).toBe(
        'Carry out step 1 of 1 of the approved plan: Write a.txt\n\nOverall task: Say hello'
      );
      expect(loaded().plan).toBeNull();
      expect(loaded().status).toBe('awaiting_keep_revert');
    });

    it('drops a rejected plan', async () => {
      setup([[proposal]]);
      await runTask('Say hello', 'plan');

      await coordinator.handleControl('s1', { type: 'plan_reject' });

      expect(loaded().plan).toBeNull();
      expect(loaded().status).toBe('idle');
      expect(infoMessages()).toEqual(['Plan rejected']);
    });

    it('revises a plan with feedback under the original task', async () => {
      setup([
        [proposal],
        [callTool('p2', 'propose_plan', { summary: 'One step', steps: ['Do it'] })],
      ]);
      await runTask('Say hello', 'plan');

      await coordinator.handleControl('s1', { type: 'plan_feedback', feedback: 'Use one step' });
      await coordinator.waitForRun('s1');

      const users = store.readEvents('s1').flatMap(e => (e.type === 'user' ? [e.content] : []));
      expect(users.at(-1)).toBe('Say hello\n\nRevise the plan using this feedback: Use one step');
      expect(service.requests[1]?.system).toContain(PLAN_MODE_SUFFIX.trim());
      expect(loaded().plan).toEqual({
        task: 'Say hello',
        summary: 'One step',
        steps: [{ index: 1, description: 'Do it', status: 'pending' }],
      });
      expect(loaded().status).toBe('awaiting_plan_approval');
    });

    it('drops the plan when its build is cancelled', async () => {
      setup([[proposal], hangAfter()]);
      await runTask('Say hello', 'plan');
      await coordinator.handleControl('s1', { type: 'plan_approve' });

      await coordinator.handleControl('s1', { type: 'cancel' });
      await coordinator.waitForRun('s1');

      const steps = store.readEvents('s1').flatMap(e => (e.type === 'plan_step' ? [`${e.index}:${e.status}`] : []));
      expect(steps).toEqual(['1:in_progress', '1:failed']);
      const messages: OutboundMessage[] = [];
      await coordinator.attach('s1', message => messages.push(message));
      expect(messages.find(m => m.type === 'replay_state')).toMatchObject({ status: 'cancelled', pendingPlan: null });
      expect(store.loadSession('s1')?.pendingPlan).toBeNull();
    });

    it('rejects approval when no plan is pending', async () => {
      await expect(coordinator.handleControl('s1', { type: 'plan_approve' })).rejects.toMatchObject({
        code: ErrorCodes.INVALID_STATE,
        message: 'No plan is awaiting approval',
      });
    });

    it('discards a pending plan when a new task arrives', async () => {
      setup([[proposal]]);
      await runTask('Say hello', 'plan');

      await runTask('Never mind, just say hi');

      expect(infoMessages()).toEqual(['The pending plan was discarded for the new task']);
      expect(loaded().plan).toBeNull();
      expect(loaded().status).toBe('idle');
    });
  });

  // ===========================================================================
  // Todos
  // ===========================================================================

  describe('todos', () => {
    it('adds and removes todos', async () => {
      await coordinator.handleControl('s1', { type: 'add_todo', content: ' Write docs ' });
      await coordinator.handleControl('s1', { type: 'add_todo', content: 'Ship it' });
      await coordinator.handleControl('s1', { type: 'remove_todo', id: 'todo-1' });

      expect(loaded().todos).toEqual([{ id: 'todo-2', content: 'Ship it', status: 'pending' }]);
      expect(store.loadSession('s1')?.todos).toEqual([{ id: 'todo-2', content: 'Ship it', status: 'pending' }]);
      await expect(coordinator.handleControl('s1', { type: 'remove_todo', id: 'todo-9' })).rejects.toThrow(
        'No todo with id todo-9'
      );
    });
  });

  // ===========================================================================
  // Loading & attachment
  // ===========================================================================

  describe('loading', () => {
    it('attaches to the default session when none is named', async () => {
      const messages: OutboundMessage[] = [];
      const attachment = await coordinator.attach(undefined, message => messages.push(message));

      expect(attachment.sessionId).toBe('default');
      expect(messages.map(m => m.type)).toEqual(['resumed', 'replay_state', 'replay_done']);

      attachment.detach();
      await coordinator.handleControl('default', { type: 'cancel' });
      expect(messages).toHaveLength(3);
    });

    it('joins a running task with replay followed by the live events', async () => {
      setup([hangAfter([say('Working')])]);
      await coordinator.submitTask('s1', { content: 'Long job' });
      await new Promise(resolve => setTimeout(resolve, 0));

      const messages: OutboundMessage[] = [];
      await coordinator.attach('s1', message => messages.push(message));
      await coordinator.handleControl('s1', { type: 'cancel' });
      await coordinator.waitForRun('s1');

      const doneAt = messages.findIndex(m => m.type === 'replay_done');
      const done = messages[doneAt];
      const replayed = messages.slice(0, doneAt).flatMap(m => (m.type === 'replay' ? [m.sequence] : []));
      const live = messages.slice(doneAt + 1).flatMap(m => ('sequence' in m && m.type !== 'replay' ? [m.sequence] : []));

      expect(done).toEqual({ type: 'replay_done', lastSequence: replayed.at(-1) });
      expect(live[0]).toBe((replayed.at(-1) ?? 0) + 1);
      expect([...replayed, ...live]).toEqual(store.readEvents('s1').map(event => event.sequence));
      expect(messages.slice(doneAt + 1).map(m => m.type)).toContain('cancelled');
    });

    it('settles a session stored mid-run to idle', async () => {
      store.saveSession(storedState({ status: 'running' }));
      const messages: OutboundMessage[] = [];

      await coordinator.attach('s2', message => messages.push(message));

      expect(messages[0]).toMatchObject({ type: 'resumed', sessionId: 's2', name: 'Stored', status: 'idle' });
      expect(store.loadSession('s2')?.status).toBe('idle');
    });

    it('settles an approval wait with no plan to idle', async () => {
      store.saveSession(storedState({ id: 's3', status: 'awaiting_plan_approval' }));

      await coordinator.attach('s3', () => undefined);

      expect(coordinator.get('s3')?.status).toBe('idle');
    });

    it('restores pending changes in a new coordinator', async () => {
      setup([[callTool('w1', 'write_file', { path: 'a.txt', content: 'A' })], [say('Created')]]);
      await runTask('Create a.txt');
      await coordinator.shutdown();

      coordinator = createCoordinator();
      await coordinator.attach('s1', () => undefined);

      const session = loaded();
      expect(session.status).toBe('awaiting_keep_revert');
      expect(session.changes.trackedPaths()).toEqual(['a.txt']);
      expect(session.pendingDiff.map(f => [f.path, f.change])).toEqual([['a.txt', 'added']]);

      await coordinator.handleControl('s1', { type: 'revert' });
      expect(backend.text('a.txt')).toBeUndefined();
    });

    it('sets aside changes captured on another backend', async () => {
      setup([], { 'b.py': 'local work' });
      store.saveSession(storedState({
        backendId: 'remote-a',
        status: 'awaiting_keep_revert',
        changeSet: {
          modifiedFiles: [{
            key: '["remote-a","b.py"]',
            path: 'b.py',
            originalContent: Buffer.from('REMOTE ORIGINAL').toString('base64'),
            existedBefore: true,
            capturedAt: 1,
          }],
          checkpoints: [],
          nextSequence: 1,
        },
      }));

      await coordinator.attach('s2', () => undefined);
      await coordinator.handleControl('s2', { type: 'revert' });

      expect(backend.text('b.py')).toBe('local work');
      expect(coordinator.get('s2')?.status).toBe('idle');
      expect(infoMessages('s2')).toEqual([
        'Changes to b.py were made in workspace remote-a and will not be kept or reverted here',
        'No pending changes to revert',
      ]);
      expect(store.loadSession('s2')?.changeSet.modifiedFiles.map(f => f.key)).toEqual(['["remote-a","b.py"]']);
    });
  });

  // ===========================================================================
  // Session management
  // ===========================================================================

  describe('session management', () => {
    it('renames a session', async () => {
      await coordinator.renameSession('s1', '  Parser work ');

      expect(store.listSessions().map(s => s.name)).toEqual(['Parser work']);
      const renamed = store.readEvents('s1').flatMap(e => (e.type === 'session_renamed' ? [e.name] : []));
      expect(renamed).toEqual(['Parser work']);
    });

    it('deletes a session with its events', async () => {
      await runTask('Say hello');

      expect(await coordinator.deleteSession('s1')).toBe(true);
      expect(coordinator.get('s1')).toBeUndefined();
      expect(store.listSessions()).toEqual([]);
      expect(store.readEvents('s1')).toEqual([]);
      expect(await coordinator.deleteSession('ghost')).toBe(false);
    });

    it('ends the observers of a deleted session', async () => {
      const messages: OutboundMessage[] = [];
      await coordinator.attach('s1', message => messages.push(message));

      await coordinator.deleteSession('s1');
      await runTask('Say hello');

      expect(messages.map(m => m.type)).toEqual(['resumed', 'replay_state', 'replay_done', 'session_deleted']);
      expect(messages.at(-1)).toEqual({ type: 'session_deleted', sessionId: 's1' });
      expect(eventTypes()).toEqual(['session_renamed', 'user', 'status', 'text', 'status', 'done']);
    });

    it('cancels running tasks on shutdown and persists them', async () => {
      setup([hangAfter()]);
      await coordinator.submitTask('s1', { content: 'Long job' });

      await coordinator.shutdown();

      expect(store.loadSession('s1')?.status).toBe('cancelled');
      expect(coordinator.get('s1')).toBeUndefined();
    });
  });
});
