/**
 * @fileoverview History repair tests
 */

import { describe, it, expect } from 'vitest';
import type { ContentBlock, Turn } from '../../types/index.js';
import { repairHistory, INTERRUPTED_RESULT_CONTENT } from '../index.js';

// =============================================================================
// Test Helpers
// =============================================================================

function user(...content: ContentBlock[]): Turn {
  return { role: 'user', content };
}

function assistant(...content: ContentBlock[]): Turn {
  return { role: 'assistant', content };
}

function text(value: string): ContentBlock {
  return { type: 'text', text: value };
}

function use(id: string): ContentBlock {
  return { type: 'tool_use', id, name: 'read_file', input: { path: 'a.ts' } };
}

function result(id: string, content = 'ok'): ContentBlock {
  return { type: 'tool_result', toolUseId: id, content, success: true };
}

function interrupted(id: string): ContentBlock {
  return { type: 'tool_result', toolUseId: id, content: INTERRUPTED_RESULT_CONTENT, success: false };
}

// =============================================================================
// Tests
// =============================================================================

describe('repairHistory', () => {
  it('leaves a valid history unchanged', () => {
    const history = [
      user(text('read a.ts')),
      assistant(text('reading'), use('t1')),
      user(result('t1')),
      assistant(text('done')),
    ];

    const repaired = repairHistory(history);
    expect(repaired.fixes).toEqual([]);
    expect(repaired.turns).toEqual(history);
  });

  it('injects failure results for calls answered by a later turn without them', () => {
    const history = [
      user(text('go')),
      assistant(use('t1'), use('t2')),
      user(result('t1'), text('also this')),
    ];

    const repaired = repairHistory(history);
    expect(repaired.fixes).toEqual([{ kind: 'injected_tool_result', toolUseId: 't2' }]);
    expect(repaired.turns[2]).toEqual(user(result('t1'), interrupted('t2'), text('also this')));
  });

  it('inserts a result turn when an assistant turn follows directly', () => {
    const history = [
      user(text('go')),
      assistant(use('t1')),
      assistant(text('continuing')),
    ];

    const repaired = repairHistory(history);
    expect(repaired.turns).toEqual([
      user(text('go')),
      assistant(use('t1')),
      { role: 'user', content: [interrupted('t1')], synthetic: true },
      assistant(text('continuing')),
    ]);
  });

  it('removes unanswered calls from a trailing assistant turn', () => {
    const history = [user(text('go')), assistant(text('let me look'), use('t1'))];

    const repaired = repairHistory(history);
    expect(repaired.fixes).toEqual([{ kind: 'removed_tool_use', toolUseId: 't1' }]);
    expect(repaired.turns).toEqual([user(text('go')), assistant(text('let me look'))]);
  });

  it('drops a trailing turn that held only tool calls', () => {
    const repaired = repairHistory([user(text('go')), assistant(use('t1'))]);
    expect(repaired.turns).toEqual([user(text('go'))]);
    expect(repaired.fixes).toEqual([
      { kind: 'removed_tool_use', toolUseId: 't1' },
      { kind: 'removed_empty_turn' },
    ]);
  });

  it('removes stray and duplicate results', () => {
    const history = [
      user(text('go'), result('ghost')),
      assistant(use('t1')),
      user(result('t1'), result('t1', 'again'), result('other')),
    ];

    const repaired = repairHistory(history);
    expect(repaired.fixes).toEqual([
      { kind: 'removed_orphan_result', toolUseId: 'ghost' },
      { kind: 'removed_duplicate_result', toolUseId: 't1' },
      { kind: 'removed_orphan_result', toolUseId: 'other' },
    ]);
    expect(repaired.turns).toEqual([user(text('go')), assistant(use('t1')), user(result('t1'))]);
  });

  it('drops a user turn left empty after removing stray results', () => {
    const repaired = repairHistory([user(result('ghost')), user(text('hello'))]);
    expect(repaired.turns).toEqual([user(text('hello'))]);
  });

  it('does not mutate its input', () => {
    const history = [user(text('go')), assistant(use('t1'))];
    const copy = JSON.parse(JSON.stringify(history));
    repairHistory(history);
    expect(history).toEqual(copy);
  });

  it('is idempotent', () => {
    const broken = [
      user(text('go'), result('ghost')),
      assistant(use('t1'), use('t2')),
      assistant(use('t3')),
      user(result('t3'), result('t3')),
      { role: 'guidance' as const, content: [text('focus on tests')] },
      assistant(text('trailing'), use('t4')),
    ];

    const once = repairHistory(broken);
    expect(once.fixes.length).toBeGreaterThan(0);

    const twice = repairHistory(once.turns);
    expect(twice.fixes).toEqual([]);
    expect(twice.turns).toEqual(once.turns);
  });
});
