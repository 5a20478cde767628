/**
 * @fileoverview History Repair
 *
 * Restores the pairing invariant before a history is sent to the reasoning
 * service: every tool_use in an assistant turn is answered by exactly one
 * tool_result in the turn that immediately follows it.
 *
 * Properties:
 * - Pure: the input is never mutated
 * - Idempotent: repairing a repaired history yields no fixes
 * - Returns every fix it applied
 */

import type { ContentBlock, HistoryFix, ToolResultBlock, Turn } from '../types/index.js';
import { isToolResult, isToolUse, toolUsesOf } from '../types/index.js';

/** Content of results synthesized for calls whose result was lost */
export const INTERRUPTED_RESULT_CONTENT = '(result unavailable: recovered from interrupted exchange)';

export interface RepairResult {
  turns: Turn[];
  fixes: HistoryFix[];
}

function withContent(turn: Turn, content: ContentBlock[]): Turn {
  return { ...turn, content };
}

function interruptedResult(toolUseId: string): ToolResultBlock {
  return { type: 'tool_result', toolUseId, content: INTERRUPTED_RESULT_CONTENT, success: false };
}

/**
 * Keep only the results answering `expected`, first occurrence each, and add
 * failure results for the ones missing after the last kept result.
 */
function reconcileResults(turn: Turn, expected: string[], fixes: HistoryFix[]): Turn {
  const wanted = new Set(expected);
  const seen = new Set<string>();
  const content: ContentBlock[] = [];
  let lastResultIndex = -1;

  for (const block of turn.content) {
    if (!isToolResult(block)) {
      content.push(block);
      continue;
    }
    if (!wanted.has(block.toolUseId)) {
      fixes.push({ kind: 'removed_orphan_result', toolUseId: block.toolUseId });
      continue;
    }
    if (seen.has(block.toolUseId)) {
      fixes.push({ kind: 'removed_duplicate_result', toolUseId: block.toolUseId });
      continue;
    }
    seen.add(block.toolUseId);
    content.push(block);
    lastResultIndex = content.length - 1;
  }

  const missing = expected.filter(id => !seen.has(id));
  for (const id of missing) {
    fixes.push({ kind: 'injected_tool_result', toolUseId: id });
  }
  content.splice(lastResultIndex + 1, 0, ...missing.map(interruptedResult));
  return withContent(turn, content);
}

function stripResults(turn: Turn, fixes: HistoryFix[]): Turn {
  const stray = turn.content.filter(isToolResult);
  if (stray.length === 0) {
    return turn;
  }
  for (const block of stray) {
    fixes.push({ kind: 'removed_orphan_result', toolUseId: block.toolUseId });
  }
  return withContent(turn, turn.content.filter(block => !isToolResult(block)));
}

export function repairHistory(history: readonly Turn[]): RepairResult {
  const fixes: HistoryFix[] = [];
  const out: Turn[] = [];

  const pushTurn = (turn: Turn): void => {
    if (turn.content.length === 0) {
      fixes.push({ kind: 'removed_empty_turn' });
      return;
    }
    out.push(turn);
  };

  for (let i = 0; i < history.length; i++) {
    const turn = history[i];
    if (!turn) continue;

    if (turn.role !== 'assistant') {
      pushTurn(stripResults(turn, fixes));
      continue;
    }

    const assistant = stripResults(turn, fixes);
    const expected = toolUsesOf(assistant).map(block => block.id);
    if (expected.length === 0) {
      pushTurn(assistant);
      continue;
    }

    const next = history[i + 1];
    if (!next) {
      // Trailing calls that were never answered are dropped from the turn
      for (const id of expected) {
        fixes.push({ kind: 'removed_tool_use', toolUseId: id });
      }
      pushTurn(withContent(assistant, assistant.content.filter(block => !isToolUse(block))));
      continue;
    }

    pushTurn(assistant);
    if (next.role === 'user') {
      pushTurn(reconcileResults(next, expected, fixes));
      i++;
    } else {
      for (const id of expected) {
        fixes.push({ kind: 'injected_tool_result', toolUseId: id });
      }
      out.push({ role: 'user', content: expected.map(interruptedResult), synthetic: true });
    }
  }

  return { turns: out, fixes };
}
