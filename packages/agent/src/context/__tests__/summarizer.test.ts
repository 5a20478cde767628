/**
 * @fileoverview Summary rendering and heuristic summarizer tests
 */

import { describe, it, expect } from 'vitest';
import type { Turn } from '../../core/types/index.js';
import {
  HeuristicSummarizer,
  parseRenderedSummary,
  renderSummary,
  type SummarySections,
} from '../summarizer.js';

const SECTIONS: SummarySections = {
  currentTopic: 'Fix the parser',
  referents: ['parser.ts'],
  originalTask: 'Fix bugs',
  filesTouched: [],
  workCompleted: ['edit_file parser.ts'],
  nextSteps: [],
};

describe('renderSummary', () => {
  it('renders all six sections with (none) for empty ones', () => {
    expect(renderSummary(SECTIONS)).toBe(
      [
        '[Conversation summary]',
        '## Current topic\nFix the parser',
        '## Referents\n- parser.ts',
        '## Original task\nFix bugs',
        '## Files touched\n(none)',
        '## Work completed\n- edit_file parser.ts',
        '## Next steps\n(none)',
      ].join('\n\n'),
    );
  });

  it('reads back what it rendered', () => {
    expect(parseRenderedSummary(renderSummary(SECTIONS))).toEqual(SECTIONS);
  });

  it('ignores ordinary text', () => {
    expect(parseRenderedSummary('## Current topic\nnot a summary')).toBeNull();
  });
});

describe('HeuristicSummarizer', () => {
  const summarizer = new HeuristicSummarizer();

  it('extracts topic, files, completed work, next steps and referents', async () => {
    const turns: Turn[] = [
      { role: 'user', content: [{ type: 'text', text: 'Add logging to `server.ts`' }] },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Reading it' },
          { type: 'tool_use', id: 't1', name: 'read_file', input: { path: 'src/server.ts' } },
        ],
      },
      { role: 'user', content: [{ type: 'tool_result', toolUseId: 't1', content: 'code', success: true }] },
      {
        role: 'assistant',
        content: [{ type: 'tool_use', id: 't2', name: 'edit_file', input: { path: 'src/server.ts' } }],
      },
      { role: 'user', content: [{ type: 'tool_result', toolUseId: 't2', content: 'no match', success: false }] },
      { role: 'assistant', content: [{ type: 'text', text: 'Done with the first part.\nNext: run the tests' }] },
    ];

    const sections = await summarizer.summarize({
      turns,
      originalTask: 'Add logging',
      referentTurns: turns.slice(-4),
    });

    expect(sections).toEqual({
      currentTopic: 'Add logging to `server.ts`',
      referents: ['src/server.ts'],
      originalTask: 'Add logging',
      filesTouched: ['src/server.ts'],
      workCompleted: ['read_file src/server.ts'],
      nextSteps: ['Next: run the tests'],
    });
  });

  it('merges an earlier summary into the new one', async () => {
    const previous = renderSummary({
      currentTopic: 'Old topic',
      referents: [],
      originalTask: 'Build it',
      filesTouched: ['a.ts'],
      workCompleted: ['write_file a.ts'],
      nextSteps: ['Next: b'],
    });
    const turns: Turn[] = [
      { role: 'user', content: [{ type: 'text', text: previous }], synthetic: true },
      {
        role: 'assistant',
        content: [{ type: 'tool_use', id: 't3', name: 'write_file', input: { path: 'b.ts' } }],
      },
      { role: 'user', content: [{ type: 'tool_result', toolUseId: 't3', content: 'ok', success: true }] },
    ];

    const sections = await summarizer.summarize({ turns, originalTask: 'Build it', referentTurns: [] });

    expect(sections.currentTopic).toBe('Old topic');
    expect(sections.filesTouched).toEqual(['a.ts', 'b.ts']);
    expect(sections.workCompleted).toEqual(['write_file a.ts', 'write_file b.ts']);
    expect(sections.nextSteps).toEqual(['Next: b']);
  });
});
