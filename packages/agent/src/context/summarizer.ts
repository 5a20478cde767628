/**
 * @fileoverview Summarizer Interface
 *
 * Defines the contract for compaction summaries, the renderer that turns a
 * summary into a synthetic turn, and a heuristic summarizer that works
 * without a reasoning service.
 */

import type { Turn, ToolResultBlock } from '../core/types/index.js';
import { isText, isToolResult, isToolUse, turnText } from '../core/types/index.js';
import { SUMMARY_MAX_LIST_ITEMS, SUMMARY_TOPIC_MAX_CHARS } from './constants.js';

// =============================================================================
// Summary Structure
// =============================================================================

export interface SummarySections {
  currentTopic: string;
  /** What pronouns in the most recent turns refer to */
  referents: string[];
  originalTask: string;
  filesTouched: string[];
  workCompleted: string[];
  nextSteps: string[];
}

export interface SummaryInput {
  /** Turns being folded into the summary, oldest first */
  turns: Turn[];
  originalTask: string;
  /** The last few of `turns`, whose references the summary must resolve */
  referentTurns: Turn[];
}

export interface Summarizer {
  summarize(input: SummaryInput, signal?: AbortSignal): Promise<SummarySections>;
}

// =============================================================================
// Rendering
// =============================================================================

export const SUMMARY_HEADER = '[Conversation summary]';
export const TRUNCATION_HEADER = '[Earlier conversation truncated]';

const SECTION_TITLES = {
  currentTopic: 'Current topic',
  referents: 'Referents',
  originalTask: 'Original task',
  filesTouched: 'Files touched',
  workCompleted: 'Work completed',
  nextSteps: 'Next steps',
} as const satisfies Record<keyof SummarySections, string>;

const NONE = '(none)';

function renderText(value: string): string {
  return value.trim() === '' ? NONE : value.trim();
}

function renderList(items: string[]): string {
  const cleaned = items.map(item => item.trim()).filter(item => item !== '');
  return cleaned.length === 0 ? NONE : cleaned.map(item => `- ${item}`).join('\n');
}

/**
 * Render all six sections; empty ones read "(none)".
 */
export function renderSummary(sections: SummarySections): string {
  return [
    SUMMARY_HEADER,
    `## ${SECTION_TITLES.currentTopic}\n${renderText(sections.currentTopic)}`,
    `## ${SECTION_TITLES.referents}\n${renderList(sections.referents)}`,
    `## ${SECTION_TITLES.originalTask}\n${renderText(sections.originalTask)}`,
    `## ${SECTION_TITLES.filesTouched}\n${renderList(sections.filesTouched)}`,
    `## ${SECTION_TITLES.workCompleted}\n${renderList(sections.workCompleted)}`,
    `## ${SECTION_TITLES.nextSteps}\n${renderList(sections.nextSteps)}`,
  ].join('\n\n');
}

export function renderTruncationMarker(originalTask: string): string {
  return `${TRUNCATION_HEADER}\n\n## ${SECTION_TITLES.originalTask}\n${renderText(originalTask)}`;
}

/**
 * Read the sections back out of a rendered summary or truncation marker.
 * Returns null for any other text.
 */
export function parseRenderedSummary(text: string): Partial<SummarySections> | null {
  if (!text.startsWith(SUMMARY_HEADER) && !text.startsWith(TRUNCATION_HEADER)) {
    return null;
  }

  const body = new Map<string, string>();
  for (const part of text.split(/^## /m).slice(1)) {
    const newline = part.indexOf('\n');
    const title = (newline === -1 ? part : part.slice(0, newline)).trim();
    const content = newline === -1 ? '' : part.slice(newline + 1).trim();
    body.set(title, content === NONE ? '' : content);
  }

  const list = (title: string): string[] | undefined => {
    const content = body.get(title);
    if (content === undefined) return undefined;
    return content
      .split('\n')
      .map(line => line.replace(/^- /, '').trim())
      .filter(line => line !== '');
  };

  const result: Partial<SummarySections> = {};
  const topic = body.get(SECTION_TITLES.currentTopic);
  const task = body.get(SECTION_TITLES.originalTask);
  const referents = list(SECTION_TITLES.referents);
  const files = list(SECTION_TITLES.filesTouched);
  const work = list(SECTION_TITLES.workCompleted);
  const next = list(SECTION_TITLES.nextSteps);
  if (topic !== undefined) result.currentTopic = topic;
  if (task !== undefined) result.originalTask = task;
  if (referents) result.referents = referents;
  if (files) result.filesTouched = files;
  if (work) result.workCompleted = work;
  if (next) result.nextSteps = next;
  return result;
}

// =============================================================================
// Heuristic Summarizer (Fallback)
// =============================================================================

const PATH_KEYS = ['path', 'file_path'] as const;
const NEXT_STEP_LINE = /^\s*(?:[-*]\s*|\d+\.\s*)?(?:next|then|todo|remaining|still need)\b/i;

function pathOf(input: Record<string, unknown>): string | undefined {
  for (const key of PATH_KEYS) {
    const value = input[key];
    if (typeof value === 'string' && value !== '') return value;
  }
  return undefined;
}

function describeCall(name: string, input: Record<string, unknown>): string {
  const target = pathOf(input) ?? (typeof input.command === 'string' ? input.command.slice(0, 100) : undefined);
  return target ? `${name} ${target}` : name;
}

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}

function truncate(value: string, max: number): string {
  return value.length <= max ? value : `${value.slice(0, max - 3)}...`;
}

/**
 * Extracts the sections from the turns themselves. Summaries from earlier
 * compactions are read back and merged so nothing they held is lost.
 */
export class HeuristicSummarizer implements Summarizer {
  async summarize(input: SummaryInput): Promise<SummarySections> {
    const filesTouched: string[] = [];
    const workCompleted: string[] = [];
    let nextSteps: string[] = [];
    let currentTopic = '';

    const results = new Map<string, ToolResultBlock>();
    for (const turn of input.turns) {
      for (const block of turn.content) {
        if (isToolResult(block)) results.set(block.toolUseId, block);
      }
    }

    for (const turn of input.turns) {
      const text = turnText(turn);
      const previous = turn.synthetic ? parseRenderedSummary(text) : null;
      if (previous) {
        previous.filesTouched?.forEach(file => pushUnique(filesTouched, file));
        previous.workCompleted?.forEach(item => pushUnique(workCompleted, item));
        if (previous.nextSteps?.length) nextSteps = previous.nextSteps;
        if (previous.currentTopic) currentTopic = previous.currentTopic;
        continue;
      }

      if ((turn.role === 'user' || turn.role === 'guidance') && !turn.synthetic && text.trim() !== '') {
        currentTopic = text.trim();
      }

      for (const block of turn.content) {
        if (!isToolUse(block)) continue;
        const path = pathOf(block.input);
        if (path) pushUnique(filesTouched, path);
        if (results.get(block.id)?.success) {
          workCompleted.push(describeCall(block.name, block.input));
        }
      }

      if (turn.role === 'assistant' && text !== '') {
        const steps = text.split('\n').filter(line => NEXT_STEP_LINE.test(line)).map(line => line.trim());
        if (steps.length > 0) nextSteps = steps;
      }
    }

    return {
      currentTopic: truncate(currentTopic || input.originalTask, SUMMARY_TOPIC_MAX_CHARS),
      referents: this.referents(input.referentTurns),
      originalTask: input.originalTask,
      filesTouched: filesTouched.slice(-SUMMARY_MAX_LIST_ITEMS),
      workCompleted: workCompleted.slice(-SUMMARY_MAX_LIST_ITEMS),
      nextSteps: nextSteps.slice(0, SUMMARY_MAX_LIST_ITEMS),
    };
  }

  /**
   * Files and code identifiers named in the window, most recent first.
   */
  private referents(turns: Turn[]): string[] {
    const found: string[] = [];
    for (const turn of [...turns].reverse()) {
      for (const block of turn.content) {
        if (isToolUse(block)) {
          const path = pathOf(block.input);
          if (path) pushUnique(found, path);
        } else if (isText(block)) {
          for (const match of block.text.matchAll(/`([^`\n]{1,80})`/g)) {
            if (match[1]) pushUnique(found, match[1]);
          }
        }
      }
    }
    return found.slice(0, 10);
  }
}
