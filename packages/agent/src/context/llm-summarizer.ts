/**
 * @fileoverview Reasoning-Service Summarizer
 *
 * Asks the reasoning service for the six summary sections as JSON. Falls back
 * to HeuristicSummarizer on any failure.
 */

import { z } from 'zod';
import type { Turn } from '../core/types/index.js';
import { isText, isThinking, isToolResult, isToolUse } from '../core/types/index.js';
import { createLogger } from '../infrastructure/logging/index.js';
import type { ReasoningService } from '../llm/types.js';
import {
  SUMMARIZER_ASSISTANT_TEXT_LIMIT,
  SUMMARIZER_MAX_SERIALIZED_CHARS,
  SUMMARIZER_THINKING_TEXT_LIMIT,
  SUMMARIZER_TOOL_RESULT_TEXT_LIMIT,
} from './constants.js';
import { HeuristicSummarizer, type Summarizer, type SummaryInput, type SummarySections } from './summarizer.js';
import { COMPACTION_SUMMARIZER_PROMPT } from './system-prompts/index.js';

const logger = createLogger('context:llm-summarizer');

const SUMMARY_MAX_OUTPUT_TOKENS = 4096;

const sectionsSchema = z.object({
  currentTopic: z.string().default(''),
  referents: z.array(z.string()).default([]),
  originalTask: z.string().default(''),
  filesTouched: z.array(z.string()).default([]),
  workCompleted: z.array(z.string()).default([]),
  nextSteps: z.array(z.string()).default([]),
});

// =============================================================================
// ReasoningSummarizer
// =============================================================================

export class ReasoningSummarizer implements Summarizer {
  private readonly fallback = new HeuristicSummarizer();

  constructor(private readonly service: ReasoningService) {}

  async summarize(input: SummaryInput, signal?: AbortSignal): Promise<SummarySections> {
    try {
      let output = '';
      const request = {
        system: COMPACTION_SUMMARIZER_PROMPT,
        turns: [{ role: 'user' as const, content: [{ type: 'text' as const, text: serializeTurns(input) }] }],
        tools: [],
        maxOutputTokens: SUMMARY_MAX_OUTPUT_TOKENS,
      };
      for await (const chunk of this.service.stream(request, signal ?? new AbortController().signal)) {
        if (chunk.type === 'text') output += chunk.delta;
      }

      const parsed = parseResponse(output);
      if (!parsed) {
        logger.warn('Summarizer returned invalid JSON, using fallback', {
          outputLength: output.length,
          outputPreview: output.slice(0, 200),
        });
        return this.fallback.summarize(input);
      }

      logger.info('Summarizer produced summary', {
        filesTouched: parsed.filesTouched.length,
        workCompleted: parsed.workCompleted.length,
      });
      return { ...parsed, originalTask: input.originalTask || parsed.originalTask };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logger.warn('Summarizer failed, using fallback', {
        error: error instanceof Error ? error.message : String(error),
      });
      return this.fallback.summarize(input);
    }
  }
}

// =============================================================================
// Turn Serialization
// =============================================================================

/**
 * Serialize turns to a text transcript. Caps output at
 * SUMMARIZER_MAX_SERIALIZED_CHARS by keeping the first and last quarter.
 */
export function serializeTurns(input: SummaryInput): string {
  const lines: string[] = [`[ORIGINAL TASK] ${input.originalTask}`];

  for (const turn of input.turns) {
    for (const block of turn.content) {
      if (isText(block)) {
        if (turn.role === 'assistant') {
          lines.push(`[ASSISTANT] ${block.text.slice(0, SUMMARIZER_ASSISTANT_TEXT_LIMIT)}`);
        } else {
          lines.push(`[${turn.role === 'guidance' ? 'GUIDANCE' : 'USER'}] ${block.text}`);
        }
      } else if (isThinking(block) && block.thinking) {
        lines.push(`[THINKING] ${block.thinking.slice(0, SUMMARIZER_THINKING_TEXT_LIMIT)}`);
      } else if (isToolUse(block)) {
        lines.push(`[TOOL_CALL] ${block.name}(${extractKeyArgs(block.input)})`);
      } else if (isToolResult(block)) {
        const prefix = block.success ? '[TOOL_RESULT]' : '[TOOL_ERROR]';
        lines.push(`${prefix} ${block.content.slice(0, SUMMARIZER_TOOL_RESULT_TEXT_LIMIT)}`);
      }
    }
  }

  const referentStart = input.turns.length - input.referentTurns.length;
  lines.push(`[NOTE] Resolve references made in the last ${input.referentTurns.length} turns (from turn ${referentStart + 1}).`);

  const full = lines.join('\n');
  if (full.length <= SUMMARIZER_MAX_SERIALIZED_CHARS) {
    return full;
  }

  const quarter = Math.floor(SUMMARIZER_MAX_SERIALIZED_CHARS / 4);
  const head = full.slice(0, quarter);
  const tail = full.slice(-quarter);
  return `${head}\n\n[... ${full.length - quarter * 2} characters omitted ...]\n\n${tail}`;
}

function extractKeyArgs(args: Record<string, unknown>): string {
  const keys = ['path', 'file_path', 'command', 'summary'];
  const parts: string[] = [];
  for (const key of keys) {
    const value = args[key];
    if (typeof value === 'string') {
      parts.push(`${key}: ${value.slice(0, 100)}`);
    }
  }
  return parts.join(', ');
}

// =============================================================================
// Response Parsing
// =============================================================================

/**
 * Parse the JSON response, stripping markdown fences if present.
 * Returns null on any parse failure.
 */
export function parseResponse(raw: string): SummarySections | null {
  let text = raw.trim();
  const fenceMatch = text.match(/^```(?:json)?\s*\n?([\s\S]*?)\n?\s*```$/);
  if (fenceMatch?.[1] !== undefined) {
    text = fenceMatch[1].trim();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }

  const result = sectionsSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
