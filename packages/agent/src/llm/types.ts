/**
 * @fileoverview Reasoning service contract
 *
 * The engine asks a reasoning service for the next action as a stream of
 * chunks. Adapters translate their provider's wire format into these chunks
 * and leave retry decisions to the orchestrator.
 */

import type { TokenUsage, Turn } from '../core/types/index.js';

export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON Schema of the tool input */
  inputSchema: Record<string, unknown>;
}

export interface ReasoningRequest {
  system: string;
  turns: Turn[];
  tools: ToolDefinition[];
  maxOutputTokens: number;
  /** 0 or absent disables extended thinking */
  thinkingBudgetTokens?: number;
}

export type ReasoningChunk =
  | { type: 'thinking'; delta: string }
  /** Closes a thinking block; the signature must be sent back unchanged */
  | { type: 'thinking_signature'; signature: string }
  | { type: 'text'; delta: string }
  | { type: 'tool_use'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'usage'; usage: TokenUsage };

export interface ReasoningService {
  readonly model: string;
  stream(request: ReasoningRequest, signal: AbortSignal): AsyncIterable<ReasoningChunk>;
}

/**
 * - transient: retry after a delay
 * - structural: the history is malformed; repair before retrying
 * - fatal: retrying cannot help
 */
export type ServiceErrorClass = 'transient' | 'structural' | 'fatal';
