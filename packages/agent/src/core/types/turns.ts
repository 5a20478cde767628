/**
 * @fileoverview Conversation turn types
 *
 * A history is an ordered list of turns. Each turn carries ordered content
 * blocks; tool calls live in assistant turns and their results in the user
 * turn that immediately follows. Everything here is plain JSON so a history
 * can be persisted and reloaded without conversion.
 */

// =============================================================================
// Content Blocks
// =============================================================================

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ThinkingBlock {
  type: 'thinking';
  thinking: string;
  /** Provider signature required to send the block back unchanged */
  signature?: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  content: string;
  success: boolean;
}

export interface ImageBlock {
  type: 'image';
  mediaType: string;
  /** Base64 encoded image bytes */
  data: string;
}

export type ContentBlock =
  | TextBlock
  | ThinkingBlock
  | ToolUseBlock
  | ToolResultBlock
  | ImageBlock;

// =============================================================================
// Turns
// =============================================================================

export type TurnRole = 'user' | 'assistant' | 'guidance';

export interface Turn {
  role: TurnRole;
  content: ContentBlock[];
  /** Set on turns written by the engine (summaries, repair results, notes) */
  synthetic?: boolean;
}

// =============================================================================
// Type Guards & Builders
// =============================================================================

export function isToolUse(block: ContentBlock): block is ToolUseBlock {
  return block.type === 'tool_use';
}

export function isToolResult(block: ContentBlock): block is ToolResultBlock {
  return block.type === 'tool_result';
}

export function isText(block: ContentBlock): block is TextBlock {
  return block.type === 'text';
}

export function isThinking(block: ContentBlock): block is ThinkingBlock {
  return block.type === 'thinking';
}

export function textBlock(text: string): TextBlock {
  return { type: 'text', text };
}

export function userTurn(text: string, synthetic = false): Turn {
  return synthetic
    ? { role: 'user', content: [textBlock(text)], synthetic: true }
    : { role: 'user', content: [textBlock(text)] };
}

export function toolUsesOf(turn: Turn): ToolUseBlock[] {
  return turn.content.filter(isToolUse);
}

export function toolResultsOf(turn: Turn): ToolResultBlock[] {
  return turn.content.filter(isToolResult);
}

/**
 * Concatenate the text blocks of a turn.
 */
export function turnText(turn: Turn): string {
  return turn.content
    .filter(isText)
    .map(b => b.text)
    .join('\n');
}
