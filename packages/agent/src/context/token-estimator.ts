/**
 * @fileoverview Token Estimator
 *
 * Pure utility functions for token estimation.
 * Uses chars/4 approximation (consistent with Anthropic's tokenizer).
 *
 * For images: tokens = (width × height) / 750, with the pixel count
 * estimated from the base64 size. Minimum 85 tokens per image.
 */

import type { ContentBlock, Turn } from '../core/types/index.js';
import { CHARS_PER_TOKEN, MIN_IMAGE_TOKENS, TURN_OVERHEAD_CHARS } from './constants.js';

export { CHARS_PER_TOKEN };

export function estimateImageTokens(base64Data: string): number {
  const estimatedBytes = base64Data.length * 0.75;
  const estimatedPixels = estimatedBytes * 5; // compression ratio estimate
  return Math.max(MIN_IMAGE_TOKENS, Math.ceil(estimatedPixels / 750));
}

export function estimateBlockTokens(block: ContentBlock): number {
  switch (block.type) {
    case 'text':
      return Math.ceil(block.text.length / CHARS_PER_TOKEN);
    case 'thinking':
      return Math.ceil(block.thinking.length / CHARS_PER_TOKEN);
    case 'tool_use':
      return Math.ceil((block.id.length + block.name.length + JSON.stringify(block.input).length) / CHARS_PER_TOKEN);
    case 'tool_result':
      return Math.ceil((block.toolUseId.length + block.content.length) / CHARS_PER_TOKEN);
    case 'image':
      return estimateImageTokens(block.data);
  }
}

/**
 * Estimate tokens for one turn, including role overhead.
 */
export function estimateTurnTokens(turn: Turn): number {
  let tokens = Math.ceil((turn.role.length + TURN_OVERHEAD_CHARS) / CHARS_PER_TOKEN);
  for (const block of turn.content) {
    tokens += estimateBlockTokens(block);
  }
  return tokens;
}

export function estimateTurnsTokens(turns: readonly Turn[]): number {
  let total = 0;
  for (const turn of turns) {
    total += estimateTurnTokens(turn);
  }
  return total;
}

export function estimateTextTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
