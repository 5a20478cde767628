/**
 * @fileoverview Anthropic Stream Handler
 *
 * Processes Anthropic SDK stream events and yields reasoning chunks.
 * Tool input arrives as partial JSON and is emitted once its block closes.
 */

import type Anthropic from '@anthropic-ai/sdk';
import { createLogger } from '../../../infrastructure/logging/index.js';
import type { ReasoningChunk } from '../../types.js';

const logger = createLogger('anthropic-stream');

// =============================================================================
// Types
// =============================================================================

export interface StreamState {
  currentBlockType: 'text' | 'thinking' | 'tool_use' | null;
  currentToolUseId: string | null;
  currentToolName: string | null;
  accumulatedSignature: string;
  accumulatedArgs: string;
  inputTokens: number;
  outputTokens: number;
  cacheWriteTokens: number;
  cacheReadTokens: number;
}

export function createStreamState(): StreamState {
  return {
    currentBlockType: null,
    currentToolUseId: null,
    currentToolName: null,
    accumulatedSignature: '',
    accumulatedArgs: '',
    inputTokens: 0,
    outputTokens: 0,
    cacheWriteTokens: 0,
    cacheReadTokens: 0,
  };
}

export type StreamEvent = Anthropic.Messages.RawMessageStreamEvent;

// =============================================================================
// Stream Processing
// =============================================================================

function parseToolInput(raw: string, toolName: string | null): Record<string, unknown> {
  if (raw.trim() === '') return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    logger.warn('Tool input is not valid JSON', { toolName, length: raw.length, error: String(error) });
    return {};
  }
  logger.warn('Tool input is not an object', { toolName });
  return {};
}

/**
 * Process one SDK event, yielding zero or more chunks.
 */
export function* processStreamEvent(event: StreamEvent, state: StreamState): Generator<ReasoningChunk> {
  switch (event.type) {
    case 'message_start': {
      const usage = event.message.usage;
      state.inputTokens = usage.input_tokens;
      state.cacheWriteTokens = usage.cache_creation_input_tokens ?? 0;
      state.cacheReadTokens = usage.cache_read_input_tokens ?? 0;
      break;
    }

    case 'message_delta':
      state.outputTokens = event.usage.output_tokens;
      break;

    case 'content_block_start':
      if (event.content_block.type === 'text') {
        state.currentBlockType = 'text';
        if (event.content_block.text) {
          yield { type: 'text', delta: event.content_block.text };
        }
      } else if (event.content_block.type === 'thinking') {
        state.currentBlockType = 'thinking';
      } else if (event.content_block.type === 'tool_use') {
        state.currentBlockType = 'tool_use';
        state.currentToolUseId = event.content_block.id;
        state.currentToolName = event.content_block.name;
        state.accumulatedArgs = '';
      }
      break;

    case 'content_block_delta':
      if (event.delta.type === 'text_delta') {
        yield { type: 'text', delta: event.delta.text };
      } else if (event.delta.type === 'thinking_delta') {
        yield { type: 'thinking', delta: event.delta.thinking };
      } else if (event.delta.type === 'signature_delta') {
        state.accumulatedSignature += event.delta.signature;
      } else if (event.delta.type === 'input_json_delta') {
        state.accumulatedArgs += event.delta.partial_json;
      }
      break;

    case 'content_block_stop':
      if (state.currentBlockType === 'thinking' && state.accumulatedSignature) {
        yield { type: 'thinking_signature', signature: state.accumulatedSignature };
      } else if (state.currentBlockType === 'tool_use' && state.currentToolUseId && state.currentToolName) {
        yield {
          type: 'tool_use',
          id: state.currentToolUseId,
          name: state.currentToolName,
          input: parseToolInput(state.accumulatedArgs, state.currentToolName),
        };
      }
      state.currentBlockType = null;
      state.currentToolUseId = null;
      state.currentToolName = null;
      state.accumulatedArgs = '';
      state.accumulatedSignature = '';
      break;

    case 'message_stop':
      yield {
        type: 'usage',
        usage: {
          inputTokens: state.inputTokens,
          outputTokens: state.outputTokens,
          cacheReadTokens: state.cacheReadTokens,
          cacheWriteTokens: state.cacheWriteTokens,
        },
      };
      break;
  }
}

/**
 * Process an SDK event stream and yield reasoning chunks.
 */
export async function* processAnthropicStream(
  stream: AsyncIterable<StreamEvent>,
  state: StreamState = createStreamState()
): AsyncGenerator<ReasoningChunk> {
  for await (const event of stream) {
    yield* processStreamEvent(event, state);
  }
}
