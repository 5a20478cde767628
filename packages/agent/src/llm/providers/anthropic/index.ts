/**
 * @fileoverview Anthropic adapter exports
 */

export { AnthropicReasoningService, toServiceError, type AnthropicServiceConfig } from './anthropic-provider.js';
export { convertTurns, convertTools, GUIDANCE_PREFIX } from './message-converter.js';
export { processStreamEvent, processAnthropicStream, createStreamState, type StreamState } from './stream-handler.js';
