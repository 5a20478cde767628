/**
 * @fileoverview Reasoning service exports
 */

export type {
  ReasoningChunk,
  ReasoningRequest,
  ReasoningService,
  ServiceErrorClass,
  ToolDefinition,
} from './types.js';
export { classifyServiceError, failureSignature, isContextOverflow } from './error-classifier.js';
export * from './providers/anthropic/index.js';
