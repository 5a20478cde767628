/**
 * @fileoverview Reasoning service error classification
 */

import {
  StreamFailedError,
  StructuralHistoryError,
  TillerError,
  TransientServiceError,
  parseError,
} from '../core/errors/index.js';
import type { ServiceErrorClass } from './types.js';

export function classifyServiceError(error: unknown): ServiceErrorClass {
  if (error instanceof StructuralHistoryError) return 'structural';
  if (error instanceof TransientServiceError) return 'transient';
  if (error instanceof StreamFailedError) return 'fatal';
  if (error instanceof TillerError && error.category !== 'unknown') {
    return classifyCategory(error.category, error.isRetryable);
  }

  const parsed = parseError(error);
  return classifyCategory(parsed.category, parsed.isRetryable);
}

function classifyCategory(category: TillerError['category'], retryable: boolean): ServiceErrorClass {
  if (category === 'history_structure') return 'structural';
  return retryable ? 'transient' : 'fatal';
}

/**
 * Whether the service rejected the request for exceeding the context window.
 */
export function isContextOverflow(error: unknown): boolean {
  if (error instanceof TillerError && error.category !== 'unknown') {
    return error.category === 'context_length';
  }
  return parseError(error).category === 'context_length';
}

/**
 * Key used to recognise the same failure recurring: the first 200
 * characters of the lower-cased message.
 */
export function failureSignature(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.toLowerCase().slice(0, 200);
}
