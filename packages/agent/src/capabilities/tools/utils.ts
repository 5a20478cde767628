/**
 * @fileoverview Tool Utilities
 *
 * Shared helpers for tools:
 * - Output truncation
 * - Occurrence counting
 * - Backend error formatting
 */

import type { ToolOutcome } from './types.js';

// ============================================================================
// Output Truncation
// ============================================================================

export interface TruncateResult {
  content: string;
  truncated: boolean;
  originalChars: number;
}

function truncationMessage(omitted: number, total: number): string {
  return `\n\n... [Output truncated: ${omitted} of ${total} characters omitted] ...\n\n`;
}

/**
 * Cap output at `maxChars`, keeping the start and the end, where errors and
 * summaries usually are.
 */
export function truncateOutput(output: string, maxChars: number): TruncateResult {
  const originalChars = output.length;
  if (originalChars <= maxChars) {
    return { content: output, truncated: false, originalChars };
  }

  // The longest the message can get, so the result never exceeds maxChars
  const reserve = truncationMessage(originalChars, originalChars).length;
  const budget = Math.max(0, maxChars - reserve);
  const headChars = Math.ceil(budget / 2);
  const tailChars = budget - headChars;
  const message = truncationMessage(originalChars - budget, originalChars);

  return {
    content: output.slice(0, headChars) + message + (tailChars > 0 ? output.slice(-tailChars) : ''),
    truncated: true,
    originalChars,
  };
}

export function countOccurrences(haystack: string, needle: string): number {
  if (needle === '') return 0;
  let count = 0;
  let pos = 0;
  while ((pos = haystack.indexOf(needle, pos)) !== -1) {
    count++;
    pos += needle.length;
  }
  return count;
}

export function preview(value: string, maxLen: number): string {
  return value.length <= maxLen ? value : `${value.substring(0, maxLen)}...`;
}

// ============================================================================
// Error Formatting
// ============================================================================

/**
 * Turn a backend failure into an error outcome the model can act on.
 */
export function formatBackendError(error: unknown, operation: string): ToolOutcome {
  const message = error instanceof Error ? error.message : String(error);
  return { content: `Error ${operation}: ${message}`, isError: true };
}

export function isBinary(content: Buffer): boolean {
  return content.subarray(0, 8000).includes(0);
}
