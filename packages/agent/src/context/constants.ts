/**
 * @fileoverview Context Subsystem Constants
 */

// =============================================================================
// Token Estimation
// =============================================================================

export const CHARS_PER_TOKEN = 4;
export const MIN_IMAGE_TOKENS = 85;
/** Role and structure overhead per turn, in characters */
export const TURN_OVERHEAD_CHARS = 10;

// =============================================================================
// Summaries
// =============================================================================

export const SUMMARIZER_MAX_SERIALIZED_CHARS = 150_000;
export const SUMMARIZER_ASSISTANT_TEXT_LIMIT = 300;
export const SUMMARIZER_THINKING_TEXT_LIMIT = 500;
export const SUMMARIZER_TOOL_RESULT_TEXT_LIMIT = 100;
export const SUMMARY_MAX_LIST_ITEMS = 20;
export const SUMMARY_TOPIC_MAX_CHARS = 200;
