/**
 * @fileoverview Context module exports
 */

export {
  HistoryManager,
  type CompactionResult,
  type HistoryManagerOptions,
} from './history-manager.js';

export {
  HeuristicSummarizer,
  renderSummary,
  renderTruncationMarker,
  parseRenderedSummary,
  SUMMARY_HEADER,
  TRUNCATION_HEADER,
  type Summarizer,
  type SummaryInput,
  type SummarySections,
} from './summarizer.js';

export { ReasoningSummarizer, serializeTurns, parseResponse } from './llm-summarizer.js';

export {
  estimateImageTokens,
  estimateBlockTokens,
  estimateTurnTokens,
  estimateTurnsTokens,
  estimateTextTokens,
  CHARS_PER_TOKEN,
} from './token-estimator.js';

export {
  CORE_PROMPT,
  PLAN_MODE_SUFFIX,
  WORKING_DIRECTORY_SUFFIX,
  WRAP_UP_NOTE,
  COMPACTION_SUMMARIZER_PROMPT,
} from './system-prompts/index.js';
