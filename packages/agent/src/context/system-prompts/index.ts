/**
 * @fileoverview System Prompts Index
 */

export { CORE_PROMPT, PLAN_MODE_SUFFIX, WORKING_DIRECTORY_SUFFIX, WRAP_UP_NOTE } from './core.js';
export { COMPACTION_SUMMARIZER_PROMPT } from './compaction-summarizer.js';
