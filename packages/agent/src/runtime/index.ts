/**
 * @fileoverview Runtime module exports
 *
 * - agent/: sessions, the orchestrator loop, recovery and run tracking
 * - checkpoints/: change-set tracking, keep/revert and rewind
 * - orchestrator/: the session coordinator and its controllers
 */

export * from './agent/index.js';
export * from './checkpoints/index.js';
export * from './orchestrator/index.js';
