/**
 * @fileoverview Main entry point for @tiller/agent
 *
 * Sessions that run a reasoning service in a tool loop over a workspace,
 * with change control (keep, revert, rewind), budgeted history and a
 * replayable event log per session.
 */

// Types and errors
export * from './core/types/index.js';
export * from './core/errors/index.js';
export { repairHistory, INTERRUPTED_RESULT_CONTENT, type RepairResult } from './core/utils/history-repair.js';

// Infrastructure
export * from './infrastructure/settings/index.js';
export * from './infrastructure/logging/index.js';
export * from './infrastructure/persistence/index.js';
export * from './infrastructure/backend/index.js';

// Reasoning service
export * from './llm/index.js';

// History
export * from './context/index.js';

// Tools
export * from './capabilities/tools/index.js';

// Sessions, orchestration and change control
export * from './runtime/index.js';

// Event delivery and the WebSocket gateway
export * from './interface/index.js';

export { TillerServer, type TillerServerConfig } from './server.js';
