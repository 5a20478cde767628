/**
 * @fileoverview Orchestrator Module Exports
 *
 * - **SessionCoordinator**: registry of loaded sessions, task and control routing
 * - **controllers/**: keep/revert/rewind and todo edits
 * - **session/**: in-memory store of active sessions
 */

export { SessionCoordinator, nameFromTask, type SessionCoordinatorConfig } from './session-coordinator.js';
export { ChangeController, describePaths, TodoController } from './controllers/index.js';
export { MapActiveSessionStore, type ActiveSessionStore } from './session/index.js';
export type { ActiveSession, Attachment, ControlMessage, ControlType, TaskRequest } from './types.js';
