/**
 * @fileoverview Shared test fixtures
 *
 * In-process stand-ins for the engine's collaborators: a scripted reasoning
 * service, an in-memory event log and a session factory over MemoryBackend.
 */

export * from './reasoning.js';
export * from './sessions.js';
