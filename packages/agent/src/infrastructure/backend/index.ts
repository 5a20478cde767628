/**
 * @fileoverview Execution backend exports
 */

export { LocalBackend, type LocalBackendOptions } from './local-backend.js';
export { MemoryBackend, type MemoryBackendOptions, type CommandHandler } from './memory-backend.js';
export type { ExecutionBackend, CommandOptions, CommandResult, DirEntry, OutputStream } from './types.js';
