/**
 * @fileoverview Error codes and engine error types
 *
 * Re-exports the classification utilities from utils/errors.ts and defines
 * one error class per failure the engine distinguishes.
 */

import { TillerError, type ErrorCategory } from '../utils/errors.js';

export * from '../utils/errors.js';

export const ErrorCodes = {
  // Reasoning service
  TRANSIENT_SERVICE_ERROR: 'TRANSIENT_SERVICE_ERROR',
  STRUCTURAL_HISTORY_ERROR: 'STRUCTURAL_HISTORY_ERROR',
  STREAM_FAILED: 'STREAM_FAILED',
  SERVICE_ERROR: 'SERVICE_ERROR',

  // Backend
  BACKEND_IO_ERROR: 'BACKEND_IO_ERROR',
  PATH_ESCAPE: 'PATH_ESCAPE',

  // Change control
  NO_SUCH_CHECKPOINT: 'NO_SUCH_CHECKPOINT',

  // Session
  SESSION_BUSY: 'SESSION_BUSY',
  SESSION_NOT_FOUND: 'SESSION_NOT_FOUND',
  INVALID_STATE: 'INVALID_STATE',

  // Agent
  MAX_ITERATIONS: 'MAX_ITERATIONS',
  TOOL_NOT_FOUND: 'TOOL_NOT_FOUND',
  TOOL_EXECUTION_FAILED: 'TOOL_EXECUTION_FAILED',

  // Infrastructure
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  PERSISTENCE_ERROR: 'PERSISTENCE_ERROR',
  INVALID_MESSAGE: 'INVALID_MESSAGE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// Reasoning Service
// =============================================================================

/**
 * A communication failure expected to clear on retry.
 */
export class TransientServiceError extends TillerError {
  constructor(message: string, options: { category?: ErrorCategory; cause?: unknown } = {}) {
    super(message, {
      code: ErrorCodes.TRANSIENT_SERVICE_ERROR,
      category: options.category ?? 'network',
      severity: 'transient',
      cause: options.cause,
    });
    this.name = 'TransientServiceError';
  }
}

/**
 * The service rejected the history because tool calls and results do not pair up.
 */
export class StructuralHistoryError extends TillerError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, {
      code: ErrorCodes.STRUCTURAL_HISTORY_ERROR,
      category: 'history_structure',
      severity: 'transient',
      cause: options.cause,
    });
    this.name = 'StructuralHistoryError';
  }
}

/**
 * The same failure kept recurring; the run was stopped instead of retried.
 */
export class StreamFailedError extends TillerError {
  readonly attempts: number;

  constructor(message: string, options: { attempts: number; signature?: string; cause?: unknown }) {
    super(message, {
      code: ErrorCodes.STREAM_FAILED,
      category: 'unknown',
      severity: 'error',
      context: { attempts: options.attempts, signature: options.signature },
      cause: options.cause,
    });
    this.name = 'StreamFailedError';
    this.attempts = options.attempts;
  }

  override get isRetryable(): boolean {
    return false;
  }
}

// =============================================================================
// Backend
// =============================================================================

export class BackendIOError extends TillerError {
  readonly path: string;
  readonly operation: 'read' | 'write' | 'remove' | 'list' | 'stat' | 'exec';

  constructor(
    message: string,
    options: {
      path: string;
      operation: BackendIOError['operation'];
      code?: string;
      cause?: unknown;
    }
  ) {
    super(message, {
      code: options.code ?? ErrorCodes.BACKEND_IO_ERROR,
      category: 'unknown',
      context: { path: options.path, operation: options.operation },
      cause: options.cause,
    });
    this.name = 'BackendIOError';
    this.path = options.path;
    this.operation = options.operation;
  }
}

export class PathEscapeError extends BackendIOError {
  constructor(path: string, root: string) {
    super(`Path escapes the workspace root: ${path}`, {
      path,
      operation: 'stat',
      code: ErrorCodes.PATH_ESCAPE,
    });
    this.name = 'PathEscapeError';
    this.context.root = root;
  }
}

// =============================================================================
// Change Control & Sessions
// =============================================================================

export class NoSuchCheckpointError extends TillerError {
  readonly checkpointId: string;

  constructor(checkpointId: string) {
    super(`No such checkpoint: ${checkpointId}`, {
      code: ErrorCodes.NO_SUCH_CHECKPOINT,
      category: 'invalid_request',
      context: { checkpointId },
    });
    this.name = 'NoSuchCheckpointError';
    this.checkpointId = checkpointId;
  }
}

export class SessionBusyError extends TillerError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super('A task is already running in this session. Cancel it first.', {
      code: ErrorCodes.SESSION_BUSY,
      category: 'invalid_request',
      context: { sessionId },
    });
    this.name = 'SessionBusyError';
    this.sessionId = sessionId;
  }
}

export class SessionNotFoundError extends TillerError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, {
      code: ErrorCodes.SESSION_NOT_FOUND,
      category: 'invalid_request',
      context: { sessionId },
    });
    this.name = 'SessionNotFoundError';
  }
}

export class ConfigurationError extends TillerError {
  constructor(message: string, options: { context?: Record<string, unknown>; cause?: unknown } = {}) {
    super(message, {
      code: ErrorCodes.CONFIGURATION_ERROR,
      category: 'invalid_request',
      severity: 'fatal',
      context: options.context,
      cause: options.cause,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Database/storage persistence errors
 */
export class PersistenceError extends TillerError {
  readonly table: string;
  readonly operation: 'read' | 'write' | 'delete' | 'migrate';

  constructor(
    message: string,
    options: {
      table: string;
      operation: PersistenceError['operation'];
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, {
      code: ErrorCodes.PERSISTENCE_ERROR,
      category: 'unknown',
      context: { table: options.table, operation: options.operation, ...options.context },
      cause: options.cause,
    });
    this.name = 'PersistenceError';
    this.table = options.table;
    this.operation = options.operation;
  }
}
