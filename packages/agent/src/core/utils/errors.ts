/**
 * @fileoverview Error Utilities
 *
 * Classifies unknown errors (mostly from the reasoning service and the
 * execution backend) into categories with a retry verdict, and defines the
 * base error class every engine error extends.
 */

// =============================================================================
// Error Types
// =============================================================================

export type ErrorCategory =
  | 'authentication'
  | 'authorization'
  | 'rate_limit'
  | 'network'
  | 'server'
  | 'invalid_request'
  | 'context_length'
  | 'history_structure'
  | 'quota'
  | 'unknown';

export interface ParsedError {
  category: ErrorCategory;
  message: string;
  details?: string;
  isRetryable: boolean;
  suggestion?: string;
}

// =============================================================================
// Error Patterns
// =============================================================================

interface ErrorPattern {
  pattern: RegExp;
  category: ErrorCategory;
  message: string;
  suggestion?: string;
  isRetryable: boolean;
}

// Order matters: the first matching pattern wins.
const ERROR_PATTERNS: ErrorPattern[] = [
  // Broken tool_use/tool_result pairing reported by the service
  {
    pattern: /tool_use.*without.*tool_result|tool_result.*(?:block|id).*(?:not found|unexpected|corresponding)/i,
    category: 'history_structure',
    message: 'Conversation history has unmatched tool calls',
    isRetryable: true,
  },

  // Authentication
  {
    pattern: /invalid.*x-api-key|authentication_error/i,
    category: 'authentication',
    message: 'Authentication failed',
    suggestion: 'Check ANTHROPIC_API_KEY',
    isRetryable: false,
  },
  {
    pattern: /\b401\b/,
    category: 'authentication',
    message: 'Authentication required',
    suggestion: 'Set the ANTHROPIC_API_KEY environment variable',
    isRetryable: false,
  },

  // Authorization
  {
    pattern: /\b403\b|permission_denied/i,
    category: 'authorization',
    message: 'Access denied',
    isRetryable: false,
  },

  // Rate limiting
  {
    pattern: /\b429\b|rate.?limit|too.?many.?requests|throttl/i,
    category: 'rate_limit',
    message: 'Rate limit exceeded',
    suggestion: 'Wait a moment and try again',
    isRetryable: true,
  },

  // Quota
  {
    pattern: /quota|insufficient.?credits/i,
    category: 'quota',
    message: 'Usage quota exceeded',
    isRetryable: false,
  },

  // Context window
  {
    pattern: /context.?length|prompt is too long|input length|max_tokens|token limit/i,
    category: 'context_length',
    message: 'Request exceeds the context window',
    suggestion: 'The conversation is truncated to its most recent turns before retrying',
    isRetryable: true,
  },

  // Network
  {
    pattern: /ECONNREFUSED|ECONNRESET|ETIMEDOUT|ENOTFOUND|EPIPE|socket hang up|timed? ?out|connection|network|reset by peer|broken pipe/i,
    category: 'network',
    message: 'Connection to the reasoning service failed',
    suggestion: 'Check your internet connection',
    isRetryable: true,
  },

  // Server
  {
    pattern: /\b50[0234]\b|overloaded|service.?unavailable|internal server error/i,
    category: 'server',
    message: 'Reasoning service temporarily unavailable',
    suggestion: 'Try again in a moment',
    isRetryable: true,
  },

  // Invalid request
  {
    pattern: /\b400\b|invalid.*request/i,
    category: 'invalid_request',
    message: 'Invalid request',
    isRetryable: false,
  },
];

// =============================================================================
// Error Parsing
// =============================================================================

/**
 * Parse an error into a category and a user-facing message.
 */
export function parseError(error: unknown): ParsedError {
  const errorString = extractErrorString(error);

  for (const pattern of ERROR_PATTERNS) {
    if (pattern.pattern.test(errorString)) {
      return {
        category: pattern.category,
        message: pattern.message,
        details: errorString.slice(0, 500),
        isRetryable: pattern.isRetryable,
        suggestion: pattern.suggestion,
      };
    }
  }

  return {
    category: 'unknown',
    message: 'An unexpected error occurred',
    details: errorString.slice(0, 200),
    isRetryable: false,
  };
}

/**
 * Format an error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof TillerError) {
    return error.message;
  }
  const parsed = parseError(error);
  const parts = [parsed.message];
  if (parsed.details && parsed.category === 'unknown') {
    parts[0] = parsed.details;
  }
  if (parsed.suggestion) {
    parts.push(parsed.suggestion);
  }
  return parts.join('. ');
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof TillerError) {
    return error.isRetryable;
  }
  return parseError(error).isRetryable;
}

/**
 * Extract a string representation from any error type
 */
export function extractErrorString(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error';
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error instanceof Error) {
    const parts: string[] = [];
    const status = readProperty(error, 'status');
    if (typeof status === 'number') {
      parts.push(String(status));
    }
    const code = readProperty(error, 'code');
    if (typeof code === 'string') {
      parts.push(code);
    }
    parts.push(error.message);
    const inner = readProperty(error, 'error');
    if (typeof inner === 'object' && inner !== null) {
      const type = readProperty(inner, 'type');
      const message = readProperty(inner, 'message');
      if (typeof type === 'string') parts.push(type);
      if (typeof message === 'string') parts.push(message);
    }
    return parts.join(' ');
  }

  if (typeof error === 'object') {
    try {
      return JSON.stringify(error);
    } catch {
      return String(error);
    }
  }

  return String(error);
}

function readProperty(target: object, key: string): unknown {
  return key in target ? Reflect.get(target, key) : undefined;
}

// =============================================================================
// Error Class Hierarchy
// =============================================================================

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'transient';

/**
 * Base error class with structured context for logging.
 */
export class TillerError extends Error {
  /** Machine-readable error code (e.g., 'NO_SUCH_CHECKPOINT') */
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly timestamp: Date;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code: string;
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = 'TillerError';
    this.code = options.code;
    this.category = options.category ?? 'unknown';
    this.severity = options.severity ?? 'error';
    this.timestamp = new Date();
    this.context = options.context ?? {};
  }

  get isRetryable(): boolean {
    return this.severity === 'transient'
      || ['rate_limit', 'network', 'server', 'context_length', 'history_structure'].includes(this.category);
  }

  toStructuredLog(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        category: this.category,
        severity: this.severity,
        stack: this.stack,
        cause: this.cause instanceof Error ? {
          name: this.cause.name,
          message: this.cause.message,
        } : undefined,
      },
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }

  /**
   * Wrap an unknown error value, keeping an existing TillerError as is.
   */
  static from(error: unknown, additionalContext?: Record<string, unknown>): TillerError {
    if (error instanceof TillerError) {
      if (additionalContext) {
        return new TillerError(error.message, {
          code: error.code,
          category: error.category,
          severity: error.severity,
          context: { ...error.context, ...additionalContext },
          cause: error.cause,
        });
      }
      return error;
    }

    const parsed = parseError(error);
    return new TillerError(parsed.category === 'unknown' ? (parsed.details ?? parsed.message) : parsed.message, {
      code: parsed.category.toUpperCase(),
      category: parsed.category,
      severity: parsed.isRetryable ? 'transient' : 'error',
      context: {
        details: parsed.details,
        suggestion: parsed.suggestion,
        ...additionalContext,
      },
      cause: error,
    });
  }
}
