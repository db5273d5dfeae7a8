/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the timeline pipeline. Nothing in the
 * pipeline throws these at its callers: they are built so a failure can be
 * logged with enough context and then dropped.
 *
 * Error Categories:
 * - PARSE: Malformed JSON, integers, event lines
 * - SINK: A display sink threw or is not mounted
 * - CONFIG: Unreadable or invalid configuration
 * - INTERNAL: Unexpected internal failures
 *
 * @example
 * ```typescript
 * const err = new ParseError('Task plan result is not JSON', { toolId: 't1' }, cause);
 * log.warn(err.toLogString());
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  /** Malformed input that could not be parsed */
  PARSE = 'PARSE',

  /** Display sink failures */
  SINK = 'SINK',

  /** Configuration errors */
  CONFIG = 'CONFIG',

  /** Unexpected internal failures */
  INTERNAL = 'INTERNAL',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all timeline errors.
 */
export class TimelineError extends Error {
  readonly category: ErrorCategory;

  /** Whether processing can continue with the next chunk */
  readonly recoverable: boolean;

  readonly timestamp: Date;

  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'TimelineError';
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.causeMessage(),
    };
  }

  /**
   * Format error for logging.
   */
  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }
    const cause = this.causeMessage();
    if (cause) {
      parts.push(`cause=${cause}`);
    }

    return parts.join(' ');
  }

  private causeMessage(): string | undefined {
    return this.cause instanceof Error ? this.cause.message : undefined;
  }
}

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Malformed payloads: tool-result JSON, restart attempt numbers, event lines.
 */
export class ParseError extends TimelineError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCategory.PARSE, true, context, cause);
    this.name = 'ParseError';
  }
}

/**
 * A timeline or ribbon sink threw while applying an update.
 */
export class SinkError extends TimelineError {
  readonly operation: string;

  constructor(operation: string, cause?: Error, context?: Record<string, unknown>) {
    super(`Sink operation failed: ${operation}`, ErrorCategory.SINK, true, { operation, ...context }, cause);
    this.name = 'SinkError';
    this.operation = operation;
  }
}

export class ConfigError extends TimelineError {
  readonly path?: string;

  constructor(message: string, path?: string, cause?: Error) {
    super(message, ErrorCategory.CONFIG, true, path ? { path } : {}, cause);
    this.name = 'ConfigError';
    this.path = path;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function isTimelineError(error: unknown): error is TimelineError {
  return error instanceof TimelineError;
}

/**
 * Normalize anything caught into an Error instance.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}
