/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the loop. The category drives recovery:
 * the model caller advances the fallback chain on any failure and backs
 * off first on RATE_LIMITED. Tools throw ToolError; the dispatch engine
 * folds it into a warning result instead of failing the round.
 *
 * Error Categories:
 * - TRANSIENT: network, timeout, 5xx
 * - PERMANENT: auth, bad request
 * - VALIDATION: model identifier or arguments not permitted
 * - RATE_LIMITED: HTTP 429 / 413, back off before the next attempt
 *
 * @example
 * ```typescript
 * throw ProviderError.fromStatus('openrouter', 429, 'Too Many Requests');
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  /** May resolve on retry (network, timeout, server error) */
  TRANSIENT = 'TRANSIENT',

  /** Will not resolve on retry (auth, invalid request) */
  PERMANENT = 'PERMANENT',

  /** A resource ceiling was crossed */
  RESOURCE = 'RESOURCE',

  /** Invalid input or configuration */
  VALIDATION = 'VALIDATION',

  /** Rate limited, retry after a delay */
  RATE_LIMITED = 'RATE_LIMITED',

  /** Unexpected internal failure */
  INTERNAL = 'INTERNAL',

  /** Operation was cancelled */
  CANCELLED = 'CANCELLED',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all loop errors.
 */
export class AgentError extends Error {
  readonly category: ErrorCategory;

  /** Whether the error may resolve on retry */
  readonly recoverable: boolean;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Original error that caused this one (if wrapping) */
  readonly cause?: Error;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'AgentError';
    this.category = category;
    this.recoverable = recoverable;
    this.context = context ?? {};
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Failure inside a tool handler. The dispatch engine converts these into
 * warning-prefixed results; they are thrown by tool implementations.
 */
export class ToolError extends AgentError {
  readonly toolName: string;

  constructor(message: string, toolName: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCategory.PERMANENT, false, { ...context, tool: toolName }, cause);
    this.name = 'ToolError';
    this.toolName = toolName;
  }
}

/**
 * Error from a model call. Carries the HTTP-like status code when the
 * provider returned one.
 */
export class ProviderError extends AgentError {
  readonly providerName: string;

  readonly statusCode?: number;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    providerName: string,
    statusCode?: number,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, category, recoverable, { ...context, provider: providerName, statusCode }, cause);
    this.name = 'ProviderError';
    this.providerName = providerName;
    this.statusCode = statusCode;
  }

  /**
   * Classify an HTTP status. 429 and 413 are rate-limit class.
   */
  static fromStatus(providerName: string, statusCode: number, body = ''): ProviderError {
    const detail = body ? `: ${body.slice(0, 500)}` : '';

    if (statusCode === 429 || statusCode === 413) {
      return new ProviderError(
        `Rate limited by ${providerName} (${statusCode})${detail}`,
        ErrorCategory.RATE_LIMITED,
        true,
        providerName,
        statusCode
      );
    }
    if (statusCode === 401 || statusCode === 403) {
      return new ProviderError(
        `Authentication failed for ${providerName} (${statusCode})${detail}`,
        ErrorCategory.PERMANENT,
        false,
        providerName,
        statusCode
      );
    }
    if (statusCode >= 500) {
      return new ProviderError(
        `Server error from ${providerName}: ${statusCode}${detail}`,
        ErrorCategory.TRANSIENT,
        true,
        providerName,
        statusCode
      );
    }
    return new ProviderError(
      `Request rejected by ${providerName}: ${statusCode}${detail}`,
      ErrorCategory.PERMANENT,
      false,
      providerName,
      statusCode
    );
  }

  static network(providerName: string, cause: Error): ProviderError {
    return new ProviderError(
      `Network error calling ${providerName}: ${cause.message}`,
      ErrorCategory.TRANSIENT,
      true,
      providerName,
      undefined,
      undefined,
      cause
    );
  }

  static emptyResponse(providerName: string, model: string): ProviderError {
    return new ProviderError(
      `Empty response from ${providerName} for ${model}`,
      ErrorCategory.TRANSIENT,
      true,
      providerName,
      undefined,
      { model, emptyResponse: true }
    );
  }
}

/**
 * A model identifier was rejected before any request was sent.
 */
export class ModelValidationError extends AgentError {
  readonly model: string;

  readonly reason: string;

  constructor(model: string, reason: string) {
    super(`Model '${model}' rejected: ${reason}`, ErrorCategory.VALIDATION, false, { model, reason });
    this.name = 'ModelValidationError';
    this.model = model;
    this.reason = reason;
  }
}

export class ValidationError extends AgentError {
  /** Field(s) that failed validation */
  readonly fields?: string[];

  constructor(message: string, fields?: string[], context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, { ...context, fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }
}

export class CancellationError extends AgentError {
  readonly reason: string;

  constructor(reason: string = 'Operation cancelled') {
    super(reason, ErrorCategory.CANCELLED, false, { reason });
    this.name = 'CancellationError';
    this.reason = reason;
  }
}

export type TerminationReason = 'round_limit' | 'fallback_exhausted' | 'tool_error_limit';

/**
 * Fatal end of a task. The message is the explanation shown to the caller.
 */
export class TerminationError extends AgentError {
  readonly reason: TerminationReason;

  constructor(reason: TerminationReason, message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCategory.RESOURCE, false, { ...context, reason }, cause);
    this.name = 'TerminationError';
    this.reason = reason;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

const TRANSIENT_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EPIPE']);

const MESSAGE_RULES: Array<{ pattern: RegExp; category: ErrorCategory }> = [
  { pattern: /rate.?limit|too many requests|\b429\b|\b413\b/i, category: ErrorCategory.RATE_LIMITED },
  { pattern: /timed? ?out|socket hang up|network error|fetch failed/i, category: ErrorCategory.TRANSIENT },
  { pattern: /unauthori[sz]ed|forbidden|authentication|\b40[13]\b/i, category: ErrorCategory.PERMANENT },
  { pattern: /cancel+ed|aborted/i, category: ErrorCategory.CANCELLED },
];

/**
 * Category of an error that did not come from this package: agent errors
 * carry their own, system errors are read by code, the rest by message.
 */
export function categorizeError(error: Error): ErrorCategory {
  if (error instanceof AgentError) return error.category;

  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  if ((code !== undefined && TRANSIENT_CODES.has(code)) || error.name === 'TimeoutError') {
    return ErrorCategory.TRANSIENT;
  }
  if (error.name === 'AbortError') return ErrorCategory.CANCELLED;

  return MESSAGE_RULES.find((rule) => rule.pattern.test(error.message))?.category ?? ErrorCategory.INTERNAL;
}

/**
 * Rate-limit class errors get a backoff sleep before the next attempt.
 */
export function isRateLimited(error: unknown): boolean {
  if (error instanceof ProviderError && error.statusCode !== undefined) {
    return error.statusCode === 429 || error.statusCode === 413;
  }
  const err = error instanceof Error ? error : new Error(String(error));
  return categorizeError(err) === ErrorCategory.RATE_LIMITED;
}

/**
 * Format error for display to user.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
