/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the analysis engine. Every failure that can
 * cross a component boundary is one of these, so the orchestrator and the
 * HTTP layer can decide what to record, what to surface and what to swallow.
 *
 * Error Categories:
 * - TRANSIENT: Network, timeout
 * - PERMANENT: Auth, unknown resources
 * - VALIDATION: Bad request or config input
 * - DEPENDENCY: Planner, model or sandbox unavailable
 * - CANCELLED: Run cancelled by a client or shutdown
 *
 * @example
 * ```typescript
 * throw PlanningError.emptyPlan('What drives churn?');
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

/**
 * Categories of errors for handling decisions.
 */
export enum ErrorCategory {
  /** Transient errors - may resolve on retry (network, timeout) */
  TRANSIENT = 'TRANSIENT',

  /** Permanent errors - will not resolve on retry (auth, missing resource) */
  PERMANENT = 'PERMANENT',

  /** Resource errors - limits exceeded */
  RESOURCE = 'RESOURCE',

  /** Validation errors - invalid input or configuration */
  VALIDATION = 'VALIDATION',

  /** Rate limited - retry after delay */
  RATE_LIMITED = 'RATE_LIMITED',

  /** Dependency errors - external collaborator failures */
  DEPENDENCY = 'DEPENDENCY',

  /** Internal errors - unexpected internal failures */
  INTERNAL = 'INTERNAL',

  /** Cancelled - operation was cancelled */
  CANCELLED = 'CANCELLED',
}

/**
 * Failure categories of a single agent execution.
 * The orchestrator never distinguishes further than this.
 */
export type AgentErrorCategory = 'generation-failure' | 'execution-failure' | 'timeout' | 'cancelled';

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine errors.
 */
export class InsightError extends Error {
  /** Error category for handling decisions */
  readonly category: ErrorCategory;

  /** Whether the error may resolve on retry */
  readonly recoverable: boolean;

  readonly timestamp: Date;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Original error that caused this one (if wrapping) */
  readonly cause?: Error;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'InsightError';
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Create a serializable representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      recoverable: this.recoverable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause?.message,
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

    return parts.join(' ');
  }
}

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * The planner could not produce a usable agent set. Aborts the run.
 */
export class PlanningError extends InsightError {
  constructor(
    message: string,
    category: ErrorCategory,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, category, category === ErrorCategory.DEPENDENCY, context, cause);
    this.name = 'PlanningError';
  }

  /**
   * Planner call threw or could not be reached.
   */
  static unreachable(plannerName: string, cause: Error): PlanningError {
    return new PlanningError(
      `Planner ${plannerName} failed: ${cause.message}`,
      ErrorCategory.DEPENDENCY,
      { planner: plannerName },
      cause,
    );
  }

  /**
   * Planner answered with something that is not an agent list.
   */
  static malformedResponse(plannerName: string, preview: string): PlanningError {
    return new PlanningError(
      `Planner ${plannerName} returned no agent list`,
      ErrorCategory.DEPENDENCY,
      { planner: plannerName, preview },
    );
  }

  /**
   * Planner answered but selected no agents.
   */
  static emptyPlan(question: string, rejected: string[] = []): PlanningError {
    return new PlanningError(
      'Planner selected no applicable agents',
      ErrorCategory.PERMANENT,
      { question, rejected },
    );
  }

  /**
   * Client supplied agent ids the catalog does not know.
   */
  static unknownAgents(ids: string[]): PlanningError {
    return new PlanningError(
      `Unknown agents: ${ids.join(', ')}`,
      ErrorCategory.VALIDATION,
      { unknown: ids },
    );
  }
}

/**
 * Normalized failure of one agent, from either the generation or the
 * execution stage.
 */
export class AgentFailure extends InsightError {
  readonly agentId: string;
  readonly failureCategory: AgentErrorCategory;

  constructor(
    agentId: string,
    failureCategory: AgentErrorCategory,
    message: string,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(
      message,
      AgentFailure.toErrorCategory(failureCategory),
      failureCategory === 'timeout',
      { ...context, agent: agentId, failure: failureCategory },
      cause,
    );
    this.name = 'AgentFailure';
    this.agentId = agentId;
    this.failureCategory = failureCategory;
  }

  static generation(agentId: string, cause: Error): AgentFailure {
    return new AgentFailure(agentId, 'generation-failure', `Code generation failed: ${cause.message}`, undefined, cause);
  }

  static execution(agentId: string, message: string, context?: Record<string, unknown>): AgentFailure {
    return new AgentFailure(agentId, 'execution-failure', message, context);
  }

  static timeout(agentId: string, timeoutMs: number, stage: 'generation' | 'execution'): AgentFailure {
    return new AgentFailure(agentId, 'timeout', `Agent timed out after ${timeoutMs}ms during ${stage}`, {
      timeoutMs,
      stage,
    });
  }

  static cancelled(agentId: string, reason?: string): AgentFailure {
    return new AgentFailure(agentId, 'cancelled', reason ?? 'Run cancelled');
  }

  private static toErrorCategory(category: AgentErrorCategory): ErrorCategory {
    switch (category) {
      case 'timeout':
        return ErrorCategory.TRANSIENT;
      case 'cancelled':
        return ErrorCategory.CANCELLED;
      case 'generation-failure':
        return ErrorCategory.DEPENDENCY;
      case 'execution-failure':
        return ErrorCategory.INTERNAL;
    }
  }
}

/**
 * Cache read or write failed. Never surfaced to clients.
 */
export class CacheStoreError extends InsightError {
  readonly operation: 'lookup' | 'insert' | 'evict' | 'purge';

  constructor(operation: CacheStoreError['operation'], cause: Error, context?: Record<string, unknown>) {
    super(`Cache ${operation} failed: ${cause.message}`, ErrorCategory.DEPENDENCY, true, { ...context, operation }, cause);
    this.name = 'CacheStoreError';
    this.operation = operation;
  }
}

/**
 * Raised when an operation observes that its run was cancelled.
 */
export class RunCancelledError extends InsightError {
  readonly reason: string;

  constructor(reason: string = 'Run cancelled') {
    super(reason, ErrorCategory.CANCELLED, false, { reason });
    this.name = 'RunCancelledError';
    this.reason = reason;
  }
}

/**
 * Error from validation failures.
 */
export class ValidationError extends InsightError {
  /** Field(s) that failed validation */
  readonly fields?: string[];

  constructor(message: string, fields?: string[], context?: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, false, { ...context, fields });
    this.name = 'ValidationError';
    this.fields = fields;
  }

  /**
   * Create error from Zod validation result.
   */
  static fromZodError(error: { issues: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const fields = error.issues.map((i) => i.path.join('.'));
    const messages = error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
    return new ValidationError(`Validation failed: ${messages.join(', ')}`, fields);
  }
}

/**
 * A run, dataset or agent lookup came back empty.
 */
export class NotFoundError extends InsightError {
  readonly resource: string;

  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, ErrorCategory.PERMANENT, false, { resource, id });
    this.name = 'NotFoundError';
    this.resource = resource;
  }
}

/**
 * Error from LLM provider calls.
 */
export class ProviderError extends InsightError {
  readonly providerName: string;

  /** HTTP status code if applicable */
  readonly statusCode?: number;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    providerName: string,
    statusCode?: number,
    cause?: Error,
  ) {
    super(message, category, recoverable, { provider: providerName, statusCode }, cause);
    this.name = 'ProviderError';
    this.providerName = providerName;
    this.statusCode = statusCode;
  }

  static rateLimited(providerName: string): ProviderError {
    return new ProviderError(`Rate limited by ${providerName}`, ErrorCategory.RATE_LIMITED, true, providerName, 429);
  }

  static authenticationFailed(providerName: string, statusCode: number): ProviderError {
    return new ProviderError(
      `Authentication failed for ${providerName}`,
      ErrorCategory.PERMANENT,
      false,
      providerName,
      statusCode,
    );
  }

  static serverError(providerName: string, statusCode: number, body?: string): ProviderError {
    const detail = body ? `: ${body.slice(0, 200)}` : '';
    return new ProviderError(
      `Server error from ${providerName}: ${statusCode}${detail}`,
      statusCode >= 500 ? ErrorCategory.TRANSIENT : ErrorCategory.PERMANENT,
      statusCode >= 500,
      providerName,
      statusCode,
    );
  }

  static network(providerName: string, cause: Error): ProviderError {
    return new ProviderError(
      `${providerName} request failed: ${cause.message}`,
      ErrorCategory.TRANSIENT,
      true,
      providerName,
      undefined,
      cause,
    );
  }
}

/**
 * Request rejected because the circuit protecting a collaborator is open.
 */
export class CircuitOpenError extends InsightError {
  readonly resetAt?: number;

  constructor(name: string, resetAt?: number) {
    super(`Circuit breaker for ${name} is OPEN`, ErrorCategory.DEPENDENCY, true, { breaker: name, resetAt });
    this.name = 'CircuitOpenError';
    this.resetAt = resetAt;
  }
}

/**
 * Client exceeded the submission rate.
 */
export class RateLimitError extends InsightError {
  readonly retryAfterMs: number;

  constructor(key: string, retryAfterMs: number) {
    super(`Rate limit exceeded for ${key}`, ErrorCategory.RATE_LIMITED, true, { key, retryAfterMs });
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Coerce an unknown thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function isInsightError(error: unknown): error is InsightError {
  return error instanceof InsightError;
}

/**
 * True for run cancellation and for aborted fetch/spawn calls.
 */
export function isCancellationRelated(error: Error): boolean {
  return error instanceof RunCancelledError || error.name === 'AbortError';
}

/**
 * Format error for display to a client.
 */
export function formatError(error: unknown): string {
  if (error instanceof InsightError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format error for logging with full details.
 */
export function formatErrorForLog(error: unknown): string {
  if (error instanceof InsightError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
