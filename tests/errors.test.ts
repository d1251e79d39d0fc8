/**
 * Error type tests
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  AgentFailure,
  ErrorCategory,
  InsightError,
  PlanningError,
  RunCancelledError,
  ValidationError,
  formatError,
  formatErrorForLog,
  isCancellationRelated,
} from '../src/errors/index.js';

describe('InsightError', () => {
  it('should serialize its category, context and cause', () => {
    const error = new InsightError('store offline', ErrorCategory.DEPENDENCY, true, { table: 'runs' }, new Error('EIO'));

    expect(error.toJSON()).toMatchObject({
      name: 'InsightError',
      message: 'store offline',
      category: 'DEPENDENCY',
      recoverable: true,
      context: { table: 'runs' },
      cause: 'EIO',
    });
    expect(error.toLogString()).toBe('[InsightError] (DEPENDENCY) store offline context={"table":"runs"}');
  });
});

describe('AgentFailure', () => {
  it.each([
    { failure: AgentFailure.generation('a', new Error('overloaded')), category: ErrorCategory.DEPENDENCY },
    { failure: AgentFailure.execution('a', 'Script failed: exit 1'), category: ErrorCategory.INTERNAL },
    { failure: AgentFailure.timeout('a', 100, 'execution'), category: ErrorCategory.TRANSIENT },
    { failure: AgentFailure.cancelled('a'), category: ErrorCategory.CANCELLED },
  ])('should map $failure.failureCategory to $category', ({ failure, category }) => {
    expect(failure.category).toBe(category);
    expect(failure.agentId).toBe('a');
  });

  it('should only mark timeouts as recoverable', () => {
    expect(AgentFailure.timeout('a', 100, 'generation').recoverable).toBe(true);
    expect(AgentFailure.execution('a', 'x').recoverable).toBe(false);
  });
});

describe('PlanningError', () => {
  it('should carry a category that decides the client status', () => {
    expect(PlanningError.unknownAgents(['x']).category).toBe(ErrorCategory.VALIDATION);
    expect(PlanningError.emptyPlan('q').category).toBe(ErrorCategory.PERMANENT);
    expect(PlanningError.unreachable('llm', new Error('down')).category).toBe(ErrorCategory.DEPENDENCY);
  });
});

describe('ValidationError.fromZodError', () => {
  it('should list every failing path', () => {
    const result = z.object({ question: z.string().min(1), limit: z.number() }).safeParse({ question: '' });
    expect(result.success).toBe(false);
    if (result.success) return;

    const error = ValidationError.fromZodError(result.error);
    expect(error.fields).toEqual(['question', 'limit']);
    expect(error.message).toBe(
      'Validation failed: question: String must contain at least 1 character(s), limit: Required',
    );
  });
});

describe('formatting helpers', () => {
  it('should prefix engine errors with their name', () => {
    expect(formatError(new RunCancelledError('stop'))).toBe('RunCancelledError: stop');
    expect(formatError(new Error('plain'))).toBe('plain');
    expect(formatError('text')).toBe('text');
  });

  it('should format errors for logs', () => {
    expect(formatErrorForLog(new Error('plain'))).toBe('[Error] plain');
    expect(formatErrorForLog(42)).toBe('[Unknown] 42');
  });

  it('should recognise cancellation and aborts', () => {
    expect(isCancellationRelated(new RunCancelledError())).toBe(true);
    expect(isCancellationRelated(Object.assign(new Error('aborted'), { name: 'AbortError' }))).toBe(true);
    expect(isCancellationRelated(new Error('nope'))).toBe(false);
  });
});
