/**
 * Custom Error Classes
 *
 * Provides structured error handling with error codes, context, and recovery hints.
 */

import type { TransportFailure } from '../transport/types.js';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIG_INVALID'
  | 'TIMEOUT'
  | 'NETWORK_ERROR'
  | 'HTTP_ERROR'
  | 'PARSE_ERROR'
  | 'CORE_REJECTED'
  | 'NOT_STARTED'
  | 'INTERNAL_ERROR'
  | 'OPERATION_CANCELLED';

export interface ErrorContext {
  code: ErrorCode;
  component: string;
  operation: string;
  details?: Record<string, unknown>;
  recoveryHint?: string;
  retryable?: boolean;
}

/**
 * Base error class for all groundcheck errors
 */
export class GroundCheckError extends Error {
  public readonly code: ErrorCode;
  public readonly component: string;
  public readonly operation: string;
  public readonly details: Record<string, unknown>;
  public readonly recoveryHint?: string;
  public readonly retryable: boolean;
  public readonly timestamp: Date;
  public readonly cause?: Error;

  constructor(message: string, context: ErrorContext, cause?: Error) {
    super(message);
    this.name = 'GroundCheckError';
    this.code = context.code;
    this.component = context.component;
    this.operation = context.operation;
    this.details = context.details ?? {};
    this.recoveryHint = context.recoveryHint;
    this.retryable = context.retryable ?? false;
    this.timestamp = new Date();
    this.cause = cause;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GroundCheckError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      component: this.component,
      operation: this.operation,
      details: this.details,
      recoveryHint: this.recoveryHint,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.component}.${this.operation}: ${this.message}`;
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends GroundCheckError {
  public readonly field?: string;
  public readonly value?: unknown;
  public readonly constraints?: string[];

  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      field?: string;
      value?: unknown;
      constraints?: string[];
      recoveryHint?: string;
    }
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      component: options.component,
      operation: options.operation,
      details: { field: options.field, constraints: options.constraints },
      recoveryHint: options.recoveryHint ?? `Check the ${options.field ?? 'input'} value`,
      retryable: false,
    });
    this.name = 'ValidationError';
    this.field = options.field;
    this.value = options.value;
    this.constraints = options.constraints;
  }
}

const FAILURE_CODES: Record<TransportFailure['kind'], ErrorCode> = {
  ConnectionFailed: 'NETWORK_ERROR',
  Timeout: 'TIMEOUT',
  HttpError: 'HTTP_ERROR',
  MalformedResponse: 'PARSE_ERROR',
  CoreRejected: 'CORE_REJECTED',
  NotStarted: 'NOT_STARTED',
  Cancelled: 'OPERATION_CANCELLED',
};

/**
 * Raised inside the transport while a request is in flight. Never escapes the
 * transport boundary: callers receive the carried failure as a value.
 */
export class TransportError extends GroundCheckError {
  public readonly failure: TransportFailure;

  constructor(
    failure: TransportFailure,
    options: { operation: string; cause?: Error }
  ) {
    super(failure.message, {
      code: FAILURE_CODES[failure.kind],
      component: 'Transport',
      operation: options.operation,
      details: { kind: failure.kind, ...(failure.kind === 'HttpError' ? { status: failure.status } : {}) },
      retryable: isRetryableFailure(failure),
    }, options.cause);
    this.name = 'TransportError';
    this.failure = failure;
  }
}

/**
 * Connection failures, timeouts and 5xx answers are transient; everything
 * else is returned to the caller on the first attempt.
 */
export function isRetryableFailure(failure: TransportFailure): boolean {
  switch (failure.kind) {
    case 'ConnectionFailed':
    case 'Timeout':
      return true;
    case 'HttpError':
      return failure.status >= 500;
    default:
      return false;
  }
}

/**
 * Check if an error is a GroundCheckError
 */
export function isGroundCheckError(error: unknown): error is GroundCheckError {
  return error instanceof GroundCheckError;
}

/**
 * Wrap unknown errors in a GroundCheckError
 */
export function wrapError(
  error: unknown,
  context: { component: string; operation: string }
): GroundCheckError {
  if (isGroundCheckError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new GroundCheckError(message, {
    code: 'INTERNAL_ERROR',
    component: context.component,
    operation: context.operation,
    retryable: false,
  }, cause);
}
