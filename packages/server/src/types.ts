/**
 * Shared type definitions for @conductor/server
 */

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    requestId: string;
    details?: unknown;
  };
}

/**
 * Health check response format
 */
export interface HealthResponse {
  status: "ok" | "degraded" | "down";
  uptime: number;
  timestamp: string;
  version: string;
}

export type ErrorStatus = 400 | 404 | 409 | 500 | 503;

/**
 * Base class for errors that map onto an HTTP status
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly status: ErrorStatus;
}

/**
 * Validation error (400)
 */
export class ValidationError extends AppError {
  readonly code = "VALIDATION_ERROR" as const;
  readonly status = 400;
  details: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

/**
 * Not found error (404)
 */
export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND" as const;
  readonly status = 404;

  constructor(resource: string, hint?: string) {
    super(hint ? `${resource} not found. ${hint}` : `${resource} not found`);
    this.name = "NotFoundError";
  }
}

/**
 * Duplicate key error (409)
 *
 * Raised when a create targets an id that already exists.
 */
export class DuplicateKeyError extends AppError {
  readonly code = "DUPLICATE_KEY" as const;
  readonly status = 409;

  constructor(resource: string) {
    super(`${resource} already exists`);
    this.name = "DuplicateKeyError";
  }
}

/**
 * Store unavailable error (503)
 *
 * Wraps a driver or connection failure. The original error is kept as `cause`.
 */
export class StoreUnavailableError extends AppError {
  readonly code = "STORE_UNAVAILABLE" as const;
  readonly status = 503;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`State store unavailable during ${operation}: ${reason}`, { cause });
    this.name = "StoreUnavailableError";
  }
}

/**
 * Task execution failure (500)
 *
 * Describes an executor failure. The scheduler records it on the task and
 * never lets it escape.
 */
export class TaskExecutionFailure extends AppError {
  readonly code = "TASK_EXECUTION_FAILED" as const;
  readonly status = 500;
  readonly taskId: string;

  constructor(taskId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TaskExecutionFailure";
    this.taskId = taskId;
  }
}
