/**
 * Error taxonomy for the workflow core
 *
 * Every error raised by a port, the store or the approval gate is one of
 * these classes by the time it reaches a transition boundary, where
 * `classifyError` turns it into the kind recorded on the lead.
 */

import type { Stage, WorkflowErrorKind } from '@leadflow/types';

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for API response (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Malformed input; never retried
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Transient failure of an external service (scoring, mail, calendar, analytics)
 */
export class ServiceError extends AppError {
  public readonly service: string;
  public readonly originalError: Error | undefined;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service} error: ${message}`, 'SERVICE_ERROR', 502);
    this.name = 'ServiceError';
    this.service = service;
    this.originalError = originalError;
  }
}

/**
 * A port call that exceeded its time budget; handled exactly like a ServiceError
 */
export class PortTimeoutError extends ServiceError {
  public readonly timeoutMs: number;

  constructor(service: string, timeoutMs: number) {
    super(service, `timed out after ${timeoutMs}ms`);
    this.name = 'PortTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Optimistic locking failure: the stored version advanced since the caller read it
 */
export class ConflictError extends AppError {
  public readonly recordType: string;
  public readonly recordId: string;
  public readonly expectedVersion: number | undefined;

  constructor(recordType: string, recordId: string, expectedVersion?: number) {
    super(
      `Concurrent modification detected for ${recordType}: ${recordId}. Please retry.`,
      'CONFLICT',
      409
    );
    this.name = 'ConflictError';
    this.recordType = recordType;
    this.recordId = recordId;
    this.expectedVersion = expectedVersion;
  }
}

/**
 * A human rejected a gated transition
 */
export class ApprovalRejectedError extends AppError {
  public readonly leadId: string;
  public readonly gate: string;

  constructor(leadId: string, gate: string) {
    super(`Approval rejected for lead ${leadId} at gate ${gate}`, 'APPROVAL_REJECTED', 409);
    this.name = 'ApprovalRejectedError';
    this.leadId = leadId;
    this.gate = gate;
  }
}

/**
 * Retry budget of a stage is spent
 */
export class RetryExhaustedError extends AppError {
  public readonly leadId: string;
  public readonly stage: Stage;
  public readonly attempts: number;
  public readonly lastCause: Error | undefined;

  constructor(leadId: string, stage: Stage, attempts: number, lastCause?: Error) {
    super(
      `Retries exhausted for lead ${leadId} at ${stage} after ${attempts} attempts` +
        (lastCause ? `: ${lastCause.message}` : ''),
      'RETRY_EXHAUSTED',
      500
    );
    this.name = 'RetryExhaustedError';
    this.leadId = leadId;
    this.stage = stage;
    this.attempts = attempts;
    this.lastCause = lastCause;
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * An attempted stage change that is not an edge of the transition table
 */
export class InvalidTransitionError extends AppError {
  public readonly from: Stage;
  public readonly to: Stage;

  constructor(from: Stage, to: Stage, reason?: string) {
    super(
      `Invalid stage transition ${from} -> ${to}` + (reason ? `: ${reason}` : ''),
      'INVALID_TRANSITION',
      409
    );
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * Database operation error (query failed, constraint violation, etc.)
 */
export class DatabaseOperationError extends AppError {
  public readonly operation: string;
  public readonly originalError: Error | undefined;

  constructor(operation: string, message: string, originalError?: Error) {
    super(`Database ${operation} failed: ${message}`, 'DATABASE_OPERATION_ERROR', 500);
    this.name = 'DatabaseOperationError';
    this.operation = operation;
    this.originalError = originalError;
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Map any thrown value to the kind recorded on a lead.
 *
 * Unknown errors and database failures count as transient: the transition
 * is retried within its budget rather than failing the lead outright.
 */
export function classifyError(error: unknown): WorkflowErrorKind {
  if (error instanceof ValidationError) return 'VALIDATION';
  if (error instanceof ConflictError) return 'CONFLICT';
  if (error instanceof ApprovalRejectedError) return 'APPROVAL_REJECTED';
  if (error instanceof RetryExhaustedError) return 'RETRY_EXHAUSTED';
  return 'SERVICE';
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}
