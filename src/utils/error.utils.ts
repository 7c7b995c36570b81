/**
 * @fileoverview Structured error handling for the conveyor daemon with typed error codes,
 * contextual metadata, and HTTP status mapping.
 *
 * Key Features:
 * - ErrorCode enumeration covering the job orchestration error taxonomy
 * - AppError class with context, timestamp, and original error tracking
 * - JSON serialization for log output
 * - Factory functions for the common failure conditions (profile lookup, slicing,
 *   device loss, cancellation, illegal transitions)
 * - Zod validation error conversion to structured AppError
 * - HTTP status mapping used by the gateway routes
 *
 * Error Categories:
 * - General: UNKNOWN, VALIDATION, TIMEOUT, NETWORK
 * - Client input: PROFILE_NOT_FOUND, JOB_NOT_FOUND, DEVICE_NOT_FOUND, FILE_NOT_FOUND,
 *   UNSUPPORTED_MODEL, ALREADY_TERMINAL
 * - Adapters: SLICE_FAILED, DEVICE_DISCONNECTED, DEVICE_BUSY, CANCEL_REQUESTED
 * - Internal: ILLEGAL_TRANSITION
 * - Configuration: CONFIG_INVALID, CONFIG_LOAD_FAILED, ADDRESS_INVALID
 */

import { ZodError } from 'zod';

// ============================================================================
// ERROR TYPES
// ============================================================================

export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  VALIDATION = 'VALIDATION',
  TIMEOUT = 'TIMEOUT',
  NETWORK = 'NETWORK',

  // Client input errors
  PROFILE_NOT_FOUND = 'PROFILE_NOT_FOUND',
  JOB_NOT_FOUND = 'JOB_NOT_FOUND',
  DEVICE_NOT_FOUND = 'DEVICE_NOT_FOUND',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  UNSUPPORTED_MODEL = 'UNSUPPORTED_MODEL',
  ALREADY_TERMINAL = 'ALREADY_TERMINAL',

  // Adapter errors
  SLICE_FAILED = 'SLICE_FAILED',
  DEVICE_DISCONNECTED = 'DEVICE_DISCONNECTED',
  DEVICE_BUSY = 'DEVICE_BUSY',
  CANCEL_REQUESTED = 'CANCEL_REQUESTED',

  // Internal contract violations
  ILLEGAL_TRANSITION = 'ILLEGAL_TRANSITION',

  // Configuration errors
  CONFIG_INVALID = 'CONFIG_INVALID',
  CONFIG_LOAD_FAILED = 'CONFIG_LOAD_FAILED',
  ADDRESS_INVALID = 'ADDRESS_INVALID'
}

// ============================================================================
// CUSTOM ERROR CLASS
// ============================================================================

/**
 * Enhanced error class with structured context
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: Date;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
    this.originalError = originalError;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /**
   * Convert to plain object for serialization
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError ? {
        name: this.originalError.name,
        message: this.originalError.message,
        stack: this.originalError.stack
      } : undefined
    };
  }

}

// ============================================================================
// ERROR FACTORIES
// ============================================================================

/**
 * Create error from Zod validation error
 */
export function fromZodError(error: ZodError, code: ErrorCode = ErrorCode.VALIDATION): AppError {
  const issues = error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code
  }));

  return new AppError(
    'Validation failed',
    code,
    { issues },
    error
  );
}

export function profileNotFoundError(kind: 'slicer' | 'driver', name: string): AppError {
  return new AppError(
    `No ${kind} profile named "${name}"`,
    ErrorCode.PROFILE_NOT_FOUND,
    { kind, name }
  );
}

export function jobNotFoundError(jobId: string): AppError {
  return new AppError(`Job ${jobId} not found`, ErrorCode.JOB_NOT_FOUND, { jobId });
}

export function deviceNotFoundError(deviceId: string): AppError {
  return new AppError(`Device ${deviceId} not found`, ErrorCode.DEVICE_NOT_FOUND, { deviceId });
}

/**
 * Create slicing failure carrying the captured tool output
 */
export function sliceFailedError(
  message: string,
  diagnostics: string,
  context?: Record<string, unknown>,
  originalError?: Error
): AppError {
  return new AppError(
    message,
    ErrorCode.SLICE_FAILED,
    { diagnostics, ...context },
    originalError
  );
}

export function deviceDisconnectedError(deviceId: string, reason?: string): AppError {
  return new AppError(
    reason ? `Device ${deviceId} disconnected: ${reason}` : `Device ${deviceId} disconnected`,
    ErrorCode.DEVICE_DISCONNECTED,
    { deviceId, reason }
  );
}

export function cancelRequestedError(jobId: string): AppError {
  return new AppError(`Job ${jobId} cancelled`, ErrorCode.CANCEL_REQUESTED, { jobId });
}

export function illegalTransitionError(jobId: string, from: string, to: string): AppError {
  return new AppError(
    `Illegal transition for job ${jobId}: ${from} -> ${to}`,
    ErrorCode.ILLEGAL_TRANSITION,
    { jobId, from, to }
  );
}

/**
 * Create timeout error
 */
export function timeoutError(operation: string, timeoutMs: number): AppError {
  return new AppError(
    `Operation timed out after ${timeoutMs}ms`,
    ErrorCode.TIMEOUT,
    { operation, timeoutMs }
  );
}

// ============================================================================
// ERROR HANDLING UTILITIES
// ============================================================================

/**
 * Check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Check if error is the cooperative cancellation signal
 */
export function isCancellation(error: unknown): boolean {
  return isAppError(error) && error.code === ErrorCode.CANCEL_REQUESTED;
}

/**
 * Convert unknown error to AppError
 */
export function toAppError(error: unknown, defaultCode: ErrorCode = ErrorCode.UNKNOWN): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof ZodError) {
    return fromZodError(error);
  }

  if (error instanceof Error) {
    return new AppError(
      error.message,
      defaultCode,
      undefined,
      error
    );
  }

  if (typeof error === 'string') {
    return new AppError(error, defaultCode);
  }

  return new AppError(
    'An unknown error occurred',
    defaultCode,
    { error }
  );
}

/**
 * Map an error code to the HTTP status the gateway answers with
 */
export function getHttpStatus(code: ErrorCode): number {
  switch (code) {
    case ErrorCode.VALIDATION:
    case ErrorCode.UNSUPPORTED_MODEL:
      return 400;
    case ErrorCode.PROFILE_NOT_FOUND:
    case ErrorCode.JOB_NOT_FOUND:
    case ErrorCode.DEVICE_NOT_FOUND:
    case ErrorCode.FILE_NOT_FOUND:
      return 404;
    case ErrorCode.ALREADY_TERMINAL:
      return 409;
    case ErrorCode.TIMEOUT:
      return 504;
    default:
      return 500;
  }
}

/**
 * Create error result for RPC responses
 */
export function createErrorResult(error: unknown): { success: false; error: string; code: ErrorCode } {
  const appError = toAppError(error);
  return {
    success: false,
    error: appError.message,
    code: appError.code
  };
}
