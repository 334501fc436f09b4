/**
 * @fileoverview Shared error classes for mem-db
 * @module @memdb/errors
 *
 * Configuration problems are raised as typed errors with stable codes.
 * Transport failures are never wrapped: whatever the client library
 * throws reaches the caller as the same object.
 *
 * @example
 * ```typescript
 * import {
 *   UnsupportedProtocolError,
 *   isConfigurationError,
 * } from '@memdb/errors';
 *
 * try {
 *   resolveConfig({ uri: 'mysql://localhost:3306' });
 * } catch (error) {
 *   if (error instanceof UnsupportedProtocolError) {
 *     console.log(error.protocol); // 'mysql'
 *   }
 * }
 * ```
 */

import type { ZodError } from 'zod';

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error codes used across mem-db packages.
 */
export const ErrorCodes = {
  // Configuration
  MISSING_URI: 'MISSING_URI',
  UNSUPPORTED_PROTOCOL: 'UNSUPPORTED_PROTOCOL',
  MISSING_MASTER_SERVICE: 'MISSING_MASTER_SERVICE',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',

  // Input
  VALIDATION_ERROR: 'VALIDATION_ERROR',
} as const;

/**
 * Error code type
 */
export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error for all mem-db errors.
 */
export class MemDbError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Additional error details */
  readonly details?: Record<string, unknown>;

  /**
   * Whether this error is operational (expected) vs a programming error.
   * Every configuration error is operational: it comes from the environment.
   */
  readonly isOperational: boolean;

  /** Timestamp when the error occurred */
  readonly timestamp: Date;

  /**
   * Create a new MemDbError.
   *
   * @param message - Human-readable error message
   * @param code - Machine-readable error code
   * @param details - Additional error details
   */
  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MemDbError';
    this.code = code;
    this.details = details;
    this.isOperational = true;
    this.timestamp = new Date();

    // Ensure proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Raised while resolving configuration, before any connection is attempted.
 */
export class ConfigurationError extends MemDbError {
  constructor(
    message: string,
    code: string = ErrorCodes.CONFIGURATION_ERROR,
    details?: Record<string, unknown>,
  ) {
    super(message, code, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * The connection URI is absent or empty.
 */
export class MissingURIError extends ConfigurationError {
  constructor(message: string = 'A connection URI is required') {
    super(message, ErrorCodes.MISSING_URI);
    this.name = 'MissingURIError';
  }
}

/**
 * The URI scheme does not name a supported store type.
 */
export class UnsupportedProtocolError extends ConfigurationError {
  /** The rejected scheme, as it appeared before `://` */
  readonly protocol: string;

  constructor(protocol: string) {
    super(`Unsupported connection protocol: ${protocol}`, ErrorCodes.UNSUPPORTED_PROTOCOL, {
      protocol,
    });
    this.name = 'UnsupportedProtocolError';
    this.protocol = protocol;
  }
}

/**
 * Sentinel mode was selected without a master service name to look up.
 */
export class MissingMasterServiceError extends ConfigurationError {
  constructor() {
    super(
      'Sentinel connection mode requires a master service name',
      ErrorCodes.MISSING_MASTER_SERVICE,
    );
    this.name = 'MissingMasterServiceError';
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

/**
 * Input failed schema validation.
 */
export class ValidationError extends MemDbError {
  /** Field-specific errors */
  readonly fieldErrors: Record<string, string[]>;

  constructor(message: string = 'Validation failed', fieldErrors: Record<string, string[]> = {}) {
    super(message, ErrorCodes.VALIDATION_ERROR, { fieldErrors });
    this.name = 'ValidationError';
    this.fieldErrors = fieldErrors;
  }

  /**
   * Check if a specific field has errors.
   */
  hasFieldError(field: string): boolean {
    return (this.fieldErrors[field]?.length ?? 0) > 0;
  }

  /**
   * Get errors for a specific field.
   */
  getFieldErrors(field: string): string[] {
    return this.fieldErrors[field] ?? [];
  }
}

/**
 * Convert a zod failure into a ValidationError keyed by field path.
 *
 * @param error - The zod error
 * @param message - Summary message
 */
export function fromZodError(error: ZodError, message?: string): ValidationError {
  const fieldErrors: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const path = issue.path.join('.') || '_root';
    (fieldErrors[path] ??= []).push(issue.message);
  }
  return new ValidationError(message, fieldErrors);
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Type guard for errors raised during configuration resolution.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Assert a condition, throwing a MemDbError if false.
 *
 * @param condition - Condition to check
 * @param error - Error to throw or error factory
 */
export function assertMemDb(
  condition: boolean,
  error: MemDbError | (() => MemDbError),
): asserts condition {
  if (!condition) {
    throw typeof error === 'function' ? error() : error;
  }
}
