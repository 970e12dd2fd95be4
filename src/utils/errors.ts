/**
 * Error types and codes for qa-store.
 * This is the error contract - all errors should extend QaStoreError.
 */

/**
 * Base error class for all qa-store errors.
 */
export class QaStoreError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'QaStoreError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Unknown question id, or a question absent from the knowledge base.
 */
export class NotFoundError extends QaStoreError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'NotFoundError';
  }
}

/**
 * A parent reference that does not resolve, or a parent chain with a cycle.
 */
export class TreeReferenceError extends QaStoreError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TreeReferenceError';
  }
}

/**
 * Completion service, embedding service or similarity store failed,
 * timed out, or returned data that could not be used.
 */
export class ExternalServiceError extends QaStoreError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ExternalServiceError';
  }
}

/**
 * Input or extracted data with the wrong shape.
 */
export class ValidationError extends QaStoreError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends QaStoreError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

export const ErrorCodes = {
  // Not found
  QUESTION_NOT_FOUND: 'QUESTION_NOT_FOUND',
  KB_QUESTION_NOT_FOUND: 'KB_QUESTION_NOT_FOUND',
  TREE_ENTRY_NOT_FOUND: 'TREE_ENTRY_NOT_FOUND',

  // Tree references
  PARENT_NOT_FOUND: 'PARENT_NOT_FOUND',
  CYCLE_DETECTED: 'CYCLE_DETECTED',
  HAS_CHILDREN: 'HAS_CHILDREN',

  // External services
  EXTERNAL_UNAVAILABLE: 'EXTERNAL_UNAVAILABLE',
  EXTERNAL_FAILED: 'EXTERNAL_FAILED',
  EXTERNAL_TIMEOUT: 'EXTERNAL_TIMEOUT',
  EXTERNAL_MALFORMED: 'EXTERNAL_MALFORMED',

  // Validation
  INVALID_QA_PAIRS: 'INVALID_QA_PAIRS',
  INVALID_QUESTION: 'INVALID_QUESTION',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',

  // Configuration
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  PARSE_ERROR: 'PARSE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Get a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
