/**
 * @arch patternloom.common.errors
 *
 * Error types and codes for patternloom.
 * Every hard failure thrown by the library extends LoomError.
 */

/**
 * Base error class for all patternloom errors.
 */
export class LoomError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LoomError';
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
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends LoomError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Catalog errors: a snapshot file that cannot be read as a catalog at all.
 * Malformed single entries are diagnostics, not CatalogErrors.
 */
export class CatalogError extends LoomError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CatalogError';
  }
}

/**
 * Pattern file errors (unreadable or structurally invalid exchange files).
 */
export class PatternError extends LoomError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PatternError';
  }
}

/**
 * Unknown evolution or audit rule names.
 * Error codes: T001-T002
 */
export class TransformationError extends LoomError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TransformationError';
  }
}

/**
 * Input rejected at the boundary before it reaches the core.
 * Error codes: C001-C004
 */
export class ConstraintError extends LoomError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConstraintError';
  }
}

/**
 * System errors (parse failures, write failures, unsupported formats).
 * Error codes: S001-S003
 */
export class SystemError extends LoomError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Not found (reported as diagnostics, never thrown from query paths)
  NOT_FOUND: 'N001',

  // Malformed input (M001-M002)
  MALFORMED_ENTRY: 'M001',
  MALFORMED_FILE: 'M002',

  // Invalid transformation (T001-T002)
  UNKNOWN_TRANSFORMATION: 'T001',
  UNKNOWN_AUDIT_CHECK: 'T002',

  // Constraint violations (C001-C004)
  EMPTY_CAPABILITIES: 'C001',
  EMPTY_EVOLUTIONS: 'C002',
  UNKNOWN_CAPABILITY: 'C003',
  INVALID_SCORE: 'C004',

  // System errors (S001-S003)
  PARSE_ERROR: 'S001',
  WRITE_ERROR: 'S002',
  UNKNOWN_FORMAT: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a readable message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
