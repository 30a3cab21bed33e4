/**
 * Error types and codes for seedling.
 * This is the error contract - all errors should extend SeedlingError.
 */

/**
 * Base error class for all seedling errors.
 * Carries a stable code and structured details (identifier, path, cause)
 * so callers can render a message without re-deriving context.
 */
export class SeedlingError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SeedlingError';
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
 * Error codes: C001-C002
 */
export class ConfigError extends SeedlingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Template registry errors (lookup, template validation).
 * Error codes: R001-R003
 */
export class RegistryError extends SeedlingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RegistryError';
  }
}

/** Why a remote operation failed. */
export type FetchFailureReason =
  | 'network_unreachable'
  | 'auth_required'
  | 'remote_not_found'
  | 'destination_not_empty'
  | 'unknown';

const FETCH_REASON_CODES: Record<FetchFailureReason, string> = {
  network_unreachable: 'F001',
  auth_required: 'F002',
  remote_not_found: 'F003',
  destination_not_empty: 'F004',
  unknown: 'F005',
};

/**
 * Remote repository errors (clone, pull).
 * Error codes: F001-F005
 */
export class FetchError extends SeedlingError {
  constructor(
    public readonly reason: FetchFailureReason,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(FETCH_REASON_CODES[reason], message, details);
    this.name = 'FetchError';
  }
}

/**
 * Template cache errors.
 * Error codes: K001-K002
 */
export class CacheError extends SeedlingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CacheError';
  }
}

/**
 * Project materialization errors (target checks, copy failures).
 * Error codes: M001-M004
 */
export class MaterializeError extends SeedlingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'MaterializeError';
  }
}

/**
 * Variable substitution errors.
 * Error codes: S001-S003
 */
export class SubstitutionError extends SeedlingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SubstitutionError';
  }
}

/**
 * Version-control errors (history reset).
 * Error codes: V001-V002
 */
export class VcsError extends SeedlingError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'VcsError';
  }
}

export const ErrorCodes = {
  // Config errors
  CONFIG_LOAD_ERROR: 'C001',
  CONFIG_INVALID: 'C002',

  // Registry errors
  TEMPLATE_NOT_FOUND: 'R001',
  INVALID_TEMPLATE: 'R002',
  DUPLICATE_TEMPLATE: 'R003',

  // Fetch errors
  NETWORK_UNREACHABLE: FETCH_REASON_CODES.network_unreachable,
  AUTH_REQUIRED: FETCH_REASON_CODES.auth_required,
  REMOTE_NOT_FOUND: FETCH_REASON_CODES.remote_not_found,
  DESTINATION_NOT_EMPTY: FETCH_REASON_CODES.destination_not_empty,
  FETCH_FAILED: FETCH_REASON_CODES.unknown,

  // Cache errors
  CACHE_CORRUPT: 'K001',
  CACHE_IO: 'K002',

  // Materialize errors
  TARGET_EXISTS: 'M001',
  COPY_FAILED: 'M002',
  TARGET_NOT_WRITABLE: 'M003',
  INVALID_PROJECT_NAME: 'M004',

  // Substitution errors
  UNDEFINED_VARIABLE: 'S001',
  NON_TEXT_TARGET: 'S002',
  PATH_OUTSIDE_PROJECT: 'S003',

  // VCS errors
  GIT_UNAVAILABLE: 'V001',
  RESET_FAILED: 'V002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a message from an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
