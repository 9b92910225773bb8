/**
 * Oracle Errors
 *
 * Typed failure taxonomy shared by every oracle operation. A failed operation
 * throws an OracleError; the surrounding transaction is rolled back and the
 * error reaches the caller unchanged.
 */

// ============================================================================
// Error Types
// ============================================================================

/** Error codes for OracleError */
export enum OracleErrorCode {
  /** Entity absent for a required read */
  NOT_FOUND = 'NOT_FOUND',
  /** Caller identity does not hold the required role */
  UNAUTHORIZED = 'UNAUTHORIZED',
  /** Entity already stored under the given key */
  ALREADY_EXISTS = 'ALREADY_EXISTS',
  /** Malformed decimal, address, symbol or message */
  INVALID_INPUT = 'INVALID_INPUT',
  /** Stored bytes could not be decoded */
  PARSE_ERROR = 'PARSE_ERROR',
}

/**
 * Typed error for oracle operations.
 * Allows callers to programmatically distinguish error types.
 */
export class OracleError extends Error {
  constructor(
    message: string,
    public readonly code: OracleErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'OracleError';
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function notFound(kind: string): OracleError {
  return new OracleError(`no ${kind} data stored`, OracleErrorCode.NOT_FOUND);
}

export function unauthorized(): OracleError {
  return new OracleError('Unauthorized', OracleErrorCode.UNAUTHORIZED);
}

export function alreadyExists(kind: string, key: string): OracleError {
  return new OracleError(`${kind} already registered: ${key}`, OracleErrorCode.ALREADY_EXISTS);
}

export function alreadyInitialized(kind: string): OracleError {
  return new OracleError(`${kind} already initialized`, OracleErrorCode.ALREADY_EXISTS);
}

export function invalidInput(message: string, cause?: unknown): OracleError {
  return new OracleError(`Invalid input: ${message}`, OracleErrorCode.INVALID_INPUT, cause);
}

export function parseError(target: string, cause?: unknown): OracleError {
  return new OracleError(`Error parsing ${target}`, OracleErrorCode.PARSE_ERROR, cause);
}

/**
 * Narrow an unknown value to an OracleError, optionally of a given code.
 */
export function isOracleError(error: unknown, code?: OracleErrorCode): error is OracleError {
  if (!(error instanceof OracleError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * Safely extract error message from unknown caught value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
