/**
 * Error Codes
 *
 * Central definition of every resource error code. Recoverable codes mark
 * conditions a caller is expected to handle by trying another resolution
 * path (a child lookup failing over to URL-relative resolution, `exists()`
 * falling back from the file check to the stream check).
 */

/**
 * Error code definition with string identifier and default message
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'NOT_FOUND') */
  code: string
  /** Default message */
  message: string
  /** Whether callers are expected to recover by trying an alternative */
  recoverable: boolean
}

/**
 * All resource error codes
 */
export const ErrorCodes = {
  /** Content absent when presence was required */
  NOT_FOUND: {
    code: 'NOT_FOUND',
    message: 'Resource not found',
    recoverable: true,
  },

  /** Operation not supported by this kind of resource */
  UNRESOLVABLE: {
    code: 'UNRESOLVABLE',
    message: 'Resource cannot be resolved',
    recoverable: true,
  },

  /** URL or URI syntax invalid */
  MALFORMED_LOCATION: {
    code: 'MALFORMED_LOCATION',
    message: 'Malformed location',
    recoverable: false,
  },

  /**
   * Failure raised by an external virtual filesystem provider.
   * The provider's error is kept as `cause`.
   */
  ADAPTER_FAILURE: {
    code: 'ADAPTER_FAILURE',
    message: 'Virtual filesystem adapter failure',
    recoverable: false,
  },

  /** Single-use stream requested a second time */
  STREAM_CONSUMED: {
    code: 'STREAM_CONSUMED',
    message: 'Stream has already been consumed',
    recoverable: false,
  },

  /** Invalid argument or configuration value */
  INVALID_ARGUMENT: {
    code: 'INVALID_ARGUMENT',
    message: 'Invalid argument',
    recoverable: false,
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

/**
 * Check if a string is a known error code
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code)
}

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  if (isErrorCode(code)) {
    return ErrorCodes[code]
  }

  return {
    code,
    message: code,
    recoverable: false,
  }
}

/**
 * Check if callers are expected to recover from an error code
 */
export function isRecoverable(code: string): boolean {
  return getErrorCode(code).recoverable
}
