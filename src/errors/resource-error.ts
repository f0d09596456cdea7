/**
 * Resource Error
 *
 * Single error class for the library, discriminated by `code`.
 */

import type { ErrorCode } from './codes.js'

export class ResourceError extends Error {
  constructor(
    /** Error code (e.g., 'NOT_FOUND', 'UNRESOLVABLE') */
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'ResourceError'
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: ErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

/**
 * Check whether a value is a ResourceError, optionally with a given code
 */
export function isResourceError(error: unknown, code?: ErrorCode): error is ResourceError {
  if (!(error instanceof ResourceError)) return false
  return code === undefined || error.code === code
}
