/**
 * Error Factories
 *
 * Pre-built error helpers for the conditions every resource variant raises.
 * Messages name the resource by its description so they read well in logs.
 */

import { ResourceError } from './resource-error.js'

/**
 * What a resource could not be resolved to
 */
export type ResolutionTarget = 'URL' | 'URI' | 'absolute file path'

/**
 * Pre-built error factories for consistent error handling
 *
 * @example
 * ```typescript
 * throw Errors.unresolvable('Byte array resource [config]', 'URL')
 * // Creates: { code: 'UNRESOLVABLE', message: 'Byte array resource [config] cannot be resolved to URL' }
 *
 * throw Errors.notFound('file [/srv/app.yml]', 'cannot be opened because it does not exist')
 * // Creates: { code: 'NOT_FOUND', message: 'file [/srv/app.yml] cannot be opened because it does not exist' }
 * ```
 */
export const Errors = {
  /**
   * Content absent when presence was required
   * @param description - Description of the resource
   * @param reason - What could not be done, phrased to follow the description
   */
  notFound(description: string, reason = 'does not exist', cause?: unknown): ResourceError {
    return new ResourceError('NOT_FOUND', `${description} ${reason}`, { description }, cause)
  },

  /**
   * Resource kind cannot be expressed as a URL, URI or file
   */
  unresolvable(description: string, target: ResolutionTarget): ResourceError {
    return new ResourceError(
      'UNRESOLVABLE',
      `${description} cannot be resolved to ${target}`,
      { description, target }
    )
  },

  /**
   * Resource kind has no notion of a relative location
   */
  noRelative(description: string, relativePath: string): ResourceError {
    return new ResourceError(
      'UNRESOLVABLE',
      `Cannot create a relative resource for ${description}`,
      { description, relativePath }
    )
  },

  /**
   * URL or URI string is not well formed
   * @param location - The offending string
   */
  malformedLocation(location: string, cause?: unknown): ResourceError {
    return new ResourceError('MALFORMED_LOCATION', `Invalid URI [${location}]`, { location }, cause)
  },

  /**
   * Wrap an error raised by a virtual filesystem provider
   * @param operation - Adapter operation that failed (e.g., 'getURL')
   */
  adapterFailure(operation: string, handle: string, cause: unknown): ResourceError {
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new ResourceError(
      'ADAPTER_FAILURE',
      `Failed to ${operation} for ${handle}: ${reason}`,
      { operation, handle },
      cause
    )
  },

  /**
   * Single-use stream requested again
   */
  streamConsumed(description: string): ResourceError {
    return new ResourceError(
      'STREAM_CONSUMED',
      `InputStream has already been read for ${description} - ` +
        'do not use an InputStreamResource if a stream needs to be read multiple times',
      { description }
    )
  },

  /**
   * Invalid argument or configuration value
   * @param field - Argument or option name
   * @param reason - Why it was rejected
   */
  invalidArgument(field: string, reason: string, value?: unknown): ResourceError {
    return new ResourceError('INVALID_ARGUMENT', `${field}: ${reason}`, { field, reason, value })
  },
}
