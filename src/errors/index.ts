/**
 * Error Module
 *
 * Error class, pre-built factories and error code definitions.
 */

export { Errors, type ResolutionTarget } from './factories.js'

export {
  ErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  getErrorCode,
  isErrorCode,
  isRecoverable,
} from './codes.js'

export { ResourceError, isResourceError } from './resource-error.js'
