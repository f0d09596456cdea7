/**
 * Resource Types
 *
 * A Resource describes addressable content (a file, a classpath entry, a
 * URL, a virtual filesystem node) without holding the content itself.
 * Resources are immutable once constructed; creating one never touches
 * the backing store.
 */

import type { Readable } from 'node:stream'

/**
 * Anything that can hand out a byte stream
 */
export interface InputStreamSource {
  /**
   * Open a fresh stream over the content.
   *
   * The caller owns the stream and must destroy it on every exit path
   * (see `withStream`). Resources where `isOpen()` is true hand out a
   * single stream only.
   */
  openStream(): Promise<Readable>
}

/**
 * Handle for addressable content, independent of its backing store
 */
export interface Resource extends InputStreamSource {
  /** Whether the content is currently present */
  exists(): Promise<boolean>

  /**
   * Whether a stream can likely be opened.
   * Never true for content that is provably absent.
   */
  isReadable(): Promise<boolean>

  /** Whether this handle wraps an already-open, single-use stream */
  isOpen(): boolean

  /** Whether the content maps to a path in a real filesystem */
  isFile(): boolean

  /** @throws ResourceError UNRESOLVABLE when the resource is not URL-addressable */
  getURL(): URL

  /** @throws ResourceError MALFORMED_LOCATION when the URL is not a valid URI */
  getURI(): string

  /**
   * Absolute filesystem path of the content
   * @throws ResourceError UNRESOLVABLE when the resource is not file-backed
   */
  getFile(): string

  /** Content length in bytes */
  contentLength(): Promise<number>

  /** Last-modified timestamp in milliseconds since the epoch */
  lastModified(): Promise<number>

  /** Resource at `relativePath`, relative to this one */
  createRelative(relativePath: string): Resource

  /** Last path segment, if the backing store has paths */
  getFilename(): string | undefined

  /** Human-readable identity, used for equality, hashing and diagnostics */
  getDescription(): string

  equals(other: unknown): boolean
  hashCode(): number
  toString(): string
}

/**
 * Resource loaded from an enclosing context (application root,
 * working directory) that remembers its path within that context
 */
export interface ContextResource extends Resource {
  /** Path relative to the context root, without a leading slash */
  getPathWithinContext(): string
}

/**
 * Check whether a resource carries a context path
 */
export function isContextResource(resource: Resource): resource is ContextResource {
  return 'getPathWithinContext' in resource && typeof resource.getPathWithinContext === 'function'
}

/**
 * Check whether an arbitrary value implements the Resource contract
 */
export function isResource(value: unknown): value is Resource {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getDescription' in value &&
    typeof value.getDescription === 'function' &&
    'openStream' in value &&
    typeof value.openStream === 'function'
  )
}
