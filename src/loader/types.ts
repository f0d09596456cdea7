/**
 * Loader Types
 */

import type { Resource } from '../resource/types.js'

/**
 * Turns location strings into resources
 */
export interface ResourceLoader {
  /**
   * Resolve a location to a resource handle. Never performs I/O: the
   * returned resource may not exist.
   *
   * Supported locations:
   * - whatever a registered protocol resolver recognizes
   * - `classpath:path` for classpath resources
   * - URLs with a known protocol (`file:`, `http:`, `https:`, `ftp:`, `data:`)
   * - root-relative (`/path`) and unqualified (`path`) paths, interpreted
   *   by the loader variant
   */
  getResource(location: string): Resource

  /**
   * Classpath roots used for `classpath:` locations
   */
  getClasspath(): readonly string[]
}

/**
 * Strategy for a loader-specific location prefix.
 *
 * Return undefined to let the next resolver, or the loader's own rules,
 * handle the location.
 *
 * @example
 * ```typescript
 * const cloud: ProtocolResolver = (location, loader) =>
 *   location.startsWith('cloud:')
 *     ? loader.getResource(location.replace('cloud:', 'classpath:'))
 *     : undefined
 * ```
 */
export type ProtocolResolver = (location: string, loader: ResourceLoader) => Resource | undefined

/**
 * Loader construction options
 */
export interface ResourceLoaderOptions {
  /**
   * Classpath roots, searched in order
   * @default RESOURCE_CLASSPATH split on the platform path delimiter, else [process.cwd()]
   */
  classpath?: string[]

  /**
   * Protocol resolvers registered at construction, in priority order
   */
  resolvers?: ProtocolResolver[]
}
