/**
 * Abstract Resource
 *
 * Shared behavior for concrete resources. Every operation a backing store
 * may not support has a fallback here:
 *
 * - `exists()` checks the file when there is one, otherwise tries to open
 *   the stream
 * - `contentLength()` reads the whole stream and counts bytes
 * - `lastModified()` reads the file's mtime
 * - URL, URI, file and relative lookups fail with UNRESOLVABLE
 *
 * Subclasses override what their store answers more cheaply.
 */

import type { Readable } from 'node:stream'
import { Errors, isResourceError } from '../errors/index.js'
import { statIfExists } from '../utils/fs.js'
import { hashString } from '../utils/paths.js'
import { countBytes, withStream } from './streams.js'
import { isResource, type Resource } from './types.js'
import { toURI } from './utils.js'

export abstract class AbstractResource implements Resource {
  abstract openStream(): Promise<Readable>

  abstract getDescription(): string

  /**
   * File check first; when the resource has no file, try to open and
   * immediately release the stream. Any failure while opening counts as
   * absence.
   */
  async exists(): Promise<boolean> {
    let file: string
    try {
      file = this.getFile()
    } catch (error) {
      if (!isResourceError(error)) throw error
      return this.canOpenStream()
    }
    return (await statIfExists(file)) !== undefined
  }

  isReadable(): Promise<boolean> {
    return this.exists()
  }

  isOpen(): boolean {
    return false
  }

  isFile(): boolean {
    return false
  }

  getURL(): URL {
    throw Errors.unresolvable(this.getDescription(), 'URL')
  }

  getURI(): string {
    return toURI(this.getURL().href)
  }

  getFile(): string {
    throw Errors.unresolvable(this.getDescription(), 'absolute file path')
  }

  /**
   * Reads the whole stream. Subclasses with a cheaper size query override
   * this.
   */
  async contentLength(): Promise<number> {
    return withStream(this, countBytes)
  }

  async lastModified(): Promise<number> {
    const file = this.getFileForLastModifiedCheck()
    const stats = await statIfExists(file)
    if (!stats) {
      throw Errors.notFound(
        this.getDescription(),
        'cannot be resolved in the file system for checking its last-modified timestamp'
      )
    }
    return Math.floor(stats.mtimeMs)
  }

  /**
   * File whose timestamp `lastModified()` reports
   */
  protected getFileForLastModifiedCheck(): string {
    return this.getFile()
  }

  createRelative(relativePath: string): Resource {
    throw Errors.noRelative(this.getDescription(), relativePath)
  }

  getFilename(): string | undefined {
    return undefined
  }

  equals(other: unknown): boolean {
    return this === other || (isResource(other) && other.getDescription() === this.getDescription())
  }

  hashCode(): number {
    return hashString(this.getDescription())
  }

  toString(): string {
    return this.getDescription()
  }

  private async canOpenStream(): Promise<boolean> {
    try {
      const stream = await this.openStream()
      stream.destroy()
      return true
    } catch {
      return false
    }
  }
}
