/**
 * File System Resource
 *
 * Resource backed by a path on the local filesystem. Relative paths are
 * resolved against the process working directory.
 */

import { constants } from 'node:fs'
import { access } from 'node:fs/promises'
import { resolve as resolvePath } from 'node:path'
import type { Readable } from 'node:stream'
import { pathToFileURL } from 'node:url'
import { Errors } from '../errors/index.js'
import { isMissingPathError, openFileStream, statIfExists } from '../utils/fs.js'
import { applyRelativePath, cleanPath, getFilename } from '../utils/paths.js'
import { AbstractResource } from './abstract.js'
import type { Resource } from './types.js'

/**
 * @example
 * ```typescript
 * const config = new FileSystemResource('config/app.yml')
 * if (await config.exists()) {
 *   const text = await readText(config)
 * }
 * const sibling = config.createRelative('db.yml') // config/db.yml
 * ```
 */
export class FileSystemResource extends AbstractResource {
  private readonly path: string
  private readonly absolutePath: string

  constructor(path: string) {
    super()
    this.path = cleanPath(path)
    this.absolutePath = resolvePath(this.path)
  }

  /**
   * The cleaned path this resource was created with
   */
  getPath(): string {
    return this.path
  }

  override async exists(): Promise<boolean> {
    return (await statIfExists(this.absolutePath)) !== undefined
  }

  /**
   * True for existing regular files the process may read
   */
  override async isReadable(): Promise<boolean> {
    const stats = await statIfExists(this.absolutePath)
    if (!stats || stats.isDirectory()) return false
    try {
      await access(this.absolutePath, constants.R_OK)
      return true
    } catch (error) {
      if (isMissingPathError(error) || isAccessError(error)) return false
      throw error
    }
  }

  override isFile(): boolean {
    return true
  }

  override getURL(): URL {
    return pathToFileURL(this.absolutePath)
  }

  override getFile(): string {
    return this.absolutePath
  }

  override openStream(): Promise<Readable> {
    return openFileStream(this.absolutePath, this.getDescription())
  }

  override async contentLength(): Promise<number> {
    const stats = await statIfExists(this.absolutePath)
    if (!stats) {
      throw Errors.notFound(this.getDescription(), 'cannot be resolved in the file system for resolving its content length')
    }
    return stats.size
  }

  override createRelative(relativePath: string): Resource {
    return new FileSystemResource(applyRelativePath(this.path, relativePath))
  }

  override getFilename(): string | undefined {
    return getFilename(this.path)
  }

  getDescription(): string {
    return `file [${this.absolutePath}]`
  }
}

function isAccessError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'EACCES' || error.code === 'EPERM')
}
