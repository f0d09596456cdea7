/**
 * Class Path Resource
 *
 * Resource looked up in an ordered list of root directories, the first
 * root holding the path wins. Paths are always relative to the roots; a
 * leading slash is dropped.
 */

import { existsSync, statSync } from 'node:fs'
import { isAbsolute, join, relative, resolve as resolvePath, sep } from 'node:path'
import type { Readable } from 'node:stream'
import { pathToFileURL } from 'node:url'
import { Errors } from '../errors/index.js'
import { openFileStream, statIfExists } from '../utils/fs.js'
import { applyRelativePath, cleanPath, getFilename, stripLeadingSlash } from '../utils/paths.js'
import { AbstractResource } from './abstract.js'
import type { ContextResource, Resource } from './types.js'

/**
 * Default classpath: the process working directory
 */
export function defaultClasspath(): readonly string[] {
  return [process.cwd()]
}

/**
 * @example
 * ```typescript
 * const schema = new ClassPathResource('schemas/user.json', ['/app/dist', '/app/assets'])
 * schema.getFile() // '/app/assets/schemas/user.json' if dist has no such file
 * ```
 */
export class ClassPathResource extends AbstractResource {
  protected readonly path: string
  protected readonly classpath: readonly string[]

  constructor(path: string, classpath: readonly string[] = defaultClasspath()) {
    super()
    this.path = stripLeadingSlash(cleanPath(path))
    this.classpath = classpath.map((root) => resolvePath(root))
  }

  /**
   * Path relative to the classpath roots
   */
  getPath(): string {
    return this.path
  }

  getClasspath(): readonly string[] {
    return this.classpath
  }

  /**
   * First root holding this path, or undefined. Candidates escaping their
   * root through `..` are skipped.
   */
  protected resolveFile(): string | undefined {
    for (const root of this.classpath) {
      const candidate = join(root, this.path)
      const within = relative(root, candidate)
      if (within === '..' || within.startsWith(`..${sep}`) || isAbsolute(within)) {
        continue
      }
      if (existsSync(candidate)) {
        return candidate
      }
    }
    return undefined
  }

  override async exists(): Promise<boolean> {
    return this.resolveFile() !== undefined
  }

  override async isReadable(): Promise<boolean> {
    const file = this.resolveFile()
    return file !== undefined && !statSync(file).isDirectory()
  }

  override isFile(): boolean {
    return this.resolveFile() !== undefined
  }

  override getURL(): URL {
    const file = this.resolveFile()
    if (file === undefined) {
      throw Errors.notFound(this.getDescription(), 'cannot be resolved to URL because it does not exist')
    }
    return pathToFileURL(file)
  }

  override getFile(): string {
    const file = this.resolveFile()
    if (file === undefined) {
      throw Errors.notFound(
        this.getDescription(),
        'cannot be resolved to absolute file path because it does not exist'
      )
    }
    return file
  }

  override openStream(): Promise<Readable> {
    const file = this.resolveFile()
    if (file === undefined) {
      return Promise.reject(
        Errors.notFound(this.getDescription(), 'cannot be opened because it does not exist')
      )
    }
    return openFileStream(file, this.getDescription())
  }

  override async contentLength(): Promise<number> {
    const stats = await statIfExists(this.getFile())
    if (!stats) {
      throw Errors.notFound(this.getDescription(), 'does not exist')
    }
    return stats.size
  }

  override createRelative(relativePath: string): Resource {
    return new ClassPathResource(applyRelativePath(this.path, relativePath), this.classpath)
  }

  override getFilename(): string | undefined {
    return getFilename(this.path)
  }

  getDescription(): string {
    return `class path resource [${this.path}]`
  }
}

/**
 * Classpath resource that remembers it was loaded by path through a
 * loader; its path within the context is its classpath path.
 */
export class ClassPathContextResource extends ClassPathResource implements ContextResource {
  getPathWithinContext(): string {
    return this.path
  }

  override createRelative(relativePath: string): Resource {
    return new ClassPathContextResource(applyRelativePath(this.path, relativePath), this.classpath)
  }
}
