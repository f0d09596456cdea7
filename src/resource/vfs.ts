/**
 * Virtual Filesystem Resource
 *
 * Resource over a node of an external virtual filesystem (archives,
 * deployment overlays, remote mounts). The library never touches the
 * provider's types: everything goes through a VfsAdapter, and the
 * provider's native handle stays opaque.
 */

import type { Readable } from 'node:stream'
import { Errors, isResourceError } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'
import { hashString } from '../utils/paths.js'
import { AbstractResource } from './abstract.js'
import type { Resource } from './types.js'

const logger = createLogger('vfs-resource')

/**
 * Everything a VfsResource needs from a virtual filesystem provider.
 *
 * Methods may throw anything; the resource wraps provider errors as
 * ADAPTER_FAILURE and lets ResourceErrors through unchanged.
 */
export interface VfsAdapter<THandle> {
  openStream(handle: THandle): Promise<Readable>
  exists(handle: THandle): Promise<boolean>
  isReadable(handle: THandle): Promise<boolean>
  getURL(handle: THandle): URL
  getURI(handle: THandle): string
  /** Absolute path of the node on the physical filesystem */
  getFile(handle: THandle): string
  getSize(handle: THandle): Promise<number>
  getLastModified(handle: THandle): Promise<number>
  /** Descendant of `handle` at a `/`-separated path */
  getChild(handle: THandle, path: string): THandle
  /** Node addressed by an absolute URL */
  getRelative(url: URL): THandle
  getName(handle: THandle): string
  /**
   * Handle identity. Defaults to `Object.is`.
   * Handles that are the same must also share `hash`.
   */
  isSame?(a: THandle, b: THandle): boolean
  /** Defaults to the hash of the handle's name */
  hash?(handle: THandle): number
}

export class VfsResource<THandle> extends AbstractResource {
  private readonly handle: THandle
  private readonly adapter: VfsAdapter<THandle>

  constructor(handle: THandle, adapter: VfsAdapter<THandle>) {
    super()
    if (handle === null || handle === undefined) {
      throw Errors.invalidArgument('handle', 'virtual file handle must not be null')
    }
    this.handle = handle
    this.adapter = adapter
  }

  override openStream(): Promise<Readable> {
    return this.callAsync('open stream', () => this.adapter.openStream(this.handle))
  }

  override exists(): Promise<boolean> {
    return this.callAsync('check existence', () => this.adapter.exists(this.handle))
  }

  override isReadable(): Promise<boolean> {
    return this.callAsync('check readability', () => this.adapter.isReadable(this.handle))
  }

  override getURL(): URL {
    return this.call('obtain URL', () => this.adapter.getURL(this.handle))
  }

  override getURI(): string {
    return this.call('obtain URI', () => this.adapter.getURI(this.handle))
  }

  override getFile(): string {
    return this.call('obtain file', () => this.adapter.getFile(this.handle))
  }

  override contentLength(): Promise<number> {
    return this.callAsync('obtain size', () => this.adapter.getSize(this.handle))
  }

  override lastModified(): Promise<number> {
    return this.callAsync('obtain last-modified timestamp', () =>
      this.adapter.getLastModified(this.handle)
    )
  }

  /**
   * Child lookup for nested paths (`conf/app.yml`), URL resolution for
   * everything else and whenever the child lookup fails.
   */
  override createRelative(relativePath: string): Resource {
    if (!relativePath.startsWith('.') && relativePath.includes('/')) {
      try {
        return new VfsResource(this.adapter.getChild(this.handle, relativePath), this.adapter)
      } catch (error) {
        logger.debug(
          { resource: this.getDescription(), relativePath, err: error },
          'Child lookup failed, resolving relative URL'
        )
      }
    }

    const base = this.getURL()
    let url: URL
    try {
      url = new URL(relativePath, base)
    } catch (error) {
      throw Errors.malformedLocation(`${base.href} + ${relativePath}`, error)
    }
    return new VfsResource(
      this.call('resolve relative URL', () => this.adapter.getRelative(url)),
      this.adapter
    )
  }

  override getFilename(): string | undefined {
    return this.call('obtain name', () => this.adapter.getName(this.handle))
  }

  getDescription(): string {
    return `VFS resource [${String(this.handle)}]`
  }

  /**
   * Equal when both wrap the same native handle of the same adapter
   */
  override equals(other: unknown): boolean {
    if (this === other) return true
    if (!(other instanceof VfsResource)) return false
    return this.isSameHandle(other.handle)
  }

  override hashCode(): number {
    if (this.adapter.hash) {
      return this.adapter.hash(this.handle)
    }
    return hashString(this.call('obtain name', () => this.adapter.getName(this.handle)))
  }

  private isSameHandle(handle: THandle): boolean {
    return this.adapter.isSame ? this.adapter.isSame(this.handle, handle) : Object.is(this.handle, handle)
  }

  private call<T>(operation: string, fn: () => T): T {
    try {
      return fn()
    } catch (error) {
      throw this.wrap(operation, error)
    }
  }

  private async callAsync<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (error) {
      throw this.wrap(operation, error)
    }
  }

  private wrap(operation: string, error: unknown): unknown {
    if (isResourceError(error)) return error
    return Errors.adapterFailure(operation, this.getDescription(), error)
  }
}
