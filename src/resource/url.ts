/**
 * URL Resource
 *
 * Resource addressed by a URL. `file:` URLs are served from the local
 * filesystem; `http:` and `https:` answer existence, length and timestamp
 * through a HEAD request; other protocols (`data:`, `ftp:`) go through the
 * stream fallbacks of AbstractResource.
 */

import { Readable } from 'node:stream'
import { fileURLToPath } from 'node:url'
import { Errors } from '../errors/index.js'
import { openFileStream, statIfExists } from '../utils/fs.js'
import { getFilename, stripLeadingSlash } from '../utils/paths.js'
import { createLogger } from '../utils/logger.js'
import { AbstractResource } from './abstract.js'
import type { Resource } from './types.js'
import { isFileUrl } from './utils.js'

const logger = createLogger('url-resource')

function isHttpUrl(url: URL): boolean {
  return url.protocol === 'http:' || url.protocol === 'https:'
}

export class UrlResource extends AbstractResource {
  private readonly url: URL

  /**
   * @throws ResourceError MALFORMED_LOCATION when `url` is not a valid URL
   */
  constructor(url: string | URL) {
    super()
    this.url = UrlResource.parse(url)
  }

  private static parse(url: string | URL, base?: URL): URL {
    try {
      return new URL(url.toString(), base)
    } catch (error) {
      throw Errors.malformedLocation(url.toString(), error)
    }
  }

  override async exists(): Promise<boolean> {
    if (isFileUrl(this.url)) {
      return (await statIfExists(this.getFile())) !== undefined
    }
    if (isHttpUrl(this.url)) {
      try {
        return (await this.head()).ok
      } catch (error) {
        logger.debug({ url: this.url.href, err: error }, 'HEAD request failed')
        return false
      }
    }
    return super.exists()
  }

  override async isReadable(): Promise<boolean> {
    if (isFileUrl(this.url)) {
      const stats = await statIfExists(this.getFile())
      return stats !== undefined && !stats.isDirectory()
    }
    return this.exists()
  }

  override isFile(): boolean {
    return isFileUrl(this.url)
  }

  override getURL(): URL {
    return new URL(this.url.href)
  }

  override getFile(): string {
    if (!isFileUrl(this.url)) {
      throw Errors.unresolvable(this.getDescription(), 'absolute file path')
    }
    return fileURLToPath(this.url)
  }

  override async openStream(): Promise<Readable> {
    if (isFileUrl(this.url)) {
      return openFileStream(this.getFile(), this.getDescription())
    }

    logger.debug({ url: this.url.href }, 'Fetching URL resource')
    const response = await fetch(this.url)
    if (!response.ok) {
      throw Errors.notFound(
        this.getDescription(),
        `cannot be opened: server responded with ${response.status}`
      )
    }
    if (response.body === null) {
      return Readable.from([])
    }
    return Readable.fromWeb(response.body)
  }

  override async contentLength(): Promise<number> {
    if (isFileUrl(this.url)) {
      const stats = await statIfExists(this.getFile())
      if (!stats) {
        throw Errors.notFound(
          this.getDescription(),
          'cannot be resolved in the file system for resolving its content length'
        )
      }
      return stats.size
    }
    if (isHttpUrl(this.url)) {
      const header = (await this.head()).headers.get('content-length')
      if (header !== null && /^\d+$/.test(header)) {
        return Number(header)
      }
    }
    return super.contentLength()
  }

  override async lastModified(): Promise<number> {
    if (isHttpUrl(this.url)) {
      const response = await this.head()
      if (!response.ok) {
        throw Errors.notFound(this.getDescription(), `cannot be checked: server responded with ${response.status}`)
      }
      const header = response.headers.get('last-modified')
      const timestamp = header === null ? Number.NaN : Date.parse(header)
      return Number.isNaN(timestamp) ? 0 : timestamp
    }
    return super.lastModified()
  }

  /**
   * Resolves against this URL. One leading slash of `relativePath` is
   * dropped so the result stays below this URL's directory.
   */
  override createRelative(relativePath: string): Resource {
    return new UrlResource(UrlResource.parse(stripLeadingSlash(relativePath), this.url))
  }

  /**
   * Last segment of the URL path, percent-decoded
   */
  override getFilename(): string | undefined {
    const name = getFilename(this.url.pathname)
    if (name === undefined) return undefined
    try {
      return decodeURIComponent(name)
    } catch {
      return name
    }
  }

  getDescription(): string {
    return `URL [${this.url.href}]`
  }

  private async head(): Promise<Response> {
    logger.debug({ url: this.url.href }, 'HEAD request for URL resource')
    return fetch(this.url, { method: 'HEAD' })
  }
}
