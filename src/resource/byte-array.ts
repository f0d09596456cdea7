/**
 * Byte Array Resource
 *
 * In-memory content. Each `openStream()` call gets a fresh stream over
 * the same bytes.
 */

import { Readable } from 'node:stream'
import { AbstractResource } from './abstract.js'
import { hashString } from '../utils/paths.js'

export class ByteArrayResource extends AbstractResource {
  private readonly bytes: Buffer
  private readonly description: string

  /**
   * @param description - Where the bytes came from
   */
  constructor(bytes: Uint8Array | string, description = 'resource loaded from byte array') {
    super()
    this.bytes = Buffer.from(bytes)
    this.description = description
  }

  getByteArray(): Buffer {
    return Buffer.from(this.bytes)
  }

  override async exists(): Promise<boolean> {
    return true
  }

  override async contentLength(): Promise<number> {
    return this.bytes.length
  }

  override async openStream(): Promise<Readable> {
    return Readable.from([Buffer.from(this.bytes)])
  }

  getDescription(): string {
    return `Byte array resource [${this.description}]`
  }

  /**
   * Equal when the content is equal
   */
  override equals(other: unknown): boolean {
    return this === other || (other instanceof ByteArrayResource && this.bytes.equals(other.bytes))
  }

  override hashCode(): number {
    return hashString(this.bytes.toString('latin1'))
  }
}
