/**
 * Input Stream Resource
 *
 * Wraps a stream that is already open. The stream can be handed out once;
 * prefer any other resource variant when content is read more than once.
 */

import type { Readable } from 'node:stream'
import { Errors } from '../errors/index.js'
import { AbstractResource } from './abstract.js'

const streamIds = new WeakMap<Readable, number>()
let nextStreamId = 1

function streamId(stream: Readable): number {
  let id = streamIds.get(stream)
  if (id === undefined) {
    id = nextStreamId++
    streamIds.set(stream, id)
  }
  return id
}

export class InputStreamResource extends AbstractResource {
  private readonly stream: Readable
  private readonly description: string
  private read = false

  constructor(stream: Readable, description = 'resource loaded through InputStream') {
    super()
    this.stream = stream
    this.description = description
  }

  override async exists(): Promise<boolean> {
    return true
  }

  override isOpen(): boolean {
    return true
  }

  /**
   * @throws ResourceError STREAM_CONSUMED on the second call
   */
  override async openStream(): Promise<Readable> {
    if (this.read) {
      throw Errors.streamConsumed(this.getDescription())
    }
    this.read = true
    return this.stream
  }

  getDescription(): string {
    return `InputStream resource [${this.description}]`
  }

  /**
   * Equal when wrapping the same stream
   */
  override equals(other: unknown): boolean {
    return this === other || (other instanceof InputStreamResource && this.stream === other.stream)
  }

  override hashCode(): number {
    return streamId(this.stream)
  }
}
