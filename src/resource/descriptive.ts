/**
 * Descriptive Resource
 *
 * Placeholder carrying only a description, for APIs that need a Resource
 * where no content exists.
 */

import type { Readable } from 'node:stream'
import { Errors } from '../errors/index.js'
import { AbstractResource } from './abstract.js'

export class DescriptiveResource extends AbstractResource {
  constructor(private readonly description: string) {
    super()
  }

  override async exists(): Promise<boolean> {
    return false
  }

  override async isReadable(): Promise<boolean> {
    return false
  }

  override openStream(): Promise<Readable> {
    return Promise.reject(
      Errors.notFound(
        this.getDescription(),
        'cannot be opened because it does not point to a readable resource'
      )
    )
  }

  getDescription(): string {
    return this.description
  }
}
