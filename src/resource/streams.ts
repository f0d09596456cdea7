/**
 * Stream Helpers
 *
 * Scoped access to resource streams. Every helper destroys the stream it
 * opened, whether the work succeeds or throws.
 */

import type { Readable } from 'node:stream'
import type { InputStreamSource } from './types.js'

/**
 * Open a stream, hand it to `fn` and release it afterwards
 *
 * @example
 * ```typescript
 * const firstLine = await withStream(resource, async (stream) => {
 *   for await (const line of readline.createInterface({ input: stream })) return line
 * })
 * ```
 */
export async function withStream<T>(
  source: InputStreamSource,
  fn: (stream: Readable) => Promise<T> | T
): Promise<T> {
  const stream = await source.openStream()
  try {
    return await fn(stream)
  } finally {
    stream.destroy()
  }
}

/**
 * Byte length of a stream chunk
 */
export function chunkLength(chunk: unknown): number {
  if (chunk instanceof Uint8Array) return chunk.byteLength
  return Buffer.byteLength(String(chunk))
}

/**
 * Read the whole stream and count its bytes
 */
export async function countBytes(stream: Readable): Promise<number> {
  let size = 0
  for await (const chunk of stream) {
    size += chunkLength(chunk)
  }
  return size
}

/**
 * Read the full content of a resource
 */
export async function readBytes(source: InputStreamSource): Promise<Buffer> {
  return withStream(source, async (stream) => {
    const chunks: Buffer[] = []
    for await (const chunk of stream) {
      chunks.push(chunk instanceof Uint8Array ? Buffer.from(chunk) : Buffer.from(String(chunk)))
    }
    return Buffer.concat(chunks)
  })
}

/**
 * Read the full content of a resource as text
 */
export async function readText(
  source: InputStreamSource,
  encoding: BufferEncoding = 'utf8'
): Promise<string> {
  const bytes = await readBytes(source)
  return bytes.toString(encoding)
}
