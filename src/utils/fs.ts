/**
 * Filesystem Helpers
 */

import type { Stats } from 'node:fs'
import { open, stat, type FileHandle } from 'node:fs/promises'
import type { Readable } from 'node:stream'
import { Errors } from '../errors/index.js'

/**
 * Whether an fs error means the path does not exist
 */
export function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  )
}

/**
 * Stat a path, or undefined when it does not exist
 */
export async function statIfExists(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path)
  } catch (error) {
    if (isMissingPathError(error)) return undefined
    throw error
  }
}

/**
 * Open a regular file for reading.
 *
 * The returned stream closes the underlying descriptor when it ends or is
 * destroyed.
 *
 * @param description - Resource description used in error messages
 */
export async function openFileStream(path: string, description: string): Promise<Readable> {
  let handle: FileHandle
  try {
    handle = await open(path, 'r')
  } catch (error) {
    if (isMissingPathError(error)) {
      throw Errors.notFound(description, 'cannot be opened because it does not exist', error)
    }
    throw error
  }

  try {
    const stats = await handle.stat()
    if (stats.isDirectory()) {
      throw Errors.notFound(description, 'cannot be opened because it is a directory')
    }
  } catch (error) {
    await handle.close()
    throw error
  }
  return handle.createReadStream()
}
