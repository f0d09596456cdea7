/**
 * File System Resource Loader
 *
 * Loader variant for standalone applications: root-relative and
 * unqualified paths are filesystem paths relative to the working
 * directory, so `/conf/app.yml` and `conf/app.yml` name the same file.
 * `classpath:` locations, URLs and protocol resolvers behave as in the
 * default loader.
 */

import { FileSystemResource } from '../resource/file-system.js'
import type { ContextResource, Resource } from '../resource/types.js'
import { stripLeadingSlash } from '../utils/paths.js'
import { DefaultResourceLoader } from './default-loader.js'
import type { ResourceLoaderOptions } from './types.js'

/**
 * Filesystem resource that also reports the path it was loaded by
 */
export class FileSystemContextResource extends FileSystemResource implements ContextResource {
  getPathWithinContext(): string {
    return this.getPath()
  }
}

export class FileSystemResourceLoader extends DefaultResourceLoader {
  protected override getResourceByPath(path: string): Resource {
    return new FileSystemContextResource(stripLeadingSlash(path))
  }
}

/**
 * Create a loader resolving unqualified paths against the working directory
 */
export function createFileSystemResourceLoader(
  options?: ResourceLoaderOptions
): FileSystemResourceLoader {
  return new FileSystemResourceLoader(options)
}
