/**
 * Resource Module
 *
 * The Resource contract, its shared base class and the concrete variants.
 */

export type { Resource, ContextResource, InputStreamSource } from './types.js'
export { isResource, isContextResource } from './types.js'

export { AbstractResource } from './abstract.js'
export { FileSystemResource } from './file-system.js'
export { UrlResource } from './url.js'
export { ClassPathResource, ClassPathContextResource, defaultClasspath } from './class-path.js'
export { ByteArrayResource } from './byte-array.js'
export { InputStreamResource } from './input-stream.js'
export { DescriptiveResource } from './descriptive.js'
export { VfsResource, type VfsAdapter } from './vfs.js'

export { withStream, readBytes, readText, countBytes } from './streams.js'
export {
  CLASSPATH_URL_PREFIX,
  FILE_URL_PREFIX,
  URL_PROTOCOLS,
  isUrl,
  isFileUrl,
  parseUrl,
  toURI,
} from './utils.js'
