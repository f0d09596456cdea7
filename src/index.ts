/**
 * resource-locator
 *
 * One handle type for files, classpath entries, URLs and virtual
 * filesystem nodes, and a loader that turns location strings into handles.
 */

// === Resources ===
export {
  AbstractResource,
  FileSystemResource,
  UrlResource,
  ClassPathResource,
  ClassPathContextResource,
  ByteArrayResource,
  InputStreamResource,
  DescriptiveResource,
  VfsResource,
  defaultClasspath,
  isResource,
  isContextResource,
  withStream,
  readBytes,
  readText,
  countBytes,
  CLASSPATH_URL_PREFIX,
  FILE_URL_PREFIX,
  URL_PROTOCOLS,
  isUrl,
  isFileUrl,
  parseUrl,
  toURI,
} from './resource/index.js'
export type { Resource, ContextResource, InputStreamSource, VfsAdapter } from './resource/index.js'

// === Loaders ===
export {
  DefaultResourceLoader,
  FileSystemResourceLoader,
  FileSystemContextResource,
  createResourceLoader,
  createFileSystemResourceLoader,
  resolveLoaderConfig,
  classpathFromEnv,
  ResourceLoaderOptionsSchema,
} from './loader/index.js'
export type {
  ResourceLoader,
  ProtocolResolver,
  ResourceLoaderOptions,
  ResolvedLoaderConfig,
} from './loader/index.js'

// === Errors ===
export {
  Errors,
  ErrorCodes,
  ResourceError,
  getErrorCode,
  isErrorCode,
  isRecoverable,
  isResourceError,
} from './errors/index.js'
export type { ErrorCode, ErrorCodeDef, ResolutionTarget } from './errors/index.js'

// === Utils ===
export { createLogger, getLogger } from './utils/logger.js'
export { cleanPath, applyRelativePath } from './utils/paths.js'
