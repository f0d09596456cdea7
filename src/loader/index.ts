/**
 * Loader Module
 */

export { DefaultResourceLoader, createResourceLoader } from './default-loader.js'
export {
  FileSystemResourceLoader,
  FileSystemContextResource,
  createFileSystemResourceLoader,
} from './file-system-loader.js'
export {
  resolveLoaderConfig,
  classpathFromEnv,
  ResourceLoaderOptionsSchema,
  type ResolvedLoaderConfig,
} from './config.js'
export type { ResourceLoader, ProtocolResolver, ResourceLoaderOptions } from './types.js'
