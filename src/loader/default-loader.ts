/**
 * Default Resource Loader
 *
 * Resolution order for `getResource(location)`:
 *
 * 1. registered protocol resolvers, in registration order (first result wins)
 * 2. `/path` → `getResourceByPath`
 * 3. `classpath:path` → ClassPathResource
 * 4. URL with a known protocol → UrlResource
 * 5. anything else → `getResourceByPath`
 *
 * `getResourceByPath` is the extension point for loader variants; here it
 * yields classpath resources.
 */

import { createLogger } from '../utils/logger.js'
import { ClassPathContextResource, ClassPathResource } from '../resource/class-path.js'
import type { Resource } from '../resource/types.js'
import { UrlResource } from '../resource/url.js'
import { CLASSPATH_URL_PREFIX, parseUrl } from '../resource/utils.js'
import { resolveLoaderConfig } from './config.js'
import type { ProtocolResolver, ResourceLoader, ResourceLoaderOptions } from './types.js'

const logger = createLogger('resource-loader')

export class DefaultResourceLoader implements ResourceLoader {
  private readonly classpath: readonly string[]
  private readonly protocolResolvers: ProtocolResolver[] = []

  constructor(options: ResourceLoaderOptions = {}) {
    const config = resolveLoaderConfig(options)
    this.classpath = config.classpath
    for (const resolver of config.resolvers) {
      this.addProtocolResolver(resolver)
    }
  }

  getClasspath(): readonly string[] {
    return this.classpath
  }

  /**
   * Register a resolver. It takes priority below every resolver added
   * before it; resources already resolved are unaffected.
   */
  addProtocolResolver(resolver: ProtocolResolver): void {
    this.protocolResolvers.push(resolver)
    logger.debug({ count: this.protocolResolvers.length }, 'Registered protocol resolver')
  }

  /**
   * Registered resolvers, in priority order
   */
  getProtocolResolvers(): readonly ProtocolResolver[] {
    return this.protocolResolvers
  }

  getResource(location: string): Resource {
    for (const [index, resolver] of this.protocolResolvers.entries()) {
      const resource = resolver(location, this)
      if (resource !== undefined) {
        logger.debug({ location, resolver: index }, 'Resolved by protocol resolver')
        return resource
      }
    }

    if (location.startsWith('/')) {
      return this.getResourceByPath(location)
    }

    if (location.startsWith(CLASSPATH_URL_PREFIX)) {
      logger.debug({ location }, 'Resolved as classpath resource')
      return new ClassPathResource(location.slice(CLASSPATH_URL_PREFIX.length), this.classpath)
    }

    const url = parseUrl(location)
    if (url) {
      logger.debug({ location }, 'Resolved as URL resource')
      return new UrlResource(url)
    }

    return this.getResourceByPath(location)
  }

  /**
   * Resource for a root-relative or unqualified path
   */
  protected getResourceByPath(path: string): Resource {
    logger.debug({ path }, 'Resolved as classpath context resource')
    return new ClassPathContextResource(path, this.classpath)
  }
}

/**
 * Create a loader resolving unqualified paths against the classpath
 *
 * @example
 * ```typescript
 * const loader = createResourceLoader({ classpath: ['./dist', './assets'] })
 * const schema = loader.getResource('classpath:schemas/user.json')
 * const remote = loader.getResource('https://example.com/app.yml')
 * ```
 */
export function createResourceLoader(options?: ResourceLoaderOptions): DefaultResourceLoader {
  return new DefaultResourceLoader(options)
}
