/**
 * Loader Configuration
 *
 * Validates loader options and fills in defaults from the environment.
 *
 * Environment:
 * - `RESOURCE_CLASSPATH` - classpath roots joined with the platform path
 *   delimiter (`:` on POSIX, `;` on Windows)
 */

import { delimiter, resolve as resolvePath } from 'node:path'
import { z } from 'zod'
import { Errors } from '../errors/index.js'
import { defaultClasspath } from '../resource/class-path.js'
import type { ProtocolResolver, ResourceLoaderOptions } from './types.js'

const ProtocolResolverSchema = z.custom<ProtocolResolver>(
  (value) => typeof value === 'function',
  'must be a function'
)

export const ResourceLoaderOptionsSchema = z.object({
  classpath: z
    .array(z.string().min(1, 'classpath root must not be empty'))
    .min(1, 'must name at least one root')
    .optional(),
  resolvers: z.array(ProtocolResolverSchema).optional(),
})

/**
 * Loader configuration with every default applied
 */
export interface ResolvedLoaderConfig {
  /** Absolute classpath roots */
  classpath: readonly string[]
  resolvers: readonly ProtocolResolver[]
}

/**
 * Parse `RESOURCE_CLASSPATH`, or undefined when unset or empty
 */
export function classpathFromEnv(env: NodeJS.ProcessEnv = process.env): string[] | undefined {
  const value = env.RESOURCE_CLASSPATH
  if (!value) return undefined
  const roots = value.split(delimiter).filter((root) => root.length > 0)
  return roots.length > 0 ? roots : undefined
}

/**
 * Validate options and apply defaults: explicit options, then the
 * environment, then the working directory.
 *
 * @throws ResourceError INVALID_ARGUMENT naming the offending option
 */
export function resolveLoaderConfig(
  options: ResourceLoaderOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedLoaderConfig {
  const result = ResourceLoaderOptionsSchema.safeParse(options)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue.path.length > 0 ? issue.path.join('.') : 'options'
    throw Errors.invalidArgument(field, issue.message)
  }

  const classpath = result.data.classpath ?? classpathFromEnv(env) ?? defaultClasspath()
  return {
    classpath: classpath.map((root) => resolvePath(root)),
    resolvers: result.data.resolvers ?? [],
  }
}
