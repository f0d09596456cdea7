/**
 * Resource Location Utilities
 *
 * Prefix constants and URL/URI checks used when turning location strings
 * into resources.
 */

import { Errors } from '../errors/index.js'

/** Pseudo URL prefix for loading from the classpath roots */
export const CLASSPATH_URL_PREFIX = 'classpath:'

/** URL prefix for loading from the filesystem */
export const FILE_URL_PREFIX = 'file:'

/**
 * URL protocols a location may carry to be resolved as a URL.
 * Anything else before a colon is left to protocol resolvers and the
 * loader's path strategy.
 */
export const URL_PROTOCOLS: readonly string[] = ['file:', 'http:', 'https:', 'ftp:', 'data:']

const URI_SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:/
const URI_CHARACTERS = /^[A-Za-z0-9\-._~:/?#[\]@!$&'()*+,;=%]*$/
const PERCENT_ENCODING = /%(?![0-9A-Fa-f]{2})/

/**
 * Parse a location as a URL with a known protocol, or undefined
 */
export function parseUrl(location: string): URL | undefined {
  let url: URL
  try {
    url = new URL(location)
  } catch {
    return undefined
  }
  return URL_PROTOCOLS.includes(url.protocol) ? url : undefined
}

/**
 * Whether a location is a URL: either a `classpath:` pseudo URL or a
 * well-formed URL with a known protocol
 */
export function isUrl(location: string): boolean {
  if (location.startsWith(CLASSPATH_URL_PREFIX)) {
    return true
  }
  return parseUrl(location) !== undefined
}

/**
 * Whether a URL points into the filesystem
 */
export function isFileUrl(url: URL): boolean {
  return url.protocol === FILE_URL_PREFIX
}

/**
 * Turn a URL string into a URI string, encoding spaces as `%20`.
 *
 * @throws ResourceError MALFORMED_LOCATION when the result is not a
 * syntactically valid absolute URI
 */
export function toURI(location: string): string {
  const uri = location.replace(/ /g, '%20')
  if (!URI_SCHEME.test(uri) || !URI_CHARACTERS.test(uri) || PERCENT_ENCODING.test(uri)) {
    throw Errors.malformedLocation(location)
  }
  return uri
}
