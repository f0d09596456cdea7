/**
 * Path Utilities
 *
 * String-level path helpers shared by the resource variants. All of them
 * work on `/`-separated paths; backslashes are normalized by `cleanPath`.
 */

const FOLDER_SEPARATOR = '/'
const TOP_PATH = '..'
const CURRENT_PATH = '.'

/**
 * Normalize a path: unify separators and collapse `.` and `..` segments.
 *
 * A scheme-like prefix (`file:`, `C:`) and a leading `/` are kept as they
 * are. `..` segments that climb above the start of the path are retained.
 *
 * @example
 * ```typescript
 * cleanPath('a/./b/../c.txt')  // 'a/c.txt'
 * cleanPath('file:/x/../y')    // 'file:/y'
 * cleanPath('../a')            // '../a'
 * ```
 */
export function cleanPath(path: string): string {
  if (path === '') return path

  let pathToUse = path.replace(/\\/g, FOLDER_SEPARATOR)
  let prefix = ''

  const prefixIndex = pathToUse.indexOf(':')
  if (prefixIndex !== -1) {
    prefix = pathToUse.slice(0, prefixIndex + 1)
    if (prefix.includes(FOLDER_SEPARATOR)) {
      prefix = ''
    } else {
      pathToUse = pathToUse.slice(prefixIndex + 1)
    }
  }
  if (pathToUse.startsWith(FOLDER_SEPARATOR)) {
    prefix += FOLDER_SEPARATOR
    pathToUse = pathToUse.slice(1)
  }

  const segments = pathToUse.split(FOLDER_SEPARATOR)
  const kept: string[] = []
  let tops = 0

  for (let i = segments.length - 1; i >= 0; i--) {
    const segment = segments[i]
    if (segment === CURRENT_PATH) continue
    if (segment === TOP_PATH) {
      tops++
      continue
    }
    if (tops > 0) {
      tops--
      continue
    }
    kept.unshift(segment)
  }

  for (let i = 0; i < tops; i++) {
    kept.unshift(TOP_PATH)
  }

  return prefix + kept.join(FOLDER_SEPARATOR)
}

/**
 * Resolve `relativePath` against the directory of `path`.
 *
 * @example
 * ```typescript
 * applyRelativePath('a/b.txt', 'c.txt')  // 'a/c.txt'
 * applyRelativePath('b.txt', 'c.txt')    // 'c.txt'
 * ```
 */
export function applyRelativePath(path: string, relativePath: string): string {
  const separatorIndex = path.lastIndexOf(FOLDER_SEPARATOR)
  if (separatorIndex === -1) {
    return relativePath
  }
  let newPath = path.slice(0, separatorIndex)
  if (!relativePath.startsWith(FOLDER_SEPARATOR)) {
    newPath += FOLDER_SEPARATOR
  }
  return newPath + relativePath
}

/**
 * Last segment of a path, or undefined for an empty path
 */
export function getFilename(path: string): string | undefined {
  if (path === '') return undefined
  return path.slice(path.lastIndexOf(FOLDER_SEPARATOR) + 1)
}

/**
 * Remove exactly one leading separator
 */
export function stripLeadingSlash(path: string): string {
  return path.startsWith(FOLDER_SEPARATOR) ? path.slice(1) : path
}

/**
 * 32-bit string hash (`s[0]*31^(n-1) + ... + s[n-1]`)
 */
export function hashString(value: string): number {
  let hash = 0
  for (let i = 0; i < value.length; i++) {
    hash = ((hash << 5) - hash + value.charCodeAt(i)) | 0
  }
  return hash
}
