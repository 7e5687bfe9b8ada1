/**
 * Path utilities for starglob
 *
 * Pattern and path strings are split and joined here with the rules of a
 * shell path model: `joinPath('a', '')` keeps a trailing separator, and
 * `splitPath` keeps the root of an absolute path in the directory part.
 * Two flavours are supported: `posix` (separator `/`) and `win32`
 * (separators `\` and `/`, optional `X:` drive prefix).
 *
 * @module path
 * @example
 * ```typescript
 * splitPath('src/*.ts', 'posix')   // { dirname: 'src', basename: '*.ts' }
 * joinPath('a', 'b', 'posix')       // 'a/b'
 * joinPath('a', '', 'posix')        // 'a/'
 * ```
 */

// =============================================================================
// TYPES
// =============================================================================

/** Path model used to split and join patterns */
export type PathFlavor = 'posix' | 'win32'

/** A path separator character */
export type Separator = '/' | '\\'

/**
 * Result of splitting a path at its last separator.
 */
export interface SplitPath {
  /** Everything before the last separator, trailing separators stripped */
  dirname: string
  /** Everything after the last separator */
  basename: string
}

// =============================================================================
// CONSTANTS
// =============================================================================

const DRIVE_PATTERN = /^[A-Za-z]:/

const ANY_SEPARATOR = /[\\/]/g

// =============================================================================
// HELPERS
// =============================================================================

/**
 * The primary separator of a flavour.
 */
export function separatorOf(flavor: PathFlavor): Separator {
  return flavor === 'win32' ? '\\' : '/'
}

function isSeparator(char: string | undefined, flavor: PathFlavor): boolean {
  if (char === '/') return true
  return flavor === 'win32' && char === '\\'
}

/**
 * Split a win32 drive prefix (`C:`) off a path. Always `['', path]` for posix.
 */
export function splitDrive(path: string, flavor: PathFlavor): [drive: string, rest: string] {
  if (flavor === 'win32' && DRIVE_PATTERN.test(path)) {
    return [path.slice(0, 2), path.slice(2)]
  }
  return ['', path]
}

// =============================================================================
// SPLIT / JOIN
// =============================================================================

/**
 * Split a path into directory and final component.
 *
 * If there is no separator the directory part is empty. Trailing separators
 * are stripped from the directory part unless it consists only of
 * separators (the filesystem root).
 *
 * @example
 * ```typescript
 * splitPath('a/b/c', 'posix')  // { dirname: 'a/b', basename: 'c' }
 * splitPath('**\/', 'posix')    // { dirname: '**', basename: '' }
 * splitPath('/x', 'posix')     // { dirname: '/', basename: 'x' }
 * splitPath('C:*', 'win32')    // { dirname: 'C:', basename: '*' }
 * ```
 */
export function splitPath(path: string, flavor: PathFlavor): SplitPath {
  const [drive, rest] = splitDrive(path, flavor)

  let i = rest.length
  while (i > 0 && !isSeparator(rest[i - 1], flavor)) {
    i--
  }

  const head = rest.slice(0, i)
  const basename = rest.slice(i)

  let end = head.length
  while (end > 0 && isSeparator(head[end - 1], flavor)) {
    end--
  }
  const stripped = end > 0 ? head.slice(0, end) : head

  return { dirname: drive + stripped, basename }
}

/**
 * Join two path components.
 *
 * An absolute second component replaces the first. An empty second component
 * yields the first with a trailing separator, which is how a pattern ending in
 * a separator produces directory paths.
 */
export function joinPath(base: string, name: string, flavor: PathFlavor): string {
  const sep = separatorOf(flavor)
  const [nameDrive, nameRest] = splitDrive(name, flavor)

  if (nameDrive !== '') return name

  if (isSeparator(nameRest[0], flavor)) {
    const [baseDrive] = splitDrive(base, flavor)
    return baseDrive + name
  }

  if (base === '' || isSeparator(base[base.length - 1], flavor)) {
    return base + name
  }

  const [baseDrive, baseRest] = splitDrive(base, flavor)
  if (baseDrive !== '' && baseRest === '') {
    return base + name
  }

  return base + sep + name
}

// =============================================================================
// NORMALIZATION
// =============================================================================

/**
 * Rewrite every `/` and `\` to `sep`.
 */
export function normSeparators(path: string, sep: Separator): string {
  return path.replace(ANY_SEPARATOR, sep)
}

/**
 * Case-normalize a path the way the flavour's filesystem compares names:
 * identity on posix, lower-case with `\` separators on win32.
 */
export function normCase(path: string, flavor: PathFlavor): string {
  if (flavor === 'win32') {
    return path.replace(ANY_SEPARATOR, '\\').toLowerCase()
  }
  return path
}

/**
 * Check if a name is a dotfile/dotdir
 */
export function isHidden(name: string): boolean {
  return name.startsWith('.')
}
