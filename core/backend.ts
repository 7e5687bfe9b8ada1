/**
 * GlobBackend Interface
 *
 * The filesystem capability set the resolver works through. The resolver
 * never touches storage except through these four operations, so any
 * storage (the real filesystem, an in-memory tree, a remote store with a
 * synchronous cache) can be globbed by implementing them.
 *
 * Implementations:
 * - `NodeBackend` - Node.js `fs` module
 * - `MemoryBackend` - In-memory tree for testing and embedding
 *
 * @module backend
 */

import { opendirSync, lstatSync, statSync } from 'node:fs'
import { isAbsolute, resolve } from 'node:path'

// =============================================================================
// GlobBackend Interface
// =============================================================================

/**
 * Synchronous filesystem capability set.
 *
 * @example
 * ```typescript
 * const backend: GlobBackend = {
 *   list: (dir) => index.get(dir) ?? [],
 *   exists: (path) => paths.has(path),
 *   isDirectory: (path) => index.has(path),
 *   isSymlink: () => false,
 * }
 * ```
 */
export interface GlobBackend {
  /**
   * List the entry names of a directory (not including `.` and `..`).
   *
   * Implementations that hold a handle while iterating must release it when
   * iteration ends early.
   *
   * @throws ENOENT, ENOTDIR, EACCES (or any error with a string `code`)
   *   when the directory cannot be read
   */
  list(directory: string): Iterable<string>

  /**
   * Check whether a path exists without following a final symlink.
   * Broken symlinks exist.
   */
  exists(path: string): boolean

  /**
   * Check whether a path is a directory, following symlinks.
   */
  isDirectory(path: string): boolean

  /**
   * Check whether a path is a symbolic link.
   */
  isSymlink(path: string): boolean
}

/**
 * Check that a value implements {@link GlobBackend}.
 */
export function isGlobBackend(value: unknown): value is GlobBackend {
  if (typeof value !== 'object' || value === null) return false
  return (
    'list' in value && typeof value.list === 'function' &&
    'exists' in value && typeof value.exists === 'function' &&
    'isDirectory' in value && typeof value.isDirectory === 'function' &&
    'isSymlink' in value && typeof value.isSymlink === 'function'
  )
}

// =============================================================================
// NodeBackend
// =============================================================================

/**
 * Options for {@link NodeBackend}.
 */
export interface NodeBackendOptions {
  /** Directory relative paths are resolved against (default: process cwd) */
  cwd?: string
}

/**
 * GlobBackend over the Node.js `fs` module.
 *
 * @example
 * ```typescript
 * const backend = new NodeBackend({ cwd: '/project' })
 * [...backend.list('src')]  // ['index.ts', 'utils']
 * ```
 */
export class NodeBackend implements GlobBackend {
  readonly cwd: string | undefined

  constructor(options: NodeBackendOptions = {}) {
    this.cwd = options.cwd
  }

  private resolvePath(path: string): string {
    if (this.cwd === undefined || isAbsolute(path)) return path
    // resolve() would drop a trailing separator, which must keep forcing
    // a directory lookup
    const trailing = /[\\/]$/.test(path) ? '/' : ''
    return resolve(this.cwd, path) + trailing
  }

  *list(directory: string): Generator<string, void, undefined> {
    const dir = opendirSync(this.resolvePath(directory))
    try {
      let entry = dir.readSync()
      while (entry !== null) {
        yield entry.name
        entry = dir.readSync()
      }
    } finally {
      dir.closeSync()
    }
  }

  exists(path: string): boolean {
    if (path === '') return false
    try {
      return lstatSync(this.resolvePath(path), { throwIfNoEntry: false }) !== undefined
    } catch {
      // ENOTDIR, EACCES on a parent, ELOOP: the path cannot be reached
      return false
    }
  }

  isDirectory(path: string): boolean {
    if (path === '') return false
    try {
      return statSync(this.resolvePath(path), { throwIfNoEntry: false })?.isDirectory() ?? false
    } catch {
      return false
    }
  }

  isSymlink(path: string): boolean {
    if (path === '') return false
    try {
      return lstatSync(this.resolvePath(path), { throwIfNoEntry: false })?.isSymbolicLink() ?? false
    } catch {
      return false
    }
  }
}
