/**
 * MemoryBackend - in-memory GlobBackend implementation.
 *
 * Supports:
 * - Files and directories, listed in insertion order
 * - Symbolic links (relative or absolute targets, ELOOP after 40 hops)
 * - Unreadable directories (listing throws EACCES)
 * - Relative paths resolved against a configurable cwd
 * - Open listing handle tracking, to check that abandoned iterations close
 *
 * @module mock-backend
 */

import type { GlobBackend } from './backend.js'
import { createError, type ErrorCode } from './errors.js'

// =============================================================================
// Node Types
// =============================================================================

interface FileNode {
  kind: 'file'
}

interface DirectoryNode {
  kind: 'directory'
  entries: Map<string, MemoryNode>
  readable: boolean
}

interface SymlinkNode {
  kind: 'symlink'
  target: string
}

type MemoryNode = FileNode | DirectoryNode | SymlinkNode

type Lookup = { node: MemoryNode } | { error: ErrorCode }

/** Linux gives up after this many symlink traversals in one lookup */
const MAX_SYMLINK_HOPS = 40

/**
 * Options for {@link MemoryBackend}.
 */
export interface MemoryBackendOptions {
  /** Absolute directory relative paths are resolved against (default: '/') */
  cwd?: string
}

function createDirectory(): DirectoryNode {
  return { kind: 'directory', entries: new Map(), readable: true }
}

function toComponents(path: string): string[] {
  return path.split('/').filter((part) => part !== '' && part !== '.')
}

// =============================================================================
// MemoryBackend
// =============================================================================

/**
 * In-memory filesystem tree.
 *
 * @example
 * ```typescript
 * const backend = MemoryBackend.fromPaths(['a/', 'a/bar.py', 'file.py'])
 * backend.symlink('a', 'link-to-a')
 * backend.setReadable('a', false)
 * ```
 */
export class MemoryBackend implements GlobBackend {
  private root: DirectoryNode = createDirectory()
  private readonly cwd: string
  private handles = 0
  private listings = 0

  constructor(options: MemoryBackendOptions = {}) {
    const cwd = options.cwd ?? '/'
    if (!cwd.startsWith('/')) {
      throw new Error(`MemoryBackend cwd must be absolute: ${cwd}`)
    }
    this.cwd = cwd
  }

  /**
   * Build a backend from a list of paths. Paths ending in `/` become
   * directories, everything else becomes a file; parents are created.
   */
  static fromPaths(paths: Iterable<string>, options?: MemoryBackendOptions): MemoryBackend {
    const backend = new MemoryBackend(options)
    for (const path of paths) {
      if (path.endsWith('/')) {
        backend.mkdir(path)
      } else {
        backend.writeFile(path)
      }
    }
    return backend
  }

  /** Number of listings currently being iterated */
  get openHandles(): number {
    return this.handles
  }

  /** Total number of listings started */
  get listCount(): number {
    return this.listings
  }

  // ===========================================================================
  // Tree construction
  // ===========================================================================

  private absolute(path: string): string {
    if (path.startsWith('/')) return path
    return this.cwd + '/' + path
  }

  /**
   * Walk to the parent of `path`, creating missing directories.
   */
  private ensureParent(path: string): { parent: DirectoryNode; name: string } {
    const parts = toComponents(this.absolute(path))
    const name = parts.pop()
    if (name === undefined || name === '..') {
      throw createError('EINVAL', 'create', path)
    }

    let current = this.root
    for (const part of parts) {
      const next = current.entries.get(part)
      if (next === undefined) {
        const created = createDirectory()
        current.entries.set(part, created)
        current = created
      } else if (next.kind === 'directory') {
        current = next
      } else {
        throw createError('ENOTDIR', 'mkdir', path)
      }
    }
    return { parent: current, name }
  }

  /**
   * Create a directory and any missing parents. Existing directories are kept.
   */
  mkdir(path: string): this {
    const { parent, name } = this.ensureParent(path)
    const existing = parent.entries.get(name)
    if (existing === undefined) {
      parent.entries.set(name, createDirectory())
    } else if (existing.kind !== 'directory') {
      throw createError('ENOTDIR', 'mkdir', path)
    }
    return this
  }

  /**
   * Create an empty file, creating missing parents.
   */
  writeFile(path: string): this {
    const { parent, name } = this.ensureParent(path)
    const existing = parent.entries.get(name)
    if (existing?.kind === 'directory') {
      throw createError('EINVAL', 'open', path)
    }
    parent.entries.set(name, { kind: 'file' })
    return this
  }

  /**
   * Create a symbolic link at `path` pointing to `target`. Relative targets
   * resolve against the link's own directory.
   */
  symlink(target: string, path: string): this {
    const { parent, name } = this.ensureParent(path)
    parent.entries.set(name, { kind: 'symlink', target })
    return this
  }

  /**
   * Mark a directory readable or unreadable. Listing an unreadable directory
   * throws EACCES; its entries can still be reached by full path.
   */
  setReadable(path: string, readable: boolean): this {
    const found = this.lookup(path, true)
    if ('error' in found) {
      throw createError(found.error, 'chmod', path)
    }
    if (found.node.kind !== 'directory') {
      throw createError('ENOTDIR', 'chmod', path)
    }
    found.node.readable = readable
    return this
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  /**
   * Resolve a path to a node. Intermediate symlinks are always followed; the
   * final one only when `followFinal` is set or the path ends with `/`, in
   * which case the result must also be a directory.
   */
  private lookup(path: string, followFinal: boolean): Lookup {
    if (path === '') return { error: 'ENOENT' }

    const mustBeDirectory = path.length > 1 && path.endsWith('/')
    const follow = followFinal || mustBeDirectory

    let parts = toComponents(this.absolute(path))
    let stack: DirectoryNode[] = [this.root]
    let hops = 0
    let i = 0
    let resolved: MemoryNode | undefined

    while (i < parts.length) {
      const part = parts[i]
      const current = stack[stack.length - 1]
      const isLast = i === parts.length - 1

      if (part === undefined || current === undefined) break

      if (part === '..') {
        if (stack.length > 1) stack.pop()
        i++
        continue
      }

      const child = current.entries.get(part)
      if (child === undefined) return { error: 'ENOENT' }

      if (child.kind === 'symlink' && (!isLast || follow)) {
        if (++hops > MAX_SYMLINK_HOPS) return { error: 'ELOOP' }
        if (child.target.startsWith('/')) stack = [this.root]
        parts = [...toComponents(child.target), ...parts.slice(i + 1)]
        i = 0
        continue
      }

      if (isLast) {
        resolved = child
        break
      }

      if (child.kind !== 'directory') return { error: 'ENOTDIR' }
      stack.push(child)
      i++
    }

    const node = resolved ?? stack[stack.length - 1]
    if (node === undefined) return { error: 'ENOENT' }
    if (mustBeDirectory && node.kind !== 'directory') return { error: 'ENOTDIR' }
    return { node }
  }

  // ===========================================================================
  // GlobBackend
  // ===========================================================================

  *list(directory: string): Generator<string, void, undefined> {
    const found = this.lookup(directory, true)
    if ('error' in found) {
      throw createError(found.error, 'scandir', directory)
    }
    const { node } = found
    if (node.kind !== 'directory') {
      throw createError('ENOTDIR', 'scandir', directory)
    }
    if (!node.readable) {
      throw createError('EACCES', 'scandir', directory)
    }

    this.listings++
    this.handles++
    try {
      for (const name of [...node.entries.keys()]) {
        yield name
      }
    } finally {
      this.handles--
    }
  }

  exists(path: string): boolean {
    return 'node' in this.lookup(path, false)
  }

  isDirectory(path: string): boolean {
    const found = this.lookup(path, true)
    return 'node' in found && found.node.kind === 'directory'
  }

  isSymlink(path: string): boolean {
    if (path.endsWith('/')) return false
    const found = this.lookup(path, false)
    return 'node' in found && found.node.kind === 'symlink'
  }
}
