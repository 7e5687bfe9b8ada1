/**
 * Recursive glob resolution
 *
 * A pattern is resolved right to left: it is split into a directory part and
 * a basename, the directory part is resolved recursively when it contains
 * wildcards, and the basename is matched against each resolved directory.
 * Captures accumulate left to right, directory captures first.
 *
 * `**` is resolved as "this directory and every descendant", collapsed into a
 * single capture holding the relative path. Whether the starting directory
 * itself counts depends on where the `**` sits:
 *
 * - `**\/*.py` - the `**` is part of a directory prefix, so the starting
 *   directory is included and `file.py` at the top level matches.
 * - `b/**` - the `**` is the final component of the caller's pattern, so the
 *   starting directory is excluded and `b/` is never returned.
 *
 * Everything is lazy: directories are listed only when the caller pulls the
 * next match, and abandoning the iteration stops all further I/O.
 *
 * @module glob/globber
 */

import { createConfig, effectiveSeparator, type GlobConfig, type GlobOptions } from '../config.js'
import { EINVAL, isSystemError } from '../errors.js'
import { isHidden, joinPath, normCase, normSeparators, splitPath } from '../path.js'
import { createLogger } from '../../utils/logger.js'
import { compilePattern } from './compile.js'
import { hasMagic } from './translate.js'

const logger = createLogger('[starglob:resolve]')

/** The recursive wildcard segment */
export const GLOBSTAR = '**'

/**
 * A matched path and the text each wildcard matched, left to right.
 */
export interface GlobMatch {
  path: string
  captures: string[]
}

/**
 * A name accepted by {@link Globber.filter} and its captures.
 */
export interface FilterMatch {
  name: string
  captures: string[]
}

function* pathsOf(matches: Iterable<GlobMatch>): Generator<string, void, undefined> {
  for (const match of matches) {
    yield match.path
  }
}

/**
 * Pattern resolver bound to one frozen configuration.
 *
 * @example
 * ```typescript
 * const globber = new Globber({ withMatches: true, sep: '/' })
 * for (const { path, captures } of globber.matches('dir?/a-*')) {
 *   console.log(path, captures) // dir1/a-file ['1', 'file']
 * }
 * ```
 */
export class Globber {
  readonly config: GlobConfig

  constructor(options: GlobOptions = {}) {
    this.config = createConfig(options)
  }

  // ===========================================================================
  // Name matching
  // ===========================================================================

  /**
   * Normalise a name or pattern according to `normPaths`.
   */
  normalize(path: string): string {
    switch (this.config.normPaths) {
      case 'separators':
        return normSeparators(path, effectiveSeparator(this.config))
      case 'normcase':
        return normCase(path, this.config.flavor)
      case 'none':
        return path
    }
  }

  /**
   * Return the names matching `pattern`, with their captures. Both sides are
   * normalised first; captures are normalised, names are returned as given.
   *
   * @example
   * ```typescript
   * globber.filter(['fooABC', 'barABC', 'foo'], 'foo*')
   * // [{ name: 'fooABC', captures: ['ABC'] }, { name: 'foo', captures: [''] }]
   * ```
   */
  filter(names: Iterable<string>, pattern: string): FilterMatch[] {
    return Array.from(this.filterLazy(names, pattern))
  }

  private *filterLazy(names: Iterable<string>, pattern: string): Generator<FilterMatch, void, undefined> {
    const match = compilePattern(this.normalize(pattern), this.config.caseSensitive, this.config.cache)
    for (const name of names) {
      const captures = match(this.normalize(name))
      if (captures !== null) {
        yield { name, captures: captures.map((capture) => this.normalize(capture)) }
      }
    }
  }

  /**
   * Test whether a name matches a pattern without normalising either.
   */
  fnmatchcase(name: string, pattern: string): boolean {
    return compilePattern(pattern, this.config.caseSensitive, this.config.cache)(name) !== null
  }

  /**
   * Test whether a name matches a pattern after normalising both.
   */
  fnmatch(name: string, pattern: string): boolean {
    return this.fnmatchcase(this.normalize(name), this.normalize(pattern))
  }

  // ===========================================================================
  // Resolution
  // ===========================================================================

  /**
   * Lazily resolve a pattern to matches with captures.
   *
   * Each call starts a fresh resolution over the current filesystem state.
   * Results are not sorted.
   *
   * @throws {EINVAL} If the pattern is not a string
   */
  matches(pattern: string): Generator<GlobMatch, void, undefined> {
    if (typeof pattern !== 'string') {
      throw new EINVAL('glob', 'pattern must be a string')
    }
    return this.resolve(pattern, true)
  }

  /**
   * Lazily resolve a pattern to bare paths.
   */
  paths(pattern: string): Generator<string, void, undefined> {
    return pathsOf(this.matches(pattern))
  }

  /**
   * Join a directory and a name, rewriting separators when `sep` is set.
   */
  private join(dirname: string, name: string): string {
    const path = joinPath(dirname, name, this.config.flavor)
    return this.config.sep !== null ? normSeparators(path, this.config.sep) : path
  }

  /**
   * @param isRootCall - true only for the caller's own pattern; recursive
   *   calls resolving a directory prefix pass false
   */
  private *resolve(pattern: string, isRootCall: boolean): Generator<GlobMatch, void, undefined> {
    const { backend } = this.config

    if (!hasMagic(pattern)) {
      if (pattern !== '' && backend.exists(pattern)) {
        yield { path: pattern, captures: [] }
      }
      return
    }

    const { dirname, basename } = splitPath(pattern, this.config.flavor)

    // Never recurse on an unchanged pattern (a drive root split returns itself)
    const directories: Iterable<GlobMatch> =
      dirname !== '' && dirname !== pattern && hasMagic(dirname)
        ? this.resolve(dirname, false)
        : [{ path: dirname, captures: [] }]

    for (const directory of directories) {
      for (const entry of this.resolveBasename(directory.path, basename, !isRootCall)) {
        yield {
          path: this.join(directory.path, entry.name),
          captures: [...directory.captures, ...entry.captures],
        }
      }
    }
  }

  /**
   * Apply a single-segment pattern to the literal directory `dirname`.
   *
   * An empty pattern filters for directories: it is what remains when the
   * caller's pattern ends with a separator.
   *
   * @param globstarWithRoot - whether `**` includes `dirname` itself, as the
   *   empty name
   */
  *resolveBasename(
    dirname: string,
    pattern: string,
    globstarWithRoot: boolean
  ): Generator<FilterMatch, void, undefined> {
    const { backend } = this.config

    if (!hasMagic(pattern)) {
      if (pattern === '') {
        if (dirname !== '' && backend.isDirectory(dirname)) {
          yield { name: '', captures: [] }
        }
      } else if (backend.exists(this.join(dirname, pattern))) {
        yield { name: pattern, captures: [] }
      }
      return
    }

    const directory = dirname === '' ? '.' : dirname

    if (pattern === GLOBSTAR) {
      if (globstarWithRoot) {
        yield { name: '', captures: [''] }
      }
      // Match against '*' so the whole relative path becomes one capture
      yield* this.filterLazy(this.visibleNames(this.walk(directory, '')), '*')
      return
    }

    let names = this.listNames(directory)
    if (!this.config.includeHidden && !isHidden(pattern)) {
      names = names.filter((name) => !isHidden(name))
    }
    yield* this.filterLazy(names, pattern)
  }

  /**
   * List a directory; an unreadable directory contributes no entries.
   */
  private listNames(directory: string): string[] {
    try {
      return Array.from(this.config.backend.list(directory))
    } catch (error) {
      if (isSystemError(error)) {
        logger.debug(`skipping ${directory}: ${error.code}`)
        return []
      }
      throw error
    }
  }

  /**
   * Drop relative names starting with `.` unless `includeHidden` is set.
   * Only the first character counts, so `a/.foo` is kept while `.git/config`
   * is not.
   */
  private *visibleNames(names: Iterable<string>): Generator<string, void, undefined> {
    for (const name of names) {
      if (this.config.includeHidden || !isHidden(name)) {
        yield name
      }
    }
  }

  /**
   * Depth-first, pre-order walk yielding every entry below `top` as a path
   * relative to the walk's starting directory. Hidden directories are walked
   * like any other.
   *
   * Symlinked directories are descended into only with `followSymlinks`.
   */
  private *walk(top: string, relative: string): Generator<string, void, undefined> {
    const { backend, followSymlinks } = this.config
    const names = this.listNames(top)

    for (const name of names) {
      yield this.join(relative, name)
    }

    for (const name of names) {
      const path = this.join(top, name)
      if (!followSymlinks && backend.isSymlink(path)) continue
      if (!backend.isDirectory(path)) continue
      yield* this.walk(path, this.join(relative, name))
    }
  }
}
