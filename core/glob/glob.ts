/**
 * Glob file matching for starglob
 *
 * Public entry points over {@link Globber}. Each call builds and validates
 * its configuration up front, so a bad option fails before any filesystem
 * access.
 *
 * ## Usage Examples
 *
 * @example Basic glob
 * ```typescript
 * // Every .py file below the working directory, including the top level
 * const files = glob('**\/*.py')
 *
 * // Only directories
 * const dirs = glob('**\/')
 * ```
 *
 * @example Captures
 * ```typescript
 * glob('dir?/a-*', { withMatches: true })
 * // [{ path: 'dir1/a-file', captures: ['1', 'file'] }]
 * ```
 *
 * @example Streaming with early termination
 * ```typescript
 * for (const file of iglob('**\/*.log', { cwd: '/var/log' })) {
 *   if (isWhatWeWant(file)) break // no further directories are listed
 * }
 * ```
 *
 * @module glob
 */

import type { GlobOptions } from '../config.js'
import { Globber, type FilterMatch, type GlobMatch } from './globber.js'

/**
 * Options that turn on capture reporting.
 */
export type WithMatchesOptions = GlobOptions & { withMatches: true }

/**
 * Options that leave capture reporting off.
 */
export type PathOnlyOptions = GlobOptions & { withMatches?: false }

/**
 * Return an iterator yielding the paths matching a pattern.
 *
 * With `withMatches`, each result is a {@link GlobMatch} holding the text
 * every wildcard matched. Results come in filesystem order, not sorted.
 *
 * @throws {EINVAL} If an option is invalid or the pattern is not a string
 */
export function iglob(pattern: string, options: WithMatchesOptions): Generator<GlobMatch, void, undefined>
export function iglob(pattern: string, options?: PathOnlyOptions): Generator<string, void, undefined>
export function iglob(pattern: string, options?: GlobOptions): Generator<string | GlobMatch, void, undefined>
export function iglob(pattern: string, options: GlobOptions = {}): Generator<string | GlobMatch, void, undefined> {
  const globber = new Globber(options)
  return globber.config.withMatches ? globber.matches(pattern) : globber.paths(pattern)
}

/**
 * Return the list of paths matching a pattern.
 *
 * @throws {EINVAL} If an option is invalid or the pattern is not a string
 *
 * @example
 * ```typescript
 * glob('src/*.ts', { cwd: '/project' })  // ['src/index.ts', 'src/cli.ts']
 * ```
 */
export function glob(pattern: string, options: WithMatchesOptions): GlobMatch[]
export function glob(pattern: string, options?: PathOnlyOptions): string[]
export function glob(pattern: string, options?: GlobOptions): Array<string | GlobMatch>
export function glob(pattern: string, options: GlobOptions = {}): Array<string | GlobMatch> {
  return Array.from(iglob(pattern, options))
}

/**
 * Return the names matching a single-segment pattern, with captures.
 * Names and pattern are normalised according to `normPaths` first.
 *
 * @example
 * ```typescript
 * matchFilter(['fooA', 'fooB', 'fooC'], 'foo[!AB]')
 * // [{ name: 'fooC', captures: ['C'] }]
 * ```
 */
export function matchFilter(names: Iterable<string>, pattern: string, options?: GlobOptions): FilterMatch[] {
  return new Globber(options).filter(names, pattern)
}

/**
 * Test whether a name matches a pattern exactly, without normalisation.
 * Case sensitivity still follows `caseSensitive`.
 */
export function matchExact(name: string, pattern: string, options?: GlobOptions): boolean {
  return new Globber(options).fnmatchcase(name, pattern)
}

/**
 * Test whether a name matches a pattern after normalising both.
 *
 * @example
 * ```typescript
 * isMatch('a\\b.txt', 'a/*.txt', { sep: '/' })  // true
 * ```
 */
export function isMatch(name: string, pattern: string, options?: GlobOptions): boolean {
  return new Globber(options).fnmatch(name, pattern)
}
