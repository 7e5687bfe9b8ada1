/**
 * Glob Configuration Module
 *
 * Every option a glob run recognises, its default, and its validator.
 * Configuration is validated eagerly, before any filesystem access, and
 * frozen for the duration of the run.
 *
 * @module core/config
 */

import { NodeBackend, isGlobBackend, type GlobBackend } from './backend.js'
import { LRUCache } from './cache.js'
import { EINVAL } from './errors.js'
import { separatorOf, type PathFlavor, type Separator } from './path.js'
import { defaultMatcherCache, type MatcherCache } from './glob/compile.js'

/**
 * How names and patterns are normalised before matching.
 *
 * - `'normcase'` - case-normalise the way the path flavour does
 *   (win32: lower-case and `\` separators; posix: unchanged)
 * - `'separators'` - rewrite `/` and `\` to the effective separator
 * - `'none'` - compare verbatim
 */
export type NormPathsMode = 'normcase' | 'separators' | 'none'

const NORM_PATHS_MODES: readonly NormPathsMode[] = ['normcase', 'separators', 'none']

const PATH_FLAVORS: readonly PathFlavor[] = ['posix', 'win32']

const SEPARATORS: readonly Separator[] = ['/', '\\']

/**
 * Resolved glob configuration.
 */
export interface GlobConfig {
  /** Yield `{ path, captures }` records instead of bare paths */
  readonly withMatches: boolean

  /** Let `*` and `?` match names starting with `.` */
  readonly includeHidden: boolean

  /** Descend into symlinked directories while expanding `**` */
  readonly followSymlinks: boolean

  /** Case-sensitive wildcard matching */
  readonly caseSensitive: boolean

  /** Separator override; when set, result paths are rewritten to use it */
  readonly sep: Separator | null

  /** Name and pattern normalisation applied before matching */
  readonly normPaths: NormPathsMode

  /** Path model used to split patterns and join results */
  readonly flavor: PathFlavor

  /** Filesystem capability set */
  readonly backend: GlobBackend

  /** Compiled matcher cache */
  readonly cache: MatcherCache
}

/**
 * Configuration options (partial, for user input)
 */
export interface GlobOptions {
  withMatches?: boolean
  includeHidden?: boolean
  followSymlinks?: boolean
  caseSensitive?: boolean
  sep?: Separator | null
  normPaths?: NormPathsMode
  flavor?: PathFlavor
  backend?: GlobBackend
  /** Working directory for the default Node.js backend */
  cwd?: string
  cache?: MatcherCache
}

const OPTION_NAMES: ReadonlySet<string> = new Set([
  'withMatches',
  'includeHidden',
  'followSymlinks',
  'caseSensitive',
  'sep',
  'normPaths',
  'flavor',
  'backend',
  'cwd',
  'cache',
])

/**
 * The path flavour of the running platform.
 */
export function platformFlavor(): PathFlavor {
  return process.platform === 'win32' ? 'win32' : 'posix'
}

/**
 * Default values for the options that have a fixed default. `caseSensitive`
 * follows the flavour and `backend` is created per configuration.
 */
export const defaultConfig = Object.freeze({
  withMatches: false,
  includeHidden: false,
  followSymlinks: false,
  sep: null,
  normPaths: 'separators',
} as const)

/**
 * Validate boolean value
 */
function validateBoolean(value: unknown, name: string): boolean {
  if (typeof value !== 'boolean') {
    throw new EINVAL('createConfig', `${name} must be a boolean`)
  }
  return value
}

function validateSeparator(sep: unknown): Separator | null {
  if (sep === null) return null
  const found = SEPARATORS.find((candidate) => candidate === sep)
  if (found === undefined) {
    throw new EINVAL('createConfig', `sep must be '/', '\\' or null`)
  }
  return found
}

function validateNormPaths(mode: unknown): NormPathsMode {
  const found = NORM_PATHS_MODES.find((candidate) => candidate === mode)
  if (found === undefined) {
    throw new EINVAL('createConfig', `normPaths must be one of ${NORM_PATHS_MODES.join(', ')}`)
  }
  return found
}

function validateFlavor(flavor: unknown): PathFlavor {
  const found = PATH_FLAVORS.find((candidate) => candidate === flavor)
  if (found === undefined) {
    throw new EINVAL('createConfig', `flavor must be one of ${PATH_FLAVORS.join(', ')}`)
  }
  return found
}

function validateBackend(backend: unknown): GlobBackend {
  if (!isGlobBackend(backend)) {
    throw new EINVAL('createConfig', 'backend must implement list, exists, isDirectory and isSymlink')
  }
  return backend
}

function validateCwd(cwd: unknown): string {
  if (typeof cwd !== 'string' || cwd === '') {
    throw new EINVAL('createConfig', 'cwd must be a non-empty string')
  }
  return cwd
}

function validateCache(cache: unknown): MatcherCache {
  if (!(cache instanceof LRUCache)) {
    throw new EINVAL('createConfig', 'cache must be an LRUCache')
  }
  return cache
}

/**
 * Create a new glob configuration
 *
 * Creates a validated and frozen configuration object.
 * Any invalid option, unknown option name, or unsupported combination
 * throws EINVAL.
 *
 * @throws {EINVAL} If any option is invalid
 *
 * @example
 * ```typescript
 * // Use all defaults
 * const config = createConfig()
 *
 * // Captures, forward slashes in results
 * const config = createConfig({ withMatches: true, sep: '/' })
 *
 * // Glob another directory on disk
 * const config = createConfig({ cwd: '/project' })
 * ```
 */
export function createConfig(options: GlobOptions = {}): GlobConfig {
  if (typeof options !== 'object' || options === null) {
    throw new EINVAL('createConfig', 'options must be an object')
  }

  for (const name of Object.keys(options)) {
    if (!OPTION_NAMES.has(name)) {
      throw new EINVAL('createConfig', `unknown option ${name}`)
    }
  }

  if (options.cwd !== undefined && options.backend !== undefined) {
    throw new EINVAL('createConfig', 'cwd cannot be combined with a custom backend')
  }

  const flavor =
    options.flavor !== undefined
      ? validateFlavor(options.flavor)
      : platformFlavor()

  const config: GlobConfig = {
    withMatches:
      options.withMatches !== undefined
        ? validateBoolean(options.withMatches, 'withMatches')
        : defaultConfig.withMatches,

    includeHidden:
      options.includeHidden !== undefined
        ? validateBoolean(options.includeHidden, 'includeHidden')
        : defaultConfig.includeHidden,

    followSymlinks:
      options.followSymlinks !== undefined
        ? validateBoolean(options.followSymlinks, 'followSymlinks')
        : defaultConfig.followSymlinks,

    caseSensitive:
      options.caseSensitive !== undefined
        ? validateBoolean(options.caseSensitive, 'caseSensitive')
        : flavor !== 'win32',

    sep:
      options.sep !== undefined
        ? validateSeparator(options.sep)
        : defaultConfig.sep,

    normPaths:
      options.normPaths !== undefined
        ? validateNormPaths(options.normPaths)
        : defaultConfig.normPaths,

    flavor,

    backend:
      options.backend !== undefined
        ? validateBackend(options.backend)
        : new NodeBackend({
            cwd: options.cwd !== undefined ? validateCwd(options.cwd) : undefined,
          }),

    cache:
      options.cache !== undefined
        ? validateCache(options.cache)
        : defaultMatcherCache,
  }

  return Object.freeze(config)
}

/**
 * The separator result paths and normalised names use.
 */
export function effectiveSeparator(config: GlobConfig): Separator {
  return config.sep ?? separatorOf(config.flavor)
}
