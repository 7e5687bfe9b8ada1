/**
 * Compiled segment matchers with a bounded LRU cache
 *
 * @module glob/compile
 */

import { LRUCache } from '../cache.js'
import { hasMagic, translate } from './translate.js'

/**
 * Matches one name against a compiled segment pattern.
 * Returns the text captured by each wildcard, in pattern order, or `null`.
 */
export type Matcher = (name: string) => string[] | null

/**
 * Cache of compiled matchers keyed by case flag and segment text.
 */
export type MatcherCache = LRUCache<string, Matcher>

/** Capacity of the default matcher cache */
export const MATCHER_CACHE_SIZE = 256

/**
 * Create a new, empty matcher cache.
 *
 * Pass one to a `Globber` to keep its compiled patterns apart from the
 * shared {@link defaultMatcherCache}.
 */
export function createMatcherCache(maxEntries: number = MATCHER_CACHE_SIZE): MatcherCache {
  return new LRUCache<string, Matcher>({ maxEntries })
}

/**
 * Matcher cache shared by every caller that does not supply its own.
 */
export const defaultMatcherCache: MatcherCache = createMatcherCache()

function cacheKey(pattern: string, caseSensitive: boolean): string {
  return (caseSensitive ? 's:' : 'i:') + pattern
}

function buildMatcher(pattern: string, caseSensitive: boolean): Matcher {
  // Literal segments compare directly and capture nothing
  if (!hasMagic(pattern)) {
    if (caseSensitive) {
      return (name) => (name === pattern ? [] : null)
    }
    const folded = pattern.toLowerCase()
    return (name) => (name.toLowerCase() === folded ? [] : null)
  }

  const regex = new RegExp(translate(pattern), caseSensitive ? 's' : 'is')
  return (name) => {
    const match = regex.exec(name)
    return match === null ? null : match.slice(1)
  }
}

/**
 * Compile a segment pattern, reusing a cached matcher when one exists for the
 * same `(pattern, caseSensitive)` pair.
 *
 * @example
 * ```typescript
 * const match = compilePattern('dir?', true)
 * match('dir1')   // ['1']
 * match('dir22')  // null
 * ```
 */
export function compilePattern(
  pattern: string,
  caseSensitive: boolean,
  cache: MatcherCache = defaultMatcherCache
): Matcher {
  return cache.getOrCreate(cacheKey(pattern, caseSensitive), () =>
    buildMatcher(pattern, caseSensitive)
  )
}
