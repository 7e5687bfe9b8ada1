/**
 * Glob pattern matching for starglob
 *
 * @module glob
 */

export { translate, hasMagic } from './translate.js'
export {
  compilePattern,
  createMatcherCache,
  defaultMatcherCache,
  MATCHER_CACHE_SIZE,
  type Matcher,
  type MatcherCache,
} from './compile.js'
export { Globber, GLOBSTAR, type GlobMatch, type FilterMatch } from './globber.js'
export {
  glob,
  iglob,
  matchFilter,
  matchExact,
  isMatch,
  type WithMatchesOptions,
  type PathOnlyOptions,
} from './glob.js'
