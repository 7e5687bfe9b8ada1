/**
 * starglob core
 *
 * @module core
 */

export * from './glob/index.js'
export {
  createConfig,
  defaultConfig,
  effectiveSeparator,
  platformFlavor,
  type GlobConfig,
  type GlobOptions,
  type NormPathsMode,
} from './config.js'
export { NodeBackend, isGlobBackend, type GlobBackend, type NodeBackendOptions } from './backend.js'
export { MemoryBackend, type MemoryBackendOptions } from './mock-backend.js'
export { LRUCache, type CacheStats, type LRUCacheOptions } from './cache.js'
export {
  splitPath,
  joinPath,
  splitDrive,
  separatorOf,
  normSeparators,
  normCase,
  isHidden,
  type PathFlavor,
  type Separator,
  type SplitPath,
} from './path.js'
export {
  FSError,
  ENOENT,
  ENOTDIR,
  EACCES,
  EINVAL,
  ELOOP,
  isSystemError,
  hasErrorCode,
  createError,
  type ErrorCode,
} from './errors.js'
