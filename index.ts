/**
 * starglob - shell-style globbing with recursive `**` and wildcard captures
 *
 * @example
 * ```typescript
 * import { glob } from 'starglob'
 *
 * glob('**\/*.py', { withMatches: true })
 * // [{ path: 'a/bar.py', captures: ['a', 'bar'] }, ...]
 * ```
 *
 * @packageDocumentation
 */

export * from './core/index.js'
export { createLogger, logger, type Logger } from './utils/logger.js'
