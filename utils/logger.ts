/**
 * Console logging for starglob
 *
 * The resolver reports non-fatal events here, chiefly directories it skipped
 * because they could not be listed (EACCES, ENOENT, ELOOP). Those are debug
 * messages, silent unless `STARGLOB_DEBUG` is set in the environment.
 */

export interface Logger {
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
  /** Printed only while `STARGLOB_DEBUG` is set */
  debug: (...args: unknown[]) => void
}

/** Read on every call so the variable can be toggled at run time */
function debugEnabled(): boolean {
  return typeof process !== 'undefined' && Boolean(process.env?.STARGLOB_DEBUG)
}

/**
 * Create a logger whose messages all start with `prefix`.
 *
 * @example
 * ```typescript
 * const logger = createLogger('[starglob:resolve]')
 * logger.debug(`skipping ${directory}: ${error.code}`)
 * // STARGLOB_DEBUG=1 prints: [starglob:resolve] skipping locked: EACCES
 * ```
 */
export function createLogger(prefix: string): Logger {
  return {
    info: (...args) => console.info(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
    debug: (...args) => {
      if (debugEnabled()) {
        console.debug(prefix, ...args)
      }
    },
  }
}

/** Logger for messages that belong to no particular component */
export const logger: Logger = createLogger('[starglob]')
