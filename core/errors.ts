/**
 * @fileoverview POSIX-style error classes for starglob
 *
 * Backends report filesystem failures with these classes, and configuration
 * validation throws `EINVAL`. Messages follow the Node.js fs convention:
 * `CODE: message, syscall 'path'`.
 *
 * @example
 * ```typescript
 * import { ENOENT, hasErrorCode } from 'starglob'
 *
 * throw new ENOENT('scandir', '/missing')
 * // ENOENT: no such file or directory, scandir '/missing'
 * ```
 *
 * @module errors
 */

// ============================================================================
// Error Code Definitions
// ============================================================================

const ERROR_CODES = {
  ENOENT: { errno: -2, message: 'no such file or directory' },
  ENOTDIR: { errno: -20, message: 'not a directory' },
  EACCES: { errno: -13, message: 'permission denied' },
  EINVAL: { errno: -22, message: 'invalid argument' },
  ELOOP: { errno: -40, message: 'too many levels of symbolic links' },
} as const

/**
 * Union of the error codes starglob raises itself.
 */
export type ErrorCode = keyof typeof ERROR_CODES

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base class for all filesystem and configuration errors.
 *
 * @example
 * ```typescript
 * const error = new FSError('ENOENT', -2, 'no such file or directory', 'scandir', '/a')
 * error.message // "ENOENT: no such file or directory, scandir '/a'"
 * ```
 */
export class FSError extends Error {
  /** POSIX error code string (e.g., 'ENOENT') */
  code: string

  /** Numeric errno value (negative, following Node.js convention) */
  errno: number

  /** Operation that triggered the error (e.g., 'scandir', 'createConfig') */
  syscall?: string

  /** Path or subject involved in the operation */
  path?: string

  constructor(code: string, errno: number, message: string, syscall?: string, path?: string) {
    const fullMessage = `${code}: ${message}${syscall ? `, ${syscall}` : ''}${path ? ` '${path}'` : ''}`
    super(fullMessage)
    this.name = 'FSError'
    this.code = code
    this.errno = errno
    this.syscall = syscall
    this.path = path
  }
}

// ============================================================================
// Error Class Factory
// ============================================================================

/**
 * @internal
 */
function createErrorClass<T extends ErrorCode>(code: T) {
  const { errno, message } = ERROR_CODES[code]

  return class extends FSError {
    constructor(syscall?: string, path?: string) {
      super(code, errno, message, syscall, path)
      this.name = code
    }
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

/**
 * ENOENT - No such file or directory.
 *
 * @example
 * ```typescript
 * throw new ENOENT('scandir', '/missing')
 * ```
 */
export class ENOENT extends createErrorClass('ENOENT') {}

/**
 * ENOTDIR - A path component used as a directory is not one.
 * Raised when listing a file, which happens routinely while resolving
 * wildcard directory prefixes.
 */
export class ENOTDIR extends createErrorClass('ENOTDIR') {}

/**
 * EACCES - Permission denied, e.g. listing an unreadable directory.
 */
export class EACCES extends createErrorClass('EACCES') {}

/**
 * EINVAL - Invalid argument.
 *
 * Thrown for invalid glob configuration and for non-string patterns.
 *
 * @example
 * ```typescript
 * throw new EINVAL('createConfig', 'withMatches must be a boolean')
 * // EINVAL: invalid argument, createConfig 'withMatches must be a boolean'
 * ```
 */
export class EINVAL extends createErrorClass('EINVAL') {}

/**
 * ELOOP - Too many levels of symbolic links.
 */
export class ELOOP extends createErrorClass('ELOOP') {}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Checks whether a thrown value looks like a system error: anything with a
 * string `code`, which covers both {@link FSError} and the errors Node's
 * `fs` module throws.
 */
export function isSystemError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string'
  )
}

/**
 * Checks if an error has a specific error code.
 * Works with any error object that has a `code` property.
 *
 * @example
 * ```typescript
 * if (hasErrorCode(err, 'EACCES')) {
 *   // skip unreadable directory
 * }
 * ```
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isSystemError(error) && error.code === code
}

/**
 * Creates a new error from a code, syscall, and path.
 *
 * @example
 * ```typescript
 * throw createError('ENOTDIR', 'scandir', '/file.txt')
 * ```
 */
export function createError(code: ErrorCode, syscall?: string, path?: string): FSError {
  const ErrorClass = {
    ENOENT,
    ENOTDIR,
    EACCES,
    EINVAL,
    ELOOP,
  }[code]

  return new ErrorClass(syscall, path)
}
