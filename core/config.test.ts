/**
 * Tests for glob configuration
 */

import { describe, expect, it } from 'vitest'
import { createConfig, effectiveSeparator, platformFlavor } from './config.js'
import { NodeBackend } from './backend.js'
import { MemoryBackend } from './mock-backend.js'
import { EINVAL } from './errors.js'
import { createMatcherCache, defaultMatcherCache } from './glob/compile.js'

describe('GlobConfig', () => {
  describe('Default Configuration', () => {
    it('should have valid defaults when created with no options', () => {
      const config = createConfig()

      expect(config.withMatches).toBe(false)
      expect(config.includeHidden).toBe(false)
      expect(config.followSymlinks).toBe(false)
      expect(config.sep).toBeNull()
      expect(config.normPaths).toBe('separators')
      expect(config.flavor).toBe(platformFlavor())
      expect(config.caseSensitive).toBe(platformFlavor() !== 'win32')
      expect(config.cache).toBe(defaultMatcherCache)
      expect(config.backend).toBeInstanceOf(NodeBackend)
    })

    it('should be frozen', () => {
      expect(Object.isFrozen(createConfig())).toBe(true)
    })

    it('should default case sensitivity from the flavour', () => {
      expect(createConfig({ flavor: 'win32' }).caseSensitive).toBe(false)
      expect(createConfig({ flavor: 'posix' }).caseSensitive).toBe(true)
      expect(createConfig({ flavor: 'win32', caseSensitive: true }).caseSensitive).toBe(true)
    })
  })

  describe('Custom Configuration', () => {
    it('should accept every option', () => {
      const backend = new MemoryBackend()
      const cache = createMatcherCache(8)
      const config = createConfig({
        withMatches: true,
        includeHidden: true,
        followSymlinks: true,
        caseSensitive: false,
        sep: '/',
        normPaths: 'none',
        flavor: 'posix',
        backend,
        cache,
      })

      expect(config.withMatches).toBe(true)
      expect(config.includeHidden).toBe(true)
      expect(config.followSymlinks).toBe(true)
      expect(config.caseSensitive).toBe(false)
      expect(config.sep).toBe('/')
      expect(config.normPaths).toBe('none')
      expect(config.backend).toBe(backend)
      expect(config.cache).toBe(cache)
    })

    it('should pass cwd to the default backend', () => {
      const config = createConfig({ cwd: '/srv' })
      expect(config.backend).toBeInstanceOf(NodeBackend)
      expect(config.backend instanceof NodeBackend && config.backend.cwd).toBe('/srv')
    })
  })

  describe('Validation', () => {
    it('should throw EINVAL for non-boolean withMatches', () => {
      // @ts-expect-error - Testing invalid withMatches
      expect(() => createConfig({ withMatches: 'yes' })).toThrow(EINVAL)
    })

    it('should throw EINVAL for an unknown separator', () => {
      // @ts-expect-error - Testing invalid sep
      expect(() => createConfig({ sep: ':' })).toThrow(EINVAL)
    })

    it('should throw EINVAL for an unknown normPaths mode', () => {
      // @ts-expect-error - Testing invalid normPaths
      expect(() => createConfig({ normPaths: 'lower' })).toThrow(EINVAL)
    })

    it('should throw EINVAL for an unknown flavour', () => {
      // @ts-expect-error - Testing invalid flavor
      expect(() => createConfig({ flavor: 'darwin' })).toThrow(EINVAL)
    })

    it('should throw EINVAL for an unknown option', () => {
      // @ts-expect-error - Testing unknown option
      expect(() => createConfig({ recursive: true })).toThrow('unknown option recursive')
    })

    it('should throw EINVAL for a backend missing operations', () => {
      // @ts-expect-error - Testing incomplete backend
      expect(() => createConfig({ backend: { list: () => [] } })).toThrow(EINVAL)
    })

    it('should throw EINVAL for an empty cwd', () => {
      expect(() => createConfig({ cwd: '' })).toThrow(EINVAL)
    })

    it('should reject cwd combined with a custom backend', () => {
      expect(() => createConfig({ cwd: '/x', backend: new MemoryBackend() })).toThrow(
        "EINVAL: invalid argument, createConfig 'cwd cannot be combined with a custom backend'"
      )
    })
  })

  describe('effectiveSeparator', () => {
    it('should prefer the override', () => {
      expect(effectiveSeparator(createConfig({ flavor: 'win32', sep: '/' }))).toBe('/')
      expect(effectiveSeparator(createConfig({ flavor: 'win32' }))).toBe('\\')
      expect(effectiveSeparator(createConfig({ flavor: 'posix' }))).toBe('/')
    })
  })
})
