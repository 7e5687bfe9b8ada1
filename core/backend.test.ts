/**
 * NodeBackend tests against a temporary directory
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { mkdtempSync, mkdirSync, rmSync, symlinkSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { NodeBackend, isGlobBackend } from './backend.js'
import { MemoryBackend } from './mock-backend.js'
import { hasErrorCode } from './errors.js'

describe('NodeBackend', () => {
  let root: string
  let backend: NodeBackend

  beforeAll(() => {
    root = mkdtempSync(join(tmpdir(), 'starglob-'))
    mkdirSync(join(root, 'dir'))
    writeFileSync(join(root, 'dir', 'one.txt'), '')
    writeFileSync(join(root, 'dir', 'two.txt'), '')
    writeFileSync(join(root, 'file.txt'), '')
    symlinkSync(join(root, 'missing'), join(root, 'dangling'))
    symlinkSync(join(root, 'dir'), join(root, 'dir-link'))
    backend = new NodeBackend({ cwd: root })
  })

  afterAll(() => {
    rmSync(root, { recursive: true, force: true })
  })

  it('should list directory entries', () => {
    expect([...backend.list('dir')].sort()).toEqual(['one.txt', 'two.txt'])
    expect([...backend.list(join(root, 'dir'))].sort()).toEqual(['one.txt', 'two.txt'])
  })

  it('should stop cleanly when iteration is abandoned', () => {
    const iterator = backend.list('dir')
    expect(iterator.next().done).toBe(false)
    expect(iterator.return().done).toBe(true)
    expect(iterator.next().done).toBe(true)
  })

  it('should throw a coded error for a missing directory', () => {
    let thrown: unknown
    try {
      Array.from(backend.list('nope'))
    } catch (error) {
      thrown = error
    }
    expect(hasErrorCode(thrown, 'ENOENT')).toBe(true)
  })

  it('should check existence without following the final symlink', () => {
    expect(backend.exists('file.txt')).toBe(true)
    expect(backend.exists('dangling')).toBe(true)
    expect(backend.exists('nope')).toBe(false)
    expect(backend.exists('file.txt/')).toBe(false)
    expect(backend.exists('')).toBe(false)
  })

  it('should follow symlinks for isDirectory', () => {
    expect(backend.isDirectory('dir')).toBe(true)
    expect(backend.isDirectory('dir-link')).toBe(true)
    expect(backend.isDirectory('dir/')).toBe(true)
    expect(backend.isDirectory('file.txt')).toBe(false)
    expect(backend.isDirectory('')).toBe(false)
  })

  it('should detect symlinks', () => {
    expect(backend.isSymlink('dir-link')).toBe(true)
    expect(backend.isSymlink('dangling')).toBe(true)
    expect(backend.isSymlink('dir')).toBe(false)
  })
})

describe('isGlobBackend', () => {
  it('should accept complete implementations', () => {
    expect(isGlobBackend(new NodeBackend())).toBe(true)
    expect(isGlobBackend(new MemoryBackend())).toBe(true)
  })

  it('should reject incomplete ones', () => {
    expect(isGlobBackend({ list: () => [], exists: () => false })).toBe(false)
    expect(isGlobBackend(null)).toBe(false)
  })
})
