/**
 * Shared in-memory trees for glob tests
 */

import { MemoryBackend } from '../core/mock-backend.js'

/**
 * The tree used for recursive `**` scenarios, rooted at /base:
 *
 * ```
 * a/bar.py  a/foo/hello.py  a/foo/world.txt
 * b/py      b/bar.py
 * file.py   file.txt        README
 * ```
 */
export function recursiveTree(cwd: string = '/base'): MemoryBackend {
  const backend = MemoryBackend.fromPaths(
    [
      '/base/a/',
      '/base/b/',
      '/base/a/foo/',
      '/base/file.py',
      '/base/file.txt',
      '/base/a/bar.py',
      '/base/README',
      '/base/b/py',
      '/base/b/bar.py',
      '/base/a/foo/hello.py',
      '/base/a/foo/world.txt',
    ],
    { cwd }
  )
  return backend
}

/**
 * Same layout as {@link recursiveTree} but with hidden entries:
 * `a/.foo/` (holding hello.py and world.txt), `a/.bar` and `b/.bar`.
 */
export function hiddenTree(): MemoryBackend {
  return MemoryBackend.fromPaths(
    [
      'a/',
      'b/',
      'a/.foo/',
      'file.py',
      'file.txt',
      'a/.bar',
      'README',
      'b/py',
      'b/.bar',
      'a/.foo/hello.py',
      'a/.foo/world.txt',
    ],
    { cwd: '/base' }
  )
}

/**
 * `dir1/` and `dir22/`, each holding `a-file` and `b-file`.
 */
export function dirsTree(): MemoryBackend {
  return MemoryBackend.fromPaths(
    ['dir1/a-file', 'dir1/b-file', 'dir22/a-file', 'dir22/b-file'],
    { cwd: '/base' }
  )
}
