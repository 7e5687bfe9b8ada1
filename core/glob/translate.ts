/**
 * Shell pattern to regular expression translation
 *
 * Translates one path segment (no separators) into a regular expression
 * source with one capture group per wildcard, so callers can recover the
 * text each wildcard matched.
 *
 * | Pattern  | Regex      | Captures |
 * |----------|------------|----------|
 * | `*`      | `(.*)`     | 1        |
 * | `?`      | `(.)`      | 1        |
 * | `[abc]`  | `([abc])`  | 1        |
 * | `[!abc]` | `([^abc])` | 1        |
 *
 * There is no way to quote meta-characters.
 *
 * @module glob/translate
 */

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/-]/g

const MAGIC = /[*?[]/

/**
 * Check whether a string contains any wildcard character (`*`, `?`, `[`).
 */
export function hasMagic(pattern: string): boolean {
  return MAGIC.test(pattern)
}

function escapeLiteral(char: string): string {
  return char.replace(REGEX_SPECIAL, '\\$&')
}

/**
 * Translate the body of a character class (the text between `[` and `]`).
 */
function translateClass(body: string): string {
  const escaped = body.replace(/\\/g, '\\\\').replace(/]/g, '\\]')
  if (escaped.startsWith('!')) {
    return '^' + escaped.slice(1)
  }
  if (escaped.startsWith('^')) {
    return '\\' + escaped
  }
  return escaped
}

/**
 * Translate a shell pattern segment to an anchored regular expression source.
 *
 * An unclosed `[` is taken literally. The result must be compiled with the
 * `s` flag so that `*` and `?` match any code unit.
 *
 * @example
 * ```typescript
 * translate('*.ts')    // '^(.*)\\.ts$'
 * translate('file?')   // '^file(.)$'
 * translate('[!ab]x')  // '^([^ab])x$'
 * translate('[oops')   // '^\\[oops$'
 * ```
 */
export function translate(pattern: string): string {
  const n = pattern.length
  let i = 0
  let res = ''

  while (i < n) {
    const c = pattern.charAt(i)
    i++

    if (c === '*') {
      res += '(.*)'
    } else if (c === '?') {
      res += '(.)'
    } else if (c === '[') {
      let j = i
      if (j < n && pattern[j] === '!') j++
      // A ']' right after '[' or '[!' belongs to the class
      if (j < n && pattern[j] === ']') j++
      while (j < n && pattern[j] !== ']') j++

      if (j >= n) {
        res += '\\['
      } else {
        res += '([' + translateClass(pattern.slice(i, j)) + '])'
        i = j + 1
      }
    } else {
      res += escapeLiteral(c)
    }
  }

  return `^${res}$`
}
