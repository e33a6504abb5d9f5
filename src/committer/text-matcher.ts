/**
 * Text matching for restrictions and field filters
 *
 * @module committer/text-matcher
 */

import { ConfigurationError, toError } from '../errors'

/**
 * - `basic`: the pattern is literal text
 * - `wildcard`: `*` matches any run of characters, `?` a single one
 * - `regex`: the pattern is a regular expression
 */
export type MatchMethod = 'basic' | 'wildcard' | 'regex'

export interface TextMatcherOptions {
  pattern: string
  /** Default: basic */
  method?: MatchMethod | undefined
  ignoreCase?: boolean | undefined
  /** Match anywhere in the text instead of the whole text */
  partial?: boolean | undefined
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function wildcardToRegex(pattern: string): string {
  let source = ''
  for (const ch of pattern) {
    if (ch === '*') {
      source += '.*'
    } else if (ch === '?') {
      source += '.'
    } else {
      source += escapeRegex(ch)
    }
  }
  return source
}

/**
 * Matches text against a literal, wildcard or regex pattern
 *
 * @example
 * ```typescript
 * TextMatcher.wildcard('doc.*').matches('doc.type') // true
 * TextMatcher.basic('News', { ignoreCase: true }).matches('news') // true
 * TextMatcher.regex('^a', { partial: true }).matches('abc') // true
 * ```
 */
export class TextMatcher {
  readonly pattern: string
  readonly method: MatchMethod
  readonly ignoreCase: boolean
  readonly partial: boolean
  private readonly regex: RegExp

  constructor(options: TextMatcherOptions) {
    this.pattern = options.pattern
    this.method = options.method ?? 'basic'
    this.ignoreCase = options.ignoreCase ?? false
    this.partial = options.partial ?? false
    this.regex = this.compile()
  }

  static basic(pattern: string, options: Omit<TextMatcherOptions, 'pattern' | 'method'> = {}): TextMatcher {
    return new TextMatcher({ ...options, pattern, method: 'basic' })
  }

  static wildcard(pattern: string, options: Omit<TextMatcherOptions, 'pattern' | 'method'> = {}): TextMatcher {
    return new TextMatcher({ ...options, pattern, method: 'wildcard' })
  }

  static regex(pattern: string, options: Omit<TextMatcherOptions, 'pattern' | 'method'> = {}): TextMatcher {
    return new TextMatcher({ ...options, pattern, method: 'regex' })
  }

  matches(text: string): boolean {
    return this.regex.test(text)
  }

  toString(): string {
    return `${this.method}:${this.pattern}`
  }

  private compile(): RegExp {
    let source: string
    switch (this.method) {
      case 'basic':
        source = escapeRegex(this.pattern)
        break
      case 'wildcard':
        source = wildcardToRegex(this.pattern)
        break
      case 'regex':
        source = this.pattern
        break
    }
    if (!this.partial) {
      source = `^(?:${source})$`
    }
    try {
      return new RegExp(source, this.ignoreCase ? 'is' : 's')
    } catch (error) {
      const message = `Invalid ${this.method} pattern: ${this.pattern}`
      throw new ConfigurationError(message, [toError(error).message])
    }
  }
}
