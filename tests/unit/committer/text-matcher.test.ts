/**
 * TextMatcher Tests
 */

import { describe, it, expect } from 'vitest'
import { TextMatcher } from '../../../src/committer/text-matcher'
import { ConfigurationError } from '../../../src/errors'

describe('TextMatcher', () => {
  describe('basic', () => {
    it('should match the whole text literally', () => {
      const matcher = TextMatcher.basic('a.b')

      expect(matcher.matches('a.b')).toBe(true)
      expect(matcher.matches('axb')).toBe(false)
      expect(matcher.matches('a.bc')).toBe(false)
    })

    it('should ignore case when asked', () => {
      expect(TextMatcher.basic('News').matches('news')).toBe(false)
      expect(TextMatcher.basic('News', { ignoreCase: true }).matches('news')).toBe(true)
    })

    it('should match inside the text when partial', () => {
      expect(TextMatcher.basic('port', { partial: true }).matches('sports')).toBe(true)
    })
  })

  describe('wildcard', () => {
    it('should expand star and question mark', () => {
      const matcher = TextMatcher.wildcard('doc.*')

      expect(matcher.matches('doc.type')).toBe(true)
      expect(matcher.matches('doc.')).toBe(true)
      expect(matcher.matches('xdoc.type')).toBe(false)
      expect(TextMatcher.wildcard('v?').matches('v1')).toBe(true)
      expect(TextMatcher.wildcard('v?').matches('v12')).toBe(false)
    })
  })

  describe('regex', () => {
    it('should anchor the expression unless partial', () => {
      expect(TextMatcher.regex('a|b').matches('a')).toBe(true)
      expect(TextMatcher.regex('a|b').matches('ab')).toBe(false)
      expect(TextMatcher.regex('^a', { partial: true }).matches('abc')).toBe(true)
    })

    it('should reject an invalid expression', () => {
      expect(() => TextMatcher.regex('(')).toThrow(ConfigurationError)
    })
  })

  it('should default to basic matching', () => {
    const matcher = new TextMatcher({ pattern: 'doc.*' })

    expect(matcher.method).toBe('basic')
    expect(matcher.matches('doc.type')).toBe(false)
    expect(matcher.toString()).toBe('basic:doc.*')
  })
})
