/**
 * Request routing restrictions
 *
 * A committer with restrictions only accepts requests whose metadata
 * matches at least one of them.
 *
 * @module committer/restrictions
 */

import type { Metadata } from '../request/types'
import { TextMatcher } from './text-matcher'

/**
 * Matches a metadata field and, optionally, one of its values
 */
export interface PropertyMatcher {
  readonly field: TextMatcher
  readonly value?: TextMatcher | undefined
}

function toMatcher(matcher: TextMatcher | string): TextMatcher {
  return typeof matcher === 'string' ? TextMatcher.basic(matcher) : matcher
}

/**
 * Create a property matcher. Plain strings are matched literally.
 *
 * @example
 * ```typescript
 * propertyMatcher('collection', 'news')
 * propertyMatcher(TextMatcher.wildcard('dc:*'))
 * ```
 */
export function propertyMatcher(
  field: TextMatcher | string,
  value?: TextMatcher | string
): PropertyMatcher {
  return Object.freeze({
    field: toMatcher(field),
    value: value === undefined ? undefined : toMatcher(value),
  })
}

/**
 * Whether some metadata field matches, with a matching value when one
 * is required
 */
export function matchesProperty(matcher: PropertyMatcher, metadata: Metadata): boolean {
  for (const [key, values] of metadata) {
    if (!matcher.field.matches(key)) {
      continue
    }
    const valueMatcher = matcher.value
    if (!valueMatcher || values.some(value => valueMatcher.matches(value))) {
      return true
    }
  }
  return false
}

/**
 * Whether metadata passes a set of restrictions: no restriction, or at
 * least one matching
 */
export function matchesRestrictions(
  restrictions: readonly PropertyMatcher[],
  metadata: Metadata
): boolean {
  return restrictions.length === 0 || restrictions.some(r => matchesProperty(r, metadata))
}
