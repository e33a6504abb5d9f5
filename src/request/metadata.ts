/**
 * Metadata helpers
 *
 * Normalizes the accepted metadata shapes into an ordered
 * `Map<string, string[]>` and converts metadata to and from the flat
 * text form stored in request archives.
 *
 * Text form: one record per line, `key=value`. A key with several values
 * is written on several lines, in value order. A key without values is
 * written alone on its line, without `=`. Backslash, carriage return and
 * line feed are escaped in keys and values; `=` is also escaped in keys.
 *
 * @module request/metadata
 */

import type { Metadata, MetadataInput } from './types'

// =============================================================================
// Construction
// =============================================================================

function isIterableInput(
  input: MetadataInput
): input is Iterable<readonly [string, string | readonly string[]]> {
  return Symbol.iterator in input
}

function toValues(value: string | readonly string[]): string[] {
  return typeof value === 'string' ? [value] : [...value]
}

/**
 * Build a new ordered metadata map. Repeated keys have their values
 * appended in order.
 *
 * @example
 * ```typescript
 * createMetadata({ title: 'Hello', tags: ['a', 'b'] })
 * createMetadata([['tags', 'a'], ['tags', 'b']])
 * ```
 */
export function createMetadata(input?: MetadataInput): Map<string, string[]> {
  const metadata = new Map<string, string[]>()
  if (!input) {
    return metadata
  }
  const entries = isIterableInput(input) ? input : Object.entries(input)
  for (const [key, value] of entries) {
    addValues(metadata, key, toValues(value))
  }
  return metadata
}

/**
 * Append values to a key, creating it if needed
 */
export function addValues(
  metadata: Map<string, string[]>,
  key: string,
  values: readonly string[]
): void {
  const existing = metadata.get(key)
  if (existing) {
    existing.push(...values)
  } else {
    metadata.set(key, [...values])
  }
}

/**
 * Copy metadata into a new mutable map
 */
export function copyMetadata(metadata: Metadata): Map<string, string[]> {
  const copy = new Map<string, string[]>()
  for (const [key, values] of metadata) {
    copy.set(key, [...values])
  }
  return copy
}

/**
 * Get the first value of a key
 */
export function getFirstValue(metadata: Metadata, key: string): string | undefined {
  return metadata.get(key)?.[0]
}

/**
 * Convert metadata to a plain object (for logging and assertions)
 */
export function metadataToObject(metadata: Metadata): Record<string, string[]> {
  const obj: Record<string, string[]> = {}
  for (const [key, values] of metadata) {
    obj[key] = [...values]
  }
  return obj
}

// =============================================================================
// Text Serialization
// =============================================================================

function escapeText(text: string, escapeEquals: boolean): string {
  let out = ''
  for (const ch of text) {
    switch (ch) {
      case '\\':
        out += '\\\\'
        break
      case '\n':
        out += '\\n'
        break
      case '\r':
        out += '\\r'
        break
      case '=':
        out += escapeEquals ? '\\=' : '='
        break
      default:
        out += ch
    }
  }
  return out
}

function unescapeChar(ch: string): string {
  switch (ch) {
    case 'n':
      return '\n'
    case 'r':
      return '\r'
    default:
      return ch
  }
}

/**
 * Serialize metadata to its flat text form
 */
export function serializeMetadata(metadata: Metadata): string {
  let text = ''
  for (const [key, values] of metadata) {
    const escapedKey = escapeText(key, true)
    if (values.length === 0) {
      text += `${escapedKey}\n`
      continue
    }
    for (const value of values) {
      text += `${escapedKey}=${escapeText(value, false)}\n`
    }
  }
  return text
}

/**
 * Parse one record line into its key and optional value
 */
function parseLine(line: string): { key: string; value: string | undefined } {
  let key = ''
  let i = 0
  while (i < line.length) {
    const ch = line.charAt(i)
    if (ch === '\\' && i + 1 < line.length) {
      key += unescapeChar(line.charAt(i + 1))
      i += 2
      continue
    }
    if (ch === '=') {
      break
    }
    key += ch
    i++
  }

  if (i >= line.length) {
    return { key, value: undefined }
  }

  let value = ''
  i++ // skip '='
  while (i < line.length) {
    const ch = line.charAt(i)
    if (ch === '\\' && i + 1 < line.length) {
      value += unescapeChar(line.charAt(i + 1))
      i += 2
      continue
    }
    value += ch
    i++
  }
  return { key, value }
}

/**
 * Parse metadata from its flat text form
 */
export function parseMetadata(text: string): Map<string, string[]> {
  const metadata = new Map<string, string[]>()
  const lines = text.split('\n')
  // every record ends with a line feed, so the last segment is empty
  lines.pop()
  for (const line of lines) {
    const { key, value } = parseLine(line)
    addValues(metadata, key, value === undefined ? [] : [value])
  }
  return metadata
}
