/**
 * Metadata field mappings
 *
 * @module committer/field-mappings
 */

import { addValues } from '../request/metadata'
import type { Metadata } from '../request/types'

/**
 * Source field to target field. A null or blank target drops the field.
 */
export type FieldMappings = ReadonlyMap<string, string | null>

export type FieldMappingsInput =
  | FieldMappings
  | Readonly<Record<string, string | null>>
  | Iterable<readonly [string, string | null]>

function isIterableMappings(
  input: FieldMappingsInput
): input is Iterable<readonly [string, string | null]> {
  return Symbol.iterator in input
}

/**
 * Build an ordered mapping table
 */
export function createFieldMappings(input?: FieldMappingsInput): Map<string, string | null> {
  const mappings = new Map<string, string | null>()
  if (!input) {
    return mappings
  }
  const entries = isIterableMappings(input) ? input : Object.entries(input)
  for (const [from, to] of entries) {
    mappings.set(from, to)
  }
  return mappings
}

/**
 * Build new metadata with mapped keys. Unmapped keys pass through
 * unchanged; keys mapped to the same target have their values merged in
 * metadata order.
 *
 * @example
 * ```typescript
 * applyFieldMappings(createMetadata({ title: 'A', junk: 'x' }), new Map([
 *   ['title', 'dc:title'],
 *   ['junk', null],
 * ]))
 * // Map { 'dc:title' => ['A'] }
 * ```
 */
export function applyFieldMappings(
  metadata: Metadata,
  mappings: FieldMappings
): Map<string, string[]> {
  const mapped = new Map<string, string[]>()
  for (const [from, values] of metadata) {
    if (!mappings.has(from)) {
      addValues(mapped, from, values)
      continue
    }
    const to = mappings.get(from)
    if (to && to.trim() !== '') {
      addValues(mapped, to, values)
    }
  }
  return mapped
}
