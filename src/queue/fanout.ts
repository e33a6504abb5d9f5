/**
 * Archive placement inside a batch directory
 *
 * The ordinal of a request within its batch is written in base
 * `maxPerFolder`, most significant digit first. Every digit but the last
 * names a sub-folder; the last names the file. Each level therefore holds
 * at most `maxPerFolder` entries, and digits are zero-padded to a fixed
 * width so a plain string sort of relative paths gives the queue order.
 *
 * With `maxPerFolder` 500 and `batchSize` 20: `000-upsert.zip` ... `019-delete.zip`.
 * With `maxPerFolder` 10 and `batchSize` 250: `0/0/0-upsert.zip` ... `2/4/9-upsert.zip`.
 *
 * @module queue/fanout
 */

import { join } from 'node:path'
import { ARCHIVE_EXTENSION } from '../constants'
import type { RequestType } from '../request/types'

/**
 * Shape of the directory tree of a batch
 */
export interface FanOut {
  readonly maxPerFolder: number
  /** Number of path segments, the file name included */
  readonly depth: number
  /** Characters per segment */
  readonly width: number
}

/**
 * Compute the tree shape able to hold `batchSize` archives
 */
export function computeFanOut(batchSize: number, maxPerFolder: number): FanOut {
  if (!Number.isInteger(maxPerFolder) || maxPerFolder < 2) {
    throw new RangeError(`maxPerFolder must be an integer of at least 2, got ${maxPerFolder}`)
  }
  let depth = 1
  let capacity = maxPerFolder
  while (capacity < batchSize) {
    capacity *= maxPerFolder
    depth++
  }
  return { maxPerFolder, depth, width: String(maxPerFolder - 1).length }
}

/**
 * Number of archives a tree of this shape can hold
 */
export function fanOutCapacity(fanOut: FanOut): number {
  return fanOut.maxPerFolder ** fanOut.depth
}

/**
 * Relative path of the archive holding request number `ordinal` (0-based)
 */
export function archivePath(ordinal: number, type: RequestType, fanOut: FanOut): string {
  if (!Number.isInteger(ordinal) || ordinal < 0 || ordinal >= fanOutCapacity(fanOut)) {
    throw new RangeError(`Ordinal ${ordinal} does not fit in a batch of depth ${fanOut.depth}`)
  }
  const segments: string[] = new Array<string>(fanOut.depth)
  let rest = ordinal
  for (let level = fanOut.depth - 1; level >= 0; level--) {
    segments[level] = String(rest % fanOut.maxPerFolder).padStart(fanOut.width, '0')
    rest = Math.floor(rest / fanOut.maxPerFolder)
  }
  const leaf = segments.pop() ?? ''
  return join(...segments, `${leaf}-${type}${ARCHIVE_EXTENSION}`)
}
