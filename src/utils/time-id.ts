/**
 * Time-based identifiers
 *
 * Generates identifiers that are unique within a process and sort
 * lexicographically in creation order. Used to name batch and working
 * directories.
 *
 * Format: 13-digit millisecond timestamp followed by a 6-digit counter
 * that is incremented within the same millisecond.
 *
 * @module utils/time-id
 */

const COUNTER_WIDTH = 6
const COUNTER_LIMIT = 10 ** COUNTER_WIDTH
const TIMESTAMP_WIDTH = 13

let lastTimestamp = 0
let counter = 0

/**
 * Generate the next monotonic time identifier
 *
 * Within the same millisecond the counter is incremented. If the clock
 * moves backwards the last timestamp is kept, so identifiers never
 * decrease. On counter overflow the timestamp is bumped by one.
 *
 * @example
 * ```typescript
 * nextTimeId() // "1760889600000000000"
 * nextTimeId() // "1760889600000000001"
 * ```
 */
export function nextTimeId(): string {
  const now = Date.now()

  if (now > lastTimestamp) {
    lastTimestamp = now
    counter = 0
  } else {
    counter++
    if (counter >= COUNTER_LIMIT) {
      lastTimestamp++
      counter = 0
    }
  }

  return (
    String(lastTimestamp).padStart(TIMESTAMP_WIDTH, '0') +
    String(counter).padStart(COUNTER_WIDTH, '0')
  )
}

/**
 * Reset the generator state (useful for testing)
 */
export function resetTimeIdState(): void {
  lastTimestamp = 0
  counter = 0
}
