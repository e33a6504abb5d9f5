/**
 * Fixed-Delay Retry
 *
 * Runs an operation up to `maxRetries + 1` times, waiting a constant
 * delay between attempts. Instead of throwing, the outcome is returned as
 * a tagged result so callers can tell a failure worth retrying (or
 * splitting) from a fatal one without inspecting exception types.
 *
 * @module utils/retry
 */

import { toError } from '../errors'
import { DEFAULT_MAX_RETRIES, DEFAULT_RETRY_DELAY } from '../constants'

// =============================================================================
// TYPES
// =============================================================================

/**
 * Information passed to the onRetry callback
 */
export interface RetryInfo {
  /** The retry attempt number (1-indexed, so first retry is 1) */
  attempt: number
  /** The error that triggered the retry */
  error: Error
  /** The delay in milliseconds before this retry */
  delay: number
}

/**
 * Outcome of a retried operation
 */
export type RetryOutcome<T> =
  | { status: 'success'; value: T; attempts: number }
  | { status: 'retryable'; error: Error; attempts: number }
  | { status: 'fatal'; error: Error; attempts: number }

/**
 * Configuration options for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 0) */
  maxRetries?: number | undefined
  /** Delay in milliseconds between attempts (default: 0) */
  retryDelay?: number | undefined
  /**
   * Decides whether a failure must stop retrying right away.
   * Fatal failures are returned as `status: 'fatal'`.
   */
  isFatal?: ((error: Error) => boolean) | undefined
  /** Called before each retry attempt */
  onRetry?: ((info: RetryInfo) => void) | undefined
  /** Internal: custom delay function for testing */
  _delayFn?: ((ms: number) => Promise<void>) | undefined
}

// =============================================================================
// DELAY UTILITIES
// =============================================================================

/**
 * Default delay function using setTimeout
 */
export async function defaultDelay(ms: number): Promise<void> {
  if (ms <= 0) {
    return
  }
  return new Promise(resolve => setTimeout(resolve, ms))
}

// =============================================================================
// MAIN RETRY FUNCTION
// =============================================================================

/**
 * Run an operation with fixed-delay retries
 *
 * @param fn - The operation; receives the 1-indexed attempt number
 * @param config - Retry configuration options
 * @returns Tagged outcome; never throws for errors raised by `fn`
 *
 * @example
 * ```typescript
 * const outcome = await retry(() => sink.send(batch), {
 *   maxRetries: 3,
 *   retryDelay: 1000,
 * })
 * if (outcome.status !== 'success') {
 *   // handle outcome.error
 * }
 * ```
 */
export async function retry<T>(
  fn: (attempt: number) => T | Promise<T>,
  config: RetryConfig = {}
): Promise<RetryOutcome<T>> {
  const maxRetries = Math.max(0, config.maxRetries ?? DEFAULT_MAX_RETRIES)
  const retryDelay = Math.max(0, config.retryDelay ?? DEFAULT_RETRY_DELAY)
  const delayFn = config._delayFn ?? defaultDelay

  let attempts = 0

  while (true) {
    attempts++

    try {
      const value = await fn(attempts)
      return { status: 'success', value, attempts }
    } catch (error) {
      const err = toError(error)

      if (config.isFatal?.(err)) {
        return { status: 'fatal', error: err, attempts }
      }

      if (attempts > maxRetries) {
        return { status: 'retryable', error: err, attempts }
      }

      config.onRetry?.({ attempt: attempts, error: err, delay: retryDelay })
      await delayFn(retryDelay)
    }
  }
}
