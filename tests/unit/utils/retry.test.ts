/**
 * Retry Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { retry } from '../../../src/utils/retry'

describe('retry', () => {
  it('should return the value of a first successful attempt', async () => {
    const outcome = await retry(() => 42)

    expect(outcome).toEqual({ status: 'success', value: 42, attempts: 1 })
  })

  it('should retry with a fixed delay until success', async () => {
    const delay = vi.fn(async () => {})
    const onRetry = vi.fn()
    let calls = 0

    const outcome = await retry(
      async attempt => {
        calls++
        if (attempt < 3) throw new Error(`failure ${attempt}`)
        return 'done'
      },
      { maxRetries: 2, retryDelay: 250, onRetry, _delayFn: delay }
    )

    expect(outcome).toEqual({ status: 'success', value: 'done', attempts: 3 })
    expect(calls).toBe(3)
    expect(delay.mock.calls).toEqual([[250], [250]])
    expect(onRetry.mock.calls.map(([info]) => info.attempt)).toEqual([1, 2])
  })

  it('should report a retryable failure once retries are used up', async () => {
    const outcome = await retry(
      () => {
        throw new Error('still down')
      },
      { maxRetries: 1, _delayFn: async () => {} }
    )

    expect(outcome.status).toBe('retryable')
    expect(outcome.attempts).toBe(2)
    if (outcome.status === 'success') return
    expect(outcome.error.message).toBe('still down')
  })

  it('should not retry fatal failures', async () => {
    const fn = vi.fn(() => {
      throw new Error('disk gone')
    })

    const outcome = await retry(fn, {
      maxRetries: 5,
      isFatal: error => error.message === 'disk gone',
    })

    expect(outcome.status).toBe('fatal')
    expect(outcome.attempts).toBe(1)
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('should turn thrown non-errors into errors', async () => {
    const outcome = await retry(() => {
      throw 'plain string'
    })

    if (outcome.status === 'success') throw new Error('expected a failure')
    expect(outcome.error).toBeInstanceOf(Error)
    expect(outcome.error.message).toBe('plain string')
  })
})
