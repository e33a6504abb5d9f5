/**
 * Batch consumption with retries and splitting
 *
 * A batch directory is committed chunk by chunk. The first chunk is the
 * whole batch. A chunk that still fails once its retries are used up
 * makes the chunk size shrink according to the split policy, and the
 * remaining archives are tried again in smaller chunks. A single archive
 * that fails on its own is moved to the error directory and the rest of
 * the batch goes on. Without a split policy, the first failure moves all
 * remaining archives to the error directory, and so does any fatal
 * failure whatever the policy.
 *
 * @module queue/consumption
 */

import { rm } from 'node:fs/promises'
import { BatchCommitError, ErrorCode, QueueError, toError } from '../errors'
import { logger } from '../utils/logger'
import { retry } from '../utils/retry'
import { FSBatch, moveBatchDirectory } from './FSBatch'
import type { BatchConsumer, SplitBatch } from './types'

// =============================================================================
// Types
// =============================================================================

/**
 * Options driving the consumption of one batch directory
 */
export interface ConsumptionOptions {
  maxRetries: number
  retryDelay: number
  splitBatch: SplitBatch
  /** Where failed archives are moved */
  errorDir: string
  /** Internal: custom delay function for testing */
  _delayFn?: ((ms: number) => Promise<void>) | undefined
}

/**
 * What happened to a batch directory
 */
export interface ConsumptionResult {
  dir: string
  /** Requests committed successfully */
  committed: number
  /** Archives moved to the error directory */
  failed: number
  /** Successive chunk sizes tried, starting with the whole batch */
  chunkSizes: number[]
  /** Set when archives were moved to the error directory */
  error?: BatchCommitError | undefined
}

// =============================================================================
// Split Policy
// =============================================================================

/**
 * Next chunk size after a chunk of `size` failed, or null when the
 * failing archives must go to the error directory
 *
 * @example
 * ```typescript
 * reduceChunkSize(5, 'HALF') // 3
 * reduceChunkSize(1, 'HALF') // null
 * reduceChunkSize(5, 'ONE')  // 1
 * reduceChunkSize(5, 'OFF')  // null
 * ```
 */
export function reduceChunkSize(size: number, policy: SplitBatch): number | null {
  if (size <= 1) {
    return null
  }
  switch (policy) {
    case 'HALF':
      return Math.ceil(size / 2)
    case 'ONE':
      return 1
    case 'OFF':
      return null
  }
}

// =============================================================================
// Chunk Commit
// =============================================================================

/**
 * Hand one chunk to the consumer, retrying per options. Archives the
 * consumer pulled are deleted on success; the others stay for the next
 * chunk.
 */
async function commitChunk(chunk: FSBatch, consumer: BatchConsumer, options: ConsumptionOptions) {
  let fatal: Error | undefined

  return retry(
    async () => {
      const requests = chunk.iterator()
      try {
        await consumer.consume(requests)
      } catch (error) {
        fatal = requests.fatalError
        throw fatal ?? error
      }

      const pulled = requests.count
      if (pulled === 0) {
        fatal = new QueueError(
          `Batch consumer returned without reading any request from ${chunk.dir}`,
          ErrorCode.QUEUE_ERROR,
          { path: chunk.dir }
        )
        throw fatal
      }

      try {
        await chunk.slice(0, pulled).delete()
      } catch (error) {
        fatal = toError(error)
        throw fatal
      }
      return pulled
    },
    {
      maxRetries: options.maxRetries,
      retryDelay: options.retryDelay,
      isFatal: error => error === fatal,
      onRetry: ({ attempt, error }) => {
        logger.warn(
          `Could not commit ${chunk.size} request(s) from ${chunk.dir}. ` +
            `Retrying (${attempt}/${options.maxRetries}): ${error.message}`
        )
      },
      _delayFn: options._delayFn,
    }
  )
}

// =============================================================================
// Batch Consumption
// =============================================================================

/**
 * Commit every archive of a batch directory, then remove the directory
 *
 * Consumer failures never escape: archives that cannot be committed end
 * up in the error directory and `result.error` is set. A fatal failure
 * (an archive that cannot be read or decoded, or a consumer that reads
 * nothing) is neither retried nor split: the remaining archives are moved
 * to the error directory at once, with the failure as the cause of
 * `result.error`. Only failures to move or delete archives are thrown.
 */
export async function consumeBatchDirectory(
  dir: string,
  consumer: BatchConsumer,
  options: ConsumptionOptions
): Promise<ConsumptionResult> {
  const result: ConsumptionResult = { dir, committed: 0, failed: 0, chunkSizes: [] }
  let remaining = await FSBatch.fromDirectory(dir)
  let chunkSize = remaining.size
  let lastError: Error | undefined
  let errorTarget: string | undefined

  if (chunkSize > 0) {
    result.chunkSizes.push(chunkSize)
  }

  while (!remaining.isEmpty()) {
    const [chunk = remaining] = remaining.split(chunkSize)
    const outcome = await commitChunk(chunk, consumer, options)

    if (outcome.status === 'fatal') {
      logger.error(
        `Unrecoverable failure in committer batch ${dir}. ` +
          `Moving ${remaining.size} request file(s) to error directory.`,
        outcome.error
      )
      lastError = outcome.error
      result.failed += remaining.size
      errorTarget = await moveBatchDirectory(dir, options.errorDir)
      break
    }

    if (outcome.status === 'success') {
      result.committed += outcome.value
    } else {
      lastError = outcome.error
      const next = reduceChunkSize(chunk.size, options.splitBatch)

      if (next !== null) {
        logger.error(
          `Could not commit ${chunk.size} request(s) from ${dir}. ` +
            `Splitting into chunks of ${next}.`,
          outcome.error
        )
        chunkSize = next
        result.chunkSizes.push(next)
      } else if (chunk.size === 1 && options.splitBatch !== 'OFF') {
        logger.error(
          `Could not commit request file ${chunk.files[0]}. Moving it to error directory.`,
          outcome.error
        )
        errorTarget = await chunk.moveTo(options.errorDir)
        result.failed += 1
      } else {
        result.failed += remaining.size
        errorTarget = await moveBatchDirectory(dir, options.errorDir)
        break
      }
    }

    remaining = await FSBatch.fromDirectory(dir)
  }

  await rm(dir, { recursive: true, force: true })

  if (lastError && errorTarget === undefined) {
    logger.info(`Batch successfully recovered: ${dir}`)
  }
  if (errorTarget !== undefined) {
    result.error = new BatchCommitError(dir, errorTarget, lastError)
  }
  return result
}
