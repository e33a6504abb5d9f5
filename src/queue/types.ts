/**
 * Committer queue types
 *
 * @module queue/types
 */

import type { CommitterRequest } from '../request/types'

// =============================================================================
// Consumer Types
// =============================================================================

/**
 * Countable, single-pass iterator over the requests of a batch.
 * Requests are decoded lazily, in archive order.
 */
export interface RequestIterator extends AsyncIterableIterator<CommitterRequest> {
  /** Number of requests pulled so far */
  readonly count: number
  /** Number of requests this iterator can produce */
  readonly size: number
}

/**
 * Sink-specific batch commit. Must either process every request it
 * pulls or throw; a throw marks the whole attempt as failed.
 */
export interface BatchConsumer {
  consume(requests: RequestIterator): Promise<void>
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * How a batch that keeps failing is broken into smaller ones.
 * - `OFF`: the batch is not split
 * - `HALF`: the chunk size is halved at each failure, down to 1
 * - `ONE`: requests are sent one by one
 */
export type SplitBatch = 'OFF' | 'HALF' | 'ONE'

/**
 * File-system queue configuration
 */
export interface FSQueueConfig {
  /** Requests queued before a batch is consumed (default: 20) */
  batchSize?: number | undefined
  /** Maximum entries in a single batch sub-folder (default: 500) */
  maxPerFolder?: number | undefined
  /** Commit batches left over by a previous run on init (default: false) */
  commitLeftoversOnInit?: boolean | undefined
  /** Retries after a failed batch commit (default: 0) */
  maxRetries?: number | undefined
  /** Delay in milliseconds between retries (default: 0) */
  retryDelay?: number | undefined
  /** Split policy once retries are exhausted (default: OFF) */
  splitBatch?: SplitBatch | undefined
  /** Log instead of throw when a batch ends up in the error directory (default: false) */
  ignoreErrors?: boolean | undefined
}

/**
 * Configuration with every default applied
 */
export interface ResolvedQueueConfig {
  batchSize: number
  maxPerFolder: number
  commitLeftoversOnInit: boolean
  maxRetries: number
  retryDelay: number
  splitBatch: SplitBatch
  ignoreErrors: boolean
}

// =============================================================================
// Queue Types
// =============================================================================

/**
 * What a queue needs from the committer context
 */
export interface QueueContext {
  /** Working directory; a unique temp directory is used when absent */
  readonly workDir?: string | undefined
}

/**
 * Lifecycle state of a queue
 */
export type QueueState = 'uninitialized' | 'initialized' | 'closing' | 'closed'

/**
 * Queue accumulating requests before they are committed in batches
 */
export interface CommitterQueue {
  init(context: QueueContext, consumer: BatchConsumer): Promise<void>
  queue(request: CommitterRequest): Promise<void>
  /** Consume everything still queued */
  close(): Promise<void>
  /** Delete all queue data; not for use during normal operation */
  clean(): Promise<void>
}

/**
 * Counters kept by the file-system queue
 */
export interface QueueStats {
  state: QueueState
  /** Requests written to the queue since init */
  requestsQueued: number
  /** Batch directories fully processed */
  batchesConsumed: number
  /** Requests handed to the consumer successfully */
  requestsCommitted: number
  /** Batches that had archives moved to the error directory */
  batchesFailed: number
  /** Archives moved to the error directory */
  archivesInError: number
  queueDir: string | null
  errorDir: string | null
}
