/**
 * FSQueue - durable, file-system-backed batching queue
 *
 * Every queued request is written to its own archive in the active batch
 * directory. When the active batch holds `batchSize` requests it is
 * sealed: a fresh batch directory takes its place and the sealed one is
 * handed to the consumer, with retries, splitting and error-directory
 * handling as configured. Whatever is left on disk survives a crash and
 * can be committed on the next init.
 *
 * Layout under the working directory:
 * ```
 * <workDir>/queue/batch-<timeId>/<fan-out path>-upsert.zip
 * <workDir>/error/batch-<timeId>/...
 * ```
 */

import { promises as fs } from 'node:fs'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import {
  BATCH_DIR_PREFIX,
  ERROR_DIR_NAME,
  QUEUE_DIR_NAME,
  TEMP_WORK_DIR_PREFIX,
} from '../constants'
import { ErrorCode, QueueError, getSystemErrorCode, toError } from '../errors'
import { encodeRequest } from '../request/codec'
import type { CommitterRequest } from '../request/types'
import { logger } from '../utils/logger'
import { nextTimeId } from '../utils/time-id'
import { resolveQueueConfig } from './config'
import { consumeBatchDirectory, type ConsumptionResult } from './consumption'
import { archivePath, computeFanOut, type FanOut } from './fanout'
import type {
  BatchConsumer,
  CommitterQueue,
  FSQueueConfig,
  QueueContext,
  QueueState,
  QueueStats,
  ResolvedQueueConfig,
} from './types'

// =============================================================================
// Types
// =============================================================================

/**
 * Batch directory currently receiving requests
 */
interface ActiveBatch {
  readonly dir: string
  /** Slots handed out so far */
  reserved: number
  /** Archive writes not settled yet */
  readonly writes: Set<Promise<void>>
}

/**
 * Internal: hooks for testing
 */
export interface FSQueueTestOptions {
  _delayFn?: ((ms: number) => Promise<void>) | undefined
}

// =============================================================================
// FSQueue Class
// =============================================================================

/**
 * File-system committer queue
 *
 * @example
 * ```typescript
 * const queue = new FSQueue({ batchSize: 100, splitBatch: 'HALF', maxRetries: 2 })
 * await queue.init({ workDir: '/var/lib/committer' }, {
 *   async consume(requests) {
 *     for await (const request of requests) {
 *       await index.send(request)
 *     }
 *   },
 * })
 * await queue.queue(upsertRequest('doc-1', { title: 'One' }, 'body'))
 * await queue.close()
 * ```
 */
export class FSQueue implements CommitterQueue {
  private readonly config: ResolvedQueueConfig
  private readonly fanOut: FanOut
  private readonly delayFn: ((ms: number) => Promise<void>) | undefined

  private state: QueueState = 'uninitialized'
  private workDir: string | null = null
  private queueDir: string | null = null
  private errorDir: string | null = null
  private consumer: BatchConsumer | null = null
  private active: ActiveBatch | null = null

  /** Batch directories owned by a consumption, queued or running */
  private readonly claimed = new Set<string>()
  /** queue() calls still running */
  private readonly inflight = new Set<Promise<void>>()
  /** Tail of the consumption chain; batches are consumed one at a time, in seal order */
  private consumption: Promise<void> = Promise.resolve()
  private closing: Promise<void> | null = null

  private requestsQueued = 0
  private batchesConsumed = 0
  private requestsCommitted = 0
  private batchesFailed = 0
  private archivesInError = 0

  constructor(config: FSQueueConfig = {}, testOptions: FSQueueTestOptions = {}) {
    this.config = resolveQueueConfig(config)
    this.fanOut = computeFanOut(this.config.batchSize, this.config.maxPerFolder)
    this.delayFn = testOptions._delayFn
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Effective configuration, defaults applied
   */
  getConfig(): Readonly<ResolvedQueueConfig> {
    return this.config
  }

  /**
   * Create the queue and error directories and, when configured, commit
   * batches left over by a previous run. Allowed again after close().
   */
  async init(context: QueueContext, consumer: BatchConsumer): Promise<void> {
    if (this.state === 'initialized' || this.state === 'closing') {
      throw new QueueError('Queue is already initialized.', ErrorCode.QUEUE_ERROR)
    }

    const workDir = context.workDir ?? join(tmpdir(), TEMP_WORK_DIR_PREFIX + nextTimeId())
    const queueDir = join(workDir, QUEUE_DIR_NAME)
    const errorDir = join(workDir, ERROR_DIR_NAME)
    await ensureDirectory(queueDir)
    await ensureDirectory(errorDir)

    this.workDir = workDir
    this.queueDir = queueDir
    this.errorDir = errorDir
    this.consumer = consumer
    this.closing = null
    this.requestsQueued = 0
    this.batchesConsumed = 0
    this.requestsCommitted = 0
    this.batchesFailed = 0
    this.archivesInError = 0

    logger.info(`Committer queue directory: ${queueDir}`)

    if (this.config.commitLeftoversOnInit) {
      const committed = await this.consumeRemainingBatches()
      if (committed > 0) {
        logger.info(`Committed ${committed} leftover request(s) from previous execution.`)
      } else {
        logger.info('No leftovers from previous execution.')
      }
    }

    this.active = this.createActiveBatch(queueDir)
    this.state = 'initialized'
  }

  /**
   * Write a request to the active batch. The call that fills the batch
   * also waits for that batch to be committed, and rejects if the batch
   * ends up in the error directory (unless `ignoreErrors` is set).
   */
  async queue(request: CommitterRequest): Promise<void> {
    if (this.state !== 'initialized') {
      throw new QueueError(
        this.state === 'uninitialized'
          ? 'Queue is not initialized.'
          : 'Queue is closed; no more requests are accepted.',
        this.state === 'uninitialized' ? ErrorCode.QUEUE_NOT_INITIALIZED : ErrorCode.QUEUE_CLOSED,
        { reference: request.reference }
      )
    }

    const call = this.doQueue(request)
    this.inflight.add(call)
    try {
      await call
    } finally {
      this.inflight.delete(call)
    }
  }

  /**
   * Stop accepting requests, wait for queue() calls in progress, then
   * commit every batch still on disk. Calling it again is a no-op.
   */
  async close(): Promise<void> {
    if (this.state === 'uninitialized' || this.state === 'closed') {
      logger.debug('Queue is not open. Nothing to close.')
      return
    }
    if (this.closing) {
      return this.closing
    }
    this.state = 'closing'
    this.closing = this.doClose()
    return this.closing
  }

  /**
   * Delete the whole working directory, queued and failed batches
   * included. Not to be called while requests are being queued.
   */
  async clean(): Promise<void> {
    if (!this.workDir) {
      logger.error('Queue directory not found. Nothing to clean.')
      return
    }
    const workDir = this.workDir
    try {
      await fs.rm(workDir, { recursive: true, force: true })
    } catch (error) {
      throw new QueueError(
        `Could not clean committer queue directory: ${workDir}`,
        ErrorCode.CLEAN_ERROR,
        { path: workDir },
        toError(error)
      )
    }
    if (this.active && this.queueDir) {
      this.active = this.createActiveBatch(this.queueDir)
    }
    logger.info(`Cleaned committer queue directory: ${workDir}`)
  }

  /**
   * Get current queue statistics
   */
  getStats(): QueueStats {
    return {
      state: this.state,
      requestsQueued: this.requestsQueued,
      batchesConsumed: this.batchesConsumed,
      requestsCommitted: this.requestsCommitted,
      batchesFailed: this.batchesFailed,
      archivesInError: this.archivesInError,
      queueDir: this.queueDir,
      errorDir: this.errorDir,
    }
  }

  get queueDirectory(): string | null {
    return this.queueDir
  }

  get errorDirectory(): string | null {
    return this.errorDir
  }

  // ===========================================================================
  // Queueing
  // ===========================================================================

  private async doQueue(request: CommitterRequest): Promise<void> {
    const batch = this.active
    if (!batch) {
      throw new QueueError('Queue has no active batch.', ErrorCode.INTERNAL)
    }

    // Reserve a slot, start the write and seal without yielding, so
    // exactly one caller sees the batch fill up and every write of a
    // sealed batch is registered before its consumption starts.
    const ordinal = batch.reserved++
    const file = join(batch.dir, archivePath(ordinal, request.type, this.fanOut))
    const write = this.writeArchive(request, file)
    batch.writes.add(write)

    let consumed: Promise<ConsumptionResult> | null = null
    if (batch.reserved >= this.config.batchSize) {
      this.claimed.add(batch.dir)
      this.active = this.createActiveBatch(dirname(batch.dir))
      consumed = this.scheduleConsumption(batch.dir, batch)
    }

    let writeError: Error | undefined
    try {
      await write
    } catch (error) {
      writeError = toError(error)
    } finally {
      batch.writes.delete(write)
    }

    if (consumed) {
      try {
        await consumed
      } catch (error) {
        if (writeError) {
          logger.error(writeError.message, writeError.cause)
        }
        throw error
      }
    }
    if (writeError) {
      throw writeError
    }
  }

  private async writeArchive(request: CommitterRequest, file: string): Promise<void> {
    await ensureDirectory(dirname(file))
    try {
      await encodeRequest(request, file)
    } catch (error) {
      throw new QueueError(
        `Could not queue request for "${request.reference}" at ${file}`,
        ErrorCode.ARCHIVE_WRITE_ERROR,
        { path: file, reference: request.reference },
        toError(error)
      )
    }
    this.requestsQueued++
  }

  private createActiveBatch(queueDir: string): ActiveBatch {
    return {
      dir: join(queueDir, BATCH_DIR_PREFIX + nextTimeId()),
      reserved: 0,
      writes: new Set(),
    }
  }

  // ===========================================================================
  // Consumption
  // ===========================================================================

  private async doClose(): Promise<void> {
    try {
      await Promise.allSettled([...this.inflight])
      const active = this.active
      this.active = null
      if (active) {
        await settleWrites(active)
      }
      const committed = await this.consumeRemainingBatches()
      logger.info(`Committed ${committed} remaining request(s) on close.`)
    } finally {
      this.state = 'closed'
    }
  }

  /**
   * Consume every batch directory not owned by another consumption, in
   * name order (oldest first). Returns the number of requests committed.
   */
  private async consumeRemainingBatches(): Promise<number> {
    const queueDir = this.queueDir
    if (!queueDir) {
      return 0
    }
    let entries: string[]
    try {
      const dirents = await fs.readdir(queueDir, { withFileTypes: true })
      entries = dirents.filter(entry => entry.isDirectory()).map(entry => entry.name)
    } catch (error) {
      if (getSystemErrorCode(error) === 'ENOENT') {
        return 0
      }
      throw new QueueError(
        `Could not list committer queue directory: ${queueDir}`,
        ErrorCode.BATCH_READ_ERROR,
        { path: queueDir },
        toError(error)
      )
    }

    let committed = 0
    let firstError: Error | undefined
    for (const name of entries.sort()) {
      const dir = join(queueDir, name)
      if (this.claimed.has(dir)) {
        continue
      }
      this.claimed.add(dir)
      try {
        const result = await this.scheduleConsumption(dir)
        committed += result.committed
      } catch (error) {
        // later batches are still committed; the first failure is rethrown
        firstError ??= toError(error)
      }
    }
    if (firstError) {
      throw firstError
    }
    return committed
  }

  /**
   * Append a batch to the consumption chain. A sealed batch is consumed
   * once all its writes have settled. The returned promise settles with
   * that batch; the chain itself keeps going either way.
   */
  private scheduleConsumption(dir: string, sealed?: ActiveBatch): Promise<ConsumptionResult> {
    const run = this.consumption.then(async () => {
      if (sealed) {
        await settleWrites(sealed)
      }
      return this.consumeBatch(dir)
    })
    this.consumption = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  private async consumeBatch(dir: string): Promise<ConsumptionResult> {
    const consumer = this.consumer
    const errorDir = this.errorDir
    if (!consumer || !errorDir) {
      throw new QueueError('Queue is not initialized.', ErrorCode.QUEUE_NOT_INITIALIZED)
    }

    try {
      logger.debug(`Consuming committer batch: ${dir}`)
      const result = await consumeBatchDirectory(dir, consumer, {
        maxRetries: this.config.maxRetries,
        retryDelay: this.config.retryDelay,
        splitBatch: this.config.splitBatch,
        errorDir,
        _delayFn: this.delayFn,
      })

      this.batchesConsumed++
      this.requestsCommitted += result.committed
      if (result.error) {
        this.batchesFailed++
        this.archivesInError += result.failed
        if (!this.config.ignoreErrors) {
          throw result.error
        }
        logger.error(result.error.message, result.error.cause)
      }
      return result
    } finally {
      this.claimed.delete(dir)
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

async function ensureDirectory(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true })
  } catch (error) {
    throw new QueueError(
      `Could not create directory: ${dir}`,
      ErrorCode.DIRECTORY_CREATE_ERROR,
      { path: dir },
      toError(error)
    )
  }
}

/**
 * Wait until every write reserved in a batch has settled
 */
async function settleWrites(batch: ActiveBatch): Promise<void> {
  await Promise.allSettled([...batch.writes])
}
