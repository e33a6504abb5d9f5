/**
 * BatchCommitter - committer backed by a durable queue
 *
 * Upserts and deletes are queued on disk and handed to a sink callback
 * in batches. Batch begin, end and error events are fired around every
 * sink call.
 *
 * @module committer/BatchCommitter
 */

import { toError } from '../errors'
import { FSQueue } from '../queue/FSQueue'
import type { CommitterQueue, FSQueueConfig, RequestIterator } from '../queue/types'
import type { DeleteRequest, UpsertRequest } from '../request/types'
import { AbstractCommitter, type CommitterOptions } from './AbstractCommitter'
import { CommitterEvents } from './events'

/**
 * Sends one batch of requests to the target repository. Must process
 * every request it pulls, or throw.
 */
export type CommitBatchFn = (requests: RequestIterator) => Promise<void>

export interface BatchCommitterOptions extends CommitterOptions {
  commitBatch: CommitBatchFn
  /** Queue to use; an FSQueue built from `queueConfig` by default */
  queue?: CommitterQueue | undefined
  /** Ignored when `queue` is given */
  queueConfig?: FSQueueConfig | undefined
}

/**
 * @example
 * ```typescript
 * const committer = new BatchCommitter({
 *   queueConfig: { batchSize: 50, maxRetries: 3, retryDelay: 2000, splitBatch: 'HALF' },
 *   async commitBatch(requests) {
 *     const docs = []
 *     for await (const request of requests) docs.push(await toDocument(request))
 *     await searchIndex.bulk(docs)
 *   },
 * })
 * await committer.init(createCommitterContext({ workDir: './work' }))
 * ```
 */
export class BatchCommitter extends AbstractCommitter {
  private readonly queue: CommitterQueue
  private readonly commitBatch: CommitBatchFn

  constructor(options: BatchCommitterOptions) {
    super(options)
    this.commitBatch = options.commitBatch
    this.queue = options.queue ?? new FSQueue(options.queueConfig)
  }

  getQueue(): CommitterQueue {
    return this.queue
  }

  protected async doInit(): Promise<void> {
    await this.queue.init(this.committerContext, {
      consume: requests => this.consumeBatch(requests),
    })
  }

  protected async doUpsert(request: UpsertRequest): Promise<void> {
    await this.queue.queue(request)
  }

  protected async doDelete(request: DeleteRequest): Promise<void> {
    await this.queue.queue(request)
  }

  protected async doClose(): Promise<void> {
    await this.queue.close()
  }

  protected async doClean(): Promise<void> {
    await this.queue.clean()
  }

  private async consumeBatch(requests: RequestIterator): Promise<void> {
    this.fire(CommitterEvents.COMMITTER_BATCH_BEGIN, 'info')
    try {
      await this.commitBatch(requests)
    } catch (error) {
      this.fire(CommitterEvents.COMMITTER_BATCH_ERROR, 'error', undefined, toError(error))
      throw error
    }
    this.fire(CommitterEvents.COMMITTER_BATCH_END, 'info')
  }
}
