/**
 * Committer queue exports
 *
 * @module queue
 */

export type {
  BatchConsumer,
  CommitterQueue,
  FSQueueConfig,
  QueueContext,
  QueueState,
  QueueStats,
  RequestIterator,
  ResolvedQueueConfig,
  SplitBatch,
} from './types'

export { DEFAULT_QUEUE_CONFIG, parseQueueConfig, queueConfigSchema, resolveQueueConfig } from './config'
export { archivePath, computeFanOut, fanOutCapacity, type FanOut } from './fanout'
export { BatchRequestIterator, FSBatch, listArchives, moveBatchDirectory } from './FSBatch'
export {
  consumeBatchDirectory,
  reduceChunkSize,
  type ConsumptionOptions,
  type ConsumptionResult,
} from './consumption'
export { FSQueue, type FSQueueTestOptions } from './FSQueue'
