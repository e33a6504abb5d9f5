/**
 * batchcommit
 *
 * Durable, file-system-backed batching for committers that send
 * documents to a target repository.
 *
 * @example
 * ```typescript
 * import { BatchCommitter, createCommitterContext, upsertRequest } from 'batchcommit'
 *
 * const committer = new BatchCommitter({
 *   queueConfig: { batchSize: 100, splitBatch: 'HALF' },
 *   async commitBatch(requests) {
 *     for await (const request of requests) {
 *       await target.send(request)
 *     }
 *   },
 * })
 * await committer.init(createCommitterContext({ workDir: './work' }))
 * await committer.upsert(upsertRequest('doc-1', { title: 'One' }, 'Hello'))
 * await committer.close()
 * ```
 *
 * @packageDocumentation
 */

export * from './request'
export * from './queue'
export * from './committer'
export * from './errors'
export * from './utils'
export * from './constants'
