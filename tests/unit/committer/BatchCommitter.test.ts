/**
 * BatchCommitter Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync } from 'node:fs'
import { BatchCommitter, type CommitBatchFn } from '../../../src/committer/BatchCommitter'
import { createCommitterContext } from '../../../src/committer/context'
import { EventManager, type CommitterEvent } from '../../../src/committer/events'
import { propertyMatcher } from '../../../src/committer/restrictions'
import { FSQueue } from '../../../src/queue/FSQueue'
import { deleteRequest, upsertRequest } from '../../../src/request/factories'
import { metadataToObject } from '../../../src/request/metadata'
import type { CommitterRequest } from '../../../src/request/types'
import { BatchCommitError, CommitterError } from '../../../src/errors'
import { createTempDir, type TempDirContext } from '../../helpers'

describe('BatchCommitter', () => {
  let ctx: TempDirContext
  let events: CommitterEvent[]
  let eventManager: EventManager
  let received: CommitterRequest[][]

  const commitBatch: CommitBatchFn = async requests => {
    const batch: CommitterRequest[] = []
    for await (const request of requests) {
      batch.push(request)
    }
    received.push(batch)
  }

  function context() {
    return createCommitterContext({ workDir: ctx.tempDir, eventManager })
  }

  beforeEach(async () => {
    ctx = await createTempDir()
    events = []
    received = []
    eventManager = new EventManager(false)
    eventManager.on(event => {
      events.push(event)
    })
  })

  afterEach(async () => {
    await ctx.cleanup()
  })

  it('should fire lifecycle and batch events in order', async () => {
    const committer = new BatchCommitter({ commitBatch, queueConfig: { batchSize: 2 } })

    await committer.init(context())
    await committer.upsert(upsertRequest('doc-1'))
    await committer.upsert(upsertRequest('doc-2'))
    await committer.close()

    expect(events.map(e => e.name)).toEqual([
      'COMMITTER_INIT_BEGIN',
      'COMMITTER_INIT_END',
      'COMMITTER_UPSERT_BEGIN',
      'COMMITTER_UPSERT_END',
      'COMMITTER_UPSERT_BEGIN',
      'COMMITTER_BATCH_BEGIN',
      'COMMITTER_BATCH_END',
      'COMMITTER_UPSERT_END',
      'COMMITTER_CLOSE_BEGIN',
      'COMMITTER_CLOSE_END',
    ])
    expect(events.every(e => e.source === committer)).toBe(true)
    expect(events[2]).toMatchObject({ level: 'debug', request: { reference: 'doc-1' } })
    expect(events[5]?.level).toBe('info')
  })

  it('should send upserts and deletes through the queue in order', async () => {
    const committer = new BatchCommitter({ commitBatch, queueConfig: { batchSize: 10 } })

    await committer.init(context())
    await committer.upsert(upsertRequest('doc-1', {}, 'body'))
    await committer.delete(deleteRequest('doc-0'))
    await committer.close()

    expect(received.map(batch => batch.map(r => `${r.type}:${r.reference}`))).toEqual([
      ['upsert:doc-1', 'delete:doc-0'],
    ])
  })

  it('should apply field mappings before queueing', async () => {
    const committer = new BatchCommitter({
      commitBatch,
      fieldMappings: { title: 'dc:title', junk: null },
    })

    await committer.init(context())
    await committer.upsert(upsertRequest('doc-1', { title: 'One', junk: 'x', keep: 'y' }))
    await committer.close()

    const request = received[0]?.[0]
    expect(request && metadataToObject(request.metadata)).toEqual({ 'dc:title': ['One'], keep: ['y'] })
  })

  it('should accept requests matching its restrictions', async () => {
    const committer = new BatchCommitter({
      commitBatch,
      restrictions: [propertyMatcher('collection', 'news')],
    })
    await committer.init(context())

    expect(committer.accept(upsertRequest('a', { collection: 'news' }))).toBe(true)
    expect(committer.accept(upsertRequest('b', { collection: 'sports' }))).toBe(false)
    expect(events.slice(-2).map(e => e.name)).toEqual(['COMMITTER_ACCEPT_YES', 'COMMITTER_ACCEPT_NO'])

    await committer.close()
  })

  it('should fire batch and upsert errors when the sink fails', async () => {
    const committer = new BatchCommitter({
      commitBatch: async requests => {
        for await (const request of requests) {
          void request
        }
        throw new Error('index offline')
      },
      queueConfig: { batchSize: 1 },
    })
    await committer.init(context())

    await expect(committer.upsert(upsertRequest('doc-1'))).rejects.toBeInstanceOf(BatchCommitError)

    expect(events.slice(2).map(e => e.name)).toEqual([
      'COMMITTER_UPSERT_BEGIN',
      'COMMITTER_BATCH_BEGIN',
      'COMMITTER_BATCH_ERROR',
      'COMMITTER_UPSERT_ERROR',
    ])
    expect(events[4]?.error?.message).toBe('index offline')
    expect(events[5]?.error).toBeInstanceOf(BatchCommitError)

    await committer.close()
  })

  it('should use the queue it is given', () => {
    const queue = new FSQueue({ batchSize: 3 })
    const committer = new BatchCommitter({ commitBatch, queue })

    expect(committer.getQueue()).toBe(queue)
  })

  it('should manage restrictions and mappings after construction', () => {
    const committer = new BatchCommitter({ commitBatch })

    committer.addRestriction(propertyMatcher('a'), propertyMatcher('a', 'x'), propertyMatcher('b'))
    expect(committer.removeRestriction('a')).toBe(2)
    expect(committer.getRestrictions()).toHaveLength(1)
    committer.clearRestrictions()
    expect(committer.getRestrictions()).toEqual([])

    committer.setFieldMapping('title', 'name')
    expect(committer.getFieldMappings().get('title')).toBe('name')
    expect(committer.removeFieldMapping('title')).toBe(true)
    expect(committer.getFieldMappings().size).toBe(0)
  })

  it('should not expose a context before init', () => {
    const committer = new BatchCommitter({ commitBatch })

    expect(() => committer.committerContext).toThrow(CommitterError)
  })

  it('should delete the working directory on clean', async () => {
    const committer = new BatchCommitter({ commitBatch })
    await committer.init(context())
    await committer.upsert(upsertRequest('doc-1'))
    await committer.close()

    await committer.clean()

    expect(existsSync(ctx.tempDir)).toBe(false)
    expect(events.slice(-2).map(e => e.name)).toEqual(['COMMITTER_CLEAN_BEGIN', 'COMMITTER_CLEAN_END'])
  })
})
