/**
 * FSQueue Tests
 *
 * Queueing, sealing, draining and recovery against real temp directories.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync } from 'node:fs'
import { writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { FSQueue } from '../../../src/queue/FSQueue'
import { deleteRequest, upsertRequest } from '../../../src/request/factories'
import { BatchCommitError, CodecError, ConfigurationError, ErrorCode } from '../../../src/errors'
import {
  createTempDir,
  directoryEntryCounts,
  listZipFiles,
  recordingConsumer,
  restoreLogger,
  spyLogger,
  writeBatch,
  type TempDirContext,
} from '../../helpers'

function doc(i: number) {
  return upsertRequest(`doc-${i}`, { position: String(i) }, `body ${i}`)
}

describe('FSQueue', () => {
  let ctx: TempDirContext
  let workDir: string
  let queueDir: string
  let errorDir: string

  beforeEach(async () => {
    ctx = await createTempDir()
    workDir = ctx.tempDir
    queueDir = join(workDir, 'queue')
    errorDir = join(workDir, 'error')
  })

  afterEach(async () => {
    restoreLogger()
    await ctx.cleanup()
  })

  describe('batching', () => {
    it('should consume full batches as they fill and the rest on close', async () => {
      const consumer = recordingConsumer()
      const queue = new FSQueue({ batchSize: 5 })
      await queue.init({ workDir }, consumer)

      for (let i = 0; i < 13; i++) {
        await queue.queue(doc(i))
      }

      expect(consumer.calls.map(call => call.length)).toEqual([5, 5])
      expect(await listZipFiles(queueDir)).toHaveLength(3)

      await queue.close()

      expect(consumer.calls.map(call => call.length)).toEqual([5, 5, 3])
      expect(consumer.committed.flat()).toEqual(Array.from({ length: 13 }, (_, i) => `doc-${i}`))
      expect(await listZipFiles(queueDir)).toEqual([])
      expect(queue.getStats()).toEqual({
        state: 'closed',
        requestsQueued: 13,
        batchesConsumed: 3,
        requestsCommitted: 13,
        batchesFailed: 0,
        archivesInError: 0,
        queueDir,
        errorDir,
      })
    })

    it('should seal a batch on exactly the batch-size request', async () => {
      const consumer = recordingConsumer()
      const queue = new FSQueue({ batchSize: 3 })
      await queue.init({ workDir }, consumer)

      await queue.queue(doc(0))
      await queue.queue(doc(1))
      expect(consumer.calls).toEqual([])

      await queue.queue(doc(2))
      expect(consumer.calls).toEqual([['doc-0', 'doc-1', 'doc-2']])

      await queue.close()
      expect(consumer.calls).toHaveLength(1)
    })

    it('should keep deletes and upserts in queue order', async () => {
      const consumer = recordingConsumer()
      const queue = new FSQueue({ batchSize: 3 })
      await queue.init({ workDir }, consumer)

      await queue.queue(doc(0))
      await queue.queue(deleteRequest('doc-0'))
      await queue.queue(doc(1))
      await queue.close()

      expect(consumer.committed).toEqual([['doc-0', 'doc-0', 'doc-1']])
    })

    it('should split concurrent calls into whole batches without losing requests', async () => {
      const consumer = recordingConsumer()
      const queue = new FSQueue({ batchSize: 4 })
      await queue.init({ workDir }, consumer)

      await Promise.all(Array.from({ length: 10 }, (_, i) => queue.queue(doc(i))))

      expect(consumer.calls.map(call => call.length)).toEqual([4, 4])

      await queue.close()

      expect(consumer.calls.map(call => call.length)).toEqual([4, 4, 2])
      expect(consumer.committed.flat()).toEqual(Array.from({ length: 10 }, (_, i) => `doc-${i}`))
    })

    it('should accept requests into the next batch while a sealed one is committing', async () => {
      let release: () => void = () => {}
      const gate = new Promise<void>(resolve => {
        release = resolve
      })
      const committed: string[][] = []
      const queue = new FSQueue({ batchSize: 2 })
      await queue.init({ workDir }, {
        async consume(requests) {
          const refs: string[] = []
          for await (const request of requests) {
            refs.push(request.reference)
          }
          await gate
          committed.push(refs)
        },
      })

      await queue.queue(doc(0))
      let sealDone = false
      const sealing = queue.queue(doc(1)).then(() => {
        sealDone = true
      })
      await queue.queue(doc(2))

      expect(sealDone).toBe(false)
      expect(committed).toEqual([])

      release()
      await sealing
      expect(committed).toEqual([['doc-0', 'doc-1']])

      await queue.close()
      expect(committed).toEqual([['doc-0', 'doc-1'], ['doc-2']])
    })

    it('should keep every folder within maxPerFolder entries', async () => {
      const queue = new FSQueue({ batchSize: 9, maxPerFolder: 2 })
      await queue.init({ workDir }, recordingConsumer())

      for (let i = 0; i < 8; i++) {
        await queue.queue(doc(i))
      }

      const counts = await directoryEntryCounts(queueDir)
      expect(Math.max(...counts.values())).toBeLessThanOrEqual(2)
      expect(await listZipFiles(queueDir)).toHaveLength(8)

      await queue.close()
    })
  })

  describe('durability', () => {
    it('should commit requests left by an abandoned queue on the next init', async () => {
      const abandoned = new FSQueue({ batchSize: 10 })
      await abandoned.init({ workDir }, recordingConsumer())
      for (let i = 0; i < 4; i++) {
        await abandoned.queue(doc(i))
      }

      const consumer = recordingConsumer()
      const queue = new FSQueue({ batchSize: 10, commitLeftoversOnInit: true })
      await queue.init({ workDir }, consumer)

      expect(consumer.committed).toEqual([['doc-0', 'doc-1', 'doc-2', 'doc-3']])
      expect(await listZipFiles(queueDir)).toEqual([])

      await queue.close()
    })

    it('should commit leftover batches oldest first', async () => {
      await writeBatch(join(queueDir, 'batch-2'), 2, 'b-')
      await writeBatch(join(queueDir, 'batch-1'), 3, 'a-')
      const log = spyLogger()
      const consumer = recordingConsumer()
      const queue = new FSQueue({ commitLeftoversOnInit: true })

      await queue.init({ workDir }, consumer)

      expect(consumer.committed).toEqual([
        ['a-0', 'a-1', 'a-2'],
        ['b-0', 'b-1'],
      ])
      expect(log.info).toHaveBeenCalledWith('Committed 5 leftover request(s) from previous execution.')

      await queue.close()
    })

    it('should move a leftover batch with an unreadable archive out of the queue', async () => {
      const files = await writeBatch(join(queueDir, 'batch-1'), 3)
      await writeFile(files[1], 'truncated')
      const config = { commitLeftoversOnInit: true, splitBatch: 'ONE' as const }
      const consumer = recordingConsumer()
      const queue = new FSQueue(config)

      await expect(queue.init({ workDir }, consumer)).rejects.toBeInstanceOf(BatchCommitError)

      expect(await listZipFiles(queueDir)).toEqual([])
      expect(await listZipFiles(errorDir)).toEqual([
        'batch-1/000-upsert.zip',
        'batch-1/001-upsert.zip',
        'batch-1/002-upsert.zip',
      ])
      expect(queue.getStats()).toMatchObject({ batchesFailed: 1, archivesInError: 3 })

      await queue.init({ workDir }, consumer)
      await queue.queue(doc(0))
      await queue.close()

      expect(consumer.committed).toEqual([['doc-0']])
    })

    it('should not block init on an unreadable leftover when errors are ignored', async () => {
      const files = await writeBatch(join(queueDir, 'batch-1'), 3)
      await writeFile(files[1], 'truncated')
      const log = spyLogger()
      const queue = new FSQueue({ commitLeftoversOnInit: true, ignoreErrors: true })

      await queue.init({ workDir }, recordingConsumer())

      expect(log.error).toHaveBeenCalledWith(
        expect.stringMatching(/^Could not process one or more files from committer batch/),
        expect.any(CodecError)
      )
      expect(await listZipFiles(queueDir)).toEqual([])
      expect(await listZipFiles(errorDir)).toHaveLength(3)

      await queue.close()
    })

    it('should report when there are no leftovers', async () => {
      const log = spyLogger()
      const queue = new FSQueue({ commitLeftoversOnInit: true })

      await queue.init({ workDir }, recordingConsumer())

      expect(log.info).toHaveBeenCalledWith('No leftovers from previous execution.')
      await queue.close()
    })

    it('should leave leftovers alone on init unless asked, and commit them on close', async () => {
      await writeBatch(join(queueDir, 'batch-1'), 3, 'a-')
      const consumer = recordingConsumer()
      const queue = new FSQueue()

      await queue.init({ workDir }, consumer)
      expect(consumer.calls).toEqual([])

      await queue.close()
      expect(consumer.committed).toEqual([['a-0', 'a-1', 'a-2']])
    })
  })

  describe('failures', () => {
    it('should reject the call that fills a batch that ends up in the error directory', async () => {
      const consumer = recordingConsumer(() => true)
      const queue = new FSQueue({ batchSize: 4, splitBatch: 'HALF' })
      await queue.init({ workDir }, consumer)

      for (let i = 0; i < 3; i++) {
        await queue.queue(doc(i))
      }
      await expect(queue.queue(doc(3))).rejects.toBeInstanceOf(BatchCommitError)

      expect(consumer.calls.map(call => call.length)).toEqual([4, 2, 1, 1, 1, 1])
      expect(await listZipFiles(errorDir)).toHaveLength(4)
      expect(queue.getStats()).toMatchObject({ batchesFailed: 1, archivesInError: 4, requestsCommitted: 0 })

      await queue.close()
    })

    it('should log instead of throwing when errors are ignored', async () => {
      const log = spyLogger()
      const queue = new FSQueue({ batchSize: 2, ignoreErrors: true })
      await queue.init({ workDir }, recordingConsumer(() => true))

      await queue.queue(doc(0))
      await expect(queue.queue(doc(1))).resolves.toBeUndefined()

      expect(log.error).toHaveBeenCalledWith(
        expect.stringMatching(/^Could not process one or more files from committer batch/),
        expect.any(Error)
      )
      expect(await listZipFiles(errorDir)).toHaveLength(2)

      await queue.close()
    })

    it('should reject close when a remaining batch fails', async () => {
      const queue = new FSQueue({ batchSize: 10 })
      await queue.init({ workDir }, recordingConsumer(() => true))
      await queue.queue(doc(0))
      await queue.queue(doc(1))

      await expect(queue.close()).rejects.toBeInstanceOf(BatchCommitError)

      expect(queue.getStats().state).toBe('closed')
      expect(await listZipFiles(errorDir)).toHaveLength(2)
    })

    it('should keep draining after a failed batch on close', async () => {
      await writeBatch(join(queueDir, 'batch-1'), 1, 'bad-')
      await writeBatch(join(queueDir, 'batch-2'), 2, 'good-')
      const consumer = recordingConsumer(refs => refs.includes('bad-0'))
      const queue = new FSQueue()
      await queue.init({ workDir }, consumer)

      await expect(queue.close()).rejects.toBeInstanceOf(BatchCommitError)

      expect(consumer.committed).toEqual([['good-0', 'good-1']])
      expect(await listZipFiles(errorDir)).toEqual(['batch-1/000-upsert.zip'])
    })
  })

  describe('lifecycle', () => {
    it('should reject requests before init', async () => {
      const queue = new FSQueue()

      await expect(queue.queue(doc(0))).rejects.toMatchObject({
        code: ErrorCode.QUEUE_NOT_INITIALIZED,
        message: 'Queue is not initialized.',
      })
    })

    it('should reject requests after close', async () => {
      const queue = new FSQueue()
      await queue.init({ workDir }, recordingConsumer())
      await queue.close()

      await expect(queue.queue(doc(0))).rejects.toMatchObject({ code: ErrorCode.QUEUE_CLOSED })
    })

    it('should close only once', async () => {
      const consumer = recordingConsumer()
      const queue = new FSQueue()
      await queue.init({ workDir }, consumer)
      await queue.queue(doc(0))

      await Promise.all([queue.close(), queue.close()])
      await queue.close()

      expect(consumer.calls).toEqual([['doc-0']])
    })

    it('should allow close before init', async () => {
      await expect(new FSQueue().close()).resolves.toBeUndefined()
    })

    it('should refuse a second init while open', async () => {
      const queue = new FSQueue()
      await queue.init({ workDir }, recordingConsumer())

      await expect(queue.init({ workDir }, recordingConsumer())).rejects.toThrow(
        'Queue is already initialized.'
      )

      await queue.close()
    })

    it('should start over after close', async () => {
      const consumer = recordingConsumer()
      const queue = new FSQueue()

      await queue.init({ workDir }, consumer)
      await queue.queue(doc(0))
      await queue.close()
      await queue.init({ workDir }, consumer)
      await queue.queue(doc(1))
      await queue.close()

      expect(consumer.committed).toEqual([['doc-0'], ['doc-1']])
      expect(queue.getStats().requestsQueued).toBe(1)
    })

    it('should use a temp working directory when none is given', async () => {
      const queue = new FSQueue()
      await queue.init({}, recordingConsumer())

      expect(queue.queueDirectory?.startsWith(join(tmpdir(), 'committer-'))).toBe(true)

      await queue.close()
      await queue.clean()
    })

    it('should report its state before init', () => {
      const stats = new FSQueue().getStats()

      expect(stats.state).toBe('uninitialized')
      expect(stats.queueDir).toBeNull()
    })

    it('should validate its configuration', () => {
      expect(() => new FSQueue({ batchSize: 0 })).toThrow(ConfigurationError)
      expect(new FSQueue().getConfig().batchSize).toBe(20)
    })
  })

  describe('clean', () => {
    it('should delete the working directory and keep accepting requests', async () => {
      const consumer = recordingConsumer()
      const queue = new FSQueue({ batchSize: 10 })
      await queue.init({ workDir }, consumer)
      await queue.queue(doc(0))
      await queue.queue(doc(1))

      await queue.clean()
      expect(existsSync(workDir)).toBe(false)

      await queue.queue(upsertRequest('after-clean'))
      await queue.close()

      expect(consumer.committed).toEqual([['after-clean']])
    })

    it('should do nothing before init', async () => {
      const log = spyLogger()

      await new FSQueue().clean()

      expect(log.error).toHaveBeenCalledWith('Queue directory not found. Nothing to clean.')
    })
  })
})
