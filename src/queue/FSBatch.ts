/**
 * FSBatch - a set of request archives on disk
 *
 * A batch is a directory plus an explicit, sorted list of archive files
 * under it. Sub-batches produced by splitting share the directory but
 * carry a slice of the file list, so deleting a sub-batch only removes
 * its own archives.
 *
 * @module queue/FSBatch
 */

import { promises as fs } from 'node:fs'
import { basename, dirname, join, relative } from 'node:path'
import { ARCHIVE_EXTENSION } from '../constants'
import { ErrorCode, QueueError, getSystemErrorCode, toError } from '../errors'
import { decodeRequest } from '../request/codec'
import type { CommitterRequest } from '../request/types'
import { nextTimeId } from '../utils/time-id'
import type { RequestIterator } from './types'

// =============================================================================
// Iterator
// =============================================================================

/**
 * Lazy iterator over the archives of a batch. Each `next()` reads and
 * decodes one archive. A read or decode failure is remembered so the
 * caller can tell it apart from a sink failure, even when the sink wraps
 * the error.
 */
export class BatchRequestIterator implements RequestIterator {
  private index = 0
  private failure: Error | undefined

  constructor(private readonly files: readonly string[]) {}

  get count(): number {
    return this.index
  }

  get size(): number {
    return this.files.length
  }

  /** Read or decode error raised while iterating, if any */
  get fatalError(): Error | undefined {
    return this.failure
  }

  hasNext(): boolean {
    return this.index < this.files.length
  }

  async next(): Promise<IteratorResult<CommitterRequest, undefined>> {
    const file = this.files[this.index]
    if (file === undefined) {
      return { done: true, value: undefined }
    }
    try {
      const request = await decodeRequest(file)
      this.index++
      return { done: false, value: request }
    } catch (error) {
      this.failure = toError(error)
      throw error
    }
  }

  [Symbol.asyncIterator](): this {
    return this
  }
}

// =============================================================================
// Listing
// =============================================================================

async function collectArchives(dir: string, out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true })
  for (const entry of entries) {
    const path = join(dir, entry.name)
    if (entry.isDirectory()) {
      await collectArchives(path, out)
    } else if (entry.isFile() && entry.name.endsWith(ARCHIVE_EXTENSION)) {
      out.push(path)
    }
  }
}

/**
 * List every archive under `dir`, sorted in queue order. A missing
 * directory has no archives.
 */
export async function listArchives(dir: string): Promise<string[]> {
  const files: string[] = []
  try {
    await collectArchives(dir, files)
  } catch (error) {
    if (getSystemErrorCode(error) === 'ENOENT') {
      return []
    }
    throw new QueueError(
      `Could not list committer batch directory: ${dir}`,
      ErrorCode.BATCH_READ_ERROR,
      { path: dir },
      toError(error)
    )
  }
  const keyed = files.map(file => ({ file, key: relative(dir, file) }))
  keyed.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
  return keyed.map(entry => entry.file)
}

/**
 * Remove a directory if it is empty. Returns false when it was kept.
 */
async function removeIfEmpty(dir: string): Promise<boolean> {
  try {
    await fs.rmdir(dir)
    return true
  } catch (error) {
    const code = getSystemErrorCode(error)
    if (code === 'ENOTEMPTY' || code === 'EEXIST' || code === 'ENOENT') {
      return false
    }
    throw error
  }
}

// =============================================================================
// FSBatch
// =============================================================================

/**
 * Request archives of one batch directory
 */
export class FSBatch {
  constructor(
    readonly dir: string,
    readonly files: readonly string[]
  ) {}

  /**
   * Batch made of every archive currently under `dir`
   */
  static async fromDirectory(dir: string): Promise<FSBatch> {
    return new FSBatch(dir, await listArchives(dir))
  }

  get size(): number {
    return this.files.length
  }

  get name(): string {
    return basename(this.dir)
  }

  isEmpty(): boolean {
    return this.files.length === 0
  }

  iterator(): BatchRequestIterator {
    return new BatchRequestIterator(this.files)
  }

  /**
   * Sub-batch of `files.slice(start, end)`
   */
  slice(start: number, end?: number): FSBatch {
    return new FSBatch(this.dir, this.files.slice(start, end))
  }

  /**
   * Consecutive sub-batches of at most `maxSize` archives
   */
  split(maxSize: number): FSBatch[] {
    const size = Math.max(1, Math.floor(maxSize))
    const batches: FSBatch[] = []
    for (let i = 0; i < this.files.length; i += size) {
      batches.push(this.slice(i, i + size))
    }
    return batches
  }

  /**
   * Delete the archives of this batch, then any directory left empty
   * between them and the batch directory, the batch directory included.
   */
  async delete(): Promise<void> {
    for (const file of this.files) {
      try {
        await fs.unlink(file)
      } catch (error) {
        if (getSystemErrorCode(error) === 'ENOENT') {
          continue
        }
        throw new QueueError(
          `Could not delete committer request file: ${file}`,
          ErrorCode.ARCHIVE_DELETE_ERROR,
          { path: file },
          toError(error)
        )
      }
    }
    await this.pruneDirectories()
  }

  /**
   * Move the archives of this batch under `errorDir/<batch name>/`,
   * keeping their relative paths. Returns the directory they were moved to.
   */
  async moveTo(errorDir: string): Promise<string> {
    const target = join(errorDir, this.name)
    for (const file of this.files) {
      const destination = join(target, relative(this.dir, file))
      try {
        await fs.mkdir(dirname(destination), { recursive: true })
        await moveFile(file, destination)
      } catch (error) {
        throw new QueueError(
          `Could not move committer request file ${file} to ${destination}`,
          ErrorCode.BATCH_MOVE_ERROR,
          { path: file },
          toError(error)
        )
      }
    }
    await this.pruneDirectories()
    return target
  }

  private async pruneDirectories(): Promise<void> {
    const dirs = new Set<string>()
    for (const file of this.files) {
      let current = dirname(file)
      while (current.startsWith(this.dir) && current !== dirname(this.dir)) {
        dirs.add(current)
        current = dirname(current)
      }
    }
    const deepestFirst = [...dirs].sort((a, b) => b.length - a.length)
    try {
      for (const dir of deepestFirst) {
        await removeIfEmpty(dir)
      }
    } catch (error) {
      throw new QueueError(
        `Could not clean up committer batch directory: ${this.dir}`,
        ErrorCode.ARCHIVE_DELETE_ERROR,
        { path: this.dir },
        toError(error)
      )
    }
  }
}

// =============================================================================
// Directory Moves
// =============================================================================

async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.access(path)
    return true
  } catch (error) {
    if (getSystemErrorCode(error) === 'ENOENT') {
      return false
    }
    throw error
  }
}

/**
 * Rename, falling back to copy and delete across devices
 */
async function moveFile(source: string, destination: string): Promise<void> {
  try {
    await fs.rename(source, destination)
  } catch (error) {
    if (getSystemErrorCode(error) !== 'EXDEV') {
      throw error
    }
    await fs.cp(source, destination, { recursive: true, errorOnExist: true, force: false })
    await fs.rm(source, { recursive: true, force: true })
  }
}

/**
 * Move a whole batch directory into `errorDir`, keeping its name. When
 * a directory of that name already exists there, a time id is appended.
 * Returns the new location.
 */
export async function moveBatchDirectory(batchDir: string, errorDir: string): Promise<string> {
  let target = join(errorDir, basename(batchDir))
  try {
    await fs.mkdir(errorDir, { recursive: true })
    if (await pathExists(target)) {
      target = `${target}-${nextTimeId()}`
    }
    await moveFile(batchDir, target)
  } catch (error) {
    throw new QueueError(
      `Could not move committer batch ${batchDir} to ${target}`,
      ErrorCode.BATCH_MOVE_ERROR,
      { path: batchDir },
      toError(error)
    )
  }
  return target
}
