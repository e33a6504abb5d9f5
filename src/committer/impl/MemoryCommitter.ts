/**
 * MemoryCommitter - keeps committed requests in memory
 *
 * Useful for tests and for inspecting what a pipeline would send.
 *
 * @module committer/impl/MemoryCommitter
 */

import { readContent } from '../../request/factories'
import type { DeleteRequest, Metadata, UpsertRequest } from '../../request/types'
import { logger } from '../../utils/logger'
import { AbstractCommitter, type CommitterOptions } from '../AbstractCommitter'
import type { TextMatcher } from '../text-matcher'

// =============================================================================
// Types
// =============================================================================

export interface StoredUpsert {
  readonly type: 'upsert'
  readonly reference: string
  readonly metadata: Metadata
  /** Null when content is ignored */
  readonly content: Uint8Array | null
}

export interface StoredDelete {
  readonly type: 'delete'
  readonly reference: string
  readonly metadata: Metadata
}

export type StoredRequest = StoredUpsert | StoredDelete

export interface MemoryCommitterOptions extends CommitterOptions {
  /** Do not keep upsert content */
  ignoreContent?: boolean | undefined
  /** Keep only the metadata fields matching this */
  fieldMatcher?: TextMatcher | undefined
}

// =============================================================================
// MemoryCommitter Class
// =============================================================================

export class MemoryCommitter extends AbstractCommitter {
  private requests: StoredRequest[] = []
  private upsertCount = 0
  private deleteCount = 0
  readonly ignoreContent: boolean
  readonly fieldMatcher: TextMatcher | undefined

  constructor(options: MemoryCommitterOptions = {}) {
    super(options)
    this.ignoreContent = options.ignoreContent ?? false
    this.fieldMatcher = options.fieldMatcher
  }

  getAllRequests(): readonly StoredRequest[] {
    return [...this.requests]
  }

  getUpsertRequests(): StoredUpsert[] {
    return this.requests.filter((r): r is StoredUpsert => r.type === 'upsert')
  }

  getDeleteRequests(): StoredDelete[] {
    return this.requests.filter((r): r is StoredDelete => r.type === 'delete')
  }

  getUpsertCount(): number {
    return this.upsertCount
  }

  getDeleteCount(): number {
    return this.deleteCount
  }

  getRequestCount(): number {
    return this.requests.length
  }

  removeRequest(request: StoredRequest): boolean {
    const index = this.requests.indexOf(request)
    if (index === -1) {
      return false
    }
    this.requests.splice(index, 1)
    return true
  }

  protected async doInit(): Promise<void> {
    // nothing to set up
  }

  protected async doUpsert(request: UpsertRequest): Promise<void> {
    logger.debug(`Committing upsert request for ${request.reference}`)
    const content = this.ignoreContent ? null : await readContent(request.content)
    this.requests.push(
      Object.freeze({
        type: 'upsert' as const,
        reference: request.reference,
        metadata: this.filterMetadata(request.metadata),
        content,
      })
    )
    this.upsertCount++
  }

  protected async doDelete(request: DeleteRequest): Promise<void> {
    logger.debug(`Committing delete request for ${request.reference}`)
    this.requests.push(
      Object.freeze({
        type: 'delete' as const,
        reference: request.reference,
        metadata: this.filterMetadata(request.metadata),
      })
    )
    this.deleteCount++
  }

  protected async doClose(): Promise<void> {
    logger.info(`${this.upsertCount} upserts committed.`)
    logger.info(`${this.deleteCount} deletions committed.`)
  }

  protected async doClean(): Promise<void> {
    this.requests = []
    this.upsertCount = 0
    this.deleteCount = 0
  }

  private filterMetadata(metadata: Metadata): Map<string, string[]> {
    const kept = new Map<string, string[]>()
    for (const [key, values] of metadata) {
      if (!this.fieldMatcher || this.fieldMatcher.matches(key)) {
        kept.set(key, [...values])
      }
    }
    return kept
  }
}
