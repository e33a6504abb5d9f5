/**
 * LogCommitter - writes every request to the log
 *
 * @module committer/impl/LogCommitter
 */

import { LOG_PROGRESS_INTERVAL } from '../../constants'
import { readContent } from '../../request/factories'
import type { DeleteRequest, Metadata, UpsertRequest } from '../../request/types'
import { logAt, logger, type LogLevel } from '../../utils/logger'
import { AbstractCommitter, type CommitterOptions } from '../AbstractCommitter'
import type { TextMatcher } from '../text-matcher'

export interface LogCommitterOptions extends CommitterOptions {
  /** Level request dumps are logged at (default: info) */
  level?: LogLevel | undefined
  /** Do not log upsert content */
  ignoreContent?: boolean | undefined
  /** Log only the metadata fields matching this */
  fieldMatcher?: TextMatcher | undefined
}

function formatElapsed(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000)
  const hours = Math.floor(totalSeconds / 3600)
  const minutes = Math.floor((totalSeconds % 3600) / 60)
  const seconds = totalSeconds % 60
  const millis = ms % 1000
  return (
    `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}:` +
    `${String(seconds).padStart(2, '0')}.${String(millis).padStart(3, '0')}`
  )
}

/**
 * @example
 * ```typescript
 * const committer = new LogCommitter({ level: 'debug', ignoreContent: true })
 * ```
 */
export class LogCommitter extends AbstractCommitter {
  readonly level: LogLevel
  readonly ignoreContent: boolean
  readonly fieldMatcher: TextMatcher | undefined

  private upsertCount = 0
  private deleteCount = 0
  private startedAt = Date.now()

  constructor(options: LogCommitterOptions = {}) {
    super(options)
    this.level = options.level ?? 'info'
    this.ignoreContent = options.ignoreContent ?? false
    this.fieldMatcher = options.fieldMatcher
  }

  getUpsertCount(): number {
    return this.upsertCount
  }

  getDeleteCount(): number {
    return this.deleteCount
  }

  protected async doInit(): Promise<void> {
    this.upsertCount = 0
    this.deleteCount = 0
    this.startedAt = Date.now()
  }

  protected async doUpsert(request: UpsertRequest): Promise<void> {
    let text = '=== DOCUMENT UPSERTED ===\n'
    text += this.describe(request.reference, request.metadata)
    if (!this.ignoreContent) {
      const content = Buffer.from(await readContent(request.content)).toString('utf8')
      text += `--- Content ---\n${content}\n`
    }
    logAt(this.level, text)
    this.upsertCount++
    if (this.upsertCount % LOG_PROGRESS_INTERVAL === 0) {
      logger.info(`${this.upsertCount} upserts logged in: ${this.elapsed()}`)
    }
  }

  protected async doDelete(request: DeleteRequest): Promise<void> {
    let text = '=== DOCUMENT DELETED ===\n'
    text += this.describe(request.reference, request.metadata)
    logAt(this.level, text)
    this.deleteCount++
    if (this.deleteCount % LOG_PROGRESS_INTERVAL === 0) {
      logger.info(`${this.deleteCount} deletions logged in: ${this.elapsed()}`)
    }
  }

  protected async doClose(): Promise<void> {
    logger.info(`${this.upsertCount} upserts committed.`)
    logger.info(`${this.deleteCount} deletions committed.`)
    logger.info(`Total elapsed time: ${this.elapsed()}`)
  }

  protected async doClean(): Promise<void> {
    // nothing persisted
  }

  private describe(reference: string, metadata: Metadata): string {
    let text = `REFERENCE = ${reference}\n`
    text += '--- Metadata ---\n'
    for (const [key, values] of metadata) {
      if (this.fieldMatcher && !this.fieldMatcher.matches(key)) {
        continue
      }
      for (const value of values) {
        text += `${key} = ${value}\n`
      }
    }
    return text
  }

  private elapsed(): string {
    return formatElapsed(Date.now() - this.startedAt)
  }
}
