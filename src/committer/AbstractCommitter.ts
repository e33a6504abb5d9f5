/**
 * AbstractCommitter - lifecycle, routing and field mappings
 *
 * Subclasses implement the `do*` methods. This class fires the begin and
 * end (or error) events around each of them, applies field mappings to
 * every request before it reaches `doUpsert` or `doDelete`, and decides
 * `accept()` from the configured restrictions.
 *
 * @module committer/AbstractCommitter
 */

import { CommitterError, ErrorCode, toError } from '../errors'
import { withMetadata } from '../request/factories'
import type { CommitterRequest, DeleteRequest, UpsertRequest } from '../request/types'
import {
  CommitterEvents,
  type CommitterEventName,
  type EventLevel,
} from './events'
import {
  applyFieldMappings,
  createFieldMappings,
  type FieldMappings,
  type FieldMappingsInput,
} from './field-mappings'
import { matchesRestrictions, type PropertyMatcher } from './restrictions'
import type { Committer, CommitterContext } from './types'

// =============================================================================
// Types
// =============================================================================

export interface CommitterOptions {
  /** Accept only requests matching at least one of these */
  restrictions?: readonly PropertyMatcher[] | undefined
  /** Metadata keys to rename (or drop) before committing */
  fieldMappings?: FieldMappingsInput | undefined
}

type Phase = 'INIT' | 'UPSERT' | 'DELETE' | 'CLOSE' | 'CLEAN'

type PhaseEvents = readonly [
  begin: CommitterEventName,
  end: CommitterEventName,
  error: CommitterEventName,
]

const PHASE_EVENTS: Record<Phase, PhaseEvents> = {
  INIT: [
    CommitterEvents.COMMITTER_INIT_BEGIN,
    CommitterEvents.COMMITTER_INIT_END,
    CommitterEvents.COMMITTER_INIT_ERROR,
  ],
  UPSERT: [
    CommitterEvents.COMMITTER_UPSERT_BEGIN,
    CommitterEvents.COMMITTER_UPSERT_END,
    CommitterEvents.COMMITTER_UPSERT_ERROR,
  ],
  DELETE: [
    CommitterEvents.COMMITTER_DELETE_BEGIN,
    CommitterEvents.COMMITTER_DELETE_END,
    CommitterEvents.COMMITTER_DELETE_ERROR,
  ],
  CLOSE: [
    CommitterEvents.COMMITTER_CLOSE_BEGIN,
    CommitterEvents.COMMITTER_CLOSE_END,
    CommitterEvents.COMMITTER_CLOSE_ERROR,
  ],
  CLEAN: [
    CommitterEvents.COMMITTER_CLEAN_BEGIN,
    CommitterEvents.COMMITTER_CLEAN_END,
    CommitterEvents.COMMITTER_CLEAN_ERROR,
  ],
}

// =============================================================================
// AbstractCommitter Class
// =============================================================================

export abstract class AbstractCommitter implements Committer {
  private context: CommitterContext | null = null
  private restrictions: PropertyMatcher[]
  private readonly fieldMappings: Map<string, string | null>

  constructor(options: CommitterOptions = {}) {
    this.restrictions = [...(options.restrictions ?? [])]
    this.fieldMappings = createFieldMappings(options.fieldMappings)
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  addRestriction(...restrictions: PropertyMatcher[]): void {
    this.restrictions.push(...restrictions)
  }

  /**
   * Remove the restrictions whose field pattern is `field`
   * @returns How many were removed
   */
  removeRestriction(field: string): number {
    const before = this.restrictions.length
    this.restrictions = this.restrictions.filter(r => r.field.pattern !== field)
    return before - this.restrictions.length
  }

  clearRestrictions(): void {
    this.restrictions = []
  }

  getRestrictions(): readonly PropertyMatcher[] {
    return [...this.restrictions]
  }

  setFieldMapping(fromField: string, toField: string | null): void {
    this.fieldMappings.set(fromField, toField)
  }

  removeFieldMapping(fromField: string): boolean {
    return this.fieldMappings.delete(fromField)
  }

  clearFieldMappings(): void {
    this.fieldMappings.clear()
  }

  getFieldMappings(): FieldMappings {
    return new Map(this.fieldMappings)
  }

  /**
   * Context given to init()
   * @throws CommitterError when not initialized
   */
  get committerContext(): CommitterContext {
    if (!this.context) {
      throw new CommitterError('Committer is not initialized.', ErrorCode.INTERNAL)
    }
    return this.context
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async init(context: CommitterContext): Promise<void> {
    this.context = context
    await this.runPhase('INIT', () => this.doInit())
  }

  accept(request: CommitterRequest): boolean {
    let accepted: boolean
    try {
      accepted = matchesRestrictions(this.restrictions, request.metadata)
    } catch (error) {
      this.fire(CommitterEvents.COMMITTER_ACCEPT_ERROR, 'error', request, toError(error))
      throw error
    }
    this.fire(
      accepted ? CommitterEvents.COMMITTER_ACCEPT_YES : CommitterEvents.COMMITTER_ACCEPT_NO,
      'debug',
      request
    )
    return accepted
  }

  async upsert(request: UpsertRequest): Promise<void> {
    await this.runPhase('UPSERT', () => this.doUpsert(this.mapFields(request)), request)
  }

  async delete(request: DeleteRequest): Promise<void> {
    await this.runPhase('DELETE', () => this.doDelete(this.mapFields(request)), request)
  }

  async close(): Promise<void> {
    await this.runPhase('CLOSE', () => this.doClose())
  }

  async clean(): Promise<void> {
    await this.runPhase('CLEAN', () => this.doClean())
  }

  // ===========================================================================
  // Subclass API
  // ===========================================================================

  protected abstract doInit(): Promise<void>
  protected abstract doUpsert(request: UpsertRequest): Promise<void>
  protected abstract doDelete(request: DeleteRequest): Promise<void>
  protected abstract doClose(): Promise<void>
  protected abstract doClean(): Promise<void>

  /**
   * Fire an event through the context's event manager. Does nothing
   * before init().
   */
  protected fire(
    name: CommitterEventName,
    level: EventLevel,
    request?: CommitterRequest,
    error?: Error
  ): void {
    this.context?.eventManager.fire({
      name,
      source: this,
      level,
      timestamp: Date.now(),
      request,
      error,
    })
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private mapFields<T extends CommitterRequest>(request: T): T {
    if (this.fieldMappings.size === 0) {
      return request
    }
    return withMetadata(request, applyFieldMappings(request.metadata, this.fieldMappings))
  }

  private async runPhase(
    phase: Phase,
    action: () => Promise<void>,
    request?: CommitterRequest
  ): Promise<void> {
    const [begin, end, failure] = PHASE_EVENTS[phase]
    const level: EventLevel = request ? 'debug' : 'info'
    this.fire(begin, level, request)
    try {
      await action()
    } catch (error) {
      this.fire(failure, 'error', request, toError(error))
      throw error
    }
    this.fire(end, level, request)
  }
}
