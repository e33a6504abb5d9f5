/**
 * Committer events
 *
 * Every committer lifecycle call fires a begin event followed by an end
 * or error event. Listeners are notified synchronously; a listener that
 * throws or rejects is logged and otherwise ignored.
 *
 * @module committer/events
 */

import type { CommitterRequest } from '../request/types'
import { logAt, logger } from '../utils/logger'

// =============================================================================
// Event Names
// =============================================================================

export const CommitterEvents = {
  COMMITTER_INIT_BEGIN: 'COMMITTER_INIT_BEGIN',
  COMMITTER_INIT_END: 'COMMITTER_INIT_END',
  COMMITTER_INIT_ERROR: 'COMMITTER_INIT_ERROR',

  COMMITTER_ACCEPT_YES: 'COMMITTER_ACCEPT_YES',
  COMMITTER_ACCEPT_NO: 'COMMITTER_ACCEPT_NO',
  COMMITTER_ACCEPT_ERROR: 'COMMITTER_ACCEPT_ERROR',

  COMMITTER_UPSERT_BEGIN: 'COMMITTER_UPSERT_BEGIN',
  COMMITTER_UPSERT_END: 'COMMITTER_UPSERT_END',
  COMMITTER_UPSERT_ERROR: 'COMMITTER_UPSERT_ERROR',

  COMMITTER_DELETE_BEGIN: 'COMMITTER_DELETE_BEGIN',
  COMMITTER_DELETE_END: 'COMMITTER_DELETE_END',
  COMMITTER_DELETE_ERROR: 'COMMITTER_DELETE_ERROR',

  COMMITTER_BATCH_BEGIN: 'COMMITTER_BATCH_BEGIN',
  COMMITTER_BATCH_END: 'COMMITTER_BATCH_END',
  COMMITTER_BATCH_ERROR: 'COMMITTER_BATCH_ERROR',

  COMMITTER_CLOSE_BEGIN: 'COMMITTER_CLOSE_BEGIN',
  COMMITTER_CLOSE_END: 'COMMITTER_CLOSE_END',
  COMMITTER_CLOSE_ERROR: 'COMMITTER_CLOSE_ERROR',

  COMMITTER_CLEAN_BEGIN: 'COMMITTER_CLEAN_BEGIN',
  COMMITTER_CLEAN_END: 'COMMITTER_CLEAN_END',
  COMMITTER_CLEAN_ERROR: 'COMMITTER_CLEAN_ERROR',
} as const

export type CommitterEventName = (typeof CommitterEvents)[keyof typeof CommitterEvents]

// =============================================================================
// Types
// =============================================================================

export type EventLevel = 'debug' | 'info' | 'error'

/**
 * Event fired by a committer
 */
export interface CommitterEvent {
  readonly name: CommitterEventName
  /** Committer that fired the event */
  readonly source: object
  readonly level: EventLevel
  /** Milliseconds since epoch */
  readonly timestamp: number
  readonly request?: CommitterRequest | undefined
  readonly error?: Error | undefined
}

export type CommitterEventListener = (event: CommitterEvent) => void | Promise<void>

interface Registration {
  listener: CommitterEventListener
  names: ReadonlySet<CommitterEventName> | null
}

// =============================================================================
// EventManager
// =============================================================================

/**
 * Dispatches committer events to registered listeners
 *
 * @example
 * ```typescript
 * const events = new EventManager()
 * const off = events.on(event => console.log(event.name), [
 *   CommitterEvents.COMMITTER_BATCH_ERROR,
 * ])
 * // later
 * off()
 * ```
 */
export class EventManager {
  private registrations: Registration[] = []

  /**
   * @param logEvents - Also log every event through the project logger
   */
  constructor(private readonly logEvents = true) {}

  /**
   * Register a listener, optionally for some event names only
   * @returns Function to unregister the listener
   */
  on(listener: CommitterEventListener, names?: readonly CommitterEventName[]): () => void {
    const registration: Registration = {
      listener,
      names: names && names.length > 0 ? new Set(names) : null,
    }
    this.registrations.push(registration)
    return () => {
      const index = this.registrations.indexOf(registration)
      if (index > -1) {
        this.registrations.splice(index, 1)
      }
    }
  }

  /**
   * Remove every registration of a listener
   */
  off(listener: CommitterEventListener): void {
    this.registrations = this.registrations.filter(r => r.listener !== listener)
  }

  get listenerCount(): number {
    return this.registrations.length
  }

  /**
   * Notify listeners of an event
   */
  fire(event: CommitterEvent): void {
    if (this.logEvents) {
      const subject = event.request ? `: ${event.request.reference}` : ''
      if (event.level === 'error') {
        logger.error(`${event.name}${subject}`, event.error)
      } else {
        logAt(event.level, `${event.name}${subject}`)
      }
    }

    for (const { listener, names } of [...this.registrations]) {
      if (names && !names.has(event.name)) {
        continue
      }
      try {
        const result = listener(event)
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            logger.error(`[EventManager] Listener failed for ${event.name}`, error)
          })
        }
      } catch (error) {
        logger.error(`[EventManager] Listener failed for ${event.name}`, error)
      }
    }
  }
}
