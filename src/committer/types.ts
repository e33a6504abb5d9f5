/**
 * Committer contracts
 *
 * @module committer/types
 */

import type { CommitterRequest, DeleteRequest, UpsertRequest } from '../request/types'
import type { EventManager } from './events'

/**
 * Environment a committer runs in
 */
export interface CommitterContext {
  /** Directory the committer may use for its own files */
  readonly workDir: string
  readonly eventManager: EventManager
}

/**
 * Sends upsert and delete requests to a target repository.
 *
 * Lifecycle: `init → (accept → upsert | delete)* → close`, with `clean`
 * usable outside of it to wipe any persisted state.
 */
export interface Committer {
  init(context: CommitterContext): Promise<void>
  /** Whether the request is meant for this committer; rejected requests must not be sent */
  accept(request: CommitterRequest): boolean
  upsert(request: UpsertRequest): Promise<void>
  delete(request: DeleteRequest): Promise<void>
  close(): Promise<void>
  clean(): Promise<void>
}
