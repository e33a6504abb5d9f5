/**
 * Committer context factory
 *
 * @module committer/context
 */

import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { TEMP_WORK_DIR_PREFIX } from '../constants'
import { nextTimeId } from '../utils/time-id'
import { EventManager } from './events'
import type { CommitterContext } from './types'

export interface CommitterContextOptions {
  /** Defaults to a new `committer-<timeId>` directory under the OS temp directory */
  workDir?: string | undefined
  eventManager?: EventManager | undefined
}

/**
 * Create a committer context
 *
 * The default working directory is unique per call, never the temp
 * directory itself: `clean()` deletes the working directory.
 */
export function createCommitterContext(options: CommitterContextOptions = {}): CommitterContext {
  return Object.freeze({
    workDir: options.workDir ?? join(tmpdir(), TEMP_WORK_DIR_PREFIX + nextTimeId()),
    eventManager: options.eventManager ?? new EventManager(),
  })
}

