/**
 * Committer Constants
 *
 * Centralized constants used throughout the codebase.
 */

// =============================================================================
// Queue
// =============================================================================

/**
 * Default number of requests queued on disk before a batch is consumed
 */
export const DEFAULT_BATCH_SIZE = 20

/**
 * Default maximum number of entries in a single batch sub-folder
 */
export const DEFAULT_MAX_PER_FOLDER = 500

/**
 * Smallest usable maxPerFolder value (one entry per folder cannot fan out)
 */
export const MIN_MAX_PER_FOLDER = 2

/**
 * Default number of retries after a failed batch commit (0 = no retry)
 */
export const DEFAULT_MAX_RETRIES = 0

/**
 * Default delay in milliseconds between batch commit retries
 */
export const DEFAULT_RETRY_DELAY = 0

// =============================================================================
// Queue Layout
// =============================================================================

/**
 * Sub-directory of the working directory holding batches to commit
 */
export const QUEUE_DIR_NAME = 'queue'

/**
 * Sub-directory of the working directory holding batches that failed
 */
export const ERROR_DIR_NAME = 'error'

/**
 * Prefix of every batch directory name
 */
export const BATCH_DIR_PREFIX = 'batch-'

/**
 * Extension of request archive files
 */
export const ARCHIVE_EXTENSION = '.zip'

/**
 * Prefix of working directories created under the OS temp directory
 */
export const TEMP_WORK_DIR_PREFIX = 'committer-'

// =============================================================================
// Archive Entries
// =============================================================================

export const ARCHIVE_ENTRY_REFERENCE = 'reference'
export const ARCHIVE_ENTRY_METADATA = 'metadata'
export const ARCHIVE_ENTRY_CONTENT = 'content'

// =============================================================================
// Log Committer
// =============================================================================

/**
 * Number of requests between two progress lines of the log committer
 */
export const LOG_PROGRESS_INTERVAL = 100
