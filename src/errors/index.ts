/**
 * Committer Error Handling Module
 *
 * Standardized error hierarchy. All errors extend from CommitterError
 * which provides:
 * - Error codes for programmatic handling
 * - Serialization support
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - CommitterError (base class)
 *   - QueueError (queue state and filesystem failures)
 *   - CodecError (malformed request archives)
 *   - BatchCommitError (batch moved to the error directory)
 *   - ConfigurationError (invalid configuration)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for committer operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Queue errors
  QUEUE_ERROR = 'QUEUE_ERROR',
  QUEUE_NOT_INITIALIZED = 'QUEUE_NOT_INITIALIZED',
  QUEUE_CLOSED = 'QUEUE_CLOSED',
  DIRECTORY_CREATE_ERROR = 'DIRECTORY_CREATE_ERROR',
  ARCHIVE_WRITE_ERROR = 'ARCHIVE_WRITE_ERROR',
  ARCHIVE_DELETE_ERROR = 'ARCHIVE_DELETE_ERROR',
  BATCH_MOVE_ERROR = 'BATCH_MOVE_ERROR',
  BATCH_READ_ERROR = 'BATCH_READ_ERROR',
  CLEAN_ERROR = 'CLEAN_ERROR',

  // Codec errors
  CODEC_ERROR = 'CODEC_ERROR',
  INVALID_ARCHIVE = 'INVALID_ARCHIVE',
  MISSING_ENTRY = 'MISSING_ENTRY',

  // Commit errors
  BATCH_COMMIT_FAILED = 'BATCH_COMMIT_FAILED',

  // Configuration errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string
  /** Additional context data */
  context?: Record<string, unknown>
  /** Serialized cause (if error chaining) */
  cause?: SerializedError
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all committer errors.
 *
 * @example
 * ```typescript
 * throw new CommitterError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'close',
 * })
 * ```
 */
export class CommitterError extends Error {
  override readonly name: string = 'CommitterError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error, e.g. for structured logs
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof CommitterError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Queue Errors
// =============================================================================

/**
 * Error thrown when the queue cannot do its job: directories that cannot
 * be created, archives that cannot be written, deleted or moved, or an
 * operation invoked in the wrong lifecycle state.
 *
 * These errors mean the durability substrate is broken. They are never
 * retried.
 */
export class QueueError extends CommitterError {
  override readonly name: string = 'QueueError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.QUEUE_ERROR,
    context?: { path?: string; reference?: string; [key: string]: unknown },
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, QueueError.prototype)
  }

  /** Path involved in the failure, if any */
  get path(): string | undefined {
    const path = this.context.path
    return typeof path === 'string' ? path : undefined
  }
}

// =============================================================================
// Codec Errors
// =============================================================================

/**
 * Error thrown when a request archive cannot be decoded.
 */
export class CodecError extends CommitterError {
  override readonly name: string = 'CodecError'

  constructor(
    message: string,
    path: string,
    code: ErrorCode = ErrorCode.CODEC_ERROR,
    cause?: Error
  ) {
    super(message, code, { path }, cause)
    Object.setPrototypeOf(this, CodecError.prototype)
  }

  get path(): string {
    return String(this.context.path)
  }
}

// =============================================================================
// Batch Commit Errors
// =============================================================================

/**
 * Error thrown when a batch exhausted its retries (and splitting, when
 * enabled). The uncommitted archives were moved to the error directory
 * named in the message so they can be inspected or replayed.
 */
export class BatchCommitError extends CommitterError {
  override readonly name = 'BatchCommitError'

  constructor(
    batchDir: string,
    errorDir: string,
    cause?: Error
  ) {
    super(
      `Could not process one or more files from committer batch located at ${batchDir}. ` +
        `Moved them to error directory: ${errorDir}`,
      ErrorCode.BATCH_COMMIT_FAILED,
      { batchDir, errorDir },
      cause
    )
    Object.setPrototypeOf(this, BatchCommitError.prototype)
  }

  /** Batch directory the failed archives came from */
  get batchDir(): string {
    return String(this.context.batchDir)
  }

  /** Error directory the failed archives were moved to */
  get errorDir(): string {
    return String(this.context.errorDir)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends CommitterError {
  override readonly name = 'ConfigurationError'

  constructor(
    message: string,
    issues: string[] = [],
    cause?: Error
  ) {
    super(message, ErrorCode.INVALID_CONFIG, issues.length > 0 ? { issues } : undefined, cause)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }

  /** Individual validation issues */
  get issues(): string[] {
    const issues = this.context.issues
    return Array.isArray(issues) ? issues.map(String) : []
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isCommitterError(error: unknown): error is CommitterError {
  return error instanceof CommitterError
}

export function isQueueError(error: unknown): error is QueueError {
  return error instanceof QueueError
}

export function isCodecError(error: unknown): error is CodecError {
  return error instanceof CodecError
}

export function isBatchCommitError(error: unknown): error is BatchCommitError {
  return error instanceof BatchCommitError
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError
}

// =============================================================================
// Utilities
// =============================================================================

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Wrap an unknown error into a CommitterError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): CommitterError {
  if (error instanceof CommitterError) {
    return error
  }
  const cause = toError(error)
  return new CommitterError(cause.message, ErrorCode.INTERNAL, context, cause)
}

/**
 * Extract the Node.js system error code (ENOENT, EEXIST, ...) if any
 */
export function getSystemErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}
