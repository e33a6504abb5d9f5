/**
 * Utility exports
 *
 * @module utils
 */

export {
  consoleLogger,
  logAt,
  logger,
  noopLogger,
  setLogger,
  type LogLevel,
  type Logger,
} from './logger'
export { defaultDelay, retry, type RetryConfig, type RetryInfo, type RetryOutcome } from './retry'
export { nextTimeId, resetTimeIdState } from './time-id'
