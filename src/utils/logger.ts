/**
 * Logger utility
 *
 * Provides a consistent logging interface that can be configured
 * at runtime. Defaults to a noop logger so that embedding applications
 * stay quiet unless they opt in.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/**
 * Log levels understood by {@link logAt}
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Console logger implementation
 */
export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args)
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args)
    } else {
      console.error(`[ERROR] ${message}`, ...args)
    }
  },
}

/**
 * Noop logger implementation (default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Global logger instance
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, consoleLogger } from 'batchcommit'
 *
 * setLogger(consoleLogger)
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}

/**
 * Log a message at a level chosen at runtime
 */
export function logAt(level: LogLevel, message: string, ...args: unknown[]): void {
  switch (level) {
    case 'debug':
      logger.debug(message, ...args)
      break
    case 'info':
      logger.info(message, ...args)
      break
    case 'warn':
      logger.warn(message, ...args)
      break
    case 'error':
      logger.error(message, undefined, ...args)
      break
  }
}
