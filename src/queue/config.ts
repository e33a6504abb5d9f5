/**
 * Queue configuration: defaults and validation
 *
 * @module queue/config
 */

import { z } from 'zod'
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_PER_FOLDER,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_DELAY,
  MIN_MAX_PER_FOLDER,
} from '../constants'
import { ConfigurationError } from '../errors'
import type { FSQueueConfig, ResolvedQueueConfig } from './types'

/**
 * Default queue configuration values
 */
export const DEFAULT_QUEUE_CONFIG: ResolvedQueueConfig = {
  batchSize: DEFAULT_BATCH_SIZE,
  maxPerFolder: DEFAULT_MAX_PER_FOLDER,
  commitLeftoversOnInit: false,
  maxRetries: DEFAULT_MAX_RETRIES,
  retryDelay: DEFAULT_RETRY_DELAY,
  splitBatch: 'OFF',
  ignoreErrors: false,
}

const splitBatchSchema = z
  .string()
  .transform(value => value.toUpperCase())
  .pipe(z.enum(['OFF', 'HALF', 'ONE']))

/**
 * Schema for queue configuration coming from untyped sources (JSON, env)
 */
export const queueConfigSchema = z
  .object({
    batchSize: z.number().int().min(1).optional(),
    maxPerFolder: z.number().int().min(MIN_MAX_PER_FOLDER).optional(),
    commitLeftoversOnInit: z.boolean().optional(),
    maxRetries: z.number().int().min(0).optional(),
    retryDelay: z.number().min(0).optional(),
    splitBatch: splitBatchSchema.optional(),
    ignoreErrors: z.boolean().optional(),
  })
  .strict()

/**
 * Validate an untyped queue configuration
 *
 * @throws ConfigurationError listing every invalid field
 *
 * @example
 * ```typescript
 * const config = parseQueueConfig(JSON.parse(await readFile('queue.json', 'utf8')))
 * const queue = new FSQueue(config)
 * ```
 */
export function parseQueueConfig(input: unknown): FSQueueConfig {
  const result = queueConfigSchema.safeParse(input ?? {})
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    )
    throw new ConfigurationError(`Invalid queue configuration: ${issues.join('; ')}`, issues)
  }
  return result.data
}

/**
 * Validate a configuration and apply defaults to missing values
 */
export function resolveQueueConfig(config: FSQueueConfig = {}): ResolvedQueueConfig {
  const parsed = parseQueueConfig(config)
  return {
    batchSize: parsed.batchSize ?? DEFAULT_QUEUE_CONFIG.batchSize,
    maxPerFolder: parsed.maxPerFolder ?? DEFAULT_QUEUE_CONFIG.maxPerFolder,
    commitLeftoversOnInit: parsed.commitLeftoversOnInit ?? DEFAULT_QUEUE_CONFIG.commitLeftoversOnInit,
    maxRetries: parsed.maxRetries ?? DEFAULT_QUEUE_CONFIG.maxRetries,
    retryDelay: parsed.retryDelay ?? DEFAULT_QUEUE_CONFIG.retryDelay,
    splitBatch: parsed.splitBatch ?? DEFAULT_QUEUE_CONFIG.splitBatch,
    ignoreErrors: parsed.ignoreErrors ?? DEFAULT_QUEUE_CONFIG.ignoreErrors,
  }
}
