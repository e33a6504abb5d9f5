/**
 * Committer exports
 *
 * @module committer
 */

export type { Committer, CommitterContext } from './types'
export { createCommitterContext, type CommitterContextOptions } from './context'
export {
  CommitterEvents,
  EventManager,
  type CommitterEvent,
  type CommitterEventListener,
  type CommitterEventName,
  type EventLevel,
} from './events'
export { TextMatcher, type MatchMethod, type TextMatcherOptions } from './text-matcher'
export {
  matchesProperty,
  matchesRestrictions,
  propertyMatcher,
  type PropertyMatcher,
} from './restrictions'
export {
  applyFieldMappings,
  createFieldMappings,
  type FieldMappings,
  type FieldMappingsInput,
} from './field-mappings'
export { AbstractCommitter, type CommitterOptions } from './AbstractCommitter'
export { BatchCommitter, type BatchCommitterOptions, type CommitBatchFn } from './BatchCommitter'
export {
  applyTargetContent,
  applyTargetId,
  extractSourceIdValue,
  getContentAsString,
  type SourceId,
} from './util'
export {
  MemoryCommitter,
  type MemoryCommitterOptions,
  type StoredDelete,
  type StoredRequest,
  type StoredUpsert,
} from './impl/MemoryCommitter'
export { LogCommitter, type LogCommitterOptions } from './impl/LogCommitter'
