/**
 * Committer request types
 *
 * A request is one upsert or delete instruction destined for a target
 * repository. Requests are immutable: helpers that change a request
 * return a new one.
 */

import type { Readable } from 'node:stream'

/**
 * Ordered, multi-valued metadata. Key order is insertion order.
 */
export type Metadata = ReadonlyMap<string, readonly string[]>

/**
 * Metadata as accepted by request factories
 */
export type MetadataInput =
  | Metadata
  | Record<string, string | readonly string[]>
  | Iterable<readonly [string, string | readonly string[]]>

/**
 * Document content as accepted by request factories
 */
export type ContentInput = Readable | Uint8Array | string

/**
 * Add or update a document
 */
export interface UpsertRequest {
  readonly type: 'upsert'
  /** Document reference (e.g. URL), stable across updates */
  readonly reference: string
  readonly metadata: Metadata
  /** Content stream, consumed at most once */
  readonly content: Readable
}

/**
 * Remove a document
 */
export interface DeleteRequest {
  readonly type: 'delete'
  readonly reference: string
  readonly metadata: Metadata
}

export type CommitterRequest = UpsertRequest | DeleteRequest

export type RequestType = CommitterRequest['type']

export function isUpsertRequest(request: CommitterRequest): request is UpsertRequest {
  return request.type === 'upsert'
}

export function isDeleteRequest(request: CommitterRequest): request is DeleteRequest {
  return request.type === 'delete'
}
