/**
 * Helpers for committer implementations
 *
 * None of these mutate the request they are given.
 *
 * @module committer/util
 */

import { Readable } from 'node:stream'
import { CommitterError, ErrorCode, toError } from '../errors'
import { copyMetadata, getFirstValue } from '../request/metadata'
import { readContent, withMetadata } from '../request/factories'
import type { CommitterRequest, Metadata } from '../request/types'
import { logger } from '../utils/logger'

/**
 * The value itself, or undefined when it is null, undefined or blank
 */
function nonBlank(value: string | null | undefined): string | undefined {
  return value !== null && value !== undefined && value.trim() !== '' ? value : undefined
}

/**
 * Read the content of an upsert as UTF-8 text. The content stream is
 * consumed. Null for deletes.
 */
export async function getContentAsString(request: CommitterRequest): Promise<string | null> {
  if (request.type !== 'upsert') {
    return null
  }
  try {
    return Buffer.from(await readContent(request.content)).toString('utf8')
  } catch (error) {
    throw new CommitterError(
      `Could not load document content for: ${request.reference}`,
      ErrorCode.INTERNAL,
      { reference: request.reference },
      toError(error)
    )
  }
}

/**
 * Source id of a request, with the metadata left once it is extracted
 */
export interface SourceId {
  value: string
  metadata: Metadata
}

/**
 * Get the id of a request from `sourceIdField`, falling back to its
 * reference when the field is blank or has no value. The field is
 * removed from the returned metadata unless `keepSourceIdField`.
 */
export function extractSourceIdValue(
  request: CommitterRequest,
  sourceIdField?: string | null,
  keepSourceIdField = false
): SourceId {
  const field = nonBlank(sourceIdField)
  if (field === undefined) {
    return { value: request.reference, metadata: request.metadata }
  }
  const value = nonBlank(getFirstValue(request.metadata, field))
  if (value === undefined) {
    logger.warn(
      `Source ID field "${field}" has no value. ` +
        `Falling back to using document reference: ${request.reference}`
    )
    return { value: request.reference, metadata: request.metadata }
  }
  if (keepSourceIdField) {
    return { value, metadata: request.metadata }
  }
  const metadata = copyMetadata(request.metadata)
  metadata.delete(field)
  return { value, metadata }
}

/**
 * Copy of an upsert with its content also stored as text under
 * `targetContentField`. The original content stream is consumed; the
 * copy gets a fresh one with the same bytes. Other requests, or a blank
 * field name, are returned as is.
 */
export async function applyTargetContent(
  request: CommitterRequest,
  targetContentField?: string | null
): Promise<CommitterRequest> {
  const field = nonBlank(targetContentField)
  if (request.type !== 'upsert' || field === undefined) {
    return request
  }
  let bytes: Uint8Array
  try {
    bytes = await readContent(request.content)
  } catch (error) {
    throw new CommitterError(
      `Could not load document content for: ${request.reference}`,
      ErrorCode.INTERNAL,
      { reference: request.reference },
      toError(error)
    )
  }
  const metadata = copyMetadata(request.metadata)
  metadata.set(field, [Buffer.from(bytes).toString('utf8')])
  return Object.freeze({
    ...request,
    metadata,
    content: Readable.from([Buffer.from(bytes)]),
  })
}

/**
 * Copy of a request with its source id (see {@link extractSourceIdValue})
 * stored under `targetIdField`. The source field is dropped. A blank
 * target field leaves the id unset.
 */
export function applyTargetId(
  request: CommitterRequest,
  sourceIdField: string | null | undefined,
  targetIdField: string | null | undefined
): CommitterRequest {
  const { value, metadata } = extractSourceIdValue(request, sourceIdField)
  const field = nonBlank(targetIdField)
  if (field === undefined) {
    return metadata === request.metadata ? request : withMetadata(request, metadata)
  }
  const updated = copyMetadata(metadata)
  updated.set(field, [value])
  return withMetadata(request, updated)
}
