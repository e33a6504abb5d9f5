/**
 * Request archive codec
 *
 * Stores one request as a ZIP archive with up to three entries:
 * - `reference`: UTF-8 text
 * - `metadata`: flat key=value text (see request/metadata)
 * - `content`: raw bytes, present only for upserts
 *
 * An archive without a `content` entry decodes to a delete request.
 *
 * @module request/codec
 */

import { readFile, writeFile } from 'node:fs/promises'
import { Readable } from 'node:stream'
import { strFromU8, strToU8, unzipSync, zipSync, type Zippable } from 'fflate'
import {
  ARCHIVE_ENTRY_CONTENT,
  ARCHIVE_ENTRY_METADATA,
  ARCHIVE_ENTRY_REFERENCE,
} from '../constants'
import { CodecError, ErrorCode, QueueError, toError } from '../errors'
import { readContent } from './factories'
import { parseMetadata, serializeMetadata } from './metadata'
import type { CommitterRequest } from './types'

// =============================================================================
// Bytes
// =============================================================================

/**
 * Encode a request into archive bytes. Consumes the content stream of
 * an upsert.
 */
export async function encodeRequestToBytes(request: CommitterRequest): Promise<Uint8Array> {
  const entries: Zippable = {
    [ARCHIVE_ENTRY_REFERENCE]: strToU8(request.reference),
    [ARCHIVE_ENTRY_METADATA]: strToU8(serializeMetadata(request.metadata)),
  }
  if (request.type === 'upsert') {
    entries[ARCHIVE_ENTRY_CONTENT] = await readContent(request.content)
  }
  return zipSync(entries)
}

/**
 * Decode archive bytes into a request
 *
 * @param data - Archive bytes
 * @param source - Where the bytes came from, for error messages
 * @throws CodecError when the bytes are not an archive or miss an entry
 */
export function decodeRequestFromBytes(data: Uint8Array, source: string): CommitterRequest {
  let entries: Record<string, Uint8Array>
  try {
    entries = unzipSync(data)
  } catch (error) {
    throw new CodecError(
      `Could not convert committer request file to object: ${source}`,
      source,
      ErrorCode.INVALID_ARCHIVE,
      toError(error)
    )
  }

  const referenceBytes = entries[ARCHIVE_ENTRY_REFERENCE]
  if (referenceBytes === undefined) {
    throw new CodecError(
      `Archive has no "${ARCHIVE_ENTRY_REFERENCE}" entry: ${source}`,
      source,
      ErrorCode.MISSING_ENTRY
    )
  }
  const metadataBytes = entries[ARCHIVE_ENTRY_METADATA]
  if (metadataBytes === undefined) {
    throw new CodecError(
      `Archive has no "${ARCHIVE_ENTRY_METADATA}" entry: ${source}`,
      source,
      ErrorCode.MISSING_ENTRY
    )
  }

  const reference = strFromU8(referenceBytes)
  const metadata = parseMetadata(strFromU8(metadataBytes))
  const content = entries[ARCHIVE_ENTRY_CONTENT]

  if (content === undefined) {
    return Object.freeze({ type: 'delete' as const, reference, metadata })
  }
  return Object.freeze({
    type: 'upsert' as const,
    reference,
    metadata,
    content: Readable.from([Buffer.from(content)]),
  })
}

// =============================================================================
// Files
// =============================================================================

/**
 * Write a request archive to `targetPath`
 *
 * The file is written in place. A partially written archive can only
 * exist in a batch directory that has not been sealed yet, and unsealed
 * directories are never read.
 */
export async function encodeRequest(request: CommitterRequest, targetPath: string): Promise<void> {
  const data = await encodeRequestToBytes(request)
  await writeFile(targetPath, data)
}

/**
 * Read a request archive from `sourcePath`
 *
 * @throws QueueError when the file cannot be read
 * @throws CodecError when the file is not a valid archive
 */
export async function decodeRequest(sourcePath: string): Promise<CommitterRequest> {
  let data: Uint8Array
  try {
    data = await readFile(sourcePath)
  } catch (error) {
    throw new QueueError(
      `Could not read committer request file: ${sourcePath}`,
      ErrorCode.BATCH_READ_ERROR,
      { path: sourcePath },
      toError(error)
    )
  }
  return decodeRequestFromBytes(data, sourcePath)
}
