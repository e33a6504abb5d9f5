/**
 * Request factories and content helpers
 *
 * @module request/factories
 */

import { Readable } from 'node:stream'
import { createMetadata } from './metadata'
import type {
  CommitterRequest,
  ContentInput,
  DeleteRequest,
  Metadata,
  MetadataInput,
  UpsertRequest,
} from './types'

/**
 * Turn accepted content shapes into a readable stream
 */
export function toReadable(content: ContentInput): Readable {
  if (content instanceof Readable) {
    return content
  }
  if (typeof content === 'string') {
    return Readable.from([Buffer.from(content, 'utf8')])
  }
  return Readable.from([Buffer.from(content)])
}

/**
 * Read a content stream fully into memory. The stream is consumed.
 */
export async function readContent(content: Readable): Promise<Uint8Array> {
  const chunks: Buffer[] = []
  for await (const chunk of content) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk))
  }
  return new Uint8Array(Buffer.concat(chunks))
}

/**
 * Create an upsert request
 *
 * @example
 * ```typescript
 * const req = upsertRequest('https://example.com/a.html', { title: 'A' }, '<p>A</p>')
 * ```
 */
export function upsertRequest(
  reference: string,
  metadata?: MetadataInput,
  content: ContentInput = ''
): UpsertRequest {
  return Object.freeze({
    type: 'upsert' as const,
    reference,
    metadata: createMetadata(metadata),
    content: toReadable(content),
  })
}

/**
 * Create a delete request
 */
export function deleteRequest(reference: string, metadata?: MetadataInput): DeleteRequest {
  return Object.freeze({
    type: 'delete' as const,
    reference,
    metadata: createMetadata(metadata),
  })
}

/**
 * Return a copy of a request carrying different metadata. The content
 * stream of an upsert is handed over as is, not read.
 */
export function withMetadata<T extends CommitterRequest>(request: T, metadata: Metadata): T
export function withMetadata(request: CommitterRequest, metadata: Metadata): CommitterRequest {
  return Object.freeze({ ...request, metadata })
}
