/**
 * Committer requests: types, factories, metadata and archive codec
 *
 * @module request
 */

export type {
  CommitterRequest,
  ContentInput,
  DeleteRequest,
  Metadata,
  MetadataInput,
  RequestType,
  UpsertRequest,
} from './types'
export { isDeleteRequest, isUpsertRequest } from './types'

export {
  addValues,
  copyMetadata,
  createMetadata,
  getFirstValue,
  metadataToObject,
  parseMetadata,
  serializeMetadata,
} from './metadata'

export {
  deleteRequest,
  readContent,
  toReadable,
  upsertRequest,
  withMetadata,
} from './factories'

export {
  decodeRequest,
  decodeRequestFromBytes,
  encodeRequest,
  encodeRequestToBytes,
} from './codec'
