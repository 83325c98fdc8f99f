/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type { ActorContext } from './auth.js';
export {
  DEFAULT_LIST_LIMIT,
  MAX_LIST_LIMIT,
  normalizeListLimit,
} from './pagination.js';
export type {
  FileKind,
  TransportLocation,
  FileRecord,
  FileMeta,
  IncomingUpload,
  NewFileRecord,
  FileSummary,
  FileCounter,
  ExpiryResult,
  DeleteResult,
  SoftDeleteOutcome,
  ShareLink,
  NewShareLink,
} from './file.js';
export { FILE_KINDS, isFileVisible, toFileSummary } from './file.js';
export type { UserRecord, UserIdentity } from './user.js';
export type {
  BlobTransport,
  StoreBlobRequest,
  StoredBlob,
} from './transport.js';
