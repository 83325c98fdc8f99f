/**
 * File Custody Domain Types
 *
 * A FileRecord is a pointer to a blob held by the transport. Many records
 * may point at the same blob; ownership belongs to the pointer.
 */

/**
 * Kind of stored payload
 */
export const FILE_KINDS = [
  'document',
  'photo',
  'video',
  'audio',
  'voice',
  'archive',
  'other',
] as const;

export type FileKind = (typeof FILE_KINDS)[number];

/**
 * Where the transport keeps the payload. Needed to issue a remote delete.
 */
export interface TransportLocation {
  channelId: string;
  messageId: string | null;
}

/**
 * File metadata entity
 */
export interface FileRecord {
  id: string;
  blobRef: string;
  blobUniqueRef: string;
  name: string;
  mimeType: string | null;
  extension: string | null;
  kind: FileKind;
  sizeBytes: number;
  durationSeconds: number | null;
  width: number | null;
  height: number | null;
  transportLocation: TransportLocation;
  ownerId: string;
  ownerDisplayName: string | null;
  downloadCount: number;
  viewCount: number;
  active: boolean;
  shareExpiresAt: Date | null;
  createdAt: Date;
}

/**
 * Metadata describing a payload already held by the transport
 */
export interface FileMeta {
  blobRef: string;
  blobUniqueRef?: string;
  name: string;
  mimeType?: string | null;
  extension?: string | null;
  kind: FileKind;
  sizeBytes: number;
  durationSeconds?: number | null;
  width?: number | null;
  height?: number | null;
}

/**
 * Payload handed over by a front-end before it reaches the transport.
 * `rawHandle` is the transport-level handle of the user's original upload.
 */
export interface IncomingUpload {
  rawHandle: string;
  name: string;
  mimeType?: string | null;
  extension?: string | null;
  kind: FileKind;
  sizeBytes: number;
  durationSeconds?: number | null;
  width?: number | null;
  height?: number | null;
}

/**
 * Row written by the store on insert (counters and flags are defaults)
 */
export interface NewFileRecord {
  id: string;
  blobRef: string;
  blobUniqueRef: string;
  name: string;
  mimeType: string | null;
  extension: string | null;
  kind: FileKind;
  sizeBytes: number;
  durationSeconds: number | null;
  width: number | null;
  height: number | null;
  transportLocation: TransportLocation;
  ownerId: string;
  ownerDisplayName: string | null;
  createdAt: Date;
}

/**
 * Entry of an owner's file listing
 */
export interface FileSummary {
  id: string;
  name: string;
  kind: FileKind;
  sizeBytes: number;
  downloadCount: number;
  shareExpiresAt: Date | null;
  createdAt: Date;
}

/**
 * Counters that can be bumped atomically
 */
export type FileCounter = 'download' | 'view';

/**
 * Outcome of setting a share expiry. `expiresAt === null` means permanent.
 */
export interface ExpiryResult {
  id: string;
  expiresAt: Date | null;
}

/**
 * Outcome of a delete. The caller credits `sizeBytes` back to `ownerId`.
 */
export interface DeleteResult {
  id: string;
  ownerId: string;
  name: string;
  sizeBytes: number;
  blobDeleted: boolean;
}

/**
 * Result of a soft delete at the store level
 */
export interface SoftDeleteOutcome {
  file: FileRecord;
  /** Active records still pointing at the same transport location */
  remainingReferences: number;
}

/**
 * Legacy share code entity
 */
export interface ShareLink {
  code: string;
  fileId: string;
  creatorId: string;
  downloadCount: number;
  active: boolean;
  expiresAt: Date | null;
  createdAt: Date;
}

export interface NewShareLink {
  code: string;
  fileId: string;
  creatorId: string;
  expiresAt: Date | null;
  createdAt: Date;
}

/**
 * Visibility predicate. Expiry is evaluated at read time only.
 */
export function isFileVisible(
  file: Pick<FileRecord, 'active' | 'shareExpiresAt'>,
  now: Date
): boolean {
  if (!file.active) {
    return false;
  }
  return (
    file.shareExpiresAt === null ||
    file.shareExpiresAt.getTime() > now.getTime()
  );
}

/**
 * Summarize a record for listings
 */
export function toFileSummary(file: FileRecord): FileSummary {
  return {
    id: file.id,
    name: file.name,
    kind: file.kind,
    sizeBytes: file.sizeBytes,
    downloadCount: file.downloadCount,
    shareExpiresAt: file.shareExpiresAt,
    createdAt: file.createdAt,
  };
}
