/**
 * CustodyService Implementation
 *
 * SCOPE: File records, ownership, share expiry, clone-on-access transfer,
 * counters, legacy share codes
 * NOT IN SCOPE: Storage accounting (UserService), message rendering
 *
 * GUARDRAILS:
 * - Ownership is per record, never per blob. A non-owner opening a shared
 *   file gets an independent clone of the record.
 * - Visibility is `active && (no expiry || expiry > now)`, checked on read
 * - Counters are incremented by the store, never read-then-written here
 * - Only owners may change expiry, delete or issue legacy codes
 * - Result pattern required (no thrown errors)
 *
 * Dependencies: CustodyServiceDb, BlobTransport
 */

import type { IdGenerator } from '@/lib/ids.js';
import { defaultIdGenerator } from '@/lib/ids.js';
import type { Logger } from '@/lib/logger.js';
import { TimeoutError, withTimeout } from '@/lib/timeout.js';
import type {
  BlobTransport,
  DeleteResult,
  ExpiryResult,
  FileCounter,
  FileMeta,
  FileRecord,
  FileSummary,
  IncomingUpload,
  NewFileRecord,
  NewShareLink,
  Result,
  ShareLink,
  SoftDeleteOutcome,
  StoredBlob,
  TransportLocation,
} from '@/types/index.js';
import {
  FILE_KINDS,
  failure,
  isFileVisible,
  normalizeListLimit,
  success,
  toFileSummary,
} from '@/types/index.js';

import { DuplicateKeyError } from './store.errors.js';

/**
 * Database abstraction interface for CustodyService
 *
 * Each method is a single atomic unit on the store side.
 */
export interface CustodyServiceDb {
  /** Throws DuplicateKeyError when the id is taken */
  insertFile: (file: NewFileRecord) => Promise<FileRecord>;
  /** Raw lookup, ignores visibility */
  getFile: (fileId: string) => Promise<FileRecord | null>;
  /** `+1` on a visible record; false when nothing matched */
  incrementCounter: (
    fileId: string,
    counter: FileCounter,
    now: Date
  ) => Promise<boolean>;
  /** Copy a visible record to a new owner; null when the source is not visible */
  cloneFile: (params: {
    sourceId: string;
    newId: string;
    ownerId: string;
    ownerDisplayName: string | null;
    now: Date;
  }) => Promise<FileRecord | null>;
  /** Resolve a legacy code and count a download in the same transaction */
  resolveShareLink: (code: string, now: Date) => Promise<FileRecord | null>;
  /** Throws DuplicateKeyError when the code is taken */
  insertShareLink: (link: NewShareLink) => Promise<ShareLink>;
  /** Conditional on owner and active; null when nothing matched */
  updateShareExpiry: (params: {
    fileId: string;
    ownerId: string;
    expiresAt: Date | null;
  }) => Promise<FileRecord | null>;
  /** Conditional on owner and active; null when nothing matched */
  softDeleteFile: (
    fileId: string,
    ownerId: string
  ) => Promise<SoftDeleteOutcome | null>;
  /** Active records only, newest first */
  listFilesByOwner: (ownerId: string, limit: number) => Promise<FileRecord[]>;
}

/**
 * CustodyService interface
 */
export interface CustodyService {
  ingestUpload(
    upload: IncomingUpload,
    ownerId: string,
    ownerDisplayName: string | null
  ): Promise<Result<string>>;
  registerUpload(
    meta: FileMeta,
    transportLocation: TransportLocation,
    ownerId: string,
    ownerDisplayName: string | null
  ): Promise<Result<string>>;
  resolve(id: string): Promise<Result<FileRecord>>;
  recordView(id: string): Promise<Result<void>>;
  recordDownload(id: string): Promise<Result<void>>;
  transferOnAccess(
    id: string,
    requesterId: string,
    requesterDisplayName: string | null
  ): Promise<Result<string>>;
  setShareExpiry(
    id: string,
    requesterId: string,
    durationSeconds: number
  ): Promise<Result<ExpiryResult>>;
  deleteFile(id: string, requesterId: string): Promise<Result<DeleteResult>>;
  listOwned(ownerId: string, limit?: number): Promise<Result<FileSummary[]>>;
  issueLegacyShareLink(
    fileId: string,
    creatorId: string,
    durationDays?: number
  ): Promise<Result<ShareLink>>;
}

export const MAX_ID_ATTEMPTS = 5;

const MEDIA_KINDS = new Set(['photo', 'video', 'audio', 'voice']);
const DAY_MS = 24 * 60 * 60 * 1000;

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

class IdSpaceExhaustedError extends Error {
  constructor(kind: string) {
    super(`Could not allocate a unique ${kind} after ${MAX_ID_ATTEMPTS} attempts`);
    this.name = 'IdSpaceExhaustedError';
  }
}

/**
 * Run an insert with freshly generated ids until one is accepted
 */
async function insertWithFreshId<T>(
  kind: string,
  generate: () => string,
  insert: (id: string) => Promise<T>
): Promise<T> {
  for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt++) {
    try {
      return await insert(generate());
    } catch (error) {
      if (!(error instanceof DuplicateKeyError)) {
        throw error;
      }
    }
  }
  throw new IdSpaceExhaustedError(kind);
}

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim() === '';
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * now + offset, or null when the result falls outside the Date range
 */
function expiryAfter(now: Date, offsetMs: number): Date | null {
  const expiresAt = new Date(now.getTime() + offsetMs);
  return Number.isNaN(expiresAt.getTime()) ? null : expiresAt;
}

function isOptionalDimension(value: unknown): boolean {
  return value === undefined || value === null || isNonNegativeInteger(value);
}

/**
 * Check the fields shared by uploads and registered metadata
 */
function validateFileFields(fields: {
  name: unknown;
  kind: unknown;
  sizeBytes: unknown;
  durationSeconds?: unknown;
  width?: unknown;
  height?: unknown;
}): string | null {
  if (isBlank(fields.name)) {
    return 'name is required';
  }
  if (
    typeof fields.kind !== 'string' ||
    !FILE_KINDS.some((kind) => kind === fields.kind)
  ) {
    return `kind must be one of: ${FILE_KINDS.join(', ')}`;
  }
  if (!isNonNegativeInteger(fields.sizeBytes)) {
    return 'sizeBytes must be a non-negative integer';
  }
  if (
    !isOptionalDimension(fields.durationSeconds) ||
    !isOptionalDimension(fields.width) ||
    !isOptionalDimension(fields.height)
  ) {
    return 'durationSeconds, width and height must be non-negative integers';
  }
  return null;
}

/**
 * Media dimensions are only kept for media kinds
 */
function mediaField(kind: string, value: number | null | undefined): number | null {
  if (!MEDIA_KINDS.has(kind) || value === undefined) {
    return null;
  }
  return value;
}

function buildCaption(
  name: string,
  ownerId: string,
  ownerDisplayName: string | null
): string {
  const uploader = ownerDisplayName ?? `User_${ownerId}`;
  return `${name}\n\nUploader: ${uploader} (ID: ${ownerId})`;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create CustodyService instance
 */
export function createCustodyService(deps: {
  db: CustodyServiceDb;
  transport: BlobTransport;
  logger: Logger;
  transportTimeoutMs: number;
  ids?: IdGenerator;
  clock?: () => Date;
}): CustodyService {
  const { db, transport, logger, transportTimeoutMs } = deps;
  const ids = deps.ids ?? defaultIdGenerator;
  const clock = deps.clock ?? (() => new Date());

  /**
   * Translate thrown store errors into Results
   */
  async function guard<T>(
    operation: string,
    body: () => Promise<Result<T>>
  ): Promise<Result<T>> {
    try {
      return await body();
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        return failure('CONFLICT', `${operation} conflicted with another write`);
      }
      logger.error(`${operation} failed`, error);
      return failure('INTERNAL_ERROR', `${operation} failed`);
    }
  }

  /**
   * Load an active record for an owner-only operation.
   * Non-owners never learn that an expired record exists.
   */
  async function loadOwnedFile(
    id: string,
    requesterId: string,
    now: Date
  ): Promise<Result<FileRecord>> {
    const file = await db.getFile(id);
    if (file === null || !file.active) {
      return failure('NOT_FOUND', 'File not found');
    }
    if (file.ownerId !== requesterId) {
      if (!isFileVisible(file, now)) {
        return failure('NOT_FOUND', 'File not found');
      }
      return failure('PERMISSION_DENIED', "Cannot modify another user's file");
    }
    return success(file);
  }

  async function bumpCounter(
    id: string,
    counter: FileCounter
  ): Promise<Result<void>> {
    return guard(`record ${counter}`, async () => {
      if (isBlank(id)) {
        return failure('VALIDATION_ERROR', 'File ID is required');
      }
      const updated = await db.incrementCounter(id, counter, clock());
      if (!updated) {
        return failure('NOT_FOUND', 'File not found');
      }
      return success(undefined);
    });
  }

  const service: CustodyService = {
    /**
     * Store the payload through the transport, then register it.
     * A transport failure leaves no record behind and is never retried.
     */
    async ingestUpload(
      upload: IncomingUpload,
      ownerId: string,
      ownerDisplayName: string | null
    ): Promise<Result<string>> {
      if (isBlank(upload.rawHandle)) {
        return failure('VALIDATION_ERROR', 'rawHandle is required');
      }
      if (isBlank(ownerId)) {
        return failure('VALIDATION_ERROR', 'ownerId is required');
      }
      const invalid = validateFileFields(upload);
      if (invalid !== null) {
        return failure('VALIDATION_ERROR', invalid);
      }

      let stored: StoredBlob;
      try {
        stored = await withTimeout(
          (signal) =>
            transport.store(
              {
                kind: upload.kind,
                rawHandle: upload.rawHandle,
                caption: buildCaption(upload.name, ownerId, ownerDisplayName),
              },
              signal
            ),
          transportTimeoutMs,
          'blob store'
        );
      } catch (error) {
        if (error instanceof TimeoutError) {
          logger.warn(`Blob store timed out for owner ${ownerId}`);
          return failure(
            'TRANSPORT_TIMEOUT',
            'Blob transport did not answer in time'
          );
        }
        logger.error(`Blob store failed for owner ${ownerId}`, error);
        return failure('TRANSPORT_ERROR', 'Blob transport rejected the upload');
      }

      return service.registerUpload(
        {
          blobRef: stored.blobRef,
          blobUniqueRef: stored.blobUniqueRef,
          name: upload.name,
          mimeType: upload.mimeType ?? null,
          extension: upload.extension ?? null,
          kind: upload.kind,
          sizeBytes: upload.sizeBytes,
          durationSeconds: upload.durationSeconds ?? null,
          width: upload.width ?? null,
          height: upload.height ?? null,
        },
        stored.transportLocation,
        ownerId,
        ownerDisplayName
      );
    },

    /**
     * Persist a new record for a payload the transport already holds.
     * Not idempotent: every call creates a record.
     */
    async registerUpload(
      meta: FileMeta,
      transportLocation: TransportLocation,
      ownerId: string,
      ownerDisplayName: string | null
    ): Promise<Result<string>> {
      if (isBlank(meta.blobRef)) {
        return failure('VALIDATION_ERROR', 'blobRef is required');
      }
      const invalid = validateFileFields(meta);
      if (invalid !== null) {
        return failure('VALIDATION_ERROR', invalid);
      }
      if (isBlank(transportLocation.channelId)) {
        return failure(
          'VALIDATION_ERROR',
          'transportLocation.channelId is required'
        );
      }
      if (isBlank(ownerId)) {
        return failure('VALIDATION_ERROR', 'ownerId is required');
      }

      return guard('register upload', async () => {
        const createdAt = clock();
        const file = await insertWithFreshId('file id', ids.newFileId, (id) =>
          db.insertFile({
            id,
            blobRef: meta.blobRef,
            blobUniqueRef: meta.blobUniqueRef ?? '',
            name: meta.name.trim(),
            mimeType: meta.mimeType ?? null,
            extension: meta.extension ?? null,
            kind: meta.kind,
            sizeBytes: meta.sizeBytes,
            durationSeconds: mediaField(meta.kind, meta.durationSeconds),
            width: mediaField(meta.kind, meta.width),
            height: mediaField(meta.kind, meta.height),
            transportLocation,
            ownerId,
            ownerDisplayName,
            createdAt,
          })
        );

        logger.info(`Registered file ${file.id} for owner ${ownerId}`);
        return success(file.id);
      });
    },

    /**
     * Resolve a public identifier: file id first, legacy code second
     */
    async resolve(id: string): Promise<Result<FileRecord>> {
      if (isBlank(id)) {
        return failure('VALIDATION_ERROR', 'File ID is required');
      }

      return guard('resolve', async () => {
        const now = clock();

        const file = await db.getFile(id);
        if (file !== null && isFileVisible(file, now)) {
          return success(file);
        }

        // Old links counted every resolution as a download
        const linked = await db.resolveShareLink(id, now);
        if (linked !== null) {
          return success(linked);
        }

        return failure('NOT_FOUND', 'File not found');
      });
    },

    async recordView(id: string): Promise<Result<void>> {
      return bumpCounter(id, 'view');
    },

    async recordDownload(id: string): Promise<Result<void>> {
      return bumpCounter(id, 'download');
    },

    /**
     * Give a non-owner their own record pointing at the same blob
     */
    async transferOnAccess(
      id: string,
      requesterId: string,
      requesterDisplayName: string | null
    ): Promise<Result<string>> {
      if (isBlank(id)) {
        return failure('VALIDATION_ERROR', 'File ID is required');
      }
      if (isBlank(requesterId)) {
        return failure('VALIDATION_ERROR', 'requesterId is required');
      }

      return guard('transfer on access', async () => {
        const now = clock();
        const file = await db.getFile(id);
        if (file === null || !isFileVisible(file, now)) {
          return failure('NOT_FOUND', 'File not found');
        }

        if (file.ownerId === requesterId) {
          return success(file.id);
        }

        const clone = await insertWithFreshId(
          'file id',
          ids.newFileId,
          (newId) =>
            db.cloneFile({
              sourceId: file.id,
              newId,
              ownerId: requesterId,
              ownerDisplayName: requesterDisplayName,
              now,
            })
        );

        // Source disappeared between the read and the copy
        if (clone === null) {
          return failure('NOT_FOUND', 'File not found');
        }

        logger.info(`User ${requesterId} saved file ${file.id} as ${clone.id}`);
        return success(clone.id);
      });
    },

    /**
     * Set or clear the share expiry. 0 means permanent.
     */
    async setShareExpiry(
      id: string,
      requesterId: string,
      durationSeconds: number
    ): Promise<Result<ExpiryResult>> {
      if (!isNonNegativeInteger(durationSeconds)) {
        return failure(
          'VALIDATION_ERROR',
          'durationSeconds must be a non-negative integer'
        );
      }

      return guard('set share expiry', async () => {
        const now = clock();
        const owned = await loadOwnedFile(id, requesterId, now);
        if (!owned.success) {
          return owned;
        }

        let expiresAt: Date | null = null;
        if (durationSeconds > 0) {
          expiresAt = expiryAfter(now, durationSeconds * 1000);
          if (expiresAt === null) {
            return failure('VALIDATION_ERROR', 'durationSeconds is too large');
          }
        }

        const updated = await db.updateShareExpiry({
          fileId: id,
          ownerId: requesterId,
          expiresAt,
        });
        if (updated === null) {
          return failure('CONFLICT', 'File changed while updating its expiry');
        }

        return success({ id: updated.id, expiresAt: updated.shareExpiresAt });
      });
    },

    /**
     * Soft delete, then remove the remote blob when no other active record
     * points at it. A failed remote delete never blocks the soft delete.
     */
    async deleteFile(
      id: string,
      requesterId: string
    ): Promise<Result<DeleteResult>> {
      return guard('delete file', async () => {
        const owned = await loadOwnedFile(id, requesterId, clock());
        if (!owned.success) {
          return owned;
        }

        const outcome = await db.softDeleteFile(id, requesterId);
        if (outcome === null) {
          return failure('CONFLICT', 'File was deleted by another request');
        }

        const blobDeleted = await removeBlob(outcome);

        return success({
          id: outcome.file.id,
          ownerId: outcome.file.ownerId,
          name: outcome.file.name,
          sizeBytes: outcome.file.sizeBytes,
          blobDeleted,
        });
      });
    },

    /**
     * Newest active records of an owner
     */
    async listOwned(
      ownerId: string,
      limit?: number
    ): Promise<Result<FileSummary[]>> {
      if (isBlank(ownerId)) {
        return failure('VALIDATION_ERROR', 'ownerId is required');
      }

      return guard('list owned files', async () => {
        const files = await db.listFilesByOwner(
          ownerId,
          normalizeListLimit(limit)
        );
        return success(files.map(toFileSummary));
      });
    },

    /**
     * Issue an old-style short code for a file
     */
    async issueLegacyShareLink(
      fileId: string,
      creatorId: string,
      durationDays?: number
    ): Promise<Result<ShareLink>> {
      if (durationDays !== undefined && !isNonNegativeInteger(durationDays)) {
        return failure(
          'VALIDATION_ERROR',
          'durationDays must be a non-negative integer'
        );
      }

      return guard('issue share link', async () => {
        const now = clock();
        const owned = await loadOwnedFile(fileId, creatorId, now);
        if (!owned.success) {
          return owned;
        }

        let expiresAt: Date | null = null;
        if (durationDays !== undefined && durationDays > 0) {
          expiresAt = expiryAfter(now, durationDays * DAY_MS);
          if (expiresAt === null) {
            return failure('VALIDATION_ERROR', 'durationDays is too large');
          }
        }

        const link = await insertWithFreshId(
          'share code',
          ids.newShareCode,
          (code) =>
            db.insertShareLink({
              code,
              fileId,
              creatorId,
              expiresAt,
              createdAt: now,
            })
        );

        return success(link);
      });
    },
  };

  /**
   * Best-effort remote delete. Returns whether the blob is known to be gone.
   */
  async function removeBlob(outcome: SoftDeleteOutcome): Promise<boolean> {
    const { file, remainingReferences } = outcome;

    if (remainingReferences > 0) {
      logger.debug(
        `Keeping blob of ${file.id}: ${remainingReferences} active record(s) still reference it`
      );
      return false;
    }
    if (file.transportLocation.messageId === null) {
      logger.warn(`File ${file.id} has no transport message to delete`);
      return false;
    }

    try {
      const deleted = await withTimeout(
        (signal) => transport.delete(file.transportLocation, signal),
        transportTimeoutMs,
        'blob delete'
      );
      if (!deleted) {
        logger.warn(`Transport refused to delete blob of ${file.id}`);
      }
      return deleted;
    } catch (error) {
      logger.warn(`Remote delete failed for ${file.id}`, error);
      return false;
    }
  }

  return service;
}
