/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { ActorContext, FileRecord, FileSummary, UserRecord } from '@/types/index.js';

import type { ApiErrorCode } from '../types.js';
import { getErrorStatus } from '../types.js';

/**
 * Service error shape (matches Result pattern)
 */
interface ServiceError {
  code: ApiErrorCode;
  message: string;
  details?: unknown;
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}

/**
 * Helper to get actor from context
 */
export function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Helper to get request ID from context
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

/**
 * Format nullable date to ISO string
 */
function formatDate(date: Date | null): string | null {
  return date !== null ? date.toISOString() : null;
}

export function serializeFile(file: FileRecord) {
  return {
    id: file.id,
    name: file.name,
    kind: file.kind,
    mimeType: file.mimeType,
    extension: file.extension,
    sizeBytes: file.sizeBytes,
    durationSeconds: file.durationSeconds,
    width: file.width,
    height: file.height,
    blobRef: file.blobRef,
    ownerId: file.ownerId,
    ownerDisplayName: file.ownerDisplayName,
    downloadCount: file.downloadCount,
    viewCount: file.viewCount,
    shareExpiresAt: formatDate(file.shareExpiresAt),
    createdAt: file.createdAt.toISOString(),
  };
}

export function serializeSummary(summary: FileSummary) {
  return {
    id: summary.id,
    name: summary.name,
    kind: summary.kind,
    sizeBytes: summary.sizeBytes,
    downloadCount: summary.downloadCount,
    shareExpiresAt: formatDate(summary.shareExpiresAt),
    createdAt: summary.createdAt.toISOString(),
  };
}

export function serializeUser(user: UserRecord) {
  return {
    id: user.id,
    username: user.username,
    displayName: user.displayName,
    isAdmin: user.isAdmin,
    isBanned: user.isBanned,
    storageUsedBytes: user.storageUsedBytes,
    createdAt: user.createdAt.toISOString(),
  };
}
