/**
 * File Routes
 * Custody operations exposed to trusted front-ends
 */

import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import { z } from 'zod';

import type { Logger } from '@/lib/logger.js';
import type { CustodyService } from '@/services/custody.service.js';
import type { UserService } from '@/services/user.service.js';
import { FILE_KINDS } from '@/types/index.js';

import {
  errorResponse,
  getActor,
  getRequestId,
  serializeFile,
  serializeSummary,
  successResponse,
} from '../utils/response.js';

interface FileRoutesDeps {
  custodyService: CustodyService;
  userService: Pick<UserService, 'adjustStorage'>;
  logger: Logger;
  maxFileSizeBytes: number;
  shareUrl: (fileId: string) => string;
  uploadLimit: MiddlewareHandler;
  downloadLimit: MiddlewareHandler;
}

// Zod Schemas
const optionalCount = z.number().int().nonnegative().nullable().optional();

const uploadSchema = z.object({
  rawHandle: z.string().min(1, 'rawHandle is required'),
  name: z.string().trim().min(1, 'name is required'),
  kind: z.enum(FILE_KINDS),
  sizeBytes: z.number().int().nonnegative(),
  mimeType: z.string().nullable().optional(),
  extension: z.string().nullable().optional(),
  durationSeconds: optionalCount,
  width: optionalCount,
  height: optionalCount,
});

const expirySchema = z.object({
  durationSeconds: z.number().int().nonnegative(),
});

const shareLinkSchema = z.object({
  durationDays: z.number().int().nonnegative().optional(),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
});

/**
 * Read a JSON body, treating an empty or malformed body as `{}`
 */
async function readJson(req: { json: () => Promise<unknown> }): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    return {};
  }
}

function validationMessage(error: z.ZodError, fallback: string): string {
  const issue = error.issues[0];
  if (issue === undefined) {
    return fallback;
  }
  const path = issue.path.join('.');
  return path !== '' ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Create file routes
 */
export function createFileRoutes(deps: FileRoutesDeps): Hono {
  const { custodyService, userService, logger, maxFileSizeBytes, shareUrl } =
    deps;
  const app = new Hono();

  /**
   * Credit or debit an owner's storage. The file operation already
   * happened, so a failure here is logged and not reported.
   */
  async function adjustStorage(userId: string, deltaBytes: number) {
    const result = await userService.adjustStorage(userId, deltaBytes);
    if (!result.success) {
      logger.warn(
        `Storage adjustment of ${deltaBytes} for ${userId} failed`,
        result.error
      );
    }
  }

  // ─────────────────────────────────────────────────────────────
  // UPLOAD
  // ─────────────────────────────────────────────────────────────

  /**
   * POST /files
   * Persist a payload through the transport and register it
   */
  app.post('/files', deps.uploadLimit, async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = uploadSchema.safeParse(await readJson(c.req));
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: validationMessage(validation.error, 'Invalid upload'),
        },
        requestId
      );
    }

    const body = validation.data;
    if (body.sizeBytes > maxFileSizeBytes) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: `File too large, maximum is ${maxFileSizeBytes} bytes`,
        },
        requestId
      );
    }

    const result = await custodyService.ingestUpload(
      body,
      actor.userId,
      actor.displayName
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    await adjustStorage(actor.userId, body.sizeBytes);

    return successResponse(
      c,
      { id: result.data, shareUrl: shareUrl(result.data) },
      requestId,
      201
    );
  });

  // ─────────────────────────────────────────────────────────────
  // LIST
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /files
   * Newest active files of the caller
   */
  app.get('/files', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const query = listQuerySchema.safeParse({ limit: c.req.query('limit') });
    if (!query.success) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'limit must be an integer' },
        requestId
      );
    }

    const result = await custodyService.listOwned(actor.userId, query.data.limit);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data.map(serializeSummary), requestId);
  });

  // ─────────────────────────────────────────────────────────────
  // RESOLVE
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /files/:id
   * Resolve a file id or legacy share code
   */
  app.get('/files/:id', async (c) => {
    const requestId = getRequestId(c);

    const result = await custodyService.resolve(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, serializeFile(result.data), requestId);
  });

  /**
   * POST /files/:id/access
   * Open a share link: count a view and hand the caller their own record
   */
  app.post('/files/:id/access', deps.downloadLimit, async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const resolved = await custodyService.resolve(c.req.param('id'));
    if (!resolved.success) {
      return errorResponse(c, resolved.error, requestId);
    }
    const source = resolved.data;

    const viewed = await custodyService.recordView(source.id);
    if (!viewed.success) {
      return errorResponse(c, viewed.error, requestId);
    }

    const transferred = await custodyService.transferOnAccess(
      source.id,
      actor.userId,
      actor.displayName
    );
    if (!transferred.success) {
      return errorResponse(c, transferred.error, requestId);
    }

    const file = await custodyService.resolve(transferred.data);
    if (!file.success) {
      return errorResponse(c, file.error, requestId);
    }

    return successResponse(
      c,
      {
        file: serializeFile(file.data),
        sourceId: source.id,
        cloned: transferred.data !== source.id,
        shareUrl: shareUrl(transferred.data),
      },
      requestId
    );
  });

  /**
   * POST /files/:id/download
   * Count a download and return what the front-end needs to deliver it
   */
  app.post('/files/:id/download', deps.downloadLimit, async (c) => {
    const requestId = getRequestId(c);

    const id = c.req.param('id');
    const resolved = await custodyService.resolve(id);
    if (!resolved.success) {
      return errorResponse(c, resolved.error, requestId);
    }

    // A legacy code resolution has already counted this download
    if (resolved.data.id === id) {
      const counted = await custodyService.recordDownload(id);
      if (!counted.success) {
        return errorResponse(c, counted.error, requestId);
      }
    }

    return successResponse(c, serializeFile(resolved.data), requestId);
  });

  // ─────────────────────────────────────────────────────────────
  // OWNER OPERATIONS
  // ─────────────────────────────────────────────────────────────

  /**
   * PUT /files/:id/expiry
   * Set or clear the share expiry (0 = permanent)
   */
  app.put('/files/:id/expiry', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = expirySchema.safeParse(await readJson(c.req));
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: 'durationSeconds must be a non-negative integer',
        },
        requestId
      );
    }

    const result = await custodyService.setShareExpiry(
      c.req.param('id'),
      actor.userId,
      validation.data.durationSeconds
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        id: result.data.id,
        expiresAt:
          result.data.expiresAt !== null
            ? result.data.expiresAt.toISOString()
            : null,
      },
      requestId
    );
  });

  /**
   * DELETE /files/:id
   * Soft delete, remote cleanup, storage credit
   */
  app.delete('/files/:id', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await custodyService.deleteFile(c.req.param('id'), actor.userId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    await adjustStorage(result.data.ownerId, -result.data.sizeBytes);

    return successResponse(
      c,
      { id: result.data.id, blobDeleted: result.data.blobDeleted },
      requestId
    );
  });

  /**
   * POST /files/:id/share-links
   * Issue a legacy short code
   */
  app.post('/files/:id/share-links', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = shareLinkSchema.safeParse(await readJson(c.req));
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: 'durationDays must be a non-negative integer',
        },
        requestId
      );
    }

    const result = await custodyService.issueLegacyShareLink(
      c.req.param('id'),
      actor.userId,
      validation.data.durationDays
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const link = result.data;
    return successResponse(
      c,
      {
        code: link.code,
        fileId: link.fileId,
        shareUrl: shareUrl(link.code),
        expiresAt: link.expiresAt !== null ? link.expiresAt.toISOString() : null,
        createdAt: link.createdAt.toISOString(),
      },
      requestId,
      201
    );
  });

  return app;
}
