/**
 * File Routes Unit Tests
 *
 * Real services on the in-process store; the actor is chosen per request
 * through a test header.
 */

import { Hono } from 'hono';
import type { Context, MiddlewareHandler, Next } from 'hono';
import { describe, it, expect, beforeEach, vi } from 'vitest';

import {
  createInMemoryRateLimiter,
  createRateLimitMiddleware,
} from '@/api/middleware/rateLimit.js';
import { createFileRoutes } from '@/api/routes/files.js';
import { createCustodyService } from '@/services/custody.service.js';
import { createUserService } from '@/services/user.service.js';
import type { BlobTransport } from '@/types/index.js';

import { InMemoryCustodyStore } from '../../helpers/in-memory-custody-store.js';
import {
  createFakeTransport,
  createTestClock,
  createTestLogger,
  readBody,
  sequenceIds,
} from '../../helpers/test-utils.js';

// ─────────────────────────────────────────────────────────────
// TEST FIXTURES
// ─────────────────────────────────────────────────────────────

const START = new Date('2025-03-01T12:00:00.000Z');
const MAX_FILE_SIZE_BYTES = 10_000;

const shareUrl = (id: string) => `https://t.me/custody_test_bot?start=${id}`;

interface DataBody<T> {
  data: T;
  meta: { requestId: string };
}

interface ErrorBody {
  error: { code: string; message: string; requestId: string };
}

interface FileBody {
  id: string;
  name: string;
  ownerId: string;
  ownerDisplayName: string | null;
  blobRef: string;
  downloadCount: number;
  viewCount: number;
  shareExpiresAt: string | null;
  createdAt: string;
}

const passThrough: MiddlewareHandler = async (_c, next) => {
  await next();
};

/**
 * Acts as the user named in X-Test-User (default 'user-1')
 */
async function testActor(c: Context, next: Next) {
  const userId = c.req.header('X-Test-User') ?? 'user-1';
  c.set('actor', {
    type: 'user',
    userId,
    displayName: userId === 'user-1' ? 'Alice' : 'Bob',
    requestId: 'req-1',
  });
  c.set('requestId', 'req-1');
  await next();
}

let clock: ReturnType<typeof createTestClock>;
let store: InMemoryCustodyStore;
let transport: BlobTransport;
let app: Hono;

function buildApp(uploadLimit: MiddlewareHandler = passThrough): Hono {
  const logger = createTestLogger();
  const routes = createFileRoutes({
    custodyService: createCustodyService({
      db: store,
      transport,
      logger,
      transportTimeoutMs: 1000,
      ids: sequenceIds(['f1', 'f2', 'f3'], ['code0001']),
      clock: clock.now,
    }),
    userService: createUserService({ db: store, logger }),
    logger,
    maxFileSizeBytes: MAX_FILE_SIZE_BYTES,
    shareUrl,
    uploadLimit,
    downloadLimit: passThrough,
  });

  const built = new Hono();
  built.use('/api/v1/*', testActor);
  built.route('/api/v1', routes);
  return built;
}

function send(
  method: string,
  path: string,
  body?: unknown,
  userId = 'user-1'
): Promise<Response> {
  const init: RequestInit = {
    method,
    headers: { 'Content-Type': 'application/json', 'X-Test-User': userId },
  };
  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }
  return Promise.resolve(app.request(`/api/v1${path}`, init));
}

const UPLOAD = {
  rawHandle: 'raw-1',
  name: 'report.pdf',
  kind: 'document',
  sizeBytes: 2048,
  mimeType: 'application/pdf',
  extension: 'pdf',
};

async function uploadReport(): Promise<void> {
  const res = await send('POST', '/files', UPLOAD);
  if (res.status !== 201) {
    throw new Error(`upload failed with ${res.status}`);
  }
}

beforeEach(async () => {
  clock = createTestClock(START);
  store = new InMemoryCustodyStore(clock.now);
  transport = createFakeTransport();
  await store.getOrCreateUser({ id: 'user-1', displayName: 'Alice' });
  await store.getOrCreateUser({ id: 'user-2', displayName: 'Bob' });
  app = buildApp();
});

// ─────────────────────────────────────────────────────────────
// UPLOAD
// ─────────────────────────────────────────────────────────────

describe('POST /files', () => {
  it('should store, register and debit storage', async () => {
    const res = await send('POST', '/files', UPLOAD);

    expect(res.status).toBe(201);
    expect(await readBody<unknown>(res)).toEqual({
      data: { id: 'f1', shareUrl: shareUrl('f1') },
      meta: { requestId: 'req-1' },
    });
    expect(store.files.get('f1')).toMatchObject({
      blobRef: 'stored-raw-1',
      ownerId: 'user-1',
      ownerDisplayName: 'Alice',
    });
    expect(store.users.get('user-1')?.storageUsedBytes).toBe(2048);
  });

  it('should reject an unknown kind', async () => {
    const res = await send('POST', '/files', { ...UPLOAD, kind: 'movie' });

    expect(res.status).toBe(400);
    const body = await readBody<ErrorBody>(res);
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.message).toMatch(/^kind: /);
  });

  it('should treat a malformed body as empty', async () => {
    const res = await app.request('/api/v1/files', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{not json',
    });

    expect(res.status).toBe(400);
    const body = await readBody<ErrorBody>(res);
    expect(body.error.message).toBe('rawHandle: Required');
  });

  it('should reject files over the size limit', async () => {
    const res = await send('POST', '/files', {
      ...UPLOAD,
      sizeBytes: MAX_FILE_SIZE_BYTES + 1,
    });

    expect(res.status).toBe(400);
    const body = await readBody<ErrorBody>(res);
    expect(body.error.message).toBe('File too large, maximum is 10000 bytes');
    expect(transport.store).not.toHaveBeenCalled();
  });

  it('should map transport failures to 502', async () => {
    vi.mocked(transport.store).mockRejectedValueOnce(new Error('bad request'));

    const res = await send('POST', '/files', UPLOAD);

    expect(res.status).toBe(502);
    const body = await readBody<ErrorBody>(res);
    expect(body.error.code).toBe('TRANSPORT_ERROR');
    expect(store.users.get('user-1')?.storageUsedBytes).toBe(0);
  });

  it('should apply the upload rate limit', async () => {
    app = buildApp(
      createRateLimitMiddleware(
        createInMemoryRateLimiter({ limit: 1, window: 60 }, () => START.getTime()),
        {},
        () => START.getTime()
      )
    );

    await send('POST', '/files', UPLOAD);
    const res = await send('POST', '/files', UPLOAD);

    expect(res.status).toBe(429);
    expect(store.files.size).toBe(1);
  });
});

// ─────────────────────────────────────────────────────────────
// READS
// ─────────────────────────────────────────────────────────────

describe('GET /files', () => {
  it("should list the caller's files", async () => {
    await uploadReport();

    const res = await send('GET', '/files');

    expect(res.status).toBe(200);
    const body = await readBody<DataBody<unknown[]>>(res);
    expect(body.data).toEqual([
      {
        id: 'f1',
        name: 'report.pdf',
        kind: 'document',
        sizeBytes: 2048,
        downloadCount: 0,
        shareExpiresAt: null,
        createdAt: '2025-03-01T12:00:00.000Z',
      },
    ]);
  });

  it('should reject a non-numeric limit', async () => {
    const res = await send('GET', '/files?limit=abc');

    expect(res.status).toBe(400);
    const body = await readBody<ErrorBody>(res);
    expect(body.error.message).toBe('limit must be an integer');
  });
});

describe('GET /files/:id', () => {
  it('should resolve a file id', async () => {
    await uploadReport();

    const res = await send('GET', '/files/f1', undefined, 'user-2');

    expect(res.status).toBe(200);
    const body = await readBody<DataBody<FileBody>>(res);
    expect(body.data).toMatchObject({ id: 'f1', ownerId: 'user-1', name: 'report.pdf' });
  });

  it('should return 404 for unknown ids', async () => {
    const res = await send('GET', '/files/missing');

    expect(res.status).toBe(404);
    const body = await readBody<ErrorBody>(res);
    expect(body.error).toEqual({
      code: 'NOT_FOUND',
      message: 'File not found',
      requestId: 'req-1',
    });
  });
});

// ─────────────────────────────────────────────────────────────
// ACCESS AND DOWNLOAD
// ─────────────────────────────────────────────────────────────

describe('POST /files/:id/access', () => {
  it('should give another user their own copy', async () => {
    await uploadReport();

    const res = await send('POST', '/files/f1/access', undefined, 'user-2');

    expect(res.status).toBe(200);
    const body = await readBody<
      DataBody<{ file: FileBody; sourceId: string; cloned: boolean; shareUrl: string }>
    >(res);
    expect(body.data.sourceId).toBe('f1');
    expect(body.data.cloned).toBe(true);
    expect(body.data.shareUrl).toBe(shareUrl('f2'));
    expect(body.data.file).toMatchObject({
      id: 'f2',
      ownerId: 'user-2',
      ownerDisplayName: 'Bob',
      blobRef: 'stored-raw-1',
      viewCount: 0,
    });
    expect(store.files.get('f1')?.viewCount).toBe(1);
  });

  it('should not clone for the owner', async () => {
    await uploadReport();

    const res = await send('POST', '/files/f1/access');

    const body = await readBody<DataBody<{ cloned: boolean; file: FileBody }>>(res);
    expect(body.data.cloned).toBe(false);
    expect(body.data.file.viewCount).toBe(1);
    expect(store.files.size).toBe(1);
  });
});

describe('POST /files/:id/download', () => {
  it('should count the download', async () => {
    await uploadReport();

    const res = await send('POST', '/files/f1/download', undefined, 'user-2');

    expect(res.status).toBe(200);
    const body = await readBody<DataBody<FileBody>>(res);
    expect(body.data.blobRef).toBe('stored-raw-1');
    expect(store.files.get('f1')?.downloadCount).toBe(1);
  });

  it('should count a legacy code download once', async () => {
    await uploadReport();
    await send('POST', '/files/f1/share-links', {});

    const res = await send('POST', '/files/code0001/download', undefined, 'user-2');

    expect(res.status).toBe(200);
    const body = await readBody<DataBody<FileBody>>(res);
    expect(body.data.id).toBe('f1');
    expect(body.data.downloadCount).toBe(1);
    expect(store.files.get('f1')?.downloadCount).toBe(1);
  });
});

// ─────────────────────────────────────────────────────────────
// OWNER OPERATIONS
// ─────────────────────────────────────────────────────────────

describe('PUT /files/:id/expiry', () => {
  it('should set the expiry from now', async () => {
    await uploadReport();

    const res = await send('PUT', '/files/f1/expiry', { durationSeconds: 3600 });

    expect(res.status).toBe(200);
    expect(await readBody<unknown>(res)).toEqual({
      data: { id: 'f1', expiresAt: '2025-03-01T13:00:00.000Z' },
      meta: { requestId: 'req-1' },
    });
  });

  it('should clear the expiry with 0', async () => {
    await uploadReport();
    await send('PUT', '/files/f1/expiry', { durationSeconds: 3600 });

    const res = await send('PUT', '/files/f1/expiry', { durationSeconds: 0 });

    const body = await readBody<DataBody<{ expiresAt: string | null }>>(res);
    expect(body.data.expiresAt).toBeNull();
    expect(store.files.get('f1')?.shareExpiresAt).toBeNull();
  });

  it('should reject negative durations', async () => {
    const res = await send('PUT', '/files/f1/expiry', { durationSeconds: -1 });

    expect(res.status).toBe(400);
  });

  it('should reject durations too large to date', async () => {
    await uploadReport();

    const res = await send('PUT', '/files/f1/expiry', { durationSeconds: 1e17 });

    expect(res.status).toBe(400);
    const body = await readBody<ErrorBody>(res);
    expect(body.error.message).toBe('durationSeconds is too large');
    expect(store.files.get('f1')?.shareExpiresAt).toBeNull();
  });

  it("should refuse another user's file", async () => {
    await uploadReport();

    const res = await send('PUT', '/files/f1/expiry', { durationSeconds: 60 }, 'user-2');

    expect(res.status).toBe(403);
    const body = await readBody<ErrorBody>(res);
    expect(body.error.code).toBe('PERMISSION_DENIED');
  });
});

describe('DELETE /files/:id', () => {
  it('should delete, remove the blob and credit storage', async () => {
    await uploadReport();

    const res = await send('DELETE', '/files/f1');

    expect(res.status).toBe(200);
    const body = await readBody<DataBody<unknown>>(res);
    expect(body.data).toEqual({ id: 'f1', blobDeleted: true });
    expect(store.files.get('f1')?.active).toBe(false);
    expect(store.users.get('user-1')?.storageUsedBytes).toBe(0);
  });

  it('should keep the blob while a copy references it', async () => {
    await uploadReport();
    await send('POST', '/files/f1/access', undefined, 'user-2');

    const res = await send('DELETE', '/files/f1');

    const body = await readBody<DataBody<{ blobDeleted: boolean }>>(res);
    expect(body.data.blobDeleted).toBe(false);
    expect(transport.delete).not.toHaveBeenCalled();
  });

  it('should return 404 once deleted', async () => {
    await uploadReport();
    await send('DELETE', '/files/f1');

    const res = await send('DELETE', '/files/f1');

    expect(res.status).toBe(404);
  });
});

describe('POST /files/:id/share-links', () => {
  it('should issue a legacy code', async () => {
    await uploadReport();

    const res = await send('POST', '/files/f1/share-links', { durationDays: 7 });

    expect(res.status).toBe(201);
    expect(await readBody<unknown>(res)).toEqual({
      data: {
        code: 'code0001',
        fileId: 'f1',
        shareUrl: shareUrl('code0001'),
        expiresAt: '2025-03-08T12:00:00.000Z',
        createdAt: '2025-03-01T12:00:00.000Z',
      },
      meta: { requestId: 'req-1' },
    });
  });

  it('should resolve the issued code', async () => {
    await uploadReport();
    await send('POST', '/files/f1/share-links', {});

    const res = await send('GET', '/files/code0001', undefined, 'user-2');

    const body = await readBody<DataBody<FileBody>>(res);
    expect(body.data.id).toBe('f1');
  });
});
