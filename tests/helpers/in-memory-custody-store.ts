/**
 * In-process stand-in for the Supabase adapters.
 * Mirrors the SQL functions in supabase/migrations/001_custody_schema.sql;
 * each method runs without yielding, so every call is atomic.
 */

import type { CustodyServiceDb } from '@/services/custody.service.js';
import { DuplicateKeyError } from '@/services/store.errors.js';
import type { UserServiceDb } from '@/services/user.service.js';
import type {
  FileCounter,
  FileRecord,
  NewFileRecord,
  NewShareLink,
  ShareLink,
  SoftDeleteOutcome,
  UserIdentity,
  UserRecord,
} from '@/types/index.js';
import { isFileVisible } from '@/types/index.js';

function copyFile(file: FileRecord): FileRecord {
  return { ...file, transportLocation: { ...file.transportLocation } };
}

function sameLocation(a: FileRecord, b: FileRecord): boolean {
  return (
    a.transportLocation.channelId === b.transportLocation.channelId &&
    a.transportLocation.messageId === b.transportLocation.messageId
  );
}

export class InMemoryCustodyStore implements CustodyServiceDb, UserServiceDb {
  readonly files = new Map<string, FileRecord>();
  readonly shareLinks = new Map<string, ShareLink>();
  readonly users = new Map<string, UserRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  // ─── files ──────────────────────────────────────────────────

  async insertFile(file: NewFileRecord): Promise<FileRecord> {
    if (this.files.has(file.id)) {
      throw new DuplicateKeyError('duplicate key value violates unique constraint', 'files_pkey');
    }
    const record: FileRecord = {
      ...file,
      transportLocation: { ...file.transportLocation },
      downloadCount: 0,
      viewCount: 0,
      active: true,
      shareExpiresAt: null,
    };
    this.files.set(file.id, record);
    return copyFile(record);
  }

  async getFile(fileId: string): Promise<FileRecord | null> {
    const file = this.files.get(fileId);
    return file !== undefined ? copyFile(file) : null;
  }

  async incrementCounter(
    fileId: string,
    counter: FileCounter,
    now: Date
  ): Promise<boolean> {
    const file = this.files.get(fileId);
    if (file === undefined || !isFileVisible(file, now)) {
      return false;
    }
    if (counter === 'download') {
      file.downloadCount += 1;
    } else {
      file.viewCount += 1;
    }
    return true;
  }

  async cloneFile(params: {
    sourceId: string;
    newId: string;
    ownerId: string;
    ownerDisplayName: string | null;
    now: Date;
  }): Promise<FileRecord | null> {
    const source = this.files.get(params.sourceId);
    if (source === undefined || !isFileVisible(source, params.now)) {
      return null;
    }
    if (this.files.has(params.newId)) {
      throw new DuplicateKeyError('duplicate key value violates unique constraint', 'files_pkey');
    }
    const clone: FileRecord = {
      ...copyFile(source),
      id: params.newId,
      ownerId: params.ownerId,
      ownerDisplayName: params.ownerDisplayName,
      downloadCount: 0,
      viewCount: 0,
      active: true,
      shareExpiresAt: null,
      createdAt: params.now,
    };
    this.files.set(clone.id, clone);
    return copyFile(clone);
  }

  async resolveShareLink(code: string, now: Date): Promise<FileRecord | null> {
    const link = this.shareLinks.get(code);
    if (
      link === undefined ||
      !link.active ||
      (link.expiresAt !== null && link.expiresAt.getTime() <= now.getTime())
    ) {
      return null;
    }
    const file = this.files.get(link.fileId);
    if (file === undefined || !isFileVisible(file, now)) {
      return null;
    }
    file.downloadCount += 1;
    return copyFile(file);
  }

  async insertShareLink(link: NewShareLink): Promise<ShareLink> {
    if (this.shareLinks.has(link.code)) {
      throw new DuplicateKeyError('duplicate key value violates unique constraint', 'share_links_pkey');
    }
    const record: ShareLink = { ...link, downloadCount: 0, active: true };
    this.shareLinks.set(link.code, record);
    return { ...record };
  }

  async updateShareExpiry(params: {
    fileId: string;
    ownerId: string;
    expiresAt: Date | null;
  }): Promise<FileRecord | null> {
    const file = this.files.get(params.fileId);
    if (file === undefined || file.ownerId !== params.ownerId || !file.active) {
      return null;
    }
    file.shareExpiresAt = params.expiresAt;
    return copyFile(file);
  }

  async softDeleteFile(
    fileId: string,
    ownerId: string
  ): Promise<SoftDeleteOutcome | null> {
    const file = this.files.get(fileId);
    if (file === undefined || file.ownerId !== ownerId || !file.active) {
      return null;
    }
    file.active = false;
    const remainingReferences = [...this.files.values()].filter(
      (other) => other.active && sameLocation(other, file)
    ).length;
    return { file: copyFile(file), remainingReferences };
  }

  async listFilesByOwner(ownerId: string, limit: number): Promise<FileRecord[]> {
    return [...this.files.values()]
      .filter((file) => file.ownerId === ownerId && file.active)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map(copyFile);
  }

  // ─── users ──────────────────────────────────────────────────

  async getUser(userId: string): Promise<UserRecord | null> {
    const user = this.users.get(userId);
    return user !== undefined ? { ...user } : null;
  }

  async getOrCreateUser(identity: UserIdentity): Promise<UserRecord> {
    let user = this.users.get(identity.id);
    if (user === undefined) {
      user = {
        id: identity.id,
        username: identity.username ?? null,
        displayName: identity.displayName ?? null,
        isAdmin: false,
        isBanned: false,
        storageUsedBytes: 0,
        createdAt: this.now(),
      };
      this.users.set(user.id, user);
    }
    return { ...user };
  }

  async adjustStorage(userId: string, deltaBytes: number): Promise<UserRecord | null> {
    const user = this.users.get(userId);
    if (user === undefined) {
      return null;
    }
    user.storageUsedBytes = Math.max(0, user.storageUsedBytes + deltaBytes);
    return { ...user };
  }

  async setBanned(userId: string, banned: boolean): Promise<UserRecord | null> {
    const user = this.users.get(userId);
    if (user === undefined) {
      return null;
    }
    user.isBanned = banned;
    return { ...user };
  }
}
