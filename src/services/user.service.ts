/**
 * UserService Implementation
 *
 * SCOPE: Lazy user creation, storage accounting, ban flag
 * NOT IN SCOPE: Authentication (front-ends authenticate callers)
 *
 * GUARDRAILS:
 * - getOrCreateUser runs before any custody operation needing an owner
 * - storageUsedBytes never goes below zero; the store clamps it
 * - Only admins may ban or unban
 * - Result pattern required (no thrown errors)
 */

import type { Logger } from '@/lib/logger.js';
import type { Result, UserIdentity, UserRecord } from '@/types/index.js';
import { failure, success } from '@/types/index.js';

/**
 * Database abstraction interface for UserService
 */
export interface UserServiceDb {
  getUser: (userId: string) => Promise<UserRecord | null>;
  /** Insert if missing, otherwise return the stored row unchanged */
  getOrCreateUser: (identity: UserIdentity) => Promise<UserRecord>;
  /** Atomic `max(0, used + delta)`; null when the user does not exist */
  adjustStorage: (userId: string, deltaBytes: number) => Promise<UserRecord | null>;
  setBanned: (userId: string, banned: boolean) => Promise<UserRecord | null>;
}

/**
 * UserService interface
 */
export interface UserService {
  getOrCreateUser(
    id: string,
    username?: string | null,
    displayName?: string | null
  ): Promise<Result<UserRecord>>;
  getUser(id: string): Promise<Result<UserRecord>>;
  adjustStorage(id: string, deltaBytes: number): Promise<Result<UserRecord>>;
  setBanned(
    actorId: string,
    targetId: string,
    banned: boolean
  ): Promise<Result<UserRecord>>;
}

/**
 * Create UserService instance
 */
export function createUserService(deps: {
  db: UserServiceDb;
  logger: Logger;
  adminUserId?: string | null;
}): UserService {
  const { db, logger } = deps;
  const adminUserId = deps.adminUserId ?? null;

  async function guard<T>(
    operation: string,
    body: () => Promise<Result<T>>
  ): Promise<Result<T>> {
    try {
      return await body();
    } catch (error) {
      logger.error(`${operation} failed`, error);
      return failure('INTERNAL_ERROR', `${operation} failed`);
    }
  }

  return {
    /**
     * Get or create the user record for an external identity
     */
    async getOrCreateUser(
      id: string,
      username?: string | null,
      displayName?: string | null
    ): Promise<Result<UserRecord>> {
      if (!id || id.trim() === '') {
        return failure('VALIDATION_ERROR', 'User ID is required');
      }

      return guard('get or create user', async () => {
        const user = await db.getOrCreateUser({
          id,
          username: username ?? null,
          displayName: displayName ?? null,
        });
        return success(user);
      });
    },

    async getUser(id: string): Promise<Result<UserRecord>> {
      return guard('get user', async () => {
        const user = await db.getUser(id);
        if (user === null) {
          return failure('NOT_FOUND', 'User not found');
        }
        return success(user);
      });
    },

    /**
     * Credit or debit storage usage. Decrements are clamped at zero.
     */
    async adjustStorage(
      id: string,
      deltaBytes: number
    ): Promise<Result<UserRecord>> {
      if (!Number.isInteger(deltaBytes)) {
        return failure('VALIDATION_ERROR', 'deltaBytes must be an integer');
      }

      return guard('adjust storage', async () => {
        const user = await db.adjustStorage(id, deltaBytes);
        if (user === null) {
          return failure('NOT_FOUND', 'User not found');
        }
        return success(user);
      });
    },

    /**
     * Ban or unban a user (admin only)
     */
    async setBanned(
      actorId: string,
      targetId: string,
      banned: boolean
    ): Promise<Result<UserRecord>> {
      return guard('set banned', async () => {
        const actor = await db.getUser(actorId);
        const isAdmin =
          (adminUserId !== null && actorId === adminUserId) ||
          (actor !== null && actor.isAdmin);
        if (!isAdmin) {
          return failure('PERMISSION_DENIED', 'Admin access required');
        }
        if (actorId === targetId && banned) {
          return failure('VALIDATION_ERROR', 'Admins cannot ban themselves');
        }

        const user = await db.setBanned(targetId, banned);
        if (user === null) {
          return failure('NOT_FOUND', 'User not found');
        }

        logger.info(`User ${targetId} ${banned ? 'banned' : 'unbanned'} by ${actorId}`);
        return success(user);
      });
    },
  };
}
