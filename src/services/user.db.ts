/**
 * UserService Database Adapter
 * Implements UserServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { UserIdentity, UserRecord } from '@/types/index.js';

import { toStoreError } from './store.errors.js';
import type { UserServiceDb } from './user.service.js';

/**
 * Database row types
 */
interface UserRow {
  id: string;
  username: string | null;
  display_name: string | null;
  is_admin: boolean;
  is_banned: boolean;
  storage_used_bytes: number;
  created_at: string;
}

/**
 * Map database row to UserRecord entity
 */
function mapRowToUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    displayName: row.display_name,
    isAdmin: row.is_admin,
    isBanned: row.is_banned,
    storageUsedBytes: Number(row.storage_used_bytes),
    createdAt: new Date(row.created_at),
  };
}

/**
 * Create UserServiceDb implementation using Supabase
 */
export function createUserServiceDb(supabase: SupabaseClient): UserServiceDb {
  async function getUser(userId: string): Promise<UserRecord | null> {
    const { data, error } = await supabase
      .from('users')
      .select('*')
      .eq('id', userId)
      .maybeSingle();

    if (error !== null) {
      throw toStoreError('Failed to get user', error);
    }

    return data !== null ? mapRowToUser(data as UserRow) : null;
  }

  return {
    getUser,

    /**
     * Insert the user unless it exists; concurrent first contacts are
     * absorbed by ON CONFLICT DO NOTHING
     */
    async getOrCreateUser(identity: UserIdentity): Promise<UserRecord> {
      const { error } = await supabase.from('users').upsert(
        {
          id: identity.id,
          username: identity.username ?? null,
          display_name: identity.displayName ?? null,
        },
        { onConflict: 'id', ignoreDuplicates: true }
      );

      if (error !== null) {
        throw toStoreError('Failed to create user', error);
      }

      const user = await getUser(identity.id);
      if (user === null) {
        throw toStoreError('Failed to create user', {
          message: `user ${identity.id} missing after upsert`,
        });
      }
      return user;
    },

    /**
     * Clamped storage adjustment in one statement
     */
    async adjustStorage(
      userId: string,
      deltaBytes: number
    ): Promise<UserRecord | null> {
      const { data, error } = await supabase.rpc('custody_adjust_storage', {
        p_user_id: userId,
        p_delta: deltaBytes,
      });

      if (error !== null) {
        throw toStoreError('Failed to adjust storage', error);
      }

      const rows = (data ?? []) as UserRow[];
      const row = rows[0];
      return row !== undefined ? mapRowToUser(row) : null;
    },

    async setBanned(
      userId: string,
      banned: boolean
    ): Promise<UserRecord | null> {
      const { data, error } = await supabase
        .from('users')
        .update({ is_banned: banned })
        .eq('id', userId)
        .select('*')
        .maybeSingle();

      if (error !== null) {
        throw toStoreError('Failed to update ban flag', error);
      }

      return data !== null ? mapRowToUser(data as UserRow) : null;
    },
  };
}
