/**
 * CustodyService Database Adapter
 * Implements CustodyServiceDb interface using Supabase
 *
 * Multi-step writes are PostgreSQL functions (see
 * supabase/migrations/001_custody_schema.sql) so each one commits or rolls
 * back as a unit.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  FileCounter,
  FileKind,
  FileRecord,
  NewFileRecord,
  NewShareLink,
  ShareLink,
  SoftDeleteOutcome,
} from '@/types/index.js';

import type { CustodyServiceDb } from './custody.service.js';
import { StoreError, toStoreError } from './store.errors.js';

/**
 * Database row types
 */
export interface FileRow {
  id: string;
  blob_ref: string;
  blob_unique_ref: string;
  name: string;
  mime_type: string | null;
  extension: string | null;
  kind: string;
  size_bytes: number;
  duration_seconds: number | null;
  width: number | null;
  height: number | null;
  transport_channel_id: string;
  transport_message_id: string | null;
  owner_id: string;
  owner_display_name: string | null;
  download_count: number;
  view_count: number;
  is_active: boolean;
  share_expires_at: string | null;
  created_at: string;
}

interface ShareLinkRow {
  code: string;
  file_id: string;
  creator_id: string;
  download_count: number;
  is_active: boolean;
  expires_at: string | null;
  created_at: string;
}

interface SoftDeleteRow {
  file: FileRow;
  remaining_references: number;
}

const COUNTER_COLUMNS: Record<FileCounter, string> = {
  download: 'download_count',
  view: 'view_count',
};

/**
 * Map database row to FileRecord entity
 */
export function mapRowToFile(row: FileRow): FileRecord {
  return {
    id: row.id,
    blobRef: row.blob_ref,
    blobUniqueRef: row.blob_unique_ref,
    name: row.name,
    mimeType: row.mime_type,
    extension: row.extension,
    kind: row.kind as FileKind,
    sizeBytes: Number(row.size_bytes),
    durationSeconds: row.duration_seconds,
    width: row.width,
    height: row.height,
    transportLocation: {
      channelId: row.transport_channel_id,
      messageId: row.transport_message_id,
    },
    ownerId: row.owner_id,
    ownerDisplayName: row.owner_display_name,
    downloadCount: row.download_count,
    viewCount: row.view_count,
    active: row.is_active,
    shareExpiresAt:
      row.share_expires_at !== null ? new Date(row.share_expires_at) : null,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Map database row to ShareLink entity
 */
function mapRowToShareLink(row: ShareLinkRow): ShareLink {
  return {
    code: row.code,
    fileId: row.file_id,
    creatorId: row.creator_id,
    downloadCount: row.download_count,
    active: row.is_active,
    expiresAt: row.expires_at !== null ? new Date(row.expires_at) : null,
    createdAt: new Date(row.created_at),
  };
}

/**
 * First row of a set-returning function, if any
 */
function firstFileRow(data: unknown): FileRecord | null {
  const rows = (data ?? []) as FileRow[];
  const row = rows[0];
  return row !== undefined ? mapRowToFile(row) : null;
}

/**
 * Create CustodyServiceDb implementation using Supabase
 */
export function createCustodyServiceDb(
  supabase: SupabaseClient
): CustodyServiceDb {
  return {
    /**
     * Insert a new active file record
     */
    async insertFile(file: NewFileRecord): Promise<FileRecord> {
      const { data, error } = await supabase
        .from('files')
        .insert({
          id: file.id,
          blob_ref: file.blobRef,
          blob_unique_ref: file.blobUniqueRef,
          name: file.name,
          mime_type: file.mimeType,
          extension: file.extension,
          kind: file.kind,
          size_bytes: file.sizeBytes,
          duration_seconds: file.durationSeconds,
          width: file.width,
          height: file.height,
          transport_channel_id: file.transportLocation.channelId,
          transport_message_id: file.transportLocation.messageId,
          owner_id: file.ownerId,
          owner_display_name: file.ownerDisplayName,
          created_at: file.createdAt.toISOString(),
        })
        .select('*')
        .single();

      if (error !== null) {
        throw toStoreError('Failed to insert file', error);
      }

      return mapRowToFile(data as FileRow);
    },

    /**
     * Get file by ID, whatever its state
     */
    async getFile(fileId: string): Promise<FileRecord | null> {
      const { data, error } = await supabase
        .from('files')
        .select('*')
        .eq('id', fileId)
        .maybeSingle();

      if (error !== null) {
        throw toStoreError('Failed to get file', error);
      }

      return data !== null ? mapRowToFile(data as FileRow) : null;
    },

    /**
     * Atomic `counter = counter + 1` on a visible record
     */
    async incrementCounter(
      fileId: string,
      counter: FileCounter,
      now: Date
    ): Promise<boolean> {
      const { data, error } = await supabase.rpc('custody_increment_counter', {
        p_file_id: fileId,
        p_column: COUNTER_COLUMNS[counter],
        p_now: now.toISOString(),
      });

      if (error !== null) {
        throw toStoreError('Failed to increment counter', error);
      }

      return data === true;
    },

    /**
     * INSERT ... SELECT copy of a visible record for a new owner
     */
    async cloneFile(params: {
      sourceId: string;
      newId: string;
      ownerId: string;
      ownerDisplayName: string | null;
      now: Date;
    }): Promise<FileRecord | null> {
      const { data, error } = await supabase.rpc('custody_clone_file', {
        p_source_id: params.sourceId,
        p_new_id: params.newId,
        p_owner_id: params.ownerId,
        p_owner_display_name: params.ownerDisplayName,
        p_now: params.now.toISOString(),
      });

      if (error !== null) {
        throw toStoreError('Failed to clone file', error);
      }

      return firstFileRow(data);
    },

    /**
     * Resolve a legacy code; the target's download count is bumped in the
     * same transaction
     */
    async resolveShareLink(code: string, now: Date): Promise<FileRecord | null> {
      const { data, error } = await supabase.rpc('custody_resolve_share_link', {
        p_code: code,
        p_now: now.toISOString(),
      });

      if (error !== null) {
        throw toStoreError('Failed to resolve share link', error);
      }

      return firstFileRow(data);
    },

    /**
     * Insert a legacy share code
     */
    async insertShareLink(link: NewShareLink): Promise<ShareLink> {
      const { data, error } = await supabase
        .from('share_links')
        .insert({
          code: link.code,
          file_id: link.fileId,
          creator_id: link.creatorId,
          expires_at: link.expiresAt !== null ? link.expiresAt.toISOString() : null,
          created_at: link.createdAt.toISOString(),
        })
        .select('*')
        .single();

      if (error !== null) {
        throw toStoreError('Failed to insert share link', error);
      }

      return mapRowToShareLink(data as ShareLinkRow);
    },

    /**
     * Set share expiry if the record is still active and owned
     */
    async updateShareExpiry(params: {
      fileId: string;
      ownerId: string;
      expiresAt: Date | null;
    }): Promise<FileRecord | null> {
      const { data, error } = await supabase
        .from('files')
        .update({
          share_expires_at:
            params.expiresAt !== null ? params.expiresAt.toISOString() : null,
        })
        .eq('id', params.fileId)
        .eq('owner_id', params.ownerId)
        .eq('is_active', true)
        .select('*')
        .maybeSingle();

      if (error !== null) {
        throw toStoreError('Failed to update share expiry', error);
      }

      return data !== null ? mapRowToFile(data as FileRow) : null;
    },

    /**
     * Mark the record inactive and count remaining active references to
     * its transport location
     */
    async softDeleteFile(
      fileId: string,
      ownerId: string
    ): Promise<SoftDeleteOutcome | null> {
      const { data, error } = await supabase.rpc('custody_soft_delete_file', {
        p_file_id: fileId,
        p_owner_id: ownerId,
      });

      if (error !== null) {
        throw toStoreError('Failed to delete file', error);
      }
      if (data === null) {
        return null;
      }

      const row = data as SoftDeleteRow;
      if (typeof row.remaining_references !== 'number') {
        throw new StoreError('Malformed soft delete result');
      }

      return {
        file: mapRowToFile(row.file),
        remainingReferences: row.remaining_references,
      };
    },

    /**
     * Active records of an owner, newest first
     */
    async listFilesByOwner(
      ownerId: string,
      limit: number
    ): Promise<FileRecord[]> {
      const { data, error } = await supabase
        .from('files')
        .select('*')
        .eq('owner_id', ownerId)
        .eq('is_active', true)
        .order('created_at', { ascending: false })
        .limit(limit);

      if (error !== null) {
        throw toStoreError('Failed to list files', error);
      }

      return (data as FileRow[]).map(mapRowToFile);
    },
  };
}
