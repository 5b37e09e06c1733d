/**
 * FileService Database Adapter
 * Implements FileServiceDb using the Supabase `files` table
 *
 * Ids are generated by the database (uuid default). Rows are never
 * updated after insert.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  CreateFileRecordParams,
  FileRecord,
  PaginatedResult,
  PaginationParams,
} from '../types/index.js';
import { isRole } from '../types/index.js';

import type { FileServiceDb } from './file.service.js';

/**
 * Database row type
 */
interface FileRow {
  id: string;
  owner_role: string;
  owner_id: string;
  declared_name: string;
  detected_type: string;
  size_bytes: number;
  storage_path: string;
  created_at: string;
}

/**
 * Map database row to FileRecord
 */
function mapRowToFile(row: FileRow): FileRecord {
  if (!isRole(row.owner_role)) {
    throw new Error(`Unknown owner role on file ${row.id}`);
  }
  return {
    id: row.id,
    ownerRole: row.owner_role,
    ownerId: row.owner_id,
    declaredName: row.declared_name,
    detectedType: row.detected_type,
    sizeBytes: row.size_bytes,
    storagePath: row.storage_path,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Create FileServiceDb implementation using Supabase
 */
export function createFileServiceDb(supabase: SupabaseClient): FileServiceDb {
  return {
    async createFile(params: CreateFileRecordParams): Promise<FileRecord> {
      const { data, error } = await supabase
        .from('files')
        .insert({
          owner_role: params.ownerRole,
          owner_id: params.ownerId,
          declared_name: params.declaredName,
          detected_type: params.detectedType,
          size_bytes: params.sizeBytes,
          storage_path: params.storagePath,
        })
        .select('*')
        .single();

      if (error !== null) {
        throw new Error(`Failed to create file: ${error.message}`);
      }

      return mapRowToFile(data as FileRow);
    },

    async getFile(fileId: string): Promise<FileRecord | null> {
      const { data, error } = await supabase
        .from('files')
        .select('*')
        .eq('id', fileId)
        .maybeSingle();

      if (error !== null) {
        // Malformed uuid
        if (error.code === '22P02') {
          return null;
        }
        throw new Error(`Failed to get file: ${error.message}`);
      }

      return data === null ? null : mapRowToFile(data as FileRow);
    },

    async listFiles(
      params: PaginationParams
    ): Promise<PaginatedResult<FileRecord>> {
      let query = supabase
        .from('files')
        .select('*')
        .order('created_at', { ascending: false });

      if (params.cursor !== undefined) {
        query = query.lt('created_at', params.cursor);
      }

      // Fetch one extra to check hasMore
      const { data, error } = await query.limit(params.limit + 1);

      if (error !== null) {
        throw new Error(`Failed to list files: ${error.message}`);
      }

      const rows = data as FileRow[];
      const hasMore = rows.length > params.limit;
      const items = rows.slice(0, params.limit).map(mapRowToFile);

      const result: PaginatedResult<FileRecord> = {
        items,
        hasMore,
      };

      const lastItem = items[items.length - 1];
      if (hasMore && lastItem !== undefined) {
        result.nextCursor = lastItem.createdAt.toISOString();
      }

      return result;
    },
  };
}
