/**
 * Supabase Storage Adapter
 * Implementation of FileServiceStorage for Supabase Storage
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { nanoid } from 'nanoid';

import type { FileServiceStorage } from './file.service.js';

const BUCKET_NAME = 'uploads';

/**
 * Storage keys are random and carry nothing from the uploaded filename
 */
function generateStoragePath(): string {
  return `uploads/${nanoid()}`;
}

/**
 * Create Supabase Storage adapter
 */
export function createSupabaseStorageAdapter(
  supabase: SupabaseClient
): FileServiceStorage {
  const bucket = () => supabase.storage.from(BUCKET_NAME);

  return {
    async put(bytes: Uint8Array, mimeType: string): Promise<string> {
      const storagePath = generateStoragePath();
      const { error } = await bucket().upload(storagePath, bytes, {
        contentType: mimeType,
        upsert: false,
      });

      if (error) {
        throw new Error(`Failed to upload file: ${error.message}`);
      }

      return storagePath;
    },

    async get(storagePath: string): Promise<Blob | null> {
      const { data, error } = await bucket().download(storagePath);

      if (error) {
        if (
          ('status' in error && error.status === 404) ||
          error.message.toLowerCase().includes('not found')
        ) {
          return null;
        }
        throw new Error(`Failed to download file: ${error.message}`);
      }

      return data;
    },

    async exists(storagePath: string): Promise<boolean> {
      // Not-found comes back as data: false; other failures throw
      const { data } = await bucket().exists(storagePath);
      return data;
    },

    async remove(storagePath: string): Promise<void> {
      const { error } = await bucket().remove([storagePath]);

      if (error) {
        throw new Error(`Failed to delete file: ${error.message}`);
      }
    },
  };
}
