/**
 * Supabase Storage Adapter Unit Tests
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { describe, it, expect, beforeEach, vi } from 'vitest';

import { createSupabaseStorageAdapter } from '@/services/file.storage.js';
import type { FileServiceStorage } from '@/services/file.service.js';

describe('Supabase Storage Adapter', () => {
  let bucket: {
    exists: ReturnType<typeof vi.fn>;
    list: ReturnType<typeof vi.fn>;
  };
  let from: ReturnType<typeof vi.fn>;
  let storage: FileServiceStorage;

  beforeEach(() => {
    bucket = { exists: vi.fn(), list: vi.fn() };
    from = vi.fn(() => bucket);
    storage = createSupabaseStorageAdapter({
      storage: { from },
    } as unknown as SupabaseClient);
  });

  describe('exists', () => {
    it('should ask the bucket about the exact object path', async () => {
      bucket.exists.mockResolvedValue({ data: true, error: null });

      const found = await storage.exists('uploads/aB_c-D_e');

      expect(found).toBe(true);
      expect(from).toHaveBeenCalledWith('uploads');
      expect(bucket.exists).toHaveBeenCalledWith('uploads/aB_c-D_e');
      expect(bucket.list).not.toHaveBeenCalled();
    });

    it('should report a missing object as absent', async () => {
      bucket.exists.mockResolvedValue({
        data: false,
        error: new Error('Object not found'),
      });

      expect(await storage.exists('uploads/gone')).toBe(false);
    });

    it('should propagate other storage failures', async () => {
      bucket.exists.mockRejectedValue(new Error('bucket unavailable'));

      await expect(storage.exists('uploads/abc')).rejects.toThrow(
        'bucket unavailable'
      );
    });
  });
});
