/**
 * Test Mocks
 * In-process stand-ins for the stores, Supabase Auth and the auth layer
 */

import { AuthError } from '@supabase/supabase-js';
import type { MiddlewareHandler } from 'hono';
import { vi } from 'vitest';

import type { AuthMiddlewareDeps } from '@/api/middleware/auth.js';
import type {
  FileServiceDb,
  FileServiceStorage,
} from '@/services/file.service.js';
import type { FileRecord, Principal } from '@/types/index.js';

type AuthClient = AuthMiddlewareDeps['authClient'];

/**
 * Mock metadata store
 */
export function createMockFileDb() {
  return {
    createFile: vi.fn<FileServiceDb['createFile']>(),
    getFile: vi.fn<FileServiceDb['getFile']>(),
    listFiles: vi.fn<FileServiceDb['listFiles']>(),
  };
}

/**
 * Mock file store
 */
export function createMockStorage() {
  return {
    put: vi.fn<FileServiceStorage['put']>(),
    get: vi.fn<FileServiceStorage['get']>(),
    exists: vi.fn<FileServiceStorage['exists']>(),
    remove: vi.fn<FileServiceStorage['remove']>(),
  };
}

/**
 * Memory-backed metadata and file stores sharing one id space
 */
export function createInMemoryStores() {
  const records = new Map<string, FileRecord>();
  const objects = new Map<string, Uint8Array>();
  let counter = 0;

  const db: FileServiceDb = {
    async createFile(params) {
      counter += 1;
      const record: FileRecord = {
        id: `file-${counter}`,
        ...params,
        createdAt: new Date(Date.UTC(2026, 0, 1, 0, 0, counter)),
      };
      records.set(record.id, record);
      return record;
    },
    async getFile(fileId) {
      return records.get(fileId) ?? null;
    },
    async listFiles(params) {
      const sorted = [...records.values()].sort(
        (a, b) => b.createdAt.getTime() - a.createdAt.getTime()
      );
      const items = sorted.slice(0, params.limit);
      return { items, hasMore: sorted.length > params.limit };
    },
  };

  const storage: FileServiceStorage = {
    async put(bytes) {
      const path = `uploads/obj-${objects.size + 1}`;
      objects.set(path, bytes);
      return path;
    },
    async get(storagePath) {
      const bytes = objects.get(storagePath);
      return bytes === undefined ? null : new Blob([bytes]);
    },
    async exists(storagePath) {
      return objects.has(storagePath);
    },
    async remove(storagePath) {
      objects.delete(storagePath);
    },
  };

  return { db, storage, records, objects };
}

/**
 * Middleware that attaches a fixed principal, standing in for the auth
 * middleware in route tests
 */
export function withPrincipal(principal: Principal | null): MiddlewareHandler {
  return async (c, next) => {
    c.set('requestId', 'req-test');
    c.set('principal', principal);
    await next();
  };
}

/**
 * Supabase Auth stand-in that knows a fixed set of access tokens
 */
export function createFakeAuthClient(usersByToken: Record<string, string>) {
  return {
    getUser: vi.fn<AuthClient['getUser']>(async (jwt) => {
      const userId = jwt === undefined ? undefined : usersByToken[jwt];
      if (userId === undefined) {
        return {
          data: { user: null },
          error: new AuthError('invalid JWT', 401),
        };
      }
      return {
        data: {
          user: {
            id: userId,
            aud: 'authenticated',
            app_metadata: {},
            user_metadata: {},
            created_at: '2026-01-01T00:00:00.000Z',
          },
        },
        error: null,
      };
    }),
  };
}
