/**
 * FileService Implementation
 *
 * SCOPE: Upload (content gate + storage + metadata) and metadata discovery
 * NOT IN SCOPE: Download tokens (see download.service.ts)
 *
 * GUARDRAILS:
 * - Only operation users can upload
 * - Content classification runs before any byte reaches the store
 * - detectedType comes from the classifier, never from declaredName
 * - A failed metadata insert removes the stored object
 * - Any authenticated principal can list and read metadata
 *
 * Dependencies: FileClassifier, metadata store, file store
 */

import type {
  CreateFileRecordParams,
  FileRecord,
  PaginatedResult,
  PaginationParams,
  Principal,
  Result,
  UploadAcceptance,
  UploadParams,
} from '../types/index.js';
import {
  success,
  failure,
  normalizePaginationParams,
} from '../types/index.js';

import type { FileClassifier } from './file-classifier.service.js';

export const MAX_DECLARED_NAME_LENGTH = 255;

/**
 * Metadata store interface. Assigns unique ids on insert.
 */
export interface FileServiceDb {
  createFile: (params: CreateFileRecordParams) => Promise<FileRecord>;
  getFile: (fileId: string) => Promise<FileRecord | null>;
  listFiles: (params: PaginationParams) => Promise<PaginatedResult<FileRecord>>;
}

/**
 * File store interface (Supabase Storage in production)
 */
export interface FileServiceStorage {
  /**
   * Durable once the promise resolves. Returns the storage path.
   */
  put: (bytes: Uint8Array, mimeType: string) => Promise<string>;
  /**
   * null when nothing is stored at the path
   */
  get: (storagePath: string) => Promise<Blob | null>;
  exists: (storagePath: string) => Promise<boolean>;
  remove: (storagePath: string) => Promise<void>;
}

/**
 * FileService interface
 */
export interface FileService {
  validateUpload(
    bytes: Uint8Array,
    declaredName: string
  ): Result<UploadAcceptance>;
  uploadFile(
    principal: Principal,
    params: UploadParams
  ): Promise<Result<FileRecord>>;
  getFile(principal: Principal, fileId: string): Promise<Result<FileRecord>>;
  listFiles(
    principal: Principal,
    params: Partial<PaginationParams>
  ): Promise<Result<PaginatedResult<FileRecord>>>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

function canUpload(principal: Principal): boolean {
  return principal.role === 'operation';
}

function isAuthenticated(principal: Principal): boolean {
  return principal.userId.trim() !== '';
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create FileService instance
 */
export function createFileService(deps: {
  db: FileServiceDb;
  storage: FileServiceStorage;
  classifier: FileClassifier;
  maxUploadBytes: number;
}): FileService {
  const { db, storage, classifier, maxUploadBytes } = deps;

  return {
    validateUpload(
      bytes: Uint8Array,
      declaredName: string
    ): Result<UploadAcceptance> {
      return classifier.validateUpload(bytes, declaredName);
    },

    /**
     * Upload a file
     * Classify, then store, then record
     */
    async uploadFile(
      principal: Principal,
      params: UploadParams
    ): Promise<Result<FileRecord>> {
      if (!isAuthenticated(principal)) {
        return failure('UNAUTHORIZED', 'Authentication required');
      }
      if (!canUpload(principal)) {
        return failure(
          'PERMISSION_DENIED',
          'Only operation users can upload files'
        );
      }

      const declaredName = params.declaredName.trim();
      if (declaredName === '') {
        return failure('VALIDATION_ERROR', 'File name is required');
      }
      if (declaredName.length > MAX_DECLARED_NAME_LENGTH) {
        return failure(
          'VALIDATION_ERROR',
          `File name must be at most ${MAX_DECLARED_NAME_LENGTH} characters`
        );
      }

      if (params.bytes.length === 0) {
        return failure('VALIDATION_ERROR', 'File is empty');
      }
      if (params.bytes.length > maxUploadBytes) {
        return failure('FILE_TOO_LARGE', 'File exceeds maximum allowed size', {
          maxBytes: maxUploadBytes,
        });
      }

      const verdict = classifier.validateUpload(params.bytes, declaredName);
      if (!verdict.success) {
        console.warn('Upload rejected by content check:', {
          userId: principal.userId,
          declaredName,
        });
        return verdict;
      }
      const detectedType = verdict.data.accepted;

      const storagePath = await storage.put(params.bytes, detectedType);

      try {
        const record = await db.createFile({
          ownerRole: principal.role,
          ownerId: principal.userId,
          declaredName,
          detectedType,
          sizeBytes: params.bytes.length,
          storagePath,
        });
        return success(record);
      } catch (err) {
        try {
          await storage.remove(storagePath);
        } catch (cleanupErr) {
          console.error('Failed to remove orphaned upload:', {
            storagePath,
            error: cleanupErr,
          });
        }
        throw err;
      }
    },

    /**
     * Get file metadata
     */
    async getFile(
      principal: Principal,
      fileId: string
    ): Promise<Result<FileRecord>> {
      if (!isAuthenticated(principal)) {
        return failure('UNAUTHORIZED', 'Authentication required');
      }
      if (fileId.trim() === '') {
        return failure('VALIDATION_ERROR', 'File ID is required');
      }

      const file = await db.getFile(fileId);
      if (file === null) {
        return failure('NOT_FOUND', 'File not found');
      }

      return success(file);
    },

    /**
     * List file metadata, newest first
     */
    async listFiles(
      principal: Principal,
      params: Partial<PaginationParams>
    ): Promise<Result<PaginatedResult<FileRecord>>> {
      if (!isAuthenticated(principal)) {
        return failure('UNAUTHORIZED', 'Authentication required');
      }

      const result = await db.listFiles(normalizePaginationParams(params));
      return success(result);
    },
  };
}
