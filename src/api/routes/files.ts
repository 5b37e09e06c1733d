/**
 * File Routes
 * Upload (operation users) and metadata discovery (all roles)
 */

import type { Context } from 'hono';
import { Hono } from 'hono';
import { z } from 'zod';

import type { FileService } from '../../services/file.service.js';
import type { FileRecord, PaginationParams } from '../../types/index.js';
import {
  errorResponse,
  getPrincipal,
  getRequestId,
  successResponse,
} from '../utils/response.js';

/**
 * Public shape of a file record. storagePath stays internal.
 */
function serializeFile(file: FileRecord) {
  return {
    id: file.id,
    ownerRole: file.ownerRole,
    declaredName: file.declaredName,
    detectedType: file.detectedType,
    sizeBytes: file.sizeBytes,
    createdAt: file.createdAt.toISOString(),
  };
}

const listQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
  cursor: z.string().datetime().optional(),
});

type UploadForm =
  | { ok: true; bytes: Uint8Array; declaredName: string }
  | { ok: false; message: string };

/**
 * Read the multipart `file` field. An explicit `name` field overrides the
 * filename sent with the part.
 */
async function readUploadForm(c: Context): Promise<UploadForm> {
  const form = await c.req.parseBody().catch(() => null);
  if (form === null) {
    return { ok: false, message: 'Expected multipart/form-data body' };
  }

  const file = form['file'];
  if (!(file instanceof File)) {
    return { ok: false, message: 'No file provided' };
  }

  const name = form['name'];
  const declaredName = typeof name === 'string' ? name : file.name;

  return {
    ok: true,
    bytes: new Uint8Array(await file.arrayBuffer()),
    declaredName,
  };
}

/**
 * Create file routes
 */
export function createFileRoutes(deps: { fileService: FileService }): Hono {
  const { fileService } = deps;
  const app = new Hono();

  // ─────────────────────────────────────────────────────────────
  // UPLOAD
  // ─────────────────────────────────────────────────────────────

  /**
   * POST /files
   * Upload a file (multipart, field `file`)
   */
  app.post('/files', async (c) => {
    const requestId = getRequestId(c);
    const principal = getPrincipal(c);
    if (principal === null) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Authentication required' },
        requestId
      );
    }

    const form = await readUploadForm(c);
    if (!form.ok) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: form.message },
        requestId
      );
    }

    const result = await fileService.uploadFile(principal, {
      bytes: form.bytes,
      declaredName: form.declaredName,
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, serializeFile(result.data), requestId, 201);
  });

  /**
   * POST /files/validate
   * Dry-run the content check without storing anything
   */
  app.post('/files/validate', async (c) => {
    const requestId = getRequestId(c);

    const form = await readUploadForm(c);
    if (!form.ok) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: form.message },
        requestId
      );
    }

    const result = fileService.validateUpload(form.bytes, form.declaredName);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, { accepted: result.data.accepted }, requestId);
  });

  // ─────────────────────────────────────────────────────────────
  // DISCOVERY
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /files
   * List file metadata, newest first
   */
  app.get('/files', async (c) => {
    const requestId = getRequestId(c);
    const principal = getPrincipal(c);
    if (principal === null) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Authentication required' },
        requestId
      );
    }

    const query = listQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: 'Invalid query parameters',
          details: query.error.flatten().fieldErrors,
        },
        requestId
      );
    }

    const params: Partial<PaginationParams> = {};
    if (query.data.limit !== undefined) {
      params.limit = query.data.limit;
    }
    if (query.data.cursor !== undefined) {
      params.cursor = query.data.cursor;
    }

    const result = await fileService.listFiles(principal, params);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        items: result.data.items.map(serializeFile),
        nextCursor: result.data.nextCursor ?? null,
        hasMore: result.data.hasMore,
      },
      requestId
    );
  });

  /**
   * GET /files/:id
   * Get file metadata
   */
  app.get('/files/:id', async (c) => {
    const requestId = getRequestId(c);
    const principal = getPrincipal(c);
    if (principal === null) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Authentication required' },
        requestId
      );
    }

    const result = await fileService.getFile(principal, c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, serializeFile(result.data), requestId);
  });

  return app;
}
